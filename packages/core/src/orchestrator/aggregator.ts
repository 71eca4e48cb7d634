import {
  emptyCounts,
  type FileOutcome,
  type OutcomeCounts,
  type RunMode,
  type RunSummary,
} from '@copyhead/shared';

/**
 * Sole writer of the run counts. Readers only see the frozen summary.
 */
export class Aggregator {
  private readonly counts: OutcomeCounts = emptyCounts();
  private total = 0;

  constructor(private readonly mode: RunMode) {}

  add(outcome: FileOutcome): void {
    this.counts[outcome.tag] += 1;
    this.total += 1;
  }

  summary(durationMs: number): RunSummary {
    const counts = Object.freeze({ ...this.counts });
    return Object.freeze({
      mode: this.mode,
      total: this.total,
      counts,
      failed: isFailing(this.mode, counts),
      durationMs,
    });
  }
}

/**
 * Check mode fails on missing headers or failures; modify mode only on
 * failures.
 */
export function isFailing(mode: RunMode, counts: Readonly<OutcomeCounts>): boolean {
  if (counts.Failed > 0) {
    return true;
  }
  return mode === 'check' && counts.HeaderMissing > 0;
}
