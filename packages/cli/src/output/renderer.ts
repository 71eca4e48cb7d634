import pc from 'picocolors';
import {
  OUTCOME_TAGS,
  relative,
  type FileOutcome,
  type OutcomeTag,
  type TextSpan,
} from '@copyhead/shared';
import type { FileListing, RunResult } from '@copyhead/core';

type Colors = ReturnType<typeof pc.createColors>;

export interface RendererOptions {
  json: boolean;
  /** Also list compliant files */
  verbose?: boolean;
  /** Only print the summary */
  quiet?: boolean;
  /** Print the before/after text of each change */
  diff?: boolean;
  colors?: Colors;
}

/** Machine-readable form of a run, printed under --json. */
export interface CheckReport {
  runId: string;
  workspaceRoot: string;
  mode: RunResult['config']['mode'];
  year: number;
  summary: RunResult['summary'];
  outcomes: FileOutcome[];
  warnings: string[];
}

const LABELS: Record<OutcomeTag, string> = {
  AlreadyCompliant: 'ok',
  HeaderAdded: 'added',
  YearUpdated: 'updated',
  YearOutdated: 'outdated',
  HeaderMissing: 'missing',
  Skipped: 'skipped',
  Failed: 'failed',
};

/** Machine-readable form of a listing, printed by `tree --json`. */
export interface TreeReport {
  workspaceRoot: string;
  /** Selected files relative to the workspace root */
  files: string[];
  skipped: { path: string; reason: string }[];
  warnings: string[];
}

export function toTreeReport(listing: FileListing): TreeReport {
  return {
    workspaceRoot: listing.workspaceRoot,
    files: listing.selected.map((file) => file.relativePath),
    skipped: listing.rejected.map((r) => ({ path: r.relativePath, reason: r.reason })),
    warnings: listing.warnings,
  };
}

export function toReport(result: RunResult): CheckReport {
  return {
    runId: result.runId,
    workspaceRoot: result.workspaceRoot,
    mode: result.config.mode,
    year: result.year,
    summary: result.summary,
    outcomes: [...result.outcomes].sort((a, b) => a.path.localeCompare(b.path)),
    warnings: result.warnings,
  };
}

export class OutputRenderer {
  private readonly colors: Colors;

  constructor(private readonly options: RendererOptions) {
    this.colors = options.colors ?? pc;
  }

  render(result: RunResult): void {
    const report = toReport(result);
    if (this.options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      this.renderHuman(report);
    }
  }

  /**
   * Prints the selected files one per line, relative to the workspace root.
   * Verbose output adds why each other file was left out.
   */
  renderTree(listing: FileListing): void {
    const report = toTreeReport(listing);
    if (this.options.json) {
      console.log(JSON.stringify(report, null, 2));
      return;
    }
    for (const file of report.files) {
      console.log(file);
    }
    if (this.options.verbose) {
      for (const skipped of report.skipped) {
        console.log(this.colors.gray(`Skipping: ${skipped.path} (${skipped.reason})`));
      }
    }
    if (!this.options.quiet) {
      console.log(`\n${this.colors.bold(`Found ${report.files.length} file(s)`)}`);
    }
  }

  private renderHuman(report: CheckReport): void {
    if (!this.options.quiet) {
      for (const outcome of report.outcomes) {
        if (outcome.tag === 'AlreadyCompliant' && !this.options.verbose) {
          continue;
        }
        console.log(this.formatOutcome(outcome, report.workspaceRoot));
        if (this.options.diff && outcome.span) {
          this.renderSpan(outcome.span);
        }
      }
    }
    this.renderSummary(report);
  }

  private formatOutcome(outcome: FileOutcome, root: string): string {
    const label = this.paint(outcome.tag, LABELS[outcome.tag].padEnd(8));
    const reason = outcome.reason ? this.colors.gray(` (${outcome.reason})`) : '';
    return `  ${label} ${relative(root, outcome.path)}${reason}`;
  }

  private renderSpan(span: TextSpan): void {
    for (const line of splitLines(span.before)) {
      console.log(this.colors.red(`      - ${line}`));
    }
    for (const line of splitLines(span.after)) {
      console.log(this.colors.green(`      + ${line}`));
    }
  }

  private renderSummary(report: CheckReport): void {
    const { summary } = report;
    const parts = OUTCOME_TAGS.filter((tag) => summary.counts[tag] > 0).map(
      (tag) => `${summary.counts[tag]} ${LABELS[tag]}`,
    );
    const detail = parts.length > 0 ? `: ${parts.join(', ')}` : '';
    console.log(`\n${this.colors.bold(`Checked ${summary.total} file(s)`)}${detail}`);

    if (summary.failed) {
      console.log(this.colors.red('❌ Check failed.'));
      if (summary.mode === 'check' && summary.counts.HeaderMissing > 0) {
        console.log(`  - To add missing headers, run with ${this.colors.cyan('--modify')}.`);
      }
    } else {
      console.log(this.colors.green('✅ Check passed.'));
    }
  }

  private paint(tag: OutcomeTag, text: string): string {
    switch (tag) {
      case 'HeaderAdded':
      case 'YearUpdated':
      case 'AlreadyCompliant':
        return this.colors.green(text);
      case 'YearOutdated':
        return this.colors.yellow(text);
      case 'HeaderMissing':
      case 'Failed':
        return this.colors.red(text);
      case 'Skipped':
        return this.colors.gray(text);
    }
  }
}

function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  return text.replace(/\n+$/, '').split('\n');
}
