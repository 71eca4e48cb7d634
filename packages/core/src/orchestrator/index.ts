import os from 'os';
import {
  SilentLogger,
  createOutcome,
  describeError,
  type FileOutcome,
  type Logger,
  type RunMode,
  type RunSummary,
} from '@copyhead/shared';
import type { PathCandidate } from '../processor';
import { Aggregator } from './aggregator';
import { OutcomeChannel } from './channel';

export * from './aggregator';
export * from './channel';

/** Anything that turns a candidate into an outcome; FileProcessor in practice */
export interface CandidateHandler {
  process(candidate: PathCandidate): Promise<FileOutcome>;
}

export interface OrchestratorOptions {
  mode: RunMode;
  handler: CandidateHandler;
  /** Worker count; available parallelism when unset */
  concurrency?: number;
  logger?: Logger;
}

export interface OrchestratorResult {
  summary: RunSummary;
  /** Outcomes in completion order */
  outcomes: FileOutcome[];
}

/**
 * Number of workers for `files` candidates. Never more workers than files,
 * never fewer than one.
 */
export function poolWidth(concurrency: number | undefined, files: number): number {
  const requested = concurrency ?? os.availableParallelism();
  return Math.max(1, Math.min(requested, files));
}

/**
 * Fans candidates out to a bounded pool of workers. Each candidate is
 * handed to exactly one worker; outcomes arrive in completion order.
 */
export class Orchestrator {
  private readonly logger: Logger;

  constructor(private readonly options: OrchestratorOptions) {
    this.logger = options.logger ?? new SilentLogger();
  }

  stream(candidates: readonly PathCandidate[]): AsyncIterable<FileOutcome> {
    const channel = new OutcomeChannel<FileOutcome>();
    const width = poolWidth(this.options.concurrency, candidates.length);
    let next = 0;

    const worker = async (id: number): Promise<void> => {
      for (;;) {
        const index = next;
        next += 1;
        const candidate = candidates[index];
        if (candidate === undefined) {
          return;
        }
        channel.push(await this.handle(candidate, id));
      }
    };

    this.logger.debug(`Processing ${candidates.length} file(s) with ${width} worker(s)`);
    const workers = Array.from({ length: width }, (_, id) => worker(id));
    void Promise.all(workers).then(
      () => channel.close(),
      (error: unknown) => channel.fail(error),
    );
    return channel;
  }

  async run(
    candidates: readonly PathCandidate[],
    onOutcome?: (outcome: FileOutcome) => void,
  ): Promise<OrchestratorResult> {
    const started = Date.now();
    const aggregator = new Aggregator(this.options.mode);
    const outcomes: FileOutcome[] = [];
    for await (const outcome of this.stream(candidates)) {
      aggregator.add(outcome);
      outcomes.push(outcome);
      onOutcome?.(outcome);
    }
    return { summary: aggregator.summary(Date.now() - started), outcomes };
  }

  private async handle(candidate: PathCandidate, worker: number): Promise<FileOutcome> {
    try {
      return await this.options.handler.process(candidate);
    } catch (error) {
      this.logger.warn(`Worker ${worker} failed on ${candidate.path}: ${describeError(error)}`);
      return createOutcome('Failed', candidate.path, { reason: describeError(error) });
    }
  }
}
