/**
 * Run mode: `check` only reports, `modify` repairs headers in place.
 */
export type RunMode = 'check' | 'modify';

/**
 * Terminal state of one file after it went through the pipeline.
 */
export type OutcomeTag =
  | 'AlreadyCompliant'
  | 'HeaderAdded'
  | 'YearUpdated'
  | 'YearOutdated'
  | 'HeaderMissing'
  | 'Skipped'
  | 'Failed';

export const OUTCOME_TAGS: readonly OutcomeTag[] = [
  'AlreadyCompliant',
  'HeaderAdded',
  'YearUpdated',
  'YearOutdated',
  'HeaderMissing',
  'Skipped',
  'Failed',
];

/** Before/after text of the region a file change touches (or would touch). */
export interface TextSpan {
  before: string;
  after: string;
}

export interface FileOutcome {
  readonly tag: OutcomeTag;
  /** Absolute path of the file */
  readonly path: string;
  /** Why the file was skipped or failed */
  readonly reason?: string;
  readonly span?: TextSpan;
}

export type OutcomeCounts = Record<OutcomeTag, number>;

export interface RunSummary {
  readonly mode: RunMode;
  readonly total: number;
  readonly counts: Readonly<OutcomeCounts>;
  /** Check mode: any missing header or failure. Modify mode: any failure. */
  readonly failed: boolean;
  readonly durationMs: number;
}

export function emptyCounts(): OutcomeCounts {
  return {
    AlreadyCompliant: 0,
    HeaderAdded: 0,
    YearUpdated: 0,
    YearOutdated: 0,
    HeaderMissing: 0,
    Skipped: 0,
    Failed: 0,
  };
}

export function createOutcome(
  tag: OutcomeTag,
  path: string,
  extra: { reason?: string; span?: TextSpan } = {},
): FileOutcome {
  return Object.freeze({ tag, path, ...extra });
}
