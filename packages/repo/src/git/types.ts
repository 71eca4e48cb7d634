/**
 * Version-control queries the filter chain depends on. Paths are absolute,
 * rooted at `root`.
 */
export interface VcsProvider {
  readonly root: string;
  trackedFiles(): Promise<Set<string>>;
  changedSince(ref: string, options?: ChangedSinceOptions): Promise<Set<string>>;
}

export interface ChangedSinceOptions {
  /** Only count changes committed between `ref` and HEAD */
  committedOnly?: boolean;
}

/** Runs git with the given arguments in `cwd` and resolves with raw stdout. */
export type GitRunner = (args: string[], cwd: string) => Promise<string>;
