/**
 * A file found by path expansion. Immutable once created.
 */
export interface FileCandidate {
  /** Absolute path, forward slashes */
  readonly path: string;
  /** Path relative to the workspace root */
  readonly relativePath: string;
  readonly basename: string;
  /** Lower-cased extensions, compound first (`min.js`, then `js`) */
  readonly extensions: readonly string[];
  readonly size: number;
  readonly mode: number;
}

export interface PathFilter {
  readonly name: string;
  accepts(candidate: FileCandidate): boolean | Promise<boolean>;
}
