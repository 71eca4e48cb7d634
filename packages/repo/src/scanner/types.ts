import type { Logger } from '@copyhead/shared';
import type { FileCandidate } from '../filters/types';
import type { IgnoreEngine } from '../ignore';

export interface ExpandOptions {
  /** Workspace root; candidate relative paths hang off it */
  root: string;
  /** Base for relative patterns; defaults to the process cwd */
  cwd?: string;
  /** Prunes excluded directories while walking */
  ignore?: IgnoreEngine;
  logger?: Logger;
}

export interface Expansion {
  /** Unique files, sorted by path */
  files: FileCandidate[];
  warnings: string[];
}
