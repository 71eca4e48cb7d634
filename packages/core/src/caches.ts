import type { IgnoreRuleCache } from '@copyhead/repo';
import type { RenderCache } from './template';

/**
 * State that may be shared across runs in one process. Entries are keyed by
 * everything they depend on: `.licenseignore` levels by ignore file name and
 * directory, rendered headers by template text, style and year. Run-specific
 * ignore patterns are never cached.
 */
export interface RunCaches {
  ignoreRules: IgnoreRuleCache;
  renders: RenderCache;
}

export function createRunCaches(): RunCaches {
  return { ignoreRules: new Map(), renders: new Map() };
}
