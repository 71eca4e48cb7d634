import type { FileCandidate, PathFilter } from './types';

export interface ExtensionRules {
  include?: readonly string[];
  exclude?: readonly string[];
}

/**
 * Extensions of a file name, lower-cased: the compound one first when there is
 * one (`a.min.js` gives `min.js` then `js`). A leading dot does not start an
 * extension.
 */
export function extensionsOf(basename: string): string[] {
  const name = basename.replace(/^\.+/, '').toLowerCase();
  const parts = name.split('.');
  if (parts.length < 2) {
    return [];
  }
  const simple = parts[parts.length - 1];
  if (!simple) {
    return [];
  }
  if (parts.length >= 3) {
    const compound = `${parts[parts.length - 2]}.${simple}`;
    return [compound, simple];
  }
  return [simple];
}

function normalizeExtension(ext: string): string {
  return ext.trim().replace(/^\./, '').toLowerCase();
}

export class ExtensionFilter implements PathFilter {
  readonly name = 'extension';
  private readonly include?: Set<string>;
  private readonly exclude: Set<string>;

  constructor(rules: ExtensionRules) {
    this.include = rules.include ? new Set(rules.include.map(normalizeExtension)) : undefined;
    this.exclude = new Set((rules.exclude ?? []).map(normalizeExtension));
  }

  /** Whether any rule would reject something */
  get active(): boolean {
    return this.include !== undefined || this.exclude.size > 0;
  }

  accepts(candidate: FileCandidate): boolean {
    const { extensions } = candidate;
    if (this.include) {
      return extensions.some((ext) => this.include?.has(ext));
    }
    return !extensions.some((ext) => this.exclude.has(ext));
  }
}
