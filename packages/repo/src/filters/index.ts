import type { IgnoreEngine } from '../ignore';
import { ExtensionFilter, type ExtensionRules } from './extension';
import type { FileCandidate, PathFilter } from './types';

export * from './types';
export * from './extension';

export class IgnoreFilter implements PathFilter {
  readonly name = 'ignore';

  constructor(private readonly engine: IgnoreEngine) {}

  accepts(candidate: FileCandidate): Promise<boolean> {
    return this.engine.evaluate(candidate.path);
  }
}

/**
 * Membership in a snapshot set of absolute paths, taken once per run.
 */
export class MembershipFilter implements PathFilter {
  constructor(
    readonly name: string,
    private readonly members: ReadonlySet<string>,
  ) {}

  accepts(candidate: FileCandidate): boolean {
    return this.members.has(candidate.path);
  }
}

export function trackedFilter(tracked: ReadonlySet<string>): MembershipFilter {
  return new MembershipFilter('tracked', tracked);
}

export function changedFilter(changed: ReadonlySet<string>): MembershipFilter {
  return new MembershipFilter('changed', changed);
}

export interface Partition<T extends FileCandidate> {
  accepted: T[];
  /** Each rejected candidate with the name of the filter that rejected it */
  rejected: { candidate: T; filter: string }[];
}

/**
 * Ordered filters, short-circuiting on the first rejection.
 */
export class FilterChain {
  private readonly filters: readonly PathFilter[];

  constructor(filters: PathFilter[]) {
    this.filters = filters;
  }

  get names(): string[] {
    return this.filters.map((f) => f.name);
  }

  /** Name of the first filter rejecting the candidate, if any */
  async rejectedBy(candidate: FileCandidate): Promise<string | undefined> {
    for (const filter of this.filters) {
      if (!(await filter.accepts(candidate))) {
        return filter.name;
      }
    }
    return undefined;
  }

  /** Splits candidates into those every filter accepts and the rest, in input order. */
  async partition<T extends FileCandidate>(candidates: readonly T[]): Promise<Partition<T>> {
    const verdicts = await Promise.all(candidates.map((c) => this.rejectedBy(c)));
    const partition: Partition<T> = { accepted: [], rejected: [] };
    candidates.forEach((candidate, i) => {
      const filter = verdicts[i];
      if (filter === undefined) {
        partition.accepted.push(candidate);
      } else {
        partition.rejected.push({ candidate, filter });
      }
    });
    return partition;
  }
}

export interface FilterChainParts {
  ignore: IgnoreEngine;
  extensions?: ExtensionRules;
  tracked?: ReadonlySet<string>;
  changed?: ReadonlySet<string>;
}

/**
 * Builds the chain in its fixed order: ignore, extension, tracked, changed.
 * Filters with nothing to reject are left out.
 */
export function createFilterChain(parts: FilterChainParts): FilterChain {
  const filters: PathFilter[] = [new IgnoreFilter(parts.ignore)];
  if (parts.extensions) {
    const extension = new ExtensionFilter(parts.extensions);
    if (extension.active) {
      filters.push(extension);
    }
  }
  if (parts.tracked) {
    filters.push(trackedFilter(parts.tracked));
  }
  if (parts.changed) {
    filters.push(changedFilter(parts.changed));
  }
  return new FilterChain(filters);
}
