import nodeFs from 'node:fs/promises';
import ignore, { type Ignore } from 'ignore';
import { ConfigError, basenameOf, dirname, isWithin, join, relative, resolve } from '@copyhead/shared';

/** The slice of the filesystem the engine reads ignore files through. */
export interface IgnoreFs {
  readFile(path: string, encoding: 'utf8'): Promise<string>;
}

/** Rules declared at one directory, matched against paths relative to it. */
export interface RuleLevel {
  readonly dir: string;
  readonly source: string;
  readonly matcher: Ignore;
}

/**
 * Parsed ignore files keyed by their path; `undefined` when the file is
 * missing or empty. Safe to share between engines and runs.
 */
export type IgnoreRuleCache = Map<string, Promise<RuleLevel | undefined>>;

export interface IgnoreEngineOptions {
  root: string;
  /** Explicit patterns from config and flags, anchored at the root */
  patterns?: string[];
  ignoreFileName?: string;
  globalIgnoreFile?: string;
  cache?: IgnoreRuleCache;
  fs?: IgnoreFs;
}

export const DEFAULT_IGNORE_FILE = '.licenseignore';

/**
 * Parses gitignore-style text into its effective patterns: blank lines and
 * `#` comments are dropped, trailing unescaped whitespace is trimmed.
 */
export function parseIgnoreText(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.replace(/(?<!\\)\s+$/, ''))
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

function hasUnclosedClass(pattern: string): boolean {
  let open = false;
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === '\\') {
      i++;
    } else if (ch === '[' && !open) {
      open = true;
      // A leading `]` or `!]` is part of the class.
      if (pattern[i + 1] === '!' || pattern[i + 1] === '^') i++;
      if (pattern[i + 1] === ']') i++;
    } else if (ch === ']' && open) {
      open = false;
    }
  }
  return open;
}

/**
 * Compiles patterns into a matcher, raising ConfigError for any pattern the
 * matcher cannot use.
 */
export function compilePatterns(patterns: string[], source: string): Ignore {
  const matcher = ignore({ ignorecase: false });
  for (const pattern of patterns) {
    if (hasUnclosedClass(pattern)) {
      throw new ConfigError(`Invalid ignore pattern in ${source}: ${pattern} (unclosed character class)`);
    }
    try {
      // Patterns compile lazily; probing forces the regex to build.
      ignore().add(pattern).ignores('probe');
    } catch (error) {
      throw new ConfigError(`Invalid ignore pattern in ${source}: ${pattern}`, { cause: error });
    }
    matcher.add(pattern);
  }
  return matcher;
}

/**
 * Hierarchical ignore evaluation. Root-level rules (global file, then explicit
 * patterns) come first, then each directory's ignore file from the root down
 * to the path's parent. The last rule that matches decides; a negated rule
 * re-includes. Nothing matching means included.
 */
export class IgnoreEngine {
  readonly root: string;
  private readonly ignoreFileName: string;
  private readonly rootLevels: readonly RuleLevel[];
  private readonly cache: IgnoreRuleCache;
  private readonly fs: IgnoreFs;
  // Stacks depend on `root`, so they stay with the engine.
  private readonly stacks = new Map<string, Promise<readonly RuleLevel[]>>();

  private constructor(
    root: string,
    rootLevels: readonly RuleLevel[],
    ignoreFileName: string,
    cache: IgnoreRuleCache,
    fs: IgnoreFs,
  ) {
    this.root = root;
    this.rootLevels = rootLevels;
    this.ignoreFileName = ignoreFileName;
    this.cache = cache;
    this.fs = fs;
  }

  static async create(options: IgnoreEngineOptions): Promise<IgnoreEngine> {
    const root = resolve(options.root);
    const fs = options.fs ?? nodeFs;
    const levels: RuleLevel[] = [];

    if (options.globalIgnoreFile) {
      const text = await readIgnoreFile(fs, options.globalIgnoreFile);
      if (text !== undefined) {
        const source = resolve(options.globalIgnoreFile);
        levels.push({ dir: root, source, matcher: compilePatterns(parseIgnoreText(text), source) });
      }
    }

    const patterns = (options.patterns ?? []).map((p) => p.replace(/\\/g, '/'));
    if (patterns.length > 0) {
      levels.push({
        dir: root,
        source: 'ignore patterns',
        matcher: compilePatterns(patterns, 'ignore patterns'),
      });
    }

    return new IgnoreEngine(
      root,
      levels,
      options.ignoreFileName ?? DEFAULT_IGNORE_FILE,
      options.cache ?? new Map(),
      fs,
    );
  }

  /**
   * Whether `path` survives the ignore rules. Paths outside the root are only
   * subject to the root-level rules, matched against their base name.
   */
  async evaluate(path: string, isDirectory = false): Promise<boolean> {
    const target = resolve(path);
    if (target === this.root) {
      return true;
    }

    const levels = isWithin(this.root, target) ? await this.levelsFor(dirname(target)) : [];

    let excluded = false;
    for (const level of [...this.rootLevels, ...levels]) {
      const rel = isWithin(level.dir, target) ? relative(level.dir, target) : basenameOf(target);
      const result = level.matcher.test(isDirectory ? `${rel}/` : rel);
      if (result.ignored) {
        excluded = true;
      } else if (result.unignored) {
        excluded = false;
      }
    }
    return !excluded;
  }

  /**
   * The ignore-file levels that apply to entries of `dir`, root first. Root
   * patterns are not included.
   */
  levelsFor(dir: string): Promise<readonly RuleLevel[]> {
    const key = resolve(dir);
    let levels = this.stacks.get(key);
    if (!levels) {
      levels = this.computeLevels(key);
      this.stacks.set(key, levels);
    }
    return levels;
  }

  private async computeLevels(dir: string): Promise<readonly RuleLevel[]> {
    if (!isWithin(this.root, dir)) {
      return [];
    }
    const inherited = dir === this.root ? [] : await this.levelsFor(dirname(dir));
    const own = await this.levelAt(dir);
    return own ? [...inherited, own] : inherited;
  }

  private levelAt(dir: string): Promise<RuleLevel | undefined> {
    const source = join(dir, this.ignoreFileName);
    let level = this.cache.get(source);
    if (!level) {
      level = this.loadLevel(dir, source);
      this.cache.set(source, level);
    }
    return level;
  }

  private async loadLevel(dir: string, source: string): Promise<RuleLevel | undefined> {
    const text = await readIgnoreFile(this.fs, source);
    if (text === undefined) {
      return undefined;
    }
    const patterns = parseIgnoreText(text);
    if (patterns.length === 0) {
      return undefined;
    }
    return { dir, source, matcher: compilePatterns(patterns, source) };
  }
}

async function readIgnoreFile(fs: IgnoreFs, path: string): Promise<string | undefined> {
  try {
    return await fs.readFile(path, 'utf8');
  } catch (error) {
    if (isMissing(error)) {
      return undefined;
    }
    throw new ConfigError(`Failed to read ignore file: ${path}`, { cause: error });
  }
}

function isMissing(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}
