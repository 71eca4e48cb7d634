import nodeFs from 'node:fs/promises';
import type { Dirent, Stats } from 'node:fs';
import { glob, hasMagic } from 'glob';
import { SilentLogger, basenameOf, join, relative, resolve, type Logger } from '@copyhead/shared';
import { extensionsOf } from '../filters/extension';
import type { FileCandidate } from '../filters/types';
import type { Expansion, ExpandOptions } from './types';

export * from './types';

const ALWAYS_PRUNED = new Set(['.git']);

/**
 * Turns patterns (files, directories or globs) into a de-duplicated list of
 * regular files. Symlinks are never followed or returned.
 */
export class PathExpander {
  private readonly root: string;
  private readonly cwd: string;
  private readonly options: ExpandOptions;

  constructor(options: ExpandOptions) {
    this.options = options;
    this.root = resolve(options.root);
    this.cwd = resolve(options.cwd ?? process.cwd());
  }

  async expand(patterns: string[]): Promise<Expansion> {
    const logger = this.options.logger ?? new SilentLogger();
    const found = new Map<string, FileCandidate>();
    const warnings: string[] = [];

    const add = (abs: string, stats: Stats) => {
      if (!found.has(abs)) {
        found.set(abs, this.toCandidate(abs, stats));
      }
    };

    for (const pattern of patterns) {
      const abs = resolve(this.cwd, pattern);
      const stats = await nodeFs.lstat(abs).catch(() => undefined);

      if (stats?.isSymbolicLink()) {
        warnings.push(`Skipping symlink: ${pattern}`);
        continue;
      }
      if (stats?.isFile()) {
        add(abs, stats);
        continue;
      }
      if (stats?.isDirectory()) {
        await this.walk(abs, add, logger);
        continue;
      }
      if (stats) {
        warnings.push(`Skipping special file: ${pattern}`);
        continue;
      }

      const matches = hasMagic(pattern) ? await this.glob(pattern) : [];
      if (matches.length === 0) {
        warnings.push(`Pattern matched no files: ${pattern}`);
      }
      for (const match of matches) {
        const matchStats = await nodeFs.lstat(match).catch(() => undefined);
        if (matchStats?.isFile()) {
          add(match, matchStats);
        } else if (matchStats?.isSymbolicLink()) {
          logger.debug(`Skipping symlink: ${match}`);
        }
      }
    }

    const files = [...found.values()].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
    return { files, warnings };
  }

  private async walk(
    dir: string,
    add: (abs: string, stats: Stats) => void,
    logger: Logger,
  ): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await nodeFs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      logger.warn(`Cannot read directory ${dir}: ${String(error)}`);
      return;
    }

    for (const entry of entries) {
      const abs = join(dir, entry.name);
      if (entry.isSymbolicLink()) {
        logger.debug(`Skipping symlink: ${abs}`);
        continue;
      }
      if (entry.isDirectory()) {
        if (ALWAYS_PRUNED.has(entry.name)) continue;
        if (this.options.ignore && !(await this.options.ignore.evaluate(abs, true))) {
          logger.debug(`Pruned ignored directory: ${abs}`);
          continue;
        }
        await this.walk(abs, add, logger);
      } else if (entry.isFile()) {
        const stats = await nodeFs.lstat(abs).catch(() => undefined);
        if (stats?.isFile()) {
          add(abs, stats);
        }
      }
    }
  }

  private async glob(pattern: string): Promise<string[]> {
    const matches = await glob(pattern.replace(/\\/g, '/'), {
      cwd: this.cwd,
      absolute: true,
      dot: true,
      nodir: true,
      follow: false,
      posix: true,
      ignore: ['**/.git/**'],
    });
    return matches.map((m) => resolve(m));
  }

  private toCandidate(abs: string, stats: Stats): FileCandidate {
    const basename = basenameOf(abs);
    return Object.freeze({
      path: abs,
      relativePath: relative(this.root, abs),
      basename,
      extensions: Object.freeze(extensionsOf(basename)),
      size: stats.size,
      mode: stats.mode & 0o7777,
    });
  }
}
