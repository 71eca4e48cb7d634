import { spawn } from 'child_process';
import { ProcessError, VcsError, join, normalizePath } from '@copyhead/shared';
import type { ChangedSinceOptions, GitRunner, VcsProvider } from './types';

export * from './types';

export const spawnGit: GitRunner = (args, cwd) => {
  return new Promise((resolve, reject) => {
    const child = spawn('git', args, { cwd });
    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString('utf8');
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString('utf8');
    });

    child.on('close', (code) => {
      if (code === 0) {
        resolve(stdout);
      } else {
        reject(
          new ProcessError(`Git command failed: git ${args.join(' ')}\n${stderr.trim()}`, {
            exitCode: code ?? undefined,
          }),
        );
      }
    });

    child.on('error', (err) => {
      reject(new ProcessError(`Failed to start git process: ${err.message}`, { cause: err }));
    });
  });
};

const CHANGE_FILTER = '--diff-filter=ACMR';

/**
 * Splits NUL-terminated git output (`-z`) into entries.
 */
export function parseNulList(output: string): string[] {
  return output.split('\0').filter((entry) => entry.length > 0);
}

export interface GitServiceOptions {
  repoRoot: string;
  runner?: GitRunner;
}

export class GitService implements VcsProvider {
  readonly root: string;
  private readonly run: GitRunner;

  constructor(options: GitServiceOptions) {
    this.root = normalizePath(options.repoRoot);
    this.run = options.runner ?? spawnGit;
  }

  /**
   * Opens the repository enclosing `cwd`, as reported by git itself.
   */
  static async open(cwd: string, runner: GitRunner = spawnGit): Promise<GitService> {
    let output: string;
    try {
      output = await runner(['rev-parse', '--show-toplevel'], cwd);
    } catch (error) {
      throw new VcsError(`Not a git repository: ${cwd}`, { cause: error });
    }
    const root = output.trim();
    if (!root) {
      throw new VcsError(`Not a git repository: ${cwd}`);
    }
    return new GitService({ repoRoot: root, runner });
  }

  async trackedFiles(): Promise<Set<string>> {
    const output = await this.query(['ls-files', '-z', '--full-name'], 'list tracked files');
    return this.absolute(parseNulList(output));
  }

  /**
   * Files added, copied, modified or renamed since `ref`. Unless restricted to
   * committed changes, staged and unstaged edits count as well.
   */
  async changedSince(ref: string, options: ChangedSinceOptions = {}): Promise<Set<string>> {
    await this.verifyRef(ref);

    const committed = await this.query(
      ['diff', '--name-only', '-z', CHANGE_FILTER, ref, 'HEAD'],
      `diff against ${ref}`,
    );
    const paths = parseNulList(committed);

    if (!options.committedOnly) {
      const staged = await this.query(
        ['diff', '--name-only', '-z', CHANGE_FILTER, '--cached'],
        'list staged changes',
      );
      const unstaged = await this.query(
        ['diff', '--name-only', '-z', CHANGE_FILTER],
        'list unstaged changes',
      );
      paths.push(...parseNulList(staged), ...parseNulList(unstaged));
    }

    return this.absolute(paths);
  }

  private async verifyRef(ref: string): Promise<void> {
    try {
      await this.run(['rev-parse', '--verify', '--quiet', `${ref}^{commit}`], this.root);
    } catch (error) {
      throw new VcsError(`Unknown git reference: ${ref}`, { cause: error, details: { ref } });
    }
  }

  private async query(args: string[], action: string): Promise<string> {
    try {
      return await this.run(args, this.root);
    } catch (error) {
      throw new VcsError(`Failed to ${action} in ${this.root}`, { cause: error });
    }
  }

  private absolute(paths: string[]): Set<string> {
    return new Set(paths.map((p) => join(this.root, p)));
  }
}
