import * as fs from 'fs/promises';
import * as path from 'path';
import { normalizePath } from '@copyhead/shared';

/**
 * Finds the enclosing git repository root by walking up from `cwd` to the
 * nearest directory containing `.git`. Returns undefined outside a repository.
 */
export async function findRepoRoot(cwd: string = process.cwd()): Promise<string | undefined> {
  const root = path.parse(cwd).root;
  let currentDir = path.resolve(cwd);

  while (true) {
    if (await exists(path.join(currentDir, '.git'))) {
      return normalizePath(currentDir);
    }

    if (currentDir === root) {
      return undefined;
    }
    currentDir = path.dirname(currentDir);
  }
}

export interface WorkspaceOptions {
  patterns: string[];
  cwd?: string;
}

/**
 * Resolves the directory that ignore files and relative paths hang off.
 * Order: the git root around the first usable pattern, else that pattern's
 * directory (a file's parent), else the current directory.
 */
export async function resolveWorkspaceRoot(options: WorkspaceOptions): Promise<string> {
  const cwd = path.resolve(options.cwd ?? process.cwd());

  let anchor: string | undefined;
  for (const pattern of options.patterns) {
    const candidate = path.resolve(cwd, pattern);
    const stats = await fs.stat(candidate).catch(() => undefined);
    if (stats?.isDirectory()) {
      anchor = candidate;
      break;
    }
    if (stats?.isFile()) {
      anchor = path.dirname(candidate);
      break;
    }
  }

  const gitRoot = await findRepoRoot(anchor ?? cwd);
  return normalizePath(gitRoot ?? anchor ?? cwd);
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}
