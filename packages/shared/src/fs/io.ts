import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir } from 'fs-extra';

/** Creates the parent directory of `path` when it is missing. */
export async function ensureDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

export interface AtomicWriteOptions {
  /** Permission bits for the written file; defaults to the umask default */
  mode?: number;
}

/**
 * Writes to a temporary file beside `path` and renames it over the target, so
 * readers see either the old or the new content.
 */
export async function atomicWrite(
  path: string,
  content: string | Uint8Array,
  options: AtomicWriteOptions = {},
): Promise<void> {
  const tempPath = await tmpName({ dir: dirname(path), prefix: '.copyhead-' });
  try {
    await fs.writeFile(tempPath, content);
    if (options.mode !== undefined) {
      await fs.chmod(tempPath, options.mode);
    }
    await fs.rename(tempPath, path);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
