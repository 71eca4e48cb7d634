import fs, { type FileHandle } from 'fs/promises';
import { FileIOError, describeError } from '@copyhead/shared';

export interface PrefixRead {
  /** Leading bytes, ending on a character boundary */
  bytes: Buffer;
  /** Size of the whole file */
  size: number;
  /** Permission bits of the file */
  mode: number;
  /** Whether `bytes` is the whole file */
  complete: boolean;
}

/**
 * Length of the longest head of `bytes` that does not end inside a UTF-8
 * sequence. Malformed input is left for the decoder to reject.
 */
export function completeUtf8Length(bytes: Uint8Array): number {
  const len = bytes.length;
  let i = len - 1;
  let continuation = 0;
  while (i >= 0 && continuation < 3 && ((bytes[i] ?? 0) & 0xc0) === 0x80) {
    i--;
    continuation++;
  }
  if (i < 0) {
    return len;
  }
  const lead = bytes[i] ?? 0;
  const needed = lead >= 0xf0 ? 4 : lead >= 0xe0 ? 3 : lead >= 0xc0 ? 2 : 1;
  return len - i < needed ? i : len;
}

/**
 * Reads at most `window` bytes from the start of the file. A partial UTF-8
 * sequence cut by the window is held back for the remainder.
 */
export async function readPrefix(path: string, window: number): Promise<PrefixRead> {
  let handle: FileHandle | undefined;
  try {
    handle = await fs.open(path, 'r');
    const stats = await handle.stat();
    const buffer = Buffer.alloc(Math.min(window, stats.size));
    const { bytesRead } = await handle.read(buffer, 0, buffer.length, 0);
    const read = buffer.subarray(0, bytesRead);
    const complete = bytesRead >= stats.size;
    const bytes = complete ? read : read.subarray(0, completeUtf8Length(read));
    return { bytes, size: stats.size, mode: stats.mode & 0o7777, complete };
  } catch (error) {
    throw new FileIOError(path, `Failed to read ${path}: ${describeError(error)}`, { cause: error });
  } finally {
    await handle?.close();
  }
}

/** Reads the file from `offset` to its end. */
export async function readFrom(path: string, offset: number): Promise<Buffer> {
  let handle: FileHandle | undefined;
  try {
    handle = await fs.open(path, 'r');
    const stats = await handle.stat();
    const length = Math.max(0, stats.size - offset);
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, offset);
    return buffer.subarray(0, bytesRead);
  } catch (error) {
    throw new FileIOError(path, `Failed to read ${path}: ${describeError(error)}`, { cause: error });
  } finally {
    await handle?.close();
  }
}

const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

export function decodeUtf8(path: string, bytes: Uint8Array): string {
  try {
    return decoder.decode(bytes);
  } catch (error) {
    throw new FileIOError(path, `Invalid UTF-8 in ${path}`, { cause: error });
  }
}
