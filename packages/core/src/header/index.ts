/** First-line markers that must stay above an inserted header */
export const PREAMBLE_MARKERS = [
  '#!',
  '<?xml',
  '<!doctype',
  '# encoding:',
  '# frozen_string_literal:',
  '<?php',
  '# escape',
  '# syntax',
] as const;

const BOM = '\uFEFF';

/** What stays above an inserted header */
export interface Preamble {
  /** The file starts with a UTF-8 byte order mark */
  bom: boolean;
  /** The preamble line as written, without its line break */
  line?: string;
  /** Bytes the mark, the line and its line break occupy at the start of the file */
  byteLength: number;
}

/**
 * Finds a byte order mark and a preamble line at the start of `prefix`.
 * `complete` says whether `prefix` is the whole file; a first line that runs
 * past an incomplete prefix is not a preamble.
 */
export function findPreamble(prefix: string, complete: boolean): Preamble | undefined {
  const bom = prefix.startsWith(BOM);
  const text = bom ? prefix.slice(BOM.length) : prefix;
  const markOnly = bom ? { bom, byteLength: Buffer.byteLength(BOM, 'utf8') } : undefined;

  const newline = text.indexOf('\n');
  if (newline === -1 && !complete) {
    return markOnly;
  }
  const line = newline === -1 ? text : text.slice(0, newline);
  const lower = line.toLowerCase();
  if (!PREAMBLE_MARKERS.some((marker) => lower.startsWith(marker))) {
    return markOnly;
  }
  const consumed = `${bom ? BOM : ''}${line}${newline === -1 ? '' : '\n'}`;
  return { bom, line, byteLength: Buffer.byteLength(consumed, 'utf8') };
}

/**
 * Builds the bytes of a file with `header` inserted: the byte order mark and
 * preamble line (if any, the line followed by one blank line), the header,
 * then the untouched rest of the file.
 * When nothing but whitespace follows, the header's separator line is dropped.
 */
export function insertHeader(
  header: string,
  preamble: Preamble | undefined,
  rest: Uint8Array,
): Buffer {
  const mark = preamble?.bom ? BOM : '';
  const lead = preamble?.line !== undefined ? `${mark}${preamble.line}\n\n` : mark;
  const body = isBlank(rest) ? `${header.trimEnd()}\n` : header;
  return Buffer.concat([Buffer.from(`${lead}${body}`, 'utf8'), rest]);
}

function isBlank(bytes: Uint8Array): boolean {
  for (const byte of bytes) {
    // space, \t, \n, \v, \f, \r
    if (byte !== 0x20 && (byte < 0x09 || byte > 0x0d)) {
      return false;
    }
  }
  return true;
}
