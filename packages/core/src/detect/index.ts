import type { DetectionKind } from '@copyhead/shared';

export interface LicenseDetector {
  readonly kind: DetectionKind;
  /** Default window size in bytes */
  readonly window: number;
  /**
   * Whether `prefix` carries a license. `expectedHeader` is the rendered
   * header for the file's comment style, when known.
   */
  hasLicense(prefix: string, expectedHeader?: string): boolean;
  /**
   * Leading bytes of `expectedHeader` a prefix must hold for the header to be
   * recognized once written.
   */
  requiredBytes(expectedHeader: string): number;
  extractYear(text: string): number | undefined;
}

// `Copyright (c) 2024` or `Copyright © 2024`; not part of a range or a longer number.
const YEAR_PATTERN = /(copyright\s*(?:\(c\)|©)\s*)(\d{4})(?![-\d])/gi;

/**
 * Year of the first `Copyright (c) YYYY` / `Copyright © YYYY` notice. A bare
 * `Copyright YYYY` has no extractable year.
 */
export function extractYear(text: string): number | undefined {
  for (const match of text.matchAll(YEAR_PATTERN)) {
    return Number(match[2]);
  }
  return undefined;
}

/**
 * Rewrites every extractable year in `text` to `year`. Returns the new text
 * and the first notice before and after the change.
 */
export function replaceYears(
  text: string,
  year: number,
): { text: string; before?: string; after?: string } {
  let before: string | undefined;
  let after: string | undefined;
  const replaced = text.replace(YEAR_PATTERN, (notice: string, lead: string) => {
    const updated = `${lead}${year}`;
    if (before === undefined) {
      before = notice;
      after = updated;
    }
    return updated;
  });
  return { text: replaced, before, after };
}

export class HeuristicDetector implements LicenseDetector {
  readonly kind = 'heuristic' as const;
  readonly window = 1000;

  hasLicense(prefix: string): boolean {
    return prefix.toLowerCase().includes('copyright');
  }

  /** Up to the end of the header's first `copyright` */
  requiredBytes(expectedHeader: string): number {
    const match = /copyright/i.exec(expectedHeader);
    if (!match) {
      return 0;
    }
    return Buffer.byteLength(expectedHeader.slice(0, match.index + match[0].length), 'utf8');
  }

  extractYear(text: string): number | undefined {
    return extractYear(text);
  }
}

const COMMENT_CHARS = new Set(['/', '*', '#', '<', '!', '>', ';']);

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

function isAlphanumeric(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z0-9]/.test(ch);
}

/**
 * Normalization shared by both sides of a content comparison: lower case,
 * comment characters and non-range dashes dropped, whitespace collapsed, four
 * digit words replaced by `YEAR` and year ranges folded into one `YEAR`.
 */
export function normalizeForComparison(text: string): string {
  let result = '';
  let lastWasSpace = true;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i] ?? '';

    if (
      isDigit(ch) &&
      isDigit(text[i + 1]) &&
      isDigit(text[i + 2]) &&
      isDigit(text[i + 3]) &&
      !isAlphanumeric(text[i - 1]) &&
      !isAlphanumeric(text[i + 4])
    ) {
      result += 'YEAR';
      lastWasSpace = false;
      i += 3;
      continue;
    }

    if (COMMENT_CHARS.has(ch)) {
      continue;
    }
    if (ch === '-' && !(isDigit(text[i - 1]) && isDigit(text[i + 1]))) {
      continue;
    }

    if (/\s/.test(ch)) {
      if (!lastWasSpace && result.length > 0) {
        result += ' ';
        lastWasSpace = true;
      }
      continue;
    }

    result += ch.toLowerCase();
    lastWasSpace = false;
  }

  if (result.endsWith(' ')) {
    result = result.slice(0, -1);
  }
  return result.replaceAll('YEAR-YEAR', 'YEAR');
}

/**
 * Detects the configured license text itself, tolerant of comment syntax,
 * spacing and the year.
 */
export class ContentDetector implements LicenseDetector {
  readonly kind = 'content' as const;
  readonly window = 2000;
  private readonly normalizedTemplate: string;

  constructor(templateText: string) {
    this.normalizedTemplate = normalizeForComparison(templateText);
  }

  hasLicense(prefix: string, expectedHeader?: string): boolean {
    const content = normalizeForComparison(prefix);
    if (this.normalizedTemplate && content.includes(this.normalizedTemplate)) {
      return true;
    }
    if (expectedHeader === undefined) {
      return false;
    }
    const header = normalizeForComparison(expectedHeader);
    return header.length > 0 && content.includes(header);
  }

  requiredBytes(expectedHeader: string): number {
    return Buffer.byteLength(expectedHeader, 'utf8');
  }

  extractYear(text: string): number | undefined {
    return extractYear(text);
  }
}
