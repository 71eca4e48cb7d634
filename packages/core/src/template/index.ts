import fs from 'fs/promises';
import path from 'path';
import { objectHash } from 'ohash';
import { ConfigError, type CommentStyle, type TemplateSource } from '@copyhead/shared';

export const DEFAULT_TEMPLATE = 'Copyright (c) {{year}} The Authors. All rights reserved.';

const YEAR_VARIABLE = /\{\{\s*year\s*\}\}/g;

/** Rendered headers keyed by (template text, style, year). */
export type RenderCache = Map<string, string>;

/**
 * Wraps license text in a comment style: optional top line, each line behind
 * the per-line prefix, optional bottom line, then a blank separator line.
 */
export function formatWithStyle(text: string, style: CommentStyle): string {
  const lines = text.replace(/\r\n/g, '\n').replace(/\n$/, '').split('\n');
  let result = '';
  if (style.top) {
    result += `${style.top}\n`;
  }
  for (const line of lines) {
    result += line.length === 0 ? `${style.middle.trimEnd()}\n` : `${style.middle}${line}\n`;
  }
  if (style.bottom) {
    result += `${style.bottom}\n`;
  }
  return `${result}\n`;
}

export class LicenseTemplate {
  readonly text: string;
  private readonly cache: RenderCache;

  constructor(text: string, cache: RenderCache = new Map()) {
    if (text.trim().length === 0) {
      throw new ConfigError('License template is empty');
    }
    this.text = text;
    this.cache = cache;
  }

  /**
   * Loads the template named by config: a file (relative to `baseDir`), inline
   * text, or the built-in default.
   */
  static async load(
    source: TemplateSource | undefined,
    options: { baseDir: string; cache?: RenderCache },
  ): Promise<LicenseTemplate> {
    if (source?.path) {
      const file = path.resolve(options.baseDir, source.path);
      let text: string;
      try {
        text = await fs.readFile(file, 'utf8');
      } catch (error) {
        throw new ConfigError(`Failed to read license template: ${file}`, { cause: error });
      }
      if (text.trim().length === 0) {
        throw new ConfigError(`License template is empty: ${file}`);
      }
      return new LicenseTemplate(text, options.cache);
    }
    return new LicenseTemplate(source?.text ?? DEFAULT_TEMPLATE, options.cache);
  }

  /** Template text with the year filled in, without comment markers. */
  renderText(year: number): string {
    return this.text.replace(YEAR_VARIABLE, String(year));
  }

  render(style: CommentStyle, year: number): string {
    const key = objectHash({ text: this.text, style, year });
    let rendered = this.cache.get(key);
    if (rendered === undefined) {
      rendered = formatWithStyle(this.renderText(year), style);
      this.cache.set(key, rendered);
    }
    return rendered;
  }
}
