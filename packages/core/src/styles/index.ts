import fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { CommentStyleSchema, ConfigError, type CommentStyle } from '@copyhead/shared';
import type { FileCandidate } from '@copyhead/repo';

const StyleTableSchema = z.object({
  styles: z.array(
    z.object({
      style: CommentStyleSchema,
      extensions: z.array(z.string()).default([]),
      filenames: z.array(z.string()).default([]),
    }),
  ),
});

interface StyleMaps {
  byExtension: Map<string, CommentStyle>;
  byFilename: Map<string, CommentStyle>;
}

let builtin: StyleMaps | undefined;

/** The comment-style table shipped beside this module. */
export function builtinStyles(): StyleMaps {
  if (!builtin) {
    const file = fileURLToPath(new URL('./comment-styles.json', import.meta.url));
    const parsed = StyleTableSchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf8')));
    if (!parsed.success) {
      throw new ConfigError(`Invalid comment style table: ${parsed.error.message}`);
    }
    const maps: StyleMaps = { byExtension: new Map(), byFilename: new Map() };
    for (const entry of parsed.data.styles) {
      for (const ext of entry.extensions) maps.byExtension.set(ext.toLowerCase(), entry.style);
      for (const name of entry.filenames) maps.byFilename.set(name.toLowerCase(), entry.style);
    }
    builtin = maps;
  }
  return builtin;
}

export interface StyleOverrides {
  /** Keyed by extension, without the leading dot */
  commentStyles?: Record<string, CommentStyle>;
  /** Keyed by file name */
  filenames?: Record<string, CommentStyle>;
}

/**
 * Picks the comment style of a file: by file name first, then by extension
 * (compound before simple), configured entries before built-in ones. Matching
 * is case-insensitive.
 */
export class CommentStyleResolver {
  private readonly byExtension: Map<string, CommentStyle>;
  private readonly byFilename: Map<string, CommentStyle>;

  constructor(overrides: StyleOverrides = {}) {
    const base = builtinStyles();
    this.byExtension = new Map(base.byExtension);
    this.byFilename = new Map(base.byFilename);
    for (const [ext, style] of Object.entries(overrides.commentStyles ?? {})) {
      this.byExtension.set(ext.replace(/^\./, '').toLowerCase(), style);
    }
    for (const [name, style] of Object.entries(overrides.filenames ?? {})) {
      this.byFilename.set(name.toLowerCase(), style);
    }
  }

  resolve(candidate: Pick<FileCandidate, 'basename' | 'extensions'>): CommentStyle | undefined {
    const byName = this.byFilename.get(candidate.basename.toLowerCase());
    if (byName) {
      return byName;
    }
    for (const ext of candidate.extensions) {
      const style = this.byExtension.get(ext);
      if (style) {
        return style;
      }
    }
    return undefined;
  }
}
