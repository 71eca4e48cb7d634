import { z } from 'zod';

export const CommentStyleSchema = z.object({
  top: z.string().optional(),
  middle: z.string(),
  bottom: z.string().optional(),
});

export const TemplateSourceSchema = z
  .object({
    path: z.string().min(1).optional(),
    text: z.string().optional(),
  })
  .refine((data) => !(data.path !== undefined && data.text !== undefined), {
    message: 'Specify either template.path or template.text, not both',
  });

export const ExtensionFilterSchema = z
  .object({
    include: z.array(z.string().min(1)).optional(),
    exclude: z.array(z.string().min(1)).default([]),
  })
  .default({ exclude: [] });

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  mode: z.enum(['check', 'modify']).default('check'),
  /** Target year; the current year when unset */
  year: z.number().int().min(1000).max(9999).optional(),
  preserveYears: z.boolean().default(false),
  detection: z.enum(['heuristic', 'content']).default('heuristic'),
  /** Detection window; 1000 for heuristic and 2000 for content detection when unset */
  prefixBytes: z.number().int().positive().optional(),
  concurrency: z.number().int().positive().optional(),
  template: TemplateSourceSchema.optional(),
  ignore: z.array(z.string()).default([]),
  ignoreFileName: z.string().min(1).default('.licenseignore'),
  globalIgnoreFile: z.string().min(1).optional(),
  gitOnly: z.boolean().default(false),
  ratchet: z.string().min(1).optional(),
  /** Restrict the ratchet to committed changes, ignoring the index and working tree */
  ratchetCommittedOnly: z.boolean().default(false),
  extensions: ExtensionFilterSchema,
  /** Comment styles keyed by extension, without the leading dot */
  commentStyles: z.record(z.string(), CommentStyleSchema).default({}),
  /** Comment styles keyed by exact file name */
  filenames: z.record(z.string(), CommentStyleSchema).default({}),
  /** Attach before/after spans to outcomes */
  spans: z.boolean().default(false),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type CommentStyle = z.infer<typeof CommentStyleSchema>;
export type TemplateSource = z.infer<typeof TemplateSourceSchema>;
export type DetectionKind = Config['detection'];
