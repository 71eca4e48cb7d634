import { z } from 'zod';
import { ConsoleLogger, JsonlLogger, UsageError, type Logger } from '@copyhead/shared';

export const GlobalOptionsSchema = z.object({
  json: z.boolean().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
  logFile: z.string().optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

/**
 * Validates what commander collected against `schema`; commander itself
 * hands options over untyped.
 */
export function parseOptions<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `- ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new UsageError(`Invalid options:\n${issues}`);
  }
  return result.data;
}

/** Parses an integer flag value within `[min, max]`. */
export function parseInteger(
  flag: string,
  value: string,
  range: { min: number; max?: number },
): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || parsed < range.min) {
    throw new UsageError(`Invalid ${flag} "${value}". Must be an integer >= ${range.min}.`);
  }
  if (range.max !== undefined && parsed > range.max) {
    throw new UsageError(`Invalid ${flag} "${value}". Must be an integer <= ${range.max}.`);
  }
  return parsed;
}

/** Accumulator for repeatable flags. */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/** Accumulator for repeatable, comma-separated lists. */
export function collectList(value: string, previous: string[] = []): string[] {
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return [...previous, ...items];
}

export function createLogger(options: GlobalOptions): Logger {
  const verbose = options.verbose ?? false;
  if (options.logFile) {
    return new JsonlLogger(options.logFile, {}, { verbose });
  }
  return new ConsoleLogger({ verbose });
}
