import path from 'path';
import { Command, Option } from 'commander';
import { z } from 'zod';
import { runCopyhead } from '@copyhead/core';
import { JsonlLogger, type ConfigInput } from '@copyhead/shared';
import { OutputRenderer } from '../output/renderer';
import {
  GlobalOptionsSchema,
  collect,
  collectList,
  createLogger,
  parseInteger,
  parseOptions,
} from '../utils/options';

export const CheckOptionsSchema = z.object({
  modify: z.boolean().optional(),
  year: z.string().optional(),
  preserveYears: z.boolean().optional(),
  template: z.string().optional(),
  detection: z.enum(['heuristic', 'content']).optional(),
  prefixBytes: z.string().optional(),
  concurrency: z.string().optional(),
  ignore: z.array(z.string()).optional(),
  gitOnly: z.boolean().optional(),
  ratchet: z.string().optional(),
  ratchetCommittedOnly: z.boolean().optional(),
  includeExt: z.array(z.string()).optional(),
  excludeExt: z.array(z.string()).optional(),
  quiet: z.boolean().optional(),
  diff: z.boolean().optional(),
});

export type CheckOptions = z.infer<typeof CheckOptionsSchema>;

/**
 * Translates command flags into a config layer. Only flags the user passed
 * are set, so configured values survive otherwise.
 */
export function toConfigFlags(options: CheckOptions, cwd: string): ConfigInput {
  const flags: ConfigInput = {};
  if (options.modify) {
    flags.mode = 'modify';
  }
  if (options.year !== undefined) {
    flags.year = parseInteger('--year', options.year, { min: 1000, max: 9999 });
  }
  if (options.preserveYears) {
    flags.preserveYears = true;
  }
  if (options.template !== undefined) {
    flags.template = { path: path.resolve(cwd, options.template) };
  }
  if (options.detection !== undefined) {
    flags.detection = options.detection;
  }
  if (options.prefixBytes !== undefined) {
    flags.prefixBytes = parseInteger('--prefix-bytes', options.prefixBytes, { min: 1 });
  }
  if (options.concurrency !== undefined) {
    flags.concurrency = parseInteger('--concurrency', options.concurrency, { min: 1 });
  }
  if (options.ignore && options.ignore.length > 0) {
    flags.ignore = options.ignore;
  }
  if (options.gitOnly) {
    flags.gitOnly = true;
  }
  if (options.ratchet !== undefined) {
    flags.ratchet = options.ratchet;
  }
  if (options.ratchetCommittedOnly) {
    flags.ratchetCommittedOnly = true;
  }
  if (options.includeExt || options.excludeExt) {
    flags.extensions = { include: options.includeExt, exclude: options.excludeExt };
  }
  if (options.diff) {
    flags.spans = true;
  }
  return flags;
}

export function registerCheckCommand(program: Command) {
  program
    .command('check')
    .argument('[patterns...]', 'Files, directories or globs to check', ['.'])
    .description('Check (and with --modify, repair) copyright headers')
    .option('--modify', 'Add missing headers and update outdated years in place')
    .option('--year <year>', 'Target copyright year (default: current year)')
    .option('--preserve-years', 'Never rewrite years of existing headers')
    .option('--template <path>', 'License template file; {{year}} is substituted')
    .addOption(
      new Option('--detection <kind>', 'How existing headers are recognized').choices([
        'heuristic',
        'content',
      ]),
    )
    .option('--prefix-bytes <n>', 'Bytes read from the start of each file for detection')
    .option('--concurrency <n>', 'Files processed at once')
    .option('--ignore <pattern>', 'Gitignore-style pattern to skip (repeatable)', collect)
    .option('--git-only', 'Only process files tracked by git')
    .option('--ratchet <ref>', 'Only process files changed since the git reference')
    .option('--ratchet-committed-only', 'Ignore staged and unstaged changes for --ratchet')
    .option('--include-ext <exts>', 'Only process these extensions (comma-separated)', collectList)
    .option('--exclude-ext <exts>', 'Skip these extensions (comma-separated)', collectList)
    .option('--quiet', 'Only print the summary')
    .option('--diff', 'Print the before/after text of each change')
    .action(async (patterns: string[], rawOptions: unknown) => {
      const globalOpts = parseOptions(GlobalOptionsSchema, program.opts());
      const options = parseOptions(CheckOptionsSchema, rawOptions);
      const cwd = process.cwd();
      const flags = toConfigFlags(options, cwd);

      const logger = createLogger(globalOpts);
      const renderer = new OutputRenderer({
        json: !!globalOpts.json,
        verbose: globalOpts.verbose,
        quiet: options.quiet,
        diff: options.diff,
      });

      try {
        const result = await runCopyhead({
          patterns,
          cwd,
          configPath: globalOpts.config ? path.resolve(cwd, globalOpts.config) : undefined,
          flags,
          logger,
        });
        renderer.render(result);
        process.exitCode = result.summary.failed ? 1 : 0;
      } finally {
        if (logger instanceof JsonlLogger) {
          await logger.flush();
        }
      }
    });
}
