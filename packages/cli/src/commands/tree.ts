import path from 'path';
import { Command } from 'commander';
import { listFiles } from '@copyhead/core';
import { JsonlLogger } from '@copyhead/shared';
import { OutputRenderer } from '../output/renderer';
import { GlobalOptionsSchema, collect, collectList, createLogger, parseOptions } from '../utils/options';
import { CheckOptionsSchema, toConfigFlags } from './check';

export const TreeOptionsSchema = CheckOptionsSchema.pick({
  ignore: true,
  gitOnly: true,
  ratchet: true,
  ratchetCommittedOnly: true,
  includeExt: true,
  excludeExt: true,
  quiet: true,
});

export function registerTreeCommand(program: Command) {
  program
    .command('tree')
    .argument('[patterns...]', 'Files, directories or globs to list', ['.'])
    .description('List the files a check would process')
    .option('--ignore <pattern>', 'Gitignore-style pattern to skip (repeatable)', collect)
    .option('--git-only', 'Only list files tracked by git')
    .option('--ratchet <ref>', 'Only list files changed since the git reference')
    .option('--ratchet-committed-only', 'Ignore staged and unstaged changes for --ratchet')
    .option('--include-ext <exts>', 'Only list these extensions (comma-separated)', collectList)
    .option('--exclude-ext <exts>', 'Skip these extensions (comma-separated)', collectList)
    .option('--quiet', 'Print only the file paths')
    .action(async (patterns: string[], rawOptions: unknown) => {
      const globalOpts = parseOptions(GlobalOptionsSchema, program.opts());
      const options = parseOptions(TreeOptionsSchema, rawOptions);
      const cwd = process.cwd();

      const logger = createLogger(globalOpts);
      const renderer = new OutputRenderer({
        json: !!globalOpts.json,
        verbose: globalOpts.verbose,
        quiet: options.quiet,
      });

      try {
        const listing = await listFiles({
          patterns,
          cwd,
          configPath: globalOpts.config ? path.resolve(cwd, globalOpts.config) : undefined,
          flags: toConfigFlags(options, cwd),
          logger,
        });
        renderer.renderTree(listing);
      } finally {
        if (logger instanceof JsonlLogger) {
          await logger.flush();
        }
      }
    });
}
