import { Command, CommanderError } from 'commander';
import { AppError, ConfigError, UsageError } from '@copyhead/shared';
import pkg from '../package.json';
import { registerCheckCommand } from './commands/check';
import { registerTreeCommand } from './commands/tree';

export const name = '@copyhead/cli';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('copyhead')
    .description('Check and repair copyright headers')
    .version(pkg.version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .option('--log-file <path>', 'Append structured run events to a JSON-lines file')
    .exitOverride();

  registerCheckCommand(program);
  registerTreeCommand(program);
  return program;
}

/** Exit code for an error that escaped the command */
export function exitCodeFor(error: unknown): number {
  return error instanceof ConfigError || error instanceof UsageError ? 2 : 1;
}

export function reportError(e: unknown, opts: { json?: boolean; verbose?: boolean }): void {
  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
    return;
  }

  // Human-readable output
  console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
  if (e instanceof AppError && e.details) {
    console.error(
      `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
    );
  }
  if (opts.verbose && e instanceof Error && e.stack) {
    console.error(`\nStack Trace:\n${e.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}

export async function main(argv: string[] = process.argv): Promise<number> {
  const program = createProgram();
  try {
    await program.parseAsync(argv);
    return typeof process.exitCode === 'number' ? process.exitCode : 0;
  } catch (e) {
    if (e instanceof CommanderError) {
      // Commander already printed help, the version or the usage problem
      return e.exitCode === 0 ? 0 : 2;
    }
    const opts = program.opts();
    reportError(e, { json: opts.json === true, verbose: opts.verbose === true });
    return exitCodeFor(e);
  }
}
