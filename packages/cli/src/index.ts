#!/usr/bin/env node
import { Command, CommanderError } from 'commander';
import { AppError, exitCodeFor } from '@buildprof/shared';
import { readVersion } from './version';
import type { GlobalOptions } from './types';
import { captureBuildCommand, registerProfileCommand } from './commands/profile';
import { registerSnapshotCommand } from './commands/snapshot';
import { registerCompareCommand } from './commands/compare';

export const name = '@buildprof/cli';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('buildprof')
    .description('Find out which files a build creates or modifies')
    .version(readVersion())
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    // Throw instead of exiting so parse errors map to the usage exit code.
    .exitOverride();

  registerProfileCommand(program);
  registerSnapshotCommand(program);
  registerCompareCommand(program);

  return program;
}

/**
 * Prints an error the way the current output mode expects.
 */
export function reportError(e: unknown, opts: GlobalOptions): void {
  if (opts.json) {
    console.log(
      JSON.stringify({
        error:
          e instanceof AppError
            ? { code: e.code, message: e.message, details: e.details }
            : { code: 'UnknownError', message: e instanceof Error ? e.message : String(e) },
      }),
    );
    return;
  }

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
    await program.parseAsync(captureBuildCommand(argv));
    return 0;
  } catch (e) {
    if (e instanceof CommanderError) {
      // Commander has already printed help, the version or the parse error.
      return e.exitCode === 0 ? 0 : 2;
    }
    reportError(e, program.opts<GlobalOptions>());
    return exitCodeFor(e);
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    },
  );
}
