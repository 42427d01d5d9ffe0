import { Command } from 'commander';
import { ProfileSession, type BuildStep } from '@buildprof/core';
import { ConfigInput, UsageError } from '@buildprof/shared';
import { OutputRenderer } from '../output/renderer';
import { ConsoleBuildWaiter } from '../ui/prompt';
import {
  createLogger,
  getGlobalOptions,
  loadConfig,
  parsePositiveInt,
  parsePrecision,
  resolveDirectory,
  withInterrupt,
} from './context';

interface ProfileCommandOptions {
  build?: string;
  output?: string;
  utc?: boolean;
  relative?: boolean;
  concurrency?: string;
  exclude?: string[];
  precision?: string;
}

/**
 * Folds every argument after `profile`'s `-b`/`--build` into that option's
 * value, so `profile . -b make -j4` runs `make -j4`. A leading `--` after the
 * flag is dropped.
 */
export function captureBuildCommand(argv: string[]): string[] {
  const commandIndex = argv.indexOf('profile', 2);
  if (commandIndex === -1) {
    return argv;
  }
  const flagIndex = argv.findIndex(
    (arg, i) => i > commandIndex && (arg === '-b' || arg === '--build'),
  );
  if (flagIndex === -1 || flagIndex === argv.length - 1) {
    return argv;
  }
  const rest = argv.slice(flagIndex + 1);
  const words = rest[0] === '--' ? rest.slice(1) : rest;
  return [...argv.slice(0, flagIndex + 1), words.join(' ')];
}

export function registerProfileCommand(program: Command) {
  program
    .command('profile')
    .description('Report the files a build creates or modifies')
    .argument('[dir]', 'Directory to profile', '.')
    .option(
      '-b, --build <command>',
      'Build command to run between the scans; must come last, everything after it is the command',
    )
    .option('-o, --output <file>', 'CSV report file (default: build_profile.csv)')
    .option('--utc', 'Print timestamps in UTC instead of local time')
    .option('--relative', 'Write paths relative to the profiled directory')
    .option('--concurrency <n>', 'Maximum parallel file system calls while scanning')
    .option('--exclude <pattern...>', 'gitignore-style patterns to leave out of the scans')
    .option('--precision <unit>', 'Timestamp precision: ms or s')
    .action(async (dir: string, options: ProfileCommandOptions, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      const root = await resolveDirectory(dir);

      const buildCommand = options.build?.trim();
      if (options.build !== undefined && !buildCommand) {
        throw new UsageError('--build needs a command');
      }

      const flags: ConfigInput = {
        scan: {
          concurrency: parsePositiveInt(options.concurrency, '--concurrency'),
          excludes: options.exclude,
          precision: parsePrecision(options.precision),
        },
        report: {
          output: options.output,
          timeZone: options.utc ? 'utc' : undefined,
          relativePaths: options.relative ? true : undefined,
        },
      };
      const config = loadConfig(globalOpts, root, flags);
      const logger = createLogger(globalOpts, config);
      const renderer = new OutputRenderer(!!globalOpts.json);

      const step: BuildStep = buildCommand
        ? { kind: 'command', command: buildCommand }
        : { kind: 'manual', waiter: new ConsoleBuildWaiter() };

      renderer.log(`Profiling ${root}`);
      const result = await withInterrupt((signal) =>
        new ProfileSession({
          root,
          config,
          logger,
          signal,
          buildStdio: globalOpts.json ? 'stderr' : 'inherit',
          runId: Date.now().toString(),
        }).run(step),
      );

      renderer.renderChanges(
        {
          root: result.root,
          output: result.report.path,
          build: result.build,
          summary: result.diff.summary,
          changes: result.diff.changes,
        },
        { timeZone: config.report.timeZone, relativePaths: config.report.relativePaths },
      );
    });
}
