import { Command } from 'commander';
import { compareSnapshots, loadSnapshot } from '@buildprof/snapshot';
import { renderCsv, writeCsvReport } from '@buildprof/core';
import { ConfigInput } from '@buildprof/shared';
import { OutputRenderer } from '../output/renderer';
import { createLogger, getGlobalOptions, loadConfig } from './context';

interface CompareCommandOptions {
  output?: string;
  utc?: boolean;
  relative?: boolean;
}

export function registerCompareCommand(program: Command) {
  program
    .command('compare')
    .description('Report what changed between two saved snapshots')
    .argument('<before>', 'Snapshot taken before the build')
    .argument('<after>', 'Snapshot taken after the build')
    .option('-o, --output <file>', 'Also write the changes as a CSV report')
    .option('--utc', 'Print timestamps in UTC instead of local time')
    .option('--relative', 'Show paths relative to the scanned directory')
    .action(async (before: string, after: string, options: CompareCommandOptions, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      const flags: ConfigInput = {
        report: {
          timeZone: options.utc ? 'utc' : undefined,
          relativePaths: options.relative ? true : undefined,
        },
      };
      const config = loadConfig(globalOpts, process.cwd(), flags);
      const logger = createLogger(globalOpts, config);

      const [beforeSnapshot, afterSnapshot] = await Promise.all([
        loadSnapshot(before),
        loadSnapshot(after),
      ]);
      if (beforeSnapshot.root !== afterSnapshot.root) {
        await logger.warn(
          `Warning: snapshots were taken of different directories ` +
            `(${beforeSnapshot.root} and ${afterSnapshot.root}); files are matched by absolute path`,
        );
      }
      const { changes, summary } = compareSnapshots(beforeSnapshot, afterSnapshot);

      let output: string | undefined;
      if (options.output) {
        const csv = renderCsv(changes, {
          timeZone: config.report.timeZone,
          relativeTo: config.report.relativePaths ? afterSnapshot.root : undefined,
        });
        output = await writeCsvReport(options.output, csv);
      }

      new OutputRenderer(!!globalOpts.json).renderChanges(
        { root: afterSnapshot.root, output, summary, changes },
        { timeZone: config.report.timeZone, relativePaths: config.report.relativePaths },
      );
    });
}
