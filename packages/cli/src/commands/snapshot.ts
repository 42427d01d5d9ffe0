import path from 'path';
import { Command } from 'commander';
import { DirectoryScanner, saveSnapshot } from '@buildprof/snapshot';
import { ConfigInput, normalizePath } from '@buildprof/shared';
import { OutputRenderer } from '../output/renderer';
import {
  createLogger,
  getGlobalOptions,
  loadConfig,
  parsePositiveInt,
  parsePrecision,
  resolveDirectory,
  withInterrupt,
} from './context';

interface SnapshotCommandOptions {
  output: string;
  concurrency?: string;
  exclude?: string[];
  precision?: string;
}

export function registerSnapshotCommand(program: Command) {
  program
    .command('snapshot')
    .description('Save the current state of a directory for a later compare')
    .argument('[dir]', 'Directory to scan', '.')
    .requiredOption('-o, --output <file>', 'Snapshot JSON file to write')
    .option('--concurrency <n>', 'Maximum parallel file system calls while scanning')
    .option('--exclude <pattern...>', 'gitignore-style patterns to leave out of the scan')
    .option('--precision <unit>', 'Timestamp precision: ms or s')
    .action(async (dir: string, options: SnapshotCommandOptions, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      const root = await resolveDirectory(dir);

      const flags: ConfigInput = {
        scan: {
          concurrency: parsePositiveInt(options.concurrency, '--concurrency'),
          excludes: options.exclude,
          precision: parsePrecision(options.precision),
        },
      };
      const config = loadConfig(globalOpts, root, flags);
      const logger = createLogger(globalOpts, config);

      const snapshot = await withInterrupt((signal) =>
        new DirectoryScanner({ logger }).scan(root, {
          concurrency: config.scan.concurrency,
          excludes: config.scan.excludes,
          precision: config.scan.precision,
          signal,
        }),
      );

      const output = normalizePath(path.resolve(options.output));
      await saveSnapshot(output, snapshot);

      new OutputRenderer(!!globalOpts.json).renderSnapshotSaved({
        root: snapshot.root,
        output,
        capturedAt: snapshot.capturedAt,
        fileCount: snapshot.files.length,
      });
    });
}
