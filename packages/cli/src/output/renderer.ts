import pc from 'picocolors';
import { relative } from '@buildprof/shared';
import { formatTimestamp, type BuildOutcome, type ReportTimeZone } from '@buildprof/core';
import type { ChangeRecord, DiffSummary } from '@buildprof/snapshot';
import { printTable } from './index';

export interface ChangeReport {
  root: string;
  /** Where the CSV went, when one was written */
  output?: string;
  /** Absent for `compare`, which has no build step */
  build?: BuildOutcome;
  summary: DiffSummary;
  changes: ChangeRecord[];
}

export interface SnapshotSaved {
  root: string;
  output: string;
  capturedAt: string;
  fileCount: number;
}

export interface RenderOptions {
  timeZone: ReportTimeZone;
  /** Show paths relative to the root in the table */
  relativePaths: boolean;
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  renderChanges(report: ChangeReport, options: RenderOptions): void {
    if (this.isJson) {
      console.log(JSON.stringify(report, null, 2));
      return;
    }

    if (report.build) {
      this.renderBuild(report.build);
    }

    if (report.changes.length === 0) {
      console.log(`\n${pc.yellow('No changes detected.')}`);
    } else {
      console.log(pc.bold(`\nChanged files in ${report.root}:`));
      printTable(
        report.changes.map((change) => ({
          path: options.relativePaths ? relative(report.root, change.path) : change.path,
          kind: change.kind === 'created' ? pc.green('created') : pc.cyan('modified'),
          mtime: formatTimestamp(change.mtimeMs, options.timeZone),
        })),
        { head: ['File', 'Change', 'Last modified'] },
      );
    }

    const { created, modified, unchanged, missing } = report.summary;
    console.log(
      `${pc.bold('Summary:')} ${created} created, ${modified} modified, ${unchanged} unchanged` +
        (missing > 0 ? `, ${missing} no longer present` : ''),
    );
    if (report.output) {
      console.log(`${pc.bold('Report:')} ${report.output}`);
    }
  }

  renderSnapshotSaved(saved: SnapshotSaved): void {
    if (this.isJson) {
      console.log(JSON.stringify(saved, null, 2));
      return;
    }
    console.log(
      `${pc.green('✅')} Snapshot of ${saved.fileCount} files in ${saved.root} saved to ${saved.output}`,
    );
  }

  log(message: string): void {
    if (!this.isJson) {
      console.log(pc.gray(message));
    }
  }

  private renderBuild(build: BuildOutcome): void {
    const seconds = (build.durationMs / 1000).toFixed(1);
    if (build.command === null) {
      console.log(pc.gray(`Manual build step took ${seconds}s`));
    } else if (build.exitCode === 0) {
      console.log(`${pc.green('✅')} Build succeeded in ${seconds}s`);
    } else if (build.timedOut) {
      console.log(`${pc.red('❌')} Build timed out after ${seconds}s`);
    } else {
      const status = build.exitCode === null ? `signal ${build.signal}` : `exit code ${build.exitCode}`;
      console.log(`${pc.red('❌')} Build failed with ${status} after ${seconds}s`);
    }
  }
}
