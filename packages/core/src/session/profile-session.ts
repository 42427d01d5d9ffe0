import {
  Config,
  DEFAULT_CONFIG,
  Logger,
  UsageError,
  eventBase,
  logger as defaultLogger,
} from '@buildprof/shared';
import {
  DirectoryScanner,
  compareSnapshots,
  type DiffResult,
  type Snapshot,
} from '@buildprof/snapshot';
import { BuildRunner, type BuildStdio } from '@buildprof/exec';
import { renderCsv, writeCsvReport } from '../report/csv';

export type SessionState =
  | 'idle'
  | 'scanned-before'
  | 'build-ran'
  | 'scanned-after'
  | 'diffed'
  | 'reported';

/**
 * Blocks until the user says their manual build is done. Rejects once
 * `signal` aborts.
 */
export interface BuildWaiter {
  waitForBuild(root: string, signal?: AbortSignal): Promise<void>;
}

export type BuildStep =
  | { kind: 'command'; command: string }
  | { kind: 'manual'; waiter: BuildWaiter };

export interface BuildOutcome {
  /** Null for a manual build */
  command: string | null;
  exitCode: number | null;
  signal: string | null;
  timedOut: boolean;
  durationMs: number;
}

export interface ReportOutcome {
  path: string;
  rowCount: number;
}

export interface ProfileResult {
  root: string;
  build: BuildOutcome;
  diff: DiffResult;
  report: ReportOutcome;
}

export interface ProfileSessionOptions {
  /** Directory to profile; resolved by the scanner */
  root: string;
  config?: Config;
  runId?: string;
  logger?: Logger;
  scanner?: DirectoryScanner;
  runner?: BuildRunner;
  /** Where the build command's output goes; defaults to the terminal */
  buildStdio?: BuildStdio;
  signal?: AbortSignal;
  now?: () => Date;
}

/**
 * One profiling run: scan, build, scan again, diff, report.
 *
 * Steps must be called in that order; anything else throws UsageError.
 * A build that exits non-zero is logged as a warning and profiling carries on.
 */
export class ProfileSession {
  private current: SessionState = 'idle';
  private before?: Snapshot;
  private after?: Snapshot;
  private diff?: DiffResult;

  private readonly config: Config;
  private readonly runId: string;
  private readonly logger: Logger;
  private readonly scanner: DirectoryScanner;
  private readonly runner: BuildRunner;
  private readonly now: () => Date;

  constructor(private readonly options: ProfileSessionOptions) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.now = options.now ?? (() => new Date());
    this.runId = options.runId ?? this.now().getTime().toString();
    this.logger = options.logger ?? defaultLogger;
    this.scanner =
      options.scanner ?? new DirectoryScanner({ logger: this.logger, now: this.now });
    this.runner = options.runner ?? new BuildRunner();
  }

  get state(): SessionState {
    return this.current;
  }

  /** Root of the profiled directory, as recorded by the first scan */
  get root(): string {
    return this.before?.root ?? this.options.root;
  }

  async scanBefore(): Promise<Snapshot> {
    this.expectState('idle', 'scan before the build');
    this.before = await this.scan('before');
    this.current = 'scanned-before';
    return this.before;
  }

  async runBuildStep(step: BuildStep): Promise<BuildOutcome> {
    this.expectState('scanned-before', 'run the build');
    const command = step.kind === 'command' ? step.command : null;

    await this.logger.log({
      ...eventBase(this.runId, this.now()),
      type: 'BuildStarted',
      payload: { command, cwd: this.root },
    });

    let outcome: BuildOutcome;
    if (step.kind === 'command') {
      await this.logger.info(`Running build: ${step.command}`);
      const result = await this.runner.run(step.command, {
        cwd: this.root,
        timeoutMs: this.config.build.timeoutMs,
        shell: this.config.build.shell,
        stdio: this.options.buildStdio,
        signal: this.options.signal,
      });
      outcome = {
        command: result.command,
        exitCode: result.exitCode,
        signal: result.signal,
        timedOut: result.timedOut,
        durationMs: result.durationMs,
      };
      if (result.timedOut) {
        await this.logger.warn(
          `Warning: build timed out after ${this.config.build.timeoutMs}ms and was stopped`,
        );
      } else if (result.exitCode !== 0) {
        const status =
          result.exitCode === null ? `signal ${result.signal}` : `exit code ${result.exitCode}`;
        await this.logger.warn(
          `Warning: build exited with ${status}; profiling continues with the files it changed`,
        );
      }
    } else {
      const started = this.now();
      await step.waiter.waitForBuild(this.root, this.options.signal);
      outcome = {
        command: null,
        exitCode: null,
        signal: null,
        timedOut: false,
        durationMs: this.now().getTime() - started.getTime(),
      };
    }

    await this.logger.log({
      ...eventBase(this.runId, this.now()),
      type: 'BuildFinished',
      payload: outcome,
    });

    this.current = 'build-ran';
    return outcome;
  }

  async scanAfter(): Promise<Snapshot> {
    this.expectState('build-ran', 'scan after the build');
    this.after = await this.scan('after');
    this.current = 'scanned-after';
    return this.after;
  }

  async computeDiff(): Promise<DiffResult> {
    this.expectState('scanned-after', 'compare snapshots');
    if (!this.before || !this.after) {
      throw new UsageError('Both snapshots are required to compare');
    }
    const result = compareSnapshots(this.before, this.after);

    await this.logger.log({
      ...eventBase(this.runId, this.now()),
      type: 'DiffComputed',
      payload: { ...result.summary },
    });
    await this.logger.debug(
      `Diff: ${result.summary.created} created, ${result.summary.modified} modified, ` +
        `${result.summary.unchanged} unchanged, ${result.summary.missing} missing`,
    );

    this.diff = result;
    this.current = 'diffed';
    return result;
  }

  /**
   * Writes the CSV report. `file` defaults to the configured output and
   * resolves against the working directory.
   */
  async writeReport(file: string = this.config.report.output): Promise<ReportOutcome> {
    this.expectState('diffed', 'write the report');
    if (!this.diff) {
      throw new UsageError('No diff to report');
    }
    const csv = renderCsv(this.diff.changes, {
      timeZone: this.config.report.timeZone,
      relativeTo: this.config.report.relativePaths ? this.root : undefined,
    });
    const written = await writeCsvReport(file, csv);
    const outcome = { path: written, rowCount: this.diff.changes.length };

    await this.logger.log({
      ...eventBase(this.runId, this.now()),
      type: 'ReportWritten',
      payload: outcome,
    });

    this.current = 'reported';
    return outcome;
  }

  /**
   * Runs every step in order.
   */
  async run(step: BuildStep, reportFile?: string): Promise<ProfileResult> {
    await this.scanBefore();
    const build = await this.runBuildStep(step);
    await this.scanAfter();
    const diff = await this.computeDiff();
    const report = await this.writeReport(reportFile);
    return { root: this.root, build, diff, report };
  }

  private scan(phase: 'before' | 'after'): Promise<Snapshot> {
    return this.scanner.scan(this.options.root, {
      concurrency: this.config.scan.concurrency,
      excludes: this.config.scan.excludes,
      precision: this.config.scan.precision,
      signal: this.options.signal,
      runId: this.runId,
      phase,
    });
  }

  private expectState(expected: SessionState, action: string): void {
    if (this.current !== expected) {
      throw new UsageError(
        `Cannot ${action} while the session is ${this.current}; expected ${expected}`,
      );
    }
  }
}
