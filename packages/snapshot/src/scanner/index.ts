import nodeFs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import ignore, { type Ignore } from 'ignore';
import {
  RootUnreadableError,
  ScanAbortedError,
  comparePaths,
  eventBase,
  join,
  logger as defaultLogger,
  mapWithConcurrency,
  relative,
  resolve,
  type Logger,
  type ScanPhase,
  type TimestampPrecision,
} from '@buildprof/shared';
import type {
  DirectoryScannerOptions,
  FileRecord,
  ScannerFs,
  ScanOptions,
  Snapshot,
} from './types';

export * from './types';

export const DEFAULT_SCAN_CONCURRENCY = 16;

interface ScanContext {
  root: string;
  runId: string;
  phase: ScanPhase;
  concurrency: number;
  precision: TimestampPrecision;
  ig: Ignore | undefined;
  signal: AbortSignal | undefined;
  skipped: number;
}

function errorCode(error: unknown): string {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return error instanceof Error ? error.message : String(error);
}

export function truncateMtime(mtimeMs: number, precision: TimestampPrecision): number {
  return precision === 's' ? Math.floor(mtimeMs / 1000) * 1000 : Math.floor(mtimeMs);
}

/**
 * Walks a directory tree and records the modification time of every regular
 * file in it. Symbolic links are neither followed nor recorded.
 *
 * Entries that vanish or become unreadable mid-walk are skipped with a
 * warning; only an unreadable root fails the scan.
 */
export class DirectoryScanner {
  private readonly fs: ScannerFs;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: DirectoryScannerOptions = {}) {
    this.fs = options.fs ?? nodeFs;
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  async scan(rootDir: string, options: ScanOptions = {}): Promise<Snapshot> {
    const started = this.now();
    const ctx: ScanContext = {
      root: resolve(rootDir),
      runId: options.runId ?? 'standalone',
      phase: options.phase ?? 'standalone',
      concurrency: options.concurrency ?? DEFAULT_SCAN_CONCURRENCY,
      precision: options.precision ?? 'ms',
      ig: options.excludes && options.excludes.length > 0 ? ignore().add(options.excludes) : undefined,
      signal: options.signal,
      skipped: 0,
    };

    await this.logger.log({
      ...eventBase(ctx.runId, started),
      type: 'ScanStarted',
      payload: { root: ctx.root, phase: ctx.phase },
    });
    this.checkAborted(ctx);

    let rootEntries: Dirent[];
    try {
      rootEntries = await this.fs.readdir(ctx.root, { withFileTypes: true });
    } catch (error) {
      throw new RootUnreadableError(ctx.root, { cause: error });
    }

    const filePaths = await this.collectFiles(ctx, ctx.root, rootEntries);

    const records = await mapWithConcurrency(filePaths, ctx.concurrency, (p) =>
      this.statFile(ctx, p),
    );
    const files = records.filter((r): r is FileRecord => r !== null).sort((a, b) =>
      comparePaths(a.path, b.path),
    );

    this.checkAborted(ctx);

    const finished = this.now();
    await this.logger.log({
      ...eventBase(ctx.runId, finished),
      type: 'ScanFinished',
      payload: {
        root: ctx.root,
        phase: ctx.phase,
        fileCount: files.length,
        skippedCount: ctx.skipped,
        durationMs: finished.getTime() - started.getTime(),
      },
    });

    return {
      root: ctx.root,
      capturedAt: started.toISOString(),
      files,
    };
  }

  /**
   * Breadth-first walk; each level's directories are listed concurrently.
   */
  private async collectFiles(
    ctx: ScanContext,
    root: string,
    rootEntries: Dirent[],
  ): Promise<string[]> {
    const files: string[] = [];
    let level: Array<{ dir: string; entries: Dirent[] }> = [{ dir: root, entries: rootEntries }];

    while (level.length > 0) {
      const subdirs: string[] = [];
      for (const { dir, entries } of level) {
        for (const entry of entries) {
          const abs = join(dir, entry.name);
          if (entry.isDirectory()) {
            if (this.isExcluded(ctx, abs, true)) continue;
            subdirs.push(abs);
          } else if (entry.isFile()) {
            if (this.isExcluded(ctx, abs, false)) continue;
            files.push(abs);
          }
          // Symlinks, sockets, FIFOs and devices are not part of a snapshot.
        }
      }

      this.checkAborted(ctx);

      const listed = await mapWithConcurrency(subdirs, ctx.concurrency, async (dir) => {
        this.checkAborted(ctx);
        try {
          return { dir, entries: await this.fs.readdir(dir, { withFileTypes: true }) };
        } catch (error) {
          await this.skip(ctx, dir, 'directory', error);
          return null;
        }
      });
      level = listed.filter((l): l is { dir: string; entries: Dirent[] } => l !== null);
    }

    return files;
  }

  private async statFile(ctx: ScanContext, path: string): Promise<FileRecord | null> {
    this.checkAborted(ctx);
    try {
      const stats = await this.fs.lstat(path);
      if (!stats.isFile()) {
        // Replaced by a directory or link since it was listed.
        await this.logger.debug(`Skipping ${path}: no longer a regular file`);
        return null;
      }
      return { path, mtimeMs: truncateMtime(stats.mtimeMs, ctx.precision) };
    } catch (error) {
      await this.skip(ctx, path, 'file', error);
      return null;
    }
  }

  private isExcluded(ctx: ScanContext, abs: string, isDir: boolean): boolean {
    if (!ctx.ig) return false;
    const rel = relative(ctx.root, abs);
    return ctx.ig.ignores(isDir ? `${rel}/` : rel);
  }

  private async skip(
    ctx: ScanContext,
    path: string,
    kind: 'file' | 'directory',
    error: unknown,
  ): Promise<void> {
    ctx.skipped++;
    const reason = errorCode(error);
    await this.logger.warn(
      `Warning: could not read ${kind} ${path} (${reason}); possibly deleted or a permission issue`,
    );
    await this.logger.log({
      ...eventBase(ctx.runId, this.now()),
      type: 'FileSkipped',
      payload: { path, kind, reason },
    });
  }

  private checkAborted(ctx: ScanContext): void {
    if (ctx.signal?.aborted) {
      throw new ScanAbortedError(ctx.root, { cause: ctx.signal.reason });
    }
  }
}
