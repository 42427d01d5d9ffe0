import type { Dirent, Stats } from 'node:fs';
import type { Logger, ScanPhase, TimestampPrecision } from '@buildprof/shared';

/**
 * One regular file as seen by a scan.
 */
export interface FileRecord {
  /** Normalized absolute path with forward slashes */
  readonly path: string;
  /** Last modification time, integer milliseconds since the epoch */
  readonly mtimeMs: number;
}

/**
 * The regular files under a directory at one point in time, sorted by path.
 */
export interface Snapshot {
  /** Normalized absolute path of the scanned directory */
  readonly root: string;
  /** ISO 8601 time the scan started */
  readonly capturedAt: string;
  readonly files: readonly FileRecord[];
}

export interface ScanOptions {
  /** Maximum number of directory listings or stat calls in flight. Defaults to 16. */
  concurrency?: number;
  /** gitignore-style patterns, relative to the root, for entries to leave out */
  excludes?: string[];
  /** `'s'` truncates mtimes to whole seconds. Defaults to `'ms'`. */
  precision?: TimestampPrecision;
  /** Aborting fails the scan with ScanAbortedError */
  signal?: AbortSignal;
  /** Run id and phase stamped on emitted events */
  runId?: string;
  phase?: ScanPhase;
}

/**
 * The file system calls a scan needs. `node:fs/promises` satisfies it.
 */
export interface ScannerFs {
  readdir(path: string, options: { withFileTypes: true }): Promise<Dirent[]>;
  lstat(path: string): Promise<Stats>;
}

export interface DirectoryScannerOptions {
  fs?: ScannerFs;
  logger?: Logger;
  now?: () => Date;
}
