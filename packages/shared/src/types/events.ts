/**
 * Base interface for all profiler events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the profiling run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/** Which of the two scans of a profiling run an event belongs to */
export type ScanPhase = 'before' | 'after' | 'standalone';

/**
 * Emitted when a directory scan starts.
 */
export interface ScanStarted extends BaseEvent {
  type: 'ScanStarted';
  payload: {
    root: string;
    phase: ScanPhase;
  };
}

/**
 * Emitted when a directory scan has produced a snapshot.
 */
export interface ScanFinished extends BaseEvent {
  type: 'ScanFinished';
  payload: {
    root: string;
    phase: ScanPhase;
    /** Number of regular files captured */
    fileCount: number;
    /** Number of entries skipped because they vanished or could not be read */
    skippedCount: number;
    durationMs: number;
  };
}

/**
 * Emitted when a file or nested directory is dropped from a scan because it
 * vanished or became unreadable mid-walk.
 */
export interface FileSkipped extends BaseEvent {
  type: 'FileSkipped';
  payload: {
    path: string;
    kind: 'file' | 'directory';
    /** errno code when available, e.g. ENOENT or EACCES */
    reason: string;
  };
}

/** Emitted when the build step between the two scans begins */
export interface BuildStarted extends BaseEvent {
  type: 'BuildStarted';
  payload: {
    /** The build command, or null when waiting on a manual build */
    command: string | null;
    cwd: string;
  };
}

/** Emitted when the build step between the two scans ends */
export interface BuildFinished extends BaseEvent {
  type: 'BuildFinished';
  payload: {
    command: string | null;
    exitCode: number | null;
    signal: string | null;
    timedOut: boolean;
    durationMs: number;
  };
}

/** Emitted once the two snapshots have been compared */
export interface DiffComputed extends BaseEvent {
  type: 'DiffComputed';
  payload: {
    created: number;
    modified: number;
    unchanged: number;
    missing: number;
  };
}

/** Emitted when the change report has been written */
export interface ReportWritten extends BaseEvent {
  type: 'ReportWritten';
  payload: {
    path: string;
    rowCount: number;
  };
}

/**
 * Union of all profiler event types.
 */
export type ProfilerEvent =
  | ScanStarted
  | ScanFinished
  | FileSkipped
  | BuildStarted
  | BuildFinished
  | DiffComputed
  | ReportWritten;

/**
 * Common metadata for a new event; spread it into the event literal.
 */
export function eventBase(runId: string, now: Date = new Date()): Omit<BaseEvent, 'type'> {
  return {
    schemaVersion: 1,
    timestamp: now.toISOString(),
    runId,
  };
}
