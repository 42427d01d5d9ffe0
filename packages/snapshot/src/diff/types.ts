export type ChangeKind = 'created' | 'modified';

/**
 * A file whose state differs between two snapshots.
 */
export interface ChangeRecord {
  readonly path: string;
  /** The file's mtime in the later snapshot */
  readonly mtimeMs: number;
  readonly kind: ChangeKind;
  /** The file's mtime in the earlier snapshot; only set for `modified` */
  readonly previousMtimeMs?: number;
}

export interface DiffSummary {
  created: number;
  modified: number;
  unchanged: number;
  /** Files in the earlier snapshot that the later one no longer has */
  missing: number;
}

export interface DiffResult {
  changes: ChangeRecord[];
  summary: DiffSummary;
}
