import { DiffInputInvalidError, comparePaths } from '@buildprof/shared';
import type { FileRecord, Snapshot } from '../scanner/types';
import type { ChangeRecord, DiffResult, DiffSummary } from './types';

export * from './types';

type Side = 'before' | 'after';

function indexRecords(snapshot: Snapshot, side: Side): Map<string, FileRecord> {
  const byPath = new Map<string, FileRecord>();
  for (const record of snapshot.files) {
    if (typeof record.path !== 'string' || record.path.length === 0) {
      throw new DiffInputInvalidError(String(record.path), `path must be a non-empty string in ${side} snapshot`);
    }
    if (!Number.isSafeInteger(record.mtimeMs)) {
      throw new DiffInputInvalidError(record.path, `mtime must be an integer in ${side} snapshot`);
    }
    if (byPath.has(record.path)) {
      throw new DiffInputInvalidError(record.path, `duplicate path in ${side} snapshot`);
    }
    byPath.set(record.path, record);
  }
  return byPath;
}

/**
 * Compares two snapshots of the same tree and reports every file of `after`
 * that is new or whose mtime changed, sorted by path.
 *
 * Files only present in `before` are not reported; an mtime is unchanged
 * only when it is exactly equal.
 */
export function compareSnapshots(before: Snapshot, after: Snapshot): DiffResult {
  const previous = indexRecords(before, 'before');
  const current = indexRecords(after, 'after');

  const changes: ChangeRecord[] = [];
  const summary: DiffSummary = { created: 0, modified: 0, unchanged: 0, missing: 0 };

  for (const record of current.values()) {
    const old = previous.get(record.path);
    if (!old) {
      summary.created++;
      changes.push({ path: record.path, mtimeMs: record.mtimeMs, kind: 'created' });
    } else if (old.mtimeMs !== record.mtimeMs) {
      summary.modified++;
      changes.push({
        path: record.path,
        mtimeMs: record.mtimeMs,
        kind: 'modified',
        previousMtimeMs: old.mtimeMs,
      });
    } else {
      summary.unchanged++;
    }
  }

  for (const path of previous.keys()) {
    if (!current.has(path)) summary.missing++;
  }

  changes.sort((a, b) => comparePaths(a.path, b.path));
  return { changes, summary };
}

/**
 * The created and modified files of `after` relative to `before`, sorted by path.
 */
export function diffSnapshots(before: Snapshot, after: Snapshot): ChangeRecord[] {
  return compareSnapshots(before, after).changes;
}

export function summarizeDiff(before: Snapshot, after: Snapshot): DiffSummary {
  return compareSnapshots(before, after).summary;
}
