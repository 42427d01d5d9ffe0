import fs from 'node:fs/promises';
import { z } from 'zod';
import { SnapshotFormatError, atomicWrite } from '@buildprof/shared';
import type { Snapshot } from '../scanner/types';

export const SNAPSHOT_SCHEMA_VERSION = 1;

const FileRecordSchema = z.object({
  path: z.string().min(1),
  mtimeMs: z.number().int(),
});

export const SnapshotFileSchema = z.object({
  schemaVersion: z.literal(SNAPSHOT_SCHEMA_VERSION),
  root: z.string().min(1),
  capturedAt: z.string().datetime(),
  files: z.array(FileRecordSchema),
});

export type SnapshotFile = z.infer<typeof SnapshotFileSchema>;

/**
 * Writes a snapshot as JSON, replacing `filePath` atomically.
 */
export async function saveSnapshot(filePath: string, snapshot: Snapshot): Promise<void> {
  const file: SnapshotFile = {
    schemaVersion: SNAPSHOT_SCHEMA_VERSION,
    root: snapshot.root,
    capturedAt: snapshot.capturedAt,
    files: snapshot.files.map((f) => ({ path: f.path, mtimeMs: f.mtimeMs })),
  };
  await atomicWrite(filePath, JSON.stringify(file, null, 2) + '\n');
}

export function parseSnapshot(content: string, source: string): Snapshot {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new SnapshotFormatError(`Failed to parse snapshot file ${source}`, { cause: error });
  }

  const result = SnapshotFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `- ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new SnapshotFormatError(`Invalid snapshot file ${source}:\n${issues}`);
  }

  const { root, capturedAt, files } = result.data;
  return { root, capturedAt, files };
}

export async function loadSnapshot(filePath: string): Promise<Snapshot> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new SnapshotFormatError(`Cannot read snapshot file ${filePath}`, { cause: error });
  }
  return parseSnapshot(content, filePath);
}
