import path from 'path';
import { ReportError, atomicWrite, relative } from '@buildprof/shared';
import type { ChangeRecord } from '@buildprof/snapshot';
import { formatTimestamp, type ReportTimeZone } from './timestamp';

export const CSV_HEADER = 'filepath,last_modification_timestamp';

export interface CsvReportOptions {
  timeZone?: ReportTimeZone;
  /** Write paths relative to this directory instead of absolute */
  relativeTo?: string;
}

function quote(field: string): string {
  return `"${field.replace(/"/g, '""')}"`;
}

export function renderCsv(changes: readonly ChangeRecord[], options: CsvReportOptions = {}): string {
  const lines = [CSV_HEADER];
  for (const change of changes) {
    const filePath = options.relativeTo ? relative(options.relativeTo, change.path) : change.path;
    lines.push(`${quote(filePath)},${quote(formatTimestamp(change.mtimeMs, options.timeZone))}`);
  }
  return lines.join('\n') + '\n';
}

/**
 * Writes a rendered report and returns the absolute path it landed at.
 * Relative paths resolve against the working directory, not the profiled one.
 */
export async function writeCsvReport(file: string, csv: string): Promise<string> {
  const target = path.resolve(file);
  try {
    await atomicWrite(target, csv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ReportError(`Failed to write report ${target}: ${message}`, { cause: error });
  }
  return target;
}
