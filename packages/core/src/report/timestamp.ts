export type ReportTimeZone = 'local' | 'utc';

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

function localZoneName(date: Date): string {
  const part = new Intl.DateTimeFormat('en-US', { timeZoneName: 'short' })
    .formatToParts(date)
    .find((p) => p.type === 'timeZoneName');
  return part?.value ?? 'local';
}

/**
 * Renders an mtime as `YYYY-MM-DD HH:mm:ss ZONE`. Sub-second precision is
 * dropped from the rendering only; the diff itself compares full values.
 */
export function formatTimestamp(mtimeMs: number, timeZone: ReportTimeZone = 'local'): string {
  const date = new Date(mtimeMs);
  if (timeZone === 'utc') {
    return (
      `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
      `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())} UTC`
    );
  }
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())} ` +
    localZoneName(date)
  );
}
