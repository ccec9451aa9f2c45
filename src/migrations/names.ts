const TIMESTAMP_PREFIX = /^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})_/;

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * `YYYYMMDD_HHMMSS_<description>` in UTC. The description is lowercased,
 * spaces and dashes become underscores and anything else that is not a
 * letter, digit or underscore is removed.
 */
export function generateMigrationName(description: string, now: Date = new Date()): string {
  const timestamp =
    `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}` +
    `_${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;

  const sanitized = description
    .toLowerCase()
    .replace(/[ -]/g, '_')
    .replace(/[^\p{L}\p{N}_]/gu, '');

  return `${timestamp}_${sanitized}`;
}

/**
 * Reads the UTC timestamp back out of a generated name, or null when the
 * name does not start with one.
 */
export function parseMigrationTimestamp(name: string): Date | null {
  const match = TIMESTAMP_PREFIX.exec(name);
  if (!match) return null;

  const [year, month, day, hours, minutes, seconds] = match.slice(1, 7).map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  return Number.isNaN(date.getTime()) ? null : date;
}
