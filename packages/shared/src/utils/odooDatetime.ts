const ODOO_DATETIME_PATTERN = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Formats a date the way Odoo stores datetimes: UTC, `YYYY-MM-DD HH:MM:SS`,
 * no fractional seconds and no timezone suffix.
 */
export function formatOdooDatetime(date: Date): string {
  return (
    `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} `
    + `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

/**
 * Parses an Odoo datetime as UTC. ISO strings are accepted as well.
 * Returns null for anything that does not parse.
 */
export function parseOdooDatetime(value: string): Date | null {
  const trimmed = value.trim();
  const parsed = ODOO_DATETIME_PATTERN.test(trimmed)
    ? new Date(`${trimmed.replace(' ', 'T')}Z`)
    : new Date(trimmed);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/** Whole seconds between an Odoo check-in and `now`, never negative. */
export function elapsedSecondsSince(checkIn: string, now: Date = new Date()): number {
  const start = parseOdooDatetime(checkIn);
  if (!start) return 0;
  return Math.max(0, Math.floor((now.getTime() - start.getTime()) / 1000));
}

/** `HH:MM:SS`; hours keep growing past 24. */
export function formatDuration(totalSeconds: number): string {
  const safe = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(safe / 3600);
  const minutes = Math.floor((safe % 3600) / 60);
  const seconds = safe % 60;
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
}
