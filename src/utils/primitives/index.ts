/**
 * Type guard: value can be read by key.
 * Only `typeof value === 'object'` and non-null values pass.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Formats a date as a UTC log timestamp `YYYY-MM-DD HH:mm:ss.sss`.
 * Uses the current time when no date is given.
 */
export function toUtcTimeLog(date: Date | null = null): string {
  const target = date ?? new Date();

  const year = target.getUTCFullYear();
  const month = String(target.getUTCMonth() + 1).padStart(2, '0');
  const day = String(target.getUTCDate()).padStart(2, '0');
  const hours = String(target.getUTCHours()).padStart(2, '0');
  const minutes = String(target.getUTCMinutes()).padStart(2, '0');
  const seconds = String(target.getUTCSeconds()).padStart(2, '0');
  const milliseconds = String(target.getUTCMilliseconds()).padStart(3, '0');

  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds}.${milliseconds}`;
}
