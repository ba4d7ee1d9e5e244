/**
 * Normalizes the leading `YYYY-MM-DD` of a date string
 * Returns an empty string when the prefix is not a real calendar date
 */
export function parseIsoDate(value: string | null | undefined): string {
  if (!value) return '';

  const match = value.slice(0, 10).match(/^(\d{4})-(\d{1,2})-(\d{1,2})$/);
  if (!match) return '';

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    year < 1 ||
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return '';
  }

  return `${match[1]}-${pad(month)}-${pad(day)}`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `YYYY-MM-DD HH:mm` in local time */
export function formatMinuteTimestamp(date: Date = new Date()): string {
  return `${formatLocalDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/** `YYYY-MM-DD_HH-mm-ss` in local time, safe for file names */
export function formatFileTimestamp(date: Date = new Date()): string {
  return `${formatLocalDate(date)}_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
}

function formatLocalDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}
