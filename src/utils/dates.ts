/**
 * Date formatting for titles, front matter and import footers
 *
 * All formats use local time, matching what the note service shows its user.
 */

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * 12-digit YYMMDDHHMMSS stamp used for fragment titles and duplicate suffixes
 */
export function formatTimestamp(date: Date): string {
  return (
    pad(date.getFullYear() % 100) +
    pad(date.getMonth() + 1) +
    pad(date.getDate()) +
    pad(date.getHours()) +
    pad(date.getMinutes()) +
    pad(date.getSeconds())
  );
}

/**
 * YYYY-MM-DDTHH:MM
 */
export function formatIsoMinute(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}T${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/**
 * YYYY-MM-DD HH:MM:SS
 */
export function formatDateTime(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}
