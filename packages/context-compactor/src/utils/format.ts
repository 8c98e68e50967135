/**
 * Text formatting helpers for summaries.
 */

/**
 * Keeps the first `maxLength` characters (code points, so surrogate pairs stay
 * whole) and appends `suffix` when cut.
 *
 * @example
 * ```typescript
 * preview("abcdef", 3);  // "abc..."
 * preview("abc", 3);     // "abc"
 * ```
 */
export function preview(text: string, maxLength: number, suffix = "..."): string {
  if (text.length <= maxLength) {
    return text;
  }
  const chars = Array.from(text);
  return chars.length > maxLength ? chars.slice(0, maxLength).join("") + suffix : text;
}

const pad2 = (value: number): string => String(value).padStart(2, "0");

function clock(date: Date): string {
  return `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}`;
}

function dayMonth(date: Date): string {
  return `${pad2(date.getUTCDate())}/${pad2(date.getUTCMonth() + 1)}`;
}

/**
 * Formats the span covered by a set of timestamps, in UTC.
 *
 * @example
 * ```typescript
 * formatTimeRange([new Date("2024-03-05T09:15Z"), new Date("2024-03-05T11:40Z")]);
 * // "09:15 - 11:40 (05/03/2024)"
 * formatTimeRange([new Date("2024-03-05T23:00Z"), new Date("2024-03-06T01:30Z")]);
 * // "05/03 23:00 - 06/03 01:30"
 * ```
 */
export function formatTimeRange(timestamps: readonly Date[]): string {
  if (timestamps.length === 0) {
    return "N/A";
  }

  let startMs = Number.POSITIVE_INFINITY;
  let endMs = Number.NEGATIVE_INFINITY;
  for (const date of timestamps) {
    startMs = Math.min(startMs, date.getTime());
    endMs = Math.max(endMs, date.getTime());
  }
  const start = new Date(startMs);
  const end = new Date(endMs);

  if (start.toISOString().slice(0, 10) === end.toISOString().slice(0, 10)) {
    return `${clock(start)} - ${clock(end)} (${dayMonth(start)}/${start.getUTCFullYear()})`;
  }
  return `${dayMonth(start)} ${clock(start)} - ${dayMonth(end)} ${clock(end)}`;
}
