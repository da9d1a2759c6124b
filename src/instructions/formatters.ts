/**
 * Formatting of a timestamp snapshot into instruction values.
 * Every helper returns undefined rather than throwing so that one field
 * failing to format never affects the others.
 */

import type { TimestampSnapshot } from './clock.js';

const MS_PER_MINUTE = 60_000;

interface CivilTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/** Civil time of the snapshot, or undefined when it has no four-digit year. */
function toCivilTime(snapshot: TimestampSnapshot): CivilTime | undefined {
  const ms = snapshot.instant.getTime();
  if (!Number.isFinite(ms) || !Number.isInteger(snapshot.offsetMinutes)) {
    return undefined;
  }

  const shifted = new Date(ms + snapshot.offsetMinutes * MS_PER_MINUTE);
  const year = shifted.getUTCFullYear();
  if (Number.isNaN(year) || year < 0 || year > 9999) {
    return undefined;
  }

  return {
    year,
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
    hour: shifted.getUTCHours(),
    minute: shifted.getUTCMinutes(),
    second: shifted.getUTCSeconds(),
    millisecond: shifted.getUTCMilliseconds(),
  };
}

function formatOffset(offsetMinutes: number): string {
  if (offsetMinutes === 0) {
    return 'Z';
  }
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(abs / 60), 2)}:${pad(abs % 60, 2)}`;
}

/** `YYYY-MM-DD` */
export function formatDate(snapshot: TimestampSnapshot): string | undefined {
  const t = toCivilTime(snapshot);
  if (!t) return undefined;
  return `${pad(t.year, 4)}-${pad(t.month, 2)}-${pad(t.day, 2)}`;
}

/** `HH-MM-SS`, 24-hour clock, hyphen separated */
export function formatTime(snapshot: TimestampSnapshot): string | undefined {
  const t = toCivilTime(snapshot);
  if (!t) return undefined;
  return `${pad(t.hour, 2)}-${pad(t.minute, 2)}-${pad(t.second, 2)}`;
}

/** RFC 3339 with microsecond fraction, e.g. `2021-02-12T01:54:15.134000+00:30` */
export function formatTimestamp(snapshot: TimestampSnapshot): string | undefined {
  const t = toCivilTime(snapshot);
  if (!t) return undefined;
  const date = `${pad(t.year, 4)}-${pad(t.month, 2)}-${pad(t.day, 2)}`;
  const time = `${pad(t.hour, 2)}:${pad(t.minute, 2)}:${pad(t.second, 2)}`;
  const fraction = `${pad(t.millisecond, 3)}000`;
  return `${date}T${time}.${fraction}${formatOffset(snapshot.offsetMinutes)}`;
}
