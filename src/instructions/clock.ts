/**
 * Clock access and timestamp snapshot capture
 */

import { LocalTimeUnavailableError } from './errors.js';
import type { TimeZone } from './types.js';

// Widest UTC offset in use (±18:00)
const MAX_OFFSET_MINUTES = 18 * 60;

/**
 * Source of the current instant and of the system's local UTC offset.
 */
export interface Clock {
  now(): Date;
  /** Offset of local civil time from UTC at the given instant, in minutes east of UTC */
  localOffsetMinutes(at: Date): number;
}

export const systemClock: Clock = {
  now: () => new Date(),
  // getTimezoneOffset is minutes west of UTC
  localOffsetMinutes: (at: Date) => -at.getTimezoneOffset(),
};

/**
 * One captured instant, expressed in the civil time of `offsetMinutes`.
 * All date/time instructions of a run derive from a single snapshot.
 */
export interface TimestampSnapshot {
  readonly instant: Date;
  readonly offsetMinutes: number;
}

function isResolvableOffset(offset: number): boolean {
  return Number.isInteger(offset) && Math.abs(offset) <= MAX_OFFSET_MINUTES;
}

/**
 * Sample the clock once.
 * @throws LocalTimeUnavailableError if local time is requested and the offset cannot be resolved
 */
export function captureSnapshot(timezone: TimeZone, clock: Clock = systemClock): TimestampSnapshot {
  const instant = new Date(clock.now().getTime());

  if (timezone === 'utc') {
    return Object.freeze({ instant, offsetMinutes: 0 });
  }

  let offset: number;
  try {
    offset = clock.localOffsetMinutes(instant);
  } catch (error) {
    throw new LocalTimeUnavailableError(error);
  }

  if (Number.isNaN(instant.getTime()) || !isResolvableOffset(offset)) {
    throw new LocalTimeUnavailableError();
  }

  // -0 from negating a zero getTimezoneOffset
  return Object.freeze({ instant, offsetMinutes: offset === 0 ? 0 : offset });
}

/**
 * Build a snapshot from fixed values (reproducible builds, tests).
 */
export function frozenSnapshot(instant: Date | string | number, offsetMinutes = 0): TimestampSnapshot {
  return Object.freeze({ instant: new Date(instant), offsetMinutes });
}
