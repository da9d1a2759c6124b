import type { Clock } from '../../../src/instructions/clock.js';

// 2021-02-12T01:54:15.134Z
export const FIXED_INSTANT = Date.UTC(2021, 1, 12, 1, 54, 15, 134);

export function fixedClock(offsetMinutes = 0, instant: number = FIXED_INSTANT): Clock {
  return {
    now: () => new Date(instant),
    localOffsetMinutes: () => offsetMinutes,
  };
}

export const unresolvableClock: Clock = {
  now: () => new Date(FIXED_INSTANT),
  localOffsetMinutes: () => Number.NaN,
};

export const throwingClock: Clock = {
  now: () => new Date(FIXED_INSTANT),
  localOffsetMinutes: () => {
    throw new Error('tz database missing');
  },
};
