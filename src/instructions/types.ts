/**
 * Instruction vocabulary shared by the generator and the emitter
 */

/**
 * Keys the build category can produce. Each key has exactly one producer.
 */
export type InstructionKey = 'BuildDate' | 'BuildTime' | 'BuildTimestamp' | 'BuildSemver';

/**
 * Clock the date/time instructions are sampled from:
 * - utc: coordinated universal time (cannot fail)
 * - local: the system's local civil time (fatal if the offset is unknown)
 */
export type TimeZone = 'utc' | 'local';

/**
 * Which of {date, time, combined timestamp} to emit:
 * - date-only: BuildDate
 * - time-only: BuildTime
 * - date-and-time: BuildDate + BuildTime
 * - timestamp: BuildTimestamp
 * - all: all three
 */
export type TimestampKind = 'date-only' | 'time-only' | 'date-and-time' | 'timestamp' | 'all';

export const TIME_ZONES: readonly TimeZone[] = ['utc', 'local'];

export const TIMESTAMP_KINDS: readonly TimestampKind[] = [
  'date-only',
  'time-only',
  'date-and-time',
  'timestamp',
  'all'
];

// Constant names the instructions are exposed under inside the artifact
export const INSTRUCTION_CONSTANTS: Readonly<Record<InstructionKey, string>> = {
  BuildDate: 'BUILDSTAMP_BUILD_DATE',
  BuildTime: 'BUILDSTAMP_BUILD_TIME',
  BuildTimestamp: 'BUILDSTAMP_BUILD_TIMESTAMP',
  BuildSemver: 'BUILDSTAMP_BUILD_SEMVER'
};
