// BuildInstructions: turns the build configuration plus one clock sample
// into BuildDate / BuildTime / BuildTimestamp / BuildSemver entries

import type { Logger } from 'winston';

import { logger as defaultLogger } from '../utils/logger.js';

import type { BuildConfig } from './BuildConfig.js';
import { captureSnapshot, systemClock, type Clock, type TimestampSnapshot } from './clock.js';
import { formatDate, formatTime, formatTimestamp } from './formatters.js';
import { addEntry, type OutputMap } from './OutputMap.js';
import type { InstructionKey, TimestampKind } from './types.js';

// Variable npm sets to the running package's version
export const DEFAULT_SEMVER_VAR = 'npm_package_version';

export interface GeneratorDeps {
  clock?: Clock;
  env?: Record<string, string | undefined>;
  /** Environment variable holding the package version */
  semverVar?: string;
  logger?: Logger;
}

interface DateTimeProducer {
  key: InstructionKey;
  format: (snapshot: TimestampSnapshot) => string | undefined;
}

const DATE: DateTimeProducer = { key: 'BuildDate', format: formatDate };
const TIME: DateTimeProducer = { key: 'BuildTime', format: formatTime };
const TIMESTAMP: DateTimeProducer = { key: 'BuildTimestamp', format: formatTimestamp };

const PRODUCERS_BY_KIND: Readonly<Record<TimestampKind, readonly DateTimeProducer[]>> = {
  'date-only': [DATE],
  'time-only': [TIME],
  'date-and-time': [DATE, TIME],
  'timestamp': [TIMESTAMP],
  'all': [DATE, TIME, TIMESTAMP],
};

/**
 * Keys a granularity emits, in insertion order.
 */
export function keysForKind(kind: TimestampKind): InstructionKey[] {
  return PRODUCERS_BY_KIND[kind].map(p => p.key);
}

/**
 * Add the date/time entries for one snapshot.
 * A field that fails to format is omitted; the others are still added.
 */
export function addDateTimeEntries(
  map: OutputMap,
  kind: TimestampKind,
  snapshot: TimestampSnapshot,
  logger: Logger = defaultLogger
): void {
  for (const producer of PRODUCERS_BY_KIND[kind]) {
    const value = producer.format(snapshot);
    if (value === undefined) {
      logger.debug('[build] omitting date/time instruction: snapshot could not be formatted', {
        key: producer.key,
        instant: snapshot.instant.getTime(),
        offsetMinutes: snapshot.offsetMinutes
      });
    }
    addEntry(map, producer.key, value);
  }
}

/**
 * Read the package version, unchanged. Blank or missing yields undefined.
 */
export function readSemver(
  env: Record<string, string | undefined>,
  semverVar: string = DEFAULT_SEMVER_VAR
): string | undefined {
  const value = env[semverVar];
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value;
}

/**
 * Populate `map` with the build instructions.
 * Must run at most once per map.
 * @throws LocalTimeUnavailableError when local time is requested and cannot be resolved
 */
export function configureBuild(config: BuildConfig, map: OutputMap, deps: GeneratorDeps = {}): void {
  const settings = config.snapshot();
  const log = deps.logger ?? defaultLogger;

  if (!settings.hasEnabled()) {
    log.debug('[build] build instructions disabled');
    return;
  }

  if (settings.timestamp) {
    // Sampled before any insertion: a fatal clock error leaves the map untouched
    const snapshot = captureSnapshot(settings.timezone, deps.clock ?? systemClock);
    addDateTimeEntries(map, settings.kind, snapshot, log);
  }

  if (settings.semver) {
    const semverVar = deps.semverVar ?? DEFAULT_SEMVER_VAR;
    const version = readSemver(deps.env ?? process.env, semverVar);
    if (version === undefined) {
      log.debug(`[build] omitting BuildSemver: ${semverVar} is not set`);
    }
    addEntry(map, 'BuildSemver', version);
  }
}
