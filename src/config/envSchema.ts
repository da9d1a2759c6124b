import { z } from 'zod';

import { EMIT_FORMATS, type EmitFormat } from '../emit/InstructionWriter.js';
import type { BuildSettings } from '../instructions/BuildConfig.js';
import { DEFAULT_SEMVER_VAR } from '../instructions/BuildInstructions.js';
import { TIME_ZONES, TIMESTAMP_KINDS } from '../instructions/types.js';
import { resolveLogLevel, type LogLevel } from '../utils/logger.js';

import { getEnvString, parseBoolEnv, parseEnumEnv } from './parseEnv.js';

export const rawEnvSchema = z.object({
  // Build category overrides (unset keeps the default)
  BUILDSTAMP_BUILD_ENABLED: z.string().optional(),
  BUILDSTAMP_BUILD_TIMESTAMP: z.string().optional(),
  BUILDSTAMP_BUILD_TIMEZONE: z.string().optional(),
  BUILDSTAMP_BUILD_KIND: z.string().optional(),
  BUILDSTAMP_BUILD_SEMVER: z.string().optional(),

  // Variable holding the package version
  BUILDSTAMP_SEMVER_VAR: z.string().optional(),

  // Output
  BUILDSTAMP_FORMAT: z.string().optional(),
  LOG_LEVEL: z.string().optional(),
});

export interface EnvConfig {
  build: Partial<BuildSettings>;
  format: EmitFormat;
  semverVar: string;
  logLevel: LogLevel;
}

/**
 * Read caller overrides from the environment.
 * Invalid values fall back to their defaults.
 */
export function loadEnvConfig(source: Record<string, string | undefined> = process.env): EnvConfig {
  const parsed = rawEnvSchema.parse(source);

  const build: Partial<BuildSettings> = {};
  const enabled = parseBoolEnv(parsed.BUILDSTAMP_BUILD_ENABLED);
  if (enabled !== undefined) build.enabled = enabled;
  const timestamp = parseBoolEnv(parsed.BUILDSTAMP_BUILD_TIMESTAMP);
  if (timestamp !== undefined) build.timestamp = timestamp;
  const timezone = parseEnumEnv(parsed.BUILDSTAMP_BUILD_TIMEZONE, TIME_ZONES);
  if (timezone !== undefined) build.timezone = timezone;
  const kind = parseEnumEnv(parsed.BUILDSTAMP_BUILD_KIND, TIMESTAMP_KINDS);
  if (kind !== undefined) build.kind = kind;
  const semver = parseBoolEnv(parsed.BUILDSTAMP_BUILD_SEMVER);
  if (semver !== undefined) build.semver = semver;

  return {
    build,
    format: parseEnumEnv(parsed.BUILDSTAMP_FORMAT, EMIT_FORMATS, 'directive'),
    semverVar: getEnvString(parsed.BUILDSTAMP_SEMVER_VAR, DEFAULT_SEMVER_VAR) ?? DEFAULT_SEMVER_VAR,
    logLevel: resolveLogLevel(parsed.LOG_LEVEL),
  };
}
