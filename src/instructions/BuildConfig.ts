// BuildConfig: settings for the BUILDSTAMP_BUILD_* instructions
import { z } from 'zod';

import type { TimeZone, TimestampKind } from './types.js';

const BuildSettingsSchema = z.object({
  // Master switch for the build category
  enabled: z.boolean().default(true),
  // BuildDate / BuildTime / BuildTimestamp
  timestamp: z.boolean().default(true),
  timezone: z.enum(['utc', 'local']).default('utc'),
  kind: z.enum(['date-only', 'time-only', 'date-and-time', 'timestamp', 'all']).default('timestamp'),
  // BuildSemver
  semver: z.boolean().default(true),
});

export type BuildSettings = z.infer<typeof BuildSettingsSchema>;

/**
 * Configuration for the build instructions.
 *
 * | Instruction | Default |
 * | ----------- | :-----: |
 * | `BUILDSTAMP_BUILD_DATE=2021-02-12` | |
 * | `BUILDSTAMP_BUILD_TIME=11-22-34` | |
 * | `BUILDSTAMP_BUILD_TIMESTAMP=2021-02-12T01:54:15.134000Z` | * |
 * | `BUILDSTAMP_BUILD_SEMVER=4.2.0` | * |
 *
 * Fields may be changed freely before generation. The generator works on
 * {@link BuildConfig.snapshot}, so later changes never affect a running pass.
 *
 * @example
 * const instructions = new Instructions();
 * instructions.build.kind = 'all';
 * instructions.build.timezone = 'local';
 * const map = generateInstructions(instructions);
 */
export class BuildConfig implements BuildSettings {
  enabled: boolean;
  timestamp: boolean;
  timezone: TimeZone;
  kind: TimestampKind;
  semver: boolean;

  constructor(overrides: Partial<BuildSettings> = {}) {
    const settings = BuildSettingsSchema.parse(overrides);
    this.enabled = settings.enabled;
    this.timestamp = settings.timestamp;
    this.timezone = settings.timezone;
    this.kind = settings.kind;
    this.semver = settings.semver;
  }

  /**
   * Effective enabled state: the master switch plus at least one sub-feature.
   */
  hasEnabled(): boolean {
    return this.enabled && (this.timestamp || this.semver);
  }

  snapshot(): Readonly<BuildConfig> {
    const copy = new BuildConfig(this.toSettings());
    return Object.freeze(copy);
  }

  toSettings(): BuildSettings {
    return {
      enabled: this.enabled,
      timestamp: this.timestamp,
      timezone: this.timezone,
      kind: this.kind,
      semver: this.semver,
    };
  }
}
