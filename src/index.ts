export { BuildConfig, type BuildSettings } from './instructions/BuildConfig.js';
export {
  configureBuild,
  addDateTimeEntries,
  keysForKind,
  readSemver,
  DEFAULT_SEMVER_VAR,
  type GeneratorDeps
} from './instructions/BuildInstructions.js';
export {
  captureSnapshot,
  frozenSnapshot,
  systemClock,
  type Clock,
  type TimestampSnapshot
} from './instructions/clock.js';
export { BuildstampError, DuplicateInstructionError, LocalTimeUnavailableError, type BuildstampErrorCode } from './instructions/errors.js';
export { formatDate, formatTime, formatTimestamp } from './instructions/formatters.js';
export { Instructions, generateInstructions, type InstructionsSettings } from './instructions/generate.js';
export { addEntry, createOutputMap, type OutputMap } from './instructions/OutputMap.js';
export {
  INSTRUCTION_CONSTANTS,
  TIME_ZONES,
  TIMESTAMP_KINDS,
  type InstructionKey,
  type TimeZone,
  type TimestampKind
} from './instructions/types.js';
export {
  renderInstructions,
  writeInstructions,
  DIRECTIVE_PREFIX,
  EMIT_FORMATS,
  type EmitFormat,
  type InstructionSink
} from './emit/InstructionWriter.js';
export { loadEnvConfig, type EnvConfig } from './config/envSchema.js';
export { runCli, type CliDeps } from './cli/runCli.js';
