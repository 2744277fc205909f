export type { Flag, FlagValue } from "./ports/flag-value"
export type { FlagSource } from "./ports/flag-source"
export type { VerbosityFacility } from "./ports/verbosity"

export { FlagError, type FlagErrorCode, InvalidValueError } from "./core/errors"
export { type ErrorHandling, FlagSet, type FlagSetDeps } from "./core/flag-set"
export {
  ESCALATION_THRESHOLD,
  levelToString,
  type ResolvedLevel,
  resolveLevel,
} from "./core/level/resolve-level"
export { BoolValue } from "./core/values/bool-value"
export { EncoderValue } from "./core/values/encoder-value"
export { LevelValue } from "./core/values/level-value"
export { parseBool } from "./core/values/parse-bool"
export { SampleValue } from "./core/values/sample-value"
export { TimeFormatValue } from "./core/values/time-format-value"
export {
  LOGGING_FLAG_NAMES,
  type LoggingFlagName,
  type LoggingFlags,
  type LoggingFlagsDeps,
  loggingFlagSet,
  type ParsedLoggingFlags,
  parseLoggingFlags,
  registerLoggingFlags,
  resolveSettings,
} from "./core/logging-flags"
export {
  type BuildLoggerDeps,
  buildLogger,
  type LoggerSettings,
  resolveLoggerOptions,
} from "./core/build-logger"
export { type LoadLoggingFlagsOptions, loadLoggingFlags } from "./core/load-flags"
export { LoadedLoggingFlags } from "./core/loaded-flags"

export { DotenvFlagSource, type DotenvFlagSourceOptions } from "./adapters/dotenv/dotenv-flag-source"
export {
  EnvFlagSource,
  type EnvFlagSourceOptions,
  envKeyToFlagName,
} from "./adapters/env/env-flag-source"
export { ObjectFlagSource } from "./adapters/object/object-flag-source"
export { EnvVerbosity, type EnvVerbosityOptions } from "./adapters/verbosity/env-verbosity"
export {
  MemoryVerbosity,
  type MemoryVerbosityOptions,
} from "./adapters/verbosity/memory-verbosity"
