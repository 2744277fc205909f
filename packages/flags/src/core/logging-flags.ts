import type { VerbosityFacility } from "../ports/verbosity"
import { EnvVerbosity } from "../adapters/verbosity/env-verbosity"
import type { LoggerSettings } from "./build-logger"
import { FlagSet, type FlagSetDeps } from "./flag-set"
import type { BoolValue } from "./values/bool-value"
import { EncoderValue } from "./values/encoder-value"
import { LevelValue } from "./values/level-value"
import { SampleValue } from "./values/sample-value"
import { TimeFormatValue } from "./values/time-format-value"

export const LOGGING_FLAG_NAMES = {
  development: "zap-devel",
  encoder: "zap-encoder",
  level: "zap-level",
  sample: "zap-sample",
  timeFormat: "zap-timeformat",
} as const

export type LoggingFlagName = (typeof LOGGING_FLAG_NAMES)[keyof typeof LOGGING_FLAG_NAMES]

/**
 * The logging flag cells and the set they are registered in.
 */
export type LoggingFlags = {
  flags: FlagSet
  development: BoolValue
  encoder: EncoderValue
  level: LevelValue
  sample: SampleValue
  timeFormat: TimeFormatValue
}

export type LoggingFlagsDeps = FlagSetDeps & {
  /**
   * Facility raised for custom levels above 3.
   * @default EnvVerbosity
   */
  verbosity?: VerbosityFacility
}

export function registerLoggingFlags(
  flags: FlagSet,
  deps: Pick<LoggingFlagsDeps, "verbosity"> = {},
): LoggingFlags {
  const encoder = new EncoderValue()
  const level = new LevelValue(deps.verbosity ?? new EnvVerbosity())
  const sample = new SampleValue()
  const timeFormat = new TimeFormatValue()

  const development = flags.bool(
    LOGGING_FLAG_NAMES.development,
    false,
    "Enable development mode (changes defaults to console encoder, debug log level, and disables sampling)",
  )
  flags.var(encoder, LOGGING_FLAG_NAMES.encoder, "Log encoding ('json' or 'console')")
  flags.var(
    level,
    LOGGING_FLAG_NAMES.level,
    "Log level (one of 'debug', 'info', 'error' or any integer value > 0)",
  )
  flags.var(
    sample,
    LOGGING_FLAG_NAMES.sample,
    "Enable log sampling. Sampling will be disabled for integer log levels > 1",
  )
  flags.var(
    timeFormat,
    LOGGING_FLAG_NAMES.timeFormat,
    "Use 'unix' or 'iso8601' time formatting. 'unix' is the default.",
  )

  return { flags, development, encoder, level, sample, timeFormat }
}

/**
 * The `zap` flag set. Parse failures print usage and exit the process.
 */
export function loggingFlagSet(deps: LoggingFlagsDeps = {}): LoggingFlags {
  return registerLoggingFlags(new FlagSet("zap", "exit", deps), deps)
}

export function resolveSettings(flags: LoggingFlags): LoggerSettings {
  const level = flags.level.value

  return {
    development: flags.development.value,
    ...(flags.encoder.value !== undefined && { encoder: flags.encoder.value }),
    ...(level !== undefined && { level: level.severity }),
    ...(flags.sample.isSet && { sample: flags.sample.value }),
    timeFormat: flags.timeFormat.value,
  }
}

export type ParsedLoggingFlags = {
  settings: LoggerSettings
  args: string[]
  flags: LoggingFlags
}

export function parseLoggingFlags(
  argv: readonly string[],
  deps: LoggingFlagsDeps = {},
): ParsedLoggingFlags {
  const flags = loggingFlagSet(deps)
  const args = flags.flags.parse(argv)

  return { settings: resolveSettings(flags), args, flags }
}
