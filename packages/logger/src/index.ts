export type { EncoderConfig, EncoderKind, TimeEncoder, TimeFormat } from "./ports/encoder"
export { encoderKinds, timeFormats } from "./ports/encoder"
export type { LogContext, LogContextPatch, LogEvent, LogMeta } from "./ports/log-context"
export type { LogLevelName, Severity } from "./ports/log-level"
export { LEVEL_SEVERITY, logLevelNames, MAX_VERBOSITY, Severities } from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions, SamplingOptions } from "./ports/logger-options"

export {
  buildEncoder,
  developmentEncoderConfig,
  productionEncoderConfig,
} from "./core/encoder/build-encoder"
export { epochTimeEncoder, iso8601TimeEncoder } from "./core/encoder/time-encoders"
export { clampSeverity, severityLevelName, verbositySeverity } from "./core/levels"
export { DEFAULT_SAMPLING, Sampler } from "./core/sampling/sampler"

export { createPinoLogger, PinoLogger, type PinoLoggerDeps } from "./adapters/pino/pino-logger"
