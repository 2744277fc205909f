import { BaseError } from "@logflags/errors"
import {
  buildEncoder,
  DEFAULT_SAMPLING,
  type EncoderKind,
  type Logger,
  type LoggerOptions,
  PinoLogger,
  type PinoLoggerDeps,
  type Severity,
  Severities,
  type TimeFormat,
} from "@logflags/logger"

/**
 * What the user asked for. Absent fields mean the flag was not given.
 */
export type LoggerSettings = {
  development: boolean
  encoder?: EncoderKind
  level?: Severity
  sample?: boolean
  timeFormat: TimeFormat
}

export type BuildLoggerDeps = Omit<PinoLoggerDeps, "base" | "sampler">

/**
 * Applies development-mode overrides and defaults.
 *
 * Development mode always means console output at debug level without
 * sampling, whatever else was given. Sampling is also off for levels more
 * verbose than debug.
 */
export function resolveLoggerOptions(settings: LoggerSettings): LoggerOptions {
  const kind: EncoderKind = settings.development ? "console" : (settings.encoder ?? "json")
  const level = settings.development ? Severities.Debug : (settings.level ?? Severities.Info)
  const sample =
    !settings.development && (settings.sample ?? true) && level >= Severities.Debug

  return {
    level,
    encoder: buildEncoder(kind, settings.timeFormat),
    ...(sample && { sampling: { ...DEFAULT_SAMPLING } }),
  }
}

export function buildLogger(settings: LoggerSettings, deps: BuildLoggerDeps = {}): Logger {
  const opts = resolveLoggerOptions(settings)

  try {
    return new PinoLogger(deps, opts)
  } catch (cause) {
    throw new BaseError("failed to construct logger", {
      code: "logger_construction_failed",
      context: { encoder: opts.encoder.kind, level: opts.level },
      isOperational: false,
      cause,
    })
  }
}
