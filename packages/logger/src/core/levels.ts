import {
  LEVEL_SEVERITY,
  type LogLevelName,
  logLevelNames,
  MAX_VERBOSITY,
  type Severity,
  Severities,
} from "../ports/log-level"

/**
 * Clamps a severity into the supported range [-MAX_VERBOSITY, Fatal].
 */
export function clampSeverity(severity: Severity): Severity {
  return Math.min(Severities.Fatal, Math.max(-MAX_VERBOSITY, Math.trunc(severity)))
}

/**
 * Nearest named level at or above `severity`. Everything more verbose than
 * trace is reported as trace.
 */
export function severityLevelName(severity: Severity): LogLevelName {
  const clamped = clampSeverity(severity)

  return logLevelNames.find((name) => LEVEL_SEVERITY[name] >= clamped) ?? "fatal"
}

/**
 * Severity of a verbosity level, clamped to 1..MAX_VERBOSITY.
 */
export function verbositySeverity(level: number): Severity {
  if (!Number.isFinite(level)) return Severities.Debug

  return clampSeverity(-Math.max(1, Math.trunc(level)))
}
