export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Signed severity. Lower values are more verbose, higher values more severe.
 * A custom verbosity `n` sits at severity `-n`.
 */
export type Severity = number

export const Severities = {
  /** Finest-grained diagnostics, same as verbosity 2. */
  Trace: -2,
  /** Development and investigation detail, same as verbosity 1. */
  Debug: -1,
  Info: 0,
  Warn: 1,
  Error: 2,
  /** The process may be unable to continue. */
  Fatal: 3,
} as const satisfies Record<string, Severity>

export const LEVEL_SEVERITY: Record<LogLevelName, Severity> = {
  trace: Severities.Trace,
  debug: Severities.Debug,
  info: Severities.Info,
  warn: Severities.Warn,
  error: Severities.Error,
  fatal: Severities.Fatal,
}

/** Highest accepted custom verbosity, i.e. the most verbose severity is -128. */
export const MAX_VERBOSITY = 128
