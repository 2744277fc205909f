import { MAX_VERBOSITY, type Severity, Severities, severityLevelName } from "@logflags/logger"
import { InvalidValueError } from "../errors"

export type ResolvedLevel = {
  severity: Severity

  /**
   * Verbosity the secondary facility must be raised to. Present only for
   * custom levels past the escalation threshold.
   */
  verbosity?: number
}

/** Severities strictly below this also raise the secondary facility. */
export const ESCALATION_THRESHOLD: Severity = -3

const NAMED_LEVELS: ReadonlyMap<string, Severity> = new Map([
  ["debug", Severities.Debug],
  ["info", Severities.Info],
  ["error", Severities.Error],
])

const INTEGER = /^[+-]?\d+$/

/**
 * Parses `debug`, `info`, `error` (any case) or a positive integer `n`,
 * which stands for severity `-n`.
 */
export function resolveLevel(text: string): ResolvedLevel {
  const lower = text.toLowerCase()
  const named = NAMED_LEVELS.get(lower)

  if (named !== undefined) return { severity: named }

  const n = INTEGER.test(lower) ? Number(lower) : Number.NaN

  if (!Number.isSafeInteger(n) || n <= 0) {
    throw new InvalidValueError(`invalid log level "${text}"`, { context: { value: text } })
  }

  if (n > MAX_VERBOSITY) {
    throw new InvalidValueError(
      `invalid log level "${text}": verbosity above ${MAX_VERBOSITY}`,
      { context: { value: text, max: MAX_VERBOSITY } },
    )
  }

  const severity = -n

  return severity < ESCALATION_THRESHOLD ? { severity, verbosity: n } : { severity }
}

/**
 * Canonical text of a severity: the level name for named levels, the
 * verbosity for custom ones.
 */
export function levelToString(severity: Severity): string {
  for (const [name, value] of NAMED_LEVELS) {
    if (value === severity) return name
  }

  return severity < 0 ? String(-severity) : severityLevelName(severity)
}
