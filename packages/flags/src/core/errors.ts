import { BaseError, type ErrorContext } from "@logflags/errors"

type FlagErrorOptions = {
  context?: ErrorContext
  cause?: unknown
}

/**
 * A flag value that does not match its grammar.
 */
export class InvalidValueError extends BaseError<"invalid_value"> {
  constructor(message: string, options: FlagErrorOptions = {}) {
    super(message, { code: "invalid_value", ...options })
  }
}

export type FlagErrorCode =
  | "unknown_flag"
  | "missing_value"
  | "bad_syntax"
  | "duplicate_flag"
  | "help_requested"
  | "invalid_source"

/**
 * Command-line or flag-source failures that are not about a single value.
 */
export class FlagError extends BaseError<FlagErrorCode> {
  constructor(message: string, code: FlagErrorCode, options: FlagErrorOptions = {}) {
    super(message, { code, ...options })
  }
}
