export type ErrorCode = Lowercase<string>

/**
 * Structured data carried by an error (flag name, offending input, source).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /**
   * `true` for expected failures caused by input (a malformed flag value),
   * `false` for broken invariants or a failing dependency.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape, used when errors are written into log records.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>

  /** Only set for errors that record when they were raised. */
  timestamp?: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
