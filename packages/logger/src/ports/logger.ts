import type { LogContext, LogContextPatch, LogMeta } from "./log-context"

export interface Logger<TContext extends LogContext = LogContext> {
  trace(message: string, meta?: LogMeta<TContext>): void
  debug(message: string, meta?: LogMeta<TContext>): void
  info(message: string, meta?: LogMeta<TContext>): void
  warn(message: string, meta?: LogMeta<TContext>): void
  error(message: string, meta?: LogMeta<TContext>): void
  fatal(message: string, meta?: LogMeta<TContext>): void

  /**
   * Emits at severity `-level`. Level 1 is debug, 2 is trace, and higher
   * levels are only written when the logger was configured with at least
   * that verbosity.
   */
  verbose(level: number, message: string, meta?: LogMeta<TContext>): void

  /**
   * Creates a child logger that inherits the parent context, sink, level and
   * sampling state, and adds `context` to every record it writes.
   */
  child<U extends LogContextPatch>(context: U): Logger<TContext & U>
}
