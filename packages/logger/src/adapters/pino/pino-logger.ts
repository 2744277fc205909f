import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { productionEncoderConfig } from "../../core/encoder/build-encoder"
import { severityLevelName, verbositySeverity } from "../../core/levels"
import { Sampler } from "../../core/sampling/sampler"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import { type Severity, Severities } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"
import { createPrettyStream } from "./pretty-stream"
import { serializeLogError } from "./serializers"

export type PinoLoggerDeps = {
  /**
   * Base pino logger to create children from (inherits config and sink).
   * When provided, this adapter only adds `context` via `.child(...)`.
   */
  base?: PinoLoggerBase

  /**
   * Where records go.
   * @default stderr
   */
  destination?: DestinationStream

  /**
   * Wall clock in epoch milliseconds, used for timestamps and sampling windows.
   * @default Date.now
   */
  now?: () => number

  /**
   * Shared sampling state. Children reuse their parent's sampler.
   */
  sampler?: Sampler
}

export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  protected readonly logger: PinoLoggerBase
  protected readonly opts: LoggerOptions
  protected readonly deps: Readonly<PinoLoggerDeps>

  constructor(
    deps: PinoLoggerDeps = {},
    opts: Partial<LoggerOptions> = {},
    context: LogContextPatch = {},
  ) {
    this.opts = {
      level: opts.level ?? Severities.Info,
      encoder: opts.encoder ?? productionEncoderConfig(),
      ...(opts.sampling && { sampling: opts.sampling }),
    }

    const sampler =
      deps.sampler ??
      (this.opts.sampling ? new Sampler(this.opts.sampling, deps.now) : undefined)

    this.deps = { ...deps, ...(sampler && { sampler }) }
    this.logger = this.init(context)
  }

  private init(context: LogContextPatch): PinoLoggerBase {
    if (this.deps.base) return this.deps.base.child(context)

    const { encoder } = this.opts
    const now = this.deps.now ?? Date.now

    const pinoOpts: PinoOptions = {
      level: severityLevelName(this.opts.level),
      messageKey: encoder.messageKey,
      timestamp: () => `,"${encoder.timeKey}":${JSON.stringify(encoder.encodeTime(now()))}`,
      serializers: { err: serializeLogError },
      ...(encoder.kind === "json" && {
        formatters: {
          level(label: string) {
            return { level: label }
          },
        },
      }),
    }

    const destination = this.deps.destination ?? pino.destination({ fd: 2, sync: true })
    const stream =
      encoder.kind === "console" ? createPrettyStream(encoder, destination) : destination

    return pino(pinoOpts, stream).child(context)
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.write(Severities.Trace, message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.write(Severities.Debug, message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.write(Severities.Info, message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.write(Severities.Warn, message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.write(Severities.Error, message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.write(Severities.Fatal, message, meta)
  }

  verbose(level: number, message: string, meta?: LogMeta<TContext>): void {
    const severity = verbositySeverity(level)

    // pino stops at trace; deeper levels are written as trace and tagged with v
    if (severity < Severities.Trace) {
      this.write(severity, message, { ...meta, v: -severity })
      return
    }

    this.write(severity, message, meta)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>(
      { ...this.deps, base: this.logger },
      this.opts,
      context,
    )
  }

  private write(severity: Severity, message: string, meta?: Record<string, unknown>) {
    if (severity < this.opts.level) return
    if (this.deps.sampler && !this.deps.sampler.check(severity, message)) return

    this.logger[severityLevelName(severity)](meta ?? {}, message)
  }
}

export function createPinoLogger<TContext extends LogContext = LogContext>(
  deps: PinoLoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
  context: LogContextPatch = {},
): Logger<TContext> {
  return new PinoLogger<TContext>(deps, opts, context)
}
