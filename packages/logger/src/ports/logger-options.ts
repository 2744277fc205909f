import type { EncoderConfig } from "./encoder"
import type { Severity } from "./log-level"

/**
 * Drops repeated records: per severity and message, the first `initial`
 * records of every `tickMs` window are kept, then every `thereafter`-th.
 */
export type SamplingOptions = {
  tickMs: number
  initial: number
  thereafter: number
}

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*: which severities are emitted, how records
 * are rendered and whether repeated records are sampled. Adapters decide how
 * to honour them.
 */
export type LoggerOptions = {
  /**
   * Minimum severity to emit. Records below it are ignored.
   */
  level: Severity

  encoder: EncoderConfig

  /** Sampling is off when absent. */
  sampling?: SamplingOptions
}
