export const encoderKinds = ["json", "console"] as const

export type EncoderKind = (typeof encoderKinds)[number]

export const timeFormats = ["unix", "iso8601"] as const

export type TimeFormat = (typeof timeFormats)[number]

/**
 * Turns a wall-clock reading (epoch milliseconds) into the value written
 * under the time key. Numbers are written bare, strings are quoted.
 */
export type TimeEncoder = (epochMs: number) => number | string

/**
 * Field layout and rendering of log records.
 */
export type EncoderConfig = {
  kind: EncoderKind
  messageKey: string
  timeKey: string
  encodeTime: TimeEncoder

  /** Colour level names. Only honoured by the console encoder. */
  colorize: boolean

  /** Fields left out of console output. */
  ignore: readonly string[]
}
