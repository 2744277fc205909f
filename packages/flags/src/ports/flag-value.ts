/**
 * A settable, printable cell behind a single command-line flag.
 *
 * `set` validates its own text and throws on bad input, leaving the previous
 * state in place.
 */
export interface FlagValue {
  set(text: string): void

  /** Canonical text of the current state. Feeding it back to `set` is lossless. */
  toString(): string

  /** Short tag shown next to the flag in usage text. */
  type(): string

  /** Boolean-style flags may be given without a value. */
  isBoolFlag?(): boolean
}

export type Flag = {
  readonly name: string
  readonly usage: string
  readonly value: FlagValue

  /** `value.toString()` at registration time. */
  readonly defValue: string

  /** Whether the flag was set by parsing or `FlagSet.set`. */
  changed: boolean
}
