import { type TimeFormat, timeFormats } from "@logflags/logger"
import type { FlagValue } from "../../ports/flag-value"
import { InvalidValueError } from "../errors"

function isTimeFormat(text: string): text is TimeFormat {
  return timeFormats.some((format) => format === text)
}

/**
 * Timestamp rendering. Text of one byte or less in UTF-8 (the flag given
 * with an empty value) means `unix`.
 */
export class TimeFormatValue implements FlagValue {
  private format: TimeFormat | undefined

  /** Chosen format, `unix` when the flag was never given. */
  get value(): TimeFormat {
    return this.format ?? "unix"
  }

  get isSet(): boolean {
    return this.format !== undefined
  }

  set(text: string): void {
    if (Buffer.byteLength(text, "utf8") <= 1) {
      this.format = "unix"
      return
    }

    if (!isTimeFormat(text)) {
      throw new InvalidValueError(`unknown timeformat "${text}"`, { context: { value: text } })
    }

    this.format = text
  }

  toString(): string {
    return this.format ?? ""
  }

  type(): string {
    return "string"
  }

  isBoolFlag(): boolean {
    return false
  }
}
