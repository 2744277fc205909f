import type { FlagValue } from "../../ports/flag-value"
import { parseBool } from "./parse-bool"

/**
 * Whether repetitive records are sampled. Reads `false` until set; the
 * factory decides what an unset cell means.
 */
export class SampleValue implements FlagValue {
  private current = false
  private touched = false

  get value(): boolean {
    return this.current
  }

  get isSet(): boolean {
    return this.touched
  }

  set(text: string): void {
    this.current = parseBool(text)
    this.touched = true
  }

  toString(): string {
    return String(this.current)
  }

  type(): string {
    return "sample"
  }

  isBoolFlag(): boolean {
    return true
  }
}
