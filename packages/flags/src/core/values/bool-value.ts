import type { FlagValue } from "../../ports/flag-value"
import { parseBool } from "./parse-bool"

export class BoolValue implements FlagValue {
  private current: boolean
  private touched = false

  constructor(initial = false) {
    this.current = initial
  }

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
    return "bool"
  }

  isBoolFlag(): boolean {
    return true
  }
}
