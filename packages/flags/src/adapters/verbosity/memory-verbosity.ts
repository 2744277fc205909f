import { BaseError } from "@logflags/errors"
import type { VerbosityFacility } from "../../ports/verbosity"

export type MemoryVerbosityOptions = {
  /** Highest level accepted; higher levels throw. */
  max?: number
}

export class MemoryVerbosity implements VerbosityFacility {
  readonly name = "memory"
  private readonly max: number
  private readonly levels: number[] = []

  constructor(options: MemoryVerbosityOptions = {}) {
    this.max = options.max ?? Number.POSITIVE_INFINITY
  }

  setVerbosity(level: number): void {
    if (level > this.max) {
      throw new BaseError(`verbosity ${level} exceeds ${this.max}`, {
        code: "invalid_verbosity",
        context: { level, max: this.max },
      })
    }

    this.levels.push(level)
  }

  get level(): number | undefined {
    return this.levels.at(-1)
  }

  /** Every accepted level, oldest first. */
  history(): number[] {
    return [...this.levels]
  }
}
