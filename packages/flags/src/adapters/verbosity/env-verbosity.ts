import { BaseError } from "@logflags/errors"
import type { VerbosityFacility } from "../../ports/verbosity"

export type EnvVerbosityOptions = {
  /** @default "LOG_VERBOSITY" */
  variable?: string
  env?: Record<string, string | undefined>
}

/**
 * Publishes the verbosity through an environment variable, where child
 * processes and libraries that read it at startup pick it up.
 */
export class EnvVerbosity implements VerbosityFacility {
  readonly name: string
  private readonly variable: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvVerbosityOptions = {}) {
    this.variable = options.variable ?? "LOG_VERBOSITY"
    this.env = options.env ?? process.env
    this.name = `env:${this.variable}`
  }

  setVerbosity(level: number): void {
    if (!Number.isSafeInteger(level) || level < 0) {
      throw new BaseError(`verbosity must be a non-negative integer, got ${level}`, {
        code: "invalid_verbosity",
        context: { variable: this.variable, level },
      })
    }

    this.env[this.variable] = String(level)
  }

  current(): number | undefined {
    const raw = this.env[this.variable]

    return raw === undefined ? undefined : Number(raw)
  }
}
