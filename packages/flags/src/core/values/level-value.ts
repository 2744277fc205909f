import { type Severity, Severities } from "@logflags/logger"
import type { FlagValue } from "../../ports/flag-value"
import type { VerbosityFacility } from "../../ports/verbosity"
import { InvalidValueError } from "../errors"
import { levelToString, type ResolvedLevel, resolveLevel } from "../level/resolve-level"

/**
 * Minimum severity. Custom levels past the escalation threshold also raise
 * the secondary facility's verbosity before the cell takes the new level.
 */
export class LevelValue implements FlagValue {
  private resolved: ResolvedLevel | undefined

  constructor(private readonly facility: VerbosityFacility) {}

  /** Last accepted level, or undefined when the flag was never given. */
  get value(): ResolvedLevel | undefined {
    return this.resolved
  }

  get severity(): Severity {
    return this.resolved?.severity ?? Severities.Info
  }

  get isSet(): boolean {
    return this.resolved !== undefined
  }

  set(text: string): void {
    const resolved = resolveLevel(text)

    if (resolved.verbosity !== undefined) {
      try {
        this.facility.setVerbosity(resolved.verbosity)
      } catch (cause) {
        throw new InvalidValueError(
          `cannot set ${this.facility.name} verbosity to ${resolved.verbosity}`,
          { context: { value: text, verbosity: resolved.verbosity }, cause },
        )
      }
    }

    this.resolved = resolved
  }

  toString(): string {
    return levelToString(this.severity)
  }

  type(): string {
    return "level"
  }
}
