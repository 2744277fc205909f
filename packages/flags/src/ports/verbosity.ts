/**
 * A secondary logging facility whose verbosity is kept in step with high
 * custom log levels.
 */
export interface VerbosityFacility {
  readonly name: string

  /** Throws when the facility cannot take the level. */
  setVerbosity(level: number): void
}
