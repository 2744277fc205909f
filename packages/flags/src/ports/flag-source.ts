/**
 * A source of flag values other than the command line.
 *
 * Keys are flag names (`zap-level`), values are raw text, numbers or booleans.
 * Sources are applied in order; later sources override earlier ones, and the
 * command line overrides all of them.
 */
export interface FlagSource {
  /**
   * Human-readable name for provenance.
   * Example: "env", "dotenv:.env", "object:overrides"
   */
  readonly name: string

  /** Returning undefined for a key means "value not provided". */
  load(): Promise<Record<string, unknown>>
}
