import type { FlagSource } from "../../ports/flag-source"

/**
 * Fixed values keyed by flag name, e.g. `{ "zap-level": 4 }`.
 */
export class ObjectFlagSource implements FlagSource {
  readonly name = "object:overrides"

  constructor(private readonly obj: Record<string, unknown>) {}

  async load(): Promise<Record<string, unknown>> {
    return { ...this.obj }
  }
}
