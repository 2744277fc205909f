import type { LoggerSettings } from "./build-logger"
import { type LoggingFlagName, type LoggingFlags, resolveSettings } from "./logging-flags"

/**
 * Logging flags after the command line and flag sources were applied.
 */
export class LoadedLoggingFlags {
  constructor(
    readonly flags: LoggingFlags,
    readonly args: readonly string[],
    private readonly origins: ReadonlyMap<string, string>,
    private readonly unknown: readonly string[],
    private readonly sourceNames: readonly string[],
  ) {}

  get settings(): LoggerSettings {
    return resolveSettings(this.flags)
  }

  /**
   * Where a flag's value came from: "argv", a source name, or "default".
   */
  explain(flag: LoggingFlagName): string {
    return this.origins.get(flag) ?? "default"
  }

  /** Names of the sources that set at least one flag, in source order. */
  sourcesUsed(): string[] {
    const used = new Set(this.origins.values())

    return [...new Set(this.sourceNames)].filter((name) => used.has(name))
  }

  /** Source keys that name no logging flag. */
  unknownKeys(): string[] {
    return [...this.unknown]
  }
}
