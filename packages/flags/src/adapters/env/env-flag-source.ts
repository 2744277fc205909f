import type { FlagSource } from "../../ports/flag-source"

export type EnvFlagSourceOptions = {
  /** @default "ZAP_" */
  prefix?: string
  env?: Record<string, string | undefined>
}

/**
 * `ZAP_TIMEFORMAT` -> `zap-timeformat`.
 */
export function envKeyToFlagName(key: string): string {
  return key.toLowerCase().replaceAll("_", "-")
}

/**
 * Keeps the entries whose key starts with `prefix` and renames them to flag
 * names.
 */
export function pickFlagEntries(
  entries: Record<string, string | undefined>,
  prefix: string,
): Record<string, string> {
  const picked: Record<string, string> = {}

  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined && key.startsWith(prefix)) {
      picked[envKeyToFlagName(key)] = value
    }
  }

  return picked
}

export class EnvFlagSource implements FlagSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvFlagSourceOptions = {}) {
    this.prefix = options.prefix ?? "ZAP_"
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    return pickFlagEntries(this.env, this.prefix)
  }
}
