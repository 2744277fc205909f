import { z } from "zod"
import { EnvFlagSource } from "../adapters/env/env-flag-source"
import type { FlagSource } from "../ports/flag-source"
import { FlagError } from "./errors"
import { type ErrorHandling, FlagSet } from "./flag-set"
import { LoadedLoggingFlags } from "./loaded-flags"
import { type LoggingFlagsDeps, registerLoggingFlags } from "./logging-flags"

const sourceValuesSchema = z.record(
  z.string(),
  z.union([z.string(), z.number(), z.boolean()]).transform(String),
)

export type LoadLoggingFlagsOptions = LoggingFlagsDeps & {
  /** @default process.argv.slice(2) */
  argv?: readonly string[]

  /** @default [new EnvFlagSource()] */
  sources?: FlagSource[]

  /** @default "exit" */
  errorHandling?: ErrorHandling
}

/**
 * Parses the command line, then fills every logging flag it left untouched
 * from the merged sources. In exit mode, a source value that fails
 * validation exits the process like a bad command-line value.
 */
export async function loadLoggingFlags(
  options: LoadLoggingFlagsOptions = {},
): Promise<LoadedLoggingFlags> {
  const merged: Record<string, unknown> = {}
  const provenance = new Map<string, string>()

  const sources = options.sources ?? [new EnvFlagSource()]

  for (const source of sources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance.set(key, source.name)
      }
    }
  }

  const flagSet: FlagSet = new FlagSet("zap", options.errorHandling ?? "exit", options)
  const flags = registerLoggingFlags(flagSet, options)
  const args = flagSet.parse(options.argv ?? process.argv.slice(2))

  const result = sourceValuesSchema.safeParse(merged)

  if (!result.success) {
    flagSet.report(
      new FlagError(
        `Flag source validation failed:\n${z.prettifyError(result.error)}`,
        "invalid_source",
        { context: { sources: [...new Set(provenance.values())] } },
      ),
    )
  }

  const origins = new Map<string, string>()
  const unknown: string[] = []

  flagSet.visit((flag) => origins.set(flag.name, "argv"))

  try {
    for (const [key, text] of Object.entries(result.data)) {
      const flag = flagSet.lookup(key)

      if (!flag) {
        unknown.push(key)
        continue
      }

      if (flag.changed) continue

      flagSet.set(key, text)
      origins.set(key, provenance.get(key) ?? "default")
    }
  } catch (err) {
    flagSet.report(err)
  }

  return new LoadedLoggingFlags(
    flags,
    args,
    origins,
    unknown,
    sources.map((source) => source.name),
  )
}
