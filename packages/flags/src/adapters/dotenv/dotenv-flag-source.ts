import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import type { FlagSource } from "../../ports/flag-source"
import { pickFlagEntries } from "../env/env-flag-source"

export type DotenvFlagSourceOptions = {
  /**
   * Path to the .env file, absolute or relative to `cwd`.
   *
   * @example ".env", ".env.local"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: Throws if file not found.
   * - `false`: Loads nothing if file not found.
   */
  required: boolean

  /** @default process.cwd() */
  cwd?: string

  /** @default "ZAP_" */
  prefix?: string
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

export class DotenvFlagSource implements FlagSource {
  readonly name: string

  constructor(private readonly opts: DotenvFlagSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)

    try {
      const content = await fs.readFile(filePath, "utf-8")

      return pickFlagEntries(parse(content), this.opts.prefix ?? "ZAP_")
    } catch (err) {
      if (!this.opts.required && isNotFound(err)) return {}

      throw err
    }
  }
}
