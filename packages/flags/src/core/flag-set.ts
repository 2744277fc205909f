import type { Flag, FlagValue } from "../ports/flag-value"
import { FlagError, InvalidValueError } from "./errors"
import { BoolValue } from "./values/bool-value"

/**
 * What `parse` and `report` do on failure.
 *
 * - `continue`: throw the error to the caller.
 * - `exit`: print the error and usage to stderr and exit with status 2
 *   (status 0 for `-h`/`--help`).
 */
export type ErrorHandling = "continue" | "exit"

export type FlagSetDeps = {
  /** @default process.exit */
  exit?: (code: number) => void

  /** @default process.stderr */
  stderr?: { write(text: string): unknown }
}

function isBoolFlag(value: FlagValue): boolean {
  return value.isBoolFlag?.() ?? false
}

/**
 * Named registry of flags and their value cells.
 */
export class FlagSet {
  private readonly flags = new Map<string, Flag>()
  private positional: string[] = []

  constructor(
    readonly name: string,
    readonly errorHandling: ErrorHandling = "continue",
    private readonly deps: FlagSetDeps = {},
  ) {}

  var(value: FlagValue, name: string, usage: string): void {
    if (this.flags.has(name)) {
      throw new FlagError(`${this.name} flag redefined: ${name}`, "duplicate_flag", {
        context: { flag: name, set: this.name },
      })
    }

    this.flags.set(name, { name, usage, value, defValue: value.toString(), changed: false })
  }

  bool(name: string, initial: boolean, usage: string): BoolValue {
    const value = new BoolValue(initial)

    this.var(value, name, usage)
    return value
  }

  lookup(name: string): Readonly<Flag> | undefined {
    return this.flags.get(name)
  }

  /**
   * Sets a flag as if it had been given on the command line.
   */
  set(name: string, text: string): void {
    this.apply(this.require(name), text)
  }

  changed(name: string): boolean {
    return this.flags.get(name)?.changed ?? false
  }

  /** Visits changed flags in name order. */
  visit(fn: (flag: Readonly<Flag>) => void): void {
    for (const flag of this.sorted()) {
      if (flag.changed) fn(flag)
    }
  }

  visitAll(fn: (flag: Readonly<Flag>) => void): void {
    for (const flag of this.sorted()) fn(flag)
  }

  /** Positional arguments left by the last `parse`. */
  args(): string[] {
    return [...this.positional]
  }

  /**
   * Adds the flags of `other` that this set does not define yet. The cells
   * are shared, so setting a flag through either set updates both.
   */
  addFlagSet(other: FlagSet): void {
    other.visitAll((flag) => {
      if (!this.flags.has(flag.name)) this.flags.set(flag.name, flag)
    })
  }

  /**
   * Parses `argv` (without the program name) and returns the positional
   * arguments.
   *
   * Accepts `--name=value`, `-name=value`, `--name value` for flags that
   * take a value and `--name` alone for boolean flags. `--` ends flag
   * parsing; positional arguments may appear between flags.
   */
  parse(argv: readonly string[]): string[] {
    try {
      this.positional = this.parseArgs(argv)
    } catch (err) {
      this.report(err)
    }

    return this.args()
  }

  usage(): string {
    const rows = this.sorted().map((flag) => {
      const head = isBoolFlag(flag.value)
        ? `--${flag.name}`
        : `--${flag.name} ${flag.value.type()}`

      return { head, flag }
    })

    const width = Math.max(0, ...rows.map((row) => row.head.length))
    const lines = rows.map(({ head, flag }) => {
      const def = showsDefault(flag) ? ` (default ${flag.defValue})` : ""

      return `  ${head.padEnd(width)}   ${flag.usage}${def}`
    })

    return `Usage of ${this.name}:\n${lines.join("\n")}\n`
  }

  private parseArgs(argv: readonly string[]): string[] {
    const queue = [...argv]
    const positional: string[] = []

    while (queue.length > 0) {
      const arg = queue.shift()

      if (arg === undefined) break

      if (arg === "--") {
        positional.push(...queue)
        break
      }

      if (!arg.startsWith("-") || arg === "-") {
        positional.push(arg)
        continue
      }

      const body = arg.startsWith("--") ? arg.slice(2) : arg.slice(1)

      if (body === "" || body.startsWith("-") || body.startsWith("=")) {
        throw new FlagError(`bad flag syntax: ${arg}`, "bad_syntax", { context: { arg } })
      }

      const eq = body.indexOf("=")
      const name = eq === -1 ? body : body.slice(0, eq)

      if ((name === "h" || name === "help") && !this.flags.has(name)) {
        throw new FlagError("help requested", "help_requested")
      }

      const flag = this.require(name)

      if (eq !== -1) {
        this.apply(flag, body.slice(eq + 1))
      } else if (isBoolFlag(flag.value)) {
        this.apply(flag, "true")
      } else {
        const next = queue.shift()

        if (next === undefined) {
          throw new FlagError(`flag needs an argument: --${name}`, "missing_value", {
            context: { flag: name },
          })
        }

        this.apply(flag, next)
      }
    }

    return positional
  }

  private require(name: string): Flag {
    const flag = this.flags.get(name)

    if (!flag) {
      throw new FlagError(`unknown flag: --${name}`, "unknown_flag", { context: { flag: name } })
    }

    return flag
  }

  private apply(flag: Flag, text: string): void {
    try {
      flag.value.set(text)
    } catch (cause) {
      const reason = cause instanceof Error ? cause.message : String(cause)

      throw new InvalidValueError(
        `invalid argument "${text}" for "--${flag.name}" flag: ${reason}`,
        { context: { flag: flag.name, value: text }, cause },
      )
    }

    flag.changed = true
  }

  /**
   * Handles a failure the way `parse` does: rethrows it, or in exit mode
   * prints it with usage and exits first.
   */
  report(err: unknown): never {
    if (this.errorHandling === "continue") throw err

    const stderr = this.deps.stderr ?? process.stderr
    const exit = this.deps.exit ?? ((code: number) => process.exit(code))

    if (err instanceof FlagError && err.code === "help_requested") {
      stderr.write(this.usage())
      exit(0)
      throw err
    }

    const message = err instanceof Error ? err.message : String(err)

    stderr.write(`${message}\n${this.usage()}`)
    exit(2)
    throw err
  }

  private sorted(): Flag[] {
    return [...this.flags.values()].sort((a, b) => a.name.localeCompare(b.name))
  }
}

function showsDefault(flag: Flag): boolean {
  if (flag.defValue === "") return false
  if (isBoolFlag(flag.value) && flag.defValue === "false") return false

  return true
}
