import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { DotenvFlagSource } from "../../adapters/dotenv/dotenv-flag-source"
import { EnvFlagSource } from "../../adapters/env/env-flag-source"
import { ObjectFlagSource } from "../../adapters/object/object-flag-source"
import { MemoryVerbosity } from "../../adapters/verbosity/memory-verbosity"
import { FlagError, InvalidValueError } from "../errors"
import { loadLoggingFlags } from "../load-flags"

describe("loadLoggingFlags", () => {
  it("prefers the command line over sources", async () => {
    const loaded = await loadLoggingFlags({
      argv: ["--zap-level=debug"],
      sources: [new ObjectFlagSource({ "zap-level": "error", "zap-encoder": "console" })],
      errorHandling: "continue",
    })

    expect(loaded.settings).toEqual({
      development: false,
      encoder: "console",
      level: -1,
      timeFormat: "unix",
    })
    expect(loaded.explain("zap-level")).toBe("argv")
    expect(loaded.explain("zap-encoder")).toBe("object:overrides")
    expect(loaded.explain("zap-sample")).toBe("default")
  })

  it("lets later sources override earlier ones", async () => {
    const loaded = await loadLoggingFlags({
      argv: [],
      sources: [
        new EnvFlagSource({ env: { ZAP_LEVEL: "error", ZAP_TIMEFORMAT: "iso8601" } }),
        new ObjectFlagSource({ "zap-level": 2 }),
      ],
      verbosity: new MemoryVerbosity(),
      errorHandling: "continue",
    })

    expect(loaded.settings).toMatchObject({ level: -2, timeFormat: "iso8601" })
    expect(loaded.explain("zap-level")).toBe("object:overrides")
    expect(loaded.explain("zap-timeformat")).toBe("env")
    expect(loaded.sourcesUsed()).toEqual(["env", "object:overrides"])
  })

  it("accepts numbers and booleans from sources", async () => {
    const verbosity = new MemoryVerbosity()
    const loaded = await loadLoggingFlags({
      argv: [],
      sources: [new ObjectFlagSource({ "zap-devel": true, "zap-level": 7, "zap-sample": false })],
      verbosity,
      errorHandling: "continue",
    })

    expect(loaded.settings).toEqual({
      development: true,
      level: -7,
      sample: false,
      timeFormat: "unix",
    })
    expect(verbosity.history()).toEqual([7])
  })

  it("reports keys that name no logging flag", async () => {
    const loaded = await loadLoggingFlags({
      argv: [],
      sources: [new EnvFlagSource({ env: { ZAP_COLOUR: "red", ZAP_ENCODER: "json" } })],
      errorHandling: "continue",
    })

    expect(loaded.unknownKeys()).toEqual(["zap-colour"])
    expect(loaded.sourcesUsed()).toEqual(["env"])
  })

  it("returns positional arguments", async () => {
    const loaded = await loadLoggingFlags({
      argv: ["serve", "--zap-devel", "--", "--port=80"],
      sources: [],
      errorHandling: "continue",
    })

    expect(loaded.args).toEqual(["serve", "--port=80"])
    expect(loaded.explain("zap-devel")).toBe("argv")
    expect(loaded.sourcesUsed()).toEqual([])
  })

  it("rejects source values that are not text, numbers or booleans", async () => {
    await expect(
      loadLoggingFlags({
        argv: [],
        sources: [new ObjectFlagSource({ "zap-level": { value: 3 } })],
        errorHandling: "continue",
      }),
    ).rejects.toThrow(FlagError)
  })

  it("names the bad source value in the validation error", async () => {
    await expect(
      loadLoggingFlags({
        argv: [],
        sources: [new ObjectFlagSource({ "zap-level": [1] })],
        errorHandling: "continue",
      }),
    ).rejects.toMatchObject({ code: "invalid_source", context: { sources: ["object:overrides"] } })
  })

  it("rejects source text that the flag does not accept", async () => {
    await expect(
      loadLoggingFlags({
        argv: [],
        sources: [new ObjectFlagSource({ "zap-encoder": "xml" })],
        errorHandling: "continue",
      }),
    ).rejects.toThrow(InvalidValueError)
  })

  it("does not apply a bad source value the command line already overrode", async () => {
    const loaded = await loadLoggingFlags({
      argv: ["--zap-encoder=console"],
      sources: [new ObjectFlagSource({ "zap-encoder": "xml" })],
      errorHandling: "continue",
    })

    expect(loaded.settings.encoder).toBe("console")
  })

  it("exits on a bad command line by default", async () => {
    const exit = vi.fn()
    const write = vi.fn()

    await expect(
      loadLoggingFlags({ argv: ["--zap-sample=yes"], sources: [], exit, stderr: { write } }),
    ).rejects.toThrow(InvalidValueError)
    expect(exit).toHaveBeenCalledWith(2)
  })

  it("exits with usage when a source value is rejected", async () => {
    const exit = vi.fn()
    const write = vi.fn()

    await expect(
      loadLoggingFlags({
        argv: [],
        sources: [new ObjectFlagSource({ "zap-encoder": "xml" })],
        exit,
        stderr: { write },
      }),
    ).rejects.toThrow(InvalidValueError)
    expect(exit).toHaveBeenCalledWith(2)
    expect(write).toHaveBeenCalledTimes(1)
    expect(String(write.mock.calls[0]?.[0])).toMatch(
      /^invalid argument "xml" for "--zap-encoder" flag: unknown encoder "xml"\nUsage of zap:\n/,
    )
  })

  it("exits with usage when source values fail validation", async () => {
    const exit = vi.fn()
    const write = vi.fn()

    await expect(
      loadLoggingFlags({
        argv: [],
        sources: [new ObjectFlagSource({ "zap-level": { value: 3 } })],
        exit,
        stderr: { write },
      }),
    ).rejects.toMatchObject({ code: "invalid_source" })
    expect(exit).toHaveBeenCalledWith(2)
    expect(String(write.mock.calls[0]?.[0])).toMatch(/^Flag source validation failed:\n/)
  })

  it("lists used sources in the order they were given", async () => {
    const loaded = await loadLoggingFlags({
      argv: [],
      sources: [
        new ObjectFlagSource({ "zap-encoder": "console" }),
        new EnvFlagSource({ env: { ZAP_SAMPLE: "false" } }),
        new ObjectFlagSource({}),
      ],
      errorHandling: "continue",
    })

    expect(loaded.sourcesUsed()).toEqual(["object:overrides", "env"])
  })

  describe("with a dotenv file", () => {
    let cwd: string

    beforeEach(async () => {
      cwd = await fs.mkdtemp(path.join(os.tmpdir(), "load-flags-"))
    })

    afterEach(async () => {
      await fs.rm(cwd, { recursive: true })
    })

    it("layers env over the file", async () => {
      await fs.writeFile(path.join(cwd, ".env"), "ZAP_ENCODER=console\nZAP_LEVEL=error\n")

      const loaded = await loadLoggingFlags({
        argv: [],
        sources: [
          new DotenvFlagSource({ file: ".env", required: true, cwd }),
          new EnvFlagSource({ env: { ZAP_LEVEL: "info" } }),
        ],
        errorHandling: "continue",
      })

      expect(loaded.settings).toMatchObject({ encoder: "console", level: 0 })
      expect(loaded.explain("zap-encoder")).toBe("dotenv:.env")
      expect(loaded.explain("zap-level")).toBe("env")
    })
  })
})
