import { MemoryVerbosity } from "../../../adapters/verbosity/memory-verbosity"
import { describeFlagValueContract } from "../../../ports/__tests__/flag-value.contract"
import { InvalidValueError } from "../../errors"
import { LevelValue } from "../level-value"

describeFlagValueContract({
  name: "LevelValue",
  make: () => new LevelValue(new MemoryVerbosity()),
  type: "level",
  isBoolFlag: false,
  valid: ["debug", "info", "error", "INFO", "1", "3", "5", "128"],
  invalid: ["0", "-3", "abc", "1.5", "129", ""],
})

describe("LevelValue", () => {
  it.each([
    ["debug", -1, "debug"],
    ["info", 0, "info"],
    ["error", 2, "error"],
    ["Error", 2, "error"],
    ["5", -5, "5"],
  ])("set(%j) gives severity %i", (text, severity, canonical) => {
    const value = new LevelValue(new MemoryVerbosity())

    value.set(text)

    expect(value.severity).toBe(severity)
    expect(value.toString()).toBe(canonical)
  })

  it("reads info before any set", () => {
    const value = new LevelValue(new MemoryVerbosity())

    expect(value.value).toBeUndefined()
    expect(value.isSet).toBe(false)
    expect(value.severity).toBe(0)
    expect(value.toString()).toBe("info")
  })

  it("raises the secondary facility for level 5", () => {
    const facility = new MemoryVerbosity()
    const value = new LevelValue(facility)

    value.set("5")

    expect(value.value).toEqual({ severity: -5, verbosity: 5 })
    expect(facility.history()).toEqual([5])
  })

  it("leaves the facility alone for levels 1 to 3 and named levels", () => {
    const facility = new MemoryVerbosity()
    const value = new LevelValue(facility)

    for (const text of ["1", "2", "3", "debug", "info", "error"]) value.set(text)

    expect(facility.history()).toEqual([])
  })

  it("raises the facility from level 4 on", () => {
    const facility = new MemoryVerbosity()

    new LevelValue(facility).set("4")

    expect(facility.level).toBe(4)
  })

  it("rethrows a facility failure as an invalid value and keeps the old level", () => {
    const value = new LevelValue(new MemoryVerbosity({ max: 4 }))

    value.set("error")

    let caught: unknown

    try {
      value.set("6")
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(InvalidValueError)
    expect(caught).toMatchObject({
      message: "cannot set memory verbosity to 6",
      context: { value: "6", verbosity: 6 },
      cause: { code: "invalid_verbosity" },
    })
    expect(value.severity).toBe(2)
  })

  it.each(["0", "-3", "abc"])("rejects %j", (text) => {
    expect(() => new LevelValue(new MemoryVerbosity()).set(text)).toThrow(
      `invalid log level "${text}"`,
    )
  })
})
