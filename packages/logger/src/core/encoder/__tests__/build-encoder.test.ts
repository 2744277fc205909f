import {
  buildEncoder,
  developmentEncoderConfig,
  productionEncoderConfig,
} from "../build-encoder"
import { epochTimeEncoder, iso8601TimeEncoder } from "../time-encoders"

describe("buildEncoder", () => {
  it("json with unix time is the production layout", () => {
    expect(buildEncoder("json", "unix")).toEqual(productionEncoderConfig())
  })

  it("console with unix time is the development layout", () => {
    expect(buildEncoder("console", "unix")).toEqual(developmentEncoderConfig())
  })

  it("iso8601 swaps the time encoder and keeps the rest of the layout", () => {
    const encoder = buildEncoder("json", "iso8601")

    expect(encoder.encodeTime).toBe(iso8601TimeEncoder)
    expect({ ...encoder, encodeTime: epochTimeEncoder }).toEqual(productionEncoderConfig())
  })

  it("console with iso8601 keeps colour and hidden fields", () => {
    const encoder = buildEncoder("console", "iso8601")

    expect(encoder).toMatchObject({
      kind: "console",
      colorize: true,
      ignore: ["pid", "hostname"],
    })
    expect(encoder.encodeTime).toBe(iso8601TimeEncoder)
  })

  it("returns a fresh object on each call", () => {
    const a = buildEncoder("json", "unix")
    const b = buildEncoder("json", "unix")

    expect(a).not.toBe(b)
  })

  it("production layout does not colour and development does", () => {
    expect(productionEncoderConfig()).toMatchObject({ kind: "json", colorize: false })
    expect(developmentEncoderConfig()).toMatchObject({ kind: "console", colorize: true })
  })
})

describe("time encoders", () => {
  it("epoch encoder writes seconds with a millisecond fraction", () => {
    expect(epochTimeEncoder(1_700_000_000_000)).toBe(1_700_000_000)
    expect(epochTimeEncoder(1_700_000_000_500)).toBe(1_700_000_000.5)
  })

  it("iso8601 encoder writes a UTC timestamp", () => {
    expect(iso8601TimeEncoder(1_700_000_000_000)).toBe("2023-11-14T22:13:20.000Z")
  })
})
