import type { EncoderConfig, EncoderKind, TimeFormat } from "../../ports/encoder"
import { epochTimeEncoder, iso8601TimeEncoder } from "./time-encoders"

export function productionEncoderConfig(): EncoderConfig {
  return {
    kind: "json",
    messageKey: "msg",
    timeKey: "time",
    encodeTime: epochTimeEncoder,
    colorize: false,
    ignore: [],
  }
}

export function developmentEncoderConfig(): EncoderConfig {
  return {
    kind: "console",
    messageKey: "msg",
    timeKey: "time",
    encodeTime: epochTimeEncoder,
    colorize: true,
    ignore: ["pid", "hostname"],
  }
}

/**
 * Resolves the record layout for an encoder and time format.
 *
 * json starts from the production layout, console from the development one;
 * `iso8601` replaces the epoch time encoder.
 */
export function buildEncoder(kind: EncoderKind, timeFormat: TimeFormat): EncoderConfig {
  const base = kind === "json" ? productionEncoderConfig() : developmentEncoderConfig()

  if (timeFormat === "iso8601") {
    return { ...base, encodeTime: iso8601TimeEncoder }
  }

  return base
}
