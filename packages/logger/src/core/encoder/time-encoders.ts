import type { TimeEncoder } from "../../ports/encoder"

/** Unix epoch seconds with millisecond fraction, e.g. `1700000000.123`. */
export const epochTimeEncoder: TimeEncoder = (epochMs) => epochMs / 1000

/** ISO-8601 UTC timestamp, e.g. `2023-11-14T22:13:20.000Z`. */
export const iso8601TimeEncoder: TimeEncoder = (epochMs) => new Date(epochMs).toISOString()
