import type { DestinationStream } from "pino"
import { prettyFactory } from "pino-pretty"
import type { EncoderConfig } from "../../ports/encoder"

/**
 * Wraps `destination` so each JSON line pino writes is rendered for humans
 * before it reaches the sink. Rendering happens synchronously on write.
 */
export function createPrettyStream(
  encoder: EncoderConfig,
  destination: DestinationStream,
): DestinationStream {
  const prettify = prettyFactory({
    colorize: encoder.colorize,
    translateTime: false,
    messageKey: encoder.messageKey,
    timestampKey: encoder.timeKey,
    ...(encoder.ignore.length > 0 && { ignore: encoder.ignore.join(",") }),
  })

  return {
    write(line: string) {
      destination.write(prettify(line))
    },
  }
}
