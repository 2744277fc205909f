import { BaseError, serializeError } from "@logflags/errors"
import { errWithCause } from "pino-std-serializers"

/**
 * Serializer for the `err` field of a record.
 */
export function serializeLogError(err: unknown): unknown {
  if (err instanceof BaseError) return serializeError(err, { includeStack: true })
  if (err instanceof Error) return errWithCause(err)

  return err
}
