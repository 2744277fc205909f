import { InvalidValueError } from "../errors"

const TRUE = new Set(["1", "t", "T", "TRUE", "true", "True"])
const FALSE = new Set(["0", "f", "F", "FALSE", "false", "False"])

export function parseBool(text: string): boolean {
  if (TRUE.has(text)) return true
  if (FALSE.has(text)) return false

  throw new InvalidValueError(`invalid boolean "${text}"`, { context: { value: text } })
}
