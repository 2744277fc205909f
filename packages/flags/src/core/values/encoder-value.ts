import { type EncoderKind, encoderKinds } from "@logflags/logger"
import { z } from "zod"
import type { FlagValue } from "../../ports/flag-value"
import { InvalidValueError } from "../errors"

const encoderKindSchema = z.enum(encoderKinds)

export class EncoderValue implements FlagValue {
  private kind: EncoderKind | undefined

  /** Chosen encoder, or undefined when the flag was never given. */
  get value(): EncoderKind | undefined {
    return this.kind
  }

  get isSet(): boolean {
    return this.kind !== undefined
  }

  set(text: string): void {
    const result = encoderKindSchema.safeParse(text)

    if (!result.success) {
      throw new InvalidValueError(`unknown encoder "${text}"`, { context: { value: text } })
    }

    this.kind = result.data
  }

  toString(): string {
    return this.kind ?? ""
  }

  type(): string {
    return "encoder"
  }
}
