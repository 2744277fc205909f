import type { Severity } from "../../ports/log-level"
import type { SamplingOptions } from "../../ports/logger-options"

export const DEFAULT_SAMPLING = {
  tickMs: 1_000,
  initial: 100,
  thereafter: 100,
} as const satisfies SamplingOptions

const BUCKETS = 4096

type Counter = {
  resetAt: number
  count: number
}

/**
 * Counts records per severity and message bucket within fixed windows.
 *
 * Messages are hashed into a fixed number of buckets per severity, so memory
 * stays bounded whatever the number of distinct messages.
 */
export class Sampler {
  private readonly counters = new Map<string, Counter>()

  constructor(
    private readonly opts: SamplingOptions,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Records one occurrence and returns whether it should be written.
   */
  check(severity: Severity, message: string): boolean {
    const now = this.now()
    const key = `${severity}:${fnv32a(message) % BUCKETS}`

    let counter = this.counters.get(key)

    if (!counter || now >= counter.resetAt) {
      counter = { resetAt: now + this.opts.tickMs, count: 0 }
      this.counters.set(key, counter)
    }

    counter.count += 1

    if (counter.count <= this.opts.initial) return true

    return (
      this.opts.thereafter > 0 &&
      (counter.count - this.opts.initial) % this.opts.thereafter === 0
    )
  }
}

function fnv32a(text: string): number {
  let hash = 0x811c9dc5

  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i)
    hash = Math.imul(hash, 0x01000193) >>> 0
  }

  return hash
}
