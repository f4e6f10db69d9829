import type { TimeSource } from "../ports/clock"
import type { Microseconds } from "../ports/time"

/**
 * Wall clock with microsecond resolution.
 *
 * `Date.now()` only has millisecond resolution, so the sub-millisecond part
 * comes from the monotonic `process.hrtime` counter, anchored to the wall clock
 * when the instance is created.
 */
export class SystemClock implements TimeSource {
  private readonly originMicros: bigint
  private readonly originHr: bigint

  constructor() {
    this.originHr = process.hrtime.bigint()
    this.originMicros = BigInt(Date.now()) * 1000n
  }

  nowMicros(): Microseconds {
    const elapsedMicros = (process.hrtime.bigint() - this.originHr) / 1000n

    return Number(this.originMicros + elapsedMicros)
  }
}
