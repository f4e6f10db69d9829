import type { TimeSource } from "../ports/clock"
import type { Microseconds } from "../ports/time"

/** A clock stopped at one instant. */
export class FakeClock implements TimeSource {
  private readonly micros: Microseconds

  constructor(startMicros: Microseconds = 0) {
    this.micros = Math.trunc(startMicros)
  }

  /** Build a clock fixed at a Date plus extra microseconds within its millisecond. */
  static at(date: Date, extraMicros: Microseconds = 0): FakeClock {
    return new FakeClock(date.getTime() * 1000 + extraMicros)
  }

  nowMicros(): Microseconds {
    return this.micros
  }
}
