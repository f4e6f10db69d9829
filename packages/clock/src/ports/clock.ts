import type { Microseconds } from "./time"

export type TimeSource = {
  /**
   * Current time as whole microseconds since Unix epoch.
   * Always an integer, so the sub-second part fits in six digits.
   */
  nowMicros(): Microseconds
}
