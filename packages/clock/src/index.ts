export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export type { TimeSource } from "./ports/clock"
export type { Microseconds } from "./ports/time"
