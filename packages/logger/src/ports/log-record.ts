import type { Microseconds } from "@prefixlog/clock"

/** Where a record came from. `file` is a basename, `line` is 1-based. */
export type SourceLocation = Readonly<{
  file: string
  line: number
}>

/**
 * One log call, built at the call site and discarded once its line is written.
 */
export type LogRecord = Readonly<{
  severity: number
  timestampMicros: Microseconds
  pid: number
  location: SourceLocation
  body: string
}>
