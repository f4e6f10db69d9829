/** Which clock fields the prefix shows: the process's local time or UTC. */
export type TimeZoneMode = "local" | "utc"

/**
 * What happens after a CRITICAL (FATAL) record is written.
 *
 * - `log`: nothing, the caller keeps running
 * - `exit`: the process exits with status 1
 */
export type FatalPolicy = "log" | "exit"

/**
 * Configuration options for a PrefixLogger.
 *
 * @remarks
 * The minimum severity is not an option: it lives in the VerbosityGate the
 * logger is given, so it can be changed at runtime and shared.
 */
export type LoggerOptions = {
  /** @default "local" */
  timeZone: TimeZoneMode

  /** @default "log" */
  fatalPolicy: FatalPolicy
}
