import type { CallSiteAnchor } from "../core/call-site"
import type { MessageTemplate } from "../core/message"
import type { SourceLocation } from "./log-record"
import type { SeverityLike } from "./severity"

export interface Logger {
  debug(message: MessageTemplate, ...args: unknown[]): void
  info(message: MessageTemplate, ...args: unknown[]): void
  warning(message: MessageTemplate, ...args: unknown[]): void
  warn(message: MessageTemplate, ...args: unknown[]): void
  error(message: MessageTemplate, ...args: unknown[]): void
  critical(message: MessageTemplate, ...args: unknown[]): void
  fatal(message: MessageTemplate, ...args: unknown[]): void

  /** Logs at any severity, including integer ranks between the named ones. */
  log(severity: SeverityLike, message: MessageTemplate, ...args: unknown[]): void

  /** Logs at ERROR with a one-line description of `err` appended to the message. */
  exception(err: unknown, message: MessageTemplate, ...args: unknown[]): void

  isEnabledFor(severity: SeverityLike): boolean

  /** Changes the minimum severity of the underlying gate. */
  setLevel(level: SeverityLike): void

  /**
   * Writes an already rendered body at `location`, subject only to the gate.
   * No templating, no fatal policy.
   */
  emit(severity: SeverityLike, body: string, location: SourceLocation): void

  /** A logger that stamps `location` on every record instead of capturing it. */
  at(location: SourceLocation): Logger

  /**
   * A logger that attributes records to the caller of `anchor`.
   *
   * Wrappers pass themselves so records point at their caller rather than at
   * the wrapper.
   */
  anchoredTo(anchor: CallSiteAnchor): Logger
}
