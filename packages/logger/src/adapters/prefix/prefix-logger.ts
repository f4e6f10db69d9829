import { type TimeSource, SystemClock } from "@prefixlog/clock"
import { describeError } from "@prefixlog/errors"
import { type CallSiteAnchor, captureCallSite } from "../../core/call-site"
import { resolveSeverity } from "../../core/level-registry"
import { type MessageTemplate, renderMessage } from "../../core/message"
import { formatRecord } from "../../core/prefix-formatter"
import { VerbosityGate } from "../../core/verbosity-gate"
import type { LineSink } from "../../ports/line-sink"
import type { SourceLocation } from "../../ports/log-record"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"
import { Severity, type SeverityLike } from "../../ports/severity"
import { createStderrSink } from "../stream/stderr-sink"

export type PrefixLoggerDeps = {
  sink?: LineSink
  clock?: TimeSource
  gate?: VerbosityGate
  pid?: number
  /** Called by the `exit` fatal policy. Defaults to `process.exit`. */
  exit?: (code: number) => void
}

/** How records of this logger get their location. */
export type LoggerBinding = {
  location?: SourceLocation
  anchor?: CallSiteAnchor
}

export class PrefixLogger implements Logger {
  private readonly sink: LineSink
  private readonly clock: TimeSource
  private readonly gate: VerbosityGate
  private readonly pid: number
  private readonly exit: (code: number) => void

  constructor(
    deps: PrefixLoggerDeps = {},
    private readonly opts: Partial<LoggerOptions> = {},
    private readonly binding: LoggerBinding = {},
  ) {
    this.sink = deps.sink ?? createStderrSink()
    this.clock = deps.clock ?? new SystemClock()
    this.gate = deps.gate ?? new VerbosityGate()
    this.pid = deps.pid ?? process.pid
    this.exit = deps.exit ?? ((code) => process.exit(code))
  }

  debug(message: MessageTemplate, ...args: unknown[]): void {
    this.write(Severity.Debug, this.debug, message, args)
  }

  info(message: MessageTemplate, ...args: unknown[]): void {
    this.write(Severity.Info, this.info, message, args)
  }

  warning(message: MessageTemplate, ...args: unknown[]): void {
    this.write(Severity.Warning, this.warning, message, args)
  }

  warn(message: MessageTemplate, ...args: unknown[]): void {
    this.write(Severity.Warning, this.warn, message, args)
  }

  error(message: MessageTemplate, ...args: unknown[]): void {
    this.write(Severity.Error, this.error, message, args)
  }

  critical(message: MessageTemplate, ...args: unknown[]): void {
    this.write(Severity.Critical, this.critical, message, args)
  }

  fatal(message: MessageTemplate, ...args: unknown[]): void {
    this.write(Severity.Critical, this.fatal, message, args)
  }

  log(severity: SeverityLike, message: MessageTemplate, ...args: unknown[]): void {
    this.write(resolveSeverity(severity), this.log, message, args)
  }

  exception(err: unknown, message: MessageTemplate, ...args: unknown[]): void {
    const body = () => `${renderMessage(message, args)}: ${describeError(err)}`

    this.write(Severity.Error, this.exception, body, [])
  }

  isEnabledFor(severity: SeverityLike): boolean {
    return this.gate.isEnabled(severity)
  }

  setLevel(level: SeverityLike): void {
    this.gate.setThreshold(level)
    this.write(Severity.Debug, this.setLevel, "Log level set to %s", [level])
  }

  emit(severity: SeverityLike, body: string, location: SourceLocation): void {
    const rank = resolveSeverity(severity)
    if (!this.gate.isEnabled(rank)) return

    const line = formatRecord(
      {
        severity: rank,
        timestampMicros: this.clock.nowMicros(),
        pid: this.pid,
        location,
        body,
      },
      { timeZone: this.opts.timeZone },
    )

    this.sink.writeLine(line)
  }

  at(location: SourceLocation): Logger {
    return new PrefixLogger(this.resolvedDeps(), this.opts, { location })
  }

  anchoredTo(anchor: CallSiteAnchor): Logger {
    return new PrefixLogger(this.resolvedDeps(), this.opts, { anchor })
  }

  private resolvedDeps(): PrefixLoggerDeps {
    return {
      sink: this.sink,
      clock: this.clock,
      gate: this.gate,
      pid: this.pid,
      exit: this.exit,
    }
  }

  private write(
    severity: number,
    entry: CallSiteAnchor,
    message: MessageTemplate,
    args: readonly unknown[],
  ): void {
    // Location capture and templating are skipped for suppressed records.
    if (!this.gate.isEnabled(severity)) return

    const location = this.binding.location ?? captureCallSite(this.binding.anchor ?? entry)

    this.emit(severity, renderMessage(message, args), location)

    if (severity >= Severity.Critical && this.opts.fatalPolicy === "exit") {
      this.exit(1)
    }
  }
}

export function createPrefixLogger(
  deps: PrefixLoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
): Logger {
  return new PrefixLogger(deps, opts)
}
