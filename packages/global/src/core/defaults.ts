import { CheckEngine } from "@prefixlog/check"
import {
  type Logger,
  type LoggerOptions,
  PrefixLogger,
  type PrefixLoggerDeps,
  type SeverityLike,
  VerbosityGate,
} from "@prefixlog/logger"

/**
 * Everything the process-wide logger is built from. Omitted parts fall back to
 * stderr, the system clock, `process.pid`, `process.exit` and INFO.
 */
export type DefaultsOptions = Omit<PrefixLoggerDeps, "gate"> &
  Partial<LoggerOptions> & {
    verbosity?: SeverityLike
  }

type Defaults = {
  gate: VerbosityGate
  logger: Logger
  check: CheckEngine
}

let current: Defaults | undefined

function build(options: DefaultsOptions): Defaults {
  const { verbosity, timeZone, fatalPolicy, ...deps } = options
  const gate = new VerbosityGate(verbosity)
  const logger = new PrefixLogger({ ...deps, gate }, { timeZone, fatalPolicy })

  return { gate, logger, check: new CheckEngine({ logger }) }
}

function defaults(): Defaults {
  current ??= build({})
  return current
}

/** The process-wide logger, created on first use. */
export function getLogger(): Logger {
  return defaults().logger
}

/** The process-wide check engine; failures are reported through {@link getLogger}. */
export function getCheckEngine(): CheckEngine {
  return defaults().check
}

/** The gate shared by the process-wide logger and check engine. */
export function getGate(): VerbosityGate {
  return defaults().gate
}

/**
 * Replaces the process-wide logger and check engine. References obtained
 * earlier keep writing with their old settings; the module-level functions
 * always use the current ones.
 */
export function configure(options: DefaultsOptions = {}): void {
  current = build(options)
}

/** Drops the configured defaults; the next use builds fresh ones. */
export function reset(): void {
  current = undefined
}
