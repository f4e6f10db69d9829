export const severityNames = ["DEBUG", "INFO", "WARNING", "ERROR", "CRITICAL"] as const

export type SeverityName = (typeof severityNames)[number]

/**
 * Numeric severity ranks.
 *
 * Fixed values with a step of 10 (higher = more severe). External
 * configuration may pass these integers directly, so they never change.
 */
export const Severity = {
  /** Diagnostic detail for development and investigation. */
  Debug: 10,
  /** Normal operation. */
  Info: 20,
  /** Something unexpected that did not stop the operation. */
  Warning: 30,
  /** The current operation failed. */
  Error: 40,
  /** The process may be unable to continue. Also reached as FATAL. */
  Critical: 50,
} as const

export type SeverityRank = (typeof Severity)[keyof typeof Severity]

export const severityRanks: Readonly<Record<SeverityName, SeverityRank>> = {
  DEBUG: Severity.Debug,
  INFO: Severity.Info,
  WARNING: Severity.Warning,
  ERROR: Severity.Error,
  CRITICAL: Severity.Critical,
}

export const severityAliases = {
  WARN: "WARNING",
  FATAL: "CRITICAL",
} as const satisfies Record<string, SeverityName>

export type SeverityAlias = keyof typeof severityAliases

/**
 * Anything accepted where a severity is expected: a canonical name, an alias
 * (both case-insensitive), or a raw integer rank.
 */
export type SeverityLike = SeverityName | SeverityAlias | (string & {}) | number
