import {
  type SeverityLike,
  type SeverityName,
  type SeverityRank,
  severityAliases,
  severityNames,
  severityRanks,
} from "../ports/severity"
import { UnknownSeverityError } from "./errors"

const ALIASES: ReadonlyMap<string, SeverityName> = new Map(Object.entries(severityAliases))

const RANK_BY_NAME: ReadonlyMap<string, SeverityRank> = new Map(
  severityNames.map((name): [string, SeverityRank] => [name, severityRanks[name]]),
)

const NAME_BY_RANK: ReadonlyMap<number, SeverityName> = new Map(
  severityNames.map((name): [number, SeverityName] => [severityRanks[name], name]),
)

// Ascending, so the last entry not above a rank is its nearest canonical level.
const ASCENDING = severityNames.map((name) => ({ name, rank: severityRanks[name] }))

/**
 * Resolves a severity name or alias to its rank. Case-insensitive; surrounding
 * whitespace is ignored.
 *
 * @throws UnknownSeverityError
 */
export function rank(nameOrAlias: string): SeverityRank {
  const key = nameOrAlias.trim().toUpperCase()
  const canonical = ALIASES.get(key) ?? key
  const found = RANK_BY_NAME.get(canonical)

  if (found === undefined) throw new UnknownSeverityError(nameOrAlias)

  return found
}

/**
 * Inverse of {@link rank}. Only the five canonical ranks have a name.
 *
 * @throws UnknownSeverityError
 */
export function canonicalName(severityRank: number): SeverityName {
  const name = NAME_BY_RANK.get(severityRank)

  if (name === undefined) throw new UnknownSeverityError(severityRank)

  return name
}

/**
 * Accepts a name, an alias or an integer rank and returns the integer rank.
 * Integers outside the canonical five pass through unchanged.
 *
 * @throws UnknownSeverityError for unknown names and non-integer numbers
 */
export function resolveSeverity(severity: SeverityLike): number {
  if (typeof severity === "number") {
    if (!Number.isInteger(severity)) throw new UnknownSeverityError(severity)
    return severity
  }

  return rank(severity)
}

/**
 * Prefix character for a rank: the first letter of its canonical name.
 * Ranks between canonical levels take the letter of the level below them;
 * ranks under DEBUG render as `D`.
 */
export function levelChar(severityRank: number): string {
  let name: SeverityName = "DEBUG"

  for (const level of ASCENDING) {
    if (level.rank > severityRank) break
    name = level.name
  }

  return name.charAt(0)
}

/** Canonical name for a prefix character, or undefined when none matches. */
export function nameForLevelChar(char: string): SeverityName | undefined {
  return severityNames.find((name) => name.charAt(0) === char)
}
