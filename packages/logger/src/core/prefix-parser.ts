import type { SeverityName } from "../ports/severity"
import { nameForLevelChar } from "./level-registry"

/**
 * Matches a formatted line. Named groups: severity, month, day, hour, minute,
 * second, microsecond, pid, file, line, body.
 */
export const PREFIX_PATTERN =
  /^(?<severity>[DIWEC])(?<month>\d{2})(?<day>\d{2}) (?<hour>\d{2}):(?<minute>\d{2}):(?<second>\d{2})\.(?<microsecond>\d{6}) (?<pid>-?\d+) (?<file>\S+):(?<line>\d+)\] (?<body>.*)$/

export type ParsedLine = {
  severity: SeverityName
  month: number
  day: number
  hour: number
  minute: number
  second: number
  microsecond: number
  pid: number
  file: string
  line: number
  body: string
}

export function parsePrefix(line: string): ParsedLine | undefined {
  const groups = PREFIX_PATTERN.exec(line)?.groups
  if (!groups) return undefined

  const severity = nameForLevelChar(field(groups, "severity"))
  if (!severity) return undefined

  return {
    severity,
    month: Number(field(groups, "month")),
    day: Number(field(groups, "day")),
    hour: Number(field(groups, "hour")),
    minute: Number(field(groups, "minute")),
    second: Number(field(groups, "second")),
    microsecond: Number(field(groups, "microsecond")),
    pid: Number(field(groups, "pid")),
    file: field(groups, "file"),
    line: Number(field(groups, "line")),
    body: field(groups, "body"),
  }
}

function field(groups: Record<string, string | undefined>, name: string): string {
  return groups[name] ?? ""
}
