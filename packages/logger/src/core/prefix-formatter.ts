import type { LogRecord } from "../ports/log-record"
import type { TimeZoneMode } from "../ports/logger-options"
import { levelChar } from "./level-registry"

export type FormatOptions = {
  timeZone?: TimeZoneMode
}

const MICROS_PER_SECOND = 1_000_000

/**
 * Renders a record as one line:
 *
 * ```
 * I0924 22:19:15.123456 19552 worker.ts:87] Log message blah blah
 * ```
 *
 * Pure: the same record and options always produce the same string.
 *
 * @remarks
 * - Line breaks in the body are escaped (`\n`, `\r`, `\v`, `\f`, `\u0085`,
 *   `\u2028`, `\u2029`) and backslashes are doubled, so the record stays on
 *   one line and the escapes are unambiguous.
 * - Whitespace in the file name becomes `_`; directories are dropped.
 * - The pid is written as given, including 0 and negative values.
 */
export function formatRecord(record: LogRecord, options: FormatOptions = {}): string {
  const micros = Math.trunc(record.timestampMicros)
  const subSecond = ((micros % MICROS_PER_SECOND) + MICROS_PER_SECOND) % MICROS_PER_SECOND
  const date = new Date((micros - subSecond) / 1000)
  const f = options.timeZone === "utc" ? utcFields(date) : localFields(date)

  const prefix =
    `${levelChar(record.severity)}${pad(f.month, 2)}${pad(f.day, 2)} ` +
    `${pad(f.hour, 2)}:${pad(f.minute, 2)}:${pad(f.second, 2)}.${pad(subSecond, 6)} ` +
    `${record.pid} ${fileField(record.location.file)}:${record.location.line}]`

  return `${prefix} ${escapeBody(record.body)}`
}

type ClockFields = {
  month: number
  day: number
  hour: number
  minute: number
  second: number
}

function localFields(date: Date): ClockFields {
  return {
    month: date.getMonth() + 1,
    day: date.getDate(),
    hour: date.getHours(),
    minute: date.getMinutes(),
    second: date.getSeconds(),
  }
}

function utcFields(date: Date): ClockFields {
  return {
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hour: date.getUTCHours(),
    minute: date.getUTCMinutes(),
    second: date.getUTCSeconds(),
  }
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0")
}

function fileField(file: string): string {
  const base = file.split(/[\\/]/).pop() ?? ""

  return base.length ? base.replace(/\s/g, "_") : "<unknown>"
}

const LINE_BREAKS = /[\n\r\v\f\u0085\u2028\u2029]/g

const ESCAPES: Readonly<Record<string, string>> = {
  "\n": "\\n",
  "\r": "\\r",
  "\v": "\\v",
  "\f": "\\f",
}

// Backslashes first, so an escaped break cannot be confused with a literal "\n".
function escapeBody(body: string): string {
  return body
    .replace(/\\/g, "\\\\")
    .replace(LINE_BREAKS, (ch) => ESCAPES[ch] ?? unicodeEscape(ch))
}

function unicodeEscape(ch: string): string {
  return `\\u${ch.charCodeAt(0).toString(16).padStart(4, "0")}`
}
