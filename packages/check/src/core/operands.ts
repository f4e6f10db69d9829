import { inspect } from "node:util"
import type { ComparisonOperator } from "../ports/comparison"

/**
 * One-line rendering of an operand for diagnostics. Strings are JSON-quoted so
 * `"3"` and `3` stay distinguishable.
 */
export function renderOperand(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value)

  return inspect(value, { compact: true, breakLength: Number.POSITIVE_INFINITY, depth: 2 })
}

export function operandType(value: unknown): string {
  if (value === null) return "null"
  if (value instanceof Date) return "Date"
  if (Array.isArray(value)) return "array"
  return typeof value
}

/**
 * Evaluates `a <op> b`.
 *
 * Equality is strict (`===`). Ordering is defined for number/bigint pairs
 * (NaN excluded), string pairs and pairs of valid Dates. Returns undefined when
 * the operands have no order between them.
 */
export function compareOperands(
  op: ComparisonOperator,
  a: unknown,
  b: unknown,
): boolean | undefined {
  if (op === "==") return a === b
  if (op === "!=") return a !== b

  const sign = order(a, b)
  if (sign === undefined) return undefined

  switch (op) {
    case "<=":
      return sign <= 0
    case ">=":
      return sign >= 0
    case "<":
      return sign < 0
    case ">":
      return sign > 0
  }
}

function order(a: unknown, b: unknown): number | undefined {
  if (isNumeric(a) && isNumeric(b)) return sign(a, b)
  if (typeof a === "string" && typeof b === "string") return sign(a, b)
  if (isValidDate(a) && isValidDate(b)) return sign(a.getTime(), b.getTime())
  return undefined
}

function sign<T extends number | bigint | string>(a: T, b: T): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

function isNumeric(v: unknown): v is number | bigint {
  return typeof v === "bigint" || (typeof v === "number" && !Number.isNaN(v))
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.getTime())
}
