import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Type guard for errors raised by this library, or duck-typed equivalents
 * that crossed a realm boundary.
 *
 * @example
 * ```ts
 * try {
 *   gate.setThreshold(flag)
 * } catch (err) {
 *   if (isAppError(err) && err.code === "unknown_severity") {
 *     // fall back to the default threshold
 *   }
 * }
 * ```
 */
export function isAppError(e: unknown): e is AppError {
  if (!isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isOperational === "boolean" &&
    isValidDate(e.timestamp) &&
    typeof e.message === "string" &&
    typeof e.name === "string"
  )
}
