import { BaseError } from "@prefixlog/errors"
import type { SourceLocation, StackFrame } from "@prefixlog/logger"
import type { ComparisonOperator } from "../ports/comparison"

export type CheckFailureDetails = {
  location: SourceLocation
  /** Caller-supplied message, replacing the default "check failed". */
  detail?: string
  /** Present for binary checks only, as are `left` and `right`. */
  operator?: ComparisonOperator
  left?: string
  right?: string
  /** The stack at the failed check, the check's caller first. */
  frames?: readonly StackFrame[]
}

/**
 * A check did not hold. Raised after the same message was logged at CRITICAL.
 *
 * The rendered message names the relation, both operands and the location;
 * the same parts are available as fields.
 */
export class CheckFailureError extends BaseError<"check_failure"> {
  readonly location: SourceLocation
  readonly detail?: string
  readonly operator?: ComparisonOperator
  readonly left?: string
  readonly right?: string
  readonly frames: readonly StackFrame[]

  constructor(details: CheckFailureDetails) {
    super(formatCheckFailure(details), {
      code: "check_failure",
      isOperational: false,
      context: withoutUndefined({
        operator: details.operator,
        left: details.left,
        right: details.right,
        detail: details.detail,
        file: details.location.file,
        line: details.location.line,
      }),
    })

    this.location = details.location
    this.detail = details.detail
    this.operator = details.operator
    this.left = details.left
    this.right = details.right
    this.frames = details.frames ?? []
  }
}

export type IncomparableOperandsDetails = {
  location: SourceLocation
  operator: ComparisonOperator
  left: string
  right: string
  leftType: string
  rightType: string
}

/** An ordering check was given operands with no natural order between them. */
export class IncomparableOperandsError extends BaseError<"incomparable_operands"> {
  readonly location: SourceLocation
  readonly operator: ComparisonOperator
  readonly left: string
  readonly right: string

  constructor(details: IncomparableOperandsDetails) {
    const { location, operator, left, right, leftType, rightType } = details

    super(
      `cannot compare ${left} ${operator} ${right} (${leftType} and ${rightType}) at ${location.file}:${location.line}`,
      {
        code: "incomparable_operands",
        isOperational: false,
        context: { operator, left, right, leftType, rightType, file: location.file, line: location.line },
      },
    )

    this.location = location
    this.operator = operator
    this.left = left
    this.right = right
  }
}

export function formatCheckFailure(details: CheckFailureDetails): string {
  const { location, operator, left, right } = details
  const head = details.detail ?? "check failed"
  const relation = operator ? `: ${left} ${operator} ${right}` : ""

  return `${head}${relation} at ${location.file}:${location.line}`
}

/** `a.ts::validate:12 <- b.ts::main:40`, innermost frame first. */
export function formatFrames(frames: readonly StackFrame[]): string {
  return frames.map((f) => `${f.file}::${f.fn}:${f.line}`).join(" <- ")
}

function withoutUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [k, v] of Object.entries(obj)) {
    if (v !== undefined) out[k] = v
  }
  return out
}
