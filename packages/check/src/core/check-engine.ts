import {
  type CallSiteAnchor,
  captureCallSite,
  captureStack,
  type Logger,
  PrefixLogger,
  Severity,
  type SourceLocation,
  UNKNOWN_LOCATION,
} from "@prefixlog/logger"
import type { ComparisonOperator } from "../ports/comparison"
import {
  type CheckFailureDetails,
  CheckFailureError,
  formatFrames,
  IncomparableOperandsError,
} from "./errors"
import { compareOperands, operandType, renderOperand } from "./operands"

/** Where failed checks are reported before they are raised. */
export type FailureReporter = Pick<Logger, "emit">

export type CheckEngineDeps = {
  /** Defaults to a PrefixLogger on stderr. */
  logger?: FailureReporter
}

/** How failures of this engine get their location. */
export type CheckBinding = {
  location?: SourceLocation
  anchor?: CallSiteAnchor
}

/**
 * Assertion-style checks that raise {@link CheckFailureError} with the failing
 * relation, both operands and the call site.
 *
 * Every failure is first written through the reporter as a CRITICAL line with
 * the error's message, followed by a CRITICAL `Failed check here:` line with
 * the stack from the check outwards. Both show up in the log even when
 * something upstream catches the error.
 *
 * @remarks
 * `checkTrue` and `checkNotNone` are assertion functions; TypeScript only
 * narrows through them when the engine variable has an explicit type:
 *
 * ```ts
 * const check: CheckEngine = new CheckEngine({ logger })
 * check.checkNotNone(user)
 * user.id // narrowed
 * ```
 */
export class CheckEngine {
  private readonly logger: FailureReporter

  constructor(
    deps: CheckEngineDeps = {},
    private readonly binding: CheckBinding = {},
  ) {
    this.logger = deps.logger ?? new PrefixLogger()
  }

  checkTrue(condition: unknown, message?: string): asserts condition {
    if (condition) return

    this.fail(this.checkTrue, { detail: message })
  }

  /**
   * The primitive every binary check is built on.
   *
   * @throws CheckFailureError when `a <op> b` does not hold
   * @throws IncomparableOperandsError when `a` and `b` cannot be ordered
   */
  checkBinary(op: ComparisonOperator, a: unknown, b: unknown, message?: string): void {
    this.evaluate(this.checkBinary, op, a, b, message)
  }

  checkEq(a: unknown, b: unknown, message?: string): void {
    this.evaluate(this.checkEq, "==", a, b, message)
  }

  checkNe(a: unknown, b: unknown, message?: string): void {
    this.evaluate(this.checkNe, "!=", a, b, message)
  }

  checkLe(a: unknown, b: unknown, message?: string): void {
    this.evaluate(this.checkLe, "<=", a, b, message)
  }

  checkGe(a: unknown, b: unknown, message?: string): void {
    this.evaluate(this.checkGe, ">=", a, b, message)
  }

  checkLt(a: unknown, b: unknown, message?: string): void {
    this.evaluate(this.checkLt, "<", a, b, message)
  }

  checkGt(a: unknown, b: unknown, message?: string): void {
    this.evaluate(this.checkGt, ">", a, b, message)
  }

  /** Fails on `null` and `undefined`. */
  checkNotNone<T>(value: T, message?: string): asserts value is NonNullable<T> {
    if (value !== null && value !== undefined) return

    this.fail(this.checkNotNone, {
      detail: message ?? `check failed: value is ${value === null ? "null" : "undefined"}`,
    })
  }

  /** An engine that reports every failure at `location`. */
  at(location: SourceLocation): CheckEngine {
    return new CheckEngine({ logger: this.logger }, { location })
  }

  /** An engine that reports failures at the caller of `anchor`. */
  anchoredTo(anchor: CallSiteAnchor): CheckEngine {
    return new CheckEngine({ logger: this.logger }, { anchor })
  }

  private evaluate(
    entry: CallSiteAnchor,
    op: ComparisonOperator,
    a: unknown,
    b: unknown,
    message: string | undefined,
  ): void {
    const holds = compareOperands(op, a, b)
    if (holds === true) return

    if (holds === undefined) {
      throw new IncomparableOperandsError({
        location: this.locate(entry),
        operator: op,
        left: renderOperand(a),
        right: renderOperand(b),
        leftType: operandType(a),
        rightType: operandType(b),
      })
    }

    this.fail(entry, {
      detail: message,
      operator: op,
      left: renderOperand(a),
      right: renderOperand(b),
    })
  }

  private fail(
    entry: CallSiteAnchor,
    failure: Omit<CheckFailureDetails, "location" | "frames">,
  ): never {
    const frames = captureStack(this.binding.anchor ?? entry)
    const [caller] = frames
    const location =
      this.binding.location ?? (caller ? { file: caller.file, line: caller.line } : UNKNOWN_LOCATION)
    const error = new CheckFailureError({ ...failure, location, frames })

    this.logger.emit(Severity.Critical, error.message, location)
    if (frames.length > 0) {
      this.logger.emit(Severity.Critical, `Failed check here: ${formatFrames(frames)}`, location)
    }

    throw error
  }

  private locate(entry: CallSiteAnchor): SourceLocation {
    return this.binding.location ?? captureCallSite(this.binding.anchor ?? entry)
  }
}
