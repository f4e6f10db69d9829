import type { CheckEngine, ComparisonOperator } from "@prefixlog/check"
import type { MessageTemplate, SeverityLike } from "@prefixlog/logger"
import { getCheckEngine, getLogger } from "./defaults"

// Each function anchors on itself so records point at its caller.

export function debug(message: MessageTemplate, ...args: unknown[]): void {
  getLogger().anchoredTo(debug).debug(message, ...args)
}

export function info(message: MessageTemplate, ...args: unknown[]): void {
  getLogger().anchoredTo(info).info(message, ...args)
}

export function warning(message: MessageTemplate, ...args: unknown[]): void {
  getLogger().anchoredTo(warning).warning(message, ...args)
}

export function warn(message: MessageTemplate, ...args: unknown[]): void {
  getLogger().anchoredTo(warn).warn(message, ...args)
}

export function error(message: MessageTemplate, ...args: unknown[]): void {
  getLogger().anchoredTo(error).error(message, ...args)
}

export function critical(message: MessageTemplate, ...args: unknown[]): void {
  getLogger().anchoredTo(critical).critical(message, ...args)
}

export function fatal(message: MessageTemplate, ...args: unknown[]): void {
  getLogger().anchoredTo(fatal).fatal(message, ...args)
}

export function log(severity: SeverityLike, message: MessageTemplate, ...args: unknown[]): void {
  getLogger().anchoredTo(log).log(severity, message, ...args)
}

export function exception(err: unknown, message: MessageTemplate, ...args: unknown[]): void {
  getLogger().anchoredTo(exception).exception(err, message, ...args)
}

export function isEnabledFor(severity: SeverityLike): boolean {
  return getLogger().isEnabledFor(severity)
}

export function setLevel(level: SeverityLike): void {
  getLogger().anchoredTo(setLevel).setLevel(level)
}

export function checkTrue(condition: unknown, message?: string): asserts condition {
  const engine: CheckEngine = getCheckEngine().anchoredTo(checkTrue)
  engine.checkTrue(condition, message)
}

/** Same as {@link checkTrue}. */
export const check: typeof checkTrue = checkTrue

export function checkBinary(op: ComparisonOperator, a: unknown, b: unknown, message?: string): void {
  getCheckEngine().anchoredTo(checkBinary).checkBinary(op, a, b, message)
}

export function checkEq(a: unknown, b: unknown, message?: string): void {
  getCheckEngine().anchoredTo(checkEq).checkEq(a, b, message)
}

export function checkNe(a: unknown, b: unknown, message?: string): void {
  getCheckEngine().anchoredTo(checkNe).checkNe(a, b, message)
}

export function checkLe(a: unknown, b: unknown, message?: string): void {
  getCheckEngine().anchoredTo(checkLe).checkLe(a, b, message)
}

export function checkGe(a: unknown, b: unknown, message?: string): void {
  getCheckEngine().anchoredTo(checkGe).checkGe(a, b, message)
}

export function checkLt(a: unknown, b: unknown, message?: string): void {
  getCheckEngine().anchoredTo(checkLt).checkLt(a, b, message)
}

export function checkGt(a: unknown, b: unknown, message?: string): void {
  getCheckEngine().anchoredTo(checkGt).checkGt(a, b, message)
}

export function checkNotNone<T>(value: T, message?: string): asserts value is NonNullable<T> {
  const engine: CheckEngine = getCheckEngine().anchoredTo(checkNotNone)
  engine.checkNotNone(value, message)
}
