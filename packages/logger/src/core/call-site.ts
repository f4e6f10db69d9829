import type { SourceLocation } from "../ports/log-record"

/** A function whose caller a captured location should point at. */
export type CallSiteAnchor = (...args: never[]) => unknown

export const UNKNOWN_LOCATION: SourceLocation = Object.freeze({ file: "<unknown>", line: 0 })

// "at fn (/a/b/file.ts:12:5)", "at /a/b/file.ts:12:5", "at file:///a/b/file.ts:12:5"
const FRAME_PATTERN = /[\s(](?:file:\/\/)?([^\s()]+?):(\d+):\d+\)?$/

/** One frame of a captured stack: where, and in which function. */
export type StackFrame = SourceLocation & {
  /** As V8 names it, e.g. `main`, `Worker.run`, `new Queue`; `<anonymous>` when unnamed. */
  fn: string
}

// "at Worker.run (", "at async main ("
const FUNCTION_PATTERN = /^at (?:async )?(.+?) \(/

/**
 * Location of whoever called `anchor`.
 *
 * Uses V8's `Error.captureStackTrace`, which drops `anchor` and every frame
 * above it. Returns UNKNOWN_LOCATION when `anchor` is not on the stack or no
 * frame can be read; callers that know their location pass it explicitly
 * through `at()` instead.
 */
export function captureCallSite(anchor: CallSiteAnchor): SourceLocation {
  const [caller] = captureStack(anchor)

  return caller ? { file: caller.file, line: caller.line } : UNKNOWN_LOCATION
}

/**
 * The readable frames below `anchor`, its caller first. Bounded by
 * `Error.stackTraceLimit`.
 */
export function captureStack(anchor: CallSiteAnchor): StackFrame[] {
  const holder: { stack?: string } = {}
  Error.captureStackTrace(holder, anchor)

  return (holder.stack ?? "")
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.startsWith("at "))
    .flatMap((line) => parseFrame(line) ?? [])
}

/** Like {@link parseStackFrame}, keeping the function name. */
export function parseFrame(frame: string): StackFrame | undefined {
  const text = frame.trim()
  const location = parseStackFrame(text)
  if (location === UNKNOWN_LOCATION) return undefined

  return { ...location, fn: FUNCTION_PATTERN.exec(text)?.[1] ?? "<anonymous>" }
}

export function parseStackFrame(frame: string): SourceLocation {
  const match = FRAME_PATTERN.exec(frame.trim())
  const path = match?.[1]
  const line = match?.[2]

  if (!path || !line) return UNKNOWN_LOCATION

  return { file: basename(path), line: Number(line) }
}

function basename(path: string): string {
  return path.split(/[\\/]/).pop() ?? path
}
