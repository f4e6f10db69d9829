export { createStderrSink } from "./adapters/stream/stderr-sink"
export { type LineWritable, StreamSink } from "./adapters/stream/stream-sink"
export { MemorySink } from "./adapters/memory/memory-sink"
export {
  createPrefixLogger,
  type LoggerBinding,
  PrefixLogger,
  type PrefixLoggerDeps,
} from "./adapters/prefix/prefix-logger"
export {
  type CallSiteAnchor,
  captureCallSite,
  captureStack,
  parseFrame,
  parseStackFrame,
  type StackFrame,
  UNKNOWN_LOCATION,
} from "./core/call-site"
export { UnknownSeverityError } from "./core/errors"
export {
  canonicalName,
  levelChar,
  nameForLevelChar,
  rank,
  resolveSeverity,
} from "./core/level-registry"
export { type MessageTemplate, type MessageThunk, renderMessage } from "./core/message"
export { type FormatOptions, formatRecord } from "./core/prefix-formatter"
export { type ParsedLine, PREFIX_PATTERN, parsePrefix } from "./core/prefix-parser"
export { VerbosityGate } from "./core/verbosity-gate"
export type { LineSink } from "./ports/line-sink"
export type { LogRecord, SourceLocation } from "./ports/log-record"
export type { Logger } from "./ports/logger"
export type { FatalPolicy, LoggerOptions, TimeZoneMode } from "./ports/logger-options"
export {
  Severity,
  type SeverityAlias,
  type SeverityLike,
  type SeverityName,
  type SeverityRank,
  severityAliases,
  severityNames,
  severityRanks,
} from "./ports/severity"
