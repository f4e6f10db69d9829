export {
  configure,
  type DefaultsOptions,
  getCheckEngine,
  getGate,
  getLogger,
  reset,
} from "./core/defaults"
export {
  check,
  checkBinary,
  checkEq,
  checkGe,
  checkGt,
  checkLe,
  checkLt,
  checkNe,
  checkNotNone,
  checkTrue,
  critical,
  debug,
  error,
  exception,
  fatal,
  info,
  isEnabledFor,
  log,
  setLevel,
  warn,
  warning,
} from "./core/functions"
export { type InitOptions, init } from "./core/init"
export {
  ENV_PREFIX,
  type LoadSettingsOptions,
  type LoggingSettings,
  loadLoggingSettings,
  loggingSettingsSchema,
  type SettingsInput,
  settingsFlags,
} from "./core/settings"
export { CheckFailureError, IncomparableOperandsError } from "@prefixlog/check"
export { ConfigValidationError } from "@prefixlog/config"
export { Severity, UnknownSeverityError } from "@prefixlog/logger"
