import type { IConfig } from "@prefixlog/config"
import { configure, type DefaultsOptions, getLogger } from "./defaults"
import { type LoadSettingsOptions, type LoggingSettings, loadLoggingSettings } from "./settings"

export type InitOptions = LoadSettingsOptions &
  Omit<DefaultsOptions, "verbosity" | "timeZone" | "fatalPolicy">

/**
 * Configures the process-wide logger from the environment and command line.
 *
 * Settings are read from `PREFIXLOG_VERBOSITY`, `PREFIXLOG_FATAL_POLICY` and
 * `PREFIXLOG_TIME_ZONE`, then from `--verbosity`/`-v`, `--fatal-policy` and
 * `--time-zone`, then from `overrides`.
 *
 * @example
 * ```ts
 * await init()
 * info("listening on %d", port)
 * ```
 *
 * @throws ConfigValidationError when a setting is invalid; the current
 * defaults are left untouched in that case
 */
export async function init(options: InitOptions = {}): Promise<IConfig<LoggingSettings>> {
  const { argv, env, overrides, ...deps } = options
  const config = await loadLoggingSettings({ argv, env, overrides })
  const { VERBOSITY, FATAL_POLICY, TIME_ZONE } = config.value

  configure({
    ...deps,
    verbosity: VERBOSITY,
    fatalPolicy: FATAL_POLICY,
    timeZone: TIME_ZONE,
  })

  getLogger()
    .anchoredTo(init)
    .debug(
      "Logging initialized: verbosity=%d (%s) fatal_policy=%s (%s) time_zone=%s (%s)",
      VERBOSITY,
      config.explain("VERBOSITY"),
      FATAL_POLICY,
      config.explain("FATAL_POLICY"),
      TIME_ZONE,
      config.explain("TIME_ZONE"),
    )

  return config
}
