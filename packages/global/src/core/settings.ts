import {
  ArgvSource,
  type ArgvSourceOptions,
  EnvSource,
  type IConfig,
  loadConfig,
  ObjectSource,
} from "@prefixlog/config"
import { resolveSeverity, UnknownSeverityError } from "@prefixlog/logger"
import { z } from "zod"

export const ENV_PREFIX = "PREFIXLOG_"

export const settingsFlags: ArgvSourceOptions["flags"] = {
  verbosity: { key: "VERBOSITY", short: "v" },
  "fatal-policy": { key: "FATAL_POLICY" },
  "time-zone": { key: "TIME_ZONE" },
}

const INTEGER = /^[+-]?\d+$/

/** A severity name, an alias or an integer rank, given as text or as a number. */
const verbosity = z
  .union([z.number().int(), z.string().trim().min(1)])
  .default("INFO")
  .transform((value, ctx) => {
    const input = typeof value === "string" && INTEGER.test(value) ? Number(value) : value

    try {
      return resolveSeverity(input)
    } catch (err) {
      if (!(err instanceof UnknownSeverityError)) throw err

      ctx.addIssue({ code: "custom", message: err.message, input: value })
      return z.NEVER
    }
  })

export const loggingSettingsSchema = z.object({
  VERBOSITY: verbosity,
  FATAL_POLICY: z.enum(["log", "exit"]).default("log"),
  TIME_ZONE: z.enum(["local", "utc"]).default("local"),
})

export type LoggingSettings = z.output<typeof loggingSettingsSchema>

export type SettingsInput = z.input<typeof loggingSettingsSchema>

export type LoadSettingsOptions = {
  /** Defaults to `process.argv.slice(2)`. */
  argv?: readonly string[]
  /** Defaults to `process.env`. */
  env?: Record<string, string | undefined>
  /** Applied last. */
  overrides?: SettingsInput
}

/**
 * Reads the logging settings from `PREFIXLOG_*` variables, then command-line
 * flags, then `overrides`; later sources win.
 *
 * @throws ConfigValidationError (code `config_invalid`)
 */
export function loadLoggingSettings(
  options: LoadSettingsOptions = {},
): Promise<IConfig<LoggingSettings>> {
  return loadConfig({
    schema: loggingSettingsSchema,
    sources: [
      new EnvSource({
        prefix: ENV_PREFIX,
        env: options.env,
        keys: Object.keys(loggingSettingsSchema.shape),
      }),
      new ArgvSource({ flags: settingsFlags, argv: options.argv }),
      new ObjectSource({ ...options.overrides }),
    ],
  })
}
