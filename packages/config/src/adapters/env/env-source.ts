import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only variables starting with this are read, with the prefix stripped. */
  prefix?: string
  /** Defaults to `process.env`. */
  env?: Record<string, string | undefined>
  /** Keys (after prefix stripping) to keep; everything else is ignored. */
  keys?: readonly string[]
}

/**
 * Environment variables as configuration. Empty values count as not set, so
 * `PREFIXLOG_VERBOSITY=` falls through to the next source or the default.
 */
export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>
  private readonly keys?: ReadonlySet<string>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
    this.keys = options.keys && new Set(options.keys)
  }

  async load(): Promise<Record<string, unknown>> {
    const values: Record<string, string> = {}

    for (const [name, value] of Object.entries(this.env)) {
      if (!name.startsWith(this.prefix) || value === undefined || value === "") continue

      const key = name.slice(this.prefix.length)
      if (this.keys && !this.keys.has(key)) continue

      values[key] = value
    }

    return values
  }
}
