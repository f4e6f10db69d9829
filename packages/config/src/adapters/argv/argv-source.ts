import { Command, Option, type OptionValues } from "commander"
import type { ConfigSource } from "../../ports/source"

export type ArgvFlag = {
  /** Config key the flag sets, e.g. "VERBOSITY" for `--verbosity`. */
  key: string
  /** Single-letter alias, e.g. "v" for `-v`. */
  short?: string
}

export type ArgvSourceOptions = {
  /** Long flag name (without dashes) to its definition. */
  flags: Record<string, ArgvFlag>
  /** Defaults to `process.argv.slice(2)`. */
  argv?: readonly string[]
}

/**
 * Command-line flags as configuration, parsed with commander.
 *
 * Accepts `--name=value`, `--name value`, `-x value` and `-xvalue` for the
 * declared flags and skips everything else, so the application keeps its own
 * arguments. A flag without a value reads as "true". Parsing stops at `--`.
 * When a flag repeats, the last occurrence wins.
 */
export class ArgvSource implements ConfigSource {
  readonly name = "argv"
  private readonly argv: readonly string[]
  private readonly flags: Record<string, ArgvFlag>

  constructor(options: ArgvSourceOptions) {
    this.argv = options.argv ?? process.argv.slice(2)
    this.flags = options.flags
  }

  async load(): Promise<Record<string, unknown>> {
    const program = new Command()
      .allowUnknownOption()
      .allowExcessArguments(true)
      .helpOption(false)
      .exitOverride()

    const keys = new Map<string, string>()
    for (const [long, flag] of Object.entries(this.flags)) {
      const option = new Option(flag.short ? `-${flag.short}, --${long} [value]` : `--${long} [value]`)
      program.addOption(option)
      keys.set(option.attributeName(), flag.key)
    }

    program.parse([...this.argv], { from: "user" })
    const opts: OptionValues = program.opts()

    const values: Record<string, string> = {}
    for (const [attribute, key] of keys) {
      const value: unknown = opts[attribute]
      if (value === undefined) continue
      values[key] = value === true ? "true" : String(value)
    }

    return values
  }
}
