/**
 * Validated configuration plus a record of where each value came from.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ VERBOSITY: z.string().default("INFO") }),
 *   sources: [new EnvSource({ prefix: "PREFIXLOG_" }), new ArgvSource({ flags })],
 * })
 *
 * config.value.VERBOSITY     // "DEBUG"
 * config.explain("VERBOSITY") // "argv"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  /**
   * Names the source that provided the final value for `key`, or "default"
   * when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Distinct names from {@link explain} over every key, "default" included. */
  sourcesUsed(): string[]

  /** Keys present in the sources but not produced by the schema. */
  unknownKeys(): string[]
}
