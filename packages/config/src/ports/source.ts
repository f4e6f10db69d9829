/**
 * A source of configuration values.
 *
 * A ConfigSource only *loads* raw values. It does not validate, coerce or
 * merge; sources are applied in order and later ones override earlier ones.
 */
export interface ConfigSource {
  /**
   * Human-readable name for provenance.
   * Example: "env", "argv", "object:overrides"
   */
  readonly name: string

  /**
   * Load configuration values.
   *
   * - Env and argv sources return flat string values
   * - Returning undefined for a key means "value not provided"
   * - Zod handles coercion and validation downstream
   */
  load(): Promise<Record<string, unknown>>
}
