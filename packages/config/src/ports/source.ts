/**
 * Loads raw configuration values.
 *
 * A source only reads. It neither validates nor coerces, and it knows
 * nothing about other sources.
 *
 * `loadConfig` applies sources in order, so later ones override earlier
 * ones, then validates the merged result.
 */
export interface ConfigSource {
  /**
   * Label reported by `IConfig.explain()` and `sourcesUsed()`.
   * Example: "env", "dotenv:.env.local", "object:overrides"
   */
  readonly name: string

  /**
   * Read the values this source provides.
   *
   * - Env and dotenv sources return flat string values
   * - Object sources return whatever they were given
   * - A key mapped to `undefined` counts as not provided
   * - Coercion to numbers and booleans happens in the zod schema
   */
  load(): Promise<Record<string, unknown>>
}
