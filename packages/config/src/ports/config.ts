/**
 * Validated configuration plus provenance.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ CACHE_NAME: z.string() }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("CACHE_NAME")     // "orders"
 * config.explain("CACHE_NAME") // "env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  /**
   * Name of the source that supplied the final value of `key`, or
   * `"default"` when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Distinct source names that supplied at least one value. */
  sourcesUsed(): string[]

  /** Keys some source provided that the schema does not know. */
  unknownKeys(): string[]
}
