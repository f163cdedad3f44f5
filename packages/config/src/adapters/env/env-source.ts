import type { ConfigSource } from "../../ports/source"

/**
 * Options for reading configuration from environment variables.
 */
export type EnvSourceOptions = {
  /**
   * Only variables whose name starts with this prefix are read, and the
   * prefix is removed from the returned keys.
   *
   * @example
   * With `prefix: "KEYSTASH_"`, `KEYSTASH_CACHE_NAME=orders` loads as
   * `{ CACHE_NAME: "orders" }` and `HOME` is skipped.
   *
   * @default "" (every variable)
   */
  prefix?: string

  /**
   * Variables to read instead of the process environment.
   *
   * @default process.env
   */
  env?: Readonly<Record<string, string | undefined>>
}

export class EnvSource implements ConfigSource {
  readonly name = "env"

  private readonly prefix: string
  private readonly env: Readonly<Record<string, string | undefined>>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    const out: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(this.prefix)) out[key.slice(this.prefix.length)] = value
    }

    return out
  }
}
