import type { ConfigSource } from "../../ports/source"

/** Fixed values, typically test or programmatic overrides. */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly values: Readonly<Record<string, unknown>>,
    name = "overrides",
  ) {
    this.name = `object:${name}`
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
