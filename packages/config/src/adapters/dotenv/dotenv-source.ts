import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/source"

/**
 * Options for reading configuration from a `.env` file.
 */
export type DotenvSourceOptions = {
  /**
   * Path of the file to parse.
   *
   * Absolute, or resolved against `cwd`.
   *
   * @example ".env", ".env.test", "./deploy/cache.env"
   */
  file: string

  /**
   * What happens when the file does not exist.
   *
   * - `true`: `load()` rejects with the filesystem error.
   * - `false`: `load()` resolves to no values.
   *
   * Any other read failure rejects either way.
   */
  required: boolean

  /**
   * Directory a relative `file` is resolved against.
   *
   * @default process.cwd()
   */
  cwd?: string
}

function isFileMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

/**
 * Parses a `.env` file with dotenv. Every value comes back as a string.
 *
 * @example
 * ```ts
 * new DotenvSource({ file: ".env.local", required: false }).name // "dotenv:.env.local"
 * ```
 */
export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)

    try {
      return parse(await fs.readFile(filePath, "utf8"))
    } catch (err) {
      if (!this.opts.required && isFileMissing(err)) return {}

      throw err
    }
  }
}
