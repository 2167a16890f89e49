import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import { type ConfigSource, selectPrefixed } from "./config-source"

export type DotenvSourceOptions = {
  /**
   * Path to the .env file, absolute or relative to `cwd`.
   *
   * @example ".env", ".env.local"
   */
  file: string

  /** Only variables with this prefix are read; it is stripped from the keys. */
  prefix: string

  /**
   * When `false`, a missing file loads as empty.
   */
  required: boolean

  /**
   * @default process.cwd()
   */
  cwd?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)

    try {
      const content = await fs.readFile(filePath, "utf-8")

      return selectPrefixed(parse(content), this.opts.prefix)
    } catch (err) {
      if (!this.opts.required && isNotFound(err)) return {}
      throw err
    }
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT"
}
