import { type ConfigSource, selectPrefixed } from "./config-source"

export type EnvSourceOptions = {
  /** Only variables with this prefix are read; it is stripped from the keys. */
  prefix: string

  /** Default: `process.env`. */
  env?: Readonly<Record<string, string | undefined>>
}

/**
 * Process environment variables under one prefix.
 */
export class EnvSource implements ConfigSource {
  readonly name = "env"

  constructor(private readonly opts: EnvSourceOptions) {}

  async load(): Promise<Record<string, unknown>> {
    return selectPrefixed(this.opts.env ?? process.env, this.opts.prefix)
  }
}
