import { z } from "zod"
import { ConfigurationError } from "../../core/errors/cache-errors"
import { loadConfig } from "../load-config"
import type { ConfigSource } from "../sources/config-source"
import { EnvSource } from "../sources/env-source"

const source = (name: string, values: Record<string, unknown>): ConfigSource => ({
  name,
  load: async () => values,
})

const schema = z.object({
  PORT: z.coerce.number().int().default(8080),
  NAME: z.string().default("cache"),
})

describe("loadConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it("applies defaults when no source provides a key", async () => {
    const config = await loadConfig({ schema, sources: [source("empty", {})] })

    expect(config.value).toStrictEqual({ PORT: 8080, NAME: "cache" })
    expect(config.provenance).toStrictEqual({ PORT: "default", NAME: "default" })
  })

  it("lets later sources override earlier ones", async () => {
    const config = await loadConfig({
      schema,
      sources: [source("first", { PORT: "1", NAME: "a" }), source("second", { PORT: "2" })],
    })

    expect(config.value).toStrictEqual({ PORT: 2, NAME: "a" })
    expect(config.provenance).toStrictEqual({ PORT: "second", NAME: "first" })
  })

  it("ignores undefined values", async () => {
    const config = await loadConfig({
      schema,
      sources: [source("first", { NAME: "a" }), source("second", { NAME: undefined })],
    })

    expect(config.value.NAME).toBe("a")
  })

  it("reads prefixed variables from the process environment", async () => {
    vi.stubEnv("APP_NAME", "from-env")
    vi.stubEnv("APP_PORT", "9000")
    vi.stubEnv("PORT", "1")

    const config = await loadConfig({ schema, sources: [new EnvSource({ prefix: "APP_" })] })

    expect(config.value).toStrictEqual({ PORT: 9000, NAME: "from-env" })
    expect(config.provenance).toStrictEqual({ PORT: "env", NAME: "env" })
  })

  it("throws a ConfigurationError naming the failing key", async () => {
    const err = await loadConfig({ schema, sources: [source("bad", { PORT: "http" })] }).catch(
      (e: unknown) => e,
    )

    expect(err).toBeInstanceOf(ConfigurationError)
    expect(err).toMatchObject({
      code: "invalid_config",
      context: { sources: ["bad"] },
      message: expect.stringContaining("→ at PORT"),
    })
  })
})
