import { type ZodType, z } from "zod"
import { ConfigurationError } from "../core/errors/cache-errors"
import type { ConfigSource } from "./sources/config-source"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  sources: readonly ConfigSource[]
}

export type LoadedConfig<T> = Readonly<{
  value: T

  /** Name of the source each key came from, or "default". */
  provenance: Readonly<Record<string, string>>
}>

/**
 * Merge the sources in order and validate the result.
 *
 * @throws {ConfigurationError} when validation fails.
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<LoadedConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ConfigurationError(
      `Configuration validation failed:\n${z.prettifyError(result.error)}`,
      { context: { sources: sources.map((source) => source.name) } },
    )
  }

  const resolvedProvenance: Record<string, string> = {}
  for (const key of Object.keys(result.data)) {
    resolvedProvenance[key] = provenance[key] ?? "default"
  }

  return { value: result.data, provenance: resolvedProvenance }
}
