/**
 * A source of raw configuration values.
 *
 * Sources only load; validation and coercion happen in the schema. They are
 * applied in order, later sources overriding earlier ones.
 */
export interface ConfigSource {
  /** Used for provenance, e.g. "env" or "dotenv:.env". */
  readonly name: string

  /** `undefined` for a key means "not provided". */
  load(): Promise<Record<string, unknown>>
}

/**
 * Keep the variables that start with `prefix`, keyed by the rest of their
 * name. `FILE_CACHE_DOMAIN` under `"FILE_CACHE_"` becomes `DOMAIN`.
 */
export function selectPrefixed(
  vars: Readonly<Record<string, string | undefined>>,
  prefix: string,
): Record<string, string> {
  const selected: Record<string, string> = {}

  for (const [name, value] of Object.entries(vars)) {
    if (value === undefined || name.length <= prefix.length || !name.startsWith(prefix)) continue
    selected[name.slice(prefix.length)] = value
  }

  return selected
}
