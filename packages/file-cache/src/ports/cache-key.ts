/**
 * CacheKey is a plain string restricted to `[a-zA-Z0-9_.]`, 1 to 64 chars.
 *
 * @remarks
 * Keys are never used as file names directly; the engine hashes them, so the
 * character set only guards against ambiguous or oversized keys.
 *
 * @example
 * ```ts
 * const key: CacheKey = "users.by_id.v1.123"
 * ```
 */
export type CacheKey = string

/**
 * A cache domain is a namespace mapped to one directory below the storage
 * path. Restricted to `[a-zA-Z0-9_-]`, 1 to 64 chars.
 */
export type CacheDomain = string
