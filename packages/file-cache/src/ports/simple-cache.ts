import type { CacheKey } from "./cache-key"
import type { CacheTtl } from "./cache-ttl"

/**
 * Key/value pairs accepted by `setMultiple`: any iterable of pairs (a `Map`,
 * an array of tuples) or a plain object keyed by cache key.
 */
export type CacheValues =
  | Iterable<readonly [CacheKey, unknown]>
  | Readonly<Record<CacheKey, unknown>>

/**
 * SimpleCache is the standard key/value cache-provider contract.
 *
 * @remarks
 * - Every key is validated before any I/O; a malformed key rejects with
 *   `InvalidArgumentError`.
 * - Stale, expired or unreadable entries behave exactly like absent ones.
 * - Backend failures reject with `CacheOperationError`; nothing is retried.
 */
export interface SimpleCache {
  /**
   * Fetch a value from the cache.
   *
   * @param defaultValue Returned on a miss. Default: `null`.
   */
  get(key: CacheKey, defaultValue?: unknown): Promise<unknown>

  /**
   * Persist a value, replacing any previous entry for the key.
   *
   * @returns `true` when the backend reports the write succeeded.
   */
  set(key: CacheKey, value: unknown, ttl?: CacheTtl): Promise<boolean>

  /**
   * Remove an entry. Removing an absent key is a success.
   */
  delete(key: CacheKey): Promise<boolean>

  /**
   * Remove every entry in the cache domain.
   */
  clear(): Promise<boolean>

  /**
   * Fetch many values. The result preserves the order of `keys`; a miss maps
   * to `defaultValue`.
   */
  getMultiple(keys: Iterable<CacheKey>, defaultValue?: unknown): Promise<Map<CacheKey, unknown>>

  /**
   * Persist many values with a shared ttl.
   *
   * @returns `true` only if every individual write succeeded.
   */
  setMultiple(values: CacheValues, ttl?: CacheTtl): Promise<boolean>

  /**
   * Remove many entries.
   *
   * @returns `true` only if every individual delete succeeded.
   */
  deleteMultiple(keys: Iterable<CacheKey>): Promise<boolean>

  /**
   * Whether a fresh entry exists for the key.
   *
   * @remarks
   * Advisory only: another process may remove the entry between `has` and a
   * following `get`.
   */
  has(key: CacheKey): Promise<boolean>
}
