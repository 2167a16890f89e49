import { z } from "zod"
import { valueTypes } from "./value-codec"

/**
 * Record format version. Bump it whenever the layout or the encoding of a
 * value type changes: every record written under another version is then
 * treated as stale and evicted on first access.
 */
export const CACHE_ITEM_VERSION = 1

export const cacheItemRecordSchema = z.object({
  value: z.union([z.null(), z.boolean(), z.number(), z.string()]),
  value_type: z.enum(valueTypes),
  expires_at: z.number().int().nullable(),
  created_at: z.number().int(),
  version: z.literal(CACHE_ITEM_VERSION),
})

/** The JSON object persisted for one cache entry. */
export type CacheItemRecord = z.infer<typeof cacheItemRecordSchema>
