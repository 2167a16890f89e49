import { createHash } from "node:crypto"
import * as path from "node:path"
import type { FilePath } from "@stashfs/storage"
import type { CacheKey } from "../../ports/cache-key"
import { InvalidArgumentError } from "../errors/cache-errors"

const HASH_LENGTH = 64
const EXTENSION_PATTERN = /^\.[a-zA-Z0-9]{1,16}$/

/**
 * How item files are spread below the domain directory: `depth` directory
 * levels, each named after the next `width` hex chars of the key hash.
 */
export type ShardLayout = Readonly<{
  depth: number
  width: number
}>

export const DEFAULT_SHARD_LAYOUT: ShardLayout = { depth: 2, width: 2 }
export const DEFAULT_FILE_EXTENSION = ".json"

export type ItemPathOptions = Readonly<{
  layout: ShardLayout
  extension: string
}>

export function validateShardLayout(layout: ShardLayout): void {
  const { depth, width } = layout

  if (!Number.isInteger(depth) || !Number.isInteger(width) || depth < 1 || width < 1) {
    throw new InvalidArgumentError("Shard depth and width must be positive integers", {
      context: { depth, width },
    })
  }
  if (depth * width > HASH_LENGTH) {
    throw new InvalidArgumentError(
      `Shard depth × width must not exceed ${HASH_LENGTH} hash characters`,
      { context: { depth, width } },
    )
  }
}

export function validateFileExtension(extension: string): void {
  if (!EXTENSION_PATTERN.test(extension)) {
    throw new InvalidArgumentError(
      "File extension must be a dot followed by 1-16 characters of [a-zA-Z0-9]",
      { context: { extension } },
    )
  }
}

/** Lower-case hex sha256 of the key. */
export function hashKey(key: CacheKey): string {
  return createHash("sha256").update(key, "utf8").digest("hex")
}

export function shardSegments(hash: string, layout: ShardLayout): string[] {
  const segments: string[] = []

  for (let level = 0; level < layout.depth; level++) {
    const start = level * layout.width
    segments.push(hash.slice(start, start + layout.width))
  }

  return segments
}

/**
 * `<cachePath>/<shard-1>/…/<shard-n>/<sha256(key)><extension>`
 */
export function buildItemPath(
  cachePath: FilePath,
  key: CacheKey,
  options: ItemPathOptions,
): FilePath {
  const hash = hashKey(key)

  return path.join(cachePath, ...shardSegments(hash, options.layout), hash + options.extension)
}
