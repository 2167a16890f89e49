import * as os from "node:os"
import * as path from "node:path"
import { createNullLogger, type Logger } from "@stashfs/logger"
import type { FilePath, FileSystemPort } from "@stashfs/storage"
import { CacheError, CacheOperationError, InvalidArgumentError } from "../../core/errors/cache-errors"
import { CacheItem } from "../../core/item/cache-item"
import { encodeRecordBytes, parseRecordBytes } from "../../core/item/record-bytes"
import {
  buildItemPath,
  DEFAULT_FILE_EXTENSION,
  DEFAULT_SHARD_LAYOUT,
  type ItemPathOptions,
  type ShardLayout,
  validateFileExtension,
  validateShardLayout,
} from "../../core/paths/item-path"
import type { Clock } from "../../core/time/clock"
import { validateDomainName, validateKey } from "../../core/validation/validate-names"
import type { CacheDomain, CacheKey } from "../../ports/cache-key"
import type { CacheTtl } from "../../ports/cache-ttl"
import type { CacheValues, SimpleCache } from "../../ports/simple-cache"

export const DEFAULT_DOMAIN: CacheDomain = "file-cache"

export type FileCacheDeps = {
  fileSystem: FileSystemPort
  clock: Clock

  /**
   * Receives hit/miss, eviction, clear and prune events. Default: no logging.
   */
  logger?: Logger
}

export type FileCacheOptions = {
  /**
   * Namespace of this cache; one directory below `storagePath`.
   *
   * Default: `"file-cache"`.
   */
  domain?: CacheDomain

  /**
   * Directory that holds the domain directories. Must exist and be writable.
   *
   * Default: the OS temp directory.
   */
  storagePath?: FilePath

  /**
   * Default: `{ depth: 2, width: 2 }`, i.e. `<domain>/ab/cd/<hash>.json`.
   */
  shard?: Partial<ShardLayout>

  /**
   * Default: `".json"`.
   */
  fileExtension?: string
}

export type PruneResult = {
  /** Item files inspected. */
  scanned: number

  /** Malformed, stale or expired item files deleted. */
  removed: number
}

type FileCacheSettings = Readonly<{
  domain: CacheDomain
  storagePath: FilePath
  cachePath: FilePath
  itemPath: ItemPathOptions
}>

type IoContext = { key?: CacheKey; path?: FilePath }

/**
 * SimpleCache persisted as one JSON file per entry.
 *
 * @remarks
 * - Keys are hashed with sha256 and spread over shard directories, so the
 *   path of an entry is recomputed from its key on every call.
 * - Stale entries (expired, written under another record version, or
 *   unreadable) are deleted by the call that finds them; use {@link prune}
 *   to sweep a whole domain.
 * - Every call performs its I/O in sequence. There is no locking between
 *   processes: concurrent writers to one key are last-write-wins.
 */
export class FileCache implements SimpleCache {
  private constructor(
    private readonly fileSystem: FileSystemPort,
    private readonly clock: Clock,
    private readonly logger: Logger,
    private readonly settings: FileCacheSettings,
  ) {}

  /**
   * Validate the options, check the storage path and create the domain
   * directory.
   *
   * @throws {InvalidArgumentError} for a malformed domain name, shard layout
   * or file extension.
   * @throws {CacheOperationError} when the storage path is not a writable
   * directory or the domain directory cannot be created.
   */
  static async open(deps: FileCacheDeps, options: FileCacheOptions = {}): Promise<FileCache> {
    const domain = options.domain ?? DEFAULT_DOMAIN
    validateDomainName(domain)

    const layout = { ...DEFAULT_SHARD_LAYOUT, ...options.shard }
    validateShardLayout(layout)

    const extension = options.fileExtension ?? DEFAULT_FILE_EXTENSION
    validateFileExtension(extension)

    const storagePath = path.resolve(options.storagePath ?? os.tmpdir())
    const cachePath = path.join(storagePath, domain)
    const { fileSystem, clock } = deps

    const writable = await io("open", () => fileSystem.isWritableDir(storagePath), {
      path: storagePath,
    })
    if (!writable) throw CacheOperationError.storagePathNotWritable(storagePath)

    await io("open", () => fileSystem.createDir(cachePath), { path: cachePath })

    const logger = (deps.logger ?? createNullLogger()).child({ module: "file-cache", domain })

    return new FileCache(fileSystem, clock, logger, {
      domain,
      storagePath,
      cachePath,
      itemPath: { layout, extension },
    })
  }

  get domain(): CacheDomain {
    return this.settings.domain
  }

  get storagePath(): FilePath {
    return this.settings.storagePath
  }

  /** The domain directory, `<storagePath>/<domain>`. */
  get cachePath(): FilePath {
    return this.settings.cachePath
  }

  /**
   * Where the entry for `key` lives, whether or not it exists.
   *
   * @throws {InvalidArgumentError} for a malformed key.
   */
  resolveItemPath(key: CacheKey): FilePath {
    validateKey(key)
    return buildItemPath(this.settings.cachePath, key, this.settings.itemPath)
  }

  async has(key: CacheKey): Promise<boolean> {
    const item = await this.lookup(key, "has")
    return item !== undefined
  }

  async get(key: CacheKey, defaultValue: unknown = null): Promise<unknown> {
    const item = await this.lookup(key, "get")
    return item === undefined ? defaultValue : item.getValue(defaultValue)
  }

  async getMultiple(
    keys: Iterable<CacheKey>,
    defaultValue: unknown = null,
  ): Promise<Map<CacheKey, unknown>> {
    const list = toKeyList(keys, "keys")
    const out = new Map<CacheKey, unknown>()

    for (const key of list) {
      const item = await this.lookup(key, "getMultiple")
      out.set(key, item === undefined ? defaultValue : item.getValue(defaultValue))
    }

    return out
  }

  async set(key: CacheKey, value: unknown, ttl: CacheTtl = null): Promise<boolean> {
    validateKey(key)
    const item = CacheItem.create(value, ttl, this.clock)

    return this.write(key, encodeRecordBytes(item.toRecord()), "set")
  }

  /**
   * Writes are not rolled back: when one write reports failure the others
   * still happen and the call resolves `false`.
   */
  async setMultiple(values: CacheValues, ttl: CacheTtl = null): Promise<boolean> {
    const encoded = toEntryList(values).map(([key, value]) => {
      const item = CacheItem.create(value, ttl, this.clock)
      return [key, encodeRecordBytes(item.toRecord())] as const
    })

    let ok = true
    for (const [key, bytes] of encoded) {
      ok = (await this.write(key, bytes, "setMultiple")) && ok
    }

    return ok
  }

  async delete(key: CacheKey): Promise<boolean> {
    const itemPath = this.resolveItemPath(key)
    return this.removeItemFile(itemPath, "delete", key)
  }

  async deleteMultiple(keys: Iterable<CacheKey>): Promise<boolean> {
    const list = toKeyList(keys, "keys")

    let ok = true
    for (const key of list) {
      const itemPath = this.resolveItemPath(key)
      ok = (await this.removeItemFile(itemPath, "deleteMultiple", key)) && ok
    }

    return ok
  }

  async clear(): Promise<boolean> {
    const { cachePath } = this.settings
    const context = { path: cachePath }

    const removed = await io("clear", () => this.fileSystem.removeDirRecursive(cachePath), context)
    await io("clear", () => this.fileSystem.createDir(cachePath), context)

    this.logger.info("cache cleared", { operation: "clear", path: cachePath, removed })

    return removed
  }

  /**
   * Walk the domain directory and delete every item file that would be
   * treated as a miss. Entries that are still fresh are left alone.
   */
  async prune(): Promise<PruneResult> {
    const { cachePath, itemPath } = this.settings
    const startedAt = this.clock.nowMs()

    const files = await io("prune", () => this.fileSystem.listFiles(cachePath), {
      path: cachePath,
    })

    const result: PruneResult = { scanned: 0, removed: 0 }

    for (const file of files) {
      if (!file.endsWith(itemPath.extension)) continue
      result.scanned++

      const bytes = await io("prune", () => this.fileSystem.readFile(file), { path: file })
      const parsed = parseRecordBytes(bytes)
      const stale =
        parsed.kind === "malformed" || CacheItem.isInvalidOrExpired(parsed.record, this.clock)

      if (stale && (await this.removeItemFile(file, "prune"))) result.removed++
    }

    this.logger.info("cache pruned", {
      operation: "prune",
      path: cachePath,
      ...result,
      durationMs: this.clock.nowMs() - startedAt,
    })

    return result
  }

  isInvalidOrExpiredCacheItemRecord(record: unknown): boolean {
    return CacheItem.isInvalidOrExpired(record, this.clock)
  }

  /**
   * Read and check the entry for `key`. Anything that is not a fresh, valid
   * record is deleted and reported as a miss.
   */
  private async lookup(key: CacheKey, operation: string): Promise<CacheItem | undefined> {
    const itemPath = this.resolveItemPath(key)
    const context = { key, path: itemPath }

    const readable = await io(operation, () => this.fileSystem.isReadableFile(itemPath), context)
    if (!readable) {
      this.logger.debug("cache miss", { operation, ...context })
      return undefined
    }

    const bytes = await io(operation, () => this.fileSystem.readFile(itemPath), context)
    const parsed = parseRecordBytes(bytes)
    const inspection =
      parsed.kind === "malformed"
        ? { kind: "invalid" as const, reason: parsed.reason }
        : CacheItem.inspect(parsed.record, this.clock)

    if (inspection.kind !== "valid") {
      const reason = inspection.kind === "expired" ? "expired" : inspection.reason
      await this.removeItemFile(itemPath, operation, key)

      this.logger.info("evicted stale cache item", { operation, ...context, reason })
      return undefined
    }

    this.logger.debug("cache hit", { operation, ...context })
    return inspection.item
  }

  private async write(key: CacheKey, bytes: Uint8Array, operation: string): Promise<boolean> {
    const itemPath = this.resolveItemPath(key)
    const shardDir = path.dirname(itemPath)
    const context = { key, path: itemPath }

    if (!(await io(operation, () => this.fileSystem.dirExists(shardDir), context))) {
      const created = await io(operation, () => this.fileSystem.createDir(shardDir), context)
      if (!created) return false
    }

    if (!(await io(operation, () => this.fileSystem.fileExists(itemPath), context))) {
      const created = await io(operation, () => this.fileSystem.createFile(itemPath), context)
      if (!created) return false
    }

    return io(operation, () => this.fileSystem.writeFile(itemPath, bytes), context)
  }

  /** Delete an item file. A file that is already gone counts as deleted. */
  private async removeItemFile(
    itemPath: FilePath,
    operation: string,
    key?: CacheKey,
  ): Promise<boolean> {
    const context: IoContext = { path: itemPath, ...(key !== undefined && { key }) }

    if (!(await io(operation, () => this.fileSystem.fileExists(itemPath), context))) return true

    return io(operation, () => this.fileSystem.deleteFile(itemPath), context)
  }
}

/**
 * Run one backend call, wrapping whatever it throws in a CacheOperationError.
 */
async function io<T>(operation: string, run: () => Promise<T>, context: IoContext): Promise<T> {
  try {
    return await run()
  } catch (err) {
    if (err instanceof CacheError) throw err
    throw CacheOperationError.backendFailure(operation, err, context)
  }
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === "function"
  )
}

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  if (typeof value !== "object" || value === null) return false

  const proto = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/** Materialize and validate every key before any I/O happens. */
function toKeyList(keys: unknown, argument: string): CacheKey[] {
  if (!isIterable(keys)) throw InvalidArgumentError.notIterable(argument, keys)

  const list: CacheKey[] = []
  for (const key of keys) {
    validateKey(key)
    list.push(key)
  }

  return list
}

function toEntryList(values: unknown): Array<readonly [CacheKey, unknown]> {
  const entries: Array<readonly [CacheKey, unknown]> = []

  const add = (key: unknown, value: unknown) => {
    validateKey(key)
    entries.push([key, value])
  }

  if (isIterable(values)) {
    for (const entry of values) {
      if (!Array.isArray(entry) || entry.length !== 2) {
        throw new InvalidArgumentError("values must contain [key, value] pairs", {
          context: { argument: "values" },
        })
      }
      const pair: readonly unknown[] = entry
      add(pair[0], pair[1])
    }
    return entries
  }

  if (isRecord(values)) {
    for (const [key, value] of Object.entries(values)) add(key, value)
    return entries
  }

  throw new InvalidArgumentError("values must be an iterable of pairs or a plain object", {
    context: { argument: "values" },
  })
}
