import {
  createNullLogger,
  createPinoLogger,
  type Logger,
  type PinoLoggerDeps,
} from "@stashfs/logger"
import { createNodeFileSystem, type FileSystemPort } from "@stashfs/storage"
import { FileCache, type FileCacheOptions } from "./adapters/file/file-cache"
import {
  type LoadFileCacheConfigOptions,
  loadFileCacheConfig,
} from "./config/file-cache-config"
import { type Clock, SystemClock } from "./core/time/clock"

export type CreateFileCacheOptions = FileCacheOptions & {
  /** Default: the Node filesystem. */
  fileSystem?: FileSystemPort

  /** Default: the system clock. */
  clock?: Clock

  /** Default: no logging. */
  logger?: Logger
}

/**
 * Open a file cache on the local filesystem.
 *
 * @example
 * ```ts
 * const cache = await createFileCache({ domain: "thumbnails", storagePath: "/var/cache/app" })
 *
 * await cache.set("image.42", { width: 640, height: 480 }, 3600)
 * ```
 */
export function createFileCache(options: CreateFileCacheOptions = {}): Promise<FileCache> {
  const { fileSystem, clock, logger, ...cacheOptions } = options

  return FileCache.open(
    {
      fileSystem: fileSystem ?? createNodeFileSystem(),
      clock: clock ?? new SystemClock(),
      logger: logger ?? createNullLogger(),
    },
    cacheOptions,
  )
}

export type CreateFileCacheFromEnvOptions = LoadFileCacheConfigOptions & {
  /** Applied on top of the loaded configuration. */
  overrides?: FileCacheOptions

  fileSystem?: FileSystemPort
  clock?: Clock

  /** Where log lines go. Default: stdout (pretty when `FILE_CACHE_LOG_PRETTY` is set). */
  logDestination?: PinoLoggerDeps["destination"]
}

/**
 * Open a file cache configured from `FILE_CACHE_*` variables, logging
 * through pino.
 *
 * @throws {ConfigurationError} when a variable fails validation.
 */
export async function createFileCacheFromEnv(
  options: CreateFileCacheFromEnvOptions = {},
): Promise<FileCache> {
  const config = await loadFileCacheConfig(options)

  const logger = createPinoLogger(
    options.logDestination === undefined ? {} : { destination: options.logDestination },
    { level: config.log.level, prettify: config.log.prettify },
    { service: config.log.service },
  )

  return createFileCache({
    domain: config.domain,
    ...(config.storagePath !== undefined && { storagePath: config.storagePath }),
    shard: config.shard,
    fileExtension: config.fileExtension,
    ...options.overrides,
    ...(options.fileSystem !== undefined && { fileSystem: options.fileSystem }),
    ...(options.clock !== undefined && { clock: options.clock }),
    logger,
  })
}
