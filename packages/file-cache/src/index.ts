export {
  DEFAULT_DOMAIN,
  FileCache,
  type FileCacheDeps,
  type FileCacheOptions,
  type PruneResult,
} from "./adapters/file/file-cache"
export {
  type FileCacheConfig,
  type LoadFileCacheConfigOptions,
  loadFileCacheConfig,
  toFileCacheConfig,
} from "./config/file-cache-config"
export { type LoadConfigOptions, type LoadedConfig, loadConfig } from "./config/load-config"
export { FILE_CACHE_ENV_PREFIX, type FileCacheEnv, fileCacheEnvSchema } from "./config/schema"
export { type ConfigSource, selectPrefixed } from "./config/sources/config-source"
export { DotenvSource, type DotenvSourceOptions } from "./config/sources/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./config/sources/env-source"
export {
  type CreateFileCacheFromEnvOptions,
  type CreateFileCacheOptions,
  createFileCache,
  createFileCacheFromEnv,
} from "./create"
export {
  CacheError,
  type CacheErrorCode,
  CacheErrorCodes,
  type CacheErrorContext,
  type CacheErrorOptions,
  CacheOperationError,
  ConfigurationError,
  InvalidArgumentError,
} from "./core/errors/cache-errors"
export {
  CacheItem,
  type CacheItemInspection,
} from "./core/item/cache-item"
export {
  CACHE_ITEM_VERSION,
  type CacheItemRecord,
  cacheItemRecordSchema,
} from "./core/item/cache-item-record"
export {
  encodeRecordBytes,
  type ParsedRecordBytes,
  parseRecordBytes,
} from "./core/item/record-bytes"
export { resolveExpiresAt } from "./core/item/resolve-expiry"
export {
  decodeValue,
  type EncodedValue,
  encodeValue,
  type StoredValue,
  type ValueType,
  valueTypes,
} from "./core/item/value-codec"
export {
  buildItemPath,
  DEFAULT_FILE_EXTENSION,
  DEFAULT_SHARD_LAYOUT,
  hashKey,
  type ShardLayout,
} from "./core/paths/item-path"
export { type Clock, SystemClock, toUnixSeconds } from "./core/time/clock"
export { FakeClock } from "./core/time/fake-clock"
export {
  isValidDomainName,
  isValidKey,
  validateDomainName,
  validateKey,
} from "./core/validation/validate-names"
export type { CacheDomain, CacheKey } from "./ports/cache-key"
export type { CacheTtl, CacheTtlSpec } from "./ports/cache-ttl"
export type { CacheValues, SimpleCache } from "./ports/simple-cache"
export type { Milliseconds, Seconds, UnixSeconds } from "./ports/time"
