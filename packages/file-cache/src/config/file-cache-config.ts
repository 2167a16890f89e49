import type { LogLevelName } from "@stashfs/logger"
import type { FilePath } from "@stashfs/storage"
import type { ShardLayout } from "../core/paths/item-path"
import type { CacheDomain } from "../ports/cache-key"
import { loadConfig } from "./load-config"
import { FILE_CACHE_ENV_PREFIX, type FileCacheEnv, fileCacheEnvSchema } from "./schema"
import { DotenvSource } from "./sources/dotenv-source"
import { EnvSource } from "./sources/env-source"

export type FileCacheConfig = Readonly<{
  domain: CacheDomain
  storagePath?: FilePath
  shard: ShardLayout
  fileExtension: string
  log: Readonly<{
    level: LogLevelName
    prettify: boolean
    service: string
  }>
}>

export type LoadFileCacheConfigOptions = {
  /** Default: `process.env`. */
  env?: Record<string, string | undefined>

  /**
   * Optional dotenv file loaded before `env`; `false` skips it.
   *
   * Default: `".env"`.
   */
  dotenvFile?: string | false

  /** Base directory for a relative `dotenvFile`. Default: `process.cwd()`. */
  cwd?: string
}

export function toFileCacheConfig(env: FileCacheEnv): FileCacheConfig {
  return {
    domain: env.DOMAIN,
    ...(env.STORAGE_PATH !== undefined && { storagePath: env.STORAGE_PATH }),
    shard: { depth: env.SHARD_DEPTH, width: env.SHARD_WIDTH },
    fileExtension: env.FILE_EXTENSION,
    log: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      service: env.SERVICE_NAME,
    },
  }
}

/**
 * Read the `FILE_CACHE_*` variables from a dotenv file and the environment.
 *
 * @throws {ConfigurationError} when a variable fails validation.
 */
export async function loadFileCacheConfig(
  options: LoadFileCacheConfigOptions = {},
): Promise<FileCacheConfig> {
  const dotenvFile = options.dotenvFile ?? ".env"
  const sources = [
    ...(dotenvFile === false
      ? []
      : [
          new DotenvSource({
            file: dotenvFile,
            prefix: FILE_CACHE_ENV_PREFIX,
            required: false,
            ...(options.cwd !== undefined && { cwd: options.cwd }),
          }),
        ]),
    new EnvSource({
      prefix: FILE_CACHE_ENV_PREFIX,
      ...(options.env !== undefined && { env: options.env }),
    }),
  ]

  const { value } = await loadConfig({ schema: fileCacheEnvSchema, sources })

  return toFileCacheConfig(value)
}
