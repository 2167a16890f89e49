import { logLevelNames } from "@stashfs/logger"
import { z } from "zod"

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1")

const shardSize = z.coerce.number().int().min(1)

/** Variable name prefix for every setting below. */
export const FILE_CACHE_ENV_PREFIX = "FILE_CACHE_"

/**
 * Settings read by `createFileCacheFromEnv`, keyed without the
 * `FILE_CACHE_` prefix.
 */
export const fileCacheEnvSchema = z
  .object({
    DOMAIN: z
      .string()
      .regex(/^[a-zA-Z0-9_-]{1,64}$/, "must be 1-64 characters of [a-zA-Z0-9_-]")
      .default("file-cache"),
    STORAGE_PATH: z.string().min(1).optional(),
    SHARD_DEPTH: shardSize.default(2),
    SHARD_WIDTH: shardSize.default(2),
    FILE_EXTENSION: z
      .string()
      .regex(/^\.[a-zA-Z0-9]{1,16}$/, "must be a dot followed by 1-16 characters of [a-zA-Z0-9]")
      .default(".json"),
    LOG_LEVEL: z.enum(logLevelNames).default("info"),
    LOG_PRETTY: flag.default(false),
    SERVICE_NAME: z.string().min(1).default("stashfs"),
  })
  .refine((env) => env.SHARD_DEPTH * env.SHARD_WIDTH <= 64, {
    message: "FILE_CACHE_SHARD_DEPTH × FILE_CACHE_SHARD_WIDTH must not exceed 64",
    path: ["SHARD_DEPTH"],
  })

export type FileCacheEnv = z.output<typeof fileCacheEnvSchema>
