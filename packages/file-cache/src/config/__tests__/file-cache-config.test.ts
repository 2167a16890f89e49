import * as fs from "node:fs/promises"
import * as os from "node:os"
import * as path from "node:path"
import { ConfigurationError } from "../../core/errors/cache-errors"
import { loadFileCacheConfig } from "../file-cache-config"

describe("loadFileCacheConfig", () => {
  it("falls back to defaults", async () => {
    const config = await loadFileCacheConfig({ env: {}, dotenvFile: false })

    expect(config).toStrictEqual({
      domain: "file-cache",
      shard: { depth: 2, width: 2 },
      fileExtension: ".json",
      log: { level: "info", prettify: false, service: "stashfs" },
    })
  })

  it("maps every variable", async () => {
    const config = await loadFileCacheConfig({
      dotenvFile: false,
      env: {
        FILE_CACHE_DOMAIN: "thumbs",
        FILE_CACHE_STORAGE_PATH: "/var/cache/app",
        FILE_CACHE_SHARD_DEPTH: "3",
        FILE_CACHE_SHARD_WIDTH: "1",
        FILE_CACHE_FILE_EXTENSION: ".cache",
        FILE_CACHE_LOG_LEVEL: "debug",
        FILE_CACHE_LOG_PRETTY: "1",
        FILE_CACHE_SERVICE_NAME: "thumbnailer",
      },
    })

    expect(config).toStrictEqual({
      domain: "thumbs",
      storagePath: "/var/cache/app",
      shard: { depth: 3, width: 1 },
      fileExtension: ".cache",
      log: { level: "debug", prettify: true, service: "thumbnailer" },
    })
  })

  it("ignores variables without the FILE_CACHE_ prefix", async () => {
    const config = await loadFileCacheConfig({
      dotenvFile: false,
      env: { DOMAIN: "a/b", LOG_LEVEL: "verbose", FILE_CACHE_SHARD_WIDTH: "4" },
    })

    expect(config.domain).toBe("file-cache")
    expect(config.log.level).toBe("info")
    expect(config.shard).toStrictEqual({ depth: 2, width: 4 })
  })

  it("lets the environment override the dotenv file", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "stashfs-config-"))
    await fs.writeFile(
      path.join(dir, ".env"),
      "FILE_CACHE_DOMAIN=from-file\nFILE_CACHE_LOG_LEVEL=warn\n",
    )

    try {
      const config = await loadFileCacheConfig({
        cwd: dir,
        env: { FILE_CACHE_DOMAIN: "from-env" },
      })

      expect(config.domain).toBe("from-env")
      expect(config.log.level).toBe("warn")
    } finally {
      await fs.rm(dir, { recursive: true, force: true })
    }
  })

  it.each([
    ["a malformed domain", { FILE_CACHE_DOMAIN: "a/b" }],
    ["a zero shard depth", { FILE_CACHE_SHARD_DEPTH: "0" }],
    ["a shard layout longer than the hash", { FILE_CACHE_SHARD_DEPTH: "9", FILE_CACHE_SHARD_WIDTH: "8" }],
    ["an extension without a dot", { FILE_CACHE_FILE_EXTENSION: "json" }],
    ["an unknown log level", { FILE_CACHE_LOG_LEVEL: "verbose" }],
    ["a non-boolean flag", { FILE_CACHE_LOG_PRETTY: "yes" }],
  ])("rejects %s", async (_name, env) => {
    await expect(loadFileCacheConfig({ env, dotenvFile: false })).rejects.toBeInstanceOf(
      ConfigurationError,
    )
  })
})
