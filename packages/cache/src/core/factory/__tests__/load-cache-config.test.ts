import { ConfigValidationError } from "@tiercache/config"
import { loadCacheConfig } from "../load-cache-config"

describe("loadCacheConfig", () => {
  it("falls back to an in-memory JSON cache", async () => {
    const { config, settings } = await loadCacheConfig({ env: {} })

    expect(config).toMatchObject({
      backend: "memory",
      namespace: "",
      timeoutMs: 5000,
      serializer: "json",
    })
    expect(config.ttlSeconds).toBeUndefined()
    expect(settings.sourcesUsed()).toStrictEqual([])
  })

  it("reads CACHE_ variables and coerces them", async () => {
    const { config } = await loadCacheConfig({
      env: {
        CACHE_BACKEND: "bounded-memory",
        CACHE_MAX_SIZE_MB: "8",
        CACHE_RAISE_ON_OVERSIZE: "true",
        CACHE_EVICTION_POLICY: "fifo",
        CACHE_TTL_SECONDS: "30",
        HOME: "/root",
      },
    })

    expect(config).toMatchObject({
      backend: "bounded-memory",
      maxSizeMb: 8,
      raiseOnOversize: true,
      evictionPolicy: "fifo",
      ttlSeconds: 30,
    })
  })

  it("accepts 1 and 0 as flags", async () => {
    const { config } = await loadCacheConfig({
      env: { CACHE_BACKEND: "bounded-memory", CACHE_RAISE_ON_OVERSIZE: "1" },
    })

    expect(config).toMatchObject({ raiseOnOversize: true })
  })

  it("builds backend-specific settings", async () => {
    const redis = await loadCacheConfig({
      env: { CACHE_BACKEND: "redis", CACHE_REDIS_URL: "redis://cache.internal:6380" },
    })
    const sqlite = await loadCacheConfig({
      env: { CACHE_BACKEND: "sqlite", CACHE_SQLITE_FILENAME: "/tmp/cache.db" },
    })

    expect(redis.config).toMatchObject({ backend: "redis", url: "redis://cache.internal:6380", batchSize: 1000 })
    expect(sqlite.config).toMatchObject({ backend: "sqlite", filename: "/tmp/cache.db" })
  })

  it("applies overrides over the environment and explains where values came from", async () => {
    const { config, settings } = await loadCacheConfig({
      env: { CACHE_BACKEND: "redis", CACHE_NAMESPACE: "app:" },
      overrides: { BACKEND: "memory" },
    })

    expect(config.backend).toBe("memory")
    expect(config.namespace).toBe("app:")
    expect(settings.explain("BACKEND")).toBe("object:overrides")
    expect(settings.explain("NAMESPACE")).toBe("env")
    expect(settings.explain("TIMEOUT_MS")).toBe("default")
  })

  it("rejects settings the schema does not accept", async () => {
    await expect(loadCacheConfig({ env: { CACHE_BACKEND: "memcached" } })).rejects.toBeInstanceOf(
      ConfigValidationError,
    )
    await expect(
      loadCacheConfig({ env: { CACHE_RAISE_ON_OVERSIZE: "yes" } }),
    ).rejects.toMatchObject({ code: "config_invalid", context: { sources: ["env", "object:overrides"] } })
  })
})
