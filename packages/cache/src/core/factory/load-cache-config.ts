import { EnvSource, type IConfig, loadConfig, ObjectSource } from "@tiercache/config"
import { z } from "zod"
import { CacheConfigError } from "../errors"
import { backendKinds, type CacheConfig, cacheConfigSchema, serializerKinds } from "./cache-config-schema"

const flag = z.union([
  z.boolean(),
  z.enum(["true", "false", "1", "0"]).transform((v) => v === "true" || v === "1"),
])

/** Flat settings as they appear in the environment, minus the `CACHE_` prefix. */
export const cacheSettingsSchema = z.object({
  BACKEND: z.enum(backendKinds).default("memory"),
  NAMESPACE: z.string().default(""),
  TTL_SECONDS: z.coerce.number().nonnegative().optional(),
  TIMEOUT_MS: z.coerce.number().int().nonnegative().default(5000),
  SERIALIZER: z.enum(serializerKinds).default("json"),
  MAX_SIZE_MB: z.coerce.number().positive().default(64),
  RAISE_ON_OVERSIZE: flag.default(false),
  EVICTION_POLICY: z.enum(["lru", "fifo"]).default("lru"),
  REDIS_URL: z.string().default("redis://localhost:6379"),
  SQLITE_FILENAME: z.string().default(":memory:"),
})

export type CacheSettings = z.output<typeof cacheSettingsSchema>

export type LoadCacheConfigOptions = {
  /** Default: `process.env`. */
  env?: Record<string, string | undefined>
  /** Flat settings applied over the environment. */
  overrides?: Partial<Record<keyof CacheSettings, unknown>>
}

export type LoadedCacheConfig = {
  config: CacheConfig
  /** Where each setting came from; see `IConfig.explain()`. */
  settings: IConfig<CacheSettings>
}

/**
 * Reads `CACHE_*` variables and `overrides` into a validated `CacheConfig`.
 *
 * @example
 * ```ts
 * // CACHE_BACKEND=redis CACHE_REDIS_URL=redis://cache:6379 CACHE_TTL_SECONDS=60
 * const { config } = await loadCacheConfig()
 * const cache = createCache(config)
 * ```
 */
export async function loadCacheConfig(opts: LoadCacheConfigOptions = {}): Promise<LoadedCacheConfig> {
  const settings = await loadConfig({
    schema: cacheSettingsSchema,
    sources: [
      new EnvSource({ env: opts.env, prefix: "CACHE_" }),
      new ObjectSource({ ...opts.overrides }),
    ],
  })

  const s = settings.value
  const common = {
    namespace: s.NAMESPACE,
    ttlSeconds: s.TTL_SECONDS,
    timeoutMs: s.TIMEOUT_MS,
    serializer: s.SERIALIZER,
  }

  const candidate = (() => {
    switch (s.BACKEND) {
      case "memory":
        return { backend: s.BACKEND, ...common }
      case "bounded-memory":
        return {
          backend: s.BACKEND,
          ...common,
          maxSizeMb: s.MAX_SIZE_MB,
          raiseOnOversize: s.RAISE_ON_OVERSIZE,
          evictionPolicy: s.EVICTION_POLICY,
        }
      case "redis":
        return { backend: s.BACKEND, ...common, url: s.REDIS_URL }
      case "sqlite":
        return { backend: s.BACKEND, ...common, filename: s.SQLITE_FILENAME }
    }
  })()

  const result = cacheConfigSchema.safeParse(candidate)

  if (!result.success) {
    throw new CacheConfigError("Cache settings do not form a valid configuration", {
      cause: result.error,
    })
  }

  return { config: result.data, settings }
}
