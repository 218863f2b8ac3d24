import type { CacheClient } from "../../ports/cache-client"
import type { CacheTtl } from "../../ports/cache-ttl"
import type { Serializer } from "../../ports/serializer"
import { Cache } from "../cache"
import { CacheConfigError } from "../errors"
import { LayeredCache } from "../layered/layered-cache"
import { JsonSerializer } from "../serializers/json-serializer"
import { PassthroughSerializer } from "../serializers/passthrough-serializer"
import { StringSerializer } from "../serializers/string-serializer"
import { type BackendDeps, createBackend } from "./backend-registry"
import {
  type CacheConfig,
  type CacheConfigInput,
  cacheConfigSchema,
  type LayeredCacheConfig,
  type LayeredCacheConfigInput,
  layeredCacheConfigSchema,
  type SerializerKind,
} from "./cache-config-schema"

export type CacheFactoryDeps = BackendDeps & {
  /** Replaces the serializer named in the config. */
  serializer?: Serializer<unknown>
}

const serializers: { [K in SerializerKind]: () => Serializer<unknown> } = {
  json: () => new JsonSerializer(),
  string: () => new StringSerializer(),
  passthrough: () => new PassthroughSerializer(),
}

function toTtl(ttlSeconds: number | undefined): CacheTtl | undefined {
  return ttlSeconds === undefined || ttlSeconds === 0 ? undefined : { kind: "seconds", seconds: ttlSeconds }
}

/** Builds a `Cache` over the backend `config` names. */
export function createCache(config: CacheConfig, deps: CacheFactoryDeps = {}): Cache<unknown> {
  return new Cache<unknown>(
    {
      backend: createBackend(config, deps),
      serializer: deps.serializer ?? serializers[config.serializer](),
      logger: deps.logger,
      clock: deps.clock,
    },
    {
      namespace: config.namespace,
      ttl: toTtl(config.ttlSeconds),
      timeoutMs: config.timeoutMs,
    },
  )
}

export function parseCacheConfig(input: unknown): CacheConfig | LayeredCacheConfig {
  const result =
    typeof input === "object" && input !== null && "layers" in input
      ? layeredCacheConfigSchema.safeParse(input)
      : cacheConfigSchema.safeParse(input)

  if (!result.success) {
    throw new CacheConfigError("Invalid cache configuration", {
      cause: result.error,
      context: { issues: result.error.issues.map((issue) => issue.message) },
    })
  }

  return result.data
}

/**
 * Validates `input` and builds a single or layered cache from it.
 *
 * @throws {CacheConfigError} if `input` does not match either schema
 */
export function createCacheFromConfig(
  input: CacheConfigInput | LayeredCacheConfigInput,
  deps: CacheFactoryDeps = {},
): CacheClient<unknown> {
  const config = parseCacheConfig(input)

  if (!("layers" in config)) return createCache(config, deps)

  return new LayeredCache<unknown>(
    {
      layers: config.layers.map((layer) => createCache(layer, deps)),
      logger: deps.logger,
      clock: deps.clock,
    },
    {
      namespace: config.namespace,
      ttl: toTtl(config.ttlSeconds),
      timeoutMs: config.timeoutMs,
    },
  )
}
