export {
  BoundedMemoryBackend,
  type BoundedMemoryBackendDeps,
  type BoundedMemoryBackendOptions,
} from "./adapters/bounded-memory/bounded-memory-backend"
export { MemoryBackend, type MemoryBackendDeps } from "./adapters/memory/memory-backend"
export { RedisBackend, type RedisBackendDeps, type RedisBackendOptions } from "./adapters/redis/redis-backend"
export {
  createRedisCacheClient,
  type RedisArgument,
  type RedisCacheClient,
  type RedisSetOptions,
} from "./adapters/redis/redis-client"
export { SqliteBackend, type SqliteBackendDeps, type SqliteBackendOptions } from "./adapters/sqlite/sqlite-backend"
export { Cache, type CacheDeps, type CacheOptions, DEFAULT_TIMEOUT_MS } from "./core/cache"
export {
  AllLayersFailedError,
  CacheConfigError,
  CacheTimeoutError,
  KeyExistsError,
  NotAnIntegerError,
  OptimisticLockConflictError,
  OversizedValueError,
  SerializationError,
  UnsupportedCommandError,
} from "./core/errors"
export type { EvictionMap } from "./core/eviction/eviction-map"
export { FifoMemoryMap } from "./core/eviction/fifo-memory-map"
export { LruMemoryMap } from "./core/eviction/lru-memory-map"
export { type BackendDeps, type BackendRegistry, backendRegistry, createBackend } from "./core/factory/backend-registry"
export {
  type BackendConfig,
  type BackendKind,
  backendKinds,
  type CacheConfig,
  type CacheConfigInput,
  cacheConfigSchema,
  type LayeredCacheConfig,
  type LayeredCacheConfigInput,
  layeredCacheConfigSchema,
  type SerializerKind,
  serializerKinds,
} from "./core/factory/cache-config-schema"
export {
  type CacheFactoryDeps,
  createCache,
  createCacheFromConfig,
  parseCacheConfig,
} from "./core/factory/create-cache"
export {
  type CacheSettings,
  cacheSettingsSchema,
  type LoadCacheConfigOptions,
  type LoadedCacheConfig,
  loadCacheConfig,
} from "./core/factory/load-cache-config"
export { colonKeyBuilder, defaultKeyBuilder } from "./core/keys/key-builders"
export { LayeredCache, type LayeredCacheDeps, type LayeredCacheOptions } from "./core/layered/layered-cache"
export {
  type AcquireResult,
  DistributedLock,
  type DistributedLockDeps,
  type DistributedLockOptions,
  type LockableCache,
  type LockStatus,
  withDistributedLock,
} from "./core/lock/distributed-lock"
export {
  defaultLockEventRegistry,
  LockEventRegistry,
  type LockTicket,
  type WaitOutcome,
} from "./core/lock/lock-event-registry"
export { OptimisticLock, type OptimisticLockOptions, withOptimisticLock } from "./core/lock/optimistic-lock"
export { type CachedOptions, cached } from "./core/memo/cached"
export { type MultiCachedOptions, multiCached } from "./core/memo/multi-cached"
export { JsonSerializer } from "./core/serializers/json-serializer"
export { PassthroughSerializer } from "./core/serializers/passthrough-serializer"
export { StringSerializer } from "./core/serializers/string-serializer"
export { millisecondsTtl, secondsTtl, ttlToMs } from "./core/ttl"
export type { AddResult } from "./ports/add-result"
export type { BackendSetOptions, BackendWriteOptions, CacheBackend } from "./ports/cache-backend"
export type { CacheClient, CachePrimitives } from "./ports/cache-client"
export type { CacheEntry } from "./ports/cache-entry"
export type { CacheEvictionPolicy } from "./ports/cache-eviction-policy"
export type { CacheKey } from "./ports/cache-key"
export type { CacheHit, CacheMiss, CacheResult, VersionedHit, VersionedResult } from "./ports/cache-result"
export type {
  CacheCallOptions,
  CacheClearOptions,
  CacheSetOptions,
  CacheTtl,
  CacheWriteOptions,
} from "./ports/cache-ttl"
export type { KeyBuilder } from "./ports/key-builder"
export type { Serializer } from "./ports/serializer"
export type { WireEncoding, WireValue } from "./ports/wire-value"
