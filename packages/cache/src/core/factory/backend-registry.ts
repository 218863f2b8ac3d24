import type { Clock } from "@tiercache/clock"
import type { Logger } from "@tiercache/logger"
import type Database from "better-sqlite3"
import { BoundedMemoryBackend } from "../../adapters/bounded-memory/bounded-memory-backend"
import { MemoryBackend } from "../../adapters/memory/memory-backend"
import { RedisBackend } from "../../adapters/redis/redis-backend"
import { createRedisCacheClient, type RedisCacheClient } from "../../adapters/redis/redis-client"
import { SqliteBackend } from "../../adapters/sqlite/sqlite-backend"
import type { CacheBackend } from "../../ports/cache-backend"
import type { BackendConfig, BackendKind, CacheConfig } from "./cache-config-schema"

/** Collaborators a backend may use; anything left out is created from config. */
export type BackendDeps = {
  clock?: Clock
  logger?: Logger
  redisClient?: RedisCacheClient
  sqliteDb?: Database.Database
}

export type BackendRegistry = {
  [K in BackendKind]: (config: BackendConfig<K>, deps: BackendDeps) => CacheBackend
}

export const backendRegistry: BackendRegistry = {
  memory: (_config, deps) => new MemoryBackend({ scheduler: deps.clock }),

  "bounded-memory": (config, deps) =>
    new BoundedMemoryBackend(
      { scheduler: deps.clock, logger: deps.logger },
      {
        maxSizeMb: config.maxSizeMb,
        raiseOnOversize: config.raiseOnOversize,
        evictionPolicy: config.evictionPolicy,
      },
    ),

  redis: (config, deps) =>
    new RedisBackend(
      { client: deps.redisClient ?? createRedisCacheClient(config.url) },
      { batchSize: config.batchSize },
    ),

  sqlite: (config, deps) =>
    new SqliteBackend({ db: deps.sqliteDb, clock: deps.clock }, { filename: config.filename }),
}

export function createBackend(config: CacheConfig, deps: BackendDeps = {}): CacheBackend {
  return build(config.backend, config, deps)
}

function build<K extends BackendKind>(
  kind: K,
  config: BackendConfig<K>,
  deps: BackendDeps,
): CacheBackend {
  return backendRegistry[kind](config, deps)
}
