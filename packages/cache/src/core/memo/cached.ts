import type { Milliseconds } from "@tiercache/clock"
import { type Logger, NullLogger } from "@tiercache/logger"
import { MemorySingleflight } from "@tiercache/singleflight"
import type { CacheClient } from "../../ports/cache-client"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheResult } from "../../ports/cache-result"
import type { CacheTtl } from "../../ports/cache-ttl"
import type { LockEventRegistry } from "../lock/lock-event-registry"
import { DistributedLock } from "../lock/distributed-lock"

export type CachedOptions<A extends unknown[], R> = {
  cache: CacheClient<R>

  /** A fixed key for every call. */
  key?: CacheKey

  /** Derives the key from the arguments. Default: the function name and JSON of the arguments. */
  keyFrom?: (...args: A) => CacheKey

  /** Default: the cache's TTL. */
  ttl?: CacheTtl

  /** Results for which this returns `true` are returned but not stored. */
  skipCache?: (result: R) => boolean

  /**
   * When set, a miss takes a `DistributedLock` with this lease before
   * computing, so only one process recomputes a cold key at a time.
   */
  lease?: Milliseconds

  registry?: LockEventRegistry
  logger?: Logger
}

/**
 * Read-through memoization of an async function.
 *
 * Concurrent calls for the same key in this process share one computation.
 * A cache that fails is logged and bypassed: the function still runs.
 *
 * @example
 * ```ts
 * const getUser = cached(loadUser, {
 *   cache,
 *   keyFrom: (id: string) => `user:${id}`,
 *   ttl: { kind: "seconds", seconds: 60 },
 * })
 * ```
 */
export function cached<A extends unknown[], R>(
  fn: (...args: A) => Promise<R>,
  opts: CachedOptions<A, R>,
): (...args: A) => Promise<R> {
  const flights = new MemorySingleflight<R>()
  const logger = (opts.logger ?? new NullLogger()).child({ module: "cached" })

  const keyFor = (args: A): CacheKey => {
    if (opts.key !== undefined) return opts.key
    if (opts.keyFrom) return opts.keyFrom(...args)

    return `${fn.name}(${JSON.stringify(args)})`
  }

  const lookup = async (key: CacheKey): Promise<CacheResult<R>> => {
    try {
      return await opts.cache.get(key)
    } catch (err) {
      logger.warn("cache read failed, calling through", { op: "get", key, err })

      return { kind: "miss" }
    }
  }

  const store = async (key: CacheKey, value: R): Promise<void> => {
    if (opts.skipCache?.(value)) return

    try {
      await opts.cache.set(key, value, opts.ttl === undefined ? {} : { ttl: opts.ttl })
    } catch (err) {
      logger.warn("cache write failed", { op: "set", key, err })
    }
  }

  const compute = async (key: CacheKey, args: A): Promise<R> => {
    const value = await fn(...args)

    await store(key, value)

    return value
  }

  const load = async (key: CacheKey, args: A): Promise<R> => {
    const hit = await lookup(key)

    if (hit.kind === "hit") return hit.value
    if (opts.lease === undefined) return compute(key, args)

    const lock = new DistributedLock(
      { client: opts.cache, registry: opts.registry, logger: opts.logger },
      { key, leaseMs: opts.lease },
    )

    try {
      await lock.acquire()
    } catch (err) {
      logger.warn("cache lock failed, calling through", { op: "lock", key, err })

      return compute(key, args)
    }

    try {
      // Whoever held the lock may have filled the key by now.
      const filled = await lookup(key)

      return filled.kind === "hit" ? filled.value : await compute(key, args)
    } finally {
      await lock.release().catch((err: unknown) => {
        logger.warn("cache unlock failed", { op: "unlock", key, err })
      })
    }
  }

  return async (...args: A): Promise<R> => {
    const key = keyFor(args)
    const { value } = await flights.run(key, () => load(key, args))

    return value
  }
}
