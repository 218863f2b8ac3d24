import { type Logger, NullLogger } from "@tiercache/logger"
import type { CacheClient } from "../../ports/cache-client"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheResult } from "../../ports/cache-result"
import type { CacheTtl } from "../../ports/cache-ttl"

export type MultiCachedOptions<K extends string, R> = {
  cache: CacheClient<R>

  /** Cache key for an input key. Default: the input key itself. */
  keyBuilder?: (key: K) => CacheKey

  ttl?: CacheTtl
  skipCache?: (result: R) => boolean
  logger?: Logger
}

/**
 * Batch read-through: looks every key up with one `multiGet`, calls `fn`
 * with only the missing keys, and stores what it returns with one
 * `multiSet`.
 *
 * The result holds the keys that were found or computed, in input order.
 * Keys `fn` leaves out are simply absent.
 */
export function multiCached<K extends string, R>(
  fn: (keys: readonly K[]) => Promise<ReadonlyMap<K, R>>,
  opts: MultiCachedOptions<K, R>,
): (keys: readonly K[]) => Promise<Map<K, R>> {
  const logger = (opts.logger ?? new NullLogger()).child({ module: "cached" })
  const cacheKey = opts.keyBuilder ?? ((key: K): CacheKey => key)

  return async (keys) => {
    const unique = [...new Set(keys)]
    const found = new Map<K, R>()

    let results: CacheResult<R>[]
    try {
      results = await opts.cache.multiGet(unique.map(cacheKey))
    } catch (err) {
      logger.warn("cache read failed, calling through", { op: "multiGet", err })
      results = []
    }

    const missing: K[] = []

    for (const [i, key] of unique.entries()) {
      const res = results[i]

      if (res?.kind === "hit") found.set(key, res.value)
      else missing.push(key)
    }

    if (missing.length > 0) {
      const requested = new Set(missing)
      const entries: CacheEntry<R>[] = []

      for (const [key, value] of await fn(missing)) {
        if (!requested.has(key)) continue

        found.set(key, value)

        if (!opts.skipCache?.(value)) entries.push([cacheKey(key), value])
      }

      if (entries.length > 0) {
        try {
          await opts.cache.multiSet(entries, opts.ttl === undefined ? {} : { ttl: opts.ttl })
        } catch (err) {
          logger.warn("cache write failed", { op: "multiSet", err })
        }
      }
    }

    const position = new Map(unique.map((key, i): [K, number] => [key, i]))

    return new Map(
      [...found].sort(([a], [b]) => (position.get(a) ?? 0) - (position.get(b) ?? 0)),
    )
  }
}
