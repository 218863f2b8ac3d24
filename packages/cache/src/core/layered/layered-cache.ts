import { type Clock, type Milliseconds, SystemClock } from "@tiercache/clock"
import { isAppError } from "@tiercache/errors"
import { type Logger, NullLogger } from "@tiercache/logger"
import type { AddResult } from "../../ports/add-result"
import type { CacheClient, CachePrimitives } from "../../ports/cache-client"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheResult, VersionedResult } from "../../ports/cache-result"
import type {
  CacheCallOptions,
  CacheClearOptions,
  CacheSetOptions,
  CacheTtl,
  CacheWriteOptions,
} from "../../ports/cache-ttl"
import { settleAdd } from "../add-outcome"
import { AllLayersFailedError, CacheConfigError } from "../errors"
import { withTimeout } from "../with-timeout"

export type LayeredCacheDeps<T> = {
  /** Fastest first. Must not be empty. */
  layers: readonly CacheClient<T>[]
  logger?: Logger
  clock?: Clock
}

/** Unset fields are taken from the first layer. */
export type LayeredCacheOptions = {
  namespace?: string
  ttl?: CacheTtl
  timeoutMs?: Milliseconds
}

/**
 * Several caches behind one `CacheClient`, nearest first.
 *
 * Reads stop at the first layer that hits and copy the value into the
 * layers before it. Writes go to every layer; one failing layer does not
 * stop the others but does make the aggregate result `false`. Nothing is
 * rolled back and no ordering holds across layers.
 *
 * `increment()` runs on every layer and reports the first layer that
 * succeeded. Layers that started from different values stay apart; nothing
 * reconciles them.
 *
 * `primitives` belong to the first layer, so a `DistributedLock` taken
 * through a layered cache lives only there. Over `[memory, redis]` such a
 * lock excludes callers in this process and no others; lock on the shared
 * layer directly for cross-process exclusion.
 */
export class LayeredCache<T> implements CacheClient<T> {
  readonly namespace: string
  readonly defaultTtl: CacheTtl | undefined
  readonly timeoutMs: Milliseconds

  private readonly layers: readonly CacheClient<T>[]
  private readonly first: CacheClient<T>
  private readonly overrides: LayeredCacheOptions
  private readonly clock: Clock
  private readonly logger: Logger

  constructor(deps: LayeredCacheDeps<T>, opts: LayeredCacheOptions = {}) {
    const [first] = deps.layers

    if (first === undefined) {
      throw new CacheConfigError("LayeredCache needs at least one layer")
    }

    this.layers = [...deps.layers]
    this.first = first
    this.overrides = opts
    this.namespace = opts.namespace ?? first.namespace
    this.defaultTtl = opts.ttl ?? first.defaultTtl
    this.timeoutMs = opts.timeoutMs ?? first.timeoutMs
    this.clock = deps.clock ?? new SystemClock()
    this.logger = (deps.logger ?? new NullLogger()).child({ module: "layered-cache" })
  }

  /** Lock primitives of the first layer only; see the class notes on locking. */
  get primitives(): CachePrimitives {
    return this.first.primitives
  }

  buildKey(key: CacheKey, namespace?: string): string {
    return this.first.buildKey(key, namespace ?? this.overrides.namespace)
  }

  get(key: CacheKey, opts?: CacheCallOptions): Promise<CacheResult<T>> {
    return this.run("get", key, opts?.timeoutMs, async (): Promise<CacheResult<T>> => {
      const found = await this.findFirst(key, opts, (layer) => layer.get(key, this.layerOptions(opts)))

      return found ?? { kind: "miss" }
    })
  }

  gets(key: CacheKey, opts?: CacheCallOptions): Promise<VersionedResult<T>> {
    return this.run("gets", key, opts?.timeoutMs, async (): Promise<VersionedResult<T>> => {
      const found = await this.findFirst(key, opts, (layer) => layer.gets(key, this.layerOptions(opts)))

      return found ?? { kind: "miss" }
    })
  }

  multiGet(keys: readonly CacheKey[], opts?: CacheCallOptions): Promise<CacheResult<T>[]> {
    return this.run("multiGet", undefined, opts?.timeoutMs, async () => {
      const results = keys.map((): CacheResult<T> => ({ kind: "miss" }))
      let missing = keys.map((_, i) => i)

      for (const [index, layer] of this.layers.entries()) {
        if (missing.length === 0) break

        let found: CacheResult<T>[]

        try {
          found = await layer.multiGet(
            missing.map((i) => keys[i] ?? ""),
            this.layerOptions(opts),
          )
        } catch (err) {
          this.logger.warn("layer read failed", { op: "multiGet", layer: index, err })
          continue
        }

        const stillMissing: number[] = []

        for (const [slot, position] of missing.entries()) {
          const res = found[slot]

          if (res?.kind !== "hit") {
            stillMissing.push(position)
            continue
          }

          results[position] = res
          await this.repair(keys[position] ?? "", res.value, index, opts)
        }

        missing = stillMissing
      }

      return results
    })
  }

  set(key: CacheKey, value: T, opts?: CacheSetOptions): Promise<boolean> {
    return this.run("set", key, opts?.timeoutMs, () =>
      this.everyLayer("set", key, (layer) => layer.set(key, value, this.writeOptions(opts))),
    )
  }

  multiSet(entries: readonly CacheEntry<T>[], opts?: CacheWriteOptions): Promise<boolean> {
    return this.run("multiSet", undefined, opts?.timeoutMs, () =>
      this.everyLayer("multiSet", undefined, (layer) =>
        layer.multiSet(entries, this.writeOptions(opts)),
      ),
    )
  }

  /** `written` only if every layer wrote. */
  tryAdd(key: CacheKey, value: T, opts?: CacheWriteOptions): Promise<AddResult> {
    return this.run("add", key, opts?.timeoutMs, async (): Promise<AddResult> => {
      let written = true
      let exists = false

      for (const [index, layer] of this.layers.entries()) {
        try {
          const res = await layer.tryAdd(key, value, this.writeOptions(opts))

          if (res.kind === "skipped") {
            written = false
            if (res.reason === "exists") exists = true
          }
        } catch (err) {
          written = false
          this.logger.warn("layer write failed", { op: "add", key, layer: index, err })
        }
      }

      if (written) return { kind: "written" }

      return { kind: "skipped", reason: exists ? "exists" : "rejected" }
    })
  }

  async add(key: CacheKey, value: T, opts?: CacheWriteOptions): Promise<boolean> {
    return settleAdd(this.buildKey(key, opts?.namespace), await this.tryAdd(key, value, opts))
  }

  exists(key: CacheKey, opts?: CacheCallOptions): Promise<boolean> {
    return this.run("exists", key, opts?.timeoutMs, async () => {
      for (const [index, layer] of this.layers.entries()) {
        try {
          if (await layer.exists(key, this.layerOptions(opts))) return true
        } catch (err) {
          this.logger.warn("layer read failed", { op: "exists", key, layer: index, err })
        }
      }

      return false
    })
  }

  /** @throws {AllLayersFailedError} if no layer could increment */
  increment(key: CacheKey, delta = 1, opts?: CacheCallOptions): Promise<number> {
    return this.run("increment", key, opts?.timeoutMs, async () => {
      let first: number | undefined
      const errors: unknown[] = []

      for (const [index, layer] of this.layers.entries()) {
        try {
          const value = await layer.increment(key, delta, this.layerOptions(opts))

          first ??= value
        } catch (err) {
          errors.push(err)
          this.logger.warn("layer write failed", { op: "increment", key, layer: index, err })
        }
      }

      if (first === undefined) throw new AllLayersFailedError("increment", errors, key)

      return first
    })
  }

  expire(key: CacheKey, ttl: CacheTtl, opts?: CacheCallOptions): Promise<boolean> {
    return this.run("expire", key, opts?.timeoutMs, () =>
      this.everyLayer("expire", key, (layer) => layer.expire(key, ttl, this.layerOptions(opts))),
    )
  }

  delete(key: CacheKey, opts?: CacheCallOptions): Promise<0 | 1> {
    return this.run("delete", key, opts?.timeoutMs, async (): Promise<0 | 1> => {
      const removed = await this.maxOverLayers("delete", key, (layer) =>
        layer.delete(key, this.layerOptions(opts)),
      )

      return removed > 0 ? 1 : 0
    })
  }

  multiDelete(keys: readonly CacheKey[], opts?: CacheCallOptions): Promise<number> {
    return this.run("multiDelete", undefined, opts?.timeoutMs, () =>
      this.maxOverLayers("multiDelete", undefined, (layer) =>
        layer.multiDelete(keys, this.layerOptions(opts)),
      ),
    )
  }

  clear(opts?: CacheClearOptions): Promise<boolean> {
    const namespace = opts?.namespace ?? this.overrides.namespace

    return this.run("clear", undefined, opts?.timeoutMs, () =>
      this.everyLayer("clear", undefined, (layer) =>
        layer.clear(namespace === undefined ? {} : { namespace }),
      ),
    )
  }

  /** Runs on the first layer only. */
  raw(command: string, ...args: unknown[]): Promise<unknown> {
    return this.run("raw", undefined, undefined, () => this.first.raw(command, ...args))
  }

  async open(): Promise<void> {
    for (const layer of this.layers) {
      await layer.open()
    }
  }

  /** Closes every layer even if some fail, then rethrows the first failure. */
  async close(): Promise<void> {
    const failures: unknown[] = []

    for (const [index, layer] of this.layers.entries()) {
      try {
        await layer.close()
      } catch (err) {
        failures.push(err)
        this.logger.warn("layer close failed", { op: "close", layer: index, err })
      }
    }

    if (failures.length > 0) throw failures[0]
  }

  private async findFirst<R extends CacheResult<T>>(
    key: CacheKey,
    opts: CacheCallOptions | undefined,
    read: (layer: CacheClient<T>) => Promise<R>,
  ): Promise<R | undefined> {
    for (const [index, layer] of this.layers.entries()) {
      let res: R

      try {
        res = await read(layer)
      } catch (err) {
        this.logger.warn("layer read failed", { op: "get", key, layer: index, err })
        continue
      }

      const seen: CacheResult<T> = res

      if (seen.kind === "hit") {
        await this.repair(key, seen.value, index, opts)

        return res
      }
    }

    return undefined
  }

  /** Copies a value found in layer `foundAt` into every layer before it. */
  private async repair(
    key: CacheKey,
    value: T,
    foundAt: number,
    opts: CacheCallOptions | undefined,
  ): Promise<void> {
    for (const [index, layer] of this.layers.slice(0, foundAt).entries()) {
      try {
        await layer.set(key, value, this.layerOptions(opts))
      } catch (err) {
        this.logger.debug("read-repair failed", { op: "repair", key, layer: index, err })
      }
    }
  }

  private async everyLayer(
    op: string,
    key: CacheKey | undefined,
    write: (layer: CacheClient<T>) => Promise<boolean>,
  ): Promise<boolean> {
    let allSucceeded = true

    for (const [index, layer] of this.layers.entries()) {
      try {
        if (!(await write(layer))) allSucceeded = false
      } catch (err) {
        allSucceeded = false
        this.logger.warn("layer write failed", { op, key, layer: index, err })
      }
    }

    return allSucceeded
  }

  private async maxOverLayers(
    op: string,
    key: CacheKey | undefined,
    count: (layer: CacheClient<T>) => Promise<number>,
  ): Promise<number> {
    let max = 0

    for (const [index, layer] of this.layers.entries()) {
      try {
        max = Math.max(max, await count(layer))
      } catch (err) {
        this.logger.warn("layer write failed", { op, key, layer: index, err })
      }
    }

    return max
  }

  private layerOptions(opts: CacheCallOptions | undefined): CacheCallOptions {
    return { namespace: opts?.namespace ?? this.overrides.namespace }
  }

  private writeOptions(opts: CacheSetOptions | undefined): CacheSetOptions {
    return {
      namespace: opts?.namespace ?? this.overrides.namespace,
      ttl: opts?.ttl ?? this.overrides.ttl,
      casToken: opts?.casToken,
    }
  }

  private async run<R>(
    op: string,
    key: CacheKey | undefined,
    timeoutMs: Milliseconds | undefined,
    work: () => Promise<R>,
  ): Promise<R> {
    const target = { op, key, timeoutMs: timeoutMs ?? this.timeoutMs }

    try {
      return await withTimeout(this.clock, target, work)
    } catch (err) {
      if (isAppError(err, "cache_timeout")) {
        this.logger.warn("cache operation timed out", { op, key, timeoutMs: target.timeoutMs })
      }

      throw err
    }
  }
}
