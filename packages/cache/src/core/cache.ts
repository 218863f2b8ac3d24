import { type Clock, type Milliseconds, SystemClock } from "@tiercache/clock"
import { isAppError } from "@tiercache/errors"
import { type Logger, NullLogger } from "@tiercache/logger"
import type { AddResult } from "../ports/add-result"
import type { CacheBackend } from "../ports/cache-backend"
import type { CacheClient, CachePrimitives } from "../ports/cache-client"
import type { CacheEntry } from "../ports/cache-entry"
import type { CacheKey } from "../ports/cache-key"
import type { CacheResult, VersionedResult } from "../ports/cache-result"
import type {
  CacheCallOptions,
  CacheClearOptions,
  CacheSetOptions,
  CacheTtl,
  CacheWriteOptions,
} from "../ports/cache-ttl"
import type { KeyBuilder } from "../ports/key-builder"
import type { Serializer } from "../ports/serializer"
import type { WireValue } from "../ports/wire-value"
import { settleAdd } from "./add-outcome"
import { defaultKeyBuilder } from "./keys/key-builders"
import { ttlToMs } from "./ttl"
import { withTimeout } from "./with-timeout"

export type CacheDeps<T> = {
  backend: CacheBackend
  serializer: Serializer<T>
  logger?: Logger
  clock?: Clock
}

export type CacheOptions = {
  /** Prefix for every key. Default: `""`. */
  namespace?: string

  /** Applied to writes that do not pass their own `ttl`. */
  ttl?: CacheTtl

  /** Per-operation timeout. Default: 5000. `0` disables it. */
  timeoutMs?: Milliseconds

  /** Default: {@link defaultKeyBuilder}. */
  keyBuilder?: KeyBuilder
}

export const DEFAULT_TIMEOUT_MS: Milliseconds = 5000

/**
 * A typed cache over one backend.
 *
 * Builds namespaced keys, encodes values with its serializer, converts TTLs
 * to milliseconds and bounds every backend call with a timeout.
 */
export class Cache<T> implements CacheClient<T> {
  readonly namespace: string
  readonly defaultTtl: CacheTtl | undefined
  readonly timeoutMs: Milliseconds
  readonly primitives: CachePrimitives

  private readonly backend: CacheBackend
  private readonly serializer: Serializer<T>
  private readonly clock: Clock
  private readonly logger: Logger
  private readonly keyBuilder: KeyBuilder

  constructor(deps: CacheDeps<T>, opts: CacheOptions = {}) {
    this.backend = deps.backend
    this.serializer = deps.serializer
    this.clock = deps.clock ?? new SystemClock()
    this.namespace = opts.namespace ?? ""
    this.defaultTtl = opts.ttl
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.keyBuilder = opts.keyBuilder ?? defaultKeyBuilder
    this.logger = (deps.logger ?? new NullLogger()).child({
      module: "cache",
      backend: deps.backend.kind,
      namespace: this.namespace,
    })

    this.primitives = {
      buildKey: (key, namespace) => this.buildKey(key, namespace),
      add: (namespacedKey, value, ttlMs) =>
        this.call("add", namespacedKey, undefined, () =>
          this.backend.add(namespacedKey, value, { ttlMs }),
        ),
      redlockRelease: (namespacedKey, expected) =>
        this.call("redlockRelease", namespacedKey, undefined, () =>
          this.backend.redlockRelease(namespacedKey, expected),
        ),
    }
  }

  buildKey(key: CacheKey, namespace?: string): string {
    return this.keyBuilder(key, namespace ?? this.namespace)
  }

  get(key: CacheKey, opts?: CacheCallOptions): Promise<CacheResult<T>> {
    const nsKey = this.buildKey(key, opts?.namespace)

    return this.call("get", nsKey, opts?.timeoutMs, async (): Promise<CacheResult<T>> => {
      const res = await this.backend.get(nsKey, this.serializer.encoding)

      return res.kind === "hit" ? { kind: "hit", value: this.serializer.decode(res.value) } : res
    })
  }

  gets(key: CacheKey, opts?: CacheCallOptions): Promise<VersionedResult<T>> {
    const nsKey = this.buildKey(key, opts?.namespace)

    return this.call("gets", nsKey, opts?.timeoutMs, async (): Promise<VersionedResult<T>> => {
      const res = await this.backend.gets(nsKey, this.serializer.encoding)

      if (res.kind === "miss") return res

      return { kind: "hit", value: this.serializer.decode(res.value), token: res.value }
    })
  }

  multiGet(keys: readonly CacheKey[], opts?: CacheCallOptions): Promise<CacheResult<T>[]> {
    const nsKeys = keys.map((key) => this.buildKey(key, opts?.namespace))

    return this.call("multiGet", undefined, opts?.timeoutMs, async () => {
      const results = await this.backend.multiGet(nsKeys, this.serializer.encoding)

      return results.map(
        (res): CacheResult<T> =>
          res.kind === "hit" ? { kind: "hit", value: this.serializer.decode(res.value) } : res,
      )
    })
  }

  set(key: CacheKey, value: T, opts?: CacheSetOptions): Promise<boolean> {
    const nsKey = this.buildKey(key, opts?.namespace)

    return this.call("set", nsKey, opts?.timeoutMs, () =>
      this.backend.set(nsKey, this.serializer.encode(value), {
        ttlMs: this.ttlMs(opts?.ttl),
        casToken: opts?.casToken,
      }),
    )
  }

  multiSet(entries: readonly CacheEntry<T>[], opts?: CacheWriteOptions): Promise<boolean> {
    const encoded = entries.map(
      ([key, value]): CacheEntry<WireValue> => [
        this.buildKey(key, opts?.namespace),
        this.serializer.encode(value),
      ],
    )

    return this.call("multiSet", undefined, opts?.timeoutMs, () =>
      this.backend.multiSet(encoded, { ttlMs: this.ttlMs(opts?.ttl) }),
    )
  }

  tryAdd(key: CacheKey, value: T, opts?: CacheWriteOptions): Promise<AddResult> {
    const nsKey = this.buildKey(key, opts?.namespace)

    return this.call("add", nsKey, opts?.timeoutMs, () =>
      this.backend.add(nsKey, this.serializer.encode(value), { ttlMs: this.ttlMs(opts?.ttl) }),
    )
  }

  async add(key: CacheKey, value: T, opts?: CacheWriteOptions): Promise<boolean> {
    return settleAdd(this.buildKey(key, opts?.namespace), await this.tryAdd(key, value, opts))
  }

  exists(key: CacheKey, opts?: CacheCallOptions): Promise<boolean> {
    const nsKey = this.buildKey(key, opts?.namespace)

    return this.call("exists", nsKey, opts?.timeoutMs, () => this.backend.exists(nsKey))
  }

  increment(key: CacheKey, delta = 1, opts?: CacheCallOptions): Promise<number> {
    const nsKey = this.buildKey(key, opts?.namespace)

    return this.call("increment", nsKey, opts?.timeoutMs, () => this.backend.increment(nsKey, delta))
  }

  expire(key: CacheKey, ttl: CacheTtl, opts?: CacheCallOptions): Promise<boolean> {
    const nsKey = this.buildKey(key, opts?.namespace)

    return this.call("expire", nsKey, opts?.timeoutMs, () =>
      this.backend.expire(nsKey, this.ttlMs(ttl) ?? 0),
    )
  }

  delete(key: CacheKey, opts?: CacheCallOptions): Promise<0 | 1> {
    const nsKey = this.buildKey(key, opts?.namespace)

    return this.call("delete", nsKey, opts?.timeoutMs, () => this.backend.delete(nsKey))
  }

  multiDelete(keys: readonly CacheKey[], opts?: CacheCallOptions): Promise<number> {
    const nsKeys = keys.map((key) => this.buildKey(key, opts?.namespace))

    return this.call("multiDelete", undefined, opts?.timeoutMs, () =>
      this.backend.multiDelete(nsKeys),
    )
  }

  clear(opts?: CacheClearOptions): Promise<boolean> {
    const namespace = opts?.namespace ?? this.namespace

    return this.call("clear", undefined, opts?.timeoutMs, () =>
      this.backend.clear(namespace === "" ? undefined : namespace),
    )
  }

  raw(command: string, ...args: unknown[]): Promise<unknown> {
    return this.call("raw", undefined, undefined, () => this.backend.raw(command, ...args))
  }

  open(): Promise<void> {
    return this.backend.open()
  }

  close(): Promise<void> {
    return this.backend.close()
  }

  private ttlMs(ttl: CacheTtl | undefined): Milliseconds | undefined {
    return ttlToMs(ttl ?? this.defaultTtl, this.clock.nowMs())
  }

  private async call<R>(
    op: string,
    key: string | undefined,
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
