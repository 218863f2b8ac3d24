import type { Milliseconds } from "@tiercache/clock"
import type { AddResult } from "./add-result"
import type { CacheEntry } from "./cache-entry"
import type { CacheKey } from "./cache-key"
import type { CacheResult, VersionedResult } from "./cache-result"
import type {
  CacheCallOptions,
  CacheClearOptions,
  CacheSetOptions,
  CacheTtl,
  CacheWriteOptions,
} from "./cache-ttl"
import type { WireValue } from "./wire-value"

/**
 * Low-level operations the lock helpers need. They bypass serialization and
 * take keys that are already namespaced.
 */
export interface CachePrimitives {
  buildKey(key: CacheKey, namespace?: string): string
  add(namespacedKey: string, value: WireValue, ttlMs: Milliseconds): Promise<AddResult>
  redlockRelease(namespacedKey: string, expected: WireValue): Promise<boolean>
}

/**
 * A typed cache: a single backend behind `Cache`, or several behind
 * `LayeredCache`.
 *
 * Every operation rejects with `CacheTimeoutError` once its timeout elapses.
 */
export interface CacheClient<T> {
  readonly namespace: string
  readonly defaultTtl: CacheTtl | undefined
  readonly timeoutMs: Milliseconds
  readonly primitives: CachePrimitives

  buildKey(key: CacheKey, namespace?: string): string

  get(key: CacheKey, opts?: CacheCallOptions): Promise<CacheResult<T>>
  gets(key: CacheKey, opts?: CacheCallOptions): Promise<VersionedResult<T>>
  multiGet(keys: readonly CacheKey[], opts?: CacheCallOptions): Promise<CacheResult<T>[]>

  set(key: CacheKey, value: T, opts?: CacheSetOptions): Promise<boolean>
  multiSet(entries: readonly CacheEntry<T>[], opts?: CacheWriteOptions): Promise<boolean>

  /** Add-if-absent with the outcome as a value. */
  tryAdd(key: CacheKey, value: T, opts?: CacheWriteOptions): Promise<AddResult>

  /**
   * Add-if-absent. Resolves to `false` if the backend rejected the value.
   *
   * @throws {KeyExistsError} if the key is already present
   */
  add(key: CacheKey, value: T, opts?: CacheWriteOptions): Promise<boolean>

  exists(key: CacheKey, opts?: CacheCallOptions): Promise<boolean>
  increment(key: CacheKey, delta?: number, opts?: CacheCallOptions): Promise<number>
  expire(key: CacheKey, ttl: CacheTtl, opts?: CacheCallOptions): Promise<boolean>

  delete(key: CacheKey, opts?: CacheCallOptions): Promise<0 | 1>
  multiDelete(keys: readonly CacheKey[], opts?: CacheCallOptions): Promise<number>
  clear(opts?: CacheClearOptions): Promise<boolean>

  raw(command: string, ...args: unknown[]): Promise<unknown>

  open(): Promise<void>
  close(): Promise<void>
}
