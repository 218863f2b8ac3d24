import type { Milliseconds } from "@tiercache/clock"
import type { AddResult } from "./add-result"
import type { CacheEntry } from "./cache-entry"
import type { CacheResult } from "./cache-result"
import type { WireEncoding, WireValue } from "./wire-value"

export type BackendWriteOptions = {
  /** `0` or absent: the entry does not expire. */
  ttlMs?: Milliseconds
}

export type BackendSetOptions = BackendWriteOptions & {
  /** Write only if the stored value equals this one. */
  casToken?: WireValue
}

/**
 * The contract every storage engine implements.
 *
 * Keys are fully namespaced. Absence is a miss, `0` or `false`, never an
 * error; the only operation that throws for stored data is `increment()` on
 * a value that is not an integer.
 */
export interface CacheBackend {
  /** Short engine name used in logs, e.g. `"memory"` or `"redis"`. */
  readonly kind: string

  get(key: string, encoding: WireEncoding): Promise<CacheResult<WireValue>>

  /** Like `get()`; the hit value doubles as the CAS token. */
  gets(key: string, encoding: WireEncoding): Promise<CacheResult<WireValue>>

  /** One result per key, in the order given. */
  multiGet(keys: readonly string[], encoding: WireEncoding): Promise<CacheResult<WireValue>[]>

  /** Resolves to `false` when `casToken` no longer matches. */
  set(key: string, value: WireValue, opts?: BackendSetOptions): Promise<boolean>

  multiSet(entries: readonly CacheEntry<WireValue>[], opts?: BackendWriteOptions): Promise<boolean>

  add(key: string, value: WireValue, opts?: BackendWriteOptions): Promise<AddResult>

  exists(key: string): Promise<boolean>

  /**
   * Adds `delta` to the integer stored at `key`, creating it with `delta` if
   * absent. Leaves the entry's expiry untouched.
   *
   * @throws {NotAnIntegerError} if the stored value is not an integer
   */
  increment(key: string, delta: number): Promise<number>

  /** Resets the expiry of an existing key. `0` makes it persistent. */
  expire(key: string, ttlMs: Milliseconds): Promise<boolean>

  delete(key: string): Promise<0 | 1>

  multiDelete(keys: readonly string[]): Promise<number>

  /** Removes every key, or only the keys starting with `namespace`. */
  clear(namespace?: string): Promise<boolean>

  /**
   * Engine-specific escape hatch. Arguments and result depend on the
   * backend; code using it is no longer portable.
   */
  raw(command: string, ...args: unknown[]): Promise<unknown>

  /** Deletes `key` only if it holds `expected`, as one atomic step. */
  redlockRelease(key: string, expected: WireValue): Promise<boolean>

  open(): Promise<void>
  close(): Promise<void>
}
