import type { Milliseconds, Scheduler } from "@tiercache/clock"
import { type Logger, NullLogger } from "@tiercache/logger"
import type { EvictionMap } from "../../core/eviction/eviction-map"
import { FifoMemoryMap } from "../../core/eviction/fifo-memory-map"
import { LruMemoryMap } from "../../core/eviction/lru-memory-map"
import { OversizedValueError } from "../../core/errors"
import { byteLength, decodeWire, wireEquals } from "../../core/wire"
import type { AddResult } from "../../ports/add-result"
import type { BackendSetOptions, BackendWriteOptions, CacheBackend } from "../../ports/cache-backend"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheEvictionPolicy } from "../../ports/cache-eviction-policy"
import type { CacheResult } from "../../ports/cache-result"
import type { WireEncoding, WireValue } from "../../ports/wire-value"
import { MemoryBackend } from "../memory/memory-backend"

export type BoundedMemoryBackendOptions = {
  /** Budget for the sum of entry sizes, in MiB. Default: 64. */
  maxSizeMb?: number

  /**
   * What to do with a single value larger than the whole budget: throw
   * `OversizedValueError`, or skip the write and resolve to `false`.
   * Default: `false` (skip).
   */
  raiseOnOversize?: boolean

  /** Default: `"lru"`. */
  evictionPolicy?: CacheEvictionPolicy

  /** Estimated size of a stored value. Default: its byte length, strings as UTF-8. */
  sizeOf?: (value: WireValue) => number
}

export type BoundedMemoryBackendDeps = {
  scheduler?: Scheduler
  logger?: Logger
}

const BYTES_PER_MB = 1024 * 1024

/**
 * A `MemoryBackend` with a byte budget.
 *
 * A size index (`key -> estimated bytes`, in eviction order) shadows the
 * underlying map. After every operation the two hold the same keys and
 * `currentBytes` equals the sum of the index. Writes that need room evict
 * from the head of the index first.
 */
export class BoundedMemoryBackend implements CacheBackend {
  readonly kind: string = "bounded-memory"
  readonly maxBytes: number

  private readonly inner: MemoryBackend
  private readonly sizes: EvictionMap<string, number>
  private readonly raiseOnOversize: boolean
  private readonly sizeOf: (value: WireValue) => number
  private readonly logger: Logger
  private bytes = 0

  constructor(deps: BoundedMemoryBackendDeps = {}, opts: BoundedMemoryBackendOptions = {}) {
    const maxSizeMb = opts.maxSizeMb ?? 64

    if (!(maxSizeMb > 0)) {
      throw new RangeError(`maxSizeMb must be positive, got ${maxSizeMb}`)
    }

    this.maxBytes = Math.floor(maxSizeMb * BYTES_PER_MB)
    this.raiseOnOversize = opts.raiseOnOversize ?? false
    this.sizeOf = opts.sizeOf ?? byteLength
    this.sizes =
      (opts.evictionPolicy ?? "lru") === "lru"
        ? new LruMemoryMap<string, number>()
        : new FifoMemoryMap<string, number>()
    this.logger = (deps.logger ?? new NullLogger()).child({ module: "bounded-memory" })
    this.inner = new MemoryBackend({
      scheduler: deps.scheduler,
      onExpire: (key) => this.untrack(key),
    })
  }

  get currentBytes(): number {
    return this.bytes
  }

  /** Tracked keys, next eviction candidate first. */
  trackedKeys(): string[] {
    return this.sizes.keys()
  }

  scheduledExpiries(): number {
    return this.inner.scheduledExpiries()
  }

  async get(key: string, encoding: WireEncoding): Promise<CacheResult<WireValue>> {
    return this.read(key, encoding)
  }

  async gets(key: string, encoding: WireEncoding): Promise<CacheResult<WireValue>> {
    return this.read(key, encoding)
  }

  async multiGet(
    keys: readonly string[],
    encoding: WireEncoding,
  ): Promise<CacheResult<WireValue>[]> {
    return keys.map((key) => this.read(key, encoding))
  }

  async set(key: string, value: WireValue, opts?: BackendSetOptions): Promise<boolean> {
    if (opts?.casToken !== undefined) {
      const current = this.inner.peek(key)

      if (current === undefined || !wireEquals(current, opts.casToken)) return false
    }

    return this.writeSized(key, value, opts?.ttlMs)
  }

  async multiSet(
    entries: readonly CacheEntry<WireValue>[],
    opts?: BackendWriteOptions,
  ): Promise<boolean> {
    let allWritten = true

    for (const [key, value] of entries) {
      if (!this.writeSized(key, value, opts?.ttlMs)) allWritten = false
    }

    return allWritten
  }

  async add(key: string, value: WireValue, opts?: BackendWriteOptions): Promise<AddResult> {
    if (this.inner.has(key)) return { kind: "skipped", reason: "exists" }

    return this.writeSized(key, value, opts?.ttlMs)
      ? { kind: "written" }
      : { kind: "skipped", reason: "rejected" }
  }

  async exists(key: string): Promise<boolean> {
    return this.inner.has(key)
  }

  async increment(key: string, delta: number): Promise<number> {
    const next = this.inner.incrementBy(key, delta)

    this.track(key, this.sizeOf(String(next)))
    this.evictWhileOverBudget(key)

    return next
  }

  async expire(key: string, ttlMs: Milliseconds): Promise<boolean> {
    return this.inner.expire(key, ttlMs)
  }

  async delete(key: string): Promise<0 | 1> {
    return this.removeTracked(key) ? 1 : 0
  }

  async multiDelete(keys: readonly string[]): Promise<number> {
    let removed = 0

    for (const key of keys) {
      if (this.removeTracked(key)) removed++
    }

    return removed
  }

  async clear(namespace?: string): Promise<boolean> {
    if (namespace === undefined) {
      await this.inner.clear()
      this.sizes.clear()
      this.bytes = 0

      return true
    }

    for (const key of this.inner.keys()) {
      if (key.startsWith(namespace)) this.removeTracked(key)
    }

    return true
  }

  raw(command: string, ...args: unknown[]): Promise<unknown> {
    return this.inner.raw(command, ...args)
  }

  async redlockRelease(key: string, expected: WireValue): Promise<boolean> {
    const current = this.inner.peek(key)

    if (current === undefined || !wireEquals(current, expected)) return false

    return this.removeTracked(key)
  }

  async open(): Promise<void> {}

  async close(): Promise<void> {
    await this.clear()
  }

  private read(key: string, encoding: WireEncoding): CacheResult<WireValue> {
    const value = this.inner.peek(key)

    if (value === undefined) return { kind: "miss" }

    this.sizes.get(key)

    return { kind: "hit", value: decodeWire(value, encoding) }
  }

  /**
   * Budget check, eviction, the write itself, expiry scheduling and the
   * accounting update happen in one synchronous step.
   */
  private writeSized(key: string, value: WireValue, ttlMs: Milliseconds | undefined): boolean {
    const size = this.sizeOf(value)

    if (size > this.maxBytes) {
      if (this.raiseOnOversize) throw new OversizedValueError(key, size, this.maxBytes)

      this.logger.debug("skipped oversized value", { op: "set", key, size, maxBytes: this.maxBytes })

      return false
    }

    while (this.bytes - (this.sizes.peek(key) ?? 0) + size > this.maxBytes) {
      const victim = this.sizes.victim()

      if (victim === undefined) break

      this.evict(victim)
    }

    this.inner.write(key, value, ttlMs)
    this.track(key, size)

    return true
  }

  /** Evicts until the budget holds again, never evicting `keep`. */
  private evictWhileOverBudget(keep: string): void {
    for (const victim of this.sizes.keys()) {
      if (this.bytes <= this.maxBytes) return
      if (victim !== keep) this.evict(victim)
    }
  }

  private evict(key: string): void {
    this.inner.remove(key)
    this.untrack(key)
    this.logger.debug("evicted", { key, currentBytes: this.bytes })
  }

  private removeTracked(key: string): boolean {
    const removed = this.inner.remove(key)

    this.untrack(key)

    return removed
  }

  private track(key: string, size: number): void {
    this.bytes += size - (this.sizes.peek(key) ?? 0)
    this.sizes.set(key, size)
  }

  private untrack(key: string): void {
    const size = this.sizes.peek(key)

    if (size === undefined) return

    this.sizes.delete(key)
    this.bytes -= size
  }
}
