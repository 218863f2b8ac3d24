import { type Milliseconds, type ScheduledTask, type Scheduler, SystemClock } from "@tiercache/clock"
import { UnsupportedCommandError } from "../../core/errors"
import { assertDelta, parseStoredInteger } from "../../core/integer"
import { decodeWire, wireEquals } from "../../core/wire"
import type { AddResult } from "../../ports/add-result"
import type { BackendSetOptions, BackendWriteOptions, CacheBackend } from "../../ports/cache-backend"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheResult } from "../../ports/cache-result"
import type { WireEncoding, WireValue } from "../../ports/wire-value"

export type MemoryBackendDeps = {
  /** Schedules TTL expiry. Defaults to a `SystemClock`, whose timers are unref'ed. */
  scheduler?: Scheduler

  /** Called after an expiry timer removed `key`. */
  onExpire?: (key: string) => void
}

/**
 * Single-process backend over a `Map`.
 *
 * Expiry is active: every key with a TTL owns exactly one scheduled task,
 * kept in a side map and cancelled whenever the key is rewritten, expired
 * again or removed. Every mutation runs without awaiting, so CAS,
 * add-if-absent and redlock release cannot interleave with other calls in
 * the same process.
 *
 * The synchronous methods (`peek`, `write`, `remove`, ...) let a wrapper
 * combine several steps into one uninterrupted mutation.
 */
export class MemoryBackend implements CacheBackend {
  readonly kind: string = "memory"

  private readonly store = new Map<string, WireValue>()
  private readonly expiries = new Map<string, ScheduledTask>()
  private readonly scheduler: Scheduler

  constructor(private readonly deps: MemoryBackendDeps = {}) {
    this.scheduler = deps.scheduler ?? new SystemClock()
  }

  async get(key: string, encoding: WireEncoding): Promise<CacheResult<WireValue>> {
    const value = this.store.get(key)

    if (value === undefined) return { kind: "miss" }

    return { kind: "hit", value: decodeWire(value, encoding) }
  }

  gets(key: string, encoding: WireEncoding): Promise<CacheResult<WireValue>> {
    return this.get(key, encoding)
  }

  async multiGet(
    keys: readonly string[],
    encoding: WireEncoding,
  ): Promise<CacheResult<WireValue>[]> {
    return keys.map((key): CacheResult<WireValue> => {
      const value = this.store.get(key)

      return value === undefined ? { kind: "miss" } : { kind: "hit", value: decodeWire(value, encoding) }
    })
  }

  async set(key: string, value: WireValue, opts?: BackendSetOptions): Promise<boolean> {
    if (opts?.casToken !== undefined && !this.matches(key, opts.casToken)) return false

    this.write(key, value, opts?.ttlMs)

    return true
  }

  async multiSet(
    entries: readonly CacheEntry<WireValue>[],
    opts?: BackendWriteOptions,
  ): Promise<boolean> {
    for (const [key, value] of entries) {
      this.write(key, value, opts?.ttlMs)
    }

    return true
  }

  async add(key: string, value: WireValue, opts?: BackendWriteOptions): Promise<AddResult> {
    if (this.store.has(key)) return { kind: "skipped", reason: "exists" }

    this.write(key, value, opts?.ttlMs)

    return { kind: "written" }
  }

  async exists(key: string): Promise<boolean> {
    return this.store.has(key)
  }

  async increment(key: string, delta: number): Promise<number> {
    return this.incrementBy(key, delta)
  }

  async expire(key: string, ttlMs: Milliseconds): Promise<boolean> {
    if (!this.store.has(key)) return false

    this.cancelExpiry(key)
    this.scheduleExpiry(key, ttlMs)

    return true
  }

  async delete(key: string): Promise<0 | 1> {
    return this.remove(key) ? 1 : 0
  }

  async multiDelete(keys: readonly string[]): Promise<number> {
    let removed = 0

    for (const key of keys) {
      if (this.remove(key)) removed++
    }

    return removed
  }

  async clear(namespace?: string): Promise<boolean> {
    if (namespace === undefined) {
      for (const task of this.expiries.values()) task.cancel()

      this.expiries.clear()
      this.store.clear()

      return true
    }

    for (const key of this.keys()) {
      if (key.startsWith(namespace)) this.remove(key)
    }

    return true
  }

  /**
   * Supported commands: `keys`, `size`, `has <key>` and `get <key>`.
   *
   * @throws {UnsupportedCommandError} for anything else
   */
  async raw(command: string, ...args: unknown[]): Promise<unknown> {
    switch (command) {
      case "keys":
        return this.keys()
      case "size":
        return this.store.size
      case "has":
        return this.store.has(String(args[0]))
      case "get":
        return this.store.get(String(args[0]))
      default:
        throw new UnsupportedCommandError(this.kind, command)
    }
  }

  async redlockRelease(key: string, expected: WireValue): Promise<boolean> {
    if (!this.matches(key, expected)) return false

    return this.remove(key)
  }

  async open(): Promise<void> {}

  /** Cancels every pending expiry and drops all entries. */
  async close(): Promise<void> {
    await this.clear()
  }

  /** Number of keys with a live expiry task. */
  scheduledExpiries(): number {
    return this.expiries.size
  }

  peek(key: string): WireValue | undefined {
    return this.store.get(key)
  }

  has(key: string): boolean {
    return this.store.has(key)
  }

  keys(): string[] {
    return [...this.store.keys()]
  }

  /** Stores `value` and replaces any pending expiry. No CAS check. */
  write(key: string, value: WireValue, ttlMs?: Milliseconds): void {
    this.cancelExpiry(key)
    this.store.set(key, value)
    this.scheduleExpiry(key, ttlMs)
  }

  /** Removes `key` and its expiry. Does not call `onExpire`. */
  remove(key: string): boolean {
    this.cancelExpiry(key)

    return this.store.delete(key)
  }

  /** Keeps the key's pending expiry. */
  incrementBy(key: string, delta: number): number {
    assertDelta(delta)

    const current = this.store.get(key)
    const next = current === undefined ? delta : parseStoredInteger(key, current) + delta

    this.store.set(key, String(next))

    return next
  }

  private matches(key: string, expected: WireValue): boolean {
    const current = this.store.get(key)

    return current !== undefined && wireEquals(current, expected)
  }

  private scheduleExpiry(key: string, ttlMs: Milliseconds | undefined): void {
    if (ttlMs === undefined || ttlMs <= 0) return

    const task = this.scheduler.schedule(ttlMs, () => {
      if (this.expiries.get(key) !== task) return

      this.expiries.delete(key)
      this.store.delete(key)
      this.deps.onExpire?.(key)
    })

    this.expiries.set(key, task)
  }

  private cancelExpiry(key: string): void {
    const task = this.expiries.get(key)

    if (task === undefined) return

    task.cancel()
    this.expiries.delete(key)
  }
}
