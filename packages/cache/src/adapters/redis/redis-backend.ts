import type { Milliseconds } from "@tiercache/clock"
import { NotAnIntegerError } from "../../core/errors"
import { assertDelta } from "../../core/integer"
import { decodeWire, toBytes } from "../../core/wire"
import type { AddResult } from "../../ports/add-result"
import type { BackendSetOptions, BackendWriteOptions, CacheBackend } from "../../ports/cache-backend"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheResult } from "../../ports/cache-result"
import type { WireEncoding, WireValue } from "../../ports/wire-value"
import type { RedisArgument, RedisCacheClient, RedisSetOptions } from "./redis-client"
import { CAS_SET_SCRIPT, COMPARE_AND_DELETE_SCRIPT } from "./redis-scripts"

export type RedisBackendOptions = {
  /**
   * Most keys sent in one command by `multiGet` and `multiSet`, and deleted
   * per `UNLINK` by a namespaced `clear`. Default: 1000.
   */
  batchSize?: number
}

export type RedisBackendDeps = {
  client: RedisCacheClient
}

const GLOB_SPECIAL = /[*?[\]\\]/g

export class RedisBackend implements CacheBackend {
  readonly kind: string = "redis"

  private readonly client: RedisCacheClient
  private readonly batchSize: number

  constructor(deps: RedisBackendDeps, opts: RedisBackendOptions = {}) {
    this.client = deps.client
    this.batchSize = opts.batchSize ?? 1000

    if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${this.batchSize}`)
    }
  }

  async get(key: string, encoding: WireEncoding): Promise<CacheResult<WireValue>> {
    return this.toResult(await this.client.get(key), encoding)
  }

  gets(key: string, encoding: WireEncoding): Promise<CacheResult<WireValue>> {
    return this.get(key, encoding)
  }

  async multiGet(
    keys: readonly string[],
    encoding: WireEncoding,
  ): Promise<CacheResult<WireValue>[]> {
    const out: CacheResult<WireValue>[] = []

    for (const batch of this.chunks(keys)) {
      const buffers = await this.client.mGet([...batch])

      for (let i = 0; i < batch.length; i++) {
        out.push(this.toResult(buffers[i] ?? null, encoding))
      }
    }

    return out
  }

  async set(key: string, value: WireValue, opts?: BackendSetOptions): Promise<boolean> {
    if (opts?.casToken === undefined) {
      await this.client.set(key, this.toArgument(value), this.toSetOptions(opts?.ttlMs))

      return true
    }

    const written = await this.client.eval(CAS_SET_SCRIPT, {
      keys: [key],
      arguments: [
        this.toArgument(opts.casToken),
        this.toArgument(value),
        String(opts.ttlMs ?? 0),
      ],
    })

    return written === 1
  }

  async multiSet(
    entries: readonly CacheEntry<WireValue>[],
    opts?: BackendWriteOptions,
  ): Promise<boolean> {
    const setOptions = this.toSetOptions(opts?.ttlMs)

    for (const batch of this.chunks(entries)) {
      const tx = this.client.multi()

      for (const [key, value] of batch) {
        tx.set(key, this.toArgument(value), setOptions)
      }

      await tx.exec()
    }

    return true
  }

  async add(key: string, value: WireValue, opts?: BackendWriteOptions): Promise<AddResult> {
    const reply = await this.client.set(key, this.toArgument(value), {
      ...this.toSetOptions(opts?.ttlMs),
      NX: true,
    })

    return reply === null ? { kind: "skipped", reason: "exists" } : { kind: "written" }
  }

  async exists(key: string): Promise<boolean> {
    return (await this.client.exists(key)) > 0
  }

  async increment(key: string, delta: number): Promise<number> {
    assertDelta(delta)

    try {
      return await this.client.incrBy(key, delta)
    } catch (err) {
      if (err instanceof Error && /not an integer/i.test(err.message)) {
        throw new NotAnIntegerError(key, { cause: err })
      }

      throw err
    }
  }

  async expire(key: string, ttlMs: Milliseconds): Promise<boolean> {
    if (ttlMs > 0) return (await this.client.pExpire(key, ttlMs)) === 1

    // PERSIST answers 0 for a key that exists without a TTL too
    if ((await this.client.exists(key)) === 0) return false

    await this.client.persist(key)

    return true
  }

  async delete(key: string): Promise<0 | 1> {
    return (await this.client.del(key)) > 0 ? 1 : 0
  }

  async multiDelete(keys: readonly string[]): Promise<number> {
    let removed = 0

    for (const batch of this.chunks(keys)) {
      removed += await this.client.del([...batch])
    }

    return removed
  }

  /** `FLUSHDB` without a namespace, otherwise `SCAN MATCH namespace*` and `UNLINK`. */
  async clear(namespace?: string): Promise<boolean> {
    if (namespace === undefined) {
      await this.client.flushDb()

      return true
    }

    const match = `${namespace.replace(GLOB_SPECIAL, "\\$&")}*`

    for await (const found of this.client.scanIterator({ MATCH: match, COUNT: this.batchSize })) {
      if (found.length === 0) continue

      await this.client.unlink(found.map((k) => k.toString()))
    }

    return true
  }

  /** Sends `command` and `args` as one Redis command, e.g. `raw("TTL", key)`. */
  raw(command: string, ...args: unknown[]): Promise<unknown> {
    return this.client.sendCommand([command, ...args.map((a) => this.toRawArgument(a))])
  }

  async redlockRelease(key: string, expected: WireValue): Promise<boolean> {
    const deleted = await this.client.eval(COMPARE_AND_DELETE_SCRIPT, {
      keys: [key],
      arguments: [this.toArgument(expected)],
    })

    return deleted === 1
  }

  async open(): Promise<void> {
    if (!this.client.isOpen) await this.client.connect()
  }

  async close(): Promise<void> {
    if (this.client.isOpen) await this.client.close()
  }

  private *chunks<T>(items: readonly T[]): Generator<readonly T[]> {
    for (let i = 0; i < items.length; i += this.batchSize) {
      yield items.slice(i, i + this.batchSize)
    }
  }

  private toResult(buffer: Buffer | null, encoding: WireEncoding): CacheResult<WireValue> {
    if (buffer === null) return { kind: "miss" }

    return { kind: "hit", value: decodeWire(new Uint8Array(buffer), encoding) }
  }

  private toSetOptions(ttlMs: Milliseconds | undefined): RedisSetOptions {
    return ttlMs !== undefined && ttlMs > 0 ? { PX: ttlMs } : {}
  }

  private toArgument(value: WireValue): RedisArgument {
    return typeof value === "string" ? value : toBytes(value)
  }

  private toRawArgument(value: unknown): RedisArgument {
    if (typeof value === "string") return value
    if (value instanceof Uint8Array) return toBytes(value)

    return String(value)
  }
}
