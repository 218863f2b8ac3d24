import { randomUUID } from "node:crypto"
import type { Milliseconds } from "@tiercache/clock"
import { type Logger, NullLogger } from "@tiercache/logger"
import type { AddResult } from "../../ports/add-result"
import type { CachePrimitives } from "../../ports/cache-client"
import type { CacheKey } from "../../ports/cache-key"
import {
  defaultLockEventRegistry,
  type LockEventRegistry,
  type LockTicket,
  type WaitOutcome,
} from "./lock-event-registry"

/** Anything exposing the lock primitives, e.g. a `Cache` or `LayeredCache`. */
export type LockableCache = {
  readonly primitives: CachePrimitives
}

export type DistributedLockDeps = {
  client: LockableCache
  registry?: LockEventRegistry
  logger?: Logger
  /** Token generator. Default: `randomUUID`. */
  token?: () => string
}

export type DistributedLockOptions = {
  key: CacheKey
  /** How long the lock is presumed held; also the longest a waiter waits. */
  leaseMs: Milliseconds
  namespace?: string
}

export type AcquireResult =
  | { kind: "held" }
  | { kind: "waited"; reason: WaitOutcome }

type LockState =
  | { kind: "unlocked" }
  | { kind: "acquiring" }
  | { kind: "held"; token: string; ticket: LockTicket }
  | { kind: "waited" }
  | { kind: "released" }

export type LockStatus = LockState["kind"]

/**
 * Best-effort mutual exclusion on top of any cache (Redlock on a single
 * instance).
 *
 * `acquire()` writes a random token under `<key>-lock` with add-if-absent
 * and a TTL of `leaseMs`. Whoever loses waits until the holder releases or
 * the lease runs out, and then proceeds anyway. This favours availability:
 * when a lease expires with several callers waiting, all of them proceed at
 * once. Do not rely on it where concurrent execution would be incorrect.
 *
 * Release deletes the lock key only while it still holds this lock's token.
 * The guarantee is as good as the backend's `redlockRelease`: a backend that
 * could only delete unconditionally would let anyone release anyone's lock.
 *
 * The lock lives where the client's `primitives` point. For a `LayeredCache`
 * that is its first layer, which for an in-process first layer means the
 * lock is local to this process.
 *
 * @example
 * ```ts
 * const lock = new DistributedLock({ client: cache }, { key: "report", leaseMs: 10_000 })
 *
 * await lock.acquire()
 * try {
 *   await rebuildReport()
 * } finally {
 *   await lock.release()
 * }
 * ```
 */
export class DistributedLock {
  readonly lockKey: string

  private state: LockState = { kind: "unlocked" }
  private readonly client: LockableCache
  private readonly registry: LockEventRegistry
  private readonly logger: Logger
  private readonly leaseMs: Milliseconds
  private readonly nextToken: () => string

  constructor(deps: DistributedLockDeps, opts: DistributedLockOptions) {
    if (!(opts.leaseMs > 0)) {
      throw new RangeError(`leaseMs must be positive, got ${opts.leaseMs}`)
    }

    this.client = deps.client
    this.registry = deps.registry ?? defaultLockEventRegistry
    this.nextToken = deps.token ?? randomUUID
    this.leaseMs = opts.leaseMs
    this.lockKey = deps.client.primitives.buildKey(`${opts.key}-lock`, opts.namespace)
    this.logger = (deps.logger ?? new NullLogger()).child({
      module: "distributed-lock",
      key: this.lockKey,
    })
  }

  get status(): LockStatus {
    return this.state.kind
  }

  /** Never rejects because the lock is taken; only backend failures reject. */
  async acquire(): Promise<AcquireResult> {
    if (this.state.kind !== "unlocked") {
      throw new Error(`Lock "${this.lockKey}" cannot be acquired while ${this.state.kind}`)
    }

    this.state = { kind: "acquiring" }

    const token = this.nextToken()
    const ticket = this.registry.enter(this.lockKey)

    let added: AddResult
    try {
      added = await this.client.primitives.add(this.lockKey, token, this.leaseMs)
    } catch (err) {
      this.registry.leave(ticket)
      this.state = { kind: "unlocked" }
      throw err
    }

    if (added.kind === "written") {
      this.state = { kind: "held", token, ticket: this.registry.hold(ticket) }

      return { kind: "held" }
    }

    this.state = { kind: "waited" }
    this.logger.debug("lock busy, waiting", { leaseMs: this.leaseMs })

    const reason = await this.registry.wait(ticket, this.leaseMs)

    this.logger.debug("lock wait over", { reason })

    return { kind: "waited", reason }
  }

  /**
   * Resolves to `true` if this lock still held the key and removed it.
   * A lock that only waited has nothing to release.
   */
  async release(): Promise<boolean> {
    const state = this.state
    this.state = { kind: "released" }

    if (state.kind !== "held") return false

    let released: boolean
    try {
      released = await this.client.primitives.redlockRelease(this.lockKey, state.token)
    } catch (err) {
      this.registry.leave(state.ticket)
      throw err
    }

    if (!released) {
      this.logger.debug("lease expired before release")
      this.registry.leave(state.ticket)

      return false
    }

    const woken = this.registry.release(state.ticket)

    if (woken > 0) this.logger.debug("woke waiters", { woken })

    return true
  }
}

/** Runs `fn` between `acquire()` and `release()`. */
export async function withDistributedLock<R>(
  deps: DistributedLockDeps,
  opts: DistributedLockOptions,
  fn: (acquired: AcquireResult) => Promise<R>,
): Promise<R> {
  const lock = new DistributedLock(deps, opts)
  const acquired = await lock.acquire()

  try {
    return await fn(acquired)
  } finally {
    await lock.release()
  }
}
