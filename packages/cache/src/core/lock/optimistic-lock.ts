import type { CacheClient } from "../../ports/cache-client"
import type { CacheKey } from "../../ports/cache-key"
import type { VersionedResult } from "../../ports/cache-result"
import type { CacheCallOptions, CacheTtl } from "../../ports/cache-ttl"
import { OptimisticLockConflictError } from "../errors"

export type OptimisticLockOptions = CacheCallOptions & {
  key: CacheKey
}

/**
 * Read, then write only if nobody wrote in between.
 *
 * `acquire()` takes a versioned snapshot and excludes nobody. `cas()` makes
 * the write conditional on that snapshot and throws on a conflict. What to do
 * next (retry, merge, give up) is the caller's decision.
 *
 * If the key was absent at snapshot time the write is unconditional.
 */
export class OptimisticLock<T> {
  private snapshot: VersionedResult<T> | undefined

  constructor(
    private readonly deps: { client: CacheClient<T> },
    private readonly opts: OptimisticLockOptions,
  ) {}

  async acquire(): Promise<VersionedResult<T>> {
    this.snapshot = await this.deps.client.gets(this.opts.key, this.callOptions())

    return this.snapshot
  }

  /** @throws {OptimisticLockConflictError} if the value changed since `acquire()` */
  async cas(value: T, opts?: { ttl?: CacheTtl }): Promise<void> {
    if (this.snapshot === undefined) {
      throw new Error(`OptimisticLock on "${this.opts.key}" used before acquire()`)
    }

    const written = await this.deps.client.set(this.opts.key, value, {
      ...this.callOptions(),
      ttl: opts?.ttl,
      casToken: this.snapshot.kind === "hit" ? this.snapshot.token : undefined,
    })

    if (!written) {
      throw new OptimisticLockConflictError(this.deps.client.buildKey(this.opts.key, this.opts.namespace))
    }
  }

  private callOptions(): CacheCallOptions {
    return { namespace: this.opts.namespace, timeoutMs: this.opts.timeoutMs }
  }
}

/** Snapshots `key`, then hands the lock and the snapshot to `fn`. */
export async function withOptimisticLock<T, R>(
  deps: { client: CacheClient<T> },
  opts: OptimisticLockOptions,
  fn: (lock: OptimisticLock<T>, snapshot: VersionedResult<T>) => Promise<R>,
): Promise<R> {
  const lock = new OptimisticLock(deps, opts)

  return fn(lock, await lock.acquire())
}
