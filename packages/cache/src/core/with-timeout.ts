import type { Milliseconds, Scheduler } from "@tiercache/clock"
import { CacheTimeoutError } from "./errors"

export type TimeoutTarget = {
  op: string
  key?: string
  timeoutMs: Milliseconds
}

/**
 * Races `work` against a timer. `timeoutMs <= 0` disables the timer.
 *
 * The underlying operation is not cancelled; a single backend call either
 * completes or it does not.
 */
export async function withTimeout<R>(
  scheduler: Scheduler,
  target: TimeoutTarget,
  work: () => Promise<R>,
): Promise<R> {
  if (target.timeoutMs <= 0) return work()

  let fail: (err: CacheTimeoutError) => void = () => {}
  const timedOut = new Promise<never>((_resolve, reject) => {
    fail = reject
  })

  const task = scheduler.schedule(
    target.timeoutMs,
    () => fail(new CacheTimeoutError(target.op, target.timeoutMs, target.key)),
    { keepAlive: true },
  )

  try {
    return await Promise.race([work(), timedOut])
  } finally {
    task.cancel()
  }
}
