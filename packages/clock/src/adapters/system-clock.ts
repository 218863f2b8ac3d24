import type { Clock, ScheduledTask, ScheduleOptions } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

/** Longest delay a single `setTimeout` accepts; anything above fires after 1ms. */
export const MAX_TIMER_DELAY_MS: Milliseconds = 2 ** 31 - 1

export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }

  nowMs(): UnixMs {
    return Date.now()
  }

  schedule(delayMs: Milliseconds, fn: () => void, opts: ScheduleOptions = {}): ScheduledTask {
    const dueAt = this.nowMs() + Math.max(0, delayMs)
    let timer: NodeJS.Timeout | undefined

    // Long TTLs are reached through a chain of maximal timers.
    const arm = () => {
      const remaining = dueAt - this.nowMs()

      timer =
        remaining > MAX_TIMER_DELAY_MS
          ? setTimeout(arm, MAX_TIMER_DELAY_MS)
          : setTimeout(fn, Math.max(0, remaining))

      if (!opts.keepAlive) timer.unref()
    }

    arm()

    return {
      cancel: () => clearTimeout(timer),
    }
  }
}
