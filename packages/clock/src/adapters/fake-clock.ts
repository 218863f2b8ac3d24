import type { Clock, ScheduledTask, ScheduleOptions } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

type PendingTask = {
  id: number
  dueAt: UnixMs
  fn: () => void
}

/**
 * Deterministic clock for tests.
 *
 * Time only moves through `advance()`, which also runs every scheduled task
 * that falls due, in due-time order.
 */
export class FakeClock implements Clock {
  private time: UnixMs
  private nextId = 0
  private readonly tasks = new Map<number, PendingTask>()

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    const target = this.time + ms

    for (let task = this.nextDue(target); task; task = this.nextDue(target)) {
      this.tasks.delete(task.id)
      this.time = Math.max(this.time, task.dueAt)
      task.fn()
    }

    this.time = target
  }

  /** Jump to an exact instant. Scheduled tasks are not run. */
  set(ms: UnixMs): void {
    this.time = ms
  }

  schedule(delayMs: Milliseconds, fn: () => void, _opts?: ScheduleOptions): ScheduledTask {
    const id = this.nextId++

    this.tasks.set(id, { id, dueAt: this.time + Math.max(0, delayMs), fn })

    return {
      cancel: () => {
        this.tasks.delete(id)
      },
    }
  }

  /** Number of scheduled tasks that have neither run nor been cancelled. */
  pendingTasks(): number {
    return this.tasks.size
  }

  private nextDue(limit: UnixMs): PendingTask | undefined {
    let next: PendingTask | undefined

    for (const task of this.tasks.values()) {
      if (task.dueAt > limit) continue
      if (!next || task.dueAt < next.dueAt) next = task
    }

    return next
  }
}
