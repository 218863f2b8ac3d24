import type { Milliseconds, UnixMs } from "./time"

export type TimeSource = {
  /** Current time as a Date. Prefer `nowMs()` for arithmetic. */
  now(): Date

  /** Current time as milliseconds since the Unix epoch. */
  nowMs(): UnixMs
}

/**
 * Handle for a callback registered with {@link Scheduler.schedule}.
 */
export interface ScheduledTask {
  /** Prevent the callback from running. Calling it after the callback ran is a no-op. */
  cancel(): void
}

export type ScheduleOptions = {
  /**
   * Keep the process alive until the task runs or is cancelled. Set it when
   * a caller is awaiting the task (a lock wait, an operation timeout); leave
   * it off for background work such as TTL expiry.
   *
   * @default false
   */
  keepAlive?: boolean
}

export interface Scheduler {
  /**
   * Run `fn` once after `delayMs`. Negative delays run as soon as possible.
   *
   * @remarks
   * Unless `keepAlive` is set, scheduled work must not keep the process alive
   * on its own. Delays longer than a single platform timer allows must still
   * be honoured.
   */
  schedule(delayMs: Milliseconds, fn: () => void, opts?: ScheduleOptions): ScheduledTask
}

export type Clock = TimeSource & Scheduler
