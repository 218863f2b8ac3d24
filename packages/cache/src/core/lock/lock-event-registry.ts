import { type Milliseconds, type Scheduler, SystemClock } from "@tiercache/clock"

export type WaitOutcome = "released" | "lease-expired"

type LockEvent = {
  released: boolean
  refs: number
  readonly wakers: Set<() => void>
}

/** A holder's or waiter's reference to the event of one lock key. */
export type LockTicket = {
  readonly lockKey: string
  readonly event: LockEvent
}

/**
 * Process-wide rendezvous for `DistributedLock`s on the same key.
 *
 * Contenders `enter()` before trying to take the lock, so a release that
 * lands between a failed attempt and the start of the wait is still seen.
 * `release()` detaches and fires the event in one step; later contenders
 * get a fresh one. An entry leaves the table once no ticket references it.
 */
export class LockEventRegistry {
  private readonly events = new Map<string, LockEvent>()
  private readonly scheduler: Scheduler

  constructor(deps: { scheduler?: Scheduler } = {}) {
    this.scheduler = deps.scheduler ?? new SystemClock()
  }

  enter(lockKey: string): LockTicket {
    let event = this.events.get(lockKey)

    if (event === undefined) {
      event = { released: false, refs: 0, wakers: new Set() }
      this.events.set(lockKey, event)
    }

    event.refs++

    return { lockKey, event }
  }

  /**
   * Turns a contender's ticket into a holder's. If the event it joined was
   * released meanwhile, the holder moves to a fresh one.
   */
  hold(ticket: LockTicket): LockTicket {
    if (!ticket.event.released) return ticket

    this.leave(ticket)

    return this.enter(ticket.lockKey)
  }

  /** Settles once the event fires, or after `timeoutMs`. Consumes the ticket. */
  wait(ticket: LockTicket, timeoutMs: Milliseconds): Promise<WaitOutcome> {
    const { event } = ticket

    if (event.released) {
      this.leave(ticket)

      return Promise.resolve("released")
    }

    return new Promise((resolve) => {
      const wake = () => {
        task.cancel()
        this.leave(ticket)
        resolve("released")
      }

      const task = this.scheduler.schedule(
        timeoutMs,
        () => {
          event.wakers.delete(wake)
          this.leave(ticket)
          resolve("lease-expired")
        },
        { keepAlive: true },
      )

      event.wakers.add(wake)
    })
  }

  /** Fires the holder's event, waking every waiter. Consumes the ticket. */
  release(ticket: LockTicket): number {
    const { event } = ticket

    if (this.events.get(ticket.lockKey) === event) this.events.delete(ticket.lockKey)

    event.released = true

    const wakers = [...event.wakers]
    event.wakers.clear()

    this.leave(ticket)

    for (const wake of wakers) wake()

    return wakers.length
  }

  /** Gives up a ticket without firing anything. */
  leave(ticket: LockTicket): void {
    const { event } = ticket

    event.refs--

    if (event.refs <= 0 && this.events.get(ticket.lockKey) === event) {
      this.events.delete(ticket.lockKey)
    }
  }

  /** Lock keys with at least one holder or waiter. */
  get size(): number {
    return this.events.size
  }

  waiters(lockKey: string): number {
    return this.events.get(lockKey)?.wakers.size ?? 0
  }
}

export const defaultLockEventRegistry = new LockEventRegistry()
