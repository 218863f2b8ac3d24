import { FakeClock, SystemClock } from "@tiercache/clock"
import { LockEventRegistry } from "../lock-event-registry"

describe("LockEventRegistry", () => {
  let clock: FakeClock
  let registry: LockEventRegistry

  beforeEach(() => {
    clock = new FakeClock(0)
    registry = new LockEventRegistry({ scheduler: clock })
  })

  it("shares one entry per lock key and drops it with the last ticket", () => {
    const a = registry.enter("k")
    const b = registry.enter("k")

    expect(registry.size).toBe(1)

    registry.leave(a)
    expect(registry.size).toBe(1)

    registry.leave(b)
    expect(registry.size).toBe(0)
  })

  it("wakes every waiter on release", async () => {
    const holder = registry.hold(registry.enter("k"))
    const first = registry.wait(registry.enter("k"), 1000)
    const second = registry.wait(registry.enter("k"), 1000)

    expect(registry.waiters("k")).toBe(2)
    expect(registry.release(holder)).toBe(2)

    await expect(first).resolves.toBe("released")
    await expect(second).resolves.toBe("released")
    expect(registry.size).toBe(0)
    expect(clock.pendingTasks()).toBe(0)
  })

  it("gives up waiting after the timeout", async () => {
    registry.hold(registry.enter("k"))
    const waiting = registry.wait(registry.enter("k"), 500)

    clock.advance(500)

    await expect(waiting).resolves.toBe("lease-expired")
    expect(registry.waiters("k")).toBe(0)
    expect(registry.size).toBe(1)
  })

  it("a release between entering and waiting is not lost", async () => {
    const holder = registry.hold(registry.enter("k"))
    const contender = registry.enter("k")

    registry.release(holder)

    await expect(registry.wait(contender, 1000)).resolves.toBe("released")
    expect(clock.pendingTasks()).toBe(0)
  })

  it("later contenders get a fresh event after a release", async () => {
    const holder = registry.hold(registry.enter("k"))
    registry.release(holder)

    const next = registry.hold(registry.enter("k"))
    const waiting = registry.wait(registry.enter("k"), 1000)

    expect(registry.waiters("k")).toBe(1)

    registry.release(next)
    await expect(waiting).resolves.toBe("released")
  })

  it("hold() moves a ticket off an event that already fired", () => {
    const holder = registry.hold(registry.enter("k"))
    const late = registry.enter("k")

    registry.release(holder)

    const moved = registry.hold(late)

    expect(moved.event).not.toBe(late.event)
    expect(registry.size).toBe(1)
  })
})

describe("LockEventRegistry lease timer", () => {
  it("keeps the process alive while a contender waits", async () => {
    const setTimeoutSpy = vi.spyOn(globalThis, "setTimeout")
    const registry = new LockEventRegistry({ scheduler: new SystemClock() })

    const holder = registry.hold(registry.enter("k"))
    const waiting = registry.wait(registry.enter("k"), 60_000)
    const timer = setTimeoutSpy.mock.results[0]?.value

    expect(timer?.hasRef()).toBe(true)

    registry.release(holder)

    await expect(waiting).resolves.toBe("released")
  })
})
