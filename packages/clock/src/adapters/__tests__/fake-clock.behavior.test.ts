import { FakeClock } from "../fake-clock"

describe("FakeClock behavior", () => {
  describe("time control", () => {
    it("starts at the provided initial time", () => {
      const clock = new FakeClock(1000)

      expect(clock.nowMs()).toBe(1000)
    })

    it("defaults to 0 if no initial time provided", () => {
      const clock = new FakeClock()

      expect(clock.nowMs()).toBe(0)
    })

    it("advance() moves time forward", () => {
      const clock = new FakeClock(0)
      clock.advance(100)

      expect(clock.nowMs()).toBe(100)

      clock.advance(50)

      expect(clock.nowMs()).toBe(150)
    })

    it("set() moves time to exact value", () => {
      const clock = new FakeClock(0)

      clock.set(500)

      expect(clock.nowMs()).toBe(500)
    })
  })
})

describe("FakeClock scheduling", () => {
  it("runs a task once its due time is reached", () => {
    const clock = new FakeClock(0)
    const fn = vi.fn()

    clock.schedule(100, fn)
    clock.advance(99)

    expect(fn).not.toHaveBeenCalled()

    clock.advance(1)

    expect(fn).toHaveBeenCalledTimes(1)
    expect(clock.pendingTasks()).toBe(0)
  })

  it("runs due tasks in due-time order and exposes the due time to each", () => {
    const clock = new FakeClock(0)
    const seen: Array<[string, number]> = []

    clock.schedule(300, () => seen.push(["c", clock.nowMs()]))
    clock.schedule(100, () => seen.push(["a", clock.nowMs()]))
    clock.schedule(200, () => seen.push(["b", clock.nowMs()]))

    clock.advance(1000)

    expect(seen).toStrictEqual([
      ["a", 100],
      ["b", 200],
      ["c", 300],
    ])
    expect(clock.nowMs()).toBe(1000)
  })

  it("runs tasks scheduled by another task when they fall inside the window", () => {
    const clock = new FakeClock(0)
    const fn = vi.fn()

    clock.schedule(10, () => {
      clock.schedule(10, fn)
    })

    clock.advance(25)

    expect(fn).toHaveBeenCalledTimes(1)
  })

  it("cancelled tasks never run", () => {
    const clock = new FakeClock(0)
    const fn = vi.fn()

    const task = clock.schedule(50, fn)
    task.cancel()
    clock.advance(100)

    expect(fn).not.toHaveBeenCalled()
    expect(clock.pendingTasks()).toBe(0)
  })

  it("set() moves time without running tasks", () => {
    const clock = new FakeClock(0)
    const fn = vi.fn()

    clock.schedule(50, fn)
    clock.set(500)

    expect(fn).not.toHaveBeenCalled()
    expect(clock.pendingTasks()).toBe(1)
  })
})
