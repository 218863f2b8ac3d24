import { FakeClock } from "@tiercache/clock"
import { UnsupportedCommandError } from "../../../core/errors"
import { MemoryBackend } from "../memory-backend"

describe("MemoryBackend behavior", () => {
  let clock: FakeClock
  let onExpire: ReturnType<typeof vi.fn<(key: string) => void>>
  let backend: MemoryBackend

  beforeEach(() => {
    clock = new FakeClock(0)
    onExpire = vi.fn<(key: string) => void>()
    backend = new MemoryBackend({ scheduler: clock, onExpire })
  })

  describe("expiry timers", () => {
    it("keeps one timer per expiring key and drops it when the key expires", async () => {
      await backend.set("a", "1", { ttlMs: 100 })
      await backend.set("b", "2", { ttlMs: 200 })
      await backend.set("c", "3")

      expect(backend.scheduledExpiries()).toBe(2)
      expect(clock.pendingTasks()).toBe(2)

      clock.advance(200)

      expect(backend.scheduledExpiries()).toBe(0)
      expect(clock.pendingTasks()).toBe(0)
      expect(backend.keys()).toStrictEqual(["c"])
      expect(onExpire.mock.calls).toStrictEqual([["a"], ["b"]])
    })

    it("replaces the timer when a key is rewritten", async () => {
      await backend.set("a", "1", { ttlMs: 100 })
      await backend.set("a", "2", { ttlMs: 100 })

      expect(clock.pendingTasks()).toBe(1)
    })

    it("cancels the timer on delete", async () => {
      await backend.set("a", "1", { ttlMs: 100 })
      await backend.delete("a")

      expect(clock.pendingTasks()).toBe(0)

      clock.advance(100)
      expect(onExpire).not.toHaveBeenCalled()
    })

    it("cancels the timer when expire() makes a key persistent", async () => {
      await backend.set("a", "1", { ttlMs: 100 })
      await backend.expire("a", 0)

      expect(backend.scheduledExpiries()).toBe(0)
      expect(clock.pendingTasks()).toBe(0)
    })

    it("keeps the timer across increments", async () => {
      await backend.set("hits", "1", { ttlMs: 100 })
      await backend.increment("hits", 1)

      expect(backend.scheduledExpiries()).toBe(1)

      clock.advance(100)
      expect(backend.has("hits")).toBe(false)
    })

    it("a namespaced clear cancels only that namespace's timers", async () => {
      await backend.set("a:1", "1", { ttlMs: 100 })
      await backend.set("b:1", "1", { ttlMs: 100 })
      await backend.clear("a:")

      expect(backend.scheduledExpiries()).toBe(1)
      expect(backend.keys()).toStrictEqual(["b:1"])
    })

    it("close() drops every entry and timer", async () => {
      await backend.set("a", "1", { ttlMs: 100 })
      await backend.set("b", "2")
      await backend.close()

      expect(backend.keys()).toStrictEqual([])
      expect(clock.pendingTasks()).toBe(0)
    })
  })

  describe("raw", () => {
    it("answers the inspection commands", async () => {
      await backend.set("a", "1")
      await backend.set("b", "2")

      expect(await backend.raw("keys")).toStrictEqual(["a", "b"])
      expect(await backend.raw("size")).toBe(2)
      expect(await backend.raw("has", "a")).toBe(true)
      expect(await backend.raw("get", "b")).toBe("2")
    })

    it("rejects anything else", async () => {
      await expect(backend.raw("FLUSHALL")).rejects.toBeInstanceOf(UnsupportedCommandError)
    })
  })

  it("rejects a delta that is not a safe integer", async () => {
    await expect(backend.increment("n", 1.5)).rejects.toBeInstanceOf(RangeError)
    expect(backend.has("n")).toBe(false)
  })
})
