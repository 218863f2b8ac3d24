import { FakeClock } from "@tiercache/clock"
import { mock } from "vitest-mock-extended"
import { NotAnIntegerError } from "../../../core/errors"
import { RedisBackend } from "../redis-backend"
import type { RedisCacheClient } from "../redis-client"
import { CAS_SET_SCRIPT } from "../redis-scripts"
import { FakeRedisClient } from "./fake-redis-client"

describe("RedisBackend behavior", () => {
  let clock: FakeClock
  let client: FakeRedisClient

  beforeEach(() => {
    clock = new FakeClock(0)
    client = new FakeRedisClient(clock)
  })

  it("rejects a batch size below 1", () => {
    expect(() => new RedisBackend({ client }, { batchSize: 0 })).toThrow(RangeError)
  })

  describe("batching", () => {
    const keys = ["k1", "k2", "k3", "k4", "k5"]

    it("multiGet() sends one MGET per batch", async () => {
      const backend = new RedisBackend({ client }, { batchSize: 2 })
      await backend.multiSet(keys.map((k) => [k, "1"]))

      const spy = vi.spyOn(client, "mGet")
      const results = await backend.multiGet(keys, "utf8")

      expect(spy.mock.calls.map(([batch]) => batch.length)).toStrictEqual([2, 2, 1])
      expect(results).toHaveLength(5)
    })

    it("multiSet() sends one MULTI per batch", async () => {
      const backend = new RedisBackend({ client }, { batchSize: 2 })
      const spy = vi.spyOn(client, "multi")

      await backend.multiSet(keys.map((k) => [k, "1"]))

      expect(spy).toHaveBeenCalledTimes(3)
    })

    it("multiDelete() sends one DEL per batch and sums the counts", async () => {
      const backend = new RedisBackend({ client }, { batchSize: 2 })
      await backend.multiSet(keys.map((k) => [k, "1"]))

      const spy = vi.spyOn(client, "del")

      expect(await backend.multiDelete(keys)).toBe(5)
      expect(spy).toHaveBeenCalledTimes(3)
    })
  })

  describe("writes", () => {
    it("sends PX only for a positive TTL", async () => {
      const backend = new RedisBackend({ client })
      const spy = vi.spyOn(client, "set")

      await backend.set("a", "1", { ttlMs: 250 })
      await backend.set("b", "2", { ttlMs: 0 })

      expect(spy.mock.calls).toStrictEqual([
        ["a", "1", { PX: 250 }],
        ["b", "2", {}],
      ])
    })

    it("add() uses SET NX", async () => {
      const backend = new RedisBackend({ client })
      const spy = vi.spyOn(client, "set")

      await backend.add("job", "owner", { ttlMs: 1000 })

      expect(spy).toHaveBeenCalledWith("job", "owner", { PX: 1000, NX: true })
    })

    it("a CAS write goes through the compare-and-set script", async () => {
      const backend = new RedisBackend({ client })
      await backend.set("doc", "v1")
      const spy = vi.spyOn(client, "eval")

      await backend.set("doc", "v2", { casToken: "v1", ttlMs: 100 })

      expect(spy).toHaveBeenCalledWith(CAS_SET_SCRIPT, {
        keys: ["doc"],
        arguments: ["v1", "v2", "100"],
      })
    })

    it("sends bytes as buffers", async () => {
      const backend = new RedisBackend({ client })
      const spy = vi.spyOn(client, "set")

      await backend.set("bin", new Uint8Array([7, 8]))

      expect(spy.mock.calls[0]?.[1]).toStrictEqual(Buffer.from([7, 8]))
    })
  })

  describe("increment", () => {
    it("maps the server's integer error", async () => {
      const failing = mock<RedisCacheClient>()
      failing.incrBy.mockRejectedValue(new Error("ERR value is not an integer or out of range"))

      await expect(new RedisBackend({ client: failing }).increment("n", 1)).rejects.toBeInstanceOf(
        NotAnIntegerError,
      )
    })

    it("passes other failures through", async () => {
      const failing = mock<RedisCacheClient>()
      const down = new Error("connection lost")
      failing.incrBy.mockRejectedValue(down)

      await expect(new RedisBackend({ client: failing }).increment("n", 1)).rejects.toBe(down)
    })
  })

  describe("clear", () => {
    it("scans the namespace with glob characters escaped", async () => {
      const backend = new RedisBackend({ client }, { batchSize: 50 })
      await backend.multiSet([
        ["a*b:1", "x"],
        ["axb:1", "y"],
      ])
      const spy = vi.spyOn(client, "scanIterator")

      await backend.clear("a*b:")

      expect(spy).toHaveBeenCalledWith({ MATCH: "a\\*b:*", COUNT: 50 })
      expect(await backend.exists("a*b:1")).toBe(false)
      expect(await backend.exists("axb:1")).toBe(true)
    })

    it("flushes the database without a namespace", async () => {
      const backend = new RedisBackend({ client })
      const spy = vi.spyOn(client, "flushDb")

      await backend.clear()

      expect(spy).toHaveBeenCalledTimes(1)
    })
  })

  it("raw() sends the command as given", async () => {
    const backend = new RedisBackend({ client })
    await backend.set("k", "v", { ttlMs: 5000 })
    clock.advance(1000)

    expect(await backend.raw("PTTL", "k")).toBe(4000)
    expect(await backend.raw("DBSIZE")).toBe(1)
  })

  describe("connection", () => {
    it("open() connects once", async () => {
      const backend = new RedisBackend({ client })
      const spy = vi.spyOn(client, "connect")

      await backend.open()
      await backend.open()

      expect(spy).toHaveBeenCalledTimes(1)
      expect(client.isOpen).toBe(true)
    })

    it("close() leaves a closed client alone", async () => {
      const backend = new RedisBackend({ client })
      const spy = vi.spyOn(client, "close")

      await backend.close()
      expect(spy).not.toHaveBeenCalled()

      await backend.open()
      await backend.close()
      expect(spy).toHaveBeenCalledTimes(1)
    })
  })
})
