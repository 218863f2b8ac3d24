import type { LoggerContractOptions } from "./logger-harness"

export function describeLoggerContract({ name, make }: LoggerContractOptions) {
  describe(`Logger contract: ${name}`, () => {
    it("writes the message and the bound context of every ancestor", () => {
      const { logger, entries } = make("trace")

      logger.child({ module: "layered-cache" }).child({ layer: 1 }).info("layer read failed")

      expect(entries()).toHaveLength(1)
      expect(entries()[0]?.message).toBe("layer read failed")
      expect(entries()[0]?.fields).toMatchObject({ module: "layered-cache", layer: 1 })
    })

    it("lets the nearest child win on a key conflict", () => {
      const { logger, entries } = make("trace")

      logger.child({ namespace: "users:" }).child({ namespace: "orders:" }).info("hello")

      expect(entries()[0]?.fields.namespace).toBe("orders:")
    })

    it("leaves the parent's context untouched when deriving a child", () => {
      const { logger, entries } = make("trace")

      const parent = logger.child({ module: "cache" })
      parent.child({ backend: "memory" }).info("child")
      parent.info("parent")

      const [fromChild, fromParent] = entries()

      expect(fromChild?.fields).toMatchObject({ module: "cache", backend: "memory" })
      expect(fromParent?.fields).toMatchObject({ module: "cache" })
      expect(fromParent?.fields).not.toHaveProperty("backend")
    })

    it("merges per-call meta into the entry", () => {
      const { logger, entries } = make("trace")

      logger.child({ module: "cache" }).warn("operation timed out", {
        op: "get",
        key: "users:1",
        timeoutMs: 50,
      })

      expect(entries()[0]).toMatchObject({
        level: "warn",
        fields: { module: "cache", op: "get", key: "users:1", timeoutMs: 50 },
      })
    })

    it("drops entries below the minimum level", () => {
      const { logger, entries } = make("warn")

      logger.debug("lock wait")
      logger.info("cache hit")
      logger.warn("layer write failed")
      logger.fatal("backend unreachable")

      expect(entries().map((e) => e.level)).toStrictEqual(["warn", "fatal"])
    })
  })
}
