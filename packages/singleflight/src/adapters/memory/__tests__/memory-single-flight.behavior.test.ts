import { deferred } from "../../../ports/__tests__/deferred"
import { MemorySingleflight } from "../memory-single-flight"

describe("MemorySingleflight behavior", () => {
  it("does not let a forgotten flight evict its replacement", async () => {
    const flights = new MemorySingleflight<number>()
    const oldGate = deferred<number>()
    const newGate = deferred<number>()

    const first = flights.run("k", () => oldGate.promise)
    flights.forget("k")
    const second = flights.run("k", () => newGate.promise)

    oldGate.resolve(1)
    await first

    expect(flights.isInFlight("k")).toBe(true)
    expect(flights.tryRun("k", async () => 3)).toBeUndefined()

    newGate.resolve(2)
    await second

    expect(flights.size).toBe(0)
  })

  it("does not call the loader before run() returns", () => {
    const flights = new MemorySingleflight<number>()
    const loader = vi.fn(async () => 1)

    const pending = flights.run("k", loader)

    expect(flights.isInFlight("k")).toBe(true)
    expect(loader).not.toHaveBeenCalled()

    return pending
  })
})
