import type { FlightKey, FlightResult, Singleflight } from "../../ports/single-flight"

type Flight<T> = {
  readonly promise: Promise<T>
  waiters: number
}

export class MemorySingleflight<T> implements Singleflight<T> {
  private readonly flights = new Map<FlightKey, Flight<T>>()

  async run(key: FlightKey, fn: () => Promise<T>): Promise<FlightResult<T>> {
    const running = this.flights.get(key)

    if (running) {
      running.waiters++
      const value = await running.promise

      return { value, source: "inflight", sharedWith: running.waiters }
    }

    const flight: Flight<T> = { promise: Promise.resolve().then(fn), waiters: 0 }
    this.flights.set(key, flight)

    try {
      const value = await flight.promise

      return { value, source: "leader", sharedWith: flight.waiters }
    } finally {
      // A forgotten flight may already have been replaced by a newer one.
      if (this.flights.get(key) === flight) {
        this.flights.delete(key)
      }
    }
  }

  tryRun(key: FlightKey, fn: () => Promise<T>): Promise<FlightResult<T>> | undefined {
    if (this.flights.has(key)) return undefined

    return this.run(key, fn)
  }

  isInFlight(key: FlightKey): boolean {
    return this.flights.has(key)
  }

  forget(key: FlightKey): void {
    this.flights.delete(key)
  }

  get size(): number {
    return this.flights.size
  }
}
