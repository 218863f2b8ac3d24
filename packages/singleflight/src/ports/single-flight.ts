export type FlightKey = string

/**
 * - "leader": this caller ran the loader
 * - "inflight": this caller joined a load another caller started
 */
export type FlightSource = "leader" | "inflight"

export interface FlightResult<T> {
  value: T
  source: FlightSource
  /** Callers that joined the leader's flight, leader excluded. */
  sharedWith: number
}

/**
 * Collapses concurrent loads of the same key into one.
 *
 * Used by the cache decorators so that a cold key is computed once per
 * process no matter how many callers miss it at the same time.
 *
 * @example
 * ```ts
 * const flights = new MemorySingleflight<User>()
 *
 * const [a, b] = await Promise.all([
 *   flights.run("user:1", () => loadUser(1)),
 *   flights.run("user:1", () => loadUser(1)),
 * ])
 *
 * a.source // "leader"
 * b.source // "inflight"
 * ```
 */
export interface Singleflight<T> {
  /**
   * Runs `fn` for `key` unless a flight for it is already running, in
   * which case the caller waits for that flight instead. Waiters share the
   * leader's outcome, including the same rejection. A settled flight is not
   * remembered.
   */
  run(key: FlightKey, fn: () => Promise<T>): Promise<FlightResult<T>>

  /** Like `run()`, but returns `undefined` at once if `key` is in flight. */
  tryRun(key: FlightKey, fn: () => Promise<T>): Promise<FlightResult<T>> | undefined

  /** Whether a flight for `key` is currently running. */
  isInFlight(key: FlightKey): boolean

  /**
   * Detaches the running flight for `key`. Its waiters still settle with it;
   * the next caller starts a new one.
   */
  forget(key: FlightKey): void

  readonly size: number
}
