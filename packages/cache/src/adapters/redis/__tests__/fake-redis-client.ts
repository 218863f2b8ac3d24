import type { TimeSource } from "@tiercache/clock"
import type { RedisArgument, RedisCacheClient, RedisSetOptions } from "../redis-client"
import { CAS_SET_SCRIPT, COMPARE_AND_DELETE_SCRIPT } from "../redis-scripts"

type Entry = { value: Buffer; expiresAt?: number }

function toBuffer(value: RedisArgument): Buffer {
  return typeof value === "string" ? Buffer.from(value, "utf8") : Buffer.from(value)
}

/** Translates a MATCH pattern (`*`, `?`, backslash escapes) to a RegExp. */
function globToRegExp(pattern: string): RegExp {
  let source = ""

  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern.charAt(i)

    if (ch === "\\") {
      i++
      source += pattern.charAt(i).replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
    } else if (ch === "*") {
      source += ".*"
    } else if (ch === "?") {
      source += "."
    } else {
      source += ch.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
    }
  }

  return new RegExp(`^${source}$`)
}

/**
 * In-process stand-in for the node-redis client: enough of the string
 * commands, expiry and the two Lua scripts the backend sends.
 */
export class FakeRedisClient implements RedisCacheClient {
  isOpen = false

  private readonly data = new Map<string, Entry>()

  constructor(private readonly clock: TimeSource) {}

  async connect(): Promise<unknown> {
    this.isOpen = true

    return this
  }

  async close(): Promise<void> {
    this.isOpen = false
  }

  async get(key: string): Promise<Buffer | null> {
    const entry = this.live(key)

    return entry === undefined ? null : Buffer.from(entry.value)
  }

  async mGet(keys: string[]): Promise<(Buffer | null)[]> {
    return keys.map((key) => {
      const entry = this.live(key)

      return entry === undefined ? null : Buffer.from(entry.value)
    })
  }

  async set(key: string, value: RedisArgument, opts: RedisSetOptions = {}): Promise<string | null> {
    if (opts.NX && this.live(key) !== undefined) return null

    this.write(key, value, opts.PX)

    return "OK"
  }

  async exists(keys: string | string[]): Promise<number> {
    return this.list(keys).filter((key) => this.live(key) !== undefined).length
  }

  async incrBy(key: string, increment: number): Promise<number> {
    const entry = this.live(key)
    const text = entry?.value.toString("utf8") ?? "0"

    if (!/^-?\d+$/.test(text)) throw new Error("ERR value is not an integer or out of range")

    const next = Number(text) + increment

    this.data.set(key, { value: Buffer.from(String(next)), expiresAt: entry?.expiresAt })

    return next
  }

  async pExpire(key: string, ms: number): Promise<number> {
    const entry = this.live(key)

    if (entry === undefined) return 0

    entry.expiresAt = this.clock.nowMs() + ms

    return 1
  }

  async persist(key: string): Promise<number> {
    const entry = this.live(key)

    if (entry?.expiresAt === undefined) return 0

    entry.expiresAt = undefined

    return 1
  }

  async del(keys: string | string[]): Promise<number> {
    let removed = 0

    for (const key of this.list(keys)) {
      if (this.live(key) !== undefined && this.data.delete(key)) removed++
    }

    return removed
  }

  unlink(keys: string | string[]): Promise<number> {
    return this.del(keys)
  }

  async flushDb(): Promise<string> {
    this.data.clear()

    return "OK"
  }

  async *scanIterator(opts: { MATCH: string; COUNT?: number }): AsyncIterable<RedisArgument[]> {
    const match = globToRegExp(opts.MATCH)

    yield [...this.data.keys()].filter((key) => match.test(key))
  }

  async eval(script: string, opts: { keys: string[]; arguments: RedisArgument[] }): Promise<unknown> {
    const [key = ""] = opts.keys
    const [expected = "", ...rest] = opts.arguments
    const current = this.live(key)

    if (current === undefined || !current.value.equals(toBuffer(expected))) return 0

    if (script === COMPARE_AND_DELETE_SCRIPT) {
      this.data.delete(key)

      return 1
    }

    if (script === CAS_SET_SCRIPT) {
      const [value = "", ttl = "0"] = rest
      const ttlMs = Number(ttl.toString())

      this.write(key, value, ttlMs > 0 ? ttlMs : undefined)

      return 1
    }

    throw new Error("NOSCRIPT unknown script")
  }

  async sendCommand(args: RedisArgument[]): Promise<unknown> {
    const [command = "", key = ""] = args.map((a) => a.toString())

    switch (command.toUpperCase()) {
      case "DBSIZE":
        return [...this.data.keys()].filter((k) => this.live(k) !== undefined).length
      case "PTTL": {
        const entry = this.live(key)

        if (entry === undefined) return -2

        return entry.expiresAt === undefined ? -1 : entry.expiresAt - this.clock.nowMs()
      }
      default:
        throw new Error(`ERR unknown command '${command}'`)
    }
  }

  multi(): ReturnType<RedisCacheClient["multi"]> {
    const queued: Array<() => void> = []

    const tx = {
      set: (key: string, value: RedisArgument, opts: RedisSetOptions = {}): unknown => {
        queued.push(() => this.write(key, value, opts.PX))

        return tx
      },
      exec: async () => {
        for (const run of queued) run()

        return queued.map(() => "OK")
      },
    }

    return tx
  }

  private write(key: string, value: RedisArgument, px: number | undefined): void {
    this.data.set(key, {
      value: toBuffer(value),
      expiresAt: px === undefined ? undefined : this.clock.nowMs() + px,
    })
  }

  private live(key: string): Entry | undefined {
    const entry = this.data.get(key)

    if (entry === undefined) return undefined

    if (entry.expiresAt !== undefined && entry.expiresAt <= this.clock.nowMs()) {
      this.data.delete(key)

      return undefined
    }

    return entry
  }

  private list(keys: string | string[]): string[] {
    return typeof keys === "string" ? [keys] : keys
  }
}
