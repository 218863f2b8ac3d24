import { type Milliseconds, SystemClock, type TimeSource } from "@tiercache/clock"
import Database from "better-sqlite3"
import { assertDelta, parseStoredInteger } from "../../core/integer"
import { decodeWire, toBytes } from "../../core/wire"
import type { AddResult } from "../../ports/add-result"
import type { BackendSetOptions, BackendWriteOptions, CacheBackend } from "../../ports/cache-backend"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheResult } from "../../ports/cache-result"
import type { WireEncoding, WireValue } from "../../ports/wire-value"

export type SqliteBackendOptions = {
  /** Database file. Default: `":memory:"`. Ignored when `db` is injected. */
  filename?: string
}

export type SqliteBackendDeps = {
  db?: Database.Database
  clock?: TimeSource
}

type StoredValue = string | Buffer

type KeyAt = { key: string; now: number }

type EntryParams = { key: string; value: StoredValue; expiresAt: number | null }

type Row = {
  value: StoredValue
  expires_at: number | null
}

const SCHEMA = `
CREATE TABLE IF NOT EXISTS cache (
  key TEXT PRIMARY KEY,
  value BLOB NOT NULL,
  expires_at INTEGER
)`

// Rows past expires_at are invisible to every statement and removed lazily.
const LIVE = "(expires_at IS NULL OR expires_at > @now)"

/**
 * File-backed backend on better-sqlite3.
 *
 * Statements run synchronously, so every compare-then-act operation is a
 * single statement or transaction. Text is stored as TEXT and bytes as BLOB,
 * which keeps CAS comparisons exact.
 */
export class SqliteBackend implements CacheBackend {
  readonly kind: string = "sqlite"

  private readonly db: Database.Database
  private readonly clock: TimeSource

  private readonly selectLive: Database.Statement<[KeyAt], Row>
  private readonly upsert: Database.Statement<[EntryParams]>
  private readonly insertIfAbsent: Database.Statement<[EntryParams]>
  private readonly deleteExpiredKey: Database.Statement<[KeyAt]>

  constructor(deps: SqliteBackendDeps = {}, opts: SqliteBackendOptions = {}) {
    this.db = deps.db ?? new Database(opts.filename ?? ":memory:")
    this.clock = deps.clock ?? new SystemClock()

    this.db.pragma("journal_mode = WAL")
    this.db.pragma("synchronous = NORMAL")
    this.db.exec(SCHEMA)

    this.selectLive = this.db.prepare<KeyAt, Row>(`SELECT value, expires_at FROM cache WHERE key = @key AND ${LIVE}`)
    this.upsert = this.db.prepare<EntryParams>(
      `INSERT INTO cache (key, value, expires_at) VALUES (@key, @value, @expiresAt)
       ON CONFLICT (key) DO UPDATE SET value = excluded.value, expires_at = excluded.expires_at`,
    )
    this.insertIfAbsent = this.db.prepare<EntryParams>(
      "INSERT INTO cache (key, value, expires_at) VALUES (@key, @value, @expiresAt) ON CONFLICT (key) DO NOTHING",
    )
    this.deleteExpiredKey = this.db.prepare<KeyAt>(
      "DELETE FROM cache WHERE key = @key AND expires_at IS NOT NULL AND expires_at <= @now",
    )
  }

  async get(key: string, encoding: WireEncoding): Promise<CacheResult<WireValue>> {
    return this.read(key, encoding)
  }

  async gets(key: string, encoding: WireEncoding): Promise<CacheResult<WireValue>> {
    return this.read(key, encoding)
  }

  async multiGet(
    keys: readonly string[],
    encoding: WireEncoding,
  ): Promise<CacheResult<WireValue>[]> {
    return keys.map((key) => this.read(key, encoding))
  }

  async set(key: string, value: WireValue, opts?: BackendSetOptions): Promise<boolean> {
    const expiresAt = this.expiresAt(opts?.ttlMs)

    if (opts?.casToken === undefined) {
      this.upsert.run({ key, value: this.toStored(value), expiresAt })

      return true
    }

    const info = this.db
      .prepare<{ key: string; value: StoredValue; expected: StoredValue; expiresAt: number | null; now: number }>(
        `UPDATE cache SET value = @value, expires_at = @expiresAt
         WHERE key = @key AND value = @expected AND ${LIVE}`,
      )
      .run({
        key,
        value: this.toStored(value),
        expected: this.toStored(opts.casToken),
        expiresAt,
        now: this.clock.nowMs(),
      })

    return info.changes === 1
  }

  async multiSet(
    entries: readonly CacheEntry<WireValue>[],
    opts?: BackendWriteOptions,
  ): Promise<boolean> {
    const expiresAt = this.expiresAt(opts?.ttlMs)

    this.db.transaction(() => {
      for (const [key, value] of entries) {
        this.upsert.run({ key, value: this.toStored(value), expiresAt })
      }
    })()

    return true
  }

  async add(key: string, value: WireValue, opts?: BackendWriteOptions): Promise<AddResult> {
    const written = this.db.transaction(() => {
      this.deleteExpiredKey.run({ key, now: this.clock.nowMs() })

      return this.insertIfAbsent.run({
        key,
        value: this.toStored(value),
        expiresAt: this.expiresAt(opts?.ttlMs),
      }).changes
    })()

    return written === 1 ? { kind: "written" } : { kind: "skipped", reason: "exists" }
  }

  async exists(key: string): Promise<boolean> {
    return this.selectLive.get({ key, now: this.clock.nowMs() }) !== undefined
  }

  async increment(key: string, delta: number): Promise<number> {
    assertDelta(delta)

    return this.db.transaction(() => {
      const row = this.selectLive.get({ key, now: this.clock.nowMs() })

      if (row === undefined) {
        this.upsert.run({ key, value: String(delta), expiresAt: null })

        return delta
      }

      const next = parseStoredInteger(key, row.value) + delta

      this.db
        .prepare<{ key: string; value: string }>("UPDATE cache SET value = @value WHERE key = @key")
        .run({ key, value: String(next) })

      return next
    })()
  }

  async expire(key: string, ttlMs: Milliseconds): Promise<boolean> {
    const info = this.db
      .prepare<{ key: string; expiresAt: number | null; now: number }>(
        `UPDATE cache SET expires_at = @expiresAt WHERE key = @key AND ${LIVE}`,
      )
      .run({ key, expiresAt: this.expiresAt(ttlMs), now: this.clock.nowMs() })

    return info.changes === 1
  }

  async delete(key: string): Promise<0 | 1> {
    return this.deleteLive(key) ? 1 : 0
  }

  async multiDelete(keys: readonly string[]): Promise<number> {
    return this.db.transaction(() => keys.filter((key) => this.deleteLive(key)).length)()
  }

  async clear(namespace?: string): Promise<boolean> {
    if (namespace === undefined) {
      this.db.exec("DELETE FROM cache")

      return true
    }

    const keys = this.db.prepare<[], { key: string }>("SELECT key FROM cache").all()
    const remove = this.db.prepare<{ key: string }>("DELETE FROM cache WHERE key = @key")

    this.db.transaction(() => {
      for (const { key } of keys) {
        if (key.startsWith(namespace)) remove.run({ key })
      }
    })()

    return true
  }

  /**
   * Runs `sql` with positional `params`. Queries resolve to their rows,
   * other statements to `{ changes }`.
   */
  async raw(sql: string, ...params: unknown[]): Promise<unknown> {
    const statement = this.db.prepare<unknown[], unknown>(sql)

    if (statement.reader) return statement.all(...params)

    return { changes: statement.run(...params).changes }
  }

  async redlockRelease(key: string, expected: WireValue): Promise<boolean> {
    const info = this.db
      .prepare<{ key: string; expected: StoredValue; now: number }>(
        `DELETE FROM cache WHERE key = @key AND value = @expected AND ${LIVE}`,
      )
      .run({ key, expected: this.toStored(expected), now: this.clock.nowMs() })

    return info.changes === 1
  }

  async open(): Promise<void> {}

  async close(): Promise<void> {
    if (this.db.open) this.db.close()
  }

  /** Deletes every expired row. Resolves to the number removed. */
  async purgeExpired(): Promise<number> {
    return this.db
      .prepare<{ now: number }>("DELETE FROM cache WHERE expires_at IS NOT NULL AND expires_at <= @now")
      .run({ now: this.clock.nowMs() }).changes
  }

  private read(key: string, encoding: WireEncoding): CacheResult<WireValue> {
    const row = this.selectLive.get({ key, now: this.clock.nowMs() })

    if (row === undefined) {
      this.deleteExpiredKey.run({ key, now: this.clock.nowMs() })

      return { kind: "miss" }
    }

    const value: WireValue = typeof row.value === "string" ? row.value : new Uint8Array(row.value)

    return { kind: "hit", value: decodeWire(value, encoding) }
  }

  private deleteLive(key: string): boolean {
    return (
      this.db
        .prepare<KeyAt>(`DELETE FROM cache WHERE key = @key AND ${LIVE}`)
        .run({ key, now: this.clock.nowMs() }).changes === 1
    )
  }

  private expiresAt(ttlMs: Milliseconds | undefined): number | null {
    return ttlMs !== undefined && ttlMs > 0 ? this.clock.nowMs() + ttlMs : null
  }

  private toStored(value: WireValue): StoredValue {
    return typeof value === "string" ? value : toBytes(value)
  }
}
