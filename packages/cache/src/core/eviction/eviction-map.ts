/**
 * Ordered key/value storage that knows which key to evict next.
 *
 * Used by `BoundedMemoryBackend` as its size index. Iteration order is
 * eviction order: the head is evicted first.
 */
export interface EvictionMap<K, V> {
  /**
   * Returns the value for `key`. Counts as a use, so implementations may
   * reorder (e.g. touch-on-read for LRU).
   */
  get(key: K): V | undefined

  /** Returns the value for `key` without affecting eviction order. */
  peek(key: K): V | undefined

  /** Inserts or updates `key`. May reorder as a side effect. */
  set(key: K, value: V): void

  delete(key: K): boolean
  has(key: K): boolean
  clear(): void
  size(): number

  /** Keys from next-to-evict to most recently kept. */
  keys(): K[]

  /** The next key to evict, or `undefined` if empty. */
  victim(): K | undefined
}
