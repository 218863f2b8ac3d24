/**
 * Evicts the entry that was read or written least recently.
 */
export type LruCacheEvictionPolicy = "lru"

/**
 * Evicts entries in insertion order. Reads and overwrites do not reorder.
 */
export type FifoCacheEvictionPolicy = "fifo"

export type CacheEvictionPolicy = LruCacheEvictionPolicy | FifoCacheEvictionPolicy
