import type { CacheKey } from "./cache-key"

/**
 * Combines a caller key with a namespace into the key a backend stores.
 *
 * The format must stay stable across releases: changing it orphans every
 * entry already written.
 */
export type KeyBuilder = (key: CacheKey, namespace: string) => string
