/**
 * A cache key as seen by callers, before namespacing.
 *
 * Backends only ever receive fully namespaced keys; see {@link KeyBuilder}.
 *
 * @example
 * ```ts
 * const key: CacheKey = "user:123"
 * ```
 */
export type CacheKey = string
