import type { EvictionMap } from "./eviction-map"

/** `Map` keeps insertion order; re-inserting a key moves it to the tail. */
export class LruMemoryMap<K, V> implements EvictionMap<K, V> {
  private readonly map = new Map<K, V>()

  get(key: K): V | undefined {
    const value = this.map.get(key)

    if (value === undefined) return undefined

    this.markMostRecentlyUsed(key, value)

    return value
  }

  peek(key: K): V | undefined {
    return this.map.get(key)
  }

  set(key: K, value: V): void {
    if (this.map.has(key)) this.map.delete(key)

    this.map.set(key, value)
  }

  delete(key: K): boolean {
    return this.map.delete(key)
  }

  has(key: K): boolean {
    return this.map.has(key)
  }

  clear(): void {
    this.map.clear()
  }

  size(): number {
    return this.map.size
  }

  keys(): K[] {
    return [...this.map.keys()]
  }

  victim(): K | undefined {
    const head = this.map.keys().next()

    return head.done ? undefined : head.value
  }

  private markMostRecentlyUsed(key: K, value: V): void {
    this.map.delete(key)
    this.map.set(key, value)
  }
}
