import type { EvictionMap } from "./eviction-map"

/** Evicts in first-insertion order; updates keep a key's position. */
export class FifoMemoryMap<K, V> implements EvictionMap<K, V> {
  private readonly map = new Map<K, V>()

  get(key: K): V | undefined {
    return this.map.get(key)
  }

  peek(key: K): V | undefined {
    return this.map.get(key)
  }

  set(key: K, value: V): void {
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
}
