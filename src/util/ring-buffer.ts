/** Fixed-capacity FIFO: pushing past capacity evicts the oldest entry. */
export class RingBuffer<T> {
  private items: T[] = []
  readonly capacity: number

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`RingBuffer capacity must be a positive integer, got ${capacity}`)
    }
    this.capacity = capacity
  }

  push(item: T): T | undefined {
    this.items.push(item)
    if (this.items.length > this.capacity) {
      return this.items.shift()
    }
    return undefined
  }

  get size(): number {
    return this.items.length
  }

  /** Oldest first. */
  toArray(): T[] {
    return [...this.items]
  }

  last(count: number = 1): T[] {
    if (count <= 0) return []
    return this.items.slice(-count)
  }

  latest(): T | undefined {
    return this.items[this.items.length - 1]
  }

  filter(predicate: (item: T) => boolean): T[] {
    return this.items.filter(predicate)
  }

  clear(): void {
    this.items = []
  }
}
