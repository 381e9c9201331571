export const DEFAULT_CHANNEL_CAPACITY = 8192
const COMPACT_THRESHOLD = 1024

/**
 * Unbounded hand-off queue between the decode pipeline and its consumers.
 * push() never blocks and never drops; when the backlog passes the current
 * capacity the capacity doubles and a warning is logged, since a consumer that
 * keeps falling behind will eventually exhaust memory.
 */
export class SampleChannel<T> implements AsyncIterable<T> {
  private items: T[] = []
  private head = 0
  private waiters: Array<(result: IteratorResult<T, undefined>) => void> = []
  private closed = false
  private _capacity: number
  private _growths = 0

  constructor(readonly name: string, capacity = DEFAULT_CHANNEL_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`channel capacity must be a positive integer, got ${capacity}`)
    }
    this._capacity = capacity
  }

  get size(): number {
    return this.items.length - this.head
  }

  get capacity(): number {
    return this._capacity
  }

  /** How many times the buffer had to grow past its configured capacity. */
  get growths(): number {
    return this._growths
  }

  get isClosed(): boolean {
    return this.closed
  }

  push(item: T): boolean {
    if (this.closed) return false
    const waiter = this.waiters.shift()
    if (waiter) {
      waiter({ value: item, done: false })
      return true
    }
    this.items.push(item)
    if (this.size > this._capacity) {
      this._capacity *= 2
      this._growths++
      console.warn(`[SampleChannel:${this.name}] consumer is falling behind; buffer grown to ${this._capacity} items`)
    }
    return true
  }

  pushAll(items: readonly T[]): void {
    for (const item of items) this.push(item)
  }

  /** Takes everything currently buffered without waiting. */
  drain(): T[] {
    const items = this.items.slice(this.head)
    this.items = []
    this.head = 0
    return items
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.size > 0) {
      const value = this.items[this.head++]
      if (this.head === this.items.length) {
        this.items = []
        this.head = 0
      } else if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.items.length) {
        this.items = this.items.slice(this.head)
        this.head = 0
      }
      return Promise.resolve({ value, done: false })
    }
    if (this.closed) return Promise.resolve({ value: undefined, done: true })
    return new Promise((resolve) => this.waiters.push(resolve))
  }

  /** Stops accepting items. Buffered items can still be read. */
  close(): void {
    if (this.closed) return
    this.closed = true
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true })
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      const result = await this.next()
      if (result.done) return
      yield result.value
    }
  }
}
