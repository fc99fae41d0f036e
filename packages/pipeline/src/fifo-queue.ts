const COMPACT_THRESHOLD = 1024

/**
 * Array-backed FIFO with O(1) amortized `shift`.
 * Consumed slots are reclaimed once they make up half of the backing array.
 */
export class FifoQueue<T> implements Iterable<T> {
  private items: T[] = []
  private head = 0

  public get length(): number {
    return this.items.length - this.head
  }

  public push(item: T): void {
    this.items.push(item)
  }

  /**
   * Removes and returns the oldest item.
   * @throws When the queue is empty.
   */
  public shift(): T {
    if (this.length === 0) {
      throw new Error('Cannot shift from an empty queue')
    }
    const item = this.items[this.head]
    this.head += 1
    if (this.head === this.items.length) {
      this.items = []
      this.head = 0
    } else if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head)
      this.head = 0
    }
    return item
  }

  public first(): T {
    return this.at(0)
  }

  public last(): T {
    return this.at(this.length - 1)
  }

  /**
   * @throws When `index` is outside the queue.
   */
  public at(index: number): T {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw new RangeError(`Index ${index} out of range for queue of length ${this.length}`)
    }
    return this.items[this.head + index]
  }

  public clear(): void {
    this.items = []
    this.head = 0
  }

  public *[Symbol.iterator](): Iterator<T> {
    for (let i = this.head; i < this.items.length; i += 1) {
      yield this.items[i]
    }
  }
}
