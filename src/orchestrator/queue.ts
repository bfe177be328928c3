/**
 * Unbounded single-producer/single-consumer queue.
 * The producer never blocks; the consumer waits while the queue is empty.
 */
export class EventQueue<T> {
  private items: T[] = [];
  private waiting: Array<(item: T) => void> = [];

  /**
   * Enqueue an item. Hands it straight to a waiting consumer if any.
   */
  put(item: T): void {
    const next = this.waiting.shift();
    if (next) {
      next(item);
    } else {
      this.items.push(item);
    }
  }

  /**
   * Dequeue the oldest item. Blocks until one is available.
   */
  async get(): Promise<T> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      if (item !== undefined) return item;
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  /**
   * Number of items enqueued but not yet consumed.
   */
  get size(): number {
    return this.items.length;
  }
}
