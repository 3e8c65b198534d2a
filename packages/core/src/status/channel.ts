/**
 * Coalescing Channel
 *
 * Bounded single-consumer queue between the job runner and the status
 * sink. When full, the oldest coalescible entry makes room; entries keep
 * their order and non-coalescible entries are never dropped.
 */

export class CoalescingChannel<T extends object> {
  private items: T[] = [];
  private waiter: ((item: T | null) => void) | null = null;
  private closed = false;
  private readonly capacity: number;
  private readonly isCoalescible: (item: T) => boolean;

  constructor(capacity: number, isCoalescible: (item: T) => boolean) {
    if (capacity < 1) {
      throw new RangeError(`Channel capacity must be at least 1, got ${capacity}`);
    }
    this.capacity = capacity;
    this.isCoalescible = isCoalescible;
  }

  /**
   * Queue an item. Returns false when it was dropped.
   */
  push(item: T): boolean {
    if (this.closed) {
      return false;
    }

    if (this.waiter) {
      const deliver = this.waiter;
      this.waiter = null;
      deliver(item);
      return true;
    }

    if (this.items.length >= this.capacity) {
      const oldest = this.items.findIndex((queued) => this.isCoalescible(queued));
      if (oldest >= 0) {
        this.items.splice(oldest, 1);
      } else if (this.isCoalescible(item)) {
        // Nothing to make room with; a progress item is not worth growing for
        return false;
      }
    }

    this.items.push(item);
    return true;
  }

  /**
   * Next item in order, or null once the channel is closed and drained
   */
  receive(): Promise<T | null> {
    const next = this.items.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /**
   * Stop accepting items. Queued items are still delivered.
   */
  close(): void {
    this.closed = true;
    if (this.waiter) {
      const deliver = this.waiter;
      this.waiter = null;
      deliver(null);
    }
  }

  get size(): number {
    return this.items.length;
  }
}
