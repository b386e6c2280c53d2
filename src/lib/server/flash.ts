/**
 * Flash Messages
 *
 * Transient notifications shown once on the next page view, keyed by a
 * per-browser token kept in a cookie.
 */

export type FlashCategory = 'success' | 'warning' | 'danger';

export interface FlashMessage {
  category: FlashCategory;
  message: string;
}

export class FlashQueue {
  private pending = new Map<string, FlashMessage[]>();
  private maxKeys: number;

  constructor(maxKeys: number = 1000) {
    this.maxKeys = maxKeys;
  }

  push(key: string, message: FlashMessage): void {
    const queue = this.pending.get(key) ?? [];
    queue.push(message);

    // Re-insert so the key moves to the back of the eviction order
    this.pending.delete(key);
    this.pending.set(key, queue);

    while (this.pending.size > this.maxKeys) {
      const oldest = this.pending.keys().next();
      if (oldest.done) break;
      this.pending.delete(oldest.value);
    }
  }

  /**
   * Return and forget everything queued for `key`
   */
  consume(key: string): FlashMessage[] {
    const queue = this.pending.get(key) ?? [];
    this.pending.delete(key);
    return queue;
  }

  size(): number {
    return this.pending.size;
  }
}
