/**
 * Single-capacity, set-once slot. The first `offer` wins; every later one is dropped.
 */
export class HandoffSlot<T> {
  private slot: { value: T } | null = null;
  private waiters: Array<(value: T) => void> = [];

  /**
   * Publish `value` if the slot is empty. Never blocks; returns whether it was taken.
   */
  offer(value: T): boolean {
    if (this.slot) return false;
    this.slot = { value };
    const waiters = this.waiters;
    this.waiters = [];
    for (const notify of waiters) {
      notify(value);
    }
    return true;
  }

  /**
   * Non-blocking read.
   */
  poll(): T | undefined {
    return this.slot?.value;
  }

  /**
   * Resolves with the published value, immediately if there already is one.
   */
  next(): Promise<T> {
    const slot = this.slot;
    if (slot) {
      return Promise.resolve(slot.value);
    }
    return new Promise<T>((resolve) => {
      this.waiters.push(resolve);
    });
  }
}
