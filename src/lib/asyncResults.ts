/**
 * One-shot result slots handed out as tickets by asynchronous operations
 */
export class AsyncResultQueue<T> {
  private slots: (T | null)[] = [];

  /** Store a result and return its ticket */
  push(value: T): number {
    this.slots.push(value);
    return this.slots.length - 1;
  }

  /**
   * Take the result behind a ticket. The slot is cleared, so later calls
   * (and unknown tickets) get null.
   */
  pop(ticket: number): T | null {
    if (!Number.isInteger(ticket) || ticket < 0 || ticket >= this.slots.length) {
      return null;
    }
    const value = this.slots[ticket];
    this.slots[ticket] = null;
    return value;
  }

  get length(): number {
    return this.slots.length;
  }
}
