/**
 * Conversation Window
 *
 * Bounded, ordered list of conversation entries. Appending past capacity
 * evicts from the oldest end. Every append returns a mutation record that
 * `revert` can undo exactly, evicted entries included.
 */
export interface WindowMutation<T> {
  appended: number;
  evicted: T[];
}

export class ConversationWindow<T> {
  private items: T[] = [];
  private readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error('ConversationWindow capacity must be a positive integer');
    }
    this.capacity = capacity;
  }

  /**
   * Append entries, evicting the oldest ones beyond capacity
   */
  append(...entries: T[]): WindowMutation<T> {
    if (entries.length > this.capacity) {
      throw new Error(
        `Cannot append ${entries.length} entries to a window of capacity ${this.capacity}`,
      );
    }

    this.items.push(...entries);
    const overflow = this.items.length - this.capacity;
    const evicted = overflow > 0 ? this.items.splice(0, overflow) : [];

    return { appended: entries.length, evicted };
  }

  /**
   * Undo the most recent append. Only valid while no other append has
   * happened since; the caller serializes appends.
   */
  revert(mutation: WindowMutation<T>): void {
    if (mutation.appended > 0) {
      this.items.splice(this.items.length - mutation.appended, mutation.appended);
    }
    if (mutation.evicted.length > 0) {
      this.items.unshift(...mutation.evicted);
    }
  }

  toArray(): T[] {
    return [...this.items];
  }

  /**
   * Last `count` entries, oldest first
   */
  tail(count: number): T[] {
    if (count <= 0) return [];
    return this.items.slice(-count);
  }

  /**
   * Everything except the last `count` entries
   */
  head(count: number): T[] {
    if (count <= 0) return [...this.items];
    return this.items.slice(0, Math.max(0, this.items.length - count));
  }

  length(): number {
    return this.items.length;
  }

  /** Completed user/assistant exchanges held in the window */
  turnCount(): number {
    return Math.floor(this.items.length / 2);
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  getCapacity(): number {
    return this.capacity;
  }

  clear(): void {
    this.items = [];
  }

  *[Symbol.iterator](): Iterator<T> {
    for (const item of this.toArray()) {
      yield item;
    }
  }
}
