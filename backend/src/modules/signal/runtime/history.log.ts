/**
 * HISTORY LOG
 * ===========
 *
 * Fixed-capacity ring buffer of past verdicts. Appends are O(1) and evict
 * the oldest entry once full; reads return a chronological copy.
 */

export const DEFAULT_HISTORY_CAPACITY = 50;

export class HistoryLog<T extends object> {
  private readonly buffer: Array<T | undefined>;
  private head = 0; // index of the oldest entry
  private count = 0;

  constructor(readonly capacity: number = DEFAULT_HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Array<T | undefined>(capacity).fill(undefined);
  }

  get size(): number {
    return this.count;
  }

  /**
   * Append an entry; returns the evicted entry when the buffer was full.
   */
  append(entry: T): T | null {
    if (this.count < this.capacity) {
      this.buffer[(this.head + this.count) % this.capacity] = entry;
      this.count++;
      return null;
    }

    const evicted = this.buffer[this.head] ?? null;
    this.buffer[this.head] = entry;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  /**
   * Chronological copy (oldest → newest).
   */
  snapshot(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.buffer[(this.head + i) % this.capacity];
      if (item !== undefined) out.push(item);
    }
    return out;
  }

  /**
   * The most recent `limit` entries, still oldest → newest.
   */
  latest(limit: number): T[] {
    const all = this.snapshot();
    if (limit >= all.length) return all;
    return all.slice(all.length - Math.max(0, limit));
  }
}
