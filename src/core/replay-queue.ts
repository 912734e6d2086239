/**
 * Bounded record of notifications written to the gateway whose fate is still unknown.
 *
 * The gateway never acknowledges success; it reports only the first notification it
 * rejected, then stops reading. Everything written after that notification must be
 * treated as undelivered, and everything written before it as delivered. This queue
 * keeps the most recent `capacity` writes in order so `drainFrom` can reconstruct
 * both halves from a single sequence number.
 */

export interface Sequenced {
  sequence?: number;
}

export interface DrainResult<T> {
  /** The entry the gateway rejected. */
  matched: T;
  /** Entries written after `matched`, oldest first. */
  following: T[];
}

export class ReplayQueue<T extends Sequenced> {
  private slots: (T | undefined)[];
  private head = 0; // next write position
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError("ReplayQueue capacity must be a positive integer");
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  /**
   * Record a written entry, evicting the oldest one when full. A resident entry that
   * carries the same sequence number is dropped first: the counter wrapped onto it,
   * so a report naming that number can only refer to the newer write.
   */
  append(item: T): void {
    const { sequence } = item;
    if (sequence !== undefined && this.slots.some((entry) => entry?.sequence === sequence)) {
      this.remove(sequence);
    }
    this.slots[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;
  }

  /**
   * Locate `sequence` and split the queue around it. On a match the whole queue is
   * cleared: entries before the match count as delivered. Returns null and leaves the
   * queue untouched when no resident entry carries `sequence`.
   */
  drainFrom(sequence: number): DrainResult<T> | null {
    const entries = this.toArray();
    const index = entries.findIndex((entry) => entry.sequence === sequence);
    const matched = entries[index];
    if (index < 0 || matched === undefined) return null;

    this.clear();
    return { matched, following: entries.slice(index + 1) };
  }

  /** Return entries in insertion order (oldest first). */
  toArray(): T[] {
    const result: T[] = [];
    const start = this.count < this.capacity ? 0 : this.head;
    for (let i = 0; i < this.count; i++) {
      const entry = this.slots[(start + i) % this.capacity];
      if (entry !== undefined) result.push(entry);
    }
    return result;
  }

  get size(): number {
    return this.count;
  }

  private remove(sequence: number): void {
    const kept = this.toArray().filter((entry) => entry.sequence !== sequence);
    this.clear();
    for (const entry of kept) this.append(entry);
  }

  clear(): void {
    this.slots = new Array<T | undefined>(this.capacity);
    this.head = 0;
    this.count = 0;
  }
}
