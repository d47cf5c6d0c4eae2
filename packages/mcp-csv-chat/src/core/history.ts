/**
 * One answered question. Created only once the model has replied.
 */
export interface Exchange {
  readonly question: string;
  readonly answer: string;
  readonly askedAt: string;
}

/**
 * Ordered log of exchanges for one chat session.
 *
 * Entries are only ever appended or cleared; when `capacity` is reached the
 * oldest exchange is evicted. A capacity of 0 keeps everything.
 */
export class ChatHistory {
  private entries: Exchange[] = [];
  readonly capacity: number;

  constructor(capacity = 0) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`History capacity must be a non-negative integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.entries.length;
  }

  append(exchange: Exchange): void {
    this.entries.push(Object.freeze({ ...exchange }));
    if (this.capacity > 0 && this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  clear(): void {
    this.entries = [];
  }

  /** Frozen copy in submission order; later appends do not show up in it. */
  snapshot(): readonly Exchange[] {
    return Object.freeze([...this.entries]);
  }
}
