/**
 * Fixed-capacity FIFO record of recently processed items.
 *
 * Entries are kept in insertion order (Map iteration order); once the cache
 * holds more than `capacity` entries the oldest one is evicted. Lookups never
 * reorder entries, and pushing an entry that is already present leaves it
 * where it is.
 */
export class Dedupe<T> {
  private readonly entries = new Map<string, T>();

  constructor(
    public readonly capacity: number,
    private readonly keyOf: (item: T) => string
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Dedupe capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * Records `item` and returns the entry evicted to make room for it, if any.
   */
  public push(item: T): T | undefined {
    const key = this.keyOf(item);
    if (this.entries.has(key)) return undefined;

    this.entries.set(key, item);

    if (this.entries.size > this.capacity) {
      const oldest = this.entries.entries().next();
      if (!oldest.done) {
        const [oldestKey, evicted] = oldest.value;
        this.entries.delete(oldestKey);
        return evicted;
      }
    }
    return undefined;
  }

  public contains(item: T): boolean {
    return this.entries.has(this.keyOf(item));
  }

  public get size(): number {
    return this.entries.size;
  }
}
