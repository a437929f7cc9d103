/**
 * Bounded ring buffer for error history.
 *
 * Fixed capacity, oldest entries drop on overflow.
 * Immutable externally: toArray() returns a frozen copy.
 */

export class RingBuffer<T extends object> {
  private readonly _items: (T | undefined)[];
  private readonly _capacity: number;
  private _head = 0;
  private _size = 0;

  constructor(capacity: number) {
    if (capacity < 1 || !Number.isInteger(capacity)) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this._capacity = capacity;
    this._items = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this._size;
  }

  get capacity(): number {
    return this._capacity;
  }

  push(item: T): void {
    this._items[this._head] = item;
    this._head = (this._head + 1) % this._capacity;
    if (this._size < this._capacity) {
      this._size++;
    }
  }

  toArray(): readonly T[] {
    if (this._size === 0) return Object.freeze([]);

    const result: T[] = [];
    for (let i = 0; i < this._size; i++) {
      const item = this._items[this.indexOf(i)];
      if (item !== undefined) result.push(item);
    }
    return Object.freeze(result);
  }

  /**
   * Replace the newest item matching `predicate` with `update(item)`.
   * Returns false when nothing matched.
   */
  updateLast(predicate: (item: T) => boolean, update: (item: T) => T): boolean {
    for (let i = this._size - 1; i >= 0; i--) {
      const idx = this.indexOf(i);
      const item = this._items[idx];
      if (item !== undefined && predicate(item)) {
        this._items[idx] = update(item);
        return true;
      }
    }
    return false;
  }

  clear(): void {
    this._items.fill(undefined);
    this._head = 0;
    this._size = 0;
  }

  /** Storage index of the i-th oldest item */
  private indexOf(i: number): number {
    // Until the buffer fills, items start at 0; after that at _head (oldest)
    const start = this._size < this._capacity ? 0 : this._head;
    return (start + i) % this._capacity;
  }
}
