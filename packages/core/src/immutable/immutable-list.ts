import { ItemNotFoundError } from '../errors/index.js';

/**
 * Ordered collection whose every change returns a new list. Items are
 * compared by identity (`===`).
 */
export class ImmutableList<T> implements Iterable<T> {
  private readonly items: readonly T[];

  private constructor(items: readonly T[]) {
    this.items = Object.freeze(items);
  }

  static empty<T>(): ImmutableList<T> {
    return new ImmutableList<T>([]);
  }

  static of<T>(...items: T[]): ImmutableList<T> {
    return new ImmutableList([...items]);
  }

  static from<T>(items: Iterable<T>): ImmutableList<T> {
    return items instanceof ImmutableList ? items : new ImmutableList([...items]);
  }

  get size(): number {
    return this.items.length;
  }

  get(index: number): T | undefined {
    return this.items[index];
  }

  indexOf(item: T): number {
    return this.items.indexOf(item);
  }

  includes(item: T): boolean {
    return this.items.includes(item);
  }

  add(item: T): ImmutableList<T> {
    return new ImmutableList([...this.items, item]);
  }

  addRange(items: Iterable<T>): ImmutableList<T> {
    return new ImmutableList([...this.items, ...items]);
  }

  /** Remove the first occurrence of `item`; returns this list if absent. */
  remove(item: T): ImmutableList<T> {
    const index = this.items.indexOf(item);
    if (index < 0) return this;
    return new ImmutableList([...this.items.slice(0, index), ...this.items.slice(index + 1)]);
  }

  /**
   * Put `newItem` where the first occurrence of `oldItem` is.
   * @throws ItemNotFoundError when `oldItem` is not in the list
   */
  replace(oldItem: T, newItem: T): ImmutableList<T> {
    const index = this.items.indexOf(oldItem);
    if (index < 0) {
      throw new ItemNotFoundError('Cannot replace an item that is not in the list', {
        additionalContext: { size: this.items.length },
      });
    }
    return this.setItem(index, newItem);
  }

  /** @throws RangeError when `index` is outside the list */
  setItem(index: number, item: T): ImmutableList<T> {
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length) {
      throw new RangeError(`Index ${index} is out of range for a list of ${this.items.length}`);
    }
    const next = [...this.items];
    next[index] = item;
    return new ImmutableList(next);
  }

  /** A mutable copy; changing it does not affect the list. */
  toArray(): T[] {
    return [...this.items];
  }

  toJSON(): T[] {
    return this.toArray();
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}
