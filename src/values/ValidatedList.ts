/** Validates (and possibly transforms) a candidate element. Throws to reject it. */
export type ItemValidator<T> = (value: unknown) => T;

/**
 * Mutable ordered sequence whose every inserted element goes through a
 * validator. Indices may be negative, counting from the end.
 */
export class ValidatedList<T> implements Iterable<T> {
  readonly validItem: ItemValidator<T>;
  private readonly items: T[];

  /** Build from initial values; `null` and `undefined` are skipped. */
  constructor(validItem: ItemValidator<T>, ...values: unknown[]) {
    this.validItem = validItem;
    this.items = [];
    for (const value of values) {
      if (value === null || value === undefined) continue;
      this.items.push(validItem(value));
    }
  }

  get length(): number {
    return this.items.length;
  }

  /** Element at `index`, or undefined when out of range. */
  at(index: number): T | undefined {
    return this.items.at(index);
  }

  /** Element at `index`. Throws RangeError when out of range. */
  get(index: number): T {
    const i = this.normalize(index);
    if (i === undefined) {
      throw new RangeError('list index out of range');
    }
    return this.items[i];
  }

  /** Replace the element at `index`. The value is validated before the index is checked. */
  set(index: number, value: unknown): void {
    const item = this.validItem(value);
    const i = this.normalize(index);
    if (i === undefined) {
      throw new RangeError('list assignment index out of range');
    }
    this.items[i] = item;
  }

  /** Insert before `index`; out-of-range indices clamp to either end. */
  insert(index: number, value: unknown): void {
    const item = this.validItem(value);
    const n = this.items.length;
    let i = index < 0 ? index + n : index;
    i = Math.min(Math.max(i, 0), n);
    this.items.splice(i, 0, item);
  }

  /** Append values, returning the new length. */
  push(...values: unknown[]): number {
    return this.extend(values);
  }

  /** Append every value of an iterable, returning the new length. Nothing is added if any value fails. */
  extend(values: Iterable<unknown>): number {
    const valid = Array.from(values, this.validItem);
    this.items.push(...valid);
    return this.items.length;
  }

  /** Remove the element at `index`. */
  delete(index: number): void {
    const i = this.normalize(index);
    if (i === undefined) {
      throw new RangeError('list assignment index out of range');
    }
    this.items.splice(i, 1);
  }

  /**
   * Array-style splice; inserted values are validated first.
   * Without `deleteCount` everything from `start` on is replaced.
   */
  splice(start: number, deleteCount?: number, ...values: unknown[]): T[] {
    const valid = values.map(this.validItem);
    return this.items.splice(start, deleteCount ?? this.items.length, ...valid);
  }

  /** Shallow copy of a range, as a plain array. */
  slice(start?: number, end?: number): T[] {
    return this.items.slice(start, end);
  }

  toArray(): T[] {
    return [...this.items];
  }

  toJSON(): T[] {
    return this.toArray();
  }

  /** Element-wise equality (`Object.is`) with any iterable. */
  equals(other: Iterable<unknown>): boolean {
    const others = Array.from(other);
    return others.length === this.items.length && others.every((item, i) => Object.is(item, this.items[i]));
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }

  private normalize(index: number): number | undefined {
    const i = index < 0 ? index + this.items.length : index;
    return Number.isInteger(i) && i >= 0 && i < this.items.length ? i : undefined;
  }
}
