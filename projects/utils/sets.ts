export type ConstSet<T> = Pick<Set<T>, 'size' | 'has'> & Iterable<T>;

/**
 * Label of the empty set of states.
 */
export const EMPTY_SET_LABEL = '∅';

/**
 * A map whose keys are compared by the string the hasher produces for them
 * rather than by identity.
 */
export class HashMap<K, V> {
  private hasher: (item: K) => string;
  private data: Map<string, V> = new Map();
  constructor(hasher: (item: K) => string, entries: Iterable<[K, V]> = []) {
    this.hasher = hasher;
    for (const [key, value] of entries) {
      this.set(key, value);
    }
  }
  get(key: K): V | undefined {
    return this.data.get(this.hasher(key));
  }
  has(key: K): boolean {
    return this.data.has(this.hasher(key));
  }
  set(key: K, value: V): this {
    this.data.set(this.hasher(key), value);
    return this;
  }
  get size(): number {
    return this.data.size;
  }
}

export class NumberSet implements ConstSet<number> {
  private data: Set<number>;
  constructor(items: Iterable<number> = []) {
    this.data = new Set(items);
  }
  get size(): number {
    return this.data.size;
  }

  [Symbol.iterator]() {
    return this.data[Symbol.iterator]();
  }

  has(a: number): boolean {
    return this.data.has(a);
  }

  sorted(): number[] {
    return Array.from(this.data.values()).sort((a, b) => a - b);
  }

  /**
   * Key that is equal for two sets exactly when the sets are equal.
   */
  hash(): string {
    return `{${this.sorted().join(',')}}`;
  }

  /**
   * Human readable name for the set: `{1,2,5}`, a bare `4` for a
   * singleton, and {@link EMPTY_SET_LABEL} for the empty set.
   */
  label(): string {
    const values = this.sorted();
    if (values.length == 0) {
      return EMPTY_SET_LABEL;
    }
    if (values.length == 1) {
      return String(values[0]);
    }
    return `{${values.join(',')}}`;
  }
}
