import { SealedPropertyBagException } from './errors';

export type PropertySource<V> = PropertyBag<V> | Record<string, V>;

/**
 * Ordered key/value store used for headers, query parameters, body data and config.
 *
 * Keys are unique. Overwriting an existing key keeps the key in its original
 * position, so `merge` is a stable merge: connector-level keys stay where they
 * were even when a request overrides their value, and new keys are appended.
 *
 * Values copied in from another source (constructor, `set`, `merge`, `clone`)
 * are deep copies: nested bags, arrays and plain objects are never shared.
 */
export class PropertyBag<V = unknown> {
  private readonly data: Map<string, V>;
  private sealed = false;

  constructor(initial?: PropertySource<V>) {
    this.data = new Map();
    if (initial) {
      this.absorb(initial);
    }
  }

  static from<V>(record: Record<string, V>): PropertyBag<V> {
    return new PropertyBag<V>(record);
  }

  /**
   * Combines the sources left to right into a new bag. Later sources win.
   */
  static merge<V>(...sources: Array<PropertySource<V> | undefined>): PropertyBag<V> {
    const bag = new PropertyBag<V>();
    for (const source of sources) {
      if (source) bag.absorb(source);
    }
    return bag;
  }

  add(key: string, value: V): this {
    this.assertWritable(key);
    this.data.set(key, value);
    return this;
  }

  get(key: string): V | undefined;
  get(key: string, fallback: V): V;
  get(key: string, fallback?: V): V | undefined {
    return this.data.has(key) ? this.data.get(key) : fallback;
  }

  has(key: string): boolean {
    return this.data.has(key);
  }

  remove(key: string): this {
    this.assertWritable(key);
    this.data.delete(key);
    return this;
  }

  /**
   * Replaces the whole contents of the bag.
   */
  set(record: PropertySource<V>): this {
    this.assertWritable();
    this.data.clear();
    this.absorb(record);
    return this;
  }

  /**
   * Returns a new bag holding this bag's entries followed by the sources'.
   * Neither this bag nor any source is modified.
   */
  merge(...sources: Array<PropertySource<V> | undefined>): PropertyBag<V> {
    return PropertyBag.merge<V>(this, ...sources);
  }

  all(): Record<string, V> {
    return Object.fromEntries(this.data);
  }

  /**
   * Lets `JSON.stringify` write a nested bag as its entries.
   */
  toJSON(): Record<string, V> {
    return this.all();
  }

  keys(): string[] {
    return [...this.data.keys()];
  }

  entries(): Array<[string, V]> {
    return [...this.data.entries()];
  }

  get size(): number {
    return this.data.size;
  }

  isEmpty(): boolean {
    return this.data.size === 0;
  }

  /**
   * Unsealed deep copy.
   */
  clone(): PropertyBag<V> {
    return new PropertyBag<V>(this);
  }

  /**
   * Makes `add`, `remove` and `set` throw from now on. Reads still work.
   */
  seal(): this {
    this.sealed = true;
    return this;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  private assertWritable(key?: string): void {
    if (this.sealed) {
      throw new SealedPropertyBagException(key);
    }
  }

  private absorb(source: PropertySource<V>): void {
    const entries = source instanceof PropertyBag ? source.entries() : Object.entries(source);
    for (const [key, value] of entries) {
      this.data.set(key, copyValue(value));
    }
  }
}

const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

function copyValue<T>(value: T): T;
function copyValue(value: unknown): unknown {
  if (value instanceof PropertyBag) return value.clone();
  if (Array.isArray(value)) return value.map((item: unknown) => copyValue(item));
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, copyValue(item)]));
  }
  return value;
}
