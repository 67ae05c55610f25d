import type { KeySelector, Order, ValuesInput } from "./types.js";

/** Byte-wise comparison of the UTF-8 encodings, independent of locale. */
export function compareOrdinal(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, "utf8"), Buffer.from(b, "utf8"));
}

function sortOrdinal(items: string[], order: Order): string[] {
  const sign = order === "desc" ? -1 : 1;
  return [...items].sort((a, b) => sign * compareOrdinal(a, b));
}

export function normalizeValues(values: ValuesInput | undefined): string[] {
  if (values === undefined) return [];
  if (typeof values === "string" || typeof values === "number") return [String(values)];
  return values.map((v) => String(v));
}

/**
 * Ordered mapping from key to an ordered sequence of values.
 *
 * A key mapped to an empty sequence is declared without values, which is not the same
 * as the key being absent. Values are never deduplicated implicitly.
 */
export class MetadataStore {
  private fields = new Map<string, string[]>();

  constructor(entries?: Iterable<readonly [string, readonly string[]]>) {
    if (entries) {
      for (const [key, values] of entries) {
        this.fields.set(key, [...values]);
      }
    }
  }

  get size(): number {
    return this.fields.size;
  }

  keys(): string[] {
    return [...this.fields.keys()];
  }

  entries(): Array<[string, string[]]> {
    return [...this.fields.entries()].map(([key, values]) => [key, [...values]]);
  }

  hasKey(key: string): boolean {
    return this.fields.has(key);
  }

  get(key: string): string[] | undefined {
    const values = this.fields.get(key);
    return values ? [...values] : undefined;
  }

  /** True when the key exists and holds every listed value. An empty list only checks the key. */
  has(key: string, values?: ValuesInput): boolean {
    const current = this.fields.get(key);
    if (!current) return false;
    return normalizeValues(values).every((v) => current.includes(v));
  }

  add(key: string, values?: ValuesInput, overwrite = false): void {
    const incoming = normalizeValues(values);
    const current = this.fields.get(key);
    if (!current || overwrite) {
      this.fields.set(key, incoming);
      return;
    }
    current.push(...incoming);
  }

  /**
   * Without values the key is deleted. With values every occurrence of each listed
   * value is dropped and the key stays, even when nothing is left.
   */
  remove(key: string, values?: ValuesInput): void {
    const current = this.fields.get(key);
    if (!current) return;
    if (values === undefined) {
      this.fields.delete(key);
      return;
    }
    const drop = new Set(normalizeValues(values));
    this.fields.set(
      key,
      current.filter((v) => !drop.has(v))
    );
  }

  removeEmpty(): void {
    for (const [key, values] of [...this.fields]) {
      if (values.length === 0) this.fields.delete(key);
    }
  }

  removeDuplicateValues(keys?: KeySelector): void {
    for (const key of this.resolveKeys(keys)) {
      const values = this.fields.get(key);
      if (values) this.fields.set(key, [...new Set(values)]);
    }
  }

  orderValues(keys: KeySelector, order: Order): void {
    for (const key of this.resolveKeys(keys)) {
      const values = this.fields.get(key);
      if (values) this.fields.set(key, sortOrdinal(values, order));
    }
  }

  orderKeys(order: Order): void {
    const reordered = new Map<string, string[]>();
    for (const key of sortOrdinal(this.keys(), order)) {
      const values = this.fields.get(key);
      if (values) reordered.set(key, values);
    }
    this.fields = reordered;
  }

  order(keys: KeySelector, keyOrder?: Order, valueOrder?: Order): void {
    if (keyOrder) this.orderKeys(keyOrder);
    if (valueOrder) this.orderValues(keys, valueOrder);
  }

  clone(): MetadataStore {
    return new MetadataStore(this.fields);
  }

  equals(other: MetadataStore): boolean {
    const mine = this.entries();
    const theirs = other.entries();
    if (mine.length !== theirs.length) return false;
    return mine.every(([key, values], i) => {
      const [otherKey, otherValues] = theirs[i];
      return (
        key === otherKey &&
        values.length === otherValues.length &&
        values.every((v, j) => v === otherValues[j])
      );
    });
  }

  toObject(): Record<string, string[]> {
    return Object.fromEntries(this.entries());
  }

  private resolveKeys(keys: KeySelector): string[] {
    if (keys === undefined) return this.keys();
    const list = typeof keys === "string" ? [keys] : [...keys];
    return list.filter((k) => this.fields.has(k));
  }
}
