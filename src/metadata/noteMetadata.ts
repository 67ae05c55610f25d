import { Frontmatter, parseFrontmatterBlock, splitFrontmatter } from "./frontmatter.js";
import { InlineMetadata, isInlineKey } from "./inline.js";
import type { MetadataStore } from "./store.js";
import {
  MetadataKind,
  type FieldSettingsMap,
  type KeySelector,
  type Order,
  type StoreKind,
  type ValuesInput,
} from "./types.js";

/** What both metadata forms offer to the aggregator. */
export interface MetadataModel {
  readonly kind: StoreKind;
  readonly store: MetadataStore;
  exists(): boolean;
}

/**
 * One operation surface over a note's frontmatter and inline metadata. `ALL` runs an
 * operation on each store independently; the stores are never merged.
 */
export class NoteMetadata {
  constructor(
    readonly frontmatter: Frontmatter = new Frontmatter(),
    readonly inline: InlineMetadata = new InlineMetadata(),
    private readonly onChange: () => void = () => {}
  ) {}

  /** Parse both forms from the full note text. Throws InvalidFrontmatterError. */
  static parse(text: string, fields: FieldSettingsMap = {}): NoteMetadata {
    const { block, body } = splitFrontmatter(text);
    const frontmatter =
      block === null
        ? new Frontmatter()
        : new Frontmatter(parseFrontmatterBlock(block, fields), true);
    return new NoteMetadata(frontmatter, InlineMetadata.parse(body, fields));
  }

  model(kind: StoreKind): MetadataModel {
    return kind === MetadataKind.FRONTMATTER ? this.frontmatter : this.inline;
  }

  private stores(kind: MetadataKind): MetadataStore[] {
    if (kind === MetadataKind.ALL) return [this.frontmatter.store, this.inline.store];
    return [this.model(kind).store];
  }

  /**
   * Create or extend a key. Without `overwrite` the values are appended as given.
   * With `ALL`, every store that declares the key is updated; a key declared nowhere
   * is created in the frontmatter.
   */
  add(
    key: string,
    values?: ValuesInput,
    kind: MetadataKind = MetadataKind.ALL,
    overwrite = false
  ): void {
    let targets = this.stores(kind);
    if (kind === MetadataKind.ALL) {
      const declaring = targets.filter((s) => s.hasKey(key));
      targets = declaring.length > 0 ? declaring : [this.frontmatter.store];
    }
    for (const store of targets) store.add(key, values, overwrite);
    this.onChange();
  }

  remove(key: string, values?: ValuesInput, kind: MetadataKind = MetadataKind.ALL): void {
    for (const store of this.stores(kind)) store.remove(key, values);
    this.onChange();
  }

  removeEmpty(kind: MetadataKind = MetadataKind.ALL): void {
    for (const store of this.stores(kind)) store.removeEmpty();
    this.onChange();
  }

  /**
   * Append each key's values onto the destination and delete it from the source.
   * Without keys, every key of the source moves. Keys that cannot be written as inline
   * fields (`my.key`, `_id`) stay in the frontmatter.
   */
  move(keys: KeySelector, from: StoreKind, to: StoreKind): void {
    if (from === to) return;
    const source = this.model(from).store;
    const destination = this.model(to).store;

    const selected = keys === undefined ? source.keys() : typeof keys === "string" ? [keys] : keys;
    for (const key of selected) {
      const values = source.get(key);
      if (values === undefined) continue;
      if (to === MetadataKind.INLINE && !isInlineKey(key)) continue;
      destination.add(key, values);
      source.remove(key);
    }
    this.onChange();
  }

  removeDuplicateValues(keys?: KeySelector, kind: MetadataKind = MetadataKind.ALL): void {
    for (const store of this.stores(kind)) store.removeDuplicateValues(keys);
    this.onChange();
  }

  orderValues(keys: KeySelector, order: Order, kind: MetadataKind = MetadataKind.ALL): void {
    for (const store of this.stores(kind)) store.orderValues(keys, order);
    this.onChange();
  }

  orderKeys(order: Order, kind: MetadataKind = MetadataKind.ALL): void {
    for (const store of this.stores(kind)) store.orderKeys(order);
    this.onChange();
  }

  order(
    keys: KeySelector,
    keyOrder?: Order,
    valueOrder?: Order,
    kind: MetadataKind = MetadataKind.ALL
  ): void {
    for (const store of this.stores(kind)) store.order(keys, keyOrder, valueOrder);
    this.onChange();
  }

  /** True when some selected store declares the key with all the listed values. */
  has(key: string, values?: ValuesInput, kind: MetadataKind = MetadataKind.ALL): boolean {
    return this.stores(kind).some((store) => store.has(key, values));
  }

  /** Values of the key across the selected stores, frontmatter first. */
  get(key: string, kind: MetadataKind = MetadataKind.ALL): string[] | undefined {
    const found = this.stores(kind)
      .map((store) => store.get(key))
      .filter((values): values is string[] => values !== undefined);
    return found.length > 0 ? found.flat() : undefined;
  }

  keys(kind: MetadataKind = MetadataKind.ALL): string[] {
    return [...new Set(this.stores(kind).flatMap((store) => store.keys()))];
  }
}
