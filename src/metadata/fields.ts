import type { MetadataStore } from "./store.js";
import type { FieldSettingsMap, StoreKind } from "./types.js";

export function separatorsFor(fields: FieldSettingsMap, key: string, kind: StoreKind): string[] {
  if (!Object.hasOwn(fields, key)) return [];
  const settings = fields[key];
  const separators =
    kind === "frontmatter" ? settings.frontmatterSeparators : settings.inlineSeparators;
  return separators ?? [];
}

export function splitOnSeparators(values: string[], separators: string[]): string[] {
  let result = values;
  for (const sep of separators) {
    result = result
      .join(sep)
      .split(sep)
      .map((v) => v.trim())
      .filter((v) => v !== "");
  }
  return result;
}

/**
 * Re-split the values of keys that have separators configured for this kind,
 * e.g. `tags: one two` with separator " " becomes `["one", "two"]`.
 */
export function applySeparators(
  store: MetadataStore,
  fields: FieldSettingsMap,
  kind: StoreKind
): void {
  for (const key of store.keys()) {
    const separators = separatorsFor(fields, key, kind);
    if (separators.length === 0) continue;

    store.add(key, splitOnSeparators(store.get(key) ?? [], separators), true);
  }
}
