export const MetadataKind = {
  FRONTMATTER: "frontmatter",
  INLINE: "inline",
  ALL: "all",
} as const;

export type MetadataKind = (typeof MetadataKind)[keyof typeof MetadataKind];

/** A kind that names exactly one store. */
export type StoreKind = Exclude<MetadataKind, "all">;

export const Order = {
  ASC: "asc",
  DESC: "desc",
} as const;

export type Order = (typeof Order)[keyof typeof Order];

/** Values accepted from callers; numbers are stored as strings. */
export type MetadataInput = string | number;
export type ValuesInput = MetadataInput | readonly MetadataInput[];

/** One key, several keys, or (undefined) every key of the store. */
export type KeySelector = string | readonly string[] | undefined;

export type InlinePosition = "top" | "bottom";
export type InlineTemplate = "standard" | "callout";

export interface ComposeOptions {
  inlinePosition: InlinePosition;
  inlineTemplate: InlineTemplate;
  inlineInplace: boolean;
}

export const DEFAULT_COMPOSE_OPTIONS: ComposeOptions = {
  inlinePosition: "bottom",
  inlineTemplate: "standard",
  inlineInplace: true,
};

export interface FieldSettings {
  defaultKind?: StoreKind;
  frontmatterSeparators?: string[];
  inlineSeparators?: string[];
}

export type FieldSettingsMap = Record<string, FieldSettings>;

export interface RawSegments {
  /** Text found before the frontmatter block (a byte-order mark). */
  preamble: string;
  /** The frontmatter block with its delimiter lines, or null when the note has none. */
  frontmatter: string | null;
  /** The malformed block text when the frontmatter could not be parsed. */
  malformedFrontmatter: string | null;
  body: string;
}

export function isStoreKind(value: string): value is StoreKind {
  return value === MetadataKind.FRONTMATTER || value === MetadataKind.INLINE;
}

export function isMetadataKind(value: string): value is MetadataKind {
  return isStoreKind(value) || value === MetadataKind.ALL;
}

export function isOrder(value: string): value is Order {
  return value === Order.ASC || value === Order.DESC;
}
