import { InvalidArgumentError } from "commander";
import { splitValues } from "../metadata/inline.js";
import {
  isMetadataKind,
  isOrder,
  isStoreKind,
  type InlinePosition,
  type InlineTemplate,
  type MetadataKind,
  type Order,
  type StoreKind,
} from "../metadata/types.js";
import type { MetaCondition } from "../notes/types.js";

/**
 * Parse a `--has` spec: `key`, `key=v1,v2` or `key=`, optionally followed by
 * `@frontmatter`, `@inline` or `@all`.
 */
export function parseMetaCondition(spec: string): MetaCondition {
  let rest = spec;
  let kind: MetadataKind | undefined;

  const at = rest.lastIndexOf("@");
  if (at !== -1) {
    const suffix = rest.slice(at + 1);
    if (isMetadataKind(suffix)) {
      kind = suffix;
      rest = rest.slice(0, at);
    }
  }

  const eq = rest.indexOf("=");
  const key = (eq === -1 ? rest : rest.slice(0, eq)).trim();
  if (key === "") {
    throw new InvalidArgumentError(`Missing key in "${spec}".`);
  }

  const condition: MetaCondition = { key };
  if (eq !== -1) condition.values = splitValues(rest.slice(eq + 1));
  if (kind) condition.kind = kind;
  return condition;
}

export function collectMetaConditions(
  value: string,
  previous: MetaCondition[] = []
): MetaCondition[] {
  return [...previous, parseMetaCondition(value)];
}

export function parseKind(value: string): MetadataKind {
  if (!isMetadataKind(value)) {
    throw new InvalidArgumentError("Expected frontmatter, inline or all.");
  }
  return value;
}

export function parseStoreKind(value: string): StoreKind {
  if (!isStoreKind(value)) {
    throw new InvalidArgumentError("Expected frontmatter or inline.");
  }
  return value;
}

export function parseOrder(value: string): Order {
  if (!isOrder(value)) {
    throw new InvalidArgumentError("Expected asc or desc.");
  }
  return value;
}

export function parsePosition(value: string): InlinePosition {
  if (value !== "top" && value !== "bottom") {
    throw new InvalidArgumentError("Expected top or bottom.");
  }
  return value;
}

export function parseTemplate(value: string): InlineTemplate {
  if (value !== "standard" && value !== "callout") {
    throw new InvalidArgumentError("Expected standard or callout.");
  }
  return value;
}
