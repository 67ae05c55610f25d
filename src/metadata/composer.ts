import { separatorsFor, splitOnSeparators } from "./fields.js";
import { renderFrontmatter } from "./frontmatter.js";
import {
  eraseInline,
  orphanedMarkers,
  renderField,
  renderInline,
  rewriteLines,
  scanBody,
  type FieldLine,
} from "./inline.js";
import { MetadataStore } from "./store.js";
import type { ComposeOptions, FieldSettingsMap, InlinePosition, RawSegments } from "./types.js";

export interface ComposeInput {
  frontmatter: MetadataStore;
  inline: MetadataStore;
  segments: Pick<RawSegments, "preamble" | "body">;
  options: ComposeOptions;
  fields?: FieldSettingsMap;
}

export interface ComposeResult {
  text: string;
  /** The rendered frontmatter block, "" when the store is empty. */
  frontmatter: string;
  body: string;
}

const LEADING_BLANK_LINES = /^(?:[ \t]*\r?\n)+/;
const TRAILING_BLANK_LINES = /(?:\r?\n[ \t]*)+$/;

/** Put a rendered inline block at the top or bottom of a body. */
export function insertBlock(body: string, block: string, position: InlinePosition): string {
  if (block === "") return body;
  if (position === "top") {
    const rest = body.replace(LEADING_BLANK_LINES, "");
    return rest.trim() === "" ? `${block}\n` : `${block}\n\n${rest}`;
  }
  const rest = body.replace(TRAILING_BLANK_LINES, "");
  return rest.trim() === "" ? `${block}\n` : `${rest}\n\n${block}\n`;
}

function sameValues(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}

/**
 * Rewrite the inline fields of a body where they stand. Lines of deleted keys go away,
 * a key whose values changed keeps only its first line, and keys the body did not
 * mention yet come back as a store of their own.
 */
export function rewriteInlineInPlace(
  body: string,
  inline: MetadataStore,
  fields: FieldSettingsMap = {}
): { body: string; added: MetadataStore } {
  const scan = scanBody(body);
  const byKey = new Map<string, FieldLine[]>();
  for (const field of scan.fields) {
    const group = byKey.get(field.key);
    if (group) group.push(field);
    else byKey.set(field.key, [field]);
  }

  const dropped = new Set<number>();
  const replaced = new Map<number, string>();
  for (const [key, group] of byKey) {
    const current = inline.get(key);
    if (current === undefined) {
      for (const field of group) dropped.add(field.index);
      continue;
    }

    const written = splitOnSeparators(
      group.flatMap((f) => f.values),
      separatorsFor(fields, key, "inline")
    );
    if (sameValues(written, current)) continue;

    const [first, ...rest] = group;
    replaced.set(
      first.index,
      renderField(key, current, first.prefix) + (first.carriageReturn ? "\r" : "")
    );
    for (const field of rest) dropped.add(field.index);
  }
  for (const marker of orphanedMarkers(scan, dropped)) dropped.add(marker);

  const added = new MetadataStore(inline.entries().filter(([key]) => !byKey.has(key)));
  return { body: rewriteLines(scan.lines, dropped, replaced), added };
}

/**
 * Rebuild note text from the stores. Untouched body text is kept as it is; the
 * frontmatter block is always rendered again from its store.
 */
export function composeNote(input: ComposeInput): ComposeResult {
  const { frontmatter, inline, segments, options, fields = {} } = input;

  let body: string;
  if (options.inlineInplace) {
    const rewritten = rewriteInlineInPlace(segments.body, inline, fields);
    body = insertBlock(
      rewritten.body,
      renderInline(rewritten.added, options.inlineTemplate),
      options.inlinePosition
    );
  } else {
    body = insertBlock(
      eraseInline(segments.body),
      renderInline(inline, options.inlineTemplate),
      options.inlinePosition
    );
  }

  const block = renderFrontmatter(frontmatter);
  return { text: segments.preamble + block + body, frontmatter: block, body };
}
