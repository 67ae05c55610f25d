import { applySeparators } from "./fields.js";
import { MetadataStore } from "./store.js";
import type { FieldSettingsMap, InlineTemplate } from "./types.js";

export const CALLOUT_MARKER = "> [!info]- metadata";

// The key may not contain ':' so the first "::" on the line always ends it.
const FIELD_LINE =
  /^(?<prefix>[ \t]*(?:>[ \t]*)*(?:[-*+][ \t]+)?)(?<key>[\p{L}\p{N}][\p{L}\p{N}_ -]*?)[ \t]*::(?<values>.*)$/u;
const FIELD_KEY = /^[\p{L}\p{N}](?:[\p{L}\p{N}_ -]*[\p{L}\p{N}_-])?$/u;
const MARKER_LINE = /^[ \t]*>[ \t]*\[!info\]-[ \t]*metadata[ \t]*$/;
const QUOTED_LINE = /^[ \t]*>/;
const FENCE_LINE = /^[ \t]*(```|~~~)/;

export interface FieldLine {
  index: number;
  /** Quote and list markers in front of the key, kept when the line is rewritten. */
  prefix: string;
  key: string;
  values: string[];
  carriageReturn: boolean;
}

export interface BodyScan {
  lines: string[];
  fields: FieldLine[];
  markers: number[];
}

/** Whether a key written as an inline field is read back as the same key. */
export function isInlineKey(key: string): boolean {
  return FIELD_KEY.test(key);
}

export function splitValues(raw: string): string[] {
  return raw
    .split(",")
    .map((v) => v.trim())
    .filter((v) => v !== "");
}

/** Classify body lines into inline fields, callout markers and everything else. */
export function scanBody(body: string): BodyScan {
  const lines = body.split("\n");
  const fields: FieldLine[] = [];
  const markers: number[] = [];
  let fence: string | null = null;

  lines.forEach((raw, index) => {
    const carriageReturn = raw.endsWith("\r");
    const line = carriageReturn ? raw.slice(0, -1) : raw;

    const fenceMatch = FENCE_LINE.exec(line);
    if (fenceMatch) {
      const token = fenceMatch[1];
      if (fence === null) fence = token;
      else if (fence === token) fence = null;
      return;
    }
    if (fence !== null) return;

    if (MARKER_LINE.test(line)) {
      markers.push(index);
      return;
    }

    const match = FIELD_LINE.exec(line);
    if (!match?.groups) return;
    fields.push({
      index,
      prefix: match.groups.prefix ?? "",
      key: (match.groups.key ?? "").trim(),
      values: splitValues(match.groups.values ?? ""),
      carriageReturn,
    });
  });

  return { lines, fields, markers };
}

/**
 * Callout markers whose quoted block no longer holds any line once `dropped` is
 * removed. A marker with an empty block is always orphaned.
 */
export function orphanedMarkers(scan: BodyScan, dropped: ReadonlySet<number>): number[] {
  return scan.markers.filter((marker) => {
    for (let i = marker + 1; i < scan.lines.length; i++) {
      if (!QUOTED_LINE.test(scan.lines[i])) break;
      if (!dropped.has(i)) return false;
    }
    return true;
  });
}

function isBlank(line: string): boolean {
  return line.trim() === "";
}

/**
 * Rebuild text from lines, dropping and replacing some of them. A run of blank lines
 * that a dropped line touched is collapsed to a single blank line, or removed entirely
 * when it would open the text.
 */
export function rewriteLines(
  lines: string[],
  dropped: ReadonlySet<number>,
  replaced: ReadonlyMap<number, string> = new Map()
): string {
  const kept: string[] = [];
  const gaps = new Set<number>();
  lines.forEach((line, i) => {
    if (dropped.has(i)) {
      gaps.add(kept.length);
      return;
    }
    kept.push(replaced.get(i) ?? line);
  });
  if (gaps.size === 0) return kept.join("\n");

  const out: string[] = [];
  let i = 0;
  while (i < kept.length) {
    if (!isBlank(kept[i])) {
      out.push(kept[i]);
      i++;
      continue;
    }
    let j = i;
    while (j < kept.length && isBlank(kept[j])) j++;

    let touched = false;
    for (let p = i; p <= j; p++) {
      if (gaps.has(p)) touched = true;
    }
    if (!touched) {
      out.push(...kept.slice(i, j));
    } else if (!(i === 0 && gaps.has(0))) {
      out.push(kept[i]);
    }
    i = j;
  }
  return out.join("\n");
}

function renderValues(values: string[]): string {
  return values.length > 0 ? ` ${values.join(", ")}` : "";
}

export function renderField(key: string, values: string[], prefix = ""): string {
  return `${prefix}${key} ::${renderValues(values)}`;
}

/** Render a store as inline fields, one line per key. An empty store renders as "". */
export function renderInline(store: MetadataStore, template: InlineTemplate = "standard"): string {
  if (store.size === 0) return "";
  const entries = store.entries();
  if (template === "callout") {
    return [CALLOUT_MARKER, ...entries.map(([k, v]) => renderField(k, v, "> "))].join("\n");
  }
  return entries.map(([k, v]) => renderField(k, v)).join("\n");
}

/** Remove every inline field line (and the callout markers left empty) from a body. */
export function eraseInline(body: string): string {
  const scan = scanBody(body);
  const dropped = new Set(scan.fields.map((f) => f.index));
  for (const marker of orphanedMarkers(scan, dropped)) dropped.add(marker);
  return rewriteLines(scan.lines, dropped);
}

export class InlineMetadata {
  readonly kind = "inline" as const;

  constructor(
    readonly store: MetadataStore = new MetadataStore(),
    private readonly present = false
  ) {}

  /**
   * Collect `key :: value, value` lines of a note body. Keys keep the order in which
   * they are first seen; repeated keys accumulate their values.
   */
  static parse(body: string, fields: FieldSettingsMap = {}): InlineMetadata {
    const store = new MetadataStore();
    const scan = scanBody(body);
    for (const field of scan.fields) {
      store.add(field.key, field.values);
    }
    applySeparators(store, fields, "inline");
    return new InlineMetadata(store, scan.fields.length > 0);
  }

  static erase(body: string): string {
    return eraseInline(body);
  }

  /** Whether at least one inline field was found when parsing. */
  exists(): boolean {
    return this.present;
  }

  toString(template: InlineTemplate = "standard"): string {
    return renderInline(this.store, template);
  }
}
