import matter from "gray-matter";
import { FAILSAFE_SCHEMA, load } from "js-yaml";
import { InvalidFrontmatterError } from "../errors.js";
import { applySeparators } from "./fields.js";
import { MetadataStore } from "./store.js";
import type { FieldSettingsMap } from "./types.js";

const DELIMITER = "---";
const BOM = "\uFEFF";

export interface FrontmatterSplit {
  preamble: string;
  /** Opening delimiter through closing delimiter line, or null when absent. */
  block: string | null;
  body: string;
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

/**
 * Split a note into preamble, frontmatter block and body. Only a `---` line at the very
 * start of the text opens a block; a later `---` line is body content.
 */
export function splitFrontmatter(text: string): FrontmatterSplit {
  const preamble = text.startsWith(BOM) ? BOM : "";
  const rest = text.slice(preamble.length);

  const firstBreak = rest.indexOf("\n");
  const firstLine = stripCarriageReturn(firstBreak === -1 ? rest : rest.slice(0, firstBreak));
  if (firstLine !== DELIMITER) {
    return { preamble, block: null, body: rest };
  }

  if (firstBreak !== -1) {
    let pos = firstBreak + 1;
    while (pos < rest.length) {
      const next = rest.indexOf("\n", pos);
      const line = stripCarriageReturn(next === -1 ? rest.slice(pos) : rest.slice(pos, next));
      const end = next === -1 ? rest.length : next + 1;
      if (line === DELIMITER) {
        return { preamble, block: rest.slice(0, end), body: rest.slice(end) };
      }
      pos = end;
    }
  }

  throw new InvalidFrontmatterError("opening delimiter has no closing delimiter", rest);
}

function scalarToString(key: string, value: unknown, block: string): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  throw new InvalidFrontmatterError(`value of "${key}" is not a scalar or a flat list`, block);
}

function toValues(key: string, value: unknown, block: string): string[] {
  if (value === null || value === undefined) return [];
  if (Array.isArray(value)) return value.map((item: unknown) => scalarToString(key, item, block));
  return [scalarToString(key, value, block)];
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Every scalar stays the string it was written as: no numbers, booleans or dates.
function loadYaml(source: string): object {
  const data: unknown = load(source, { schema: FAILSAFE_SCHEMA });
  if (data === null || data === undefined) return {};
  if (!isMapping(data)) throw new Error("top level is not a mapping");
  return data;
}

/** Parse the YAML inside a block into a store. The block must be a flat mapping. */
export function parseFrontmatterBlock(block: string, fields: FieldSettingsMap = {}): MetadataStore {
  let data: unknown;
  try {
    data = matter(block, { language: "yaml", engines: { yaml: loadYaml } }).data;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidFrontmatterError(message, block, { cause: error });
  }

  const store = new MetadataStore();
  if (!isMapping(data)) {
    throw new InvalidFrontmatterError("top level is not a mapping", block);
  }

  for (const [key, value] of Object.entries(data)) {
    store.add(key, toValues(key, value, block));
  }
  applySeparators(store, fields, "frontmatter");
  return store;
}

const YAML_INDICATORS = new Set([..."?:,[]{}#&*!|>'\"%@`"]);
const PLAIN_KEY = /^[A-Za-z0-9_]([\w .\-/]*[\w.\-/])?$/;
const NUMBER_LIKE = /^[-+]?(\.?\d|\.inf|\.nan)/i;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const RESERVED_WORDS = /^(null|~|true|false)$/i;
// Tabs and line breaks: YAML reads a tab like a space around ':', '#' and '-'.
const CONTROL_CHARS = /[\u0000-\u001f]/;

/** Render a value so that YAML reads it back as the same string. */
export function formatScalar(value: string): string {
  const plain =
    value !== "" &&
    value === value.trim() &&
    !YAML_INDICATORS.has(value.charAt(0)) &&
    value !== "-" &&
    !value.startsWith("- ") &&
    !value.includes(": ") &&
    !value.includes(" #") &&
    !value.endsWith(":") &&
    !CONTROL_CHARS.test(value) &&
    !(RESERVED_WORDS.test(value) && value !== "true" && value !== "false") &&
    !(NUMBER_LIKE.test(value) && !DATE_ONLY.test(value) && String(Number(value)) !== value);
  return plain ? value : JSON.stringify(value);
}

function formatKey(key: string): string {
  return PLAIN_KEY.test(key) ? key : JSON.stringify(key);
}

/**
 * Render a store as a frontmatter block. One value is written inline, several as a
 * block list, none as a bare `key:`. An empty store renders as the empty string.
 */
export function renderFrontmatter(store: MetadataStore): string {
  if (store.size === 0) return "";

  const lines = [DELIMITER];
  for (const [key, values] of store.entries()) {
    const name = formatKey(key);
    if (values.length === 0) {
      lines.push(`${name}:`);
    } else if (values.length === 1) {
      lines.push(`${name}: ${formatScalar(values[0])}`);
    } else {
      lines.push(`${name}:`);
      for (const value of values) {
        lines.push(`  - ${formatScalar(value)}`);
      }
    }
  }
  lines.push(DELIMITER);
  return lines.join("\n") + "\n";
}

export class Frontmatter {
  readonly kind = "frontmatter" as const;

  constructor(
    readonly store: MetadataStore = new MetadataStore(),
    private readonly present = false
  ) {}

  /** Parse the frontmatter of a whole note. Throws InvalidFrontmatterError. */
  static parse(text: string, fields: FieldSettingsMap = {}): Frontmatter {
    const { block } = splitFrontmatter(text);
    if (block === null) return new Frontmatter();
    return new Frontmatter(parseFrontmatterBlock(block, fields), true);
  }

  /** Whether the parsed text carried a valid frontmatter block. */
  exists(): boolean {
    return this.present;
  }

  toString(): string {
    return renderFrontmatter(this.store);
  }
}
