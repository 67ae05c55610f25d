import { readdirSync, statSync } from "fs";
import { basename, extname, join } from "path";
import { NoteCreationError } from "../errors.js";
import { compareOrdinal } from "../metadata/store.js";
import type {
  ComposeOptions,
  KeySelector,
  MetadataKind,
  Order,
  StoreKind,
  ValuesInput,
} from "../metadata/types.js";
import { readNote, writeNote } from "./io.js";
import type { Note } from "./note.js";
import type {
  LoadOptions,
  NoteFailure,
  NoteFilter,
  UpdateContentOptions,
  WriteResult,
} from "./types.js";

const DEFAULT_IGNORE = [".obsidian", ".git", ".trash"];

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/** Batch fan-out of metadata operations over every note of a collection. */
export class BatchMetadata {
  constructor(private readonly collection: NoteCollection) {}

  private each(fn: (note: Note) => void): void {
    for (const note of this.collection.notes) fn(note);
  }

  add(key: string, values?: ValuesInput, kind?: MetadataKind, overwrite = false): void {
    this.each((note) => note.metadata.add(key, values, kind, overwrite));
  }

  remove(key: string, values?: ValuesInput, kind?: MetadataKind): void {
    this.each((note) => note.metadata.remove(key, values, kind));
  }

  move(keys: KeySelector, from: StoreKind, to: StoreKind): void {
    this.each((note) => note.metadata.move(keys, from, to));
  }

  removeDuplicateValues(keys?: KeySelector, kind?: MetadataKind): void {
    this.each((note) => note.metadata.removeDuplicateValues(keys, kind));
  }

  orderValues(keys: KeySelector, order: Order, kind?: MetadataKind): void {
    this.each((note) => note.metadata.orderValues(keys, order, kind));
  }

  orderKeys(order: Order, kind?: MetadataKind): void {
    this.each((note) => note.metadata.orderKeys(order, kind));
  }

  order(keys: KeySelector, keyOrder?: Order, valueOrder?: Order, kind?: MetadataKind): void {
    this.each((note) => note.metadata.order(keys, keyOrder, valueOrder, kind));
  }

  removeEmpty(kind?: MetadataKind): void {
    this.each((note) => note.metadata.removeEmpty(kind));
  }
}

/**
 * The notes found under a set of files and directories. A note that cannot be read
 * or parsed is recorded in `failures` and the rest of the batch carries on.
 */
export class NoteCollection {
  notes: Note[] = [];
  failures: NoteFailure[] = [];
  readonly metadata = new BatchMetadata(this);

  static load(paths: string | string[], options: LoadOptions = {}): NoteCollection {
    const collection = new NoteCollection();
    collection.add(paths, options);
    return collection;
  }

  get size(): number {
    return this.notes.length;
  }

  add(paths: string | string[], options: LoadOptions = {}): this {
    const files: string[] = [];
    for (const path of typeof paths === "string" ? [paths] : paths) {
      try {
        this.collectMarkdownFiles(path, options, files);
      } catch (error) {
        this.failures.push({ path, error: new NoteCreationError(path, error) });
      }
    }

    for (const file of files.sort(compareOrdinal)) {
      try {
        this.notes.push(readNote(file, { fields: options.fields }));
      } catch (error) {
        this.failures.push({ path: file, error: toError(error) });
      }
    }
    return this;
  }

  private collectMarkdownFiles(path: string, options: LoadOptions, files: string[]): void {
    if (!statSync(path).isDirectory()) {
      if (extname(path) === ".md") files.push(path);
      return;
    }

    const ignore = options.ignore ?? DEFAULT_IGNORE;
    for (const entry of readdirSync(path, { withFileTypes: true })) {
      const fullPath = join(path, entry.name);
      if (entry.isDirectory()) {
        if (options.recursive === false || ignore.includes(entry.name)) continue;
        this.collectMarkdownFiles(fullPath, options, files);
      } else if (extname(entry.name) === ".md") {
        files.push(fullPath);
      }
    }
  }

  /** Keep only the notes matching every given predicate. */
  filter(filter: NoteFilter): this {
    const pattern = filter.pattern !== undefined ? new RegExp(filter.pattern) : undefined;
    this.notes = this.notes.filter((note) => {
      const name = basename(note.path ?? "");
      if (filter.startsWith !== undefined && !name.startsWith(filter.startsWith)) return false;
      if (filter.endsWith !== undefined && !name.endsWith(filter.endsWith)) return false;
      if (pattern && !pattern.test(name)) return false;
      return (filter.hasMeta ?? []).every((condition) =>
        note.metadata.has(condition.key, condition.values, condition.kind)
      );
    });
    return this;
  }

  append(text: string, allowRepeat = false): void {
    for (const note of this.notes) note.append(text, allowRepeat);
  }

  sub(pattern: string, replacement: string, isRegex = false): void {
    for (const note of this.notes) note.sub(pattern, replacement, isRegex);
  }

  /** Recompose every note; returns the notes whose text now differs from disk. */
  updateContent(options: Partial<ComposeOptions> = {}, update: UpdateContentOptions = {}): Note[] {
    const changed: Note[] = [];
    for (const note of this.notes) {
      try {
        note.updateContent(options, update);
      } catch (error) {
        this.failures.push({ path: note.path ?? "<memory>", error: toError(error) });
        continue;
      }
      if (note.content !== note.original) changed.push(note);
    }
    return changed;
  }

  /** Write every clean note whose text changed. */
  write(): WriteResult {
    const result: WriteResult = { written: [], failures: [] };
    for (const note of this.notes) {
      if (note.isDirty() || note.content === note.original) continue;
      const path = note.path ?? "<memory>";
      try {
        writeNote(note);
        result.written.push(path);
      } catch (error) {
        result.failures.push({ path, error: toError(error) });
      }
    }
    return result;
  }
}
