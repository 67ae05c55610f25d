import { relative, resolve } from "path";
import { composeOptions, getNotesDirectory, resolveDefaultKind, type Config } from "../config/index.js";
import { MetadataKind } from "../metadata/types.js";
import { NoteCollection } from "../notes/collection.js";
import type { Note } from "../notes/note.js";
import type { NoteFailure, WriteResult } from "../notes/types.js";
import { logger } from "../utils/logger.js";
import type {
  AddMetadataInput,
  AppendTextInput,
  ComposeOverridesInput,
  DedupeMetadataInput,
  FormatNotesInput,
  GetMetadataInput,
  MoveMetadataInput,
  OrderMetadataInput,
  RemoveEmptyMetadataInput,
  RemoveMetadataInput,
  SelectionInput,
  SubstituteInput,
} from "./definitions.js";

export interface NoteMetadataView {
  path: string;
  frontmatter: Record<string, string[]>;
  inline: Record<string, string[]>;
}

export interface ChangeReport {
  /** Notes whose recomposed text differs from the file. */
  changed: string[];
  /** Notes actually written (empty on a dry run). */
  written: string[];
  failures: NoteFailure[];
  dryRun: boolean;
}

/** Load the notes a selection names, paths taken relative to the notes directory. */
export function selectNotes(config: Config, selection: SelectionInput): NoteCollection {
  const root = getNotesDirectory(config);
  const paths = selection.paths?.length ? selection.paths.map((p) => resolve(root, p)) : [root];

  const collection = NoteCollection.load(paths, {
    recursive: selection.recursive ?? config.recursive,
    ignore: config.ignore,
    fields: config.fields,
  });
  logger.debug(`loaded ${collection.size} note(s) from ${paths.join(", ")}`);

  return collection.filter({
    startsWith: selection.startsWith,
    endsWith: selection.endsWith,
    pattern: selection.pattern,
    hasMeta: selection.hasMeta,
  });
}

function pick(record: Record<string, string[]>, keys?: string[]): Record<string, string[]> {
  if (!keys?.length) return record;
  return Object.fromEntries(Object.entries(record).filter(([key]) => keys.includes(key)));
}

export function getMetadata(
  config: Config,
  input: GetMetadataInput
): { notes: NoteMetadataView[]; failures: NoteFailure[] } {
  const collection = selectNotes(config, input);
  const kind = input.kind ?? MetadataKind.ALL;
  const notes = collection.notes.map((note) => ({
    path: note.path ?? "",
    frontmatter:
      kind === MetadataKind.INLINE ? {} : pick(note.metadata.frontmatter.store.toObject(), input.keys),
    inline:
      kind === MetadataKind.FRONTMATTER ? {} : pick(note.metadata.inline.store.toObject(), input.keys),
  }));
  return { notes, failures: collection.failures };
}

/**
 * Run an edit over the selected notes, recompose them and write the ones that changed.
 * Failures of single notes are collected and never stop the batch.
 */
export function applyChange(
  config: Config,
  input: SelectionInput & ComposeOverridesInput,
  edit: (note: Note) => void,
  { force = false }: { force?: boolean } = {}
): ChangeReport {
  const collection = selectNotes(config, input);
  collection.notes = collection.notes.filter((note) => {
    try {
      edit(note);
      return true;
    } catch (error) {
      const reason = error instanceof Error ? error : new Error(String(error));
      collection.failures.push({ path: note.path ?? "", error: reason });
      return false;
    }
  });

  const options = composeOptions(config, {
    inlinePosition: input.position,
    inlineTemplate: input.template,
    inlineInplace: input.inplace,
  });
  const changed = collection.updateContent(options, { force });
  const dryRun = input.dryRun ?? false;
  const result: WriteResult = dryRun ? { written: [], failures: [] } : collection.write();

  const failures = [...collection.failures, ...result.failures];
  for (const failure of failures) {
    logger.warn(`${failure.path}: ${failure.error.message}`);
  }
  return {
    changed: changed.map((note) => note.path ?? ""),
    written: result.written,
    failures,
    dryRun,
  };
}

export function addMetadata(config: Config, input: AddMetadataInput): ChangeReport {
  return applyChange(config, input, (note) => {
    const kind =
      input.kind ??
      (note.metadata.has(input.key) ? MetadataKind.ALL : resolveDefaultKind(config, input.key));
    note.metadata.add(input.key, input.values, kind, input.overwrite ?? false);
  });
}

export function removeMetadata(config: Config, input: RemoveMetadataInput): ChangeReport {
  return applyChange(config, input, (note) =>
    note.metadata.remove(input.key, input.values, input.kind)
  );
}

export function moveMetadata(config: Config, input: MoveMetadataInput): ChangeReport {
  return applyChange(config, input, (note) =>
    note.metadata.move(input.keys, input.from, input.to)
  );
}

export function dedupeMetadata(config: Config, input: DedupeMetadataInput): ChangeReport {
  return applyChange(config, input, (note) =>
    note.metadata.removeDuplicateValues(input.keys, input.kind)
  );
}

export function orderMetadata(config: Config, input: OrderMetadataInput): ChangeReport {
  return applyChange(config, input, (note) =>
    note.metadata.order(input.keys, input.keyOrder, input.valueOrder, input.kind)
  );
}

export function removeEmptyMetadata(config: Config, input: RemoveEmptyMetadataInput): ChangeReport {
  return applyChange(config, input, (note) => note.metadata.removeEmpty(input.kind));
}

export function appendText(config: Config, input: AppendTextInput): ChangeReport {
  return applyChange(config, input, (note) => note.append(input.text, input.allowRepeat ?? false));
}

export function substitute(config: Config, input: SubstituteInput): ChangeReport {
  return applyChange(config, input, (note) =>
    note.sub(input.pattern, input.replacement, input.regex ?? false)
  );
}

/** Recompose every selected note, clean or not, with the current composition settings. */
export function formatNotes(config: Config, input: FormatNotesInput): ChangeReport {
  return applyChange(config, input, () => {}, { force: true });
}

export function formatReport(config: Config, report: ChangeReport): string {
  const root = getNotesDirectory(config);
  const lines: string[] = [];
  const listed = report.dryRun ? report.changed : report.written;
  const verb = report.dryRun ? "Would update" : "Updated";

  lines.push(`${verb} ${listed.length} note(s)`);
  for (const path of listed) lines.push(`- ${relative(root, path)}`);
  if (report.failures.length > 0) {
    lines.push(`${report.failures.length} note(s) failed:`);
    for (const failure of report.failures) {
      lines.push(`- ${relative(root, failure.path)}: ${failure.error.message}`);
    }
  }
  return lines.join("\n");
}
