import { readFileSync, writeFileSync } from "fs";
import { NoteCreationError, NoteStateError, ParsingNoteMetadataError } from "../errors.js";
import { Note } from "./note.js";
import type { NoteOptions } from "./types.js";

/** Read and parse a note from disk. */
export function readNote(path: string, options: Omit<NoteOptions, "path"> = {}): Note {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (error) {
    throw new NoteCreationError(path, error);
  }

  const note = new Note(raw, { ...options, path });
  try {
    note.parse();
  } catch (error) {
    throw new ParsingNoteMetadataError(path, error);
  }
  return note;
}

/** Write the note's composed text, to its own path unless another is given. */
export function writeNote(note: Note, path: string | undefined = note.path): void {
  if (path === undefined) {
    throw new NoteStateError("Note has no path to write to");
  }
  note.assertWritable();
  writeFileSync(path, note.content, "utf-8");
  note.markPersisted();
}
