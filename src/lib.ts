export * from "./errors.js";
export * from "./metadata/types.js";
export { MetadataStore, compareOrdinal } from "./metadata/store.js";
export { Frontmatter, splitFrontmatter, renderFrontmatter } from "./metadata/frontmatter.js";
export { InlineMetadata, CALLOUT_MARKER, renderInline } from "./metadata/inline.js";
export { composeNote, type ComposeInput, type ComposeResult } from "./metadata/composer.js";
export { NoteMetadata, type MetadataModel } from "./metadata/noteMetadata.js";
export { Note } from "./notes/note.js";
export { NoteCollection, BatchMetadata } from "./notes/collection.js";
export { readNote, writeNote } from "./notes/io.js";
export type {
  NoteState,
  NoteOptions,
  UpdateContentOptions,
  LoadOptions,
  NoteFailure,
  MetaCondition,
  NoteFilter,
  WriteResult,
} from "./notes/types.js";
export { loadConfig, saveConfig, parseConfig, type Config } from "./config/index.js";
