export class NoteMetaError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "NoteMetaError";
    this.code = code;
  }
}

/** A frontmatter-shaped block at the top of a note is structurally broken. */
export class InvalidFrontmatterError extends NoteMetaError {
  /** The malformed block as it appeared in the note. */
  public readonly block: string;

  constructor(message: string, block: string, options?: ErrorOptions) {
    super(`Invalid frontmatter: ${message}`, "INVALID_FRONTMATTER", options);
    this.name = "InvalidFrontmatterError";
    this.block = block;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class NoteCreationError extends NoteMetaError {
  public readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Could not read note "${path}": ${describeCause(cause)}`, "NOTE_CREATION", { cause });
    this.name = "NoteCreationError";
    this.path = path;
  }
}

export class ParsingNoteMetadataError extends NoteMetaError {
  public readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Could not parse metadata of "${path}": ${describeCause(cause)}`, "PARSE_METADATA", {
      cause,
    });
    this.name = "ParsingNoteMetadataError";
    this.path = path;
  }
}

export class UpdateContentError extends NoteMetaError {
  public readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Could not update content of "${path}": ${describeCause(cause)}`, "UPDATE_CONTENT", {
      cause,
    });
    this.name = "UpdateContentError";
    this.path = path;
  }
}

export class NoteStateError extends NoteMetaError {
  constructor(message: string) {
    super(message, "NOTE_STATE");
    this.name = "NoteStateError";
  }
}

export class ConfigError extends NoteMetaError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG_ERROR", options);
    this.name = "ConfigError";
  }
}
