import { InvalidFrontmatterError, NoteStateError, UpdateContentError } from "../errors.js";
import { composeNote } from "../metadata/composer.js";
import {
  Frontmatter,
  parseFrontmatterBlock,
  splitFrontmatter,
  type FrontmatterSplit,
} from "../metadata/frontmatter.js";
import { InlineMetadata } from "../metadata/inline.js";
import { NoteMetadata } from "../metadata/noteMetadata.js";
import {
  DEFAULT_COMPOSE_OPTIONS,
  type ComposeOptions,
  type FieldSettingsMap,
  type RawSegments,
} from "../metadata/types.js";
import type { NoteOptions, NoteState, UpdateContentOptions } from "./types.js";

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * A markdown note and its metadata.
 *
 * Lifecycle: `unparsed` → `parse()` → `parsed`; any metadata or body edit → `dirty`;
 * `updateContent()` → `recomposed`; a successful write → `persisted`. Editing again
 * returns the note to `dirty`.
 */
export class Note {
  readonly path: string | undefined;
  /** The text the note was created from. */
  readonly original: string;

  private readonly fields: FieldSettingsMap;
  private text: string;
  private noteState: NoteState = "unparsed";
  private parsed: NoteMetadata | null = null;
  private rawSegments: RawSegments;

  constructor(raw: string, options: NoteOptions = {}) {
    this.path = options.path;
    this.fields = options.fields ?? {};
    this.original = raw;
    this.text = raw;
    this.rawSegments = { preamble: "", frontmatter: null, malformedFrontmatter: null, body: raw };
  }

  /** Create and parse a note in one step. */
  static parse(raw: string, options: NoteOptions = {}): Note {
    return new Note(raw, options).parse();
  }

  get state(): NoteState {
    return this.noteState;
  }

  /** The latest composed text (the original text until the first recomposition). */
  get content(): string {
    return this.text;
  }

  get segments(): RawSegments {
    return { ...this.rawSegments };
  }

  get metadata(): NoteMetadata {
    if (this.parsed === null) {
      throw new NoteStateError(`Note ${this.describe()} has not been parsed`);
    }
    return this.parsed;
  }

  isDirty(): boolean {
    return this.noteState === "dirty";
  }

  /**
   * Parse both metadata forms. A malformed frontmatter block is kept in the segments,
   * the frontmatter store is left empty and the InvalidFrontmatterError is rethrown.
   * Such a note can be read but not recomposed or written.
   */
  parse(): this {
    if (this.noteState !== "unparsed") return this;

    let split: FrontmatterSplit;
    try {
      split = splitFrontmatter(this.text);
    } catch (error) {
      if (error instanceof InvalidFrontmatterError) {
        const preamble = this.text.slice(0, this.text.length - error.block.length);
        this.keepMalformed(preamble, error.block, "");
      }
      throw error;
    }

    let frontmatter = new Frontmatter();
    if (split.block !== null) {
      try {
        frontmatter = new Frontmatter(parseFrontmatterBlock(split.block, this.fields), true);
      } catch (error) {
        if (error instanceof InvalidFrontmatterError) {
          this.keepMalformed(split.preamble, split.block, split.body);
        }
        throw error;
      }
    }

    this.rawSegments = {
      preamble: split.preamble,
      frontmatter: split.block,
      malformedFrontmatter: null,
      body: split.body,
    };
    this.attach(frontmatter, split.body);
    return this;
  }

  private keepMalformed(preamble: string, block: string, body: string): void {
    this.rawSegments = { preamble, frontmatter: null, malformedFrontmatter: block, body };
    this.attach(new Frontmatter(), body);
  }

  private attach(frontmatter: Frontmatter, body: string): void {
    this.parsed = new NoteMetadata(
      frontmatter,
      InlineMetadata.parse(body, this.fields),
      () => this.touch()
    );
    this.noteState = "parsed";
  }

  /** Append text to the body unless it is already there (or repeats are allowed). */
  append(text: string, allowRepeat = false): void {
    this.assertParsed();
    if (!allowRepeat && this.rawSegments.body.includes(text)) return;
    this.rawSegments.body += `\n${text}`;
    this.touch();
  }

  /** Replace every match of `pattern` in the body. */
  sub(pattern: string, replacement: string, isRegex = false): void {
    this.assertParsed();
    const regex = new RegExp(isRegex ? pattern : escapeRegExp(pattern), "g");
    const literal = isRegex ? replacement : replacement.replace(/\$/g, "$$$$");
    this.rawSegments.body = this.rawSegments.body.replace(regex, literal);
    this.touch();
  }

  /**
   * Recompose the note text from the current stores. On a clean note this returns the
   * cached text unless `force` is set.
   */
  updateContent(
    options: Partial<ComposeOptions> = {},
    { force = false }: UpdateContentOptions = {}
  ): string {
    const metadata = this.metadata;
    this.assertWellFormed();
    if (!this.isDirty() && !force) return this.text;

    try {
      const result = composeNote({
        frontmatter: metadata.frontmatter.store,
        inline: metadata.inline.store,
        segments: this.rawSegments,
        options: { ...DEFAULT_COMPOSE_OPTIONS, ...options },
        fields: this.fields,
      });
      this.text = result.text;
      this.rawSegments = {
        preamble: this.rawSegments.preamble,
        frontmatter: result.frontmatter === "" ? null : result.frontmatter,
        malformedFrontmatter: null,
        body: result.body,
      };
    } catch (error) {
      throw new UpdateContentError(this.describe(), error);
    }
    this.noteState = "recomposed";
    return this.text;
  }

  /** Record that the cached text has been written. Dirty notes must be recomposed first. */
  markPersisted(): void {
    this.assertWritable();
    this.noteState = "persisted";
  }

  assertWritable(): void {
    this.assertParsed();
    this.assertWellFormed();
    if (this.isDirty()) {
      throw new NoteStateError(
        `Note ${this.describe()} has pending changes; update its content first`
      );
    }
  }

  private assertParsed(): void {
    if (this.noteState === "unparsed") {
      throw new NoteStateError(`Note ${this.describe()} has not been parsed`);
    }
  }

  private assertWellFormed(): void {
    if (this.rawSegments.malformedFrontmatter !== null) {
      throw new NoteStateError(
        `Note ${this.describe()} has malformed frontmatter and cannot be recomposed`
      );
    }
  }

  private touch(): void {
    this.noteState = "dirty";
  }

  private describe(): string {
    return this.path ?? "<memory>";
  }
}
