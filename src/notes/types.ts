import type { FieldSettingsMap, MetadataKind } from "../metadata/types.js";

export type NoteState = "unparsed" | "parsed" | "dirty" | "recomposed" | "persisted";

export interface NoteOptions {
  path?: string;
  fields?: FieldSettingsMap;
}

export interface UpdateContentOptions {
  /** Recompose even when nothing changed since the last composition. */
  force?: boolean;
}

export interface LoadOptions {
  recursive?: boolean;
  /** Directory names skipped while scanning. */
  ignore?: string[];
  fields?: FieldSettingsMap;
}

export interface NoteFailure {
  path: string;
  error: Error;
}

export interface MetaCondition {
  key: string;
  values?: string[];
  kind?: MetadataKind;
}

export interface NoteFilter {
  startsWith?: string;
  endsWith?: string;
  /** Regular expression tested against the file name. */
  pattern?: string;
  /** Every condition must hold. */
  hasMeta?: MetaCondition[];
}

export interface WriteResult {
  written: string[];
  failures: NoteFailure[];
}
