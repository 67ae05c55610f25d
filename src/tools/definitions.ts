import { z } from "zod";

const KindSchema = z.enum(["frontmatter", "inline", "all"]);
const StoreKindSchema = z.enum(["frontmatter", "inline"]);
const OrderSchema = z.enum(["asc", "desc"]);

export const MetaConditionSchema = z.object({
  key: z.string().describe("Metadata key the note must declare"),
  values: z
    .array(z.string())
    .optional()
    .describe("Values the key must hold (all of them); omit to only require the key"),
  kind: KindSchema.optional().describe("Where to look: frontmatter, inline or all (default)"),
});

export const SelectionSchema = z.object({
  paths: z
    .array(z.string())
    .optional()
    .describe("Files or directories, relative to the notes directory (defaults to all notes)"),
  recursive: z.boolean().optional().describe("Descend into subdirectories"),
  startsWith: z.string().optional().describe("Only notes whose file name starts with this"),
  endsWith: z.string().optional().describe("Only notes whose file name ends with this"),
  pattern: z.string().optional().describe("Only notes whose file name matches this regex"),
  hasMeta: z.array(MetaConditionSchema).optional().describe("Metadata the notes must have"),
});

export const ComposeOverridesSchema = z.object({
  position: z.enum(["top", "bottom"]).optional().describe("Where new inline fields go"),
  template: z.enum(["standard", "callout"]).optional().describe("How inline fields render"),
  inplace: z.boolean().optional().describe("Rewrite inline fields where they stand"),
  dryRun: z.boolean().optional().describe("Report the notes that would change, write nothing"),
});

const ChangeSchema = SelectionSchema.merge(ComposeOverridesSchema);

export const GetMetadataSchema = SelectionSchema.extend({
  keys: z.array(z.string()).optional().describe("Keys to return (defaults to every key)"),
  kind: KindSchema.optional().describe("Store to read (default: all)"),
});

export const AddMetadataSchema = ChangeSchema.extend({
  key: z.string().min(1).describe("Metadata key"),
  values: z.array(z.string()).optional().describe("Values to add"),
  kind: KindSchema.optional().describe(
    "Store to write; by default a key already present is extended where it is, otherwise it goes to the configured default kind"
  ),
  overwrite: z.boolean().optional().describe("Replace the existing values"),
});

export const RemoveMetadataSchema = ChangeSchema.extend({
  key: z.string().min(1).describe("Metadata key"),
  values: z
    .array(z.string())
    .optional()
    .describe("Values to remove; omit to delete the key itself"),
  kind: KindSchema.optional().describe("Store to edit (default: all)"),
});

export const MoveMetadataSchema = ChangeSchema.extend({
  keys: z.array(z.string()).optional().describe("Keys to move (defaults to every key)"),
  from: StoreKindSchema.describe("Source store"),
  to: StoreKindSchema.describe("Destination store"),
});

export const DedupeMetadataSchema = ChangeSchema.extend({
  keys: z.array(z.string()).optional().describe("Keys to deduplicate (defaults to every key)"),
  kind: KindSchema.optional().describe("Store to edit (default: all)"),
});

export const OrderMetadataSchema = ChangeSchema.extend({
  keys: z.array(z.string()).optional().describe("Keys whose values are sorted (default: all)"),
  keyOrder: OrderSchema.optional().describe("Sort the keys themselves"),
  valueOrder: OrderSchema.optional().describe("Sort the values of the selected keys"),
  kind: KindSchema.optional().describe("Store to edit (default: all)"),
});

export const RemoveEmptyMetadataSchema = ChangeSchema.extend({
  kind: KindSchema.optional().describe("Store to edit (default: all)"),
});

export const AppendTextSchema = ChangeSchema.extend({
  text: z.string().describe("Text appended to each note body"),
  allowRepeat: z.boolean().optional().describe("Append even when the text is already there"),
});

export const SubstituteSchema = ChangeSchema.extend({
  pattern: z.string().describe("Text (or regex) to replace in each note body"),
  replacement: z.string().describe("Replacement text"),
  regex: z.boolean().optional().describe("Treat the pattern as a regular expression"),
});

export const FormatNotesSchema = ChangeSchema;

export type MetaConditionInput = z.infer<typeof MetaConditionSchema>;
export type SelectionInput = z.infer<typeof SelectionSchema>;
export type ComposeOverridesInput = z.infer<typeof ComposeOverridesSchema>;
export type GetMetadataInput = z.infer<typeof GetMetadataSchema>;
export type AddMetadataInput = z.infer<typeof AddMetadataSchema>;
export type RemoveMetadataInput = z.infer<typeof RemoveMetadataSchema>;
export type MoveMetadataInput = z.infer<typeof MoveMetadataSchema>;
export type DedupeMetadataInput = z.infer<typeof DedupeMetadataSchema>;
export type OrderMetadataInput = z.infer<typeof OrderMetadataSchema>;
export type RemoveEmptyMetadataInput = z.infer<typeof RemoveEmptyMetadataSchema>;
export type AppendTextInput = z.infer<typeof AppendTextSchema>;
export type SubstituteInput = z.infer<typeof SubstituteSchema>;
export type FormatNotesInput = z.infer<typeof FormatNotesSchema>;
