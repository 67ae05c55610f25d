import { z } from "zod";

export const StoreKindSchema = z.enum(["frontmatter", "inline"]);

export const ComposeConfigSchema = z.object({
  inlinePosition: z.enum(["top", "bottom"]).default("bottom"),
  inlineTemplate: z.enum(["standard", "callout"]).default("standard"),
  inlineInplace: z.boolean().default(true),
});

export const FieldConfigSchema = z.object({
  defaultKind: StoreKindSchema.optional(),
  frontmatterSeparators: z.array(z.string().min(1)).optional(),
  inlineSeparators: z.array(z.string().min(1)).optional(),
});

export const ConfigSchema = z.object({
  notesDirectory: z.string().default("."),
  recursive: z.boolean().default(true),
  ignore: z.array(z.string()).default([".obsidian", ".git", ".trash"]),
  defaultKind: StoreKindSchema.default("frontmatter"),
  compose: ComposeConfigSchema.default({}),
  fields: z.record(z.string(), FieldConfigSchema).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ComposeConfig = z.infer<typeof ComposeConfigSchema>;
export type FieldConfig = z.infer<typeof FieldConfigSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
