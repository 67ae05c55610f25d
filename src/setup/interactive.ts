import prompts from "prompts";
import chalk from "chalk";
import { existsSync } from "fs";
import { join } from "path";
import {
  CONFIG_FILENAME,
  DEFAULT_CONFIG,
  expandPath,
  parseConfig,
  saveConfig,
  type Config,
} from "../config/index.js";

function splitList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.map((item) => String(item).trim()).filter((item) => item !== "");
}

export async function runInteractiveSetup(
  options: { force?: boolean; configPath?: string } = {}
): Promise<Config | null> {
  const configPath = options.configPath
    ? expandPath(options.configPath)
    : join(process.cwd(), CONFIG_FILENAME);
  console.log(chalk.bold("\nnotemeta setup\n"));

  if (existsSync(configPath) && !options.force) {
    const { overwrite } = await prompts({
      type: "confirm",
      name: "overwrite",
      message: `Config already exists at ${configPath}. Overwrite?`,
      initial: false,
    });

    if (!overwrite) {
      console.log(chalk.yellow("Setup cancelled."));
      return null;
    }
  }

  const responses = await prompts(
    [
      {
        type: "text",
        name: "notesDirectory",
        message: "Where are the notes?",
        initial: DEFAULT_CONFIG.notesDirectory,
        validate: (value: string) => (value.trim() ? true : "Directory path is required"),
      },
      {
        type: "confirm",
        name: "recursive",
        message: "Include notes in subdirectories?",
        initial: DEFAULT_CONFIG.recursive,
      },
      {
        type: "list",
        name: "ignore",
        message: "Directories to skip (comma-separated):",
        initial: DEFAULT_CONFIG.ignore.join(", "),
        separator: ",",
      },
      {
        type: "select",
        name: "defaultKind",
        message: "Where should new keys go?",
        choices: [
          { title: "Frontmatter", value: "frontmatter" },
          { title: "Inline (key :: value)", value: "inline" },
        ],
        initial: DEFAULT_CONFIG.defaultKind === "inline" ? 1 : 0,
      },
      {
        type: "select",
        name: "inlinePosition",
        message: "Where should new inline fields be placed?",
        choices: [
          { title: "Bottom of the note", value: "bottom" },
          { title: "Top of the body", value: "top" },
        ],
        initial: DEFAULT_CONFIG.compose.inlinePosition === "top" ? 1 : 0,
      },
      {
        type: "select",
        name: "inlineTemplate",
        message: "How should inline fields be rendered?",
        choices: [
          { title: "Plain lines", value: "standard" },
          { title: "Collapsed callout", value: "callout" },
        ],
        initial: DEFAULT_CONFIG.compose.inlineTemplate === "callout" ? 1 : 0,
      },
      {
        type: "confirm",
        name: "inlineInplace",
        message: "Rewrite existing inline fields where they stand?",
        initial: DEFAULT_CONFIG.compose.inlineInplace,
      },
    ],
    {
      onCancel: () => {
        console.log(chalk.yellow("\nSetup cancelled."));
        process.exit(0);
      },
    }
  );

  const config = parseConfig({
    notesDirectory: responses.notesDirectory,
    recursive: responses.recursive,
    ignore: splitList(responses.ignore),
    defaultKind: responses.defaultKind,
    compose: {
      inlinePosition: responses.inlinePosition,
      inlineTemplate: responses.inlineTemplate,
      inlineInplace: responses.inlineInplace,
    },
    fields: {},
  });

  saveConfig(config, configPath);
  console.log(chalk.green(`✓ Created ${configPath}`));

  console.log(chalk.bold.green("\nSetup complete!\n"));
  console.log("Next steps:");
  console.log(chalk.dim("  1. Look at your metadata:  ") + "notemeta show");
  console.log(chalk.dim("  2. Configure your MCP client to use:"));
  console.log(chalk.dim("     ") + "notemeta serve\n");

  return config;
}
