#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import { fileURLToPath } from "url";
import { dirname, join, relative, resolve } from "path";
import { readFileSync } from "fs";
import {
  configExists,
  getConfigPath,
  getNotesDirectory,
  loadConfig,
  type Config,
} from "./config/index.js";
import { NoteMetaServer } from "./index.js";
import type {
  InlinePosition,
  InlineTemplate,
  MetadataKind,
  Order,
  StoreKind,
} from "./metadata/types.js";
import type { MetaCondition } from "./notes/types.js";
import { runInteractiveSetup } from "./setup/interactive.js";
import type { ComposeOverridesInput, SelectionInput } from "./tools/definitions.js";
import {
  addMetadata,
  appendText,
  dedupeMetadata,
  formatNotes,
  getMetadata,
  moveMetadata,
  orderMetadata,
  removeEmptyMetadata,
  removeMetadata,
  substitute,
  type ChangeReport,
} from "./tools/handlers.js";
import { logger, setVerbose } from "./utils/logger.js";
import {
  collectMetaConditions,
  parseKind,
  parseOrder,
  parsePosition,
  parseStoreKind,
  parseTemplate,
} from "./utils/options.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read version from package.json (two levels up from dist/src)
const packageJson: unknown = JSON.parse(
  readFileSync(join(__dirname, "..", "..", "package.json"), "utf-8")
);
const version =
  typeof packageJson === "object" &&
  packageJson !== null &&
  "version" in packageJson &&
  typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";

interface GlobalOptions {
  config?: string;
  verbose?: boolean;
}

interface SelectionOptions {
  path?: string[];
  recursive?: boolean;
  startsWith?: string;
  endsWith?: string;
  pattern?: string;
  has?: MetaCondition[];
}

interface ChangeOptions extends SelectionOptions {
  position?: InlinePosition;
  template?: InlineTemplate;
  inplace?: boolean;
  dryRun?: boolean;
}

const program = new Command();

program
  .name("notemeta")
  .description("Edit frontmatter and inline metadata across markdown notes")
  .version(version)
  .option("--config <path>", "Config file to use")
  .option("--verbose", "Print debug output")
  .hook("preAction", () => {
    if (program.opts<GlobalOptions>().verbose) setVerbose(true);
  });

function currentConfig(): Config {
  return loadConfig(program.opts<GlobalOptions>().config);
}

function withSelection(command: Command): Command {
  return command
    .option("-p, --path <paths...>", "Files or directories (default: the notes directory)")
    .option("--recursive", "Descend into subdirectories")
    .option("--no-recursive", "Only look at the given directories themselves")
    .option("--starts-with <prefix>", "Only notes whose file name starts with this")
    .option("--ends-with <suffix>", "Only notes whose file name ends with this")
    .option("--pattern <regex>", "Only notes whose file name matches this regex")
    .option(
      "--has <spec...>",
      "Only notes with this metadata: key, key=v1,v2 or key=, optionally @frontmatter or @inline",
      collectMetaConditions
    );
}

function withChange(command: Command): Command {
  return withSelection(command)
    .option("--position <position>", "Where new inline fields go: top or bottom", parsePosition)
    .option("--template <template>", "Inline rendering: standard or callout", parseTemplate)
    .option("--inplace", "Rewrite inline fields where they stand")
    .option("--no-inplace", "Gather all inline fields into one block")
    .option("--dry-run", "List the notes that would change without writing them");
}

function toSelection(options: SelectionOptions): SelectionInput {
  return {
    paths: options.path?.map((p) => resolve(p)),
    recursive: options.recursive,
    startsWith: options.startsWith,
    endsWith: options.endsWith,
    pattern: options.pattern,
    hasMeta: options.has,
  };
}

function toChange(options: ChangeOptions): SelectionInput & ComposeOverridesInput {
  return {
    ...toSelection(options),
    position: options.position,
    template: options.template,
    inplace: options.inplace,
    dryRun: options.dryRun,
  };
}

function fail(error: unknown): never {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
}

function printReport(config: Config, report: ChangeReport): void {
  const root = getNotesDirectory(config);
  const listed = report.dryRun ? report.changed : report.written;

  if (listed.length === 0) {
    console.log(chalk.yellow("No notes changed."));
  } else {
    const verb = report.dryRun ? "Would update" : "Updated";
    console.log(chalk.green(`${verb} ${listed.length} note(s):`));
    for (const path of listed) console.log(`  ${relative(root, path)}`);
  }

  if (report.failures.length > 0) {
    console.error(chalk.red(`${report.failures.length} note(s) failed:`));
    for (const failure of report.failures) {
      console.error(chalk.red(`  ${relative(root, failure.path)}: ${failure.error.message}`));
    }
    process.exitCode = 1;
  }
}

function runChange(change: (config: Config) => ChangeReport): void {
  try {
    const config = currentConfig();
    printReport(config, change(config));
  } catch (error) {
    fail(error);
  }
}

// Init command
program
  .command("init")
  .description("Create a configuration file interactively")
  .option("-f, --force", "Overwrite an existing configuration")
  .action(async (options: { force?: boolean }) => {
    await runInteractiveSetup({
      force: options.force,
      configPath: program.opts<GlobalOptions>().config,
    });
  });

// Config command
program
  .command("config")
  .description("Show the current configuration")
  .action(() => {
    try {
      const explicit = program.opts<GlobalOptions>().config;
      const config = currentConfig();
      console.log(chalk.bold("\nConfiguration:\n"));
      console.log(
        `Config file: ${getConfigPath(explicit)}${configExists(explicit) ? "" : chalk.dim(" (not found, using defaults)")}`
      );
      console.log(`Notes directory: ${getNotesDirectory(config)}`);
      console.log(`Recursive: ${config.recursive ? "yes" : "no"}`);
      console.log(`Ignored directories: ${config.ignore.join(", ") || "none"}`);
      console.log(`Default kind: ${config.defaultKind}`);
      console.log(
        `Inline fields: ${config.compose.inlineTemplate}, ${config.compose.inlinePosition}, ${config.compose.inlineInplace ? "in place" : "extracted"}`
      );
      const fieldKeys = Object.keys(config.fields);
      console.log(`Field settings: ${fieldKeys.join(", ") || "none"}`);
    } catch (error) {
      fail(error);
    }
  });

// Show command
withSelection(
  program
    .command("show [keys...]")
    .description("Print the metadata of the selected notes")
    .option("-k, --kind <kind>", "frontmatter, inline or all", parseKind)
    .option("--json", "Print JSON")
).action((keys: string[], options: SelectionOptions & { kind?: MetadataKind; json?: boolean }) => {
  try {
    const config = currentConfig();
    const result = getMetadata(config, { ...toSelection(options), keys, kind: options.kind });

    if (options.json) {
      console.log(JSON.stringify(result.notes, null, 2));
    } else if (result.notes.length === 0) {
      console.log(chalk.yellow("No notes matched."));
    } else {
      const root = getNotesDirectory(config);
      for (const note of result.notes) {
        console.log(chalk.cyan(relative(root, note.path)));
        for (const [label, fields] of [
          ["frontmatter", note.frontmatter],
          ["inline", note.inline],
        ] as const) {
          for (const [key, values] of Object.entries(fields)) {
            console.log(`  ${chalk.dim(label)} ${chalk.bold(key)}: ${values.join(", ")}`);
          }
        }
      }
    }

    for (const failure of result.failures) {
      logger.warn(`${failure.path}: ${failure.error.message}`);
    }
    if (result.failures.length > 0) process.exitCode = 1;
  } catch (error) {
    fail(error);
  }
});

// Metadata commands
withChange(
  program
    .command("add <key> [values...]")
    .description("Add a key or values to the selected notes")
    .option("-k, --kind <kind>", "frontmatter, inline or all", parseKind)
    .option("--overwrite", "Replace the existing values")
).action(
  (key: string, values: string[], options: ChangeOptions & { kind?: MetadataKind; overwrite?: boolean }) =>
    runChange((config) =>
      addMetadata(config, {
        ...toChange(options),
        key,
        values,
        kind: options.kind,
        overwrite: options.overwrite,
      })
    )
);

withChange(
  program
    .command("remove <key> [values...]")
    .description("Remove values, or the whole key when no values are given")
    .option("-k, --kind <kind>", "frontmatter, inline or all", parseKind)
).action((key: string, values: string[], options: ChangeOptions & { kind?: MetadataKind }) =>
  runChange((config) =>
    removeMetadata(config, {
      ...toChange(options),
      key,
      values: values.length > 0 ? values : undefined,
      kind: options.kind,
    })
  )
);

withChange(
  program
    .command("move [keys...]")
    .description("Move keys between frontmatter and inline fields")
    .requiredOption("--from <kind>", "frontmatter or inline", parseStoreKind)
    .requiredOption("--to <kind>", "frontmatter or inline", parseStoreKind)
).action((keys: string[], options: ChangeOptions & { from: StoreKind; to: StoreKind }) =>
  runChange((config) =>
    moveMetadata(config, {
      ...toChange(options),
      keys: keys.length > 0 ? keys : undefined,
      from: options.from,
      to: options.to,
    })
  )
);

withChange(
  program
    .command("dedupe [keys...]")
    .description("Remove duplicate values")
    .option("-k, --kind <kind>", "frontmatter, inline or all", parseKind)
).action((keys: string[], options: ChangeOptions & { kind?: MetadataKind }) =>
  runChange((config) =>
    dedupeMetadata(config, {
      ...toChange(options),
      keys: keys.length > 0 ? keys : undefined,
      kind: options.kind,
    })
  )
);

withChange(
  program
    .command("order [keys...]")
    .description("Sort keys and/or values")
    .option("--keys <order>", "Sort the keys: asc or desc", parseOrder)
    .option("--values <order>", "Sort the values: asc or desc", parseOrder)
    .option("-k, --kind <kind>", "frontmatter, inline or all", parseKind)
).action(
  (
    keys: string[],
    options: ChangeOptions & { keys?: Order; values?: Order; kind?: MetadataKind }
  ) =>
    runChange((config) =>
      orderMetadata(config, {
        ...toChange(options),
        keys: keys.length > 0 ? keys : undefined,
        keyOrder: options.keys,
        valueOrder: options.values,
        kind: options.kind,
      })
    )
);

withChange(
  program
    .command("remove-empty")
    .description("Delete keys without values")
    .option("-k, --kind <kind>", "frontmatter, inline or all", parseKind)
).action((options: ChangeOptions & { kind?: MetadataKind }) =>
  runChange((config) => removeEmptyMetadata(config, { ...toChange(options), kind: options.kind }))
);

// Body commands
withChange(
  program
    .command("append <text>")
    .description("Append text to the body of the selected notes")
    .option("--allow-repeat", "Append even when the text is already there")
).action((text: string, options: ChangeOptions & { allowRepeat?: boolean }) =>
  runChange((config) =>
    appendText(config, { ...toChange(options), text, allowRepeat: options.allowRepeat })
  )
);

withChange(
  program
    .command("sub <pattern> <replacement>")
    .description("Replace text in the body of the selected notes")
    .option("--regex", "Treat the pattern as a regular expression")
).action((pattern: string, replacement: string, options: ChangeOptions & { regex?: boolean }) =>
  runChange((config) =>
    substitute(config, { ...toChange(options), pattern, replacement, regex: options.regex })
  )
);

withChange(
  program
    .command("format")
    .description("Recompose the selected notes with the current composition settings")
).action((options: ChangeOptions) =>
  runChange((config) => formatNotes(config, toChange(options)))
);

// Serve command (MCP server)
program
  .command("serve")
  .description("Start the MCP server on stdio")
  .action(async () => {
    try {
      const server = new NoteMetaServer(currentConfig(), version);
      await server.run();
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync(process.argv).catch(fail);
