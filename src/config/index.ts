import { existsSync, readFileSync, writeFileSync } from "fs";
import { homedir } from "os";
import { join, resolve } from "path";
import { ZodError } from "zod";
import { ConfigError } from "../errors.js";
import type { ComposeOptions, StoreKind } from "../metadata/types.js";
import { ConfigSchema, DEFAULT_CONFIG, type Config } from "./schema.js";

export const CONFIG_FILENAME = ".notemeta.json";

/**
 * The config file in use: an explicit path, else `.notemeta.json` in the working
 * directory, else the one in the home directory.
 */
export function getConfigPath(explicit?: string): string {
  if (explicit) return expandPath(explicit);
  const local = join(process.cwd(), CONFIG_FILENAME);
  if (existsSync(local)) return local;
  return join(homedir(), CONFIG_FILENAME);
}

export function expandPath(path: string): string {
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  if (path.startsWith("$HOME/")) {
    return join(homedir(), path.slice(6));
  }
  return resolve(path);
}

export function configExists(explicit?: string): boolean {
  return existsSync(getConfigPath(explicit));
}

export function parseConfig(raw: unknown, source = "config"): Config {
  try {
    return ConfigSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new ConfigError(`Invalid ${source}: ${issues}`, { cause: error });
    }
    throw error;
  }
}

export function loadConfig(explicit?: string): Config {
  const configPath = getConfigPath(explicit);

  if (!existsSync(configPath)) {
    if (explicit) throw new ConfigError(`Config file not found: ${configPath}`);
    return DEFAULT_CONFIG;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigError(`Invalid JSON in config file: ${configPath}`, { cause: error });
    }
    throw error;
  }
  return parseConfig(parsed, `config file ${configPath}`);
}

export function saveConfig(config: Config, path: string = getConfigPath()): void {
  const validated = parseConfig(config);
  writeFileSync(path, JSON.stringify(validated, null, 2) + "\n");
}

export function getNotesDirectory(config: Config): string {
  return expandPath(config.notesDirectory);
}

/** The kind a new key is written to: its field setting, else the configured default. */
export function resolveDefaultKind(config: Config, key: string): StoreKind {
  if (Object.hasOwn(config.fields, key)) {
    return config.fields[key].defaultKind ?? config.defaultKind;
  }
  return config.defaultKind;
}

/** The configured composition options with any given overrides applied. */
export function composeOptions(
  config: Config,
  overrides: Partial<ComposeOptions> = {}
): ComposeOptions {
  return {
    inlinePosition: overrides.inlinePosition ?? config.compose.inlinePosition,
    inlineTemplate: overrides.inlineTemplate ?? config.compose.inlineTemplate,
    inlineInplace: overrides.inlineInplace ?? config.compose.inlineInplace,
  };
}

export * from "./schema.js";
