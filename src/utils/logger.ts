import chalk from "chalk";

let verbose = process.env.NOTEMETA_VERBOSE === "1";

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

// Everything goes to stderr: stdout carries command output and the MCP stdio stream.
export const logger = {
  info(message: string): void {
    console.error(chalk.blue("info"), message);
  },
  success(message: string): void {
    console.error(chalk.green("✓"), message);
  },
  warn(message: string): void {
    console.error(chalk.yellow("warn"), message);
  },
  error(message: string): void {
    console.error(chalk.red("error"), message);
  },
  debug(message: string): void {
    if (verbose) console.error(chalk.dim(`debug ${message}`));
  },
};
