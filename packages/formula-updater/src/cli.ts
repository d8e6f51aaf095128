/**
 * Command-line program for update-formula
 *
 * `main` parses the arguments, runs the update and returns the exit code,
 * so the entry point is the only place that exits the process.
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import chalk from "chalk";

import { update } from "./commands/update.js";
import type { UpdateOptions } from "./types.js";
import { displayError } from "./utils/errors.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const USAGE = "update-formula --version <version> --formula <path>";

// Read package.json for version
function readCliVersion(): string {
  const packageJson: unknown = JSON.parse(
    readFileSync(join(__dirname, "../package.json"), "utf-8")
  );
  if (
    typeof packageJson === "object" &&
    packageJson !== null &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }
  return "0.0.0";
}

function parseTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new InvalidArgumentError("Timeout must be a positive number of milliseconds.");
  }
  return ms;
}

export function createProgram(): Command {
  const program = new Command();

  // --version is the release version, so the CLI's own version moves to -V
  program
    .name("update-formula")
    .description("🍺 Update a Homebrew formula's url and sha256 for a release")
    .version(readCliVersion(), "-V, --cli-version", "Output the current version")
    .requiredOption("--version <version>", "Release version, e.g. 0.2.0")
    .requiredOption("--formula <path>", "Path to the formula file, e.g. Formula/kibob.rb")
    .option("--timeout <ms>", "Abort the download after this many milliseconds", parseTimeout)
    .option("--dry-run", "Show the new values without writing the formula")
    .exitOverride()
    .action(async (options: UpdateOptions) => {
      await update(options);
    });

  return program;
}

/**
 * Run the CLI with `argv` (as in `process.argv`)
 *
 * @returns 0 on success, help or version output; 1 on any failure
 */
export async function main(argv: string[]): Promise<number> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // commander has already printed help, the version or the usage error
      if (error.exitCode !== 0) {
        console.error(chalk.yellow("💡 Usage:"), chalk.cyan(USAGE));
      }
      return error.exitCode;
    }

    displayError(error);
    return 1;
  }
}
