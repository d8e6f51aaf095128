/**
 * update command - Point a formula at a new release tarball
 */

import chalk from "chalk";
import ora, { type Ora } from "ora";
import type { UpdateOptions, UpdateResult } from "../types.js";
import { run } from "../utils/formula-updater.js";
import { tarballUrl } from "../utils/tarball-url.js";

/**
 * Format bytes to human-readable string
 *
 * @example
 * ```typescript
 * formatBytes(1536); // "1.5 KB"
 * ```
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / 1024 / 1024).toFixed(1)} MB`;
}

function progressText(downloaded: number, total: number): string {
  if (total > 0) {
    const percent = Math.round((downloaded / total) * 100);
    return `Downloading tarball... ${percent}% (${formatBytes(downloaded)} / ${formatBytes(total)})`;
  }
  return `Downloading tarball... ${formatBytes(downloaded)}`;
}

export async function update(options: UpdateOptions): Promise<UpdateResult> {
  const isInteractive = process.stdout.isTTY;
  let spinner: Ora | null = null;

  if (isInteractive) {
    spinner = ora(`Downloading ${tarballUrl(options.version)}`).start();
  } else {
    console.log(`Downloading ${tarballUrl(options.version)}...`);
  }

  let result: UpdateResult;
  try {
    result = await run(options.version, options.formula, {
      dryRun: options.dryRun,
      signal:
        options.timeout !== undefined
          ? AbortSignal.timeout(options.timeout)
          : undefined,
      onProgress: spinner
        ? (downloaded, total) => {
            if (spinner) spinner.text = progressText(downloaded, total);
          }
        : undefined,
    });
  } catch (error) {
    spinner?.fail("Update failed");
    throw error;
  }

  spinner?.succeed(`Computed checksum over ${formatBytes(result.bytes)}`);

  if (options.dryRun) {
    console.log(chalk.yellow("🔍 Dry run - formula not written"));
  } else if (!result.changed) {
    console.log(chalk.gray("Formula already up to date"));
  }

  if (result.changed && result.previous.url !== result.url) {
    console.log(chalk.gray(`Previous url: ${result.previous.url}`));
  }

  console.log(
    `${options.dryRun ? "Would update formula" : "Updated formula"}: ${result.formulaPath}`
  );
  console.log(`url: ${result.url}`);
  console.log(`sha256: ${result.sha256}`);

  return result;
}
