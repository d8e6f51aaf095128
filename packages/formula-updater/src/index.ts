#!/usr/bin/env node

/**
 * Formula Updater CLI
 *
 * Main entry point for the update-formula command-line interface.
 * Rewrites a Homebrew formula's url and sha256 for a release version.
 */

import { main } from "./cli.js";

const exitCode = await main(process.argv);

if (exitCode !== 0) {
  process.exit(exitCode);
}
