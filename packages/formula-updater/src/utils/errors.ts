/**
 * Error types for the formula updater
 *
 * Every failure the CLI reports is one of the subclasses below. They carry an
 * optional human-readable reason and a suggestion, printed by displayError.
 */

import chalk from "chalk";
import type { FormulaField } from "../types.js";

/**
 * Base error class for formula update failures
 */
export class FormulaUpdateError extends Error {
  constructor(
    message: string,
    public reason?: string,
    public suggestion?: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "FormulaUpdateError";
    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error thrown when the formula path does not exist
 */
export class FileNotFoundError extends FormulaUpdateError {
  constructor(public readonly path: string) {
    super(
      `Formula file not found: ${path}`,
      undefined,
      "Check the --formula path points at an existing file"
    );
    this.name = "FileNotFoundError";
  }
}

/**
 * Error thrown when the tarball cannot be downloaded or read
 */
export class DownloadFailedError extends FormulaUpdateError {
  constructor(
    public readonly url: string,
    reason: string,
    options?: ErrorOptions & { status?: number }
  ) {
    super(
      "Failed to download tarball for checksum",
      reason,
      options?.status === 404
        ? "Check that the release tag exists and has been pushed"
        : "Check your internet connection and try again",
      options
    );
    this.name = "DownloadFailedError";
    this.status = options?.status;
  }

  /** HTTP status, when the server answered */
  public readonly status?: number;
}

/**
 * Error thrown when the formula has no line for a required field
 */
export class FieldNotFoundError extends FormulaUpdateError {
  constructor(public readonly field: FormulaField) {
    super(`Could not find \`${field}\` line in formula`);
    this.name = "FieldNotFoundError";
  }
}

/**
 * Describe an unknown thrown value for a `reason` line
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return "code" in error && typeof error.code === "string"
      ? `${error.message} (${error.code})`
      : error.message;
  }
  return String(error);
}

/**
 * Display error message with consistent formatting
 *
 * @example
 * ```typescript
 * try {
 *   await run("0.2.0", "Formula/kibob.rb");
 * } catch (error) {
 *   displayError(error);
 * }
 * ```
 */
export function displayError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`\n❌ Error: ${message}`));

  if (error instanceof FormulaUpdateError) {
    if (error.reason) {
      console.error(chalk.gray(`Cause: ${error.reason}`));
    }

    if (error.suggestion) {
      console.error(chalk.yellow(`\nSuggestion: ${error.suggestion}`));
    }
  }

  console.error(); // Empty line
}
