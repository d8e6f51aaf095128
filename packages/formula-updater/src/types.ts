/**
 * Shared types for the formula updater
 */

/** Formula fields the updater rewrites */
export type FormulaField = "url" | "sha256";

/** Values currently present in a formula document */
export interface FormulaFields {
  url?: string;
  sha256?: string;
}

export type ProgressCallback = (downloaded: number, total: number) => void;

export interface DownloadOptions {
  /** Transport used for the GET (defaults to global fetch) */
  fetch?: typeof fetch;

  /** Aborts the in-flight download */
  signal?: AbortSignal;

  /** Bytes per hash update */
  chunkSize?: number;

  /** Called after every chunk; total is 0 when Content-Length is unknown */
  onProgress?: ProgressCallback;
}

export interface DownloadResult {
  /** Lowercase hex SHA-256 of the body */
  digest: string;

  /** Number of bytes read */
  bytes: number;
}

export interface RunOptions extends DownloadOptions {
  /** Patch in memory only, leave the file untouched */
  dryRun?: boolean;
}

export interface UpdateResult {
  /** Path of the formula as given */
  formulaPath: string;

  /** Tarball URL written to the formula */
  url: string;

  /** Digest written to the formula */
  sha256: string;

  /** Tarball size in bytes */
  bytes: number;

  /** Whether the new text differs from the original */
  changed: boolean;

  /** Field values before the rewrite */
  previous: FormulaFields;
}

/** CLI options as parsed by commander */
export interface UpdateOptions {
  version: string;
  formula: string;
  /** Download timeout in milliseconds */
  timeout?: number;
  dryRun?: boolean;
}
