/**
 * Formula Updater
 *
 * Points a formula at a new release: derives the tarball URL, hashes the
 * tarball and rewrites the formula's url and sha256 lines.
 */

import fs from "fs-extra";
import type { FormulaFields, RunOptions, UpdateResult } from "../types.js";
import { FileNotFoundError } from "./errors.js";
import { patchFormula, readFormulaFields } from "./formula-patch.js";
import { fetchTarballDigest } from "./tarball-downloader.js";
import { tarballUrl } from "./tarball-url.js";

function decodeFields(fields: FormulaFields): FormulaFields {
  return {
    url: fields.url && Buffer.from(fields.url, "latin1").toString("utf8"),
    sha256: fields.sha256,
  };
}

/**
 * Update `formulaPath` to the release tarball for `version`
 *
 * The file is written once, and only after both fields were found. On any
 * failure it is left untouched.
 *
 * @throws FileNotFoundError if the formula does not exist (checked before
 * any download)
 * @throws DownloadFailedError if the tarball cannot be fetched
 * @throws FieldNotFoundError if the url or sha256 line is missing
 *
 * @example
 * ```typescript
 * const result = await run("0.2.0", "Formula/kibob.rb");
 * console.log(result.sha256);
 * ```
 */
export async function run(
  version: string,
  formulaPath: string,
  options: RunOptions = {}
): Promise<UpdateResult> {
  const { dryRun = false, ...downloadOptions } = options;

  if (!(await fs.pathExists(formulaPath))) {
    throw new FileNotFoundError(formulaPath);
  }

  const url = tarballUrl(version);
  const { digest, bytes } = await fetchTarballDigest(url, downloadOptions);

  // latin1 maps each byte to one code unit, so every byte outside the two
  // rewritten values is written back unchanged whatever the file's encoding
  const original = await fs.readFile(formulaPath, "latin1");
  const updated = patchFormula(
    original,
    Buffer.from(url, "utf8").toString("latin1"),
    digest
  );

  if (!dryRun) {
    await fs.writeFile(formulaPath, updated, "latin1");
  }

  return {
    formulaPath,
    url,
    sha256: digest,
    bytes,
    changed: updated !== original,
    previous: decodeFields(readFormulaFields(original)),
  };
}
