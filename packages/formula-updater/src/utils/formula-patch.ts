/**
 * Formula field patching
 *
 * A formula is treated as opaque text apart from two single-line fields:
 *
 *   url "https://github.com/owner/repo/archive/refs/tags/v0.1.0.tar.gz"
 *   sha256 "0123abcd..."
 *
 * Each pattern must match a whole line, allowing horizontal whitespace around
 * it. Only the quoted value is replaced; only the first match of each field
 * is touched.
 */

import type { FormulaField, FormulaFields } from "../types.js";
import { FieldNotFoundError } from "./errors.js";

// Groups: 1 = text before the value, 2 = value, 3 = text after the value
const FIELD_PATTERNS: Record<FormulaField, RegExp> = {
  url: /^([^\S\r\n]*url[^\S\r\n]+")([^"\r\n]+)("[^\S\r\n]*)$/m,
  sha256: /^([^\S\r\n]*sha256[^\S\r\n]+")([0-9a-fA-F]+)("[^\S\r\n]*)$/m,
};

/**
 * Current values of the url and sha256 fields, if present
 */
export function readFormulaFields(content: string): FormulaFields {
  return {
    url: FIELD_PATTERNS.url.exec(content)?.[2],
    sha256: FIELD_PATTERNS.sha256.exec(content)?.[2],
  };
}

function replaceField(content: string, field: FormulaField, value: string): string {
  return content.replace(
    FIELD_PATTERNS[field],
    (_match, before: string, _old: string, after: string) => `${before}${value}${after}`
  );
}

/**
 * Replace the formula's url and sha256 values
 *
 * Both fields are located before anything is replaced, so a formula missing
 * either one is never half-patched.
 *
 * @throws FieldNotFoundError if the url or sha256 line is missing
 *
 * @example
 * ```typescript
 * const updated = patchFormula(original, tarballUrl("0.2.0"), digest);
 * ```
 */
export function patchFormula(content: string, url: string, sha256: string): string {
  if (!FIELD_PATTERNS.url.test(content)) {
    throw new FieldNotFoundError("url");
  }
  if (!FIELD_PATTERNS.sha256.test(content)) {
    throw new FieldNotFoundError("sha256");
  }

  return replaceField(replaceField(content, "url", url), "sha256", sha256);
}
