import { REPOSITORY, TARBALL_URL_TEMPLATE } from "../config.js";

/**
 * Build the release tarball URL for a version
 *
 * The version is used verbatim; whether the tag exists is only discovered
 * when the download is attempted.
 *
 * @example
 * ```typescript
 * tarballUrl("0.2.0");
 * // "https://github.com/VimCommando/kibana-object-manager/archive/refs/tags/v0.2.0.tar.gz"
 * ```
 */
export function tarballUrl(version: string): string {
  // Function replacers keep `$` sequences in the version literal
  return TARBALL_URL_TEMPLATE.replace("{repo}", () => REPOSITORY).replace(
    "{version}",
    () => version
  );
}
