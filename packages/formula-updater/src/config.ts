/**
 * Static configuration for the formula updater
 */

/** Upstream GitHub repository whose release tarballs the formula points at */
export const REPOSITORY = "VimCommando/kibana-object-manager";

/**
 * Release tarball URL template. `{repo}` and `{version}` are each replaced
 * exactly once.
 */
export const TARBALL_URL_TEMPLATE =
  "https://github.com/{repo}/archive/refs/tags/v{version}.tar.gz";

/** Bytes fed to the hash per update (1 MiB) */
export const DOWNLOAD_CHUNK_SIZE = 1024 * 1024;
