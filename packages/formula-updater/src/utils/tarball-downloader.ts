/**
 * Tarball Downloader
 *
 * Fetches a release tarball and hashes it as it streams in. The body is
 * never written to disk or held in memory as a whole.
 */

import type { DownloadOptions, DownloadResult } from "../types.js";
import { DownloadFailedError, describeError } from "./errors.js";
import { DOWNLOAD_CHUNK_SIZE } from "../config.js";
import { assertChunkSize, sha256Hex } from "./streaming-digest.js";

/**
 * Read a web stream through its reader
 *
 * When the consumer stops early or a read fails, the stream is cancelled so
 * the connection is closed.
 */
async function* readBody(
  body: ReadableStream<Uint8Array>
): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  let finished = false;

  try {
    while (true) {
      const { done, value } = await reader.read();

      if (done) {
        finished = true;
        break;
      }

      yield value;
    }
  } finally {
    if (!finished) {
      // An errored stream rejects cancel() with the error already being thrown
      await reader.cancel().catch(() => undefined);
    }
    reader.releaseLock();
  }
}

/**
 * Download `url` and compute the SHA-256 of its body
 *
 * @throws RangeError for an invalid `options.chunkSize`, before any request
 * @throws DownloadFailedError on transport errors, non-2xx status, a missing
 * body, a failed read or an abort through `options.signal`
 *
 * Errors thrown by `options.onProgress` propagate unchanged.
 *
 * @example
 * ```typescript
 * const { digest } = await fetchTarballDigest(tarballUrl("0.2.0"));
 * ```
 */
export async function fetchTarballDigest(
  url: string,
  options: DownloadOptions = {}
): Promise<DownloadResult> {
  const {
    fetch: fetchImpl = fetch,
    signal,
    chunkSize = DOWNLOAD_CHUNK_SIZE,
    onProgress,
  } = options;

  assertChunkSize(chunkSize);

  let response: Response;
  try {
    response = await fetchImpl(url, { signal });
  } catch (error) {
    throw new DownloadFailedError(url, describeError(error), { cause: error });
  }

  if (!response.ok) {
    throw new DownloadFailedError(
      url,
      `HTTP ${response.status}: ${response.statusText}`,
      { status: response.status }
    );
  }

  if (!response.body) {
    throw new DownloadFailedError(url, "Response body is empty");
  }

  const total = Number(response.headers.get("content-length")) || 0;
  let progressFailed = false;

  try {
    return await sha256Hex(readBody(response.body), {
      chunkSize,
      onChunk: (bytes) => {
        try {
          onProgress?.(bytes, total);
        } catch (error) {
          progressFailed = true;
          throw error;
        }
      },
    });
  } catch (error) {
    if (progressFailed) {
      throw error;
    }
    throw new DownloadFailedError(url, describeError(error), { cause: error });
  }
}
