/**
 * Streaming SHA-256
 *
 * Bytes arrive from the network in whatever sizes the transport chooses.
 * They are re-sliced into fixed-size chunks before hashing so that at most
 * one chunk is held in memory at a time.
 */

import { createHash } from "crypto";
import { DOWNLOAD_CHUNK_SIZE } from "../config.js";

/**
 * @throws RangeError unless size is a positive integer
 */
export function assertChunkSize(size: number): void {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Chunk size must be a positive integer (got: ${size})`);
  }
}

/**
 * Re-slice a byte stream into chunks of exactly `size` bytes
 *
 * The last chunk may be shorter. Empty input yields nothing.
 */
export async function* chunk(
  source: AsyncIterable<Uint8Array>,
  size: number = DOWNLOAD_CHUNK_SIZE
): AsyncGenerator<Uint8Array> {
  assertChunkSize(size);

  let buffer = new Uint8Array(size);
  let filled = 0;

  for await (const piece of source) {
    let offset = 0;

    while (offset < piece.length) {
      const take = Math.min(size - filled, piece.length - offset);
      buffer.set(piece.subarray(offset, offset + take), filled);
      filled += take;
      offset += take;

      if (filled === size) {
        yield buffer;
        // The consumer may still hold the yielded chunk
        buffer = new Uint8Array(size);
        filled = 0;
      }
    }
  }

  if (filled > 0) {
    yield buffer.subarray(0, filled);
  }
}

export interface DigestOptions {
  chunkSize?: number;
  /** Called with the running byte count after each chunk is hashed */
  onChunk?: (bytes: number) => void;
}

/**
 * Hash an async byte stream chunk by chunk
 *
 * @returns Hex digest and the number of bytes hashed
 */
export async function sha256Hex(
  source: AsyncIterable<Uint8Array>,
  options: DigestOptions = {}
): Promise<{ digest: string; bytes: number }> {
  const { chunkSize = DOWNLOAD_CHUNK_SIZE, onChunk } = options;
  const hash = createHash("sha256");
  let bytes = 0;

  for await (const block of chunk(source, chunkSize)) {
    hash.update(block);
    bytes += block.length;
    onChunk?.(bytes);
  }

  return { digest: hash.digest("hex"), bytes };
}
