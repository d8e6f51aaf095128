import { describe, test, expect, vi } from "vitest";
import { createHash } from "crypto";
import { chunk, sha256Hex } from "../streaming-digest.js";

async function* fromPieces(pieces: Uint8Array[]): AsyncGenerator<Uint8Array> {
  for (const piece of pieces) {
    yield piece;
  }
}

async function collect(source: AsyncIterable<Uint8Array>): Promise<number[]> {
  const sizes: number[] = [];
  for await (const block of source) {
    sizes.push(block.length);
  }
  return sizes;
}

function syntheticBytes(length: number): Uint8Array {
  const bytes = new Uint8Array(length);
  for (let i = 0; i < length; i++) {
    bytes[i] = (i * 31 + 7) % 256;
  }
  return bytes;
}

describe("chunk", () => {
  test("coalesces small pieces into fixed-size chunks", async () => {
    const pieces = [new Uint8Array(3), new Uint8Array(3), new Uint8Array(3)];

    expect(await collect(chunk(fromPieces(pieces), 4))).toEqual([4, 4, 1]);
  });

  test("splits large pieces", async () => {
    expect(await collect(chunk(fromPieces([new Uint8Array(10)]), 4))).toEqual([4, 4, 2]);
  });

  test("yields nothing for empty input", async () => {
    expect(await collect(chunk(fromPieces([]), 4))).toEqual([]);
    expect(await collect(chunk(fromPieces([new Uint8Array(0)]), 4))).toEqual([]);
  });

  test("preserves byte order across chunk boundaries", async () => {
    const bytes = syntheticBytes(11);
    const pieces = [bytes.subarray(0, 5), bytes.subarray(5, 6), bytes.subarray(6)];
    const out: number[] = [];

    for await (const block of chunk(fromPieces(pieces), 3)) {
      out.push(...block);
    }

    expect(out).toEqual(Array.from(bytes));
  });

  test("rejects a non-positive chunk size", async () => {
    await expect(collect(chunk(fromPieces([]), 0))).rejects.toThrow(
      "Chunk size must be a positive integer (got: 0)"
    );
  });
});

describe("sha256Hex", () => {
  test("hashes a known value", async () => {
    const result = await sha256Hex(fromPieces([new TextEncoder().encode("abc")]));

    expect(result).toEqual({
      digest: "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
      bytes: 3,
    });
  });

  test("hashes an empty stream", async () => {
    const result = await sha256Hex(fromPieces([]));

    expect(result).toEqual({
      digest: "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
      bytes: 0,
    });
  });

  test("multi-chunk digest matches the single-block digest", async () => {
    const chunkSize = 1024;
    const bytes = syntheticBytes(chunkSize * 3 + 123);
    const pieces = [
      bytes.subarray(0, 700),
      bytes.subarray(700, 2900),
      bytes.subarray(2900),
    ];

    const streamed = await sha256Hex(fromPieces(pieces), { chunkSize });
    const single = createHash("sha256").update(bytes).digest("hex");

    expect(streamed.digest).toBe(single);
    expect(streamed.bytes).toBe(bytes.length);
  });

  test("digest does not depend on chunk size", async () => {
    const bytes = syntheticBytes(5000);

    const small = await sha256Hex(fromPieces([bytes]), { chunkSize: 7 });
    const large = await sha256Hex(fromPieces([bytes]), { chunkSize: 1024 * 1024 });

    expect(small.digest).toBe(large.digest);
  });

  test("reports the running byte count per chunk", async () => {
    const onChunk = vi.fn();

    await sha256Hex(fromPieces([new Uint8Array(10)]), { chunkSize: 4, onChunk });

    expect(onChunk.mock.calls).toEqual([[4], [8], [10]]);
  });
});
