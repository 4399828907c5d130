import type { DecompressOptions } from "../decode/api.js";
import { decompressWithDecompressionStream } from "./decompression-stream.js";

/** zlib-wrapped deflate (compression 8 and 32946). */
export async function decode(
  bytes: ArrayBuffer,
  { signal }: DecompressOptions,
): Promise<ArrayBuffer> {
  return await decompressWithDecompressionStream(bytes, {
    format: "deflate",
    signal,
  });
}
