import { Compression } from "@cogeotiff/core";
import { decodeBlock } from "./geotiff-block.js";

/** Macintosh PackBits run-length encoding. */
export async function decode(bytes: ArrayBuffer): Promise<ArrayBuffer> {
  return await decodeBlock(Compression.PackBits, bytes);
}
