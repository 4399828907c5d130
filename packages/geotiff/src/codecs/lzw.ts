import { Compression } from "@cogeotiff/core";
import { decodeBlock } from "./geotiff-block.js";

export async function decode(bytes: ArrayBuffer): Promise<ArrayBuffer> {
  return await decodeBlock(Compression.Lzw, bytes);
}
