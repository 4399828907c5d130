import { Compression } from "@cogeotiff/core";
import { UnsupportedFeatureError } from "../errors.js";

/** Compression value read from files that omit the tag; treated as none. */
export const COMPRESSION_UNSET = 0;

export type DecompressOptions = {
  signal?: AbortSignal;
};

/** Turns one compressed tile into its raw sample bytes. */
export type Decompressor = (
  bytes: ArrayBuffer,
  options: DecompressOptions,
) => Promise<ArrayBuffer>;

/** Lazily loaded decompressors keyed by compression code. */
export const registry = new Map<number, () => Promise<Decompressor>>();

const uncompressed = () => import("../codecs/none.js").then((m) => m.decode);
const deflate = () => import("../codecs/deflate.js").then((m) => m.decode);

registry.set(COMPRESSION_UNSET, uncompressed);
registry.set(Compression.None, uncompressed);
registry.set(Compression.Lzw, () =>
  import("../codecs/lzw.js").then((m) => m.decode),
);
registry.set(Compression.Deflate, deflate);
registry.set(Compression.DeflateOther, deflate);
registry.set(Compression.PackBits, () =>
  import("../codecs/packbits.js").then((m) => m.decode),
);

/**
 * Decompress a tile's bytes according to its compression code.
 */
export async function decompress(
  bytes: Uint8Array,
  compression: number,
  options: DecompressOptions = {},
): Promise<Uint8Array> {
  const loader = registry.get(compression);
  if (!loader) {
    throw new UnsupportedFeatureError(`compression ${compression}`);
  }

  const decompressor = await loader();
  const result = await decompressor(toArrayBuffer(bytes), options);
  return new Uint8Array(result);
}

/** Copy a view into a standalone ArrayBuffer. */
function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}
