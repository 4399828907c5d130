import { getDecoder } from "geotiff";
import { FormatError } from "../errors.js";

/** The part of a geotiff.js decoder this package calls. */
interface BlockDecoder {
  decode(fileDirectory: { Predictor: number }, buffer: ArrayBuffer): Promise<ArrayBuffer>;
}

/**
 * Decompress one block with the geotiff.js codec registered for
 * `compression`.
 *
 * The predictor is always passed as 1 (none): it is reversed afterwards,
 * in file byte order, by `applyPredictor`.
 */
export async function decodeBlock(
  compression: number,
  bytes: ArrayBuffer,
): Promise<ArrayBuffer> {
  const decoder: BlockDecoder = await getDecoder({ Compression: compression });
  try {
    return await decoder.decode({ Predictor: 1 }, bytes);
  } catch (err) {
    throw new FormatError("tile data", `failed to decode compression ${compression}`, {
      cause: err,
    });
  }
}
