import { FormatError } from "../errors.js";

export function assert(
  expression: unknown,
  msg: string | undefined = "",
): asserts expression {
  if (!expression) {
    throw new Error(msg);
  }
}

/** Inflate `data` through the platform `DecompressionStream`. */
export async function decompressWithDecompressionStream(
  data: ArrayBuffer,
  { format, signal }: { format: CompressionFormat; signal?: AbortSignal },
): Promise<ArrayBuffer> {
  const response = new Response(data);
  assert(response.body, "Response does not contain body.");
  try {
    const decompressed = new Response(
      response.body.pipeThrough(new DecompressionStream(format), { signal }),
    );
    return await decompressed.arrayBuffer();
  } catch (err) {
    signal?.throwIfAborted();
    throw new FormatError("tile data", `failed to decode ${format}`, {
      cause: err,
    });
  }
}
