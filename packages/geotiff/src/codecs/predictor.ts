import { Predictor } from "@cogeotiff/core";

/**
 * Undo TIFF horizontal differencing (predictor 2) in place on a decoded
 * tile.
 *
 * Each row's first sample is stored as-is; every later sample is the
 * difference from its left neighbour, added back with wraparound at the
 * sample width. 16-bit samples are read and written in the file's byte
 * order. A trailing partial row is reversed over the samples it holds.
 *
 * @param tileWidth      Row length in samples (the padded tile width).
 * @param bytesPerSample 1 or 2.
 */
export function applyPredictor(
  block: Uint8Array,
  predictor: number,
  tileWidth: number,
  bytesPerSample: 1 | 2,
  littleEndian: boolean,
): Uint8Array {
  if (predictor === Predictor.None) {
    return block;
  }

  const rowBytes = tileWidth * bytesPerSample;
  for (let offset = 0; offset < block.length; offset += rowBytes) {
    const rowEnd = Math.min(offset + rowBytes, block.length);
    const row = block.subarray(offset, rowEnd);
    if (bytesPerSample === 1) {
      decodeRow8(row);
    } else {
      decodeRow16(row, littleEndian);
    }
  }

  return block;
}

function decodeRow8(row: Uint8Array): void {
  for (let i = 1; i < row.length; i++) {
    row[i] = (row[i]! + row[i - 1]!) & 0xff;
  }
}

function decodeRow16(row: Uint8Array, littleEndian: boolean): void {
  const view = new DataView(row.buffer, row.byteOffset, row.byteLength);
  const samples = Math.floor(row.length / 2);
  for (let i = 1; i < samples; i++) {
    const sum = view.getUint16(i * 2, littleEndian) + view.getUint16((i - 1) * 2, littleEndian);
    view.setUint16(i * 2, sum & 0xffff, littleEndian);
  }
}
