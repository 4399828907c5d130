import { Photometric } from "@cogeotiff/core";
import type { GrayRaster, SampleType } from "./array.js";
import { bytesPerSample, createGrayRaster, sampleTypeOf } from "./array.js";
import { decompress } from "./decode/api.js";
import { applyPredictor } from "./codecs/predictor.js";
import {
  FormatError,
  InsufficientDataError,
  InvalidRequestError,
  UnsupportedFeatureError,
} from "./errors.js";
import type { CogDocument, RasterLevel } from "./ifd.js";
import type { ByteSource, ReadOptions } from "./range-cache.js";
import type { TileIndex } from "./tile.js";
import { tileCount, tilesIntersecting, tileWindow } from "./tile.js";
import type { Window } from "./window.js";
import { fullWindow, intersectWindows } from "./window.js";

/** Options for calls that read tile data. */
export type DecodeOptions = ReadOptions;

/** Look up a level by index. */
export function levelAt(document: CogDocument, index: number): RasterLevel {
  const level = Number.isInteger(index) ? document.levels[index] : undefined;
  if (level === undefined) {
    throw new InvalidRequestError(
      `level ${index} out of range; file has ${document.levels.length} levels`,
    );
  }
  return level;
}

/**
 * Check that a level can be decoded and return its sample type.
 *
 * Only tiled, single-band, 8/16-bit integer BlackIsZero rasters pass.
 */
export function validateLevel(level: RasterLevel): SampleType {
  if (level.width === 0 || level.height === 0) {
    throw new FormatError("ImageWidth/ImageLength", "level has no pixels");
  }
  if (level.tileWidth === 0) {
    throw new UnsupportedFeatureError("strip layout (no TileWidth)");
  }
  if (level.tileHeight === 0) {
    throw new FormatError("TileLength", "missing while TileWidth is set");
  }

  const [across, down] = tileCount(level);
  const tiles = across * down;
  if (level.tileOffsets.length < tiles) {
    throw new FormatError(
      "TileOffsets",
      `${level.tileOffsets.length} offsets for ${tiles} tiles`,
    );
  }
  if (level.tileByteCounts.length < tiles) {
    throw new FormatError(
      "TileByteCounts",
      `${level.tileByteCounts.length} byte counts for ${tiles} tiles`,
    );
  }

  if (level.bitsPerSample === 0) {
    throw new FormatError("BitsPerSample", "0 bits per sample");
  }
  if (level.samplesPerPixel !== 1) {
    throw new UnsupportedFeatureError(`${level.samplesPerPixel} samples per pixel`);
  }
  const sampleType = sampleTypeOf(level.bitsPerSample, level.sampleFormat);
  if (level.photometric !== Photometric.MinIsBlack) {
    throw new UnsupportedFeatureError(
      `photometric interpretation ${level.photometric}`,
    );
  }
  return sampleType;
}

/**
 * Decode the part of `window` that lies inside the level.
 *
 * Only the tiles overlapping the window are fetched; they are decoded
 * concurrently and copied into a raster covering the clipped window.
 */
export async function decodeWindow(
  source: ByteSource,
  document: CogDocument,
  levelIndex: number,
  window: Window,
  options: DecodeOptions = {},
): Promise<GrayRaster> {
  const level = levelAt(document, levelIndex);
  const sampleType = validateLevel(level);

  const region = intersectWindows(window, fullWindow(level));
  if (region === null) {
    throw new InvalidRequestError(
      `window ${JSON.stringify(window)} does not overlap the ${level.width}x${level.height} level`,
    );
  }

  const raster = createGrayRaster(sampleType, region, document.nodata);
  const littleEndian = document.byteOrder === "little";

  await Promise.all(
    tilesIntersecting(level, region).map((tile) =>
      decodeTileInto(source, level, tile, raster, littleEndian, options),
    ),
  );

  return raster;
}

async function decodeTileInto(
  source: ByteSource,
  level: RasterLevel,
  tile: TileIndex,
  raster: GrayRaster,
  littleEndian: boolean,
  options: DecodeOptions,
): Promise<void> {
  const [across] = tileCount(level);
  const index = tile.y * across + tile.x;
  const offset = level.tileOffsets[index] ?? 0;
  const byteCount = level.tileByteCounts[index] ?? 0;

  const compressed = await source.readAt(offset, byteCount, options);
  const raw = await decompress(compressed, level.compression, options);
  const size = bytesPerSample(raster.sampleType);
  applyPredictor(raw, level.predictor, level.tileWidth, size, littleEndian);

  const bounds = tileWindow(level, tile);
  const overlap = intersectWindows(bounds, raster.window);
  if (overlap === null) {
    return;
  }

  const read = sampleReader(raster.sampleType, raw, littleEndian);
  const colEnd = overlap.colOff + overlap.width;
  for (let row = overlap.rowOff; row < overlap.rowOff + overlap.height; row++) {
    // Tiles are padded: the row stride is the full tile width.
    const srcRow = (row - bounds.rowOff) * level.tileWidth - bounds.colOff;
    const dstRow = (row - raster.window.rowOff) * raster.width - raster.window.colOff;

    const needed = (srcRow + colEnd) * size;
    if (needed > raw.length) {
      throw new InsufficientDataError(
        `tile (${tile.x}, ${tile.y}) decoded to ${raw.length} bytes; row ${row} needs ${needed}`,
      );
    }

    for (let col = overlap.colOff; col < colEnd; col++) {
      raster.data[dstRow + col] = read((srcRow + col) * size);
    }
  }
}

/** Reads one sample at a byte offset of a decoded tile. */
function sampleReader(
  sampleType: SampleType,
  bytes: Uint8Array,
  littleEndian: boolean,
): (byteOffset: number) => number {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  switch (sampleType) {
    case "uint8":
      return (o) => view.getUint8(o);
    case "int8":
      return (o) => view.getInt8(o);
    case "uint16":
      return (o) => view.getUint16(o, littleEndian);
    case "int16":
      return (o) => view.getInt16(o, littleEndian);
  }
}
