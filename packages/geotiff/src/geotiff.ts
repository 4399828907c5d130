import type { GrayRaster, SampleType } from "./array.js";
import { DATA_TYPE_NAMES, SAMPLE_RANGES, sampleTypeOf } from "./array.js";
import { resolveCrs } from "./crs.js";
import type { DecodeOptions } from "./decoder.js";
import { decodeWindow, levelAt } from "./decoder.js";
import type { GeoTransform } from "./geotransform.js";
import { geotransformFor } from "./geotransform.js";
import type { RasterLevel } from "./ifd.js";
import { parseDocument } from "./ifd.js";
import type { ByteSource, RangeCacheOptions } from "./range-cache.js";
import { RangeCache } from "./range-cache.js";
import type { Window } from "./window.js";
import { fullWindow } from "./window.js";

/** Size and sample layout of one level, known without reading tiles. */
export type RasterConfig = {
  width: number;
  height: number;
  sampleType: SampleType;
  /** Display name of the sample type, e.g. "UInt16". */
  dataType: string;
  /** Display range of the sample type. */
  min: number;
  max: number;
};

export type LevelSize = { width: number; height: number };

/** Georeferencing summary of a file. */
export type GeoInfo = {
  /** Data type name of the full-resolution level. */
  type: string;
  size: LevelSize;
  geoTransform: GeoTransform;
  /** `"EPSG:<code>"` or PROJJSON text. */
  crs: string;
  nodata: number | null;
  metadata: string | null;
  /** Reduced-resolution levels in file order. */
  overviews: { size: LevelSize; geoTransform: GeoTransform }[];
};

/** Decode the full extent of the full-resolution level. */
export async function decode(
  source: ByteSource,
  options?: DecodeOptions,
): Promise<GrayRaster> {
  return await decodeLevel(source, 0, options);
}

/** Decode the full extent of one level. */
export async function decodeLevel(
  source: ByteSource,
  level: number,
  options?: DecodeOptions,
): Promise<GrayRaster> {
  const document = await parseDocument(source, options);
  return await decodeWindow(
    source,
    document,
    level,
    fullWindow(levelAt(document, level)),
    options,
  );
}

/**
 * Decode a pixel rectangle of one level.
 *
 * The window is clipped to the level; the result covers the clipped
 * rectangle.
 */
export async function decodeLevelWindow(
  source: ByteSource,
  level: number,
  window: Window,
  options?: DecodeOptions,
): Promise<GrayRaster> {
  const document = await parseDocument(source, options);
  return await decodeWindow(source, document, level, window, options);
}

/**
 * Sample type of a level from its header fields alone.
 *
 * Tile layout and photometric interpretation are left to
 * {@link decodeWindow}, so header queries work on files it cannot decode.
 */
function levelSampleType(level: RasterLevel): SampleType {
  return sampleTypeOf(level.bitsPerSample, level.sampleFormat);
}

/** Size and sample type of one level. */
export async function decodeConfigLevel(
  source: ByteSource,
  level: number,
  options?: DecodeOptions,
): Promise<RasterConfig> {
  const document = await parseDocument(source, options);
  const raster = levelAt(document, level);
  const sampleType = levelSampleType(raster);
  return {
    width: raster.width,
    height: raster.height,
    sampleType,
    dataType: DATA_TYPE_NAMES[sampleType],
    ...SAMPLE_RANGES[sampleType],
  };
}

/** Size and sample type of the full-resolution level. */
export async function decodeConfig(
  source: ByteSource,
  options?: DecodeOptions,
): Promise<RasterConfig> {
  return await decodeConfigLevel(source, 0, options);
}

/** Georeferencing of the file and of each overview. */
export async function decodeGeoInfo(
  source: ByteSource,
  options?: DecodeOptions,
): Promise<GeoInfo> {
  const document = await parseDocument(source, options);
  const primary = levelAt(document, 0);
  const sizeOf = ({ width, height }: LevelSize): LevelSize => ({ width, height });

  return {
    type: DATA_TYPE_NAMES[levelSampleType(primary)],
    size: sizeOf(primary),
    geoTransform: geotransformFor(document, 0),
    crs: resolveCrs(document),
    nodata: document.nodata,
    metadata: document.metadata,
    overviews: document.levels.slice(1).map((level) => ({
      size: sizeOf(level),
      geoTransform: geotransformFor(document, level.index),
    })),
  };
}

/**
 * One Cloud-Optimized GeoTIFF behind a shared {@link RangeCache}.
 *
 * Every method reparses the directory; tile and directory bytes already
 * fetched are served from the cache.
 */
export class CogReader {
  readonly source: RangeCache;

  constructor(source: RangeCache) {
    this.source = source;
  }

  /** Open a remote COG over HTTP range requests. */
  static fromUrl(url: string | URL, options?: RangeCacheOptions): CogReader {
    return new CogReader(RangeCache.fromUrl(url, options));
  }

  /** Open a COG held in memory. */
  static fromArrayBuffer(input: ArrayBuffer, options?: RangeCacheOptions): CogReader {
    return new CogReader(RangeCache.fromArrayBuffer(input, options));
  }

  decode(options?: DecodeOptions): Promise<GrayRaster> {
    return decode(this.source, options);
  }

  decodeLevel(level: number, options?: DecodeOptions): Promise<GrayRaster> {
    return decodeLevel(this.source, level, options);
  }

  decodeLevelWindow(
    level: number,
    window: Window,
    options?: DecodeOptions,
  ): Promise<GrayRaster> {
    return decodeLevelWindow(this.source, level, window, options);
  }

  decodeConfig(options?: DecodeOptions): Promise<RasterConfig> {
    return decodeConfig(this.source, options);
  }

  decodeConfigLevel(level: number, options?: DecodeOptions): Promise<RasterConfig> {
    return decodeConfigLevel(this.source, level, options);
  }

  decodeGeoInfo(options?: DecodeOptions): Promise<GeoInfo> {
    return decodeGeoInfo(this.source, options);
  }
}
