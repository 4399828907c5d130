export type { GrayRaster, SampleType } from "./array.js";
export { createGrayRaster, getPixel, sampleTypeOf } from "./array.js";
export type { GeoKeyValue, ProjJson } from "./crs.js";
export { crsFromGeoKeys, GeoKeys, resolveCrs, resolveGeoKeys } from "./crs.js";
export type { DecompressOptions, Decompressor } from "./decode/api.js";
export { COMPRESSION_UNSET, decompress, registry } from "./decode/api.js";
export type { DecodeOptions } from "./decoder.js";
export { decodeWindow } from "./decoder.js";
export {
  CogError,
  CrsUnavailableError,
  FormatError,
  InsufficientDataError,
  InvalidRequestError,
  ShortReadError,
  TransportError,
  UnsupportedFeatureError,
} from "./errors.js";
export type { GeoInfo, LevelSize, RasterConfig } from "./geotiff.js";
export {
  CogReader,
  decode,
  decodeConfig,
  decodeConfigLevel,
  decodeGeoInfo,
  decodeLevel,
  decodeLevelWindow,
} from "./geotiff.js";
export type { GeoTransform } from "./geotransform.js";
export { geotransformFor, geotransformFromTags } from "./geotransform.js";
export type {
  ByteOrder,
  CogDocument,
  DirectoryEntry,
  GeoKeyEntry,
  RasterLevel,
  TagValue,
} from "./ifd.js";
export { parseDocument, tagName } from "./ifd.js";
export type {
  ByteSource,
  ChunkSource,
  RangeCacheOptions,
  ReadOptions,
  Whence,
} from "./range-cache.js";
export { DEFAULT_CHUNK_SIZE, RangeCache } from "./range-cache.js";
export type { TileIndex } from "./tile.js";
export { tileCount, tilesIntersecting } from "./tile.js";
export type { PixelOffset } from "./transform.js";
export { index, xy } from "./transform.js";
export type { Window } from "./window.js";
export { createWindow, intersectWindows } from "./window.js";
