import {
  Compression,
  Photometric,
  PlanarConfiguration,
  Predictor,
  SampleFormat,
  TiffTag,
  TiffTagValueType,
} from "@cogeotiff/core";
import {
  FormatError,
  ShortReadError,
  UnsupportedFeatureError,
} from "./errors.js";
import type { GeoTransform } from "./geotransform.js";
import { DEFAULT_GEOTRANSFORM, geotransformFromTags } from "./geotransform.js";
import type { ByteSource, ReadOptions } from "./range-cache.js";

/** TIFF version number of classic (32-bit offset) files. */
export const TIFF_VERSION = 42;

/** Size in bytes of one IFD entry. */
const ENTRY_SIZE = 12;

/**
 * Size in bytes of one value of each data type.
 *
 * Determines whether an entry's value fits in its 4 trailing bytes or lives
 * elsewhere in the file.
 */
export const TYPE_SIZES: Record<number, number> = {
  [TiffTagValueType.Uint8]: 1,
  [TiffTagValueType.Ascii]: 1,
  [TiffTagValueType.Uint16]: 2,
  [TiffTagValueType.Uint32]: 4,
  [TiffTagValueType.Rational]: 8,
  [TiffTagValueType.Int8]: 1,
  [TiffTagValueType.Undefined]: 1,
  [TiffTagValueType.Int16]: 2,
  [TiffTagValueType.Int32]: 4,
  [TiffTagValueType.SignedRational]: 8,
  [TiffTagValueType.Float32]: 4,
  [TiffTagValueType.Float64]: 8,
};

export type ByteOrder = "little" | "big";

/** Where an entry's value bytes are. */
export type TagValue =
  | { kind: "inline"; bytes: Uint8Array }
  | { kind: "out-of-line"; offset: number; length: number };

/** One 12-byte IFD record. */
export type DirectoryEntry = {
  tag: number;
  type: number;
  count: number;
  value: TagValue;
};

/** One resolution level, i.e. one IFD. */
export type RasterLevel = {
  /** Position in the IFD chain; 0 is full resolution. */
  index: number;
  subfileType: number;
  width: number;
  height: number;
  tileWidth: number;
  tileHeight: number;
  compression: number;
  predictor: number;
  photometric: number;
  samplesPerPixel: number;
  bitsPerSample: number;
  sampleFormat: number;
  tileOffsets: number[];
  tileByteCounts: number[];
  /** Tags present in the IFD that this reader skipped. */
  unrecognizedTags: number[];
};

/** One raw record of the GeoKeyDirectory. */
export type GeoKeyEntry = {
  keyId: number;
  /** 0 when the value is inline, else the tag holding the value. */
  location: number;
  count: number;
  valueOffset: number;
};

/** Everything parsed from the directory chain of one file. */
export type CogDocument = {
  byteOrder: ByteOrder;
  levels: RasterLevel[];
  geoTransform: GeoTransform;
  /** GDAL nodata value; null when the tag is absent. */
  nodata: number | null;
  /** GDAL metadata XML, if present. */
  metadata: string | null;
  geoDoubleParams: number[] | null;
  geoAsciiParams: string | null;
  geoKeys: GeoKeyEntry[];
};

/** Name of a tag from the TIFF tag dictionary. */
export function tagName(tag: number): string {
  return TiffTag[tag] ?? `Unknown(${tag})`;
}

/**
 * Select the byte order from the first two bytes of the file.
 *
 * "II" is little-endian (Intel), "MM" big-endian (Motorola).
 */
export function readByteOrder(bytes: Uint8Array): ByteOrder {
  if (bytes[0] === 0x49 && bytes[1] === 0x49) {
    return "little";
  }
  if (bytes[0] === 0x4d && bytes[1] === 0x4d) {
    return "big";
  }
  const marker = Array.from(bytes.subarray(0, 2), (b) =>
    b.toString(16).padStart(2, "0"),
  ).join("");
  throw new FormatError("header", `cannot interpret 0x${marker} as byte order`);
}

/**
 * Walk the IFD chain of a classic TIFF and collect one {@link RasterLevel}
 * per directory, in chain order.
 *
 * Georeferencing fields are taken from the first IFD.
 */
export async function parseDocument(
  source: ByteSource,
  options: ReadOptions = {},
): Promise<CogDocument> {
  const header = await readStructure(source, 0, 8, "header", options);
  const byteOrder = readByteOrder(header);
  const littleEndian = byteOrder === "little";
  const view = viewOf(header);

  const version = view.getUint16(2, littleEndian);
  if (version !== TIFF_VERSION) {
    throw new FormatError("header", `unexpected version: ${version}`);
  }

  const document: CogDocument = {
    byteOrder,
    levels: [],
    geoTransform: [...DEFAULT_GEOTRANSFORM],
    nodata: null,
    metadata: null,
    geoDoubleParams: null,
    geoAsciiParams: null,
    geoKeys: [],
  };

  const seenOffsets = new Set<number>();
  let ifdOffset = view.getUint32(4, littleEndian);
  while (ifdOffset !== 0) {
    if (seenOffsets.has(ifdOffset)) {
      throw new FormatError(
        "IFD",
        `circular reference detected at offset ${ifdOffset}`,
      );
    }
    seenOffsets.add(ifdOffset);
    ifdOffset = await parseIfd(source, ifdOffset, document, options);
  }

  if (document.levels.length === 0) {
    throw new FormatError("IFD", "file contains no image file directories");
  }

  return document;
}

/**
 * Parse the IFD at `offset`, append its level to `document`, and return the
 * offset of the next IFD (0 at the end of the chain).
 */
async function parseIfd(
  source: ByteSource,
  offset: number,
  document: CogDocument,
  options: ReadOptions,
): Promise<number> {
  const littleEndian = document.byteOrder === "little";
  const countBytes = await readStructure(source, offset, 2, "IFD", options);
  const entryCount = viewOf(countBytes).getUint16(0, littleEndian);

  const block = await readStructure(
    source,
    offset + 2,
    entryCount * ENTRY_SIZE + 4,
    "IFD",
    options,
  );

  const state: IfdState = {
    document,
    source,
    options,
    littleEndian,
    level: defaultLevel(document.levels.length),
    tiepoint: null,
    pixelScale: null,
  };

  for (let i = 0; i < entryCount; i++) {
    const entry = readEntry(block, i * ENTRY_SIZE, littleEndian);
    await applyEntry(state, entry);
  }

  if (
    state.level.index === 0 &&
    (state.tiepoint !== null || state.pixelScale !== null)
  ) {
    document.geoTransform = geotransformFromTags(
      state.tiepoint,
      state.pixelScale,
    );
  }
  document.levels.push(state.level);

  return viewOf(block).getUint32(entryCount * ENTRY_SIZE, littleEndian);
}

/** Decode the 12-byte entry at `offset` within an IFD block. */
export function readEntry(
  block: Uint8Array,
  offset: number,
  littleEndian: boolean,
): DirectoryEntry {
  const view = viewOf(block);
  const tag = view.getUint16(offset, littleEndian);
  const type = view.getUint16(offset + 2, littleEndian);
  const count = view.getUint32(offset + 4, littleEndian);

  const byteLength = count * (TYPE_SIZES[type] ?? 1);
  const value: TagValue =
    byteLength <= 4
      ? { kind: "inline", bytes: block.slice(offset + 8, offset + 8 + byteLength) }
      : {
          kind: "out-of-line",
          offset: view.getUint32(offset + 8, littleEndian),
          length: byteLength,
        };

  return { tag, type, count, value };
}

/** Resolve an entry's value to its bytes, fetching out-of-line values. */
export async function resolveValue(
  source: ByteSource,
  value: TagValue,
  options: ReadOptions = {},
): Promise<Uint8Array> {
  if (value.kind === "inline") {
    return value.bytes;
  }
  return await readStructure(source, value.offset, value.length, "tag value", options);
}

/**
 * Decode `count` numeric values of TIFF data type `type`.
 *
 * Rationals are returned as numerator / denominator.
 */
export function readNumbers(
  bytes: Uint8Array,
  type: number,
  count: number,
  littleEndian: boolean,
  field = "tag value",
): number[] {
  const view = viewOf(bytes);
  const values: number[] = new Array(count);
  for (let i = 0; i < count; i++) {
    switch (type) {
      case TiffTagValueType.Uint8:
      case TiffTagValueType.Undefined:
        values[i] = view.getUint8(i);
        break;
      case TiffTagValueType.Int8:
        values[i] = view.getInt8(i);
        break;
      case TiffTagValueType.Uint16:
        values[i] = view.getUint16(i * 2, littleEndian);
        break;
      case TiffTagValueType.Int16:
        values[i] = view.getInt16(i * 2, littleEndian);
        break;
      case TiffTagValueType.Uint32:
        values[i] = view.getUint32(i * 4, littleEndian);
        break;
      case TiffTagValueType.Int32:
        values[i] = view.getInt32(i * 4, littleEndian);
        break;
      case TiffTagValueType.Rational:
        values[i] =
          view.getUint32(i * 8, littleEndian) /
          view.getUint32(i * 8 + 4, littleEndian);
        break;
      case TiffTagValueType.SignedRational:
        values[i] =
          view.getInt32(i * 8, littleEndian) /
          view.getInt32(i * 8 + 4, littleEndian);
        break;
      case TiffTagValueType.Float32:
        values[i] = view.getFloat32(i * 4, littleEndian);
        break;
      case TiffTagValueType.Float64:
        values[i] = view.getFloat64(i * 8, littleEndian);
        break;
      default:
        throw new FormatError(field, `data type ${type} is not numeric`);
    }
  }
  return values;
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse the GDAL nodata string.
 *
 * Returns null when the text is not a decimal number, "nan" or "inf".
 */
export function parseNoData(text: string): number | null {
  const trimmed = text.replace(/\0/g, "").trim();
  if (/^[+-]?nan$/i.test(trimmed)) {
    return Number.NaN;
  }
  if (/^[+-]?inf(inity)?$/i.test(trimmed)) {
    return trimmed.startsWith("-")
      ? Number.NEGATIVE_INFINITY
      : Number.POSITIVE_INFINITY;
  }
  if (trimmed === "") {
    return null;
  }
  if (!DECIMAL.test(trimmed)) {
    return null;
  }
  return Number(trimmed);
}

// ── Entry handling ───────────────────────────────────────────────────────────

type IfdState = {
  document: CogDocument;
  source: ByteSource;
  options: ReadOptions;
  littleEndian: boolean;
  level: RasterLevel;
  tiepoint: number[] | null;
  pixelScale: number[] | null;
};

function defaultLevel(index: number): RasterLevel {
  return {
    index,
    subfileType: 0,
    width: 0,
    height: 0,
    tileWidth: 0,
    tileHeight: 0,
    compression: Compression.None,
    predictor: Predictor.None,
    photometric: Photometric.MinIsBlack,
    samplesPerPixel: 1,
    bitsPerSample: 1,
    sampleFormat: SampleFormat.Uint,
    tileOffsets: [],
    tileByteCounts: [],
    unrecognizedTags: [],
  };
}

async function applyEntry(state: IfdState, entry: DirectoryEntry): Promise<void> {
  const { level, document } = state;
  const primary = level.index === 0;

  switch (entry.tag) {
    case TiffTag.SubFileType:
      level.subfileType = await single(state, entry, "NewSubfileType", [TiffTagValueType.Uint32]);
      break;
    case TiffTag.ImageWidth:
      level.width = await single(state, entry, "ImageWidth", SHORT_OR_LONG);
      break;
    case TiffTag.ImageHeight:
      level.height = await single(state, entry, "ImageLength", SHORT_OR_LONG);
      break;
    case TiffTag.TileWidth:
      level.tileWidth = await single(state, entry, "TileWidth", SHORT_OR_LONG);
      break;
    case TiffTag.TileHeight:
      level.tileHeight = await single(state, entry, "TileLength", SHORT_OR_LONG);
      break;
    case TiffTag.Compression:
      level.compression = await single(state, entry, "Compression", [TiffTagValueType.Uint16]);
      break;
    case TiffTag.Photometric:
      level.photometric = await single(state, entry, "PhotometricInterpretation", [
        TiffTagValueType.Uint16,
      ]);
      break;
    case TiffTag.SamplesPerPixel:
      level.samplesPerPixel = await single(state, entry, "SamplesPerPixel", [
        TiffTagValueType.Uint16,
      ]);
      break;
    case TiffTag.BitsPerSample:
      level.bitsPerSample = await first(state, entry, "BitsPerSample");
      break;
    case TiffTag.SampleFormat:
      level.sampleFormat = await first(state, entry, "SampleFormat");
      break;
    case TiffTag.PlanarConfiguration: {
      const planar = await first(state, entry, "PlanarConfiguration");
      if (planar !== PlanarConfiguration.Contig) {
        throw new UnsupportedFeatureError(
          `planar configuration other than chunky: ${planar}`,
        );
      }
      break;
    }
    case TiffTag.Predictor:
      level.predictor = await first(state, entry, "Predictor");
      if (
        level.predictor !== Predictor.None &&
        level.predictor !== Predictor.Horizontal
      ) {
        throw new UnsupportedFeatureError(
          `predictor other than 1 (none) or 2 (horizontal): ${level.predictor}`,
        );
      }
      break;
    case TiffTag.TileOffsets:
      level.tileOffsets = await numbers(state, entry, "TileOffsets", SHORT_OR_LONG);
      break;
    case TiffTag.TileByteCounts:
      level.tileByteCounts = await numbers(state, entry, "TileByteCounts", SHORT_OR_LONG);
      break;
    case TiffTag.ModelPixelScale:
      expectCount(entry, "ModelPixelScale", 3);
      state.pixelScale = await numbers(state, entry, "ModelPixelScale", [TiffTagValueType.Float64]);
      break;
    case TiffTag.ModelTiePoint:
      if (entry.count < 6) {
        throw new FormatError("ModelTiepoint", `count: ${entry.count} not recognised`);
      }
      state.tiepoint = await numbers(state, entry, "ModelTiepoint", [TiffTagValueType.Float64]);
      break;
    case TiffTag.ModelTransformation:
      throw new UnsupportedFeatureError("ModelTransformation georeferencing");
    case TiffTag.GeoKeyDirectory: {
      if (entry.count < 4) {
        throw new FormatError("GeoKeyDirectory", `count: ${entry.count} not recognised`);
      }
      const keys = await numbers(state, entry, "GeoKeyDirectory", [TiffTagValueType.Uint16]);
      if (primary) {
        document.geoKeys = readGeoKeys(keys);
      }
      break;
    }
    case TiffTag.GeoDoubleParams: {
      const params = await numbers(state, entry, "GeoDoubleParams", [TiffTagValueType.Float64]);
      if (primary) {
        document.geoDoubleParams = params;
      }
      break;
    }
    case TiffTag.GeoAsciiParams: {
      const params = await ascii(state, entry, "GeoAsciiParams");
      if (primary) {
        document.geoAsciiParams = params;
      }
      break;
    }
    case TiffTag.GdalMetadata: {
      const metadata = await ascii(state, entry, "GDALMetadata");
      if (primary) {
        document.metadata = trimNul(metadata);
      }
      break;
    }
    case TiffTag.GdalNoData: {
      const text = await ascii(state, entry, "GDALNoData");
      if (primary) {
        const nodata = parseNoData(text);
        if (nodata === null) {
          console.warn(
            `GDAL nodata value ${JSON.stringify(trimNul(text))} cannot be parsed; using 0`,
          );
        }
        document.nodata = nodata ?? 0;
      }
      break;
    }
    default:
      level.unrecognizedTags.push(entry.tag);
  }
}

const SHORT_OR_LONG = [TiffTagValueType.Uint16, TiffTagValueType.Uint32];

/**
 * Split the GeoKeyDirectory into its entries.
 *
 * The first four values are version, revision, minor revision and key count.
 */
function readGeoKeys(values: number[]): GeoKeyEntry[] {
  const [version, , , keyCount = 0] = values;
  if (version !== 1) {
    throw new FormatError("GeoKeyDirectory", `version: ${version} not recognised`);
  }
  if (values.length < 4 * (keyCount + 1)) {
    throw new FormatError(
      "GeoKeyDirectory",
      `${keyCount} keys declared but only ${values.length} values present`,
    );
  }

  const entries: GeoKeyEntry[] = [];
  for (let i = 1; i <= keyCount; i++) {
    entries.push({
      keyId: values[4 * i]!,
      location: values[4 * i + 1]!,
      count: values[4 * i + 2]!,
      valueOffset: values[4 * i + 3]!,
    });
  }
  return entries;
}

function expectType(entry: DirectoryEntry, field: string, types: readonly number[]): void {
  if (!types.includes(entry.type)) {
    throw new FormatError(field, `type: ${entry.type} not recognised`);
  }
}

function expectCount(entry: DirectoryEntry, field: string, count: number): void {
  if (entry.count !== count) {
    throw new FormatError(field, `count: ${entry.count} not recognised`);
  }
}

async function numbers(
  state: IfdState,
  entry: DirectoryEntry,
  field: string,
  types: readonly number[],
): Promise<number[]> {
  expectType(entry, field, types);
  const bytes = await resolveValue(state.source, entry.value, state.options);
  return readNumbers(bytes, entry.type, entry.count, state.littleEndian, field);
}

async function single(
  state: IfdState,
  entry: DirectoryEntry,
  field: string,
  types: readonly number[],
): Promise<number> {
  expectType(entry, field, types);
  expectCount(entry, field, 1);
  const [value] = await numbers(state, entry, field, types);
  return value!;
}

/** First value of a SHORT array tag; all samples share it since only one band is read. */
async function first(
  state: IfdState,
  entry: DirectoryEntry,
  field: string,
): Promise<number> {
  if (entry.count < 1) {
    throw new FormatError(field, `count: ${entry.count} not recognised`);
  }
  const [value] = await numbers(state, entry, field, [TiffTagValueType.Uint16]);
  return value!;
}

async function ascii(
  state: IfdState,
  entry: DirectoryEntry,
  field: string,
): Promise<string> {
  expectType(entry, field, [TiffTagValueType.Ascii]);
  const bytes = await resolveValue(state.source, entry.value, state.options);
  return Array.from(bytes, (b) => String.fromCharCode(b)).join("");
}

function trimNul(text: string): string {
  return text.replace(/^\0+|\0+$/g, "");
}

/** Read a directory structure; running off the end of the file is a format error. */
async function readStructure(
  source: ByteSource,
  offset: number,
  length: number,
  field: string,
  options: ReadOptions,
): Promise<Uint8Array> {
  try {
    return await source.readAt(offset, length, options);
  } catch (err) {
    if (err instanceof ShortReadError) {
      throw new FormatError(
        field,
        `truncated: needed ${length} bytes at offset ${offset}`,
      );
    }
    throw err;
  }
}

function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
