import { TiffTag, TiffTagValueType } from "@cogeotiff/core";
import type { CogDocument, RasterLevel } from "../src/ifd.js";
import { TYPE_SIZES } from "../src/ifd.js";
import type { ChunkSource, ReadOptions } from "../src/range-cache.js";

/**
 * In-process Source for tests
 *
 * Serves byte-range fetches from a buffer and records every request, so tests
 * can count the round trips a read costs.
 */
export class MemorySource implements ChunkSource {
  readonly url = new URL("memory://test.tif");
  readonly fetches: { offset: number; length: number | undefined }[] = [];
  heads = 0;

  /** Fetch offsets that fail with an error. */
  readonly failing = new Set<number>();

  constructor(readonly bytes: Uint8Array) {}

  async fetch(offset: number, length?: number, _options?: ReadOptions): Promise<ArrayBuffer> {
    this.fetches.push({ offset, length });
    if (this.failing.has(offset)) {
      throw new Error(`connection reset at ${offset}`);
    }
    const end = length === undefined ? this.bytes.length : offset + length;
    return toArrayBuffer(this.bytes.subarray(offset, end));
  }

  async head(): Promise<{ size?: number }> {
    this.heads++;
    return { size: this.bytes.length };
  }
}

export function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

/** Bytes 0, 1, 2, ... wrapping at 256. */
export function sequentialBytes(length: number): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => i % 256);
}

// ── TIFF writer ─────────────────────────────────────────────────────────

/** One tag to write. Strings are written as ASCII bytes, verbatim. */
export type TagSpec = {
  tag: number;
  type: number;
  values: readonly number[] | string;
};

export type IfdSpec = {
  tags: TagSpec[];
  /**
   * Tile payloads. When given, TileOffsets and TileByteCounts (LONG) are
   * added and point at the payloads.
   */
  tiles?: Uint8Array[];
};

export type TiffOptions = {
  littleEndian?: boolean;
  /** Point the last IFD back at the first. */
  loopBack?: boolean;
  /** Override the version number in the header. */
  version?: number;
};

type Placed = {
  spec: TagSpec;
  count: number;
  byteLength: number;
  /** Absolute offset of out-of-line data, or null when inline. */
  dataOffset: number | null;
};

/**
 * Write a classic TIFF: header, then each IFD followed by its out-of-line
 * values and its tiles.
 */
export function buildTiff(ifds: IfdSpec[], options: TiffOptions = {}): Uint8Array {
  const { littleEndian = true, loopBack = false, version = 42 } = options;

  // Layout pass.
  let position = 8;
  const layouts = ifds.map((ifd) => {
    const tiles = ifd.tiles ?? [];
    const specs = [...ifd.tags];
    if (ifd.tiles) {
      specs.push(
        { tag: TiffTag.TileOffsets, type: TiffTagValueType.Uint32, values: tiles.map(() => 0) },
        { tag: TiffTag.TileByteCounts, type: TiffTagValueType.Uint32, values: tiles.map((t) => t.length) },
      );
    }
    specs.sort((a, b) => a.tag - b.tag);

    const ifdOffset = position;
    position += 2 + specs.length * 12 + 4;

    const placed: Placed[] = specs.map((spec) => {
      const count = spec.values.length;
      const byteLength = count * (TYPE_SIZES[spec.type] ?? 1);
      let dataOffset: number | null = null;
      if (byteLength > 4) {
        dataOffset = position;
        position += byteLength;
      }
      return { spec, count, byteLength, dataOffset };
    });

    const tileOffsets = tiles.map((tile) => {
      const offset = position;
      position += tile.length;
      return offset;
    });

    for (const p of placed) {
      if (p.spec.tag === TiffTag.TileOffsets && ifd.tiles) {
        p.spec = { ...p.spec, values: tileOffsets };
      }
    }

    return { ifdOffset, placed, tiles, tileOffsets };
  });

  // Write pass.
  const out = new Uint8Array(position);
  const view = new DataView(out.buffer);
  out[0] = out[1] = littleEndian ? 0x49 : 0x4d;
  view.setUint16(2, version, littleEndian);
  view.setUint32(4, layouts[0]?.ifdOffset ?? 0, littleEndian);

  layouts.forEach((layout, i) => {
    let at = layout.ifdOffset;
    view.setUint16(at, layout.placed.length, littleEndian);
    at += 2;

    for (const p of layout.placed) {
      view.setUint16(at, p.spec.tag, littleEndian);
      view.setUint16(at + 2, p.spec.type, littleEndian);
      view.setUint32(at + 4, p.count, littleEndian);
      writeValues(view, p.dataOffset ?? at + 8, p.spec, littleEndian);
      if (p.dataOffset !== null) {
        view.setUint32(at + 8, p.dataOffset, littleEndian);
      }
      at += 12;
    }

    const next = layouts[i + 1]?.ifdOffset ?? (loopBack ? (layouts[0]?.ifdOffset ?? 0) : 0);
    view.setUint32(at, next, littleEndian);

    layout.tiles.forEach((tile, t) => {
      out.set(tile, layout.tileOffsets[t] ?? 0);
    });
  });

  return out;
}

function writeValues(view: DataView, at: number, spec: TagSpec, le: boolean): void {
  const size = TYPE_SIZES[spec.type] ?? 1;
  for (let i = 0; i < spec.values.length; i++) {
    const value = typeof spec.values === "string" ? spec.values.charCodeAt(i) : (spec.values[i] ?? 0);
    const o = at + i * size;
    switch (spec.type) {
      case TiffTagValueType.Uint8:
      case TiffTagValueType.Ascii:
      case TiffTagValueType.Undefined:
        view.setUint8(o, value);
        break;
      case TiffTagValueType.Int8:
        view.setInt8(o, value);
        break;
      case TiffTagValueType.Uint16:
        view.setUint16(o, value, le);
        break;
      case TiffTagValueType.Int16:
        view.setInt16(o, value, le);
        break;
      case TiffTagValueType.Uint32:
        view.setUint32(o, value, le);
        break;
      case TiffTagValueType.Int32:
        view.setInt32(o, value, le);
        break;
      case TiffTagValueType.Float32:
        view.setFloat32(o, value, le);
        break;
      case TiffTagValueType.Float64:
        view.setFloat64(o, value, le);
        break;
      default:
        throw new Error(`writer does not handle type ${spec.type}`);
    }
  }
}

export const short = (tag: number, ...values: number[]): TagSpec => ({
  tag,
  type: TiffTagValueType.Uint16,
  values,
});

export const long = (tag: number, ...values: number[]): TagSpec => ({
  tag,
  type: TiffTagValueType.Uint32,
  values,
});

export const double = (tag: number, ...values: number[]): TagSpec => ({
  tag,
  type: TiffTagValueType.Float64,
  values,
});

export const ascii = (tag: number, text: string): TagSpec => ({
  tag,
  type: TiffTagValueType.Ascii,
  values: text,
});

/** Tags of a tiled, single-band, BlackIsZero level. */
export function rasterTags(opts: {
  width: number;
  height: number;
  tileWidth: number;
  tileHeight: number;
  bitsPerSample?: number;
  sampleFormat?: number;
  compression?: number;
  predictor?: number;
  subfileType?: number;
}): TagSpec[] {
  const tags = [
    short(TiffTag.ImageWidth, opts.width),
    short(TiffTag.ImageHeight, opts.height),
    short(TiffTag.BitsPerSample, opts.bitsPerSample ?? 8),
    short(TiffTag.Compression, opts.compression ?? 1),
    short(TiffTag.Photometric, 1),
    short(TiffTag.SamplesPerPixel, 1),
    short(TiffTag.PlanarConfiguration, 1),
    short(TiffTag.TileWidth, opts.tileWidth),
    short(TiffTag.TileHeight, opts.tileHeight),
    short(TiffTag.SampleFormat, opts.sampleFormat ?? 1),
  ];
  if (opts.predictor !== undefined) {
    tags.push(short(TiffTag.Predictor, opts.predictor));
  }
  if (opts.subfileType !== undefined) {
    tags.push(long(TiffTag.SubFileType, opts.subfileType));
  }
  return tags;
}

// ── Encoders ────────────────────────────────────────────────────────────

/**
 * TIFF LZW stream made of literal codes only: Clear, one 9-bit code per
 * byte, EndOfInformation, packed MSB first.
 */
export function lzwLiterals(data: Uint8Array): Uint8Array {
  // Past ~250 codes the decoder widens to 10 bits.
  if (data.length > 250) {
    throw new Error("lzwLiterals only emits 9-bit codes");
  }
  const codes = [256, ...data, 257];
  const out = new Uint8Array(Math.ceil((codes.length * 9) / 8));
  let bit = 0;
  for (const code of codes) {
    for (let b = 8; b >= 0; b--) {
      if ((code >> b) & 1) {
        out[bit >> 3]! |= 0x80 >> (bit & 7);
      }
      bit++;
    }
  }
  return out;
}

/** PackBits stream of literal runs of at most 128 bytes. */
export function packBitsLiterals(data: Uint8Array): Uint8Array {
  const out: number[] = [];
  for (let i = 0; i < data.length; i += 128) {
    const run = data.subarray(i, i + 128);
    out.push(run.length - 1, ...run);
  }
  return Uint8Array.from(out);
}

/** PackBits repeat run: `count` (2..128) copies of `value`. */
export function packBitsRepeat(value: number, count: number): Uint8Array {
  return Uint8Array.from([(1 - count) & 0xff, value]);
}

// ── Parsed-document fixtures ────────────────────────────────────────────

export function makeLevel(overrides: Partial<RasterLevel> = {}): RasterLevel {
  return {
    index: 0,
    subfileType: 0,
    width: 16,
    height: 16,
    tileWidth: 16,
    tileHeight: 16,
    compression: 1,
    predictor: 1,
    photometric: 1,
    samplesPerPixel: 1,
    bitsPerSample: 8,
    sampleFormat: 1,
    tileOffsets: [0],
    tileByteCounts: [256],
    unrecognizedTags: [],
    ...overrides,
  };
}

export function makeDocument(overrides: Partial<CogDocument> = {}): CogDocument {
  return {
    byteOrder: "little",
    levels: [makeLevel()],
    geoTransform: [0, 1, 0, 0, 0, 1],
    nodata: null,
    metadata: null,
    geoDoubleParams: null,
    geoAsciiParams: null,
    geoKeys: [],
    ...overrides,
  };
}
