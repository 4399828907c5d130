import { SampleFormat } from "@cogeotiff/core";
import { UnsupportedFeatureError } from "./errors.js";
import type { Window } from "./window.js";

/** Single-band sample types this package decodes. */
export type SampleType = "uint8" | "uint16" | "int8" | "int16";

type SampleArrays = {
  uint8: Uint8Array;
  uint16: Uint16Array;
  int8: Int8Array;
  int16: Int16Array;
};

/** Fields shared by every sample type. */
type GrayRasterBase = {
  /** Pixel rectangle of the level this raster covers. */
  window: Window;

  /** Width in pixels; equals `window.width`. */
  width: number;

  /** Height in pixels; equals `window.height`. */
  height: number;

  /** Smallest representable sample value, for display stretching. */
  min: number;

  /** Largest representable sample value, for display stretching. */
  max: number;

  nodata: number | null;
};

type GrayRasterOf<T extends SampleType> = GrayRasterBase & {
  sampleType: T;
  /** Row-major samples, length = width * height. */
  data: SampleArrays[T];
};

/** Decoded single-band raster, tagged by sample type. */
export type GrayRaster = { [T in SampleType]: GrayRasterOf<T> }[SampleType];

/** Display range of each sample type. */
export const SAMPLE_RANGES: Record<SampleType, { min: number; max: number }> = {
  uint8: { min: 0, max: 255 },
  uint16: { min: 0, max: 65535 },
  int8: { min: -128, max: 127 },
  int16: { min: -32768, max: 32767 },
};

/** Data type names reported by the config and geo-info calls. */
export const DATA_TYPE_NAMES: Record<SampleType, string> = {
  uint8: "UInt8",
  uint16: "UInt16",
  int8: "Int8",
  int16: "Int16",
};

/** Bytes per sample. */
export function bytesPerSample(sampleType: SampleType): 1 | 2 {
  return sampleType === "uint8" || sampleType === "int8" ? 1 : 2;
}

/**
 * Select the sample type from BitsPerSample and SampleFormat.
 *
 * Only unsigned and signed integers of 8 or 16 bits are supported.
 */
export function sampleTypeOf(bitsPerSample: number, sampleFormat: number): SampleType {
  if (bitsPerSample !== 8 && bitsPerSample !== 16) {
    throw new UnsupportedFeatureError(`${bitsPerSample} bits per sample`);
  }

  switch (sampleFormat) {
    case SampleFormat.Uint:
      return bitsPerSample === 8 ? "uint8" : "uint16";
    case SampleFormat.Int:
      return bitsPerSample === 8 ? "int8" : "int16";
    default:
      throw new UnsupportedFeatureError(`sample format ${sampleFormat}`);
  }
}

/** Allocate a zero-filled raster for `window`. */
export function createGrayRaster(
  sampleType: SampleType,
  window: Window,
  nodata: number | null,
): GrayRaster {
  const { width, height } = window;
  const length = width * height;
  const base = { window, width, height, nodata, ...SAMPLE_RANGES[sampleType] };

  switch (sampleType) {
    case "uint8":
      return { ...base, sampleType, data: new Uint8Array(length) };
    case "uint16":
      return { ...base, sampleType, data: new Uint16Array(length) };
    case "int8":
      return { ...base, sampleType, data: new Int8Array(length) };
    case "int16":
      return { ...base, sampleType, data: new Int16Array(length) };
  }
}

/**
 * Sample at level pixel (col, row), or null outside the raster's window.
 */
export function getPixel(raster: GrayRaster, col: number, row: number): number | null {
  const x = col - raster.window.colOff;
  const y = row - raster.window.rowOff;
  if (x < 0 || y < 0 || x >= raster.width || y >= raster.height) {
    return null;
  }
  return raster.data[y * raster.width + x] ?? null;
}
