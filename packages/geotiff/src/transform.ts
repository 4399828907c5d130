import type { GeoTransform } from "./geotransform.js";

/** Which point of a pixel {@link xy} returns. */
export type PixelOffset = "center" | "ul" | "ur" | "ll" | "lr";

const OFFSETS: Record<PixelOffset, [dCol: number, dRow: number]> = {
  center: [0.5, 0.5],
  ul: [0, 0],
  ur: [1, 0],
  ll: [0, 1],
  lr: [1, 1],
};

/**
 * Get the (row, col) pixel index containing the world coordinate (x, y).
 *
 * @param op  Rounding applied to fractional indices. Defaults to Math.floor.
 * @returns   [row, col]
 */
export function index(
  gt: GeoTransform,
  x: number,
  y: number,
  op: (n: number) => number = Math.floor,
): [number, number] {
  const [col, row] = applyGeoTransform(invertGeoTransform(gt), x, y);
  return [op(row), op(col)];
}

/**
 * Get the world (x, y) coordinate of a point of the pixel at (row, col).
 *
 * @returns [x, y]
 */
export function xy(
  gt: GeoTransform,
  row: number,
  col: number,
  offset: PixelOffset = "center",
): [number, number] {
  const [dCol, dRow] = OFFSETS[offset];
  return applyGeoTransform(gt, col + dCol, row + dRow);
}

/**
 * Map pixel (col, row) through a GDAL geotransform.
 *
 *   x = gt[0] + col * gt[1] + row * gt[2]
 *   y = gt[3] + col * gt[4] + row * gt[5]
 */
export function applyGeoTransform(
  gt: GeoTransform,
  col: number,
  row: number,
): [number, number] {
  return [gt[0] + col * gt[1] + row * gt[2], gt[3] + col * gt[4] + row * gt[5]];
}

/** Geotransform mapping world coordinates back to pixel space. */
export function invertGeoTransform(gt: GeoTransform): GeoTransform {
  const [c, a, b, f, d, e] = gt;
  const det = a * e - b * d;

  if (det === 0) {
    throw new Error("Cannot invert degenerate transform");
  }

  const ra = e / det;
  const rb = -b / det;
  const rd = -d / det;
  const re = a / det;

  return [-c * ra - f * rb, ra, rb, -c * rd - f * re, rd, re];
}
