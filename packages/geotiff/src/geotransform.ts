import { InvalidRequestError } from "./errors.js";
import type { CogDocument } from "./ifd.js";

/**
 * GDAL-ordered geotransform
 * `[originX, pixelWidth, rowRotation, originY, colRotation, pixelHeight]`.
 *
 * Rotation terms are always 0 for files this package reads.
 */
export type GeoTransform = [number, number, number, number, number, number];

/** Identity transform used when a file carries no tiepoint. */
export const DEFAULT_GEOTRANSFORM: GeoTransform = [0, 1, 0, 0, 0, 1];

/**
 * Build the level-0 geotransform from ModelTiepoint and ModelPixelScale.
 *
 * The tiepoint ties raster point (I, J) to model point (X, Y); the origin is
 * moved back to raster (0, 0). Pixel height is negated so rows run south.
 * Either tag may be missing: the origin then stays at 0, or the scale at 1.
 */
export function geotransformFromTags(
  tiepoint: readonly number[] | null,
  pixelScale: readonly number[] | null,
): GeoTransform {
  const [i = 0, j = 0, , x = 0, y = 0] = tiepoint ?? [];
  const [scaleX = 1, scaleY = 1] = pixelScale ?? [];
  return [x - i * scaleX, scaleX, 0, y + j * scaleY, 0, -scaleY];
}

/**
 * Geotransform of one resolution level.
 *
 * Overviews share the origin of level 0; pixel sizes grow by the integer
 * ratio between the full-resolution and overview dimensions.
 */
export function geotransformFor(
  document: CogDocument,
  level: number,
): GeoTransform {
  const full = document.levels[0];
  const target = document.levels[level];
  if (full === undefined || target === undefined) {
    throw new InvalidRequestError(
      `level ${level} out of range; file has ${document.levels.length} levels`,
    );
  }

  const gt = document.geoTransform;
  if (level === 0) {
    return [...gt];
  }

  const scaleX = Math.floor(full.width / target.width);
  const scaleY = Math.floor(full.height / target.height);
  return [gt[0], gt[1] * scaleX, gt[2], gt[3], gt[4], gt[5] * scaleY];
}
