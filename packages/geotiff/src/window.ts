import { InvalidRequestError } from "./errors.js";

/** A rectangular subset of a raster level in pixel coordinates. */
export type Window = {
  /** Column offset (x position of the left edge). */
  colOff: number;
  /** Row offset (y position of the top edge). */
  rowOff: number;
  /** Width in pixels (number of columns). */
  width: number;
  /** Height in pixels (number of rows). */
  height: number;
};

/**
 * Create a Window from integer offsets and dimensions.
 *
 * Offsets may be negative; the window is clipped to the image when decoded.
 */
export function createWindow(
  colOff: number,
  rowOff: number,
  width: number,
  height: number,
): Window {
  for (const [name, value] of Object.entries({ colOff, rowOff, width, height })) {
    if (!Number.isInteger(value)) {
      throw new InvalidRequestError(`Window ${name} must be an integer, got ${value}`);
    }
  }

  if (width <= 0 || height <= 0) {
    throw new InvalidRequestError(
      `Window dimensions must be positive, got width=${width}, height=${height}`,
    );
  }

  return { colOff, rowOff, width, height };
}

/** Window covering a whole `width` × `height` image. */
export function fullWindow(size: { width: number; height: number }): Window {
  return { colOff: 0, rowOff: 0, width: size.width, height: size.height };
}

/**
 * Compute the intersection of two windows.
 *
 * Returns null if the windows do not overlap.
 */
export function intersectWindows(a: Window, b: Window): Window | null {
  const colOff = Math.max(a.colOff, b.colOff);
  const rowOff = Math.max(a.rowOff, b.rowOff);
  const width = Math.min(a.colOff + a.width, b.colOff + b.width) - colOff;
  const height = Math.min(a.rowOff + a.height, b.rowOff + b.height) - rowOff;

  if (width <= 0 || height <= 0) {
    return null;
  }

  return { colOff, rowOff, width, height };
}
