import type { Window } from "./window.js";

/** Interface for objects that are tiled and can provide tile dimensions. */
interface IsTiled {
  /** The width of tiles in pixels. */
  readonly tileWidth: number;

  /** The height of tiles in pixels. */
  readonly tileHeight: number;

  /** The height of the image in pixels. */
  readonly height: number;

  /** The width of the image in pixels. */
  readonly width: number;
}

/** Position of one tile in a level's tile grid. */
export type TileIndex = {
  /** Tile column. */
  x: number;
  /** Tile row. */
  y: number;
};

/** The number of tiles in the x and y directions */
export function tileCount(self: IsTiled): [number, number] {
  return [
    Math.ceil(self.width / self.tileWidth),
    Math.ceil(self.height / self.tileHeight),
  ];
}

/**
 * Tiles overlapping `window`, row by row.
 *
 * Columns are found from the tile width and rows from the tile height.
 */
export function tilesIntersecting(self: IsTiled, window: Window): TileIndex[] {
  const [across, down] = tileCount(self);
  const xStart = Math.floor(window.colOff / self.tileWidth);
  const xEnd = Math.min(
    Math.ceil((window.colOff + window.width) / self.tileWidth),
    across,
  );
  const yStart = Math.floor(window.rowOff / self.tileHeight);
  const yEnd = Math.min(
    Math.ceil((window.rowOff + window.height) / self.tileHeight),
    down,
  );

  const tiles: TileIndex[] = [];
  for (let y = yStart; y < yEnd; y++) {
    for (let x = xStart; x < xEnd; x++) {
      tiles.push({ x, y });
    }
  }
  return tiles;
}

/**
 * Pixel rectangle a tile covers, clipped at the right and bottom image
 * edges.
 */
export function tileWindow(self: IsTiled, { x, y }: TileIndex): Window {
  const colOff = x * self.tileWidth;
  const rowOff = y * self.tileHeight;
  return {
    colOff,
    rowOff,
    width: Math.min(self.tileWidth, self.width - colOff),
    height: Math.min(self.tileHeight, self.height - rowOff),
  };
}
