import type { Tile, TileMap } from "../shared/types.js";
import { invariant } from "../shared/errors.js";

export function wallTile(): Tile {
  return { blocked: true, blocksSight: true, explored: false };
}

export function floorTile(): Tile {
  return { blocked: false, blocksSight: false, explored: false };
}

/**
 * Build a grid with every tile blocked and opaque.
 */
export function createTileMap(width: number, height: number): TileMap {
  invariant(Number.isInteger(width) && width > 0, `map width must be a positive integer, got ${width}`);
  invariant(Number.isInteger(height) && height > 0, `map height must be a positive integer, got ${height}`);
  const tiles: Tile[][] = [];
  for (let y = 0; y < height; y++) {
    tiles[y] = [];
    for (let x = 0; x < width; x++) {
      tiles[y][x] = wallTile();
    }
  }
  return { width, height, tiles };
}

export function inBounds(map: TileMap, x: number, y: number): boolean {
  return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && x < map.width && y >= 0 && y < map.height;
}

export function getTile(map: TileMap, x: number, y: number): Tile {
  invariant(inBounds(map, x, y), `tile (${x}, ${y}) is outside the ${map.width}x${map.height} map`);
  return map.tiles[y][x];
}

/**
 * Open a tile for movement and sight. The explored latch is left alone.
 */
export function carveTile(map: TileMap, x: number, y: number): void {
  const tile = getTile(map, x, y);
  Object.assign(tile, floorTile(), { explored: tile.explored });
}

export function countOpenTiles(map: TileMap): number {
  let open = 0;
  for (const row of map.tiles) {
    for (const tile of row) {
      if (!tile.blocked) open++;
    }
  }
  return open;
}
