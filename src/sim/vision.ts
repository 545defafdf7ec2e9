import * as ROT from "rot-js";
import type { GameState, TileMap, Visibility } from "../shared/types.js";
import { invariant } from "../shared/errors.js";
import { getPlayer } from "./entities.js";
import { getTile, inBounds } from "./tileMap.js";

/**
 * Derive static transparency and walkability from the map. Done once per
 * session; the map's terrain never changes after generation.
 */
export function setupVisibility(map: TileMap): Visibility {
  const size = map.width * map.height;
  const transparent: boolean[] = new Array<boolean>(size);
  const walkable: boolean[] = new Array<boolean>(size);
  for (let y = 0; y < map.height; y++) {
    for (let x = 0; x < map.width; x++) {
      const tile = map.tiles[y][x];
      transparent[y * map.width + x] = !tile.blocksSight;
      walkable[y * map.width + x] = !tile.blocked;
    }
  }
  return {
    width: map.width,
    height: map.height,
    transparent,
    walkable,
    visible: new Array<boolean>(size).fill(false),
  };
}

function indexOf(vis: Visibility, x: number, y: number): number {
  invariant(
    Number.isInteger(x) && Number.isInteger(y) && x >= 0 && x < vis.width && y >= 0 && y < vis.height,
    `visibility query (${x}, ${y}) is outside the ${vis.width}x${vis.height} map`,
  );
  return y * vis.width + x;
}

/**
 * Recompute the visible set from one observer.
 *
 * PreciseShadowcasting over 8-connected rings, clipped to a disc of
 * `radius` (dx² + dy² <= radius²). Opaque tiles at the edge of the lit area
 * are themselves visible, so walls around a lit room show up. Every tile
 * marked visible also latches `explored` on the map.
 */
export function recomputeVisibility(
  vis: Visibility,
  map: TileMap,
  observerX: number,
  observerY: number,
  radius: number,
): void {
  indexOf(vis, observerX, observerY);
  vis.visible.fill(false);

  const lightPasses = (x: number, y: number): boolean => {
    if (x < 0 || x >= vis.width || y < 0 || y >= vis.height) return false;
    return vis.transparent[y * vis.width + x];
  };

  const fov = new ROT.FOV.PreciseShadowcasting(lightPasses, { topology: 8 });
  fov.compute(observerX, observerY, radius, (x: number, y: number, _r: number, _vis: number) => {
    if (!inBounds(map, x, y)) return;
    const dx = x - observerX;
    const dy = y - observerY;
    if (dx * dx + dy * dy > radius * radius) return;
    vis.visible[y * vis.width + x] = true;
    getTile(map, x, y).explored = true;
  });
}

export function isVisible(vis: Visibility, x: number, y: number): boolean {
  return vis.visible[indexOf(vis, x, y)];
}

export function isExplored(map: TileMap, x: number, y: number): boolean {
  return getTile(map, x, y).explored;
}

export function isWalkable(vis: Visibility, x: number, y: number): boolean {
  return vis.walkable[indexOf(vis, x, y)];
}

export function countVisible(vis: Visibility): number {
  return vis.visible.filter(Boolean).length;
}

/**
 * Recompute the player's view only when the player has moved since the last
 * computation. Returns whether a recompute happened.
 */
export function refreshVisibility(state: GameState, force = false): boolean {
  const pos = getPlayer(state.registry).pos;
  const last = state.lastFovOrigin;
  if (!force && last !== null && last.x === pos.x && last.y === pos.y) return false;
  recomputeVisibility(state.visibility, state.map, pos.x, pos.y, state.config.fovRadius);
  state.lastFovOrigin = { x: pos.x, y: pos.y };
  return true;
}
