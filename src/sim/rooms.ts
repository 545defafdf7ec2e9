/**
 * Room rectangles and the carving helpers the generator uses on them.
 */
import type { Position, Room, TileMap } from "../shared/types.js";
import { invariant } from "../shared/errors.js";
import { carveTile } from "./tileMap.js";

export function createRoom(x: number, y: number, width: number, height: number): Room {
  invariant(width > 0 && height > 0, `room must have positive size, got ${width}x${height}`);
  return { x1: x, y1: y, x2: x + width, y2: y + height };
}

export function roomCenter(room: Room): Position {
  return {
    x: Math.floor((room.x1 + room.x2) / 2),
    y: Math.floor((room.y1 + room.y2) / 2),
  };
}

/**
 * Closed-interval overlap on both axes. Rooms that merely touch count as
 * intersecting.
 */
export function roomsIntersect(a: Room, b: Room): boolean {
  return a.x1 <= b.x2 && a.x2 >= b.x1 && a.y1 <= b.y2 && a.y2 >= b.y1;
}

/**
 * True when the position lies strictly inside the room's wall ring.
 */
export function isRoomInterior(room: Room, pos: Position): boolean {
  return pos.x > room.x1 && pos.x < room.x2 && pos.y > room.y1 && pos.y < room.y2;
}

export function carveRoom(map: TileMap, room: Room): void {
  for (let y = room.y1 + 1; y < room.y2; y++) {
    for (let x = room.x1 + 1; x < room.x2; x++) {
      carveTile(map, x, y);
    }
  }
}

export function carveHorizontalTunnel(map: TileMap, x1: number, x2: number, y: number): void {
  for (let x = Math.min(x1, x2); x <= Math.max(x1, x2); x++) {
    carveTile(map, x, y);
  }
}

export function carveVerticalTunnel(map: TileMap, y1: number, y2: number, x: number): void {
  for (let y = Math.min(y1, y2); y <= Math.max(y1, y2); y++) {
    carveTile(map, x, y);
  }
}
