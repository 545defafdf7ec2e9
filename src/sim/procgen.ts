import * as ROT from "rot-js";
import type { EntityRegistry, GameConfig, GameState, Position, Rng, Room, TileMap } from "../shared/types.js";
import { ItemKind, MonsterKind } from "../shared/types.js";
import { DEFAULT_SEED, STRONG_MONSTER_CHANCE } from "../shared/constants.js";
import { invariant } from "../shared/errors.js";
import { createItem, createMonster, getPlayer, isBlocked, spawnEntity } from "./entities.js";
import { carveHorizontalTunnel, carveRoom, carveVerticalTunnel, createRoom, roomCenter, roomsIntersect } from "./rooms.js";
import { createEmptyState } from "./state.js";
import { createTileMap } from "./tileMap.js";
import { refreshVisibility, setupVisibility } from "./vision.js";

export interface DungeonParams {
  mapWidth: number;
  mapHeight: number;
  maxRooms: number;
  roomMinSize: number;
  roomMaxSize: number;
  maxRoomMonsters: number;
  maxRoomItems: number;
}

export interface DungeonLayout {
  map: TileMap;
  rooms: Room[];
  /** Center of the first accepted room; unset when no room was accepted. */
  playerSpawn: Position | undefined;
}

function checkParams(p: DungeonParams): void {
  invariant(p.maxRooms >= 0, `maxRooms must be >= 0, got ${p.maxRooms}`);
  invariant(p.roomMinSize >= 2, `roomMinSize must leave an interior (>= 2), got ${p.roomMinSize}`);
  invariant(p.roomMinSize <= p.roomMaxSize, `roomMinSize ${p.roomMinSize} exceeds roomMaxSize ${p.roomMaxSize}`);
  invariant(
    p.roomMaxSize < p.mapWidth && p.roomMaxSize < p.mapHeight,
    `rooms up to ${p.roomMaxSize} wide do not fit a ${p.mapWidth}x${p.mapHeight} map`,
  );
  invariant(p.maxRoomMonsters >= 0 && p.maxRoomItems >= 0, "per-room population caps must be >= 0");
}

/**
 * Carve rooms and corridors into an all-wall map and populate the registry.
 *
 * `maxRooms` attempts, each a random rectangle rejected outright when it
 * intersects an accepted room. Every accepted room is joined to the room
 * accepted just before it by an L-shaped corridor between the two centers,
 * so the rooms form a single chain. The player (registry slot 0) is moved
 * to the first room's center before that room is populated.
 *
 * RNG draws per attempt: width, height, x, y; on acceptance the room's
 * population (see placeObjects) and then, from the second room on, one
 * coin flip for the corridor's bend.
 */
export function generateDungeon(params: DungeonParams, registry: EntityRegistry, rng: Rng): DungeonLayout {
  checkParams(params);
  const map = createTileMap(params.mapWidth, params.mapHeight);
  const rooms: Room[] = [];
  let playerSpawn: Position | undefined;

  for (let attempt = 0; attempt < params.maxRooms; attempt++) {
    const w = rng.getUniformInt(params.roomMinSize, params.roomMaxSize);
    const h = rng.getUniformInt(params.roomMinSize, params.roomMaxSize);
    const x = rng.getUniformInt(0, params.mapWidth - w - 1);
    const y = rng.getUniformInt(0, params.mapHeight - h - 1);
    const room = createRoom(x, y, w, h);

    if (rooms.some((other) => roomsIntersect(room, other))) continue;

    carveRoom(map, room);
    const center = roomCenter(room);
    if (rooms.length === 0) {
      playerSpawn = center;
      getPlayer(registry).pos = { ...center };
    }

    placeObjects(room, map, registry, rng, params);

    const prev = rooms[rooms.length - 1];
    if (prev) {
      const prevCenter = roomCenter(prev);
      if (rng.getUniform() < 0.5) {
        carveHorizontalTunnel(map, prevCenter.x, center.x, prevCenter.y);
        carveVerticalTunnel(map, prevCenter.y, center.y, center.x);
      } else {
        carveVerticalTunnel(map, prevCenter.y, center.y, prevCenter.x);
        carveHorizontalTunnel(map, prevCenter.x, center.x, center.y);
      }
    }

    rooms.push(room);
  }

  return { map, rooms, playerSpawn };
}

/**
 * Monsters, then items. Each placement samples one interior cell and is
 * skipped, not retried, when the cell is blocked.
 */
function placeObjects(room: Room, map: TileMap, registry: EntityRegistry, rng: Rng, params: DungeonParams): void {
  const monsterCount = rng.getUniformInt(0, params.maxRoomMonsters);
  for (let i = 0; i < monsterCount; i++) {
    const pos = randomInteriorCell(room, rng);
    if (isBlocked(map, registry, pos.x, pos.y)) continue;
    const kind = rng.getUniform() < 1 - STRONG_MONSTER_CHANCE ? MonsterKind.Orc : MonsterKind.Troll;
    spawnEntity(registry, createMonster(kind, pos));
  }

  const itemCount = rng.getUniformInt(0, params.maxRoomItems);
  for (let i = 0; i < itemCount; i++) {
    const pos = randomInteriorCell(room, rng);
    if (isBlocked(map, registry, pos.x, pos.y)) continue;
    spawnEntity(registry, createItem(ItemKind.Heal, pos));
  }
}

function randomInteriorCell(room: Room, rng: Rng): Position {
  return {
    x: rng.getUniformInt(room.x1 + 1, room.x2 - 1),
    y: rng.getUniformInt(room.y1 + 1, room.y2 - 1),
  };
}

/**
 * Build a complete session from a seed. Seeds the global rot-js RNG, so
 * the same seed and config always give the same dungeon.
 */
export function generate(seed: number = DEFAULT_SEED, overrides: Partial<GameConfig> = {}): GameState {
  const state = createEmptyState(seed, overrides);

  ROT.RNG.setSeed(seed);

  const layout = generateDungeon(state.config, state.registry, ROT.RNG);
  invariant(layout.playerSpawn !== undefined, "dungeon generation accepted no rooms; request at least one room");

  state.map = layout.map;
  state.rooms = layout.rooms;
  state.visibility = setupVisibility(state.map);
  refreshVisibility(state);
  return state;
}
