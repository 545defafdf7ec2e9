import type { FighterStats, GameConfig } from "./types.js";
import { ItemKind, MonsterKind } from "./types.js";
import { invariant } from "./errors.js";

// ── Map defaults ─────────────────────────────────────────────
export const DEFAULT_MAP_WIDTH = 80;
export const DEFAULT_MAP_HEIGHT = 45;

// ── Default seed ─────────────────────────────────────────────
export const DEFAULT_SEED = 20231;

// ── Rooms ────────────────────────────────────────────────────
export const MAX_ROOMS = 30;
export const ROOM_MIN_SIZE = 6;
export const ROOM_MAX_SIZE = 10;

// ── Population ───────────────────────────────────────────────
export const MAX_ROOM_MONSTERS = 3;
export const MAX_ROOM_ITEMS = 2;
export const STRONG_MONSTER_CHANCE = 0.2; // troll; the rest are orcs

// ── Vision ───────────────────────────────────────────────────
export const FOV_RADIUS = 10;

// ── Combat / AI ──────────────────────────────────────────────
export const MELEE_RANGE = 2.0; // monsters closer than this attack instead of moving

// ── Player ───────────────────────────────────────────────────
export const PLAYER_NAME = "player";
export const PLAYER_STATS: FighterStats = { maxHp: 30, defense: 2, power: 5 };

// ── Items / inventory ────────────────────────────────────────
export const INVENTORY_CAPACITY = 26; // one slot per letter a-z
export const HEAL_AMOUNT = 4;

// ── Glyphs ───────────────────────────────────────────────────
export const GLYPHS = {
  player: "@",
  wall: "#",
  floor: ".",
  rememberedFloor: ",",
  unexplored: " ",
  corpse: "%",
  orc: "o",
  troll: "T",
  healingPotion: "!",
} as const;

// ── Colors ───────────────────────────────────────────────────
export const COLORS = {
  player: "#ffffff",
  orc: "#3f7f3f",
  troll: "#007f00",
  corpse: "#bf0000",
  healingPotion: "#7f00ff",
  darkWall: "#000064",
  lightWall: "#826e32",
  darkGround: "#323296",
  lightGround: "#c8b432",
} as const;

// ── Templates ────────────────────────────────────────────────
export interface MonsterTemplate extends FighterStats {
  name: string;
  glyph: string;
  color: string;
}

export const MONSTER_TEMPLATES: Record<MonsterKind, MonsterTemplate> = {
  [MonsterKind.Orc]: { name: "orc", glyph: GLYPHS.orc, color: COLORS.orc, maxHp: 10, defense: 0, power: 3 },
  [MonsterKind.Troll]: { name: "troll", glyph: GLYPHS.troll, color: COLORS.troll, maxHp: 16, defense: 1, power: 4 },
};

export interface ItemTemplate {
  name: string;
  glyph: string;
  color: string;
}

export const ITEM_TEMPLATES: Record<ItemKind, ItemTemplate> = {
  [ItemKind.Heal]: { name: "healing potion", glyph: GLYPHS.healingPotion, color: COLORS.healingPotion },
};

// ── Session config ───────────────────────────────────────────
export const DEFAULT_CONFIG: GameConfig = {
  mapWidth: DEFAULT_MAP_WIDTH,
  mapHeight: DEFAULT_MAP_HEIGHT,
  maxRooms: MAX_ROOMS,
  roomMinSize: ROOM_MIN_SIZE,
  roomMaxSize: ROOM_MAX_SIZE,
  maxRoomMonsters: MAX_ROOM_MONSTERS,
  maxRoomItems: MAX_ROOM_ITEMS,
  fovRadius: FOV_RADIUS,
  inventoryCapacity: INVENTORY_CAPACITY,
  healAmount: HEAL_AMOUNT,
  player: PLAYER_STATS,
};

/**
 * Merge overrides onto the defaults. Player stats merge field by field.
 * Inventory capacity is capped at one slot per menu letter.
 */
export function resolveConfig(overrides: Partial<GameConfig> = {}): GameConfig {
  const config: GameConfig = {
    ...DEFAULT_CONFIG,
    ...overrides,
    player: { ...DEFAULT_CONFIG.player, ...overrides.player },
  };
  invariant(
    Number.isInteger(config.inventoryCapacity) && config.inventoryCapacity >= 0 && config.inventoryCapacity <= INVENTORY_CAPACITY,
    `inventoryCapacity must be an integer in 0..${INVENTORY_CAPACITY}, got ${config.inventoryCapacity}`,
  );
  return config;
}
