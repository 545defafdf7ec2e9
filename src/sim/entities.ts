import type { Entity, EntityRegistry, EntitySpec, FighterStats, Position, TileMap } from "../shared/types.js";
import { AiKind, DeathVariant, ItemKind, MonsterKind } from "../shared/types.js";
import { COLORS, GLYPHS, ITEM_TEMPLATES, MONSTER_TEMPLATES, PLAYER_NAME } from "../shared/constants.js";
import { invariant } from "../shared/errors.js";
import { getTile } from "./tileMap.js";

/** The player always lives at the front of the registry. */
export const PLAYER_INDEX = 0;

// ── Registry ─────────────────────────────────────────────────

export function createRegistry(player: EntitySpec): EntityRegistry {
  const registry: EntityRegistry = { entities: [], nextId: 1 };
  spawnEntity(registry, player);
  return registry;
}

export function spawnEntity(registry: EntityRegistry, spec: EntitySpec): Entity {
  const entity: Entity = { ...spec, pos: { ...spec.pos }, id: registry.nextId++ };
  registry.entities.push(entity);
  return entity;
}

export function getPlayer(registry: EntityRegistry): Entity {
  return getEntity(registry, PLAYER_INDEX);
}

export function getEntity(registry: EntityRegistry, index: number): Entity {
  invariant(
    Number.isInteger(index) && index >= 0 && index < registry.entities.length,
    `entity index ${index} out of range (registry holds ${registry.entities.length})`,
  );
  return registry.entities[index];
}

/**
 * Fetch two distinct entities for a simultaneous update (attacker and
 * target). Asking for the same index twice is a programming error.
 */
export function getDisjointPair(registry: EntityRegistry, first: number, second: number): [Entity, Entity] {
  invariant(first !== second, `cannot borrow entity ${first} twice in one update`);
  return [getEntity(registry, first), getEntity(registry, second)];
}

/**
 * Remove by swapping the last entity into the vacated slot. Any index held
 * for the previously-last entity is stale afterwards.
 */
export function swapRemove(registry: EntityRegistry, index: number): Entity {
  invariant(index !== PLAYER_INDEX, "the player cannot be removed from the registry");
  const removed = getEntity(registry, index);
  const last = registry.entities.pop();
  if (last !== undefined && last !== removed) {
    registry.entities[index] = last;
  }
  return removed;
}

export function findEntityIndex(registry: EntityRegistry, id: number): number {
  return registry.entities.findIndex((e) => e.id === id);
}

export function entitiesAt(registry: EntityRegistry, x: number, y: number): Entity[] {
  return registry.entities.filter((e) => e.pos.x === x && e.pos.y === y);
}

/**
 * Blocked terrain, or a blocking entity standing on the tile.
 */
export function isBlocked(map: TileMap, registry: EntityRegistry, x: number, y: number): boolean {
  if (getTile(map, x, y).blocked) return true;
  return registry.entities.some((e) => e.blocks && e.pos.x === x && e.pos.y === y);
}

export function distanceBetween(a: Position, b: Position): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  return Math.sqrt(dx * dx + dy * dy);
}

// ── Factories ────────────────────────────────────────────────

export function createPlayer(stats: FighterStats, pos: Position = { x: 0, y: 0 }): EntitySpec {
  return {
    pos: { ...pos },
    glyph: GLYPHS.player,
    name: PLAYER_NAME,
    color: COLORS.player,
    blocks: true,
    alive: true,
    fighter: { ...stats, hp: stats.maxHp, onDeath: DeathVariant.Player },
  };
}

export function createMonster(kind: MonsterKind, pos: Position): EntitySpec {
  const t = MONSTER_TEMPLATES[kind];
  return {
    pos: { ...pos },
    glyph: t.glyph,
    name: t.name,
    color: t.color,
    blocks: true,
    alive: true,
    fighter: { maxHp: t.maxHp, hp: t.maxHp, defense: t.defense, power: t.power, onDeath: DeathVariant.Monster },
    ai: { kind: AiKind.Basic },
  };
}

export function createItem(kind: ItemKind, pos: Position): EntitySpec {
  const t = ITEM_TEMPLATES[kind];
  return {
    pos: { ...pos },
    glyph: t.glyph,
    name: t.name,
    color: t.color,
    blocks: false,
    alive: false,
    item: { kind },
  };
}
