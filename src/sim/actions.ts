import type { Direction, GameState, Position, SimEvent } from "../shared/types.js";
import { attack } from "./combat.js";
import { PLAYER_INDEX, getEntity, isBlocked } from "./entities.js";

const DIRECTION_DELTAS: Record<Direction, Position> = {
  north: { x: 0, y: -1 },
  south: { x: 0, y: 1 },
  east: { x: 1, y: 0 },
  west: { x: -1, y: 0 },
  northeast: { x: 1, y: -1 },
  northwest: { x: -1, y: -1 },
  southeast: { x: 1, y: 1 },
  southwest: { x: -1, y: 1 },
};

export function getDirectionDelta(dir: Direction): Position {
  return DIRECTION_DELTAS[dir];
}

/**
 * Step an entity by (dx, dy) unless terrain or a blocking entity is in the
 * way, in which case it stays put.
 */
export function moveBy(state: GameState, index: number, dx: number, dy: number): SimEvent {
  const entity = getEntity(state.registry, index);
  const from = { ...entity.pos };
  const to = { x: from.x + dx, y: from.y + dy };
  if (isBlocked(state.map, state.registry, to.x, to.y)) {
    return { type: "blocked", entityId: entity.id, at: to };
  }
  entity.pos = to;
  return { type: "move", entityId: entity.id, from, to };
}

/**
 * Player bump: the first entity with a Fighter on the destination tile is
 * attacked, otherwise the player walks there.
 */
export function playerMoveOrAttack(state: GameState, dx: number, dy: number): SimEvent[] {
  const player = getEntity(state.registry, PLAYER_INDEX);
  const x = player.pos.x + dx;
  const y = player.pos.y + dy;

  const targetIndex = state.registry.entities.findIndex(
    (e) => e.fighter !== undefined && e.pos.x === x && e.pos.y === y,
  );
  if (targetIndex >= 0) {
    return attack(state.registry, PLAYER_INDEX, targetIndex);
  }
  return [moveBy(state, PLAYER_INDEX, dx, dy)];
}
