import type { GameState, Position, SimEvent } from "../shared/types.js";
import { MELEE_RANGE } from "../shared/constants.js";
import { attack } from "./combat.js";
import { PLAYER_INDEX, distanceBetween, getEntity } from "./entities.js";
import { moveBy } from "./actions.js";
import { isVisible } from "./vision.js";

/** Round half away from zero, without producing -0. */
function roundAway(v: number): number {
  const r = Math.round(Math.abs(v));
  return r === 0 ? 0 : Math.sign(v) * r;
}

/**
 * Unit step toward a target: normalise the displacement, then round each
 * axis independently. Yields one of the eight neighbours (or no step when
 * already on the target).
 */
export function stepToward(from: Position, target: Position): Position {
  const dx = target.x - from.x;
  const dy = target.y - from.y;
  const distance = Math.sqrt(dx * dx + dy * dy);
  if (distance === 0) return { x: 0, y: 0 };
  return { x: roundAway(dx / distance), y: roundAway(dy / distance) };
}

export function moveTowards(state: GameState, index: number, target: Position): SimEvent {
  const entity = getEntity(state.registry, index);
  const delta = stepToward(entity.pos, target);
  return moveBy(state, index, delta.x, delta.y);
}

/**
 * One decision for a basic monster, recomputed from scratch every call.
 *
 * Monsters only act while they stand in the player's field of view; the
 * player's sight doubles as theirs. Out of melee range they close in,
 * otherwise they hit the player if it still has hp.
 */
export function aiTakeTurn(state: GameState, index: number): SimEvent[] {
  const monster = getEntity(state.registry, index);
  if (!monster.ai) return [];
  if (!isVisible(state.visibility, monster.pos.x, monster.pos.y)) return [];

  const player = getEntity(state.registry, PLAYER_INDEX);
  if (distanceBetween(monster.pos, player.pos) >= MELEE_RANGE) {
    return [moveTowards(state, index, player.pos)];
  }
  if (player.fighter !== undefined && player.fighter.hp > 0) {
    return attack(state.registry, index, PLAYER_INDEX);
  }
  return [];
}
