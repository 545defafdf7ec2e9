import type { Entity, EntityRegistry, SimEvent } from "../shared/types.js";
import { DeathVariant } from "../shared/types.js";
import { COLORS, GLYPHS } from "../shared/constants.js";
import { getDisjointPair } from "./entities.js";

/**
 * Raw damage before flooring: attacker power minus target defense.
 * A target without a Fighter has nothing to damage, so the result is 0.
 */
export function computeDamage(attacker: Entity, target: Entity): number {
  if (!target.fighter) return 0;
  return (attacker.fighter?.power ?? 0) - target.fighter.defense;
}

/**
 * Resolve one melee attack between two distinct registry slots.
 */
export function attack(registry: EntityRegistry, attackerIndex: number, targetIndex: number): SimEvent[] {
  const [attacker, target] = getDisjointPair(registry, attackerIndex, targetIndex);
  const damage = computeDamage(attacker, target);

  if (damage <= 0) {
    return [{
      type: "attack_no_effect",
      attackerId: attacker.id,
      targetId: target.id,
      text: `${attacker.name} attacks ${target.name} but it has no effect!`,
    }];
  }

  const events: SimEvent[] = [{
    type: "attack",
    attackerId: attacker.id,
    targetId: target.id,
    damage,
    text: `${attacker.name} attacks ${target.name} for ${damage} hit points.`,
  }];
  events.push(...takeDamage(target, damage));
  return events;
}

/**
 * Apply damage to an entity's Fighter, then run the death transition if hp
 * reached zero on a living entity. hp never goes below zero.
 */
export function takeDamage(entity: Entity, damage: number): SimEvent[] {
  const fighter = entity.fighter;
  if (!fighter) return [];
  if (damage > 0) {
    fighter.hp = Math.max(0, fighter.hp - damage);
  }
  if (fighter.hp <= 0 && entity.alive) {
    entity.alive = false;
    return [die(entity, fighter.onDeath)];
  }
  return [];
}

function die(entity: Entity, variant: DeathVariant): SimEvent {
  switch (variant) {
    case DeathVariant.Player:
      entity.glyph = GLYPHS.corpse;
      entity.color = COLORS.corpse;
      return { type: "death", entityId: entity.id, variant, text: "You died!" };
    case DeathVariant.Monster: {
      const text = `${entity.name} is dead!`;
      entity.glyph = GLYPHS.corpse;
      entity.color = COLORS.corpse;
      entity.blocks = false;
      entity.fighter = undefined;
      entity.ai = undefined;
      entity.name = `remains of ${entity.name}`;
      return { type: "death", entityId: entity.id, variant, text };
    }
  }
}
