import { describe, it, expect } from "vitest";
import { attack, computeDamage, takeDamage } from "../src/sim/combat.js";
import { PLAYER_INDEX, getEntity, getPlayer } from "../src/sim/entities.js";
import { DeathVariant, MonsterKind } from "../src/shared/types.js";
import type { Fighter } from "../src/shared/types.js";
import { SimInvariantError } from "../src/shared/errors.js";
import { addMonster, makeFloorState, placePlayer } from "./fixtures/state.js";

function fighterOf(state: ReturnType<typeof makeFloorState>, index: number): Fighter {
  const fighter = getEntity(state.registry, index).fighter;
  if (!fighter) throw new Error(`entity ${index} has no fighter`);
  return fighter;
}

function setup() {
  const state = makeFloorState(10, 10);
  placePlayer(state, 2, 2);
  const orc = addMonster(state, MonsterKind.Orc, 3, 2);
  return { state, orc };
}

describe("Damage formula", () => {
  it("is power minus defense", () => {
    const { state, orc } = setup();
    const player = getPlayer(state.registry);
    const target = getEntity(state.registry, orc);
    expect(computeDamage(player, target)).toBe(5);
    expect(computeDamage(target, player)).toBe(1);
  });

  it("power 5 against defense 2 takes exactly 3 hp", () => {
    const { state } = setup();
    const troll = addMonster(state, MonsterKind.Troll, 2, 3);
    fighterOf(state, troll).defense = 2;

    const events = attack(state.registry, PLAYER_INDEX, troll);

    expect(fighterOf(state, troll).hp).toBe(13);
    expect(events).toEqual([{
      type: "attack",
      attackerId: getPlayer(state.registry).id,
      targetId: getEntity(state.registry, troll).id,
      damage: 3,
      text: "player attacks troll for 3 hit points.",
    }]);
  });

  it("zero damage changes nothing and reports no effect", () => {
    const { state, orc } = setup();
    fighterOf(state, PLAYER_INDEX).defense = 3;

    const events = attack(state.registry, orc, PLAYER_INDEX);

    expect(fighterOf(state, PLAYER_INDEX).hp).toBe(30);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ type: "attack_no_effect", text: "orc attacks player but it has no effect!" });
  });

  it("negative damage is also no effect", () => {
    const { state, orc } = setup();
    fighterOf(state, PLAYER_INDEX).defense = 10;
    const events = attack(state.registry, orc, PLAYER_INDEX);
    expect(fighterOf(state, PLAYER_INDEX).hp).toBe(30);
    expect(events.map((e) => e.type)).toEqual(["attack_no_effect"]);
  });

  it("refuses self-targeting", () => {
    const { state, orc } = setup();
    expect(() => attack(state.registry, orc, orc)).toThrow(SimInvariantError);
    expect(fighterOf(state, orc).hp).toBe(10);
  });
});

describe("Monster death", () => {
  it("exact lethal damage turns the monster into inert remains", () => {
    const { state, orc } = setup();
    fighterOf(state, orc).hp = 3;
    fighterOf(state, PLAYER_INDEX).power = 3;

    const events = attack(state.registry, PLAYER_INDEX, orc);
    const corpse = getEntity(state.registry, orc);

    expect(events.map((e) => e.type)).toEqual(["attack", "death"]);
    expect(events[1]).toEqual({ type: "death", entityId: corpse.id, variant: DeathVariant.Monster, text: "orc is dead!" });
    expect(corpse.alive).toBe(false);
    expect(corpse.fighter).toBeUndefined();
    expect(corpse.ai).toBeUndefined();
    expect(corpse.blocks).toBe(false);
    expect(corpse.name).toBe("remains of orc");
    expect(corpse.glyph).toBe("%");
  });

  it("overkill floors hp at zero", () => {
    const { state, orc } = setup();
    fighterOf(state, orc).hp = 2;
    fighterOf(state, orc).onDeath = DeathVariant.Player; // keep the Fighter around to inspect hp
    attack(state.registry, PLAYER_INDEX, orc);
    expect(fighterOf(state, orc).hp).toBe(0);
  });

  it("fires once; hitting the remains again changes nothing", () => {
    const { state, orc } = setup();
    fighterOf(state, orc).hp = 1;
    attack(state.registry, PLAYER_INDEX, orc);

    const again = attack(state.registry, PLAYER_INDEX, orc);
    const corpse = getEntity(state.registry, orc);

    expect(again.map((e) => e.type)).toEqual(["attack_no_effect"]);
    expect(corpse.name).toBe("remains of orc");
  });
});

describe("Player death", () => {
  it("marks the player dead but keeps its Fighter", () => {
    const { state, orc } = setup();
    fighterOf(state, PLAYER_INDEX).hp = 1;

    const events = attack(state.registry, orc, PLAYER_INDEX);
    const player = getPlayer(state.registry);

    expect(events.map((e) => e.type)).toEqual(["attack", "death"]);
    expect(events[1]).toMatchObject({ variant: DeathVariant.Player, text: "You died!" });
    expect(player.alive).toBe(false);
    expect(player.glyph).toBe("%");
    expect(player.blocks).toBe(true);
    expect(player.name).toBe("player");
    expect(player.fighter?.hp).toBe(0);
  });

  it("does not die twice", () => {
    const { state, orc } = setup();
    fighterOf(state, PLAYER_INDEX).hp = 1;
    attack(state.registry, orc, PLAYER_INDEX);

    const again = attack(state.registry, orc, PLAYER_INDEX);
    expect(again.map((e) => e.type)).toEqual(["attack"]);
    expect(fighterOf(state, PLAYER_INDEX).hp).toBe(0);
  });
});

describe("takeDamage", () => {
  it("ignores entities without a Fighter", () => {
    const { state } = setup();
    const entity = getPlayer(state.registry);
    entity.fighter = undefined;
    expect(takeDamage(entity, 5)).toEqual([]);
    expect(entity.alive).toBe(true);
  });

  it("keeps hp within [0, maxHp] across a long fight", () => {
    const { state, orc } = setup();
    const troll = addMonster(state, MonsterKind.Troll, 1, 2);
    for (let i = 0; i < 40; i++) {
      attack(state.registry, orc, PLAYER_INDEX);
      attack(state.registry, troll, PLAYER_INDEX);
      const f = fighterOf(state, PLAYER_INDEX);
      expect(f.hp).toBeGreaterThanOrEqual(0);
      expect(f.hp).toBeLessThanOrEqual(f.maxHp);
    }
    expect(getPlayer(state.registry).alive).toBe(false);
  });
});
