import { describe, it, expect } from "vitest";
import { step } from "../src/sim/step.js";
import { createItem, getEntity, getPlayer } from "../src/sim/entities.js";
import { Direction, IntentType, ItemKind, MonsterKind, PlayerAction } from "../src/shared/types.js";
import type { Intent } from "../src/shared/types.js";
import { isVisible, refreshVisibility } from "../src/sim/vision.js";
import { addMonster, addPotion, makeFloorState, placePlayer } from "./fixtures/state.js";

const move = (direction: Direction): Intent => ({ type: IntentType.Move, direction });

function scene() {
  const state = makeFloorState(20, 20);
  placePlayer(state, 10, 10);
  refreshVisibility(state);
  return state;
}

function playerHp(state: ReturnType<typeof scene>): number | undefined {
  return getPlayer(state.registry).fighter?.hp;
}

describe("step: classification", () => {
  it("quit exits without simulating", () => {
    const state = scene();
    const orc = addMonster(state, MonsterKind.Orc, 11, 10);

    const result = step(state, { type: IntentType.Quit });

    expect(result).toEqual({ outcome: PlayerAction.Exit, events: [{ type: "quit" }] });
    expect(state.turn).toBe(0);
    expect(getEntity(state.registry, orc).pos).toEqual({ x: 11, y: 10 });
    expect(playerHp(state)).toBe(30);
  });

  it("toggling the display never takes a turn", () => {
    const state = scene();

    const first = step(state, { type: IntentType.ToggleDisplay });
    expect(first).toEqual({ outcome: PlayerAction.DidNotTakeTurn, events: [{ type: "display_toggled", mode: "full" }] });
    expect(state.displayMode).toBe("full");

    step(state, { type: IntentType.ToggleDisplay });
    expect(state.displayMode).toBe("player");
    expect(state.turn).toBe(0);
  });

  it("opening the inventory does not take a turn", () => {
    const state = scene();
    addMonster(state, MonsterKind.Orc, 11, 10);
    const result = step(state, { type: IntentType.OpenInventory });
    expect(result).toEqual({ outcome: PlayerAction.DidNotTakeTurn, events: [] });
    expect(playerHp(state)).toBe(30);
  });

  it("a move takes a turn and relocates the player", () => {
    const state = scene();
    const result = step(state, move(Direction.NorthEast));

    expect(result.outcome).toBe(PlayerAction.TookTurn);
    expect(result.events).toEqual([{
      type: "move",
      entityId: getPlayer(state.registry).id,
      from: { x: 10, y: 10 },
      to: { x: 11, y: 9 },
    }]);
    expect(state.turn).toBe(1);
    expect(state.lastFovOrigin).toEqual({ x: 11, y: 9 });
  });

  it("walking into a wall is a no-op that still takes the turn", () => {
    const state = makeFloorState(20, 20);
    placePlayer(state, 1, 1);

    const result = step(state, move(Direction.West));

    expect(result.outcome).toBe(PlayerAction.TookTurn);
    expect(result.events).toEqual([{ type: "blocked", entityId: getPlayer(state.registry).id, at: { x: 0, y: 1 } }]);
    expect(getPlayer(state.registry).pos).toEqual({ x: 1, y: 1 });
  });
});

describe("step: combat and AI", () => {
  it("bumping a monster attacks it, then the monster answers", () => {
    const state = scene();
    const orc = addMonster(state, MonsterKind.Orc, 11, 10);
    const orcId = getEntity(state.registry, orc).id;
    const playerId = getPlayer(state.registry).id;

    const result = step(state, move(Direction.East));

    expect(result.outcome).toBe(PlayerAction.TookTurn);
    expect(result.events).toEqual([
      { type: "attack", attackerId: playerId, targetId: orcId, damage: 5, text: "player attacks orc for 5 hit points." },
      { type: "attack", attackerId: orcId, targetId: playerId, damage: 1, text: "orc attacks player for 1 hit points." },
    ]);
    expect(getPlayer(state.registry).pos).toEqual({ x: 10, y: 10 });
    expect(getEntity(state.registry, orc).fighter?.hp).toBe(5);
    expect(playerHp(state)).toBe(29);
  });

  it("killing a monster leaves remains the player can walk onto", () => {
    const state = scene();
    const orc = addMonster(state, MonsterKind.Orc, 11, 10);

    step(state, move(Direction.East));
    const second = step(state, move(Direction.East));
    expect(second.events.map((e) => e.type)).toEqual(["attack", "death"]);
    expect(getEntity(state.registry, orc).name).toBe("remains of orc");

    const third = step(state, move(Direction.East));
    expect(third.events.map((e) => e.type)).toEqual(["move"]);
    expect(getPlayer(state.registry).pos).toEqual({ x: 11, y: 10 });
  });

  it("monsters get no time on a tick that took no turn", () => {
    const state = scene();
    addMonster(state, MonsterKind.Orc, 11, 10);

    const result = step(state, { type: IntentType.PickUp });

    expect(result.outcome).toBe(PlayerAction.DidNotTakeTurn);
    expect(result.events).toEqual([{ type: "pickup_none", text: "There is nothing here to pick up." }]);
    expect(playerHp(state)).toBe(30);
    expect(state.turn).toBe(0);
  });

  it("monsters in view approach after the player moves", () => {
    const state = scene();
    const orc = addMonster(state, MonsterKind.Orc, 15, 10);

    step(state, move(Direction.West));

    expect(getPlayer(state.registry).pos).toEqual({ x: 9, y: 10 });
    expect(getEntity(state.registry, orc).pos).toEqual({ x: 14, y: 10 });
  });

  it("monsters act on the view from before the player's move", () => {
    const state = makeFloorState(20, 20, { fovRadius: 3 });
    placePlayer(state, 10, 10);
    refreshVisibility(state);
    const orc = addMonster(state, MonsterKind.Orc, 14, 10);

    step(state, move(Direction.East));

    // out of view when the tick began, so it sleeps through it
    expect(getEntity(state.registry, orc).pos).toEqual({ x: 14, y: 10 });
    expect(state.lastFovOrigin).toEqual({ x: 11, y: 10 });
    expect(isVisible(state.visibility, 14, 10)).toBe(true);

    step(state, move(Direction.West));

    expect(getPlayer(state.registry).pos).toEqual({ x: 10, y: 10 });
    expect(getEntity(state.registry, orc).pos).toEqual({ x: 13, y: 10 });
  });

  it("AI runs in registry order and stops attacking once the player dies", () => {
    const state = makeFloorState(20, 20);
    placePlayer(state, 1, 1);
    const fighter = getPlayer(state.registry).fighter;
    if (fighter) fighter.hp = 1;
    const first = addMonster(state, MonsterKind.Orc, 2, 1);
    addMonster(state, MonsterKind.Orc, 1, 2);
    refreshVisibility(state);

    const result = step(state, move(Direction.North));

    expect(result.events.map((e) => e.type)).toEqual(["blocked", "attack", "death"]);
    expect(result.events[1]).toMatchObject({ attackerId: getEntity(state.registry, first).id });
    expect(getPlayer(state.registry).alive).toBe(false);
  });

  it("a dead player can only quit or toggle", () => {
    const state = scene();
    const player = getPlayer(state.registry);
    player.alive = false;
    addPotion(state, 10, 10);
    state.inventory.push({ ...createItem(ItemKind.Heal, { x: 0, y: 0 }), id: 500 });

    expect(step(state, move(Direction.East))).toEqual({ outcome: PlayerAction.DidNotTakeTurn, events: [] });
    expect(step(state, { type: IntentType.PickUp })).toEqual({ outcome: PlayerAction.DidNotTakeTurn, events: [] });
    expect(step(state, { type: IntentType.UseItem, slot: 0 })).toEqual({ outcome: PlayerAction.DidNotTakeTurn, events: [] });
    expect(step(state, { type: IntentType.ToggleDisplay }).outcome).toBe(PlayerAction.DidNotTakeTurn);
    expect(step(state, { type: IntentType.Quit }).outcome).toBe(PlayerAction.Exit);
    expect(player.pos).toEqual({ x: 10, y: 10 });
    expect(state.turn).toBe(0);
  });
});

describe("step: items", () => {
  it("picking up is free; drinking takes a turn", () => {
    const state = scene();
    addPotion(state, 10, 10);
    const orc = getEntity(state.registry, addMonster(state, MonsterKind.Orc, 15, 10));
    const fighter = getPlayer(state.registry).fighter;
    if (fighter) fighter.hp = 20;

    const pick = step(state, { type: IntentType.PickUp });
    expect(pick.outcome).toBe(PlayerAction.DidNotTakeTurn);
    expect(state.inventory).toHaveLength(1);
    // the orc was last in the registry, so it fills the potion's old slot
    expect(state.registry.entities[1]).toBe(orc);
    expect(orc.pos).toEqual({ x: 15, y: 10 });

    const drink = step(state, { type: IntentType.UseItem, slot: 0 });
    expect(drink.outcome).toBe(PlayerAction.TookTurn);
    expect(playerHp(state)).toBe(24);
    expect(state.turn).toBe(1);
    expect(orc.pos).toEqual({ x: 14, y: 10 });
  });

  it("a cancelled drink costs nothing", () => {
    const state = scene();
    state.inventory.push({ ...createItem(ItemKind.Heal, { x: 0, y: 0 }), id: 500 });
    const result = step(state, { type: IntentType.UseItem, slot: 0 });
    expect(result.outcome).toBe(PlayerAction.DidNotTakeTurn);
    expect(state.inventory).toHaveLength(1);
  });
});

describe("step: message log", () => {
  it("records every message with its turn and source", () => {
    const state = scene();
    addMonster(state, MonsterKind.Orc, 11, 10);

    step(state, { type: IntentType.PickUp });
    step(state, move(Direction.East));

    expect(state.logs.map((l) => [l.timestamp, l.source, l.text])).toEqual([
      [0, "system", "There is nothing here to pick up."],
      [1, "combat", "player attacks orc for 5 hit points."],
      [1, "combat", "orc attacks player for 1 hit points."],
    ]);
    expect(new Set(state.logs.map((l) => l.id)).size).toBe(3);
    expect(state.logs.every((l) => !l.read)).toBe(true);
  });

  it("does not log movement", () => {
    const state = scene();
    step(state, move(Direction.South));
    expect(state.logs).toEqual([]);
  });
});
