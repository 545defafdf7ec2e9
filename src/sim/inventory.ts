/**
 * Picking items off the floor, using them, and the lettered inventory menu.
 */
import type { Entity, GameState, Item, SimEvent } from "../shared/types.js";
import { ItemKind } from "../shared/types.js";
import { invariant } from "../shared/errors.js";
import { PLAYER_INDEX, getEntity, swapRemove } from "./entities.js";

const MENU_KEYS = "abcdefghijklmnopqrstuvwxyz";

export interface MenuOption {
  key: string;
  label: string;
}

export interface UseResult {
  used: boolean;
  events: SimEvent[];
}

/**
 * Move the first item on the player's tile into the inventory. A full
 * inventory leaves the item where it is.
 */
export function pickUp(state: GameState): SimEvent[] {
  const player = getEntity(state.registry, PLAYER_INDEX);
  const index = state.registry.entities.findIndex(
    (e) => e.item !== undefined && e.pos.x === player.pos.x && e.pos.y === player.pos.y,
  );
  if (index < 0) {
    return [{ type: "pickup_none", text: "There is nothing here to pick up." }];
  }

  const candidate = getEntity(state.registry, index);
  if (state.inventory.length >= state.config.inventoryCapacity) {
    return [{
      type: "inventory_full",
      entityId: candidate.id,
      text: `Your inventory is full, cannot pick up ${candidate.name}.`,
    }];
  }

  const item = swapRemove(state.registry, index);
  state.inventory.push(item);
  return [{ type: "pickup", entityId: item.id, text: `You picked up a ${item.name}!` }];
}

/**
 * Apply the item in `slot` to the player. Consumed only when the effect
 * actually lands.
 */
export function useItem(state: GameState, slot: number): UseResult {
  if (state.inventory.length === 0) {
    return { used: false, events: [{ type: "invalid_slot", slot, text: "Inventory is empty." }] };
  }
  if (!Number.isInteger(slot) || slot < 0 || slot >= state.inventory.length) {
    return { used: false, events: [{ type: "invalid_slot", slot, text: "No item in that slot." }] };
  }

  const entity = state.inventory[slot];
  const item = requireItem(entity);
  const player = getEntity(state.registry, PLAYER_INDEX);

  switch (item.kind) {
    case ItemKind.Heal: {
      const fighter = player.fighter;
      if (!fighter || fighter.hp >= fighter.maxHp) {
        return {
          used: false,
          events: [{ type: "item_cancelled", kind: item.kind, text: "You are already at full health." }],
        };
      }
      const before = fighter.hp;
      fighter.hp = Math.min(fighter.maxHp, fighter.hp + state.config.healAmount);
      state.inventory.splice(slot, 1);
      return {
        used: true,
        events: [{
          type: "item_used",
          kind: item.kind,
          amount: fighter.hp - before,
          text: "Your wounds start to feel better!",
        }],
      };
    }
  }
}

function requireItem(entity: Entity): Item {
  invariant(entity.item !== undefined, `inventory entry ${entity.id} (${entity.name}) has no item capability`);
  return entity.item;
}

/**
 * Letter every option a..z. More options than letters is a caller bug.
 */
export function buildMenu(labels: string[]): MenuOption[] {
  invariant(
    labels.length <= MENU_KEYS.length,
    `cannot have a menu with more than ${MENU_KEYS.length} options (got ${labels.length})`,
  );
  return labels.map((label, i) => ({ key: MENU_KEYS[i], label }));
}

export function inventoryMenu(inventory: Entity[]): MenuOption[] {
  return buildMenu(inventory.map((e) => e.name));
}

/**
 * Map a menu letter back to its slot, or null for anything that is not a
 * single lowercase letter.
 */
export function slotForKey(key: string): number | null {
  if (key.length !== 1) return null;
  const slot = MENU_KEYS.indexOf(key);
  return slot >= 0 ? slot : null;
}
