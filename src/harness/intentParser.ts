import type { Intent } from "../shared/types.js";
import { Direction, IntentType } from "../shared/types.js";
import { slotForKey } from "../sim/inventory.js";

// ── Direction mapping ────────────────────────────────────────

const DIR_MAP: Record<string, Direction> = {
  n: Direction.North,
  north: Direction.North,
  s: Direction.South,
  south: Direction.South,
  e: Direction.East,
  east: Direction.East,
  w: Direction.West,
  west: Direction.West,
  ne: Direction.NorthEast,
  northeast: Direction.NorthEast,
  nw: Direction.NorthWest,
  northwest: Direction.NorthWest,
  se: Direction.SouthEast,
  southeast: Direction.SouthEast,
  sw: Direction.SouthWest,
  southwest: Direction.SouthWest,
};

export const INTENT_HELP = [
  "n s e w ne nw se sw   move or attack",
  "g | pickup            pick up an item",
  "i | inventory         list the inventory",
  "u <letter>            use an inventory item",
  "tab | toggle          switch between fog-of-war and full map",
  "q | quit              leave the game",
].join("\n");

// ── Intent parsing ───────────────────────────────────────────

/**
 * Parse one command line into an Intent or an error.
 *
 *   n            → move north
 *   use b        → use inventory slot 1
 *   tab          → toggle display
 */
export function parseIntent(input: string): Intent | { error: string } {
  const words = input.trim().toLowerCase().split(/\s+/).filter((w) => w.length > 0);
  if (words.length === 0) {
    return { error: "Empty command" };
  }

  const [verb, ...rest] = words;

  const direction = Object.hasOwn(DIR_MAP, verb) ? DIR_MAP[verb] : undefined;
  if (direction !== undefined) {
    if (rest.length > 0) return { error: `Move takes no arguments: "${input.trim()}"` };
    return { type: IntentType.Move, direction };
  }

  switch (verb) {
    case "g":
    case "get":
    case "pickup":
      return { type: IntentType.PickUp };
    case "i":
    case "inventory":
      return { type: IntentType.OpenInventory };
    case "tab":
    case "toggle":
      return { type: IntentType.ToggleDisplay };
    case "q":
    case "quit":
    case "exit":
      return { type: IntentType.Quit };
    case "u":
    case "use": {
      const key = rest[0];
      if (key === undefined) {
        return { error: "use requires an inventory letter, e.g. \"use a\"" };
      }
      const slot = slotForKey(key);
      if (slot === null) {
        return { error: `Not an inventory letter: "${key}". Use a-z.` };
      }
      return { type: IntentType.UseItem, slot };
    }
    default:
      return { error: `Unknown command "${verb}"` };
  }
}
