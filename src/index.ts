export * from "./shared/types.js";
export * from "./shared/constants.js";
export { SimInvariantError, invariant } from "./shared/errors.js";
export { createTileMap, getTile, inBounds, carveTile, wallTile, floorTile } from "./sim/tileMap.js";
export { createRoom, roomCenter, roomsIntersect, isRoomInterior } from "./sim/rooms.js";
export {
  PLAYER_INDEX,
  createRegistry,
  spawnEntity,
  getPlayer,
  getEntity,
  getDisjointPair,
  swapRemove,
  findEntityIndex,
  entitiesAt,
  isBlocked,
  distanceBetween,
  createPlayer,
  createMonster,
  createItem,
} from "./sim/entities.js";
export { setupVisibility, recomputeVisibility, refreshVisibility, isVisible, isExplored } from "./sim/vision.js";
export { attack, computeDamage, takeDamage } from "./sim/combat.js";
export { aiTakeTurn, stepToward } from "./sim/ai.js";
export { getDirectionDelta, moveBy, playerMoveOrAttack } from "./sim/actions.js";
export { pickUp, useItem, buildMenu, inventoryMenu, slotForKey } from "./sim/inventory.js";
export type { MenuOption, UseResult } from "./sim/inventory.js";
export { generate, generateDungeon } from "./sim/procgen.js";
export type { DungeonParams, DungeonLayout } from "./sim/procgen.js";
export { createEmptyState } from "./sim/state.js";
export { step } from "./sim/step.js";
export { renderToString, visibleEntities, statusLine } from "./render/terminal.js";
