import type { GameConfig, GameState } from "../shared/types.js";
import { resolveConfig } from "../shared/constants.js";
import { createPlayer, createRegistry } from "./entities.js";
import { createTileMap } from "./tileMap.js";
import { setupVisibility } from "./vision.js";

/**
 * A session with an all-wall map and only the player in the registry.
 * Generation (or a test) carves the map and must then rebuild `visibility`.
 */
export function createEmptyState(seed: number, overrides: Partial<GameConfig> = {}): GameState {
  const config = resolveConfig(overrides);
  const map = createTileMap(config.mapWidth, config.mapHeight);

  return {
    seed,
    turn: 0,
    config,
    map,
    rooms: [],
    registry: createRegistry(createPlayer(config.player)),
    inventory: [],
    visibility: setupVisibility(map),
    lastFovOrigin: null,
    logs: [],
    displayMode: "player",
  };
}
