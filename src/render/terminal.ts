import type { DisplayMode, Entity, GameState } from "../shared/types.js";
import { GLYPHS } from "../shared/constants.js";
import { getPlayer } from "../sim/entities.js";
import { isVisible } from "../sim/vision.js";

/**
 * Entities inside the player's current field of view, non-blocking ones
 * first so anything standing on an item draws over it.
 */
export function visibleEntities(state: GameState): Entity[] {
  return drawOrder(state.registry.entities.filter((e) => isVisible(state.visibility, e.pos.x, e.pos.y)));
}

function drawOrder(entities: Entity[]): Entity[] {
  return [...entities].sort((a, b) => Number(a.blocks) - Number(b.blocks));
}

function tileGlyph(state: GameState, x: number, y: number, mode: DisplayMode): string {
  const tile = state.map.tiles[y][x];
  if (mode === "full" || isVisible(state.visibility, x, y)) {
    return tile.blocksSight ? GLYPHS.wall : GLYPHS.floor;
  }
  if (tile.explored) {
    return tile.blocksSight ? GLYPHS.wall : GLYPHS.rememberedFloor;
  }
  return GLYPHS.unexplored;
}

/**
 * Render the map as plain text (for headless/harness use). In "player"
 * mode only explored tiles and entities in view are drawn; "full" draws
 * everything.
 */
export function renderToString(state: GameState, mode: DisplayMode = state.displayMode): string {
  const rows: string[][] = [];
  for (let y = 0; y < state.map.height; y++) {
    const row: string[] = [];
    for (let x = 0; x < state.map.width; x++) {
      row.push(tileGlyph(state, x, y, mode));
    }
    rows.push(row);
  }

  const entities = mode === "full" ? drawOrder(state.registry.entities) : visibleEntities(state);
  for (const e of entities) {
    rows[e.pos.y][e.pos.x] = e.glyph;
  }

  const lines = rows.map((r) => r.join(""));
  lines.push(statusLine(state));
  return lines.join("\n");
}

export function statusLine(state: GameState): string {
  const fighter = getPlayer(state.registry).fighter;
  const hp = fighter ? `HP: ${fighter.hp}/${fighter.maxHp}` : "HP: -";
  return `${hp}  Turn: ${state.turn}`;
}
