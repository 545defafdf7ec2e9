// ── Coordinates ──────────────────────────────────────────────
export interface Position {
  x: number;
  y: number;
}

// ── Tiles ────────────────────────────────────────────────────
export interface Tile {
  blocked: boolean;
  blocksSight: boolean;
  explored: boolean; // latches true the first time the tile is in view
}

/** Fixed-size grid, indexed `tiles[y][x]`. */
export interface TileMap {
  width: number;
  height: number;
  tiles: Tile[][];
}

// ── Rooms ────────────────────────────────────────────────────
/** Axis-aligned rectangle; the outer ring stays wall when carved. */
export interface Room {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

// ── Capabilities ─────────────────────────────────────────────
export enum DeathVariant {
  Player = "player",
  Monster = "monster",
}

export interface Fighter {
  maxHp: number;
  hp: number;
  defense: number;
  power: number;
  onDeath: DeathVariant;
}

export enum AiKind {
  Basic = "basic",
}

export interface Ai {
  kind: AiKind;
}

export enum ItemKind {
  Heal = "heal",
}

export interface Item {
  kind: ItemKind;
}

export enum MonsterKind {
  Orc = "orc",
  Troll = "troll",
}

// ── Entities ─────────────────────────────────────────────────
export type EntityId = number;

export interface Entity {
  id: EntityId;
  pos: Position;
  glyph: string;
  name: string;
  color: string;
  blocks: boolean;
  alive: boolean;
  fighter?: Fighter;
  ai?: Ai;
  item?: Item;
}

/** Everything but the id, which the registry hands out. */
export type EntitySpec = Omit<Entity, "id">;

/**
 * Ordered entity list. Index 0 holds the player; every other slot is
 * unordered and may be reassigned by a swap-removal.
 */
export interface EntityRegistry {
  entities: Entity[];
  nextId: EntityId;
}

// ── Visibility ───────────────────────────────────────────────
/** Flat per-tile arrays, indexed `y * width + x`. */
export interface Visibility {
  width: number;
  height: number;
  transparent: boolean[];
  walkable: boolean[];
  visible: boolean[];
}

// ── Randomness ───────────────────────────────────────────────
/** The slice of the rot-js RNG the generator draws from. Bounds are inclusive. */
export interface Rng {
  getUniform(): number;
  getUniformInt(lowerBound: number, upperBound: number): number;
}

// ── Intents ──────────────────────────────────────────────────
export enum Direction {
  North = "north",
  South = "south",
  East = "east",
  West = "west",
  NorthEast = "northeast",
  NorthWest = "northwest",
  SouthEast = "southeast",
  SouthWest = "southwest",
}

export enum IntentType {
  Move = "move",
  PickUp = "pick_up",
  UseItem = "use_item",
  OpenInventory = "open_inventory",
  ToggleDisplay = "toggle_display",
  Quit = "quit",
}

export type Intent =
  | { type: IntentType.Move; direction: Direction }
  | { type: IntentType.PickUp }
  | { type: IntentType.UseItem; slot: number }
  | { type: IntentType.OpenInventory }
  | { type: IntentType.ToggleDisplay }
  | { type: IntentType.Quit };

export enum PlayerAction {
  TookTurn = "took_turn",
  DidNotTakeTurn = "did_not_take_turn",
  Exit = "exit",
}

// ── Events ───────────────────────────────────────────────────
export type SimEvent =
  | { type: "attack"; attackerId: EntityId; targetId: EntityId; damage: number; text: string }
  | { type: "attack_no_effect"; attackerId: EntityId; targetId: EntityId; text: string }
  | { type: "death"; entityId: EntityId; variant: DeathVariant; text: string }
  | { type: "move"; entityId: EntityId; from: Position; to: Position }
  | { type: "blocked"; entityId: EntityId; at: Position }
  | { type: "pickup"; entityId: EntityId; text: string }
  | { type: "pickup_none"; text: string }
  | { type: "inventory_full"; entityId: EntityId; text: string }
  | { type: "item_used"; kind: ItemKind; amount: number; text: string }
  | { type: "item_cancelled"; kind: ItemKind; text: string }
  | { type: "invalid_slot"; slot: number; text: string }
  | { type: "display_toggled"; mode: DisplayMode }
  | { type: "quit" };

export type MessageEvent = Extract<SimEvent, { text: string }>;

export interface StepResult {
  outcome: PlayerAction;
  events: SimEvent[];
}

// ── Logs ─────────────────────────────────────────────────────
export interface LogEntry {
  id: string;
  timestamp: number; // turn the message was produced on
  source: "combat" | "system";
  text: string;
  read: boolean;
}

// ── Config ───────────────────────────────────────────────────
export interface FighterStats {
  maxHp: number;
  defense: number;
  power: number;
}

export interface GameConfig {
  mapWidth: number;
  mapHeight: number;
  maxRooms: number;
  roomMinSize: number;
  roomMaxSize: number;
  maxRoomMonsters: number;
  maxRoomItems: number;
  fovRadius: number;
  inventoryCapacity: number;
  healAmount: number;
  player: FighterStats;
}

// ── Game state ───────────────────────────────────────────────
export type DisplayMode = "player" | "full";

export interface GameState {
  seed: number;
  turn: number;
  config: GameConfig;
  map: TileMap;
  rooms: Room[];
  registry: EntityRegistry;
  inventory: Entity[];
  visibility: Visibility;
  lastFovOrigin: Position | null;
  logs: LogEntry[];
  displayMode: DisplayMode;
}
