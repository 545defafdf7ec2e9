import type { GameState, Intent, LogEntry, MessageEvent, SimEvent, StepResult } from "../shared/types.js";
import { IntentType, PlayerAction } from "../shared/types.js";
import { getDirectionDelta, playerMoveOrAttack } from "./actions.js";
import { aiTakeTurn } from "./ai.js";
import { getPlayer } from "./entities.js";
import { pickUp, useItem } from "./inventory.js";
import { refreshVisibility } from "./vision.js";

function isMessage(event: SimEvent): event is MessageEvent {
  return "text" in event;
}

function appendLogs(state: GameState, events: SimEvent[]): void {
  for (const event of events) {
    if (!isMessage(event)) continue;
    const entry: LogEntry = {
      id: `log_${event.type}_${state.turn}_${state.logs.length}`,
      timestamp: state.turn,
      source: event.type === "attack" || event.type === "attack_no_effect" || event.type === "death" ? "combat" : "system",
      text: event.text,
      read: false,
    };
    state.logs.push(entry);
  }
}

/**
 * Resolve the player's intent. Dead players can still quit or toggle the
 * display; everything else is refused without consuming a turn.
 */
function resolvePlayerIntent(state: GameState, intent: Intent): StepResult {
  const player = getPlayer(state.registry);

  switch (intent.type) {
    case IntentType.Quit:
      return { outcome: PlayerAction.Exit, events: [{ type: "quit" }] };

    case IntentType.ToggleDisplay:
      state.displayMode = state.displayMode === "player" ? "full" : "player";
      return { outcome: PlayerAction.DidNotTakeTurn, events: [{ type: "display_toggled", mode: state.displayMode }] };

    case IntentType.OpenInventory:
      return { outcome: PlayerAction.DidNotTakeTurn, events: [] };

    case IntentType.PickUp:
      if (!player.alive) return { outcome: PlayerAction.DidNotTakeTurn, events: [] };
      return { outcome: PlayerAction.DidNotTakeTurn, events: pickUp(state) };

    case IntentType.UseItem: {
      if (!player.alive) return { outcome: PlayerAction.DidNotTakeTurn, events: [] };
      const result = useItem(state, intent.slot);
      return {
        outcome: result.used ? PlayerAction.TookTurn : PlayerAction.DidNotTakeTurn,
        events: result.events,
      };
    }

    case IntentType.Move: {
      if (!player.alive) return { outcome: PlayerAction.DidNotTakeTurn, events: [] };
      const delta = getDirectionDelta(intent.direction);
      return { outcome: PlayerAction.TookTurn, events: playerMoveOrAttack(state, delta.x, delta.y) };
    }
  }
}

/**
 * One tick: the player's intent, then, if it took a turn and the player is
 * still alive, every AI entity acts once in registry order.
 *
 * Monsters act against the view the player had before moving; the view is
 * refreshed once the tick ends. A tick always runs to completion; `Exit`
 * only tells the caller to stop issuing ticks.
 */
export function step(state: GameState, intent: Intent): StepResult {
  const result = resolvePlayerIntent(state, intent);
  const events = [...result.events];

  if (result.outcome === PlayerAction.TookTurn) {
    state.turn += 1;

    if (getPlayer(state.registry).alive) {
      const entities = state.registry.entities;
      for (let i = 0; i < entities.length; i++) {
        if (entities[i].ai) {
          events.push(...aiTakeTurn(state, i));
        }
      }
    }

    refreshVisibility(state);
  }

  appendLogs(state, events);
  return { outcome: result.outcome, events };
}
