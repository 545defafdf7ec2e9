#!/usr/bin/env node
import { createInterface } from "node:readline";
import { readFileSync } from "node:fs";
import { generate } from "../sim/procgen.js";
import { step } from "../sim/step.js";
import { getPlayer } from "../sim/entities.js";
import { inventoryMenu } from "../sim/inventory.js";
import { renderToString } from "../render/terminal.js";
import { DEFAULT_SEED } from "../shared/constants.js";
import { DeathVariant, IntentType, PlayerAction } from "../shared/types.js";
import type { GameState } from "../shared/types.js";
import { INTENT_HELP, parseIntent } from "./intentParser.js";

// ── Arg parsing ──────────────────────────────────────────────

interface CliArgs {
  seed: number;
  maxTurns: number;
  script: string | null;
}

function parseArgs(): CliArgs {
  const argv = process.argv.slice(2);
  const opts: CliArgs = {
    seed: DEFAULT_SEED,
    maxTurns: 1000,
    script: null,
  };

  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
      case "--seed":
        opts.seed = parseInt(argv[++i], 10);
        if (Number.isNaN(opts.seed)) {
          console.error("ERROR: --seed requires a valid integer");
          process.exit(1);
        }
        break;
      case "--max-turns":
        opts.maxTurns = parseInt(argv[++i], 10);
        if (Number.isNaN(opts.maxTurns) || opts.maxTurns < 1) {
          console.error("ERROR: --max-turns requires a positive integer");
          process.exit(1);
        }
        break;
      case "--script":
        opts.script = argv[++i] ?? null;
        if (opts.script === null) {
          console.error("ERROR: --script requires a file path");
          process.exit(1);
        }
        break;
      case "--help":
        console.log("Usage: dungeon-sim [--seed N] [--max-turns N] [--script FILE]");
        console.log("");
        console.log(INTENT_HELP);
        process.exit(0);
        break;
      default:
        console.error(`WARNING: Unknown argument "${argv[i]}"`);
        break;
    }
  }

  return opts;
}

// ── Session ──────────────────────────────────────────────────

interface Session {
  state: GameState;
  logCursor: number;
  kills: number;
  maxTurns: number;
}

/**
 * Emit the observation block to stdout, delimited for agent parsing.
 */
function emitObservation(session: Session): void {
  const { state } = session;
  console.log("===OBSERVATION_START===");
  console.log(renderToString(state));

  const fresh = state.logs.slice(session.logCursor);
  session.logCursor = state.logs.length;
  for (const log of fresh) {
    log.read = true;
    console.log(`  [${log.source}] ${log.text}`);
  }
  console.log("===OBSERVATION_END===");
}

function printInventory(state: GameState): void {
  const menu = inventoryMenu(state.inventory);
  if (menu.length === 0) {
    console.log("Inventory is empty.");
    return;
  }
  console.log("--- Inventory ---");
  for (const option of menu) {
    console.log(`  (${option.key}) ${option.label}`);
  }
}

function printSummary(session: Session): void {
  const { state } = session;
  const player = getPlayer(state.registry);
  let explored = 0;
  for (const row of state.map.tiles) {
    for (const tile of row) {
      if (tile.explored && !tile.blocked) explored++;
    }
  }

  console.log("");
  console.log("=== GAME OVER ===");
  console.log(`Result: ${player.alive ? "SURVIVED" : "DIED"}`);
  console.log(`Turns: ${state.turn}`);
  console.log(`HP: ${player.fighter?.hp ?? 0}/${player.fighter?.maxHp ?? 0}`);
  console.log(`Monsters slain: ${session.kills}`);
  console.log(`Floor tiles explored: ${explored}`);
}

/**
 * Feed one command line into the session. Returns false once the session
 * should stop.
 */
function handleLine(session: Session, line: string): boolean {
  const parsed = parseIntent(line);
  if ("error" in parsed) {
    console.log(`===ERROR=== ${parsed.error}`);
    return true;
  }

  const result = step(session.state, parsed);
  for (const event of result.events) {
    if (event.type === "death" && event.variant === DeathVariant.Monster) session.kills++;
  }

  if (result.outcome === PlayerAction.Exit) {
    console.log("Quit requested.");
    return false;
  }
  if (parsed.type === IntentType.OpenInventory) {
    printInventory(session.state);
  }

  emitObservation(session);

  if (!getPlayer(session.state.registry).alive) return false;
  if (session.state.turn >= session.maxTurns) {
    console.log(`MAX TURNS (${session.maxTurns}) reached.`);
    return false;
  }
  return true;
}

// ── Script mode ──────────────────────────────────────────────

function runScript(scriptPath: string, session: Session): void {
  let rawLines: string[];
  try {
    const content = readFileSync(scriptPath, "utf-8");
    rawLines = content.split("\n").map((l) => l.trim()).filter((l) => l.length > 0 && !l.startsWith("//"));
  } catch (err) {
    console.error(`ERROR: Could not read script file "${scriptPath}": ${String(err)}`);
    process.exit(1);
  }

  emitObservation(session);
  for (const line of rawLines) {
    if (!handleLine(session, line)) break;
  }
  printSummary(session);
}

// ── Interactive stdin mode ───────────────────────────────────

async function runInteractive(session: Session): Promise<void> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: false,
  });

  emitObservation(session);

  for await (const line of rl) {
    if (line.trim().length === 0) continue;
    if (!handleLine(session, line)) {
      rl.close();
      break;
    }
  }

  printSummary(session);
}

// ── Main ─────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = parseArgs();

  console.log(`Seed: ${args.seed}  Max turns: ${args.maxTurns}`);
  if (args.script) {
    console.log(`Script: ${args.script}`);
  }
  console.log("");

  const session: Session = {
    state: generate(args.seed),
    logCursor: 0,
    kills: 0,
    maxTurns: args.maxTurns,
  };

  if (args.script) {
    runScript(args.script, session);
  } else {
    await runInteractive(session);
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
