#!/usr/bin/env node
import "dotenv/config";
import { Command, Option } from "commander";
import { GameClient, consoleLoggerFactory } from "@crawlbridge/client";
import type { AutoPlayOptions, ClientConfig } from "@crawlbridge/schemas";
import { loadConfig, parseIntOption, type ConfigFlags } from "./config.js";
import { playSession } from "./play-command.js";
import { formatLobby, red, yellow } from "./report-formatter.js";

// Global error handlers: a crash should never be silent
process.on("unhandledRejection", (reason) => {
  console.error("[crawlbridge] Unhandled rejection:", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  console.error("[crawlbridge] Uncaught exception:", err);
  process.exit(1);
});

type GlobalOpts = {
  config?: string;
  serverUrl?: string;
  username?: string;
  password?: string;
  logLevel?: string;
  statusPath?: string;
};

type PlayOpts = GlobalOpts & {
  game?: string;
  species?: string;
  background?: string;
  weapon?: string;
  narrateInterval?: number;
  actionTimeout?: number;
  rounds: number;
  save?: boolean;
  maxActions?: number;
  stopHp?: number;
  maxEnemies?: number;
  stopOnItems: boolean;
  stopOnAltar: boolean;
  descend?: boolean;
};

function resolveConfig(opts: GlobalOpts & Partial<PlayOpts>): ClientConfig {
  const flags: ConfigFlags = {
    serverUrl: opts.serverUrl,
    username: opts.username,
    password: opts.password,
    logLevel: opts.logLevel,
    statusPath: opts.statusPath,
    gameId: opts.game,
    species: opts.species,
    background: opts.background,
    weapon: opts.weapon,
    narrateInterval: opts.narrateInterval,
    actionTimeoutMs: opts.actionTimeout,
  };
  return loadConfig({ configPath: opts.config, flags });
}

function createClient(config: ClientConfig): GameClient {
  return new GameClient({
    narrateInterval: config.narrateInterval,
    actionTimeoutMs: config.actionTimeoutMs,
    statusPath: config.statusPath,
    loggers: consoleLoggerFactory(config.logLevel),
  });
}

const program = new Command();
program
  .name("crawlbridge")
  .description("WebTiles client that plays a dungeon crawl through a command API")
  .version("0.1.0")
  .option("-c, --config <path>", "Config file (default: crawlbridge.config.yaml in the working directory)")
  .option("--server-url <url>", "WebSocket URL of the game server")
  .option("-u, --username <name>", "Account name")
  .option("-p, --password <password>", "Account password")
  .addOption(new Option("--log-level <level>", "Minimum log level").choices(["debug", "info", "warn", "error"]))
  .option("--status-path <path>", "Status record file for external overlays");

// ─── Lobby Command ────────────────────────────────────────────────

program
  .command("lobby")
  .description("Log in and list the games the lobby offers")
  .action(async (_opts: unknown, cmd: Command) => {
    const config = resolveConfig(cmd.optsWithGlobals<GlobalOpts>());
    const client = createClient(config);
    try {
      const ids = await client.connect(config.serverUrl, config.username, config.password);
      console.log(formatLobby(ids));
    } finally {
      await client.disconnect();
    }
  });

// ─── Play Command ─────────────────────────────────────────────────

program
  .command("play")
  .description("Start a character and run tactical auto-play")
  .option("-g, --game <id>", "Lobby game id (default: first offered)")
  .option("--species <key>", "Species menu key")
  .option("--background <key>", "Background menu key")
  .option("--weapon <key>", "Starting weapon menu key")
  .option("--narrate-interval <n>", "Actions allowed between narrations, 0 to disable", (v) => parseIntOption(v, "narrate interval", 0))
  .option("--action-timeout <ms>", "Per-action timeout in milliseconds", (v) => parseIntOption(v, "action timeout", 100))
  .option("-r, --rounds <n>", "Auto-play runs to chain while stops are routine", (v) => parseIntOption(v, "rounds"), 1)
  .option("--save", "Save the character on exit instead of abandoning it")
  .option("--max-actions <n>", "Actions per auto-play run", (v) => parseIntOption(v, "max actions"))
  .option("--stop-hp <percent>", "Stop when HP falls below this percentage", (v) => parseIntOption(v, "stop HP percent"))
  .option("--max-enemies <n>", "Stop when this many non-trivial enemies are in sight", (v) => parseIntOption(v, "max enemies"))
  .option("--no-stop-on-items", "Keep going after picking items up")
  .option("--no-stop-on-altar", "Keep going past altars")
  .option("--descend", "Take the stairs down when a floor is fully explored")
  .action(async (_opts: unknown, cmd: Command) => {
    const opts = cmd.optsWithGlobals<PlayOpts>();
    const config = resolveConfig(opts);
    const client = createClient(config);

    let interrupted = false;
    process.on("SIGINT", () => {
      if (interrupted) process.exit(130);
      interrupted = true;
      console.log(yellow("\nStopping after the current action (Ctrl-C again to quit now)..."));
      client.requestShutdown();
    });

    const autoPlay: Partial<AutoPlayOptions> = {
      stopOnItems: opts.stopOnItems,
      stopOnAltar: opts.stopOnAltar,
      autoDescend: opts.descend ?? false,
    };
    if (opts.maxActions !== undefined) autoPlay.maxActions = opts.maxActions;
    if (opts.stopHp !== undefined) autoPlay.stopHpPercent = opts.stopHp;
    if (opts.maxEnemies !== undefined) autoPlay.maxNonTrivialEnemies = opts.maxEnemies;

    const outcome = await playSession(
      client,
      config,
      { rounds: opts.rounds, save: opts.save ?? false, autoPlay },
      (line) => console.log(line),
    );
    if (outcome.died) process.exitCode = 2;
  });

try {
  await program.parseAsync(process.argv);
} catch (err) {
  console.error(red(`Error: ${err instanceof Error ? err.message : String(err)}`));
  process.exit(1);
}
