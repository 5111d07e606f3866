import {
  InputMode,
  NotConnectedError,
  SessionError,
  systemClock,
  type AutoPlayOptions,
  type AutoPlayReport,
  type Clock,
  type InboundMessage,
  type InventoryItem,
  type NearbyEnemy,
  type PlayerState,
} from "@crawlbridge/schemas";
import { ActionDispatcher } from "./action-dispatcher.js";
import { resolveAutoPlayOptions, runAutoPlay, type AutoPlayHost } from "./autoplay.js";
import { consoleLoggerFactory, type Logger, type LoggerFactory } from "./logger.js";
import { Notepad } from "./notepad.js";
import { ProtocolSession } from "./protocol-session.js";
import { StateMirror } from "./state-mirror.js";
import { StatusStore } from "./status-store.js";
import { directionKey, parseDirection, type Direction } from "./text.js";
import { WebTilesTransport, type GameTransport, type TransportFactory } from "./transport.js";
import { UIOverlayTracker } from "./ui-overlay.js";

export interface GameClientOptions {
  narrateInterval?: number;
  actionTimeoutMs?: number;
  statusPath?: string | null;
  loggers?: LoggerFactory;
  clock?: Clock;
  transportFactory?: TransportFactory;
}

const NOT_ON_STAIRS = "[Not on stairs. Use getLandmarks() to find stairs, then move() toward them step by step.]";
const SESSION_ENDED = "Session has ended (death or win recorded). Call clearSessionEnded() before starting another game.";
const TARGETING_MODES: ReadonlySet<number> = new Set<number>([
  InputMode.TARGET,
  InputMode.TARGET_DIR,
  InputMode.TARGET_PATH,
  InputMode.PROMPT,
]);

function failedMoveHint(n: number, direction: string): string | null {
  if (n >= 5) {
    return `[You've failed to move ${n} times in a row. Stop and reconsider: getLandmarks(), getMap() and autoExplore() are better ways to navigate.]`;
  }
  if (n >= 3) {
    return `[${n} consecutive failed moves. There's a wall or obstacle to the ${direction}. Think about what other navigation tools are available.]`;
  }
  return null;
}

/**
 * The whole client behind one object: session, mirror, overlays and the
 * dispatcher, plus the notepad and status record. Commands return the
 * messages the server produced and informational strings; only use before
 * {@link connect} throws.
 */
export class GameClient implements AutoPlayHost {
  readonly mirror: StateMirror;
  readonly overlay = new UIOverlayTracker();
  readonly dispatcher: ActionDispatcher;
  readonly notepad: Notepad;
  readonly status: StatusStore;

  private readonly session: ProtocolSession;
  private readonly clock: Clock;
  private readonly loggers: LoggerFactory;
  private readonly logger: Logger;
  private failedMoves = 0;
  private sessionEnded = false;
  private shutdown = false;

  constructor(options: GameClientOptions = {}) {
    this.loggers = options.loggers ?? consoleLoggerFactory();
    this.clock = options.clock ?? systemClock;
    this.logger = this.loggers("client");

    const transportLogger = this.loggers("transport");
    const transportFactory: TransportFactory =
      options.transportFactory ??
      ((url) => WebTilesTransport.connect(url, { logger: transportLogger, clock: this.clock }));

    this.mirror = new StateMirror(this.loggers("mirror"));
    this.session = new ProtocolSession({
      transportFactory,
      clock: this.clock,
      logger: this.loggers("session"),
    });
    this.dispatcher = new ActionDispatcher({
      mirror: this.mirror,
      overlay: this.overlay,
      clock: this.clock,
      logger: this.loggers("dispatch"),
      narrateInterval: options.narrateInterval ?? 5,
      defaultTimeoutMs: options.actionTimeoutMs,
    });
    this.notepad = new Notepad(() => {
      const { place, depth } = this.mirror.player;
      return place ? `${place}:${depth}` : "general";
    });
    this.status = new StatusStore(options.statusPath ?? null, this.loggers("status"));
    this.status.load();
  }

  get player(): Readonly<PlayerState> {
    return this.mirror.player;
  }

  get inGame(): boolean {
    return this.dispatcher.inGame;
  }

  get gameIds(): readonly string[] {
    return this.session.gameIds;
  }

  get consecutiveFailedMoves(): number {
    return this.failedMoves;
  }

  get hasSessionEnded(): boolean {
    return this.sessionEnded;
  }

  get shutdownRequested(): boolean {
    return this.shutdown;
  }

  // ─── Connection and lifecycle ─────────────────────────────────────

  async connect(url: string, username: string, password: string): Promise<string[]> {
    const ids = await this.session.connect(url, username, password);
    this.dispatcher.attach(this.requireTransport());
    this.logger.info("Connected", { url, games: ids.length });
    return ids;
  }

  /**
   * Starts a fresh character. A resumed save (no creation choice offered)
   * is abandoned and the start retried once.
   */
  async startGame(species: string, background: string, weapon = "", gameId = ""): Promise<string> {
    if (this.sessionEnded) return SESSION_ENDED;
    const transport = this.requireTransport();
    if (this.dispatcher.inGame) await this.quitGame();

    const id = gameId || this.session.gameIds[0];
    if (!id) throw new SessionError("The lobby offered no games");
    const keys = [species, background, weapon];

    let startup = await this.session.play(id, keys);
    if (!startup.sawNewGameChoice) {
      this.logger.info("Resumed a stale save, abandoning it", { gameId: id });
      await this.session.abandon();
      this.status.increment("attempt");
      this.status.write("Clearing stale save, restarting...", this.mirror.player);
      await this.clock.sleep(500);
      await transport.recvMessages(1000);
      startup = await this.session.play(id, keys);
    }

    this.mirror.reset();
    this.overlay.clear();
    this.dispatcher.clearPendingPrompt();
    this.failedMoves = 0;
    const firstMap = startup.messages.findIndex((msg) => msg.msg === "map");
    startup.messages.forEach((msg, i) => {
      this.mirror.apply(msg);
      // Creation screens before the first map are not overlays of the game
      if (firstMap >= 0 && i >= firstMap) this.overlay.apply(msg);
    });

    this.dispatcher.inGame = true;
    this.mirror.clearMessages();
    for (let i = 0; i < 5; i++) {
      if ((await this.dispatcher.drain(1000)).length === 0) break;
    }
    this.logger.info("Game started", { gameId: id, species, background });
    return this.mirror.getStateText();
  }

  async quitGame(): Promise<string> {
    if (!this.dispatcher.inGame) return "No game in progress.";
    await this.session.abandon();
    this.dispatcher.inGame = false;
    return "Game abandoned.";
  }

  async saveGame(): Promise<string> {
    if (!this.dispatcher.inGame) return "No game in progress.";
    const confirmed = await this.session.save();
    this.dispatcher.inGame = false;
    return confirmed ? "Game saved." : "Save requested but the server did not return to the lobby.";
  }

  async disconnect(): Promise<void> {
    if (this.dispatcher.inGame && this.session.connected) await this.session.abandon();
    this.session.close();
    this.dispatcher.detach();
  }

  // ─── Movement and exploration ─────────────────────────────────────

  async move(direction: string): Promise<string[]> {
    const dir = parseDirection(direction);
    if (!dir) return [`Invalid direction: ${direction}. Use n/s/e/w/ne/nw/se/sw`];
    const turnBefore = this.mirror.player.turn;
    const result = await this.dispatcher.exchange([directionKey(dir)]);
    if (result.rejected) return result.messages;

    const messages = result.messages;
    if (this.mirror.player.turn === turnBefore) {
      this.failedMoves += 1;
      messages.push(`[Nothing happened: there's a wall or obstacle to the ${dir}.]`);
      const hint = failedMoveHint(this.failedMoves, dir);
      if (hint) messages.push(hint);
    } else {
      this.failedMoves = 0;
    }
    return messages;
  }

  attack(direction: string): Promise<string[]> {
    return this.move(direction);
  }

  async autoExplore(): Promise<string[]> {
    const turnBefore = this.mirror.player.turn;
    const result = await this.dispatcher.exchange(["o"]);
    if (result.rejected) return result.messages;

    const messages = result.messages;
    if (this.mirror.player.turn === turnBefore) {
      const recent = messages.join(" ").toLowerCase();
      const threatened =
        this.mirror.getNearbyEnemies().length > 0 ||
        recent.includes("is nearby") ||
        recent.includes("comes into view");
      messages.push(
        threatened
          ? "[Explore interrupted by enemy.]"
          : "[Floor fully explored. Call goDownstairs() to travel to the nearest downstairs and descend.]",
      );
    }
    return messages;
  }

  async autoFight(): Promise<string[]> {
    if (this.mirror.getNearbyEnemies().length === 0) {
      return ["No enemies in sight. Use autoExplore() to keep moving."];
    }
    return this.dispatcher.dispatch(["key_tab"]);
  }

  async rest(): Promise<string[]> {
    const enemies = this.mirror.getNearbyEnemies();
    if (enemies.length > 0) {
      const names = enemies.slice(0, 3).map((e) => e.name);
      return [`Can't rest: enemies in sight: ${names.join(", ")}. Kill or flee first.`];
    }
    return this.dispatcher.dispatch(["5"]);
  }

  waitTurn(): Promise<string[]> {
    return this.dispatcher.dispatch(["."]);
  }

  goUpstairs(): Promise<string[]> {
    return this.takeStairs("<");
  }

  goDownstairs(): Promise<string[]> {
    return this.takeStairs(">");
  }

  private async takeStairs(key: "<" | ">"): Promise<string[]> {
    const { place, depth } = this.mirror.player;
    const result = await this.dispatcher.exchange([key]);
    if (result.rejected) return result.messages;

    const now = this.mirror.player;
    const changed = now.place !== place || (key === ">" ? now.depth > depth : now.depth < depth);
    if (changed || now.dead) return result.messages;

    const travelled = await this.interlevelTravel(key);
    if (travelled) return travelled;
    return [...result.messages, NOT_ON_STAIRS];
  }

  /** `G` travel to the nearest stairs of the given kind; null when no prompt appeared. */
  private async interlevelTravel(destination: "<" | ">"): Promise<string[] | null> {
    this.dispatcher.send("G");
    await this.clock.sleep(300);
    const batch = await this.dispatcher.drain(1000);
    const prompted = batch.some(
      (msg: InboundMessage) =>
        msg.msg === "menu" ||
        (msg.msg === "input_mode" && (msg.mode === InputMode.PROMPT || msg.mode === InputMode.NORMAL)),
    );
    if (!prompted) {
      this.dispatcher.send("key_esc");
      await this.clock.sleep(100);
      await this.dispatcher.drain(200);
      return null;
    }
    return (await this.dispatcher.exchange([destination, "key_enter"], { timeoutMs: 15_000, menuOk: true })).messages;
  }

  // ─── Items ────────────────────────────────────────────────────────

  async pickup(): Promise<string[]> {
    const messages = await this.dispatcher.dispatch([","]);
    if (this.overlay.menu) {
      messages.push(
        "[A pickup menu opened. Use readUi() to see items, selectMenuItem() to pick specific items, or dismiss() to cancel.]",
      );
    }
    return messages;
  }

  wield(slot: string): Promise<string[]> {
    return this.dispatcher.dispatch(["w", slot]);
  }

  wear(slot: string): Promise<string[]> {
    return this.dispatcher.dispatch(["W", slot]);
  }

  quaff(slot: string): Promise<string[]> {
    return this.dispatcher.dispatch(["q", slot]);
  }

  readScroll(slot: string): Promise<string[]> {
    return this.dispatcher.dispatch(["r", slot]);
  }

  drop(slot: string): Promise<string[]> {
    return this.dispatcher.dispatch(["d", slot]);
  }

  zapWand(slot: string, direction = ""): Promise<string[]> {
    const keys = ["V", slot];
    if (direction) keys.push(this.targetKey(direction));
    return this.dispatcher.dispatch(keys);
  }

  evoke(slot: string): Promise<string[]> {
    return this.dispatcher.dispatch(["v", slot]);
  }

  throwItem(slot: string, direction: string): Promise<string[]> {
    return this.dispatcher.dispatch(["F", slot, this.targetKey(direction)]);
  }

  putOnJewelry(slot: string): Promise<string[]> {
    return this.dispatcher.dispatch(["P", slot]);
  }

  removeJewelry(slot = ""): Promise<string[]> {
    return this.dispatcher.dispatch(slot ? ["R", slot] : ["R"]);
  }

  takeOffArmour(slot: string): Promise<string[]> {
    return this.dispatcher.dispatch(["T", slot]);
  }

  examine(slot: string): string[] {
    const item = this.mirror.findItem(slot);
    if (!item) return [`No item in slot '${slot}'.`];
    return [`${slot} - ${item.name} (qty: ${item.quantity})`];
  }

  // ─── Abilities and magic ──────────────────────────────────────────

  useAbility(key: string): Promise<string[]> {
    return this.dispatcher.dispatch(["a", key]);
  }

  /**
   * Opens the spell, then answers targeting with the direction (or `.` for
   * the default target). Instant spells resolve in the first stage.
   */
  async castSpell(key: string, direction = ""): Promise<string[]> {
    const refusal = this.dispatcher.precheck();
    if (refusal) return [refusal];

    this.dispatcher.send("z", key);
    await this.clock.sleep(150);
    const batch = await this.dispatcher.drain(500);
    const targeting = batch.some((msg) => msg.msg === "input_mode" && TARGETING_MODES.has(msg.mode));

    if (!targeting) {
      await this.dispatcher.drain(300);
      return this.mirror.getMessages(5);
    }

    const messages = await this.dispatcher.dispatch([direction ? this.targetKey(direction) : "."]);
    const blocked = messages.some((m) => {
      const lower = m.toLowerCase();
      return lower.includes("can't see") || lower.includes("can't reach");
    });
    if (blocked) {
      this.dispatcher.send("key_esc");
      await this.clock.sleep(100);
      await this.dispatcher.drain(300);
      messages.push(
        "[Spell targeting cancelled: target not visible. Try without a direction to auto-target the nearest enemy.]",
      );
    }
    return messages;
  }

  async pray(): Promise<string[]> {
    const god = this.mirror.player.god.toLowerCase();
    if (!god || god === "none" || god === "no god") {
      return ["You don't worship a god. Find an altar and use it to join a religion."];
    }
    return this.dispatcher.dispatch(["p"]);
  }

  // ─── Prompts ──────────────────────────────────────────────────────

  confirm(): Promise<string[]> {
    return this.dispatcher.dispatch(["Y"]);
  }

  deny(): Promise<string[]> {
    return this.dispatcher.dispatch(["N"]);
  }

  escape(): Promise<string[]> {
    return this.dispatcher.dispatch(["key_esc"], { menuOk: true });
  }

  respond(answer: string): Promise<string[]> {
    const lower = answer.toLowerCase();
    const key = lower === "yes" ? "Y" : lower === "no" ? "N" : "key_esc";
    return this.dispatcher.dispatch([key], { menuOk: true });
  }

  async chooseStat(stat: string): Promise<string[]> {
    const choice = stat.toUpperCase();
    if (choice !== "S" && choice !== "I" && choice !== "D") {
      return ["[ERROR: Invalid stat. Use 'S' (Strength), 'I' (Intelligence), or 'D' (Dexterity).]"];
    }
    if (this.dispatcher.pendingPrompt !== "stat_increase") return ["[No stat increase prompt pending.]"];
    this.dispatcher.clearPendingPrompt();
    return this.dispatcher.dispatch([choice], { menuOk: true });
  }

  sendKeys(keys: string): Promise<string[]> {
    return this.dispatcher.dispatch([...keys]);
  }

  // ─── Queries ──────────────────────────────────────────────────────

  getStats(): string {
    return this.mirror.getStats();
  }

  getStateText(): string {
    return this.mirror.getStateText();
  }

  getMap(radius = 7): string {
    return this.mirror.getMap(radius);
  }

  getLandmarks(): string {
    return this.mirror.renderLandmarks();
  }

  getInventory(): InventoryItem[] {
    return this.mirror.getInventory();
  }

  getNearbyEnemies(): NearbyEnemy[] {
    return this.mirror.getNearbyEnemies();
  }

  getMessages(n = 10): string[] {
    return this.mirror.getMessages(n);
  }

  // ─── Menus and popups ─────────────────────────────────────────────

  readUi(): string {
    return this.overlay.read();
  }

  selectMenuItem(key: string): Promise<string> {
    return this.overlay.select(this.dispatcher.link(), key);
  }

  dismiss(): Promise<string> {
    return this.overlay.dismiss(this.dispatcher.link());
  }

  // ─── Notes ────────────────────────────────────────────────────────

  writeNote(text: string, page = ""): string {
    return this.notepad.write(text, page);
  }

  readNotes(page = ""): string {
    return this.notepad.read(page);
  }

  ripPage(page: string): string {
    return this.notepad.rip(page);
  }

  // ─── Narration and status ─────────────────────────────────────────

  narrate(thought: string): string {
    this.dispatcher.resetNarration();
    this.status.write(thought, this.mirror.player);
    this.logger.info("Narration", { thought });
    return "Narration recorded.";
  }

  newAttempt(): string {
    if (this.sessionEnded) return SESSION_ENDED;
    const attempt = this.status.increment("attempt");
    this.status.write("Starting new game...", this.mirror.player);
    return `Attempt ${attempt} started.`;
  }

  recordDeath(cause = ""): string {
    const p = this.mirror.player;
    if (!p.dead) return `You're not dead! HP: ${p.hp}/${p.maxHp}. Keep playing.`;
    this.status.increment("deaths");
    this.sessionEnded = true;
    this.status.write(cause ? `Died: ${cause}` : "Died.", p);
    return "Death recorded.";
  }

  recordWin(): string {
    this.status.increment("wins");
    this.sessionEnded = true;
    this.status.write("Won!", this.mirror.player);
    return "Win recorded.";
  }

  clearSessionEnded(): void {
    this.sessionEnded = false;
  }

  // ─── Auto-play ────────────────────────────────────────────────────

  /**
   * Runs the tactical loop. The whole run counts as one action against the
   * narration cadence.
   */
  async autoPlay(options: Partial<AutoPlayOptions> = {}): Promise<AutoPlayReport> {
    const resolved = resolveAutoPlayOptions(options);
    const refusal = this.dispatcher.precheck();
    if (refusal) {
      const turn = this.mirror.player.turn;
      return { stopReason: refusal, actions: 0, kills: 0, killed: [], pickups: 0, picked: [], floors: [], startTurn: turn, endTurn: turn };
    }
    return this.dispatcher.suspendNarration(() => runAutoPlay(this, resolved, this.loggers("autoplay")));
  }

  /** Stops auto-play before its next action. */
  requestShutdown(): void {
    this.shutdown = true;
  }

  // ─── Internals ────────────────────────────────────────────────────

  private requireTransport(): GameTransport {
    const transport = this.session.transport;
    if (!transport) throw new NotConnectedError();
    return transport;
  }

  /** Compass names become direction keys; anything else is sent as typed. */
  private targetKey(direction: string): string {
    const dir: Direction | undefined = parseDirection(direction);
    return dir ? directionKey(dir) : direction;
  }
}
