import {
  InputMode,
  NotConnectedError,
  TransportError,
  remainingMs,
  type Clock,
  type InboundMessage,
} from "@crawlbridge/schemas";
import type { Logger } from "./logger.js";
import type { StateMirror } from "./state-mirror.js";
import { stripFormatting } from "./text.js";
import type { GameTransport } from "./transport.js";
import type { OverlayLink, UIOverlayTracker } from "./ui-overlay.js";

export type PendingPrompt = "stat_increase";

export interface DispatcherOptions {
  mirror: StateMirror;
  overlay: UIOverlayTracker;
  clock: Clock;
  logger: Logger;
  /** Actions allowed between narrations; 0 turns the check off. */
  narrateInterval: number;
  defaultTimeoutMs?: number;
}

export interface DispatchOptions {
  timeoutMs?: number;
  /** Menu and prompt answers: skips the overlay/prompt guards and the narration count. */
  menuOk?: boolean;
}

export interface ExchangeResult {
  messages: string[];
  /** Turned away by a guard; nothing was sent. */
  rejected: boolean;
  ready: boolean;
}

/** Longest a recovery round can add to a dispatch: escapes, redraw pause, five drains. */
export const RECOVERY_BUDGET_MS = 3 * 100 + 300 + 5 * 500;

const RECOVERY_THRESHOLD = 3;
const POLL_MS = 500;
const STAT_PROMPT_MARKER = "(S)trength";

const UNKNOWN_COMMAND_HINT =
  "[HINT: 'Unknown command' means a key you sent was invalid in this context. Check the arguments you sent.]";

/**
 * Sends keys and pumps the server until it asks for input again. Every
 * message read is applied to the mirror and the overlay tracker here; this
 * is the only place game state changes during play.
 */
export class ActionDispatcher {
  private _transport: GameTransport | null = null;
  private _inGame = false;
  private _pendingPrompt: PendingPrompt | null = null;
  private _actionsSinceNarrate = 0;
  private _consecutiveTimeouts = 0;
  private _recoveries = 0;
  private narrationSuspended = false;

  private readonly mirror: StateMirror;
  private readonly overlay: UIOverlayTracker;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly narrateInterval: number;
  private readonly defaultTimeoutMs: number;

  constructor(options: DispatcherOptions) {
    this.mirror = options.mirror;
    this.overlay = options.overlay;
    this.clock = options.clock;
    this.logger = options.logger;
    this.narrateInterval = options.narrateInterval;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 5000;
  }

  // ─── Lifecycle ────────────────────────────────────────────────────

  attach(transport: GameTransport): void {
    this._transport = transport;
  }

  detach(): void {
    this._transport = null;
    this._inGame = false;
  }

  get transport(): GameTransport | null {
    return this._transport;
  }

  get inGame(): boolean {
    return this._inGame;
  }

  set inGame(value: boolean) {
    this._inGame = value;
  }

  get pendingPrompt(): PendingPrompt | null {
    return this._pendingPrompt;
  }

  clearPendingPrompt(): void {
    this._pendingPrompt = null;
  }

  get actionsSinceNarrate(): number {
    return this._actionsSinceNarrate;
  }

  resetNarration(): void {
    this._actionsSinceNarrate = 0;
  }

  get consecutiveTimeouts(): number {
    return this._consecutiveTimeouts;
  }

  get recoveries(): number {
    return this._recoveries;
  }

  /**
   * Runs `fn` with the narration check and count switched off, counting the
   * whole run as one action.
   */
  async suspendNarration<T>(fn: () => Promise<T>): Promise<T> {
    this._actionsSinceNarrate += 1;
    this.narrationSuspended = true;
    try {
      return await fn();
    } finally {
      this.narrationSuspended = false;
    }
  }

  link(): OverlayLink {
    return { transport: this.requireTransport(), clock: this.clock, mirror: this.mirror };
  }

  // ─── Guards ───────────────────────────────────────────────────────

  /** The in-band refusal a dispatch would return right now, or null. */
  precheck(menuOk = false): string | null {
    this.requireTransport();
    if (!this._inGame) return "Not in game";
    if (menuOk) return null;

    if (
      this.narrateInterval > 0 &&
      !this.narrationSuspended &&
      this._actionsSinceNarrate >= this.narrateInterval
    ) {
      return `[ERROR: You must call narrate() before continuing. You've taken ${this._actionsSinceNarrate} actions without narrating.]`;
    }
    if (this._pendingPrompt === "stat_increase") {
      return "[ERROR: Stat increase prompt is waiting! Call chooseStat('s'), chooseStat('i'), or chooseStat('d') to pick Strength, Intelligence, or Dexterity.]";
    }
    const menu = this.overlay.menu;
    if (menu) {
      const title = stripFormatting(menu.title) || "a menu";
      return `[ERROR: ${title} is still open. Use readUi() to see it, selectMenuItem() to interact, or dismiss() to close it first.]`;
    }
    if (this.overlay.popup) {
      return "[ERROR: A popup is still open. Use readUi() to see it or dismiss() to close it first.]";
    }
    return null;
  }

  // ─── Exchanges ────────────────────────────────────────────────────

  async dispatch(keys: string[], options: DispatchOptions = {}): Promise<string[]> {
    return (await this.exchange(keys, options)).messages;
  }

  async exchange(keys: string[], options: DispatchOptions = {}): Promise<ExchangeResult> {
    const menuOk = options.menuOk ?? false;
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

    const refusal = this.precheck(menuOk);
    if (refusal) return { messages: [refusal], rejected: true, ready: false };
    const transport = this.requireTransport();
    if (!menuOk && !this.narrationSuspended) this._actionsSinceNarrate += 1;

    const start = this.mirror.messageCount;
    for (const msg of await transport.recvMessages(50)) this.absorb(msg);

    for (const key of keys) transport.sendKey(key);

    const deadline = this.clock.now() + timeoutMs;
    let ready = false;
    while (!ready && !this.mirror.player.dead && this.clock.now() < deadline) {
      const batch = await transport.recvMessages(Math.min(POLL_MS, remainingMs(this.clock, deadline)));
      for (const msg of batch) {
        if (this.handle(msg, keys, transport)) ready = true;
      }
      if (!ready && batch.length === 0 && !transport.isOpen) {
        this._inGame = false;
        this.logger.warn("Connection lost during exchange", { keys });
        throw new TransportError("Connection closed by server");
      }
    }

    if (ready) {
      for (const msg of await transport.recvMessages(100)) this.absorb(msg);
      this._consecutiveTimeouts = 0;
    } else if (!this.mirror.player.dead) {
      this._consecutiveTimeouts += 1;
      this.logger.warn("No ready signal before timeout", {
        keys,
        timeoutMs,
        consecutive: this._consecutiveTimeouts,
      });
      if (this._consecutiveTimeouts >= RECOVERY_THRESHOLD) await this.recover(transport);
    } else {
      this._consecutiveTimeouts = 0;
    }

    const messages = this.mirror.messagesSince(start);
    if (messages.some((m) => m.includes("Unknown command"))) messages.push(UNKNOWN_COMMAND_HINT);
    return { messages, rejected: false, ready };
  }

  /** Raw keys outside an exchange; the caller reads the answer itself. */
  send(...keys: string[]): void {
    const transport = this.requireTransport();
    for (const key of keys) transport.sendKey(key);
  }

  /** One read applied to the mirror and the overlay tracker; returns what was read. */
  async drain(timeoutMs: number): Promise<InboundMessage[]> {
    const batch = await this.requireTransport().recvMessages(timeoutMs);
    for (const msg of batch) this.absorb(msg);
    return batch;
  }

  // ─── Internals ────────────────────────────────────────────────────

  private requireTransport(): GameTransport {
    if (!this._transport) throw new NotConnectedError();
    return this._transport;
  }

  private absorb(msg: InboundMessage): void {
    this.mirror.apply(msg);
    this.overlay.apply(msg);
  }

  /** Applies one message and reports whether the server is ready for input. */
  private handle(msg: InboundMessage, keys: string[], transport: GameTransport): boolean {
    this.mirror.apply(msg);
    if (this.overlay.apply(msg)) {
      this.logger.info("Overlay opened or changed", { kind: msg.msg, keys });
      return true;
    }
    if (msg.msg === "close") {
      this.logger.info("Game closed by server", { keys });
      this.mirror.markDead();
      this._inGame = false;
      return false;
    }
    if (msg.msg !== "input_mode") return false;

    switch (msg.mode) {
      case InputMode.COMMAND:
        this._pendingPrompt = null;
        return true;
      case InputMode.MORE:
        transport.sendKey(" ");
        return false;
      case InputMode.PROMPT:
      case InputMode.YESNO:
        if (this.mirror.getMessages(5).some((m) => m.includes(STAT_PROMPT_MARKER))) {
          this._pendingPrompt = "stat_increase";
          this.logger.info("Stat increase prompt detected", { keys });
          return true;
        }
        this.logger.info("Escaping unexpected text prompt", { keys, mode: msg.mode });
        transport.sendKey("key_esc");
        return false;
      case InputMode.NORMAL:
        return false;
      case InputMode.TARGET:
      case InputMode.TARGET_DIR:
      case InputMode.TARGET_PATH:
        return true;
      default:
        this.logger.info("Escaping unknown input mode", { keys, mode: msg.mode });
        transport.sendKey("key_esc");
        return false;
    }
  }

  private async recover(transport: GameTransport): Promise<void> {
    this.logger.warn("Repeated timeouts, resynchronising", { consecutive: this._consecutiveTimeouts });
    for (let i = 0; i < 3; i++) {
      transport.sendKey("key_esc");
      await this.clock.sleep(100);
    }
    transport.sendKey("key_ctrl_r");
    await this.clock.sleep(300);
    this.overlay.clear();
    for (let i = 0; i < 5; i++) {
      const batch = await transport.recvMessages(500);
      if (batch.length === 0) break;
      for (const msg of batch) this.absorb(msg);
    }
    this._consecutiveTimeouts = 0;
    this._recoveries += 1;
  }
}
