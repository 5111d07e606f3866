import { NotConnectedError, SessionError, TransportError, remainingMs, type Clock, type InboundMessage } from "@crawlbridge/schemas";
import type { Logger } from "./logger.js";
import { waitFor, type GameTransport, type TransportFactory } from "./transport.js";

export interface SessionOptions {
  transportFactory: TransportFactory;
  clock: Clock;
  logger: Logger;
}

export interface PlayResult {
  messages: InboundMessage[];
  /** False when the server resumed a saved game instead of offering character creation. */
  sawNewGameChoice: boolean;
}

const GAME_LINK = /#play-([^"]+)"/g;

export function scrapeGameIds(messages: InboundMessage[]): string[] {
  for (const msg of messages) {
    if (msg.msg !== "set_game_links") continue;
    const ids = [...msg.content.matchAll(GAME_LINK)].map((m) => m[1]).filter((id): id is string => !!id);
    if (ids.length > 0) return ids;
  }
  return [];
}

/**
 * Lobby-level protocol: account, game list and the start/quit/save
 * sequences. Game-time traffic goes through the dispatcher instead.
 */
export class ProtocolSession {
  private _transport: GameTransport | null = null;
  private _gameIds: string[] = [];

  constructor(private readonly options: SessionOptions) {}

  get transport(): GameTransport | null {
    return this._transport;
  }

  get gameIds(): readonly string[] {
    return this._gameIds;
  }

  get connected(): boolean {
    return this._transport?.isOpen ?? false;
  }

  /**
   * Registers the account, falling back to a plain login on a fresh socket
   * when registration is refused. Returns the game ids the lobby offers.
   */
  async connect(url: string, username: string, password: string): Promise<string[]> {
    const { clock, logger } = this.options;
    let transport = await this.open(url);

    transport.send({ msg: "register", username, password, email: "" });
    const registered = await waitFor(transport, clock, "login_success", 2000);
    const seen: InboundMessage[] = [...registered.messages];

    if (registered.found) {
      logger.info("Registered new account", { username });
    } else {
      // The server leaves a refused registration in a bad state
      transport.close();
      await clock.sleep(200);
      transport = await this.open(url);
      transport.send({ msg: "login", username, password });
      const login = await waitFor(transport, clock, "login_success", 10_000);
      if (!login.found) {
        transport.close();
        this._transport = null;
        throw new SessionError("Login failed");
      }
      seen.push(...login.messages);
      logger.info("Logged in", { username });
    }

    transport.send({ msg: "go_lobby" });
    const lobby = await waitFor(transport, clock, "go_lobby", 10_000);
    seen.push(...lobby.messages);

    this._gameIds = scrapeGameIds(seen);
    logger.debug("Lobby game ids", { ids: this._gameIds });
    return [...this._gameIds];
  }

  /**
   * Starts `gameId`, answering each character-creation choice with the next
   * non-empty key. The first map message means the game is running.
   */
  async play(gameId: string, creationKeys: string[]): Promise<PlayResult> {
    const transport = this.requireTransport();
    const { clock } = this.options;
    const keys = creationKeys.filter((k) => k.length > 0);
    let next = 0;
    let sawNewGameChoice = false;
    const messages: InboundMessage[] = [];

    transport.send({ msg: "play", game_id: gameId });
    const deadline = clock.now() + 30_000;
    while (clock.now() < deadline) {
      const batch = await transport.recvMessages(Math.min(2000, remainingMs(clock, deadline)));
      messages.push(...batch);
      let gotMap = false;
      for (const msg of batch) {
        if (msg.msg === "map") {
          gotMap = true;
        } else if (msg.msg === "ui-state" && msg.type === "newgame-choice") {
          sawNewGameChoice = true;
          const key = keys[next];
          if (key !== undefined) {
            transport.sendKey(key);
            next += 1;
          }
        }
      }
      if (gotMap) return { messages, sawNewGameChoice };
      if (batch.length === 0 && !transport.isOpen) throw new TransportError("Connection closed while starting game");
    }
    throw new SessionError("Timeout starting game");
  }

  /** Quits the running game for good (Ctrl-Q, "yes") and waits for the lobby. */
  async abandon(): Promise<void> {
    const transport = this.requireTransport();
    const { clock } = this.options;

    for (let i = 0; i < 3; i++) {
      transport.sendKey("key_esc");
      await clock.sleep(100);
    }
    await transport.recvMessages(500);

    transport.sendKey("key_ctrl_q");
    await clock.sleep(500);
    await transport.recvMessages(500);

    for (const ch of "yes") {
      transport.sendKey(ch);
      await clock.sleep(50);
    }
    transport.sendKey("key_enter");
    await clock.sleep(500);

    for (let i = 0; i < 10; i++) {
      const batch = await transport.recvMessages(500);
      if (batch.some((msg) => msg.msg === "go_lobby")) return;
      if (batch.length === 0) break;
    }
    this.options.logger.debug("No lobby confirmation after quitting");
  }

  /** Saves and leaves to the lobby. */
  async save(): Promise<boolean> {
    const transport = this.requireTransport();
    transport.sendKey("key_ctrl_s");
    const { found } = await waitFor(transport, this.options.clock, "go_lobby", 10_000);
    return found;
  }

  close(): void {
    this._transport?.close();
    this._transport = null;
  }

  private async open(url: string): Promise<GameTransport> {
    this.close();
    const transport = await this.options.transportFactory(url);
    this._transport = transport;
    await transport.recvMessages(500);
    return transport;
  }

  private requireTransport(): GameTransport {
    if (!this._transport) throw new NotConnectedError();
    return this._transport;
  }
}
