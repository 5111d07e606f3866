import {
  TransportError,
  type Clock,
  type InboundMessage,
  type OutboundMessage,
} from "@crawlbridge/schemas";
import { decodeMessage, encodeKey } from "./codec.js";
import type { GameTransport, SocketLike, TransportFactory, WireFrame } from "./transport.js";
import type { Logger, LoggerFactory } from "./logger.js";

/** Clock whose time only moves when something sleeps or waits on it. */
export class ManualClock implements Clock {
  private time: number;

  constructor(start = 0) {
    this.time = start;
  }

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    if (ms > 0) this.time += ms;
    await Promise.resolve();
  }

  advance(ms: number): void {
    this.time += ms;
  }
}

type KeyHandler = (key: string, transport: ScriptedTransport) => void;
type SendHandler = (message: OutboundMessage, transport: ScriptedTransport) => void;

/**
 * In-process stand-in for a webtiles connection. Tests queue server traffic
 * with {@link push} or script it with {@link onKey}/{@link onSend}. A receive
 * on an empty inbox returns nothing and moves the clock by the full timeout.
 */
export class ScriptedTransport implements GameTransport {
  readonly sent: OutboundMessage[] = [];
  readonly keys: string[] = [];
  recvCalls = 0;
  private inbox: InboundMessage[] = [];
  private keyHandlers: KeyHandler[] = [];
  private sendHandlers: SendHandler[] = [];
  private open = true;

  constructor(readonly clock: ManualClock) {}

  get isOpen(): boolean {
    return this.open;
  }

  push(...messages: InboundMessage[]): void {
    this.inbox.push(...messages);
  }

  /** Wire-shaped objects, decoded as the real transport would. */
  pushWire(...raw: Record<string, unknown>[]): void {
    this.push(...raw.map(decodeMessage));
  }

  onKey(handler: KeyHandler): void {
    this.keyHandlers.push(handler);
  }

  onSend(handler: SendHandler): void {
    this.sendHandlers.push(handler);
  }

  send(message: OutboundMessage): void {
    if (!this.open) throw new TransportError("Socket is closed");
    this.sent.push(message);
    for (const handler of this.sendHandlers) handler(message, this);
  }

  sendKey(key: string): void {
    this.send(encodeKey(key));
    this.keys.push(key);
    for (const handler of this.keyHandlers) handler(key, this);
  }

  async recvMessages(timeoutMs: number): Promise<InboundMessage[]> {
    this.recvCalls += 1;
    await Promise.resolve();
    if (this.inbox.length === 0) {
      this.clock.advance(timeoutMs);
      return [];
    }
    const out = this.inbox;
    this.inbox = [];
    return out;
  }

  close(): void {
    this.open = false;
  }
}

/**
 * Socket stand-in for driving a real {@link WebTilesTransport} without a
 * server. {@link deliver} sends text frames to the client and
 * {@link serverClose} drops the connection from the far end.
 */
export class FakeSocket implements SocketLike {
  readonly sent: string[] = [];
  private open = true;
  private frameListeners: Array<(frame: WireFrame) => void> = [];
  private closeListeners: Array<() => void> = [];
  private clientHandlers: Array<(data: string, socket: FakeSocket) => void> = [];

  get isOpen(): boolean {
    return this.open;
  }

  /** Runs on every frame the client sends. */
  onClientSend(handler: (data: string, socket: FakeSocket) => void): void {
    this.clientHandlers.push(handler);
  }

  send(data: string): void {
    this.sent.push(data);
    for (const handler of this.clientHandlers) handler(data, this);
  }

  close(): void {
    this.serverClose();
  }

  onFrame(listener: (frame: WireFrame) => void): void {
    this.frameListeners.push(listener);
  }

  onClose(listener: () => void): void {
    this.closeListeners.push(listener);
  }

  onError(): void {}

  deliver(...msgs: Record<string, unknown>[]): void {
    const text = JSON.stringify({ msgs });
    for (const listener of this.frameListeners) listener({ binary: false, text });
  }

  serverClose(): void {
    if (!this.open) return;
    this.open = false;
    for (const listener of this.closeListeners) listener();
  }
}

/** Hands out the given transports in order, one per connect. */
export function scriptedFactory(...transports: ScriptedTransport[]): TransportFactory & { urls: string[] } {
  const queue = [...transports];
  const urls: string[] = [];
  const factory = async (url: string): Promise<GameTransport> => {
    urls.push(url);
    const next = queue.shift();
    if (!next) throw new TransportError(`No scripted transport left for ${url}`);
    return next;
  };
  return Object.assign(factory, { urls });
}

export interface RecordedLog {
  level: "debug" | "info" | "warn" | "error";
  scope: string;
  message: string;
  data?: Record<string, unknown>;
}

/** Logger factory that keeps every line for assertions instead of printing. */
export function recordingLoggers(): { factory: LoggerFactory; lines: RecordedLog[] } {
  const lines: RecordedLog[] = [];
  const factory: LoggerFactory = (scope): Logger => ({
    debug: (message, data) => lines.push({ level: "debug", scope, message, data }),
    info: (message, data) => lines.push({ level: "info", scope, message, data }),
    warn: (message, data) => lines.push({ level: "warn", scope, message, data }),
    error: (message, data) => lines.push({ level: "error", scope, message, data }),
  });
  return { factory, lines };
}

// ─── Server message builders ────────────────────────────────────────

export const serverMsg = {
  inputMode: (mode: number) => decodeMessage({ msg: "input_mode", mode }),
  ready: () => decodeMessage({ msg: "input_mode", mode: 1 }),
  player: (fields: Record<string, unknown>) => decodeMessage({ msg: "player", ...fields }),
  text: (...lines: string[]) => decodeMessage({ msg: "msgs", messages: lines.map((text) => ({ text })) }),
  map: (...cells: Record<string, unknown>[]) => decodeMessage({ msg: "map", cells }),
  menu: (fields: Record<string, unknown>) => decodeMessage({ msg: "menu", ...fields }),
  uiPush: (type: string, fields: Record<string, unknown> = {}) => decodeMessage({ msg: "ui-push", type, ...fields }),
  uiState: (type: string, fields: Record<string, unknown> = {}) => decodeMessage({ msg: "ui-state", type, ...fields }),
  bare: (kind: string) => decodeMessage({ msg: kind }),
  gameLinks: (...ids: string[]) =>
    decodeMessage({
      msg: "set_game_links",
      content: ids.map((id) => `<a href="#play-${id}">${id}</a>`).join(""),
    }),
};
