import WebSocket from "ws";
import {
  TransportError,
  systemClock,
  withTimeout,
  remainingMs,
  type Clock,
  type InboundKind,
  type InboundMessage,
  type OutboundMessage,
} from "@crawlbridge/schemas";
import { decodeEnvelope, encodeKey } from "./codec.js";
import { FrameDecoder } from "./frame-decoder.js";
import { MessageChannel } from "./message-channel.js";
import type { Logger } from "./logger.js";

// ─── DI Interfaces ────────────────────────────────────────────────

export type WireFrame =
  | { binary: true; data: Buffer }
  | { binary: false; text: string };

/** Minimal socket surface: only what the transport calls. */
export interface SocketLike {
  readonly isOpen: boolean;
  send(data: string): void;
  close(): void;
  onFrame(listener: (frame: WireFrame) => void): void;
  onClose(listener: () => void): void;
  onError(listener: (err: Error) => void): void;
}

export type SocketFactory = (url: string, connectTimeoutMs: number) => Promise<SocketLike>;

/** What the session, dispatcher and overlay tracker need from a connection. */
export interface GameTransport {
  readonly isOpen: boolean;
  send(message: OutboundMessage): void;
  sendKey(key: string): void;
  /** Queued messages first; otherwise waits for traffic until the timeout. */
  recvMessages(timeoutMs: number): Promise<InboundMessage[]>;
  close(): void;
}

export type TransportFactory = (url: string) => Promise<GameTransport>;

// ─── ws adapter ───────────────────────────────────────────────────

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/** Opens a `ws` socket and adapts it to {@link SocketLike}. */
export async function createNodeSocket(url: string, connectTimeoutMs: number): Promise<SocketLike> {
  const ws = new WebSocket(url);
  const opened = new Promise<void>((resolve, reject) => {
    ws.once("open", () => resolve());
    ws.once("error", (err: Error) => reject(new TransportError(`WebSocket connect failed: ${err.message}`)));
  });
  try {
    await withTimeout(opened, connectTimeoutMs, "WebSocket connect");
  } catch (err) {
    ws.terminate();
    if (err instanceof TransportError) throw err;
    throw new TransportError(err instanceof Error ? err.message : String(err));
  }

  // Frames can arrive before the transport registers its listener
  const early: WireFrame[] = [];
  let frameListener: ((frame: WireFrame) => void) | null = null;
  ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
    const buf = toBuffer(data);
    const frame: WireFrame = isBinary ? { binary: true, data: buf } : { binary: false, text: buf.toString("utf8") };
    if (frameListener) frameListener(frame);
    else early.push(frame);
  });

  return {
    get isOpen() {
      return ws.readyState === WebSocket.OPEN;
    },
    send: (data) => ws.send(data),
    close: () => ws.close(),
    onFrame: (listener) => {
      frameListener = listener;
      for (const frame of early.splice(0)) listener(frame);
    },
    onClose: (listener) => {
      if (ws.readyState === WebSocket.CLOSED) listener();
      else ws.on("close", () => listener());
    },
    onError: (listener) => {
      ws.on("error", listener);
    },
  };
}

// ─── Transport ────────────────────────────────────────────────────

export interface TransportOptions {
  logger: Logger;
  socketFactory?: SocketFactory;
  clock?: Clock;
  connectTimeoutMs?: number;
  channelCapacity?: number;
  keepaliveIntervalMs?: number;
  idleThresholdMs?: number;
}

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
const DEFAULT_CHANNEL_CAPACITY = 10_000;
const DEFAULT_KEEPALIVE_INTERVAL_MS = 10_000;
const DEFAULT_IDLE_THRESHOLD_MS = 30_000;

/**
 * One webtiles connection. Socket events answer pings and queue everything
 * else; nothing here touches game state.
 */
export class WebTilesTransport implements GameTransport {
  private readonly channel: MessageChannel<InboundMessage>;
  private readonly decoder = new FrameDecoder();
  /** Tail of the decode chain; frames are decoded strictly in arrival order. */
  private decoding: Promise<void> = Promise.resolve();
  private keepalive: ReturnType<typeof setInterval> | null = null;
  private lastSendAt: number;
  private closed = false;

  private constructor(
    private readonly socket: SocketLike,
    private readonly logger: Logger,
    private readonly clock: Clock,
    capacity: number,
    keepaliveIntervalMs: number,
    private readonly idleThresholdMs: number,
  ) {
    this.lastSendAt = clock.now();
    this.channel = new MessageChannel<InboundMessage>(capacity, (dropped) => {
      this.logger.warn("Inbound queue full, dropping oldest message", { kind: dropped.msg });
    });

    socket.onFrame((frame) => this.enqueueFrame(frame));
    socket.onClose(() => {
      this.logger.info("Socket closed");
      this.shutdown();
    });
    socket.onError((err) => {
      this.logger.warn("Socket error", { error: err.message });
    });

    this.keepalive = setInterval(() => this.keepaliveTick(), keepaliveIntervalMs);
    this.keepalive.unref();
  }

  static async connect(url: string, options: TransportOptions): Promise<WebTilesTransport> {
    const factory = options.socketFactory ?? createNodeSocket;
    const socket = await factory(url, options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS);
    options.logger.debug("Connected", { url });
    return new WebTilesTransport(
      socket,
      options.logger,
      options.clock ?? systemClock,
      options.channelCapacity ?? DEFAULT_CHANNEL_CAPACITY,
      options.keepaliveIntervalMs ?? DEFAULT_KEEPALIVE_INTERVAL_MS,
      options.idleThresholdMs ?? DEFAULT_IDLE_THRESHOLD_MS,
    );
  }

  get isOpen(): boolean {
    return !this.closed && this.socket.isOpen;
  }

  send(message: OutboundMessage): void {
    if (!this.isOpen) throw new TransportError("Socket is closed");
    this.socket.send(JSON.stringify(message));
    this.lastSendAt = this.clock.now();
  }

  sendKey(key: string): void {
    this.send(encodeKey(key));
  }

  async recvMessages(timeoutMs: number): Promise<InboundMessage[]> {
    if (this.channel.size === 0) {
      await this.channel.waitForData(timeoutMs);
    }
    // Frames already received finish decoding before the hand-off
    await this.decoding;
    return this.channel.drain();
  }

  close(): void {
    if (this.closed) return;
    this.shutdown();
    this.socket.close();
  }

  private shutdown(): void {
    this.closed = true;
    if (this.keepalive) {
      clearInterval(this.keepalive);
      this.keepalive = null;
    }
    this.channel.close();
    this.decoding = this.decoding.then(() => this.decoder.close());
  }

  private enqueueFrame(frame: WireFrame): void {
    this.decoding = this.decoding.then(async () => {
      const messages = await this.decodeFrame(frame);
      for (const msg of messages) {
        if (msg.msg === "ping") {
          this.answerPing();
        } else {
          this.channel.push(msg);
        }
      }
    });
  }

  private async decodeFrame(frame: WireFrame): Promise<InboundMessage[]> {
    try {
      const text = frame.binary ? await this.decoder.inflate(frame.data) : frame.text;
      if (text.length === 0) return [];
      return decodeEnvelope(text);
    } catch (err) {
      this.logger.debug("Dropped undecodable frame", {
        binary: frame.binary,
        error: err instanceof Error ? err.message : String(err),
      });
      return [];
    }
  }

  private answerPing(): void {
    if (!this.isOpen) return;
    try {
      this.send({ msg: "pong" });
    } catch (err) {
      this.logger.warn("Failed to answer ping", { error: err instanceof Error ? err.message : String(err) });
    }
  }

  private keepaliveTick(): void {
    if (!this.isOpen) return;
    if (this.clock.now() - this.lastSendAt < this.idleThresholdMs) return;
    try {
      this.send({ msg: "pong" });
    } catch (err) {
      this.logger.warn("Keepalive failed", { error: err instanceof Error ? err.message : String(err) });
    }
  }
}

export interface WaitForResult {
  found: boolean;
  messages: InboundMessage[];
}

/**
 * Drains repeatedly until a message of `kind` (and passing `match`, when given)
 * arrives or `timeoutMs` elapses. Every message seen along the way is returned.
 */
export async function waitFor(
  transport: GameTransport,
  clock: Clock,
  kind: InboundKind,
  timeoutMs: number,
  match?: (msg: InboundMessage) => boolean,
): Promise<WaitForResult> {
  const messages: InboundMessage[] = [];
  const deadline = clock.now() + timeoutMs;
  while (clock.now() < deadline) {
    const batch = await transport.recvMessages(Math.min(1000, remainingMs(clock, deadline)));
    messages.push(...batch);
    if (batch.some((msg) => msg.msg === kind && (!match || match(msg)))) {
      return { found: true, messages };
    }
    if (!transport.isOpen && batch.length === 0) break;
  }
  return { found: false, messages };
}
