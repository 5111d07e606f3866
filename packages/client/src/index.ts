export { ConsoleLogger, consoleLoggerFactory, type Logger, type LoggerFactory } from "./logger.js";
export { decodeEnvelope, decodeMessage, encodeKey } from "./codec.js";
export {
  WebTilesTransport,
  createNodeSocket,
  waitFor,
  type GameTransport,
  type SocketFactory,
  type SocketLike,
  type TransportFactory,
  type TransportOptions,
  type WaitForResult,
  type WireFrame,
} from "./transport.js";
export { ProtocolSession, scrapeGameIds, type PlayResult, type SessionOptions } from "./protocol-session.js";
export { StateMirror, emptyPlayerState, threatLabel, type MirrorSnapshot } from "./state-mirror.js";
export { describeMonsterFlags } from "./monster-status.js";
export { UIOverlayTracker, type MenuState, type OverlayLink, type PopupState } from "./ui-overlay.js";
export {
  ActionDispatcher,
  RECOVERY_BUDGET_MS,
  type DispatchOptions,
  type DispatcherOptions,
  type ExchangeResult,
  type PendingPrompt,
} from "./action-dispatcher.js";
export {
  DEFAULT_AUTO_PLAY_OPTIONS,
  resolveAutoPlayOptions,
  runAutoPlay,
  type AutoPlayHost,
} from "./autoplay.js";
export { Notepad } from "./notepad.js";
export { StatusStore } from "./status-store.js";
export { GameClient, type GameClientOptions } from "./game-client.js";
export { DIRECTIONS, parseDirection, slotIndex, slotLetter, type Direction } from "./text.js";
export {
  FakeSocket,
  ManualClock,
  ScriptedTransport,
  recordingLoggers,
  scriptedFactory,
  serverMsg,
  type RecordedLog,
} from "./test-harness.js";
