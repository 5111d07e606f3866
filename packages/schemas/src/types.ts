/**
 * crawlbridge core types
 *
 * Wire messages (as decoded from the webtiles stream), mirrored game state,
 * and the shapes handed to callers of the command and query API.
 */

// ─── Wire: inbound ──────────────────────────────────────────────────

/** Declared by the server in `input_mode` messages. */
export const InputMode = {
  NORMAL: 0,
  COMMAND: 1,
  TARGET: 2,
  TARGET_DIR: 3,
  TARGET_PATH: 4,
  MORE: 5,
  MACRO: 6,
  PROMPT: 7,
  YESNO: 8,
} as const;

export interface InventoryItemDiff {
  name?: string;
  quantity?: number;
  useless?: boolean;
  inscription?: string;
}

export interface StatusEffect {
  light?: string;
  text?: string;
  desc?: string;
}

export interface Position {
  x: number;
  y: number;
}

export interface PlayerMessage {
  msg: "player";
  /** Scalar fields exactly as sent; the mirror's field table picks them out. */
  fields: Record<string, unknown>;
  pos?: Position;
  inv?: Map<number, InventoryItemDiff | null>;
  status?: StatusEffect[];
}

export interface MonsterDiff {
  id?: number;
  name?: string;
  threat?: number;
}

export interface CellDiff {
  x?: number;
  y?: number;
  g?: string;
  f?: number;
  /** 64-bit foreground flags, already joined from a `[lo, hi]` pair when needed. */
  fg?: bigint;
  overlays: Record<string, unknown>;
  /** `undefined`: no mon key; `null`: explicit removal. */
  mon?: MonsterDiff | null;
}

export interface MapMessage {
  msg: "map";
  cells: CellDiff[];
  clear: boolean;
}

export interface MessagesMessage {
  msg: "msgs";
  texts: string[];
}

export interface InputModeMessage {
  msg: "input_mode";
  mode: number;
}

export interface MenuItem {
  text: string;
  level: number;
  hotkeys: string[];
}

export interface MenuMessage {
  msg: "menu";
  tag: string;
  title: string;
  more: string;
  items: MenuItem[];
}

export interface UpdateMenuMessage {
  msg: "update_menu";
  title?: string;
  more?: string;
  items?: MenuItem[];
}

export interface UpdateMenuItemsMessage {
  msg: "update_menu_items";
  chunkStart: number;
  items: MenuItem[];
}

export interface UiMessage {
  msg: "ui-push" | "ui-state";
  type: string;
  fields: Record<string, unknown>;
}

export interface SetGameLinksMessage {
  msg: "set_game_links";
  content: string;
}

export interface BareMessage {
  msg: "close_menu" | "close_all_menus" | "ui-pop" | "close" | "login_success" | "go_lobby" | "ping";
}

export interface OtherMessage {
  msg: "other";
  name: string;
}

export type InboundMessage =
  | PlayerMessage
  | MapMessage
  | MessagesMessage
  | InputModeMessage
  | MenuMessage
  | UpdateMenuMessage
  | UpdateMenuItemsMessage
  | UiMessage
  | SetGameLinksMessage
  | BareMessage
  | OtherMessage;

export type InboundKind = InboundMessage["msg"];

// ─── Wire: outbound ─────────────────────────────────────────────────

export type OutboundMessage =
  | { msg: "register"; username: string; password: string; email: string }
  | { msg: "login"; username: string; password: string }
  | { msg: "go_lobby" }
  | { msg: "play"; game_id: string }
  | { msg: "key"; keycode: number }
  | { msg: "input"; text: string }
  | { msg: "pong" };

// ─── Mirrored state ─────────────────────────────────────────────────

export interface PlayerState {
  species: string;
  title: string;
  hp: number;
  maxHp: number;
  realHpMax: number;
  poisonSurvival: number;
  mp: number;
  maxMp: number;
  ac: number;
  ev: number;
  sh: number;
  acMod: number;
  evMod: number;
  shMod: number;
  str: number;
  int: number;
  dex: number;
  xl: number;
  xlProgress: number;
  place: string;
  depth: number;
  god: string;
  pietyRank: number;
  penance: boolean;
  gold: number;
  position: Position;
  turn: number;
  elapsedTime: number;
  contamination: number;
  noise: number;
  form: number;
  quiverDesc: string;
  weaponIndex: number;
  offhandIndex: number;
  doom: number;
  lives: number;
  deaths: number;
  statusEffects: StatusEffect[];
  dead: boolean;
}

export type EquippedTag = "weapon" | "offhand";

export interface InventoryItem {
  index: number;
  slot: string;
  name: string;
  quantity: number;
  equipped?: EquippedTag;
  useless?: boolean;
  inscription?: string;
}

export interface MapCell {
  glyph?: string;
  feature?: number;
  overlays: Record<string, unknown>;
  fg: bigint;
}

export interface Monster {
  id?: number;
  name?: string;
  threat: number;
}

export type ThreatLabel = "trivial" | "easy" | "dangerous" | "extremely dangerous" | `unknown(${number})`;

export interface NearbyEnemy {
  name: string;
  x: number;
  y: number;
  direction: string;
  distance: number;
  threat: ThreatLabel;
  status: string;
}

export type LandmarkType = "downstairs" | "upstairs" | "altar" | "door";

export interface Landmark {
  type: LandmarkType;
  glyph: string;
  direction: string;
  distance: number;
  dx: number;
  dy: number;
}

// ─── Status record ──────────────────────────────────────────────────

export interface StatusRecord {
  attempt: number;
  wins: number;
  deaths: number;
  character: string;
  xl: number;
  place: string;
  turn: number;
  thought: string;
  status: "Playing" | "Dead";
}

// ─── Configuration ──────────────────────────────────────────────────

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface ClientConfig {
  serverUrl: string;
  username: string;
  password: string;
  gameId: string;
  species: string;
  background: string;
  weapon: string;
  /** Actions allowed between narrate() calls; 0 disables the check. */
  narrateInterval: number;
  actionTimeoutMs: number;
  statusPath: string | null;
  logLevel: LogLevel;
}

// ─── Auto-play ──────────────────────────────────────────────────────

export interface AutoPlayOptions {
  stopHpPercent: number;
  maxActions: number;
  stopOnItems: boolean;
  stopOnAltar: boolean;
  autoDescend: boolean;
  maxNonTrivialEnemies: number;
}

export interface FloorLog {
  place: string;
  events: string[];
}

export interface AutoPlayReport {
  stopReason: string;
  actions: number;
  kills: number;
  killed: string[];
  pickups: number;
  picked: string[];
  floors: FloorLog[];
  startTurn: number;
  endTurn: number;
}
