import type {
  InboundMessage,
  OutboundMessage,
  CellDiff,
  MonsterDiff,
  MenuItem,
  InventoryItemDiff,
  StatusEffect,
  PlayerMessage,
  UpdateMenuMessage,
} from "@crawlbridge/schemas";

type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function num(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/** A string, or the `text` of a `{ text }` object. */
export function textOf(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (isRecord(value)) return str(value.text);
  return undefined;
}

// ─── Cells ──────────────────────────────────────────────────────────

export const OVERLAY_KEYS = [
  "silenced", "sanctuary", "halo", "liquefied", "orb_glow",
  "quad_glow", "disjunct", "awakened_forest", "blasphemy", "highlighted_summoner",
] as const;

/** Foreground flags arrive as a plain number or as a `[lo, hi]` pair of 32-bit words. */
export function decodeFlags(value: unknown): bigint | undefined {
  if (typeof value === "number" && Number.isSafeInteger(value)) return BigInt(value);
  if (Array.isArray(value) && value.length === 2) {
    const [lo, hi] = value;
    if (typeof lo === "number" && typeof hi === "number" && Number.isSafeInteger(lo) && Number.isSafeInteger(hi)) {
      return (BigInt(hi) << 32n) | (BigInt(lo) & 0xffffffffn);
    }
  }
  return undefined;
}

function decodeMonster(value: unknown): MonsterDiff | null {
  if (!isRecord(value) || Object.keys(value).length === 0) return null;
  const mon: MonsterDiff = {};
  const id = num(value.id);
  const name = str(value.name);
  const threat = num(value.threat);
  if (id !== undefined) mon.id = id;
  if (name !== undefined) mon.name = name;
  if (threat !== undefined) mon.threat = threat;
  return mon;
}

function decodeCell(raw: JsonRecord): CellDiff {
  const cell: CellDiff = { overlays: {} };
  const x = num(raw.x);
  const y = num(raw.y);
  const g = str(raw.g);
  const f = num(raw.f);
  const fg = decodeFlags(raw.fg);
  if (x !== undefined) cell.x = x;
  if (y !== undefined) cell.y = y;
  if (g !== undefined) cell.g = g;
  if (f !== undefined) cell.f = f;
  if (fg !== undefined) cell.fg = fg;
  for (const key of OVERLAY_KEYS) {
    if (key in raw) cell.overlays[key] = raw[key];
  }
  if ("mon" in raw) cell.mon = decodeMonster(raw.mon);
  return cell;
}

// ─── Player ─────────────────────────────────────────────────────────

function decodeInventory(value: JsonRecord): Map<number, InventoryItemDiff | null> {
  const inv = new Map<number, InventoryItemDiff | null>();
  for (const [slotKey, entry] of Object.entries(value)) {
    const slot = Number.parseInt(slotKey, 10);
    if (Number.isNaN(slot)) continue;
    if (!isRecord(entry)) {
      inv.set(slot, null);
      continue;
    }
    const item: InventoryItemDiff = {};
    const name = str(entry.name);
    const quantity = num(entry.quantity);
    const inscription = str(entry.inscription);
    if (name !== undefined) item.name = name;
    if (quantity !== undefined) item.quantity = quantity;
    if (typeof entry.useless === "boolean") item.useless = entry.useless;
    if (inscription !== undefined) item.inscription = inscription;
    inv.set(slot, item);
  }
  return inv;
}

function decodeStatus(value: unknown[]): StatusEffect[] {
  const effects: StatusEffect[] = [];
  for (const entry of value) {
    if (!isRecord(entry)) continue;
    const effect: StatusEffect = {};
    const light = str(entry.light);
    const text = str(entry.text);
    const desc = str(entry.desc);
    if (light !== undefined) effect.light = light;
    if (text !== undefined) effect.text = text;
    if (desc !== undefined) effect.desc = desc;
    if (Object.keys(effect).length > 0) effects.push(effect);
  }
  return effects;
}

function decodePlayer(raw: JsonRecord): PlayerMessage {
  const fields: JsonRecord = {};
  for (const [key, value] of Object.entries(raw)) {
    if (key !== "msg" && key !== "pos" && key !== "inv" && key !== "status") fields[key] = value;
  }
  const player: PlayerMessage = { msg: "player", fields };
  if (isRecord(raw.pos)) player.pos = { x: num(raw.pos.x) ?? 0, y: num(raw.pos.y) ?? 0 };
  if (isRecord(raw.inv)) player.inv = decodeInventory(raw.inv);
  if (Array.isArray(raw.status)) player.status = decodeStatus(raw.status);
  return player;
}

// ─── Menus ──────────────────────────────────────────────────────────

function decodeHotkey(value: unknown): string | undefined {
  if (typeof value === "number" && Number.isInteger(value) && value > 0) return String.fromCharCode(value);
  return str(value);
}

function decodeMenuItems(value: unknown): MenuItem[] {
  if (!Array.isArray(value)) return [];
  return value.map((entry): MenuItem => {
    if (!isRecord(entry)) return { text: "", level: 2, hotkeys: [] };
    const hotkeys = Array.isArray(entry.hotkeys)
      ? entry.hotkeys.map(decodeHotkey).filter((k): k is string => k !== undefined)
      : [];
    return { text: textOf(entry.text) ?? "", level: num(entry.level) ?? 2, hotkeys };
  });
}

// ─── Envelope ───────────────────────────────────────────────────────

/** Narrows one loosely-typed wire object into the inbound tagged union. */
export function decodeMessage(raw: JsonRecord): InboundMessage {
  const kind = str(raw.msg) ?? "";
  switch (kind) {
    case "player":
      return decodePlayer(raw);
    case "map":
      return {
        msg: "map",
        cells: Array.isArray(raw.cells) ? raw.cells.filter(isRecord).map(decodeCell) : [],
        clear: raw.clear === true,
      };
    case "msgs": {
      const texts = Array.isArray(raw.messages)
        ? raw.messages.map((m) => (isRecord(m) ? str(m.text) : undefined)).filter((t): t is string => !!t)
        : [];
      return { msg: "msgs", texts };
    }
    case "input_mode":
      return { msg: "input_mode", mode: num(raw.mode) ?? -1 };
    case "menu":
      return {
        msg: "menu",
        tag: str(raw.tag) ?? "unknown",
        title: textOf(raw.title) ?? "Menu",
        more: textOf(raw.more) ?? "",
        items: decodeMenuItems(raw.items),
      };
    case "update_menu": {
      const update: UpdateMenuMessage = { msg: "update_menu" };
      const title = textOf(raw.title);
      const more = textOf(raw.more);
      if (title !== undefined) update.title = title;
      if (more !== undefined) update.more = more;
      if ("items" in raw) update.items = decodeMenuItems(raw.items);
      return update;
    }
    case "update_menu_items":
      return { msg: "update_menu_items", chunkStart: num(raw.chunk_start) ?? 0, items: decodeMenuItems(raw.items) };
    case "ui-push":
    case "ui-state": {
      const fields: JsonRecord = {};
      for (const [key, value] of Object.entries(raw)) {
        if (key !== "msg" && key !== "type") fields[key] = value;
      }
      return { msg: kind, type: str(raw.type) ?? "unknown", fields };
    }
    case "set_game_links":
      return { msg: "set_game_links", content: str(raw.content) ?? "" };
    case "close_menu":
    case "close_all_menus":
    case "ui-pop":
    case "close":
    case "login_success":
    case "go_lobby":
    case "ping":
      return { msg: kind };
    default:
      return { msg: "other", name: kind };
  }
}

/** Parses one `{"msgs": [...]}` envelope. Throws on malformed JSON. */
export function decodeEnvelope(text: string): InboundMessage[] {
  const parsed: unknown = JSON.parse(text);
  if (!isRecord(parsed) || !Array.isArray(parsed.msgs)) return [];
  return parsed.msgs.filter(isRecord).map(decodeMessage);
}

// ─── Outbound ───────────────────────────────────────────────────────

const SPECIAL_KEYS: Record<string, OutboundMessage> = {
  key_tab: { msg: "key", keycode: 9 },
  key_esc: { msg: "key", keycode: 27 },
  key_enter: { msg: "input", text: "\r" },
  key_dir_n: { msg: "input", text: "8" },
  key_dir_ne: { msg: "input", text: "9" },
  key_dir_e: { msg: "input", text: "6" },
  key_dir_se: { msg: "input", text: "3" },
  key_dir_s: { msg: "input", text: "2" },
  key_dir_sw: { msg: "input", text: "1" },
  key_dir_w: { msg: "input", text: "4" },
  key_dir_nw: { msg: "input", text: "7" },
};

/**
 * Maps a logical key name to its outbound message. `key_ctrl_<c>` becomes the
 * control keycode; anything unrecognised is sent as literal input text.
 */
export function encodeKey(key: string): OutboundMessage {
  const special = SPECIAL_KEYS[key];
  if (special) return special;
  const ctrl = /^key_ctrl_([a-zA-Z])$/.exec(key);
  if (ctrl) {
    return { msg: "key", keycode: ctrl[1].toLowerCase().charCodeAt(0) - 96 };
  }
  return { msg: "input", text: key };
}
