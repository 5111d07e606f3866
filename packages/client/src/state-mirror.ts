import type {
  InboundMessage,
  PlayerMessage,
  MapMessage,
  PlayerState,
  InventoryItem,
  InventoryItemDiff,
  MapCell,
  Monster,
  NearbyEnemy,
  Landmark,
  LandmarkType,
  ThreatLabel,
  Position,
} from "@crawlbridge/schemas";
import { describeMonsterFlags } from "./monster-status.js";
import { compass, chebyshev, slotLetter, stripMarkup } from "./text.js";
import type { Logger } from "./logger.js";

// ─── Field table ────────────────────────────────────────────────────

type KeysOfType<T, V> = { [K in keyof T]: T[K] extends V ? K : never }[keyof T];
type NumericField = KeysOfType<PlayerState, number>;
type TextField = KeysOfType<PlayerState, string>;

const NUMERIC_FIELDS: ReadonlyArray<readonly [string, NumericField]> = [
  ["hp", "hp"], ["hp_max", "maxHp"], ["real_hp_max", "realHpMax"],
  ["poison_survival", "poisonSurvival"], ["mp", "mp"], ["mp_max", "maxMp"],
  ["ac", "ac"], ["ev", "ev"], ["sh", "sh"],
  ["ac_mod", "acMod"], ["ev_mod", "evMod"], ["sh_mod", "shMod"],
  ["str", "str"], ["int", "int"], ["dex", "dex"],
  ["xl", "xl"], ["progress", "xlProgress"], ["depth", "depth"],
  ["piety_rank", "pietyRank"], ["gold", "gold"], ["turn", "turn"],
  ["time", "elapsedTime"], ["contam", "contamination"], ["adjusted_noise", "noise"],
  ["form", "form"], ["weapon_index", "weaponIndex"], ["offhand_index", "offhandIndex"],
  ["doom", "doom"], ["lives", "lives"], ["deaths", "deaths"],
];

const TEXT_FIELDS: ReadonlyArray<readonly [string, TextField]> = [
  ["species", "species"], ["title", "title"], ["place", "place"],
  ["god", "god"], ["quiver_desc", "quiverDesc"],
];

export function emptyPlayerState(): PlayerState {
  return {
    species: "", title: "",
    hp: 0, maxHp: 0, realHpMax: 0, poisonSurvival: 0,
    mp: 0, maxMp: 0,
    ac: 0, ev: 0, sh: 0, acMod: 0, evMod: 0, shMod: 0,
    str: 0, int: 0, dex: 0,
    xl: 1, xlProgress: 0,
    place: "", depth: 0, god: "", pietyRank: 0, penance: false, gold: 0,
    position: { x: 0, y: 0 },
    turn: 0, elapsedTime: 0, contamination: 0, noise: -1, form: 0,
    quiverDesc: "", weaponIndex: -1, offhandIndex: -1,
    doom: 0, lives: 0, deaths: 0,
    statusEffects: [],
    dead: false,
  };
}

// ─── Lookup tables ──────────────────────────────────────────────────

const FORM_NAMES = [
  "", "Spider", "Blade Hands", "Statue", "Serpent", "Dragon", "Death", "Bat", "Pig", "Tree",
  "Wisp", "Jelly", "Fungus", "Storm", "Quill", "Maw", "Flux", "Slaughter", "Vampire",
];

/** Stationary fixtures that show up as monsters but never fight back. */
const HARMLESS = new Set([
  "plant", "withered plant", "fungus", "toadstool", "bush", "ballistomycete spore",
  "briar patch", "pillar of salt", "block of ice", "spectral weapon",
]);

/** Early uniques and hard hitters the server tends to under-rate. */
const KNOWN_DANGEROUS = new Set([
  "sigmund", "jessica", "edmund", "eustachio", "natasha", "robin, the goblin",
  "ijyb", "terence", "ogre", "centaur", "gnoll sergeant", "orc priest", "orc wizard",
]);

const THREAT_LABELS: readonly ThreatLabel[] = ["trivial", "easy", "dangerous", "extremely dangerous"];

const LANDMARK_GLYPHS: Record<string, LandmarkType> = {
  ">": "downstairs",
  "<": "upstairs",
  "_": "altar",
  "+": "door",
};

const LANDMARK_ORDER: Record<LandmarkType, number> = { downstairs: 0, upstairs: 1, altar: 2, door: 3 };

const TERRAIN_NAMES: Record<string, string> = {
  "#": "wall", ".": "floor", "+": "door", "'": "open door",
  ">": "downstairs", "<": "upstairs", "~": "water", "≈": "deep water",
};

const ADJACENT_NAMES: Record<string, string> = {
  "#": "wall", "+": "door", ">": "down", "<": "up", ".": "floor", " ": "unseen",
};

const CONTAMINATION_LEVELS = ["", "glow", "glow+", "GLOW!", "GLOW!!"];

const MESSAGE_CAP = 200;
const MESSAGE_KEEP = 100;

function cellKey(x: number, y: number): string {
  return `${x},${y}`;
}

function parseKey(key: string): Position {
  const [x, y] = key.split(",").map(Number);
  return { x, y };
}

export function threatLabel(threat: number): ThreatLabel {
  return THREAT_LABELS[threat] ?? `unknown(${threat})`;
}

function signedMod(label: string, base: number, mod: number): string {
  if (mod > 0) return `${label}: ${base} (+${mod})`;
  if (mod < 0) return `${label}: ${base} (${mod})`;
  return `${label}: ${base}`;
}

export interface MirrorSnapshot {
  cells: Array<[string, MapCell]>;
  monsters: Array<[string, Monster]>;
}

/**
 * Canonical view of the game built from incremental diffs. Only the
 * dispatching path calls {@link apply}; everything else is a query.
 */
export class StateMirror {
  private _player: PlayerState = emptyPlayerState();
  private inventory = new Map<number, InventoryItemDiff>();
  private cells = new Map<string, MapCell>();
  private monsters = new Map<string, Monster>();
  private monsterNames = new Map<number, string>();
  private monsterThreats = new Map<number, number>();
  private messages: string[] = [];
  private messageSeq = 0;

  constructor(private readonly logger: Logger) {}

  get player(): Readonly<PlayerState> {
    return this._player;
  }

  /** Total messages ever appended; survives ring-buffer trimming. */
  get messageCount(): number {
    return this.messageSeq;
  }

  reset(): void {
    this._player = emptyPlayerState();
    this.inventory.clear();
    this.cells.clear();
    this.monsters.clear();
    this.monsterNames.clear();
    this.monsterThreats.clear();
    this.messages = [];
  }

  apply(msg: InboundMessage): void {
    switch (msg.msg) {
      case "player":
        this.applyPlayer(msg);
        break;
      case "map":
        this.applyMap(msg);
        break;
      case "msgs":
        this.applyMessages(msg.texts);
        break;
      default:
        break;
    }
  }

  /** Latched by the dispatcher when the server closes the game. */
  markDead(): void {
    this._player.dead = true;
    this._player.deaths += 1;
  }

  clearMessages(): void {
    this.messages = [];
  }

  // ─── Diff application ─────────────────────────────────────────────

  private applyPlayer(msg: PlayerMessage): void {
    const p = this._player;
    for (const [wire, field] of NUMERIC_FIELDS) {
      const value = msg.fields[wire];
      if (typeof value === "number") p[field] = value;
    }
    for (const [wire, field] of TEXT_FIELDS) {
      const value = msg.fields[wire];
      if (typeof value === "string") p[field] = value;
    }
    const penance = msg.fields.penance;
    if (typeof penance === "boolean") p.penance = penance;
    else if (typeof penance === "number") p.penance = penance > 0;

    if (msg.pos) p.position = { x: msg.pos.x, y: msg.pos.y };
    if (msg.inv) {
      for (const [slot, diff] of msg.inv) {
        if (diff === null) {
          this.inventory.delete(slot);
        } else {
          this.inventory.set(slot, { ...this.inventory.get(slot), ...diff });
        }
      }
    }
    if (msg.status) p.statusEffects = msg.status.map((s) => ({ ...s }));
  }

  private applyMap(msg: MapMessage): void {
    if (msg.cells.length === 0) return;

    // Cursor pass: an absent x continues one to the right of the previous cell
    const placed: Array<{ key: string; cell: MapMessage["cells"][number] }> = [];
    let cx: number | undefined;
    let cy: number | undefined;
    for (const cell of msg.cells) {
      if (cell.x !== undefined) cx = cell.x;
      if (cell.y !== undefined) cy = cell.y;
      if (cx === undefined || cy === undefined) continue;
      placed.push({ key: cellKey(cx, cy), cell });
      cx += 1;
    }

    // The batch is authoritative for monsters at every coordinate it names
    const hadMonster = new Set<string>();
    for (const { key } of placed) {
      if (this.monsters.delete(key)) hadMonster.add(key);
    }

    for (const { key, cell } of placed) {
      const existing = this.cells.get(key);
      const next: MapCell = existing ?? { overlays: {}, fg: 0n };
      if (cell.g !== undefined) next.glyph = cell.g;
      if (cell.f !== undefined) next.feature = cell.f;
      next.overlays = { ...cell.overlays };
      if (cell.fg !== undefined) next.fg = cell.fg;
      this.cells.set(key, next);

      if (cell.mon === null && !hadMonster.has(key)) {
        this.logger.debug("Monster removal for a cell with no tracked monster", { cell: key });
      }
      if (cell.mon) {
        const { id, name, threat } = cell.mon;
        if (id !== undefined && name !== undefined) this.monsterNames.set(id, name);
        if (id !== undefined && threat !== undefined) this.monsterThreats.set(id, threat);
        const monster: Monster = {
          threat: threat ?? (id !== undefined ? this.monsterThreats.get(id) : undefined) ?? 0,
        };
        if (id !== undefined) monster.id = id;
        const resolvedName = name ?? (id !== undefined ? this.monsterNames.get(id) : undefined);
        if (resolvedName !== undefined) monster.name = resolvedName;
        this.monsters.set(key, monster);
      }
    }
  }

  private applyMessages(texts: string[]): void {
    for (const text of texts) {
      const clean = stripMarkup(text);
      if (!clean) continue;
      this.messages.push(clean);
      this.messageSeq += 1;
    }
    if (this.messages.length > MESSAGE_CAP) {
      this.messages = this.messages.slice(-MESSAGE_KEEP);
    }
  }

  // ─── Queries ──────────────────────────────────────────────────────

  getMessages(n = 10): string[] {
    return n > 0 ? this.messages.slice(-n) : [];
  }

  /** Messages appended after `seq` (a prior {@link messageCount}) that are still buffered. */
  messagesSince(seq: number): string[] {
    const added = this.messageSeq - seq;
    if (added <= 0) return [];
    return this.messages.slice(-Math.min(added, this.messages.length));
  }

  getCell(x: number, y: number): MapCell | undefined {
    return this.cells.get(cellKey(x, y));
  }

  getMonster(x: number, y: number): Monster | undefined {
    return this.monsters.get(cellKey(x, y));
  }

  getOverlays(pos: Position = this._player.position): Record<string, unknown> {
    return this.cells.get(cellKey(pos.x, pos.y))?.overlays ?? {};
  }

  monsterStatus(x: number, y: number): string {
    return describeMonsterFlags(this.cells.get(cellKey(x, y))?.fg ?? 0n);
  }

  snapshot(): MirrorSnapshot {
    const byKey = <T>(entries: Array<[string, T]>) => entries.sort(([a], [b]) => a.localeCompare(b));
    return {
      cells: byKey([...this.cells].map(([k, c]): [string, MapCell] => [k, { ...c, overlays: { ...c.overlays } }])),
      monsters: byKey([...this.monsters].map(([k, m]): [string, Monster] => [k, { ...m }])),
    };
  }

  getInventory(): InventoryItem[] {
    const items: InventoryItem[] = [];
    const slots = [...this.inventory.keys()].sort((a, b) => a - b);
    for (const index of slots) {
      const data = this.inventory.get(index);
      if (!data?.name || data.name === "?") continue;
      const item: InventoryItem = {
        index,
        slot: slotLetter(index),
        name: data.name,
        quantity: data.quantity ?? 1,
      };
      if (index === this._player.weaponIndex) item.equipped = "weapon";
      else if (index === this._player.offhandIndex) item.equipped = "offhand";
      if (data.useless) item.useless = true;
      if (data.inscription) item.inscription = data.inscription;
      items.push(item);
    }
    return items;
  }

  findItem(slot: string): InventoryItem | undefined {
    return this.getInventory().find((item) => item.slot === slot);
  }

  getNearbyEnemies(): NearbyEnemy[] {
    const { x: px, y: py } = this._player.position;
    const enemies: NearbyEnemy[] = [];
    for (const [key, mon] of this.monsters) {
      const { x, y } = parseKey(key);
      const dx = x - px;
      const dy = y - py;
      const distance = chebyshev(dx, dy);
      if (distance > 8) continue;
      const name = mon.name ?? "unknown";
      const lower = name.toLowerCase();
      if (HARMLESS.has(lower)) continue;
      const threat = KNOWN_DANGEROUS.has(lower) && mon.threat < 2 ? 2 : mon.threat;
      enemies.push({
        name,
        x: dx,
        y: dy,
        direction: compass(dx, dy) || "here",
        distance,
        threat: threatLabel(threat),
        status: describeMonsterFlags(this.cells.get(key)?.fg ?? 0n),
      });
    }
    return enemies.sort((a, b) => a.distance - b.distance);
  }

  getMap(radius = 7): string {
    if (this.cells.size === 0) return "No map data available";
    const { x: px, y: py } = this._player.position;
    const lines: string[] = [];
    for (let y = py - radius; y <= py + radius; y++) {
      let line = "";
      for (let x = px - radius; x <= px + radius; x++) {
        if (x === px && y === py) line += "@";
        else line += this.cells.get(cellKey(x, y))?.glyph ?? " ";
      }
      lines.push(line);
    }
    return lines.join("\n");
  }

  getLandmarks(): Landmark[] {
    const { x: px, y: py } = this._player.position;
    const found: Landmark[] = [];
    for (const [key, cell] of this.cells) {
      if (cell.glyph === undefined) continue;
      const type = LANDMARK_GLYPHS[cell.glyph];
      if (!type) continue;
      const { x, y } = parseKey(key);
      const dx = x - px;
      const dy = y - py;
      found.push({
        type,
        glyph: cell.glyph,
        direction: compass(dx, dy).toUpperCase() || "here",
        distance: chebyshev(dx, dy),
        dx,
        dy,
      });
    }
    found.sort((a, b) => LANDMARK_ORDER[a.type] - LANDMARK_ORDER[b.type] || a.distance - b.distance);
    return found;
  }

  /** Doors are listed only when nothing else has been found. */
  renderLandmarks(): string {
    const found = this.getLandmarks();
    if (found.length === 0) return "No landmarks discovered yet.";
    const nonDoors = found.filter((f) => f.type !== "door");
    const shown = nonDoors.length > 0 ? nonDoors : found.slice(0, 10);
    return shown
      .map((f) => `${f.type} (${f.glyph}) - ${f.direction}, ${f.distance} tiles away (dx=${f.dx}, dy=${f.dy})`)
      .join("\n");
  }

  private statusText(): string {
    return this._player.statusEffects
      .map((s) => s.light || s.text || "")
      .filter((s) => s.length > 0)
      .join(", ");
  }

  getStats(): string {
    const p = this._player;
    let character = p.species ? `${p.species} ${p.title}`.trim() : "Unknown";
    const form = FORM_NAMES[p.form] ?? "";
    if (form) character += ` (${form} Form)`;

    let hp = `HP: ${p.hp}/${p.maxHp}`;
    if (p.poisonSurvival && p.poisonSurvival < p.hp) hp += ` (→${p.poisonSurvival} after poison)`;
    const mp = `MP: ${p.mp}/${p.maxMp}`;
    const defenses = [
      signedMod("AC", p.ac, p.acMod),
      signedMod("EV", p.ev, p.evMod),
      signedMod("SH", p.sh, p.shMod),
    ].join(" ");

    let god = p.god || "None";
    if (p.god) {
      if (p.pietyRank) god += ` [${"★".repeat(p.pietyRank)}${"☆".repeat(Math.max(0, 6 - p.pietyRank))}]`;
      if (p.penance) god += " (PENANCE!)";
    }
    const contam = p.contamination > 0 ? ` | Contam: ${CONTAMINATION_LEVELS[Math.min(p.contamination, 4)]}` : "";
    const noise = p.noise >= 0 ? ` | Noise: ${p.noise}` : "";
    const doom = p.doom ? ` | Doom: ${p.doom}` : "";
    const lives = p.lives ? ` | Lives: ${p.lives}` : "";
    const status = this.statusText();
    const statusPart = status ? ` | Status: ${status}` : "";

    return (
      `Character: ${character} | ${hp} | ${mp} | ${defenses} | ` +
      `Str: ${p.str} Int: ${p.int} Dex: ${p.dex} | ` +
      `XL: ${p.xl} (${p.xlProgress}%) | Gold: ${p.gold} | Place: ${p.place}:${p.depth} | ` +
      `God: ${god}${contam}${noise}${doom}${lives}${statusPart} | Turn: ${p.turn}`
    );
  }

  getTacticalReadout(): string {
    if (this.cells.size === 0) return "No map data available";
    const { place, depth } = this._player;
    const { x: px, y: py } = this._player.position;
    const here = this.cells.get(cellKey(px, py))?.glyph ?? ".";
    const parts = [`Position: ${place || "Unknown"}:${depth || "?"} (${TERRAIN_NAMES[here] ?? "unknown"})`];

    const adjacent: string[] = [];
    for (const dy of [-1, 0, 1]) {
      for (const dx of [-1, 0, 1]) {
        if (dx === 0 && dy === 0) continue;
        const glyph = this.cells.get(cellKey(px + dx, py + dy))?.glyph ?? " ";
        const label = ADJACENT_NAMES[glyph];
        if (label) adjacent.push(`${compass(dx, dy).toUpperCase()}:${label}`);
      }
    }
    parts.push(`Adjacent: ${adjacent.join(", ")}`);

    const up = this.getLandmarks()
      .filter((l) => l.type === "upstairs")
      .sort((a, b) => a.distance - b.distance)[0];
    parts.push(up ? `Nearest upstairs: ${up.direction}, ${up.distance} tiles` : "Nearest upstairs: none visible");
    return parts.join(" | ");
  }

  private environmentEffects(): string[] {
    const overlays = this.getOverlays();
    const effects: string[] = [];
    if (overlays.silenced) effects.push("SILENCED (no spells!)");
    if (overlays.sanctuary) effects.push("Sanctuary (no combat)");
    if (overlays.halo) effects.push("Halo");
    if (overlays.liquefied) effects.push("Liquefied ground");
    if (overlays.orb_glow) effects.push(`Orb glow (${String(overlays.orb_glow)})`);
    if (overlays.disjunct) effects.push("Disjunction");
    return effects;
  }

  getStateText(): string {
    const parts = ["=== Game State ===", this.getStats(), "", "--- Messages ---"];
    for (const msg of this.getMessages(5)) parts.push(`  ${msg}`);

    const inventory = this.getInventory();
    if (inventory.length > 0) {
      parts.push("", "--- Inventory ---");
      for (const item of inventory) {
        const equip = item.equipped === "weapon" ? " (wielded)" : item.equipped === "offhand" ? " (offhand)" : "";
        const useless = item.useless ? " [useless]" : "";
        const inscription = item.inscription ? ` {${item.inscription}}` : "";
        parts.push(`  ${item.slot}) ${item.name}${equip}${useless}${inscription}`);
      }
    }

    const enemies = this.getNearbyEnemies();
    if (enemies.length > 0) {
      parts.push("", "--- Enemies ---");
      for (const e of enemies) {
        const status = e.status ? `, ${e.status}` : "";
        parts.push(`  ${e.name} (${e.direction}, dist ${e.distance}, threat ${e.threat}${status})`);
      }
    }

    const effects = this.environmentEffects();
    if (effects.length > 0) {
      parts.push("", `--- Environment: ${effects.join(", ")} ---`);
    }

    parts.push("", "--- Tactical ---", this.getTacticalReadout());
    if (this._player.dead) parts.push("\n*** GAME OVER: YOU ARE DEAD ***");
    return parts.join("\n");
  }
}
