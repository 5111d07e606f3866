import {
  ValidationError,
  validateAutoPlayOptionsData,
  type AutoPlayOptions,
  type AutoPlayReport,
  type FloorLog,
  type NearbyEnemy,
  type PlayerState,
} from "@crawlbridge/schemas";
import type { Logger } from "./logger.js";

/** What the loop needs from a running game. */
export interface AutoPlayHost {
  readonly player: Readonly<PlayerState>;
  readonly shutdownRequested: boolean;
  getNearbyEnemies(): NearbyEnemy[];
  autoFight(): Promise<string[]>;
  autoExplore(): Promise<string[]>;
  rest(): Promise<string[]>;
  goDownstairs(): Promise<string[]>;
}

export const DEFAULT_AUTO_PLAY_OPTIONS: Readonly<AutoPlayOptions> = {
  stopHpPercent: 50,
  maxActions: 200,
  stopOnItems: true,
  stopOnAltar: true,
  autoDescend: false,
  maxNonTrivialEnemies: 3,
};

const STALL_LIMIT = 5;
const FIGHT_ROUND_LIMIT = 15;

const KILL_PATTERN = /^You (?:kill|destroy|slay) (?:the |an? )?(.+?)[.!]*$/;
const PICKUP_PATTERNS = [/^You pick up (.+?)\.?$/, /^[a-zA-Z] - (.+)$/];
const ALTAR_PATTERN = /altar/i;
const FLOOR_DONE_MARKER = "[Floor fully explored";

/** Status lights that end a run, matched as lowercase prefixes. */
const BAD_STATUS_PREFIXES = ["pois", "conf", "para", "petr", "slow", "mesm", "held", "afraid", "sick"];

/**
 * Validates caller-supplied options against the schema, then fills defaults
 * and clamps each value into its allowed range.
 */
export function resolveAutoPlayOptions(input: Partial<AutoPlayOptions> = {}): AutoPlayOptions {
  const { valid, errors } = validateAutoPlayOptionsData(input);
  if (!valid) throw new ValidationError("auto-play options", errors);
  const d = DEFAULT_AUTO_PLAY_OPTIONS;
  return {
    stopHpPercent: Math.min(100, Math.max(20, input.stopHpPercent ?? d.stopHpPercent)),
    maxActions: Math.min(1000, Math.max(1, Math.trunc(input.maxActions ?? d.maxActions))),
    stopOnItems: input.stopOnItems ?? d.stopOnItems,
    stopOnAltar: input.stopOnAltar ?? d.stopOnAltar,
    autoDescend: input.autoDescend ?? d.autoDescend,
    maxNonTrivialEnemies: Math.max(1, Math.trunc(input.maxNonTrivialEnemies ?? d.maxNonTrivialEnemies)),
  };
}

function badStatus(player: Readonly<PlayerState>): string | null {
  for (const effect of player.statusEffects) {
    const label = effect.light || effect.text || "";
    const lower = label.toLowerCase();
    if (BAD_STATUS_PREFIXES.some((prefix) => lower.startsWith(prefix))) return label;
  }
  return null;
}

function parsePickup(message: string): string | null {
  for (const pattern of PICKUP_PATTERNS) {
    const match = pattern.exec(message);
    if (match?.[1]) return match[1];
  }
  return null;
}

/** One run of the explore/fight/rest/descend loop. */
class AutoPlayRun {
  private actions = 0;
  private readonly killed: string[] = [];
  private readonly picked: string[] = [];
  private readonly floors: FloorLog[] = [];
  private fightRounds = 0;
  private lastRestTurn = -1;
  private lastTurn: number | null = null;
  private stalled = 0;
  private readonly startTurn: number;
  private readonly startXl: number;

  constructor(
    private readonly host: AutoPlayHost,
    private readonly options: AutoPlayOptions,
    private readonly logger: Logger,
  ) {
    this.startTurn = host.player.turn;
    this.startXl = host.player.xl;
  }

  async run(): Promise<AutoPlayReport> {
    this.logger.info("Auto-play started", { ...this.options, turn: this.startTurn });
    let stopReason = `action limit reached (${this.options.maxActions})`;
    while (this.actions < this.options.maxActions) {
      const reason = await this.step();
      if (reason) {
        stopReason = reason;
        break;
      }
    }
    const report: AutoPlayReport = {
      stopReason,
      actions: this.actions,
      kills: this.killed.length,
      killed: [...this.killed],
      pickups: this.picked.length,
      picked: [...this.picked],
      floors: this.floors.map((f) => ({ place: f.place, events: [...f.events] })),
      startTurn: this.startTurn,
      endTurn: this.host.player.turn,
    };
    this.logger.info("Auto-play stopped", { stopReason, actions: report.actions, kills: report.kills });
    return report;
  }

  /** Takes at most a few actions; returns a stop reason or null to keep going. */
  private async step(): Promise<string | null> {
    const { host, options } = this;
    if (host.shutdownRequested) return "shutdown requested";
    const p = host.player;
    if (p.dead) return "character died";

    if (this.lastTurn !== null && p.turn === this.lastTurn) {
      this.stalled += 1;
      if (this.stalled >= STALL_LIMIT) return `no progress: turn stuck at ${p.turn}`;
    } else {
      this.stalled = 0;
    }
    this.lastTurn = p.turn;
    this.floor();

    const enemies = host.getNearbyEnemies();
    const dangerous = enemies.find((e) => e.threat === "dangerous" || e.threat === "extremely dangerous");
    if (dangerous) {
      return `dangerous enemy spotted: ${dangerous.name} (${dangerous.threat}, ${dangerous.direction})`;
    }
    if (p.maxHp > 0 && (p.hp * 100) / p.maxHp < options.stopHpPercent) {
      return `HP low: ${p.hp}/${p.maxHp}`;
    }
    const status = badStatus(p);
    if (status) return `bad status: ${status}`;
    if (p.xl > this.startXl) return `level up: reached XL ${p.xl}`;
    const nonTrivial = enemies.filter((e) => e.threat !== "trivial");
    if (nonTrivial.length >= options.maxNonTrivialEnemies) {
      return `too many enemies: ${nonTrivial.length} non-trivial in sight`;
    }

    if (enemies.length > 0) {
      this.fightRounds += 1;
      if (this.fightRounds > FIGHT_ROUND_LIMIT && nonTrivial.length > 0) {
        return `fight not finished after ${FIGHT_ROUND_LIMIT} rounds`;
      }
      const turnBefore = p.turn;
      this.recordKills(await this.act(() => host.autoFight()));
      if (host.player.turn === turnBefore && this.actions < options.maxActions) {
        // Target out of reach; move instead
        await this.act(() => host.autoExplore());
      }
      return null;
    }
    this.fightRounds = 0;

    if (p.hp * 3 < p.maxHp * 2 && this.lastRestTurn !== p.turn) {
      this.lastRestTurn = p.turn;
      await this.act(() => host.rest());
      return null;
    }

    const messages = await this.act(() => host.autoExplore());
    const found = this.scanExplore(messages);
    if (found) return found;

    if (messages.some((m) => m.startsWith(FLOOR_DONE_MARKER))) {
      if (!options.autoDescend) return "floor fully explored";
      await this.act(() => host.rest());
      if (this.actions >= options.maxActions) return null;
      const log = this.floor();
      await this.act(() => host.goDownstairs());
      const after = this.currentFloor();
      if (after !== log.place) log.events.push(`descended to ${after}`);
    }
    return null;
  }

  private async act(action: () => Promise<string[]>): Promise<string[]> {
    this.actions += 1;
    return action();
  }

  private currentFloor(): string {
    const { place, depth } = this.host.player;
    return place ? `${place}:${depth}` : "unknown";
  }

  private floor(): FloorLog {
    const place = this.currentFloor();
    const last = this.floors[this.floors.length - 1];
    if (last && last.place === place) return last;
    const entry: FloorLog = { place, events: [] };
    this.floors.push(entry);
    return entry;
  }

  private event(text: string): void {
    this.floor().events.push(text);
  }

  private recordKills(messages: string[]): void {
    for (const message of messages) {
      const match = KILL_PATTERN.exec(message);
      if (!match?.[1]) continue;
      this.killed.push(match[1]);
      this.event(`killed ${match[1]}`);
    }
  }

  /** Notes pickups and altars; returns a stop reason when one is configured to stop. */
  private scanExplore(messages: string[]): string | null {
    let stop: string | null = null;
    for (const message of messages) {
      const item = parsePickup(message);
      if (item) {
        this.picked.push(item);
        this.event(`picked up ${item}`);
        if (this.options.stopOnItems && !stop) stop = `picked up ${item}`;
        continue;
      }
      if (ALTAR_PATTERN.test(message)) {
        this.event("found an altar");
        if (this.options.stopOnAltar && !stop) stop = "found an altar";
      }
    }
    return stop;
  }
}

export function runAutoPlay(
  host: AutoPlayHost,
  options: AutoPlayOptions,
  logger: Logger,
): Promise<AutoPlayReport> {
  return new AutoPlayRun(host, options, logger).run();
}
