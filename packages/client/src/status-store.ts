import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { PlayerState, StatusRecord } from "@crawlbridge/schemas";
import { isRecord } from "./codec.js";
import type { Logger } from "./logger.js";

type Counter = "attempt" | "wins" | "deaths";

/**
 * Attempt/win/death counters plus the latest thought line, persisted as a
 * small JSON file that stream overlays poll. Without a path it only keeps
 * the record in memory.
 */
export class StatusStore {
  private counters: Record<Counter, number> = { attempt: 0, wins: 0, deaths: 0 };
  private last: StatusRecord | null = null;

  constructor(
    private readonly path: string | null,
    private readonly logger: Logger,
  ) {}

  /** Restores the counters from a previous run's file, if there is one. */
  load(): void {
    if (!this.path || !existsSync(this.path)) return;
    try {
      const data: unknown = JSON.parse(readFileSync(this.path, "utf-8"));
      if (!isRecord(data)) return;
      for (const key of ["attempt", "wins", "deaths"] as const) {
        const value = data[key];
        if (typeof value === "number" && Number.isInteger(value) && value >= 0) this.counters[key] = value;
      }
    } catch (err) {
      this.logger.warn("Ignoring unreadable status file", {
        path: this.path,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  get attempt(): number {
    return this.counters.attempt;
  }

  get wins(): number {
    return this.counters.wins;
  }

  get deaths(): number {
    return this.counters.deaths;
  }

  get record(): StatusRecord | null {
    return this.last;
  }

  increment(counter: Counter): number {
    this.counters[counter] += 1;
    return this.counters[counter];
  }

  write(thought: string, player: Readonly<PlayerState>): StatusRecord {
    const record: StatusRecord = {
      ...this.counters,
      character: player.species ? `${player.species} ${player.title}`.trim() : "-",
      xl: player.xl,
      place: player.place ? `${player.place}:${player.depth}` : "-",
      turn: player.turn,
      thought,
      status: player.dead ? "Dead" : "Playing",
    };
    this.last = record;
    if (this.path) {
      try {
        mkdirSync(dirname(this.path), { recursive: true });
        writeFileSync(this.path, JSON.stringify(record, null, 2), "utf-8");
      } catch (err) {
        this.logger.warn("Failed to write status file", {
          path: this.path,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
    return record;
  }
}
