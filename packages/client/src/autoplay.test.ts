import { describe, it, expect } from "vitest";
import { ValidationError, type NearbyEnemy, type PlayerState, type ThreatLabel } from "@crawlbridge/schemas";
import { DEFAULT_AUTO_PLAY_OPTIONS, resolveAutoPlayOptions, runAutoPlay, type AutoPlayHost } from "./autoplay.js";
import { emptyPlayerState } from "./state-mirror.js";
import { recordingLoggers } from "./test-harness.js";

function enemy(name: string, threat: ThreatLabel, direction = "n"): NearbyEnemy {
  return { name, x: 0, y: -1, direction, distance: 1, threat, status: "" };
}

type Step = () => string[];

/**
 * Host whose sightings are scripted per iteration and whose commands run
 * the given handlers. Every command advances the turn unless `stuck` is set.
 */
class FakeHost implements AutoPlayHost {
  player: PlayerState = { ...emptyPlayerState(), hp: 20, maxHp: 20, place: "Dungeon", depth: 1, turn: 100 };
  shutdownRequested = false;
  sightings: NearbyEnemy[][] = [];
  calls: string[] = [];
  fight: Step = () => [];
  explore: Step = () => [];
  resting: Step = () => [];
  descend: Step = () => [];
  stuck = false;

  getNearbyEnemies(): NearbyEnemy[] {
    return this.sightings.shift() ?? [];
  }

  autoFight(): Promise<string[]> {
    return this.run("fight", this.fight);
  }

  autoExplore(): Promise<string[]> {
    return this.run("explore", this.explore);
  }

  rest(): Promise<string[]> {
    return this.run("rest", this.resting);
  }

  goDownstairs(): Promise<string[]> {
    return this.run("descend", this.descend);
  }

  private async run(name: string, step: Step): Promise<string[]> {
    this.calls.push(name);
    if (!this.stuck) this.player.turn += 1;
    return step();
  }
}

const logger = recordingLoggers().factory("autoplay");

describe("resolveAutoPlayOptions", () => {
  it("fills defaults", () => {
    expect(resolveAutoPlayOptions({})).toEqual(DEFAULT_AUTO_PLAY_OPTIONS);
  });

  it("clamps out-of-range values", () => {
    const options = resolveAutoPlayOptions({ stopHpPercent: 5, maxActions: 5000, maxNonTrivialEnemies: 0 });
    expect(options.stopHpPercent).toBe(20);
    expect(options.maxActions).toBe(1000);
    expect(options.maxNonTrivialEnemies).toBe(1);
    expect(resolveAutoPlayOptions({ stopHpPercent: 150, maxActions: -3 })).toMatchObject({
      stopHpPercent: 100,
      maxActions: 1,
    });
  });

  it("rejects values of the wrong type", () => {
    const input = JSON.parse('{"stopOnItems": "yes"}');
    expect(() => resolveAutoPlayOptions(input)).toThrow(ValidationError);
    expect(() => resolveAutoPlayOptions(input)).toThrow("Invalid auto-play options: /stopOnItems: must be boolean");
  });
});

describe("runAutoPlay", () => {
  const options = (overrides: Parameters<typeof resolveAutoPlayOptions>[0] = {}) => resolveAutoPlayOptions(overrides);

  it("stops at a dangerous enemy after two trivial kills", async () => {
    const host = new FakeHost();
    host.sightings = [[enemy("rat", "trivial")], [enemy("bat", "trivial")], [enemy("ogre", "dangerous", "ne")]];
    const kills = ["You kill the rat!", "You kill the bat."];
    host.fight = () => [kills.shift() ?? ""];

    const report = await runAutoPlay(host, options(), logger);

    expect(report.stopReason).toBe("dangerous enemy spotted: ogre (dangerous, ne)");
    expect(report.kills).toBe(2);
    expect(report.killed).toEqual(["rat", "bat"]);
    expect(report.pickups).toBe(0);
    expect(report.picked).toEqual([]);
    expect(report.actions).toBe(2);
    expect(report.floors).toEqual([{ place: "Dungeon:1", events: ["killed rat", "killed bat"] }]);
    expect([report.startTurn, report.endTurn]).toEqual([100, 102]);
  });

  it("stops when the action limit is reached", async () => {
    const host = new FakeHost();
    host.explore = () => ["You explore."];
    const report = await runAutoPlay(host, options({ maxActions: 3 }), logger);
    expect(report.stopReason).toBe("action limit reached (3)");
    expect(host.calls).toEqual(["explore", "explore", "explore"]);
  });

  it("stops on request", async () => {
    const host = new FakeHost();
    host.shutdownRequested = true;
    const report = await runAutoPlay(host, options(), logger);
    expect(report.stopReason).toBe("shutdown requested");
    expect(report.actions).toBe(0);
  });

  it("stops when the turn counter no longer moves", async () => {
    const host = new FakeHost();
    host.stuck = true;
    const report = await runAutoPlay(host, options(), logger);
    expect(report.stopReason).toBe("no progress: turn stuck at 100");
    expect(report.actions).toBe(5);
  });

  it("stops on low HP, bad status and level gain", async () => {
    const low = new FakeHost();
    low.player.hp = 8;
    expect((await runAutoPlay(low, options(), logger)).stopReason).toBe("HP low: 8/20");

    const poisoned = new FakeHost();
    poisoned.player.statusEffects = [{ light: "Pois" }];
    expect((await runAutoPlay(poisoned, options(), logger)).stopReason).toBe("bad status: Pois");

    const levelling = new FakeHost();
    levelling.explore = () => {
      levelling.player.xl = 2;
      return ["You feel more experienced!"];
    };
    expect((await runAutoPlay(levelling, options(), logger)).stopReason).toBe("level up: reached XL 2");
  });

  it("stops when too many non-trivial enemies are in sight", async () => {
    const host = new FakeHost();
    host.sightings = [[enemy("jackal", "easy"), enemy("jackal", "easy"), enemy("gnoll", "easy")]];
    const report = await runAutoPlay(host, options(), logger);
    expect(report.stopReason).toBe("too many enemies: 3 non-trivial in sight");
  });

  it("gives up a fight that drags on", async () => {
    const host = new FakeHost();
    host.sightings = Array.from({ length: 20 }, () => [enemy("gnoll", "easy")]);
    host.fight = () => ["You hit the gnoll."];
    const report = await runAutoPlay(host, options(), logger);
    expect(report.stopReason).toBe("fight not finished after 15 rounds");
    expect(report.actions).toBe(15);
  });

  it("explores when the target cannot be reached", async () => {
    const host = new FakeHost();
    host.sightings = [[enemy("rat", "trivial")]];
    host.fight = () => {
      host.player.turn -= 1;
      return [];
    };
    await runAutoPlay(host, options({ maxActions: 2 }), logger);
    expect(host.calls).toEqual(["fight", "explore"]);
  });

  it("records pickups and stops on them when asked", async () => {
    const host = new FakeHost();
    host.explore = () => ["You see here a scroll.", "c - a scroll labelled FOOBAR"];
    const report = await runAutoPlay(host, options(), logger);
    expect(report.stopReason).toBe("picked up a scroll labelled FOOBAR");
    expect(report.picked).toEqual(["a scroll labelled FOOBAR"]);

    const keepGoing = new FakeHost();
    keepGoing.explore = () => ["You pick up 12 gold pieces."];
    const second = await runAutoPlay(keepGoing, options({ stopOnItems: false, maxActions: 2 }), logger);
    expect(second.stopReason).toBe("action limit reached (2)");
    expect(second.pickups).toBe(2);
  });

  it("stops at an altar unless told otherwise", async () => {
    const host = new FakeHost();
    host.explore = () => ["There is an altar of Trog here."];
    expect((await runAutoPlay(host, options(), logger)).stopReason).toBe("found an altar");

    const ignoring = new FakeHost();
    ignoring.explore = () => ["There is an altar of Trog here."];
    const report = await runAutoPlay(ignoring, options({ stopOnAltar: false, maxActions: 1 }), logger);
    expect(report.floors).toEqual([{ place: "Dungeon:1", events: ["found an altar"] }]);
  });

  it("stops at a finished floor or descends when allowed", async () => {
    const done = "[Floor fully explored. Call goDownstairs() to travel to the nearest downstairs and descend.]";
    const host = new FakeHost();
    host.explore = () => [done];
    expect((await runAutoPlay(host, options(), logger)).stopReason).toBe("floor fully explored");

    const diver = new FakeHost();
    diver.explore = () => (diver.player.depth === 1 ? [done] : ["You explore."]);
    diver.descend = () => {
      diver.player.depth = 2;
      return ["You climb downwards."];
    };
    const report = await runAutoPlay(diver, options({ autoDescend: true, maxActions: 4 }), logger);
    expect(diver.calls).toEqual(["explore", "rest", "descend", "explore"]);
    expect(report.floors).toEqual([
      { place: "Dungeon:1", events: ["descended to Dungeon:2"] },
      { place: "Dungeon:2", events: [] },
    ]);
  });

  it("rests at most once per turn value when wounded and nothing is around", async () => {
    const host = new FakeHost();
    host.player.hp = 12;
    host.resting = () => {
      host.player.turn -= 1;
      return ["You cannot rest while hungry."];
    };
    host.explore = () => ["You explore."];
    await runAutoPlay(host, options({ maxActions: 3 }), logger);
    expect(host.calls).toEqual(["rest", "explore", "rest"]);
  });
});
