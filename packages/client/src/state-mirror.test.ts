import { describe, it, expect, beforeEach } from "vitest";
import { StateMirror } from "./state-mirror.js";
import { decodeMessage } from "./codec.js";
import { ConsoleLogger } from "./logger.js";
import { BEH_STAB, MDAM_HEAVY } from "./monster-status.js";

const logger = new ConsoleLogger("mirror", "error");

const player = (fields: Record<string, unknown>) => decodeMessage({ msg: "player", ...fields });
const map = (...cells: Record<string, unknown>[]) => decodeMessage({ msg: "map", cells });
const texts = (...lines: string[]) => decodeMessage({ msg: "msgs", messages: lines.map((text) => ({ text })) });

describe("StateMirror", () => {
  let mirror: StateMirror;

  beforeEach(() => {
    mirror = new StateMirror(logger);
  });

  describe("player diffs", () => {
    it("copies only the keys present", () => {
      mirror.apply(player({ hp: 20, hp_max: 25, place: "Dungeon", depth: 1 }));
      mirror.apply(player({ hp: 14 }));
      expect(mirror.player.hp).toBe(14);
      expect(mirror.player.maxHp).toBe(25);
      expect(mirror.player.place).toBe("Dungeon");
    });

    it("ignores values of the wrong primitive type", () => {
      mirror.apply(player({ hp: 10 }));
      mirror.apply(player({ hp: "lots", god: 3 }));
      expect(mirror.player.hp).toBe(10);
      expect(mirror.player.god).toBe("");
    });

    it("reads the nested position and the adjusted noise", () => {
      mirror.apply(player({ pos: { x: 3, y: -2 }, adjusted_noise: 6, noise: 99 }));
      expect(mirror.player.position).toEqual({ x: 3, y: -2 });
      expect(mirror.player.noise).toBe(6);
    });

    it("replaces the status-effect set", () => {
      mirror.apply(player({ status: [{ light: "Slow" }, { text: "Poison" }] }));
      mirror.apply(player({ status: [{ light: "Berserk", desc: "raging" }] }));
      expect(mirror.player.statusEffects).toEqual([{ light: "Berserk", desc: "raging" }]);
    });

    it("applies an already-applied player diff as a no-op", () => {
      const diff = player({ hp: 9, pos: { x: 1, y: 1 }, inv: { "0": { name: "a dagger", quantity: 1 } } });
      mirror.apply(diff);
      const before = { player: structuredClone(mirror.player), inventory: mirror.getInventory() };
      mirror.apply(diff);
      expect(mirror.player).toEqual(before.player);
      expect(mirror.getInventory()).toEqual(before.inventory);
    });
  });

  describe("inventory", () => {
    it("upserts, merges and deletes per slot", () => {
      mirror.apply(player({ inv: { "0": { name: "a +0 dagger", quantity: 1 }, "1": { name: "3 potions of curing", quantity: 3 } } }));
      mirror.apply(player({ inv: { "1": { quantity: 2, inscription: "heal" }, "0": null } }));
      expect(mirror.getInventory()).toEqual([
        { index: 1, slot: "b", name: "3 potions of curing", quantity: 2, inscription: "heal" },
      ]);
    });

    it("tags equipped slots and skips unnamed items", () => {
      mirror.apply(player({
        weapon_index: 0,
        offhand_index: 27,
        inv: {
          "0": { name: "a +0 hand axe" },
          "5": { name: "?" },
          "27": { name: "a +1 buckler", useless: true },
        },
      }));
      expect(mirror.getInventory()).toEqual([
        { index: 0, slot: "a", name: "a +0 hand axe", quantity: 1, equipped: "weapon" },
        { index: 27, slot: "B", name: "a +1 buckler", quantity: 1, equipped: "offhand", useless: true },
      ]);
      expect(mirror.findItem("B")?.name).toBe("a +1 buckler");
      expect(mirror.findItem("f")).toBeUndefined();
    });
  });

  describe("map diffs", () => {
    it("advances the cursor when x is absent", () => {
      mirror.apply(map({ x: 5, y: 3, g: "#" }, { g: "." }, { g: ">" }, { x: 1, y: 4, g: "<" }, { g: "_" }));
      expect(mirror.getCell(5, 3)?.glyph).toBe("#");
      expect(mirror.getCell(6, 3)?.glyph).toBe(".");
      expect(mirror.getCell(7, 3)?.glyph).toBe(">");
      expect(mirror.getCell(1, 4)?.glyph).toBe("<");
      expect(mirror.getCell(2, 4)?.glyph).toBe("_");
    });

    it("skips cells until a full coordinate is known", () => {
      mirror.apply(map({ g: "#" }, { x: 2, g: "." }, { y: 0, g: ">" }));
      expect(mirror.snapshot().cells.map(([key, cell]) => [key, cell.glyph])).toEqual([["2,0", ">"]]);
    });

    it("clears monsters at every coordinate the batch mentions", () => {
      mirror.apply(map(
        { x: 1, y: 1, g: "g", mon: { id: 1, name: "goblin", threat: 0 } },
        { x: 4, y: 4, g: "r", mon: { id: 2, name: "rat", threat: 0 } },
      ));
      mirror.apply(map({ x: 1, y: 1, g: "." }));
      expect(mirror.getMonster(1, 1)).toBeUndefined();
      expect(mirror.getMonster(4, 4)).toEqual({ id: 2, name: "rat", threat: 0 });
    });

    it("leaves exactly the batch's monsters at the coordinates it names", () => {
      mirror.apply(map(
        { x: 0, y: 0, mon: { id: 1, name: "jackal", threat: 0 } },
        { mon: { id: 2, name: "jackal", threat: 0 } },
        { mon: { id: 3, name: "jackal", threat: 0 } },
      ));
      mirror.apply(map(
        { x: 0, y: 0, mon: null },
        { g: "." },
        { mon: { id: 3, threat: 1 } },
        { mon: { id: 1 } },
      ));
      expect(mirror.snapshot().monsters).toEqual([
        ["2,0", { id: 3, name: "jackal", threat: 1 }],
        ["3,0", { id: 1, name: "jackal", threat: 0 }],
      ]);
    });

    it("fills name and threat from the per-id cache", () => {
      mirror.apply(map({ x: 2, y: 2, mon: { id: 7, name: "kobold", threat: 1 } }));
      mirror.apply(map({ x: 2, y: 2, g: "." }, { x: 3, y: 2, mon: { id: 7 } }));
      expect(mirror.getMonster(3, 2)).toEqual({ id: 7, name: "kobold", threat: 1 });
    });

    it("applies an already-applied map diff as a no-op", () => {
      const diff = map(
        { x: 0, y: 0, g: "#", f: 2, halo: true },
        { g: "g", fg: [Number(BEH_STAB), 0], mon: { id: 4, name: "goblin", threat: 0 } },
        { x: 0, y: 1, g: "." },
      );
      mirror.apply(diff);
      const once = mirror.snapshot();
      mirror.apply(diff);
      expect(mirror.snapshot()).toEqual(once);
    });

    it("removes overlays when a cell arrives without any", () => {
      mirror.apply(map({ x: 0, y: 0, g: ".", silenced: true, orb_glow: 2 }));
      expect(mirror.getOverlays({ x: 0, y: 0 })).toEqual({ silenced: true, orb_glow: 2 });
      mirror.apply(map({ x: 0, y: 0, g: "." }));
      expect(mirror.getOverlays({ x: 0, y: 0 })).toEqual({});
    });

    it("keeps 64-bit flags from lo/hi pairs", () => {
      const fg = MDAM_HEAVY | BEH_STAB;
      mirror.apply(map({ x: 0, y: 0, fg: [Number(fg & 0xffffffffn), Number(fg >> 32n)] }));
      expect(mirror.getCell(0, 0)?.fg).toBe(fg);
      expect(mirror.monsterStatus(0, 0)).toBe("sleeping, heavily wounded");
    });
  });

  describe("messages", () => {
    it("strips markup and drops empty lines", () => {
      mirror.apply(texts("<lightred>You hit the rat.</lightred>", "   ", "<white></white>"));
      expect(mirror.getMessages()).toEqual(["You hit the rat."]);
    });

    it("trims the ring buffer to the latest 100 past 200", () => {
      mirror.apply(texts(...Array.from({ length: 201 }, (_, i) => `m${i}`)));
      const all = mirror.getMessages(500);
      expect(all).toHaveLength(100);
      expect(all[0]).toBe("m101");
      expect(all[99]).toBe("m200");
      expect(mirror.messageCount).toBe(201);
    });

    it("returns messages since a sequence number across trimming", () => {
      mirror.apply(texts(...Array.from({ length: 201 }, (_, i) => `m${i}`)));
      expect(mirror.messagesSince(195)).toEqual(["m195", "m196", "m197", "m198", "m199", "m200"]);
      expect(mirror.messagesSince(0)).toHaveLength(100);
      expect(mirror.messagesSince(201)).toEqual([]);
    });
  });

  describe("enemies", () => {
    beforeEach(() => {
      mirror.apply(player({ pos: { x: 10, y: 10 } }));
    });

    it("lists monsters within eight tiles, nearest first", () => {
      mirror.apply(map(
        { x: 10, y: 7, mon: { id: 1, name: "jackal", threat: 0 } },
        { x: 11, y: 11, fg: Number(BEH_STAB), mon: { id: 2, name: "goblin", threat: 1 } },
        { x: 19, y: 10, mon: { id: 3, name: "orc", threat: 1 } },
      ));
      expect(mirror.getNearbyEnemies()).toEqual([
        { name: "goblin", x: 1, y: 1, direction: "se", distance: 1, threat: "easy", status: "sleeping" },
        { name: "jackal", x: 0, y: -3, direction: "n", distance: 3, threat: "trivial", status: "" },
      ]);
    });

    it("ignores harmless fixtures and raises known dangerous names", () => {
      mirror.apply(map(
        { x: 9, y: 10, mon: { id: 1, name: "Plant", threat: 0 } },
        { x: 12, y: 10, mon: { id: 2, name: "ogre", threat: 1 } },
        { x: 10, y: 13, mon: { id: 3, name: "hydra", threat: 7 } },
      ));
      expect(mirror.getNearbyEnemies().map((e) => [e.name, e.threat])).toEqual([
        ["ogre", "dangerous"],
        ["hydra", "unknown(7)"],
      ]);
    });
  });

  describe("rendering", () => {
    it("renders the map around the player", () => {
      mirror.apply(player({ pos: { x: 10, y: 10 } }));
      mirror.apply(map({ x: 9, y: 9, g: "#" }, { g: "#" }, { g: "#" }, { x: 9, y: 10, g: "." }, { x: 11, y: 10, g: "." }));
      expect(mirror.getMap(1)).toBe("###\n.@.\n   ");
    });

    it("reports an empty map", () => {
      expect(mirror.getMap()).toBe("No map data available");
      expect(mirror.getTacticalReadout()).toBe("No map data available");
    });

    it("lists landmarks by type then distance, hiding doors when others exist", () => {
      mirror.apply(player({ pos: { x: 10, y: 10 } }));
      mirror.apply(map({ x: 10, y: 7, g: ">" }, { x: 12, y: 12, g: "<" }, { x: 9, y: 10, g: "+" }));
      expect(mirror.renderLandmarks()).toBe(
        "downstairs (>) - N, 3 tiles away (dx=0, dy=-3)\n" +
        "upstairs (<) - SE, 2 tiles away (dx=2, dy=2)",
      );
    });

    it("falls back to doors", () => {
      mirror.apply(player({ pos: { x: 10, y: 10 } }));
      mirror.apply(map({ x: 9, y: 10, g: "+" }));
      expect(mirror.renderLandmarks()).toBe("door (+) - W, 1 tiles away (dx=-1, dy=0)");
    });

    it("says when no landmarks are known", () => {
      expect(mirror.renderLandmarks()).toBe("No landmarks discovered yet.");
    });

    it("formats the stats line", () => {
      mirror.apply(player({
        species: "Minotaur", title: "Skirmisher", hp: 20, hp_max: 25, mp: 3, mp_max: 5,
        ac: 4, ev: 10, sh: 0, ac_mod: 2, str: 18, int: 7, dex: 11, xl: 3, progress: 45,
        gold: 12, place: "Dungeon", depth: 2, turn: 310,
      }));
      expect(mirror.getStats()).toBe(
        "Character: Minotaur Skirmisher | HP: 20/25 | MP: 3/5 | AC: 4 (+2) EV: 10 SH: 0 | " +
        "Str: 18 Int: 7 Dex: 11 | XL: 3 (45%) | Gold: 12 | Place: Dungeon:2 | God: None | Turn: 310",
      );
    });

    it("adds form, piety, noise and status details", () => {
      mirror.apply(player({
        species: "Minotaur", title: "Skirmisher", form: 5, god: "Trog", piety_rank: 2, penance: true,
        adjusted_noise: 4, ev_mod: -3, status: [{ light: "Berserk" }], poison_survival: 0,
      }));
      expect(mirror.getStats()).toBe(
        "Character: Minotaur Skirmisher (Dragon Form) | HP: 0/0 | MP: 0/0 | AC: 0 EV: 0 (-3) SH: 0 | " +
        "Str: 0 Int: 0 Dex: 0 | XL: 1 (0%) | Gold: 0 | Place: :0 | " +
        "God: Trog [★★☆☆☆☆] (PENANCE!) | Noise: 4 | Status: Berserk | Turn: 0",
      );
    });

    it("builds the tactical readout", () => {
      mirror.apply(player({ pos: { x: 1, y: 1 }, place: "Dungeon", depth: 1 }));
      mirror.apply(map(
        { x: 0, y: 0, g: "#" }, { g: "#" }, { g: "#" },
        { x: 0, y: 1, g: "." }, { g: "." }, { g: "+" },
        { x: 0, y: 2, g: "<" }, { g: "~" },
      ));
      expect(mirror.getTacticalReadout()).toBe(
        "Position: Dungeon:1 (floor) | " +
        "Adjacent: NW:wall, N:wall, NE:wall, W:floor, E:door, SW:up, SE:unseen | " +
        "Nearest upstairs: SW, 1 tiles",
      );
    });

    it("ends the state text with a death banner once dead", () => {
      mirror.apply(map({ x: 0, y: 0, g: "." }));
      mirror.markDead();
      const text = mirror.getStateText();
      expect(text.split("\n").at(-1)).toBe("*** GAME OVER: YOU ARE DEAD ***");
      expect(mirror.player.deaths).toBe(1);
    });

    it("lists inventory, enemies and environment in the state text", () => {
      mirror.apply(player({ pos: { x: 0, y: 0 }, weapon_index: 0, inv: { "0": { name: "a +0 dagger", inscription: "melee" } } }));
      mirror.apply(map({ x: 0, y: 0, g: ".", sanctuary: true }, { g: "r", mon: { id: 1, name: "rat", threat: 0 } }));
      mirror.apply(texts("A rat comes into view."));
      const lines = mirror.getStateText().split("\n");
      expect(lines).toContain("  A rat comes into view.");
      expect(lines).toContain("  a) a +0 dagger (wielded) {melee}");
      expect(lines).toContain("  rat (e, dist 1, threat trivial)");
      expect(lines).toContain("--- Environment: Sanctuary (no combat) ---");
    });
  });

  it("reset empties everything", () => {
    mirror.apply(player({ hp: 5, inv: { "0": { name: "a dagger" } } }));
    mirror.apply(map({ x: 0, y: 0, g: ".", mon: { id: 1, name: "rat" } }));
    mirror.apply(texts("hello"));
    mirror.reset();
    expect(mirror.player.hp).toBe(0);
    expect(mirror.getInventory()).toEqual([]);
    expect(mirror.snapshot()).toEqual({ cells: [], monsters: [] });
    expect(mirror.getMessages()).toEqual([]);
  });
});
