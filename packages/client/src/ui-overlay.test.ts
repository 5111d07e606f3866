import { describe, it, expect, beforeEach } from "vitest";
import { UIOverlayTracker, type OverlayLink } from "./ui-overlay.js";
import { StateMirror } from "./state-mirror.js";
import { ConsoleLogger } from "./logger.js";
import { ManualClock, ScriptedTransport, serverMsg } from "./test-harness.js";
import { decodeMessage } from "./codec.js";

describe("UIOverlayTracker", () => {
  let overlay: UIOverlayTracker;

  beforeEach(() => {
    overlay = new UIOverlayTracker();
  });

  describe("menus", () => {
    const inventoryMenu = () =>
      serverMsg.menu({
        tag: "inventory",
        title: { text: "<white>Inventory: 2/52 slots</white>" },
        more: "<cyan>[?] help</cyan>",
        items: [
          { text: "Hand Weapons", level: 1 },
          { text: "a - a +0 dagger (weapon)", level: 2, hotkeys: [97] },
          { text: "(no hotkey)", level: 2 },
          { text: "   ", level: 2, hotkeys: [98] },
        ],
      });

    it("caches a pushed menu and reports it as ready", () => {
      expect(overlay.apply(inventoryMenu())).toBe(true);
      expect(overlay.menu?.tag).toBe("inventory");
    });

    it("renders headers, hotkeyed entries and plain entries", () => {
      overlay.apply(inventoryMenu());
      expect(overlay.read()).toBe(
        "=== Inventory: 2/52 slots (type: inventory) ===\n" +
        "[?] help\n" +
        "\n  Hand Weapons\n" +
        "  [a] a +0 dagger (weapon)\n" +
        "      (no hotkey)",
      );
    });

    it("merges update_menu fields", () => {
      overlay.apply(inventoryMenu());
      overlay.apply(decodeMessage({ msg: "update_menu", title: "Drop what?" }));
      expect(overlay.menu?.title).toBe("Drop what?");
      expect(overlay.menu?.items).toHaveLength(4);
    });

    it("merges chunked items by index", () => {
      overlay.apply(serverMsg.menu({ tag: "pickup", items: [{ text: "one" }, { text: "two" }] }));
      overlay.apply(decodeMessage({
        msg: "update_menu_items",
        chunk_start: 1,
        items: [{ text: "TWO" }, { text: "three" }],
      }));
      expect(overlay.menu?.items.map((i) => i.text)).toEqual(["one", "TWO", "three"]);
    });

    it("clears on close_menu and close_all_menus", () => {
      overlay.apply(inventoryMenu());
      expect(overlay.apply(serverMsg.bare("close_menu"))).toBe(false);
      expect(overlay.menu).toBeNull();
      overlay.apply(inventoryMenu());
      overlay.apply(serverMsg.bare("close_all_menus"));
      expect(overlay.menu).toBeNull();
    });
  });

  describe("popups", () => {
    it("replaces on push, merges on state and clears on pop", () => {
      overlay.apply(serverMsg.uiPush("describe-item", { body: "A dagger.", generation_id: 3 }));
      overlay.apply(serverMsg.uiPush("describe-monster", { body: "A rat." }));
      overlay.apply(serverMsg.uiState("describe-monster", { quote: "Squeak." }));
      expect(overlay.popup).toEqual({ type: "describe-monster", fields: { body: "A rat.", quote: "Squeak." } });
      expect(overlay.apply(serverMsg.bare("ui-pop"))).toBe(false);
      expect(overlay.popup).toBeNull();
    });

    it("ignores ui-state when no popup is open", () => {
      expect(overlay.apply(serverMsg.uiState("newgame-choice"))).toBe(true);
      expect(overlay.popup).toBeNull();
    });

    it("renders text from strings and {text} objects in a fixed order", () => {
      overlay.apply(serverMsg.uiPush("describe-item", {
        body: { text: "<lightgrey>A sharp blade.</lightgrey>" },
        title: "a +0 dagger",
        prompt: "Press a key.",
        stats: { text: "Base damage: 4" },
      }));
      expect(overlay.read()).toBe(
        "=== Popup: describe-item ===\na +0 dagger\nA sharp blade.\nPress a key.\nBase damage: 4",
      );
    });

    it("falls back to listing field names", () => {
      overlay.apply(serverMsg.uiPush("spellset", { spellset: [], generation_id: 1 }));
      expect(overlay.read()).toBe("=== Popup: spellset ===\nData keys: spellset");
    });

    it("shows numbers and records carried in text fields", () => {
      overlay.apply(serverMsg.uiPush("describe-monster", { description: 42, stats: { str: 10, dex: 8 } }));
      expect(overlay.read()).toBe('=== Popup: describe-monster ===\n42\n{"str":10,"dex":8}');
    });

    it("prefers the menu when both are open", () => {
      overlay.apply(serverMsg.uiPush("msgwin"));
      overlay.apply(serverMsg.menu({ tag: "ability", title: "Abilities" }));
      expect(overlay.read().startsWith("=== Abilities (type: ability) ===")).toBe(true);
    });

    it("says when nothing is open", () => {
      expect(overlay.read()).toBe("No menu or popup is currently open.");
    });
  });

  describe("select and dismiss", () => {
    let clock: ManualClock;
    let transport: ScriptedTransport;
    let link: OverlayLink;

    beforeEach(() => {
      clock = new ManualClock();
      transport = new ScriptedTransport(clock);
      link = { transport, clock, mirror: new StateMirror(new ConsoleLogger("mirror", "error")) };
    });

    it("reports a menu closed by the selection", async () => {
      overlay.apply(serverMsg.menu({ tag: "pickup", title: "Pick up what?" }));
      transport.onKey((key, t) => {
        if (key === "a") t.push(serverMsg.bare("close_menu"), serverMsg.text("a - a +0 dagger"));
      });
      expect(await overlay.select(link, "a")).toBe("Menu closed after pressing 'a'.");
      expect(overlay.menu).toBeNull();
      expect(link.mirror.getMessages()).toEqual(["a - a +0 dagger"]);
      expect(clock.now()).toBe(300);
    });

    it("reports a menu that stays open", async () => {
      overlay.apply(serverMsg.menu({ tag: "pickup", title: "Pick up what?" }));
      expect(await overlay.select(link, "b")).toBe("Pressed 'b'. Menu still open. Use readUi() to see the updated menu.");
      expect(clock.now()).toBe(1300);
    });

    it("refuses to select without a menu", async () => {
      expect(await overlay.select(link, "a")).toBe("No menu is currently open.");
      expect(transport.keys).toEqual([]);
    });

    it("dismisses a popup", async () => {
      overlay.apply(serverMsg.uiPush("describe-item"));
      expect(await overlay.dismiss(link)).toBe("Popup dismissed.");
      expect(overlay.popup).toBeNull();
      expect(transport.keys).toEqual(["key_esc"]);
    });

    it("dismisses a menu even if the server stays silent", async () => {
      overlay.apply(serverMsg.menu({ tag: "inventory" }));
      expect(await overlay.dismiss(link)).toBe("Menu closed.");
      expect(overlay.menu).toBeNull();
    });

    it("sends a plain escape when nothing is open", async () => {
      expect(await overlay.dismiss(link)).toBe("Escape pressed.");
      expect(transport.keys).toEqual(["key_esc"]);
      expect(transport.recvCalls).toBe(0);
    });
  });
});
