import type { Clock, InboundMessage, MenuItem } from "@crawlbridge/schemas";
import { textOf } from "./codec.js";
import { stripFormatting } from "./text.js";
import type { GameTransport } from "./transport.js";
import type { StateMirror } from "./state-mirror.js";

export interface MenuState {
  tag: string;
  title: string;
  more: string;
  items: MenuItem[];
}

export interface PopupState {
  type: string;
  fields: Record<string, unknown>;
}

/** What select/dismiss need to run their own short exchange. */
export interface OverlayLink {
  transport: GameTransport;
  clock: Clock;
  mirror: StateMirror;
}

const POPUP_TEXT_FIELDS = ["description", "quote", "spells_description", "stats"] as const;
const POPUP_HIDDEN_FIELDS = new Set(["generation_id"]);

/** Numbers, lists and records some popups carry in their text fields. */
function rawFieldText(value: unknown): string {
  if (value === undefined || value === null || value === "") return "";
  return typeof value === "object" ? JSON.stringify(value) : String(value);
}

/**
 * Side channel for server-pushed menus and popups. At most one of each is
 * open; the dispatcher treats any push or update as "ready" and leaves the
 * interaction to the caller.
 */
export class UIOverlayTracker {
  private _menu: MenuState | null = null;
  private _popup: PopupState | null = null;

  get menu(): Readonly<MenuState> | null {
    return this._menu;
  }

  get popup(): Readonly<PopupState> | null {
    return this._popup;
  }

  /** True for the kinds that open or change an overlay. */
  apply(msg: InboundMessage): boolean {
    switch (msg.msg) {
      case "menu":
        this._menu = { tag: msg.tag, title: msg.title, more: msg.more, items: [...msg.items] };
        return true;
      case "update_menu":
        if (this._menu) {
          if (msg.title !== undefined) this._menu.title = msg.title;
          if (msg.more !== undefined) this._menu.more = msg.more;
          if (msg.items !== undefined) this._menu.items = [...msg.items];
        }
        return true;
      case "update_menu_items":
        if (this._menu) {
          const items = this._menu.items;
          msg.items.forEach((item, i) => {
            const index = msg.chunkStart + i;
            if (index < items.length) items[index] = item;
            else items.push(item);
          });
        }
        return true;
      case "close_menu":
      case "close_all_menus":
        this._menu = null;
        return false;
      case "ui-push":
        this._popup = { type: msg.type, fields: { ...msg.fields } };
        return true;
      case "ui-state":
        if (this._popup) {
          this._popup.type = msg.type;
          Object.assign(this._popup.fields, msg.fields);
        }
        return true;
      case "ui-pop":
        this._popup = null;
        return false;
      default:
        return false;
    }
  }

  clear(): void {
    this._menu = null;
    this._popup = null;
  }

  read(): string {
    if (this._menu) return this.renderMenu();
    if (this._popup) return this.renderPopup();
    return "No menu or popup is currently open.";
  }

  renderMenu(): string {
    const menu = this._menu;
    if (!menu) return "No menu is currently open.";
    const lines = [`=== ${stripFormatting(menu.title)} (type: ${menu.tag}) ===`];
    const more = stripFormatting(menu.more);
    if (more) lines.push(more);
    for (const item of menu.items) {
      const text = stripFormatting(item.text);
      if (!text) continue;
      if (item.level < 2) lines.push(`\n  ${text}`);
      else if (item.hotkeys.length > 0) lines.push(`  [${item.hotkeys[0]}] ${text}`);
      else lines.push(`      ${text}`);
    }
    return lines.join("\n");
  }

  renderPopup(): string {
    const popup = this._popup;
    if (!popup) return "No popup is currently open.";
    const lines = [`=== Popup: ${popup.type} ===`];
    const fieldText = (name: string) => {
      const text = textOf(popup.fields[name]);
      return text ? stripFormatting(text) : "";
    };
    for (const name of ["title", "body", "prompt"]) {
      const text = fieldText(name);
      if (text) lines.push(text);
    }
    for (const name of POPUP_TEXT_FIELDS) {
      const value = popup.fields[name];
      const text = textOf(value) === undefined ? rawFieldText(value) : fieldText(name);
      if (text) lines.push(text);
    }
    if (lines.length === 1) {
      const keys = Object.keys(popup.fields).filter((k) => !POPUP_HIDDEN_FIELDS.has(k));
      lines.push(`Data keys: ${keys.join(", ")}`);
    }
    return lines.join("\n");
  }

  /** Sends a hotkey to the open menu and reports whether it closed. */
  async select(link: OverlayLink, key: string): Promise<string> {
    if (!this._menu) return "No menu is currently open.";
    link.transport.sendKey(key);
    await link.clock.sleep(300);
    let closed = false;
    for (const msg of await link.transport.recvMessages(1000)) {
      link.mirror.apply(msg);
      if (msg.msg === "close_menu" || msg.msg === "close_all_menus") closed = true;
      this.apply(msg);
    }
    if (closed && !this._menu) return `Menu closed after pressing '${key}'.`;
    if (this._menu) return `Pressed '${key}'. Menu still open. Use readUi() to see the updated menu.`;
    return `Pressed '${key}'.`;
  }

  /** Escapes whichever overlay is open; a plain escape when none is. */
  async dismiss(link: OverlayLink): Promise<string> {
    const target = this._menu ? "menu" : this._popup ? "popup" : null;
    link.transport.sendKey("key_esc");
    if (!target) return "Escape pressed.";
    await link.clock.sleep(300);
    for (const msg of await link.transport.recvMessages(1000)) {
      link.mirror.apply(msg);
      this.apply(msg);
    }
    if (target === "menu") {
      this._menu = null;
      return "Menu closed.";
    }
    this._popup = null;
    return "Popup dismissed.";
  }
}
