/**
 * Free-form notes grouped into named pages. Pages outlive floors and are
 * removed only by {@link Notepad.rip}.
 */
export class Notepad {
  private pages = new Map<string, string[]>();

  /** @param defaultPage page used when a note names none, usually the current floor */
  constructor(private readonly defaultPage: () => string) {}

  write(text: string, page = ""): string {
    const name = page || this.defaultPage();
    const notes = this.pages.get(name) ?? [];
    notes.push(text);
    this.pages.set(name, notes);
    let total = 0;
    for (const list of this.pages.values()) total += list.length;
    return `Note saved to [${name}] (${notes.length} notes on this page, ${total} total).`;
  }

  read(page = ""): string {
    if (this.pages.size === 0) return "Notepad is empty.";
    if (page) {
      const notes = this.pages.get(page);
      if (!notes || notes.length === 0) return `No notes on page [${page}].`;
      return [`[${page}]`, ...notes.map((n) => `- ${n}`)].join("\n");
    }
    const lines: string[] = [];
    for (const [name, notes] of this.pages) {
      lines.push(`[${name}]`, ...notes.map((n) => `  - ${n}`));
    }
    return lines.join("\n");
  }

  rip(page: string): string {
    const notes = this.pages.get(page);
    if (!notes) return `No page [${page}] to rip out.`;
    this.pages.delete(page);
    return `Ripped out [${page}] (${notes.length} notes removed).`;
  }
}
