// Pure formatting for the command line: no I/O, no state.
import type { AutoPlayReport, PlayerState } from "@crawlbridge/schemas";

// ANSI color helpers
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;
export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;
export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;
export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;
export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;
export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

const DANGER_PREFIXES = ["character died", "dangerous enemy", "HP low"];
const CAUTION_PREFIXES = ["bad status", "too many enemies", "fight not finished", "no progress", "shutdown requested", "Not in game", "[ERROR"];

export function colorForStopReason(reason: string): (s: string) => string {
  if (DANGER_PREFIXES.some((p) => reason.startsWith(p))) return red;
  if (CAUTION_PREFIXES.some((p) => reason.startsWith(p))) return yellow;
  return green;
}

/** Collapses repeats in first-seen order: `rat x2, bat`. */
export function summarize(names: readonly string[]): string {
  const counts = new Map<string, number>();
  for (const name of names) counts.set(name, (counts.get(name) ?? 0) + 1);
  return [...counts].map(([name, n]) => (n > 1 ? `${name} x${n}` : name)).join(", ");
}

export function formatReport(report: AutoPlayReport): string {
  const lines = [
    `${bold("Auto-play stopped:")} ${colorForStopReason(report.stopReason)(report.stopReason)}`,
    `  actions: ${report.actions}, turns ${report.startTurn}-${report.endTurn} (${report.endTurn - report.startTurn} elapsed)`,
    `  kills: ${report.kills}${report.killed.length > 0 ? ` ${dim(`(${summarize(report.killed)})`)}` : ""}`,
    `  pickups: ${report.pickups}${report.picked.length > 0 ? ` ${dim(`(${summarize(report.picked)})`)}` : ""}`,
  ];
  if (report.floors.length > 0) {
    lines.push("  floors:");
    for (const floor of report.floors) {
      const events = floor.events.length > 0 ? floor.events.join(", ") : dim("(quiet)");
      lines.push(`    ${cyan(floor.place)}: ${events}`);
    }
  }
  return lines.join("\n");
}

export function formatLobby(gameIds: readonly string[]): string {
  if (gameIds.length === 0) return yellow("The lobby offered no games.");
  const lines = ["Games offered by the lobby:"];
  gameIds.forEach((id, i) => {
    lines.push(`  ${dim(`${i + 1}.`)} ${cyan(id)}${i === 0 ? dim(" (default)") : ""}`);
  });
  return lines.join("\n");
}

/** One-line character summary printed before and after a run. */
export function formatPlayerLine(player: Readonly<PlayerState>): string {
  const who = `${player.species} ${player.title}`.trim() || "Unknown character";
  const where = player.place ? `${player.place}:${player.depth}` : "-";
  const hp = `HP ${player.hp}/${player.maxHp}`;
  return `${bold(who)} XL${player.xl} ${player.dead ? red(hp) : hp} ${where} turn ${player.turn}`;
}
