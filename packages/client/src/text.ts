/** Compass names accepted by movement, throwing and targeting commands. */
export const DIRECTIONS = ["n", "ne", "e", "se", "s", "sw", "w", "nw"] as const;

export type Direction = (typeof DIRECTIONS)[number];

const DIRECTION_KEYS: Record<Direction, string> = {
  n: "key_dir_n",
  ne: "key_dir_ne",
  e: "key_dir_e",
  se: "key_dir_se",
  s: "key_dir_s",
  sw: "key_dir_sw",
  w: "key_dir_w",
  nw: "key_dir_nw",
};

export function parseDirection(input: string): Direction | undefined {
  const lower = input.trim().toLowerCase();
  return DIRECTIONS.find((d) => d === lower);
}

export function directionKey(direction: Direction): string {
  return DIRECTION_KEYS[direction];
}

/** Removes `<tag>` colour markup. */
export function stripMarkup(text: string): string {
  return text.replace(/<[^>]+>/g, "").trim();
}

/** Removes colour markup and `§x` escapes. */
export function stripFormatting(text: string): string {
  return stripMarkup(text).replace(/§./g, "").trim();
}

/** 0..25 → a..z, 26..51 → A..Z; anything else falls back to the decimal index. */
export function slotLetter(index: number): string {
  if (index >= 0 && index < 26) return String.fromCharCode(97 + index);
  if (index >= 26 && index < 52) return String.fromCharCode(65 + index - 26);
  return String(index);
}

export function slotIndex(letter: string): number | undefined {
  if (!/^[a-zA-Z]$/.test(letter)) return undefined;
  const code = letter.charCodeAt(0);
  return code >= 97 ? code - 97 : code - 65 + 26;
}

/**
 * Compass label for an offset from the player, north being negative y.
 * Returns "" for the player's own cell.
 */
export function compass(dx: number, dy: number): string {
  let label = "";
  if (dy < 0) label += "n";
  else if (dy > 0) label += "s";
  if (dx > 0) label += "e";
  else if (dx < 0) label += "w";
  return label;
}

export function chebyshev(dx: number, dy: number): number {
  return Math.max(Math.abs(dx), Math.abs(dy));
}
