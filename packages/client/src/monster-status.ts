/** Behaviour field of the packed foreground tile flags. */
export const BEH_MASK = 0x00700000n;
export const BEH_STAB = 0x00100000n;
export const BEH_MAY_STAB = 0x00200000n;
export const BEH_FLEEING = 0x00300000n;
export const BEH_PARALYSED = 0x00400000n;

/** Wound-severity field. */
export const MDAM_MASK = 0x1c0000000n;
export const MDAM_LIGHT = 0x040000000n;
export const MDAM_MOD = 0x080000000n;
export const MDAM_HEAVY = 0x0c0000000n;
export const MDAM_SEV = 0x100000000n;
export const MDAM_ADEAD = 0x1c0000000n;

const BEHAVIOUR_LABELS = new Map<bigint, string>([
  [BEH_STAB, "sleeping"],
  [BEH_MAY_STAB, "unaware"],
  [BEH_FLEEING, "fleeing"],
  [BEH_PARALYSED, "paralysed"],
]);

const WOUND_LABELS = new Map<bigint, string>([
  [MDAM_LIGHT, "lightly wounded"],
  [MDAM_MOD, "moderately wounded"],
  [MDAM_HEAVY, "heavily wounded"],
  [MDAM_SEV, "severely wounded"],
  [MDAM_ADEAD, "almost dead"],
]);

/** e.g. `"sleeping, heavily wounded"`; empty when neither field is set. */
export function describeMonsterFlags(fg: bigint): string {
  const parts: string[] = [];
  const behaviour = BEHAVIOUR_LABELS.get(fg & BEH_MASK);
  if (behaviour) parts.push(behaviour);
  const wounds = WOUND_LABELS.get(fg & MDAM_MASK);
  if (wounds) parts.push(wounds);
  return parts.join(", ");
}
