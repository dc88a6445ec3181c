/**
 * Catálogo de EFECTOS (buffs/debuffs) del combate.
 * - Los factores son multiplicativos sobre la BASE guardada por el StatusEngine.
 * - `critBonus` y `evasion` son aditivos (fracciones 0..1).
 * - `staminaCost` sólo aplica a los buffs que el propio combatiente activa.
 */
import type { MultiplierKey } from "../core/CombatTypes";

export const EFFECT_KINDS = [
  // Buffs
  "berserk",
  "painImmunity",
  "lastStand",
  "mistCloak",
  "energyShield",
  "stoneBody",
  "sharpSight",
  "shadowStep",
  // Debuffs
  "fear",
  "poison",
  "trapped",
  "burning",
  "confusion",
] as const;

export type EffectKind = (typeof EFFECT_KINDS)[number];
export type EffectPolarity = "buff" | "debuff";

export interface EffectDef {
  kind: EffectKind;
  polarity: EffectPolarity;
  name: string;
  description: string;
  /** Turnos por defecto; null = permanente hasta el fin del encuentro. */
  baseDuration: number | null;
  factors?: Partial<Record<MultiplierKey, number>>;
  critBonus?: number;
  evasion?: number;
  staminaCost?: number;
  /** Daño por turno por defecto (DoT). */
  damagePerTurn?: number;
  /** Absorción inicial (escudos). */
  absorb?: number;
}

export const EFFECT_CATALOG: Record<EffectKind, EffectDef> = {
  // ───── Buffs ─────
  berserk: {
    kind: "berserk",
    polarity: "buff",
    name: "Berserk",
    description: "More damage, less defense.",
    baseDuration: 3,
    factors: { damageMultiplier: 1.5, defenseMultiplier: 0.75 },
    staminaCost: 30,
  },
  painImmunity: {
    kind: "painImmunity",
    polarity: "buff",
    name: "Will Shield",
    description: "Pain is held back and returns when the effect ends.",
    baseDuration: 2,
    staminaCost: 20,
  },
  lastStand: {
    kind: "lastStand",
    polarity: "buff",
    name: "Last Stand",
    description: "Doubles the defense multiplier until the end of the fight (mitigation still caps at 80%). Only below 20% health.",
    baseDuration: null,
    factors: { defenseMultiplier: 2 },
    staminaCost: 0,
  },
  mistCloak: {
    kind: "mistCloak",
    polarity: "buff",
    name: "Mist Cloak",
    description: "Hard to see, hard to hit.",
    baseDuration: 2,
    evasion: 0.75,
    staminaCost: 25,
  },
  energyShield: {
    kind: "energyShield",
    polarity: "buff",
    name: "Energy Shield",
    description: "Absorbs incoming damage.",
    baseDuration: 3,
    absorb: 25,
    staminaCost: 10,
  },
  stoneBody: {
    kind: "stoneBody",
    polarity: "buff",
    name: "Stone Body",
    description: "Defense multiplier ×1.5 (mitigation caps at 80%), speed ×0.7.",
    baseDuration: 3,
    factors: { defenseMultiplier: 1.5, speedMultiplier: 0.7 },
    staminaCost: 20,
  },
  sharpSight: {
    kind: "sharpSight",
    polarity: "buff",
    name: "Sharp Sight",
    description: "Better aim and more critical hits.",
    baseDuration: 3,
    factors: { accuracyMultiplier: 1.25 },
    critBonus: 0.15,
    staminaCost: 10,
  },
  shadowStep: {
    kind: "shadowStep",
    polarity: "buff",
    name: "Shadow Step",
    description: "Slips through the void out of harm's way.",
    baseDuration: 1,
    evasion: 0.5,
  },

  // ───── Debuffs ─────
  fear: {
    kind: "fear",
    polarity: "debuff",
    name: "Fear",
    description: "Shaky hands, weaker blows.",
    baseDuration: 2,
    factors: { accuracyMultiplier: 0.85, damageMultiplier: 0.9 },
  },
  poison: {
    kind: "poison",
    polarity: "debuff",
    name: "Poison",
    description: "Damage every turn and sluggish movement.",
    baseDuration: 3,
    factors: { speedMultiplier: 0.8 },
    damagePerTurn: 3,
  },
  trapped: {
    kind: "trapped",
    polarity: "debuff",
    name: "Trapped",
    description: "Caught in a trap: barely moves.",
    baseDuration: 2,
    factors: { speedMultiplier: 0.3, defenseMultiplier: 0.7, attackSpeed: 0.1 },
  },
  burning: {
    kind: "burning",
    polarity: "debuff",
    name: "Burning",
    description: "Fire damage every turn.",
    baseDuration: 2,
    damagePerTurn: 4,
  },
  confusion: {
    kind: "confusion",
    polarity: "debuff",
    name: "Confusion",
    description: "Reality bends: attacks go astray.",
    baseDuration: 3,
    factors: { accuracyMultiplier: 0.6 },
  },
};

export const isEffectKind = (v: unknown): v is EffectKind => EFFECT_KINDS.some((k) => k === v);

/** Buffs que un combatiente puede activar gastando stamina. */
export const SELF_BUFFS = ["berserk", "painImmunity", "lastStand", "mistCloak", "energyShield", "stoneBody", "sharpSight"] as const;
export type SelfBuff = (typeof SELF_BUFFS)[number];
