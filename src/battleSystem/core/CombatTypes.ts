// src/battleSystem/core/CombatTypes.ts
// Vocabulario cerrado del combate (uniones literales) + el bloque de stats por combatiente.
import type { Weapon } from "./Weapon";
import type { Armor } from "./Armor";
import type { CombatantMemory } from "./CombatantMemory";
import type { Injury } from "./Injury";
import type { RejectReason } from "./CombatErrors";

export type SideKey = "player" | "enemy";

export const BODY_PARTS = ["head", "torso", "leftArm", "rightArm", "leftLeg", "rightLeg"] as const;
export type BodyPart = (typeof BODY_PARTS)[number];

/** Agrupa partes simétricas (para tablas de multiplicadores). */
export type BodyRegion = "head" | "torso" | "arm" | "leg";

export function bodyRegion(part: BodyPart): BodyRegion {
  switch (part) {
    case "head":
      return "head";
    case "torso":
      return "torso";
    case "leftArm":
    case "rightArm":
      return "arm";
    case "leftLeg":
    case "rightLeg":
      return "leg";
  }
}

export const DAMAGE_TYPES = ["cut", "pierce", "blunt", "magic", "fall", "poison", "burn"] as const;
export type DamageType = (typeof DAMAGE_TYPES)[number];

export const ATTACK_ACTIONS = ["basic", "strong", "fast", "feint", "kick", "push", "riposte"] as const;
export type AttackAction = (typeof ATTACK_ACTIONS)[number];

export const DEFENSE_ACTIONS = ["block", "dodge", "parry"] as const;
export type DefenseAction = (typeof DEFENSE_ACTIONS)[number];

export type CombatAction = AttackAction | DefenseAction;
export const COMBAT_ACTIONS: readonly CombatAction[] = [...ATTACK_ACTIONS, ...DEFENSE_ACTIONS];

export const isDefenseAction = (a: CombatAction): a is DefenseAction => a === "block" || a === "dodge" || a === "parry";

export const WEAPON_TYPES = [
  "fists",
  "daggers",
  "shortSwords",
  "longSwords",
  "greatSwords",
  "axes",
  "greatAxes",
  "hammers",
  "warHammers",
  "spears",
  "halberds",
  "maces",
  "staves",
  "bows",
  "crossbows",
  "shields",
] as const;
export type WeaponType = (typeof WEAPON_TYPES)[number];

/** Orden ascendente: importa para comparaciones de calidad. */
export const QUALITY_TIERS = ["broken", "weak", "normal", "good", "masterwork", "legendary"] as const;
export type QualityTier = (typeof QUALITY_TIERS)[number];

export const STANCES = ["neutral", "defensive", "aggressive", "balanced", "berserker", "evasive", "counter"] as const;
export type CombatStance = (typeof STANCES)[number];

export const ARCHETYPES = ["aggressive", "defensive", "tactical", "berserker", "archer"] as const;
export type Archetype = (typeof ARCHETYPES)[number];

/**
 * Bloque de stats mutable de un combatiente.
 * - health ∈ [0, maxHealth], pain/exhaustion ∈ [0,100].
 * - isConscious pasa a false cuando pain ≥ 80 o health ≤ 0.
 * - weapon/armor son referencias no dueñas (el arma no conoce a su portador).
 */
export interface CombatStats {
  health: number;
  maxHealth: number;
  stamina: number;
  maxStamina: number;
  pain: number;
  exhaustion: number;

  strength: number;
  agility: number;

  attackSpeed: number;
  damageMultiplier: number;
  defenseMultiplier: number;
  speedMultiplier: number;
  accuracyMultiplier: number;
  criticalChance: number;

  isConscious: boolean;
  isStunned: boolean;
  stunDuration: number;

  isBleeding: boolean;
  totalBleedingRate: number;

  voidEnergy: number;
  maxVoidEnergy: number;

  weapon: Weapon | null;
  armor: Armor | null;
  memory: CombatantMemory;
}

/** Subconjunto de multiplicadores que los efectos recalculan desde una base. */
export type MultiplierKey = "attackSpeed" | "damageMultiplier" | "defenseMultiplier" | "speedMultiplier" | "accuracyMultiplier" | "criticalChance";
export const MULTIPLIER_KEYS: readonly MultiplierKey[] = ["attackSpeed", "damageMultiplier", "defenseMultiplier", "speedMultiplier", "accuracyMultiplier", "criticalChance"];

/* ───────────────── Resultados del resolver ───────────────── */

export interface InitiativeResult {
  attackerFirst: boolean;
  attackerRoll: number;
  defenderRoll: number;
  description: string;
}

export interface AttackResult {
  hit: boolean;
  critical: boolean;
  damage: number;
  bodyPart: BodyPart | null;
  damageType: DamageType;
  /** Probabilidad efectiva usada contra el sorteo (acotada a [0,1]). */
  hitChance: number;
  /** Valor sin acotar, útil para balance/depuración. */
  rawHitChance: number;
  painCaused: number;
  injury: Injury | null;
  staminaSpent: number;
  description: string;
}

export type AttackOutcome = { executed: true; result: AttackResult } | { executed: false; reason: RejectReason; description: string };

export interface DefenseResult {
  success: boolean;
  reduction: number;
  chance: number;
  rawChance: number;
}

export interface CombatPenalties {
  attack: number;
  defense: number;
  speed: number;
  accuracy: number;
}

export interface FatiguePenalties {
  speed: number;
  damage: number;
  defense: number;
  accuracy: number;
}
