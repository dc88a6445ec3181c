/**
 * Catálogo de técnicas de armas. Los ids son los que listan las plantillas de Weapon (`techniques`).
 * `comboChain` enumera los pasos previos (ids de técnica o acciones) que abren el combo.
 */
import type { WeaponType } from "../core/CombatTypes";

export const TECHNIQUE_TIERS = ["basic", "combo", "special", "master", "legendary"] as const;
export type TechniqueTier = (typeof TECHNIQUE_TIERS)[number];

export interface TechniqueEffects {
  /** 0..1: sorteo de sangrado (damage/20 por ronda). */
  bleedingChance?: number;
  /** Aturde N turnos, sin sorteo. */
  stunDuration?: number;
  /** 0..1 de armadura ignorada. */
  armorPenetration?: number;
  ignoreArmor?: number;
  targetHead?: boolean;
  /** 0..1: sorteo de "fear" sobre el defensor. */
  fear?: number;
  /** Sólo marca: el combate es a dos. */
  areaDamage?: boolean;
  /** 0..1: sorteo de aturdimiento de 1 turno. */
  dizzyChance?: number;
}

export interface TechniqueDef {
  id: string;
  name: string;
  tier: TechniqueTier;
  weaponTypes: WeaponType[];
  skillRequirement: number;
  staminaCost: number;
  damageMultiplier: number;
  accuracyModifier: number;
  criticalChanceBonus: number;
  specialEffects: TechniqueEffects;
  comboChain: string[];
  description: string;
}

export const TECHNIQUE_DEFS: readonly TechniqueDef[] = [
  {
    id: "horizontalSlash",
    name: "Horizontal Slash",
    tier: "basic",
    weaponTypes: ["shortSwords", "longSwords"],
    skillRequirement: 5,
    staminaCost: 8,
    damageMultiplier: 1.2,
    accuracyModifier: 0,
    criticalChanceBonus: 0,
    specialEffects: {},
    comboChain: [],
    description: "A wide horizontal cut.",
  },
  {
    id: "preciseThrust",
    name: "Precise Thrust",
    tier: "basic",
    weaponTypes: ["shortSwords", "longSwords", "daggers"],
    skillRequirement: 10,
    staminaCost: 10,
    damageMultiplier: 1.5,
    accuracyModifier: 0.15,
    criticalChanceBonus: 0.2,
    specialEffects: {},
    comboChain: [],
    description: "A precise thrust at a weak spot.",
  },
  {
    id: "spinningDance",
    name: "Spinning Dance",
    tier: "combo",
    weaponTypes: ["longSwords", "greatSwords"],
    skillRequirement: 25,
    staminaCost: 20,
    damageMultiplier: 2,
    accuracyModifier: 0,
    criticalChanceBonus: 0,
    specialEffects: { areaDamage: true, dizzyChance: 0.3 },
    comboChain: ["horizontalSlash", "horizontalSlash"],
    description: "A whirl of spinning cuts.",
  },
  {
    id: "masterStrike",
    name: "Master Strike",
    tier: "master",
    weaponTypes: ["longSwords"],
    skillRequirement: 50,
    staminaCost: 30,
    damageMultiplier: 3,
    accuracyModifier: 0,
    criticalChanceBonus: 0.5,
    specialEffects: { ignoreArmor: 0.5, fear: 0.3 },
    comboChain: [],
    description: "A flawless blow that slips past armor.",
  },
  {
    id: "cleave",
    name: "Cleave",
    tier: "basic",
    weaponTypes: ["axes", "greatAxes"],
    skillRequirement: 8,
    staminaCost: 15,
    damageMultiplier: 1.8,
    accuracyModifier: 0,
    criticalChanceBonus: 0,
    specialEffects: { bleedingChance: 0.7 },
    comboChain: [],
    description: "A heavy cut that leaves the target bleeding.",
  },
  {
    id: "piercingShot",
    name: "Piercing Shot",
    tier: "special",
    weaponTypes: ["bows", "crossbows"],
    skillRequirement: 15,
    staminaCost: 12,
    damageMultiplier: 1.5,
    accuracyModifier: 0,
    criticalChanceBonus: 0,
    specialEffects: { armorPenetration: 0.7 },
    comboChain: [],
    description: "A shot that punches through armor.",
  },
  {
    id: "knockout",
    name: "Knockout",
    tier: "special",
    weaponTypes: ["fists", "maces"],
    skillRequirement: 20,
    staminaCost: 25,
    damageMultiplier: 2,
    accuracyModifier: 0,
    criticalChanceBonus: 0,
    specialEffects: { stunDuration: 2, targetHead: true },
    comboChain: [],
    description: "A crushing blow to the head.",
  },
];
