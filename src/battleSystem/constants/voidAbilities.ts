/**
 * Habilidades del vacío. Cuestan energía del vacío (no stamina), duelen al lanzador
 * y tienen enfriamiento en rondas.
 */
import type { EffectKind } from "./status";

export const VOID_ABILITY_IDS = ["voidTouch", "shadowStep", "realityTear", "voidAbsorption"] as const;
export type VoidAbilityId = (typeof VOID_ABILITY_IDS)[number];

export interface VoidAbilityDef {
  id: VoidAbilityId;
  name: string;
  description: string;
  energyCost: number;
  /** Dolor que sufre quien la lanza. */
  painIncrease: number;
  /** Rondas hasta poder repetirla. */
  cooldown: number;
  levelRequirement: number;
  damage?: number;
  heal?: number;
  /** Efecto aplicado al lanzador (self) o al objetivo (target). */
  effect?: { kind: EffectKind; turns: number; on: "self" | "target" };
}

export const VOID_ABILITIES: Record<VoidAbilityId, VoidAbilityDef> = {
  voidTouch: {
    id: "voidTouch",
    name: "Void Touch",
    description: "A touch that floods the target with void energy.",
    energyCost: 10,
    painIncrease: 15,
    cooldown: 2,
    levelRequirement: 10,
    damage: 25,
  },
  shadowStep: {
    id: "shadowStep",
    name: "Shadow Step",
    description: "Steps through the shadows, out of reach.",
    energyCost: 15,
    painIncrease: 10,
    cooldown: 3,
    levelRequirement: 15,
    effect: { kind: "shadowStep", turns: 1, on: "self" },
  },
  realityTear: {
    id: "realityTear",
    name: "Reality Tear",
    description: "Rips the fabric of reality; the enemy loses its bearings.",
    energyCost: 30,
    painIncrease: 25,
    cooldown: 5,
    levelRequirement: 30,
    damage: 40,
    effect: { kind: "confusion", turns: 3, on: "target" },
  },
  voidAbsorption: {
    id: "voidAbsorption",
    name: "Void Absorption",
    description: "Drains the enemy's life.",
    energyCost: 20,
    painIncrease: 20,
    cooldown: 4,
    levelRequirement: 25,
    damage: 30,
    heal: 15,
  },
};

export const isVoidAbilityId = (v: unknown): v is VoidAbilityId => VOID_ABILITY_IDS.some((k) => k === v);
