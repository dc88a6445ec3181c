// src/battleSystem/core/Armor.ts
import type { BodyPart, DamageType, QualityTier } from "./CombatTypes";
import { BODY_PARTS, DAMAGE_TYPES, QUALITY_TIERS } from "./CombatTypes";
import { assertFiniteNonNegative, assertInRange, assertOneOf, readNumber, readNumberMap, readRecord, readString } from "./CombatErrors";

export interface ArmorData {
  name: string;
  /** Protección base por parte (puntos; 10 = 10% de reducción a estado 100). */
  protection: Partial<Record<BodyPart, number>>;
  weight: number;
  movementPenalty: number;
  condition: number; // 0..100
  quality: QualityTier;
  /** Factor por tipo de daño (0.5 = la mitad de protección efectiva, 1.5 = más). */
  resistances: Partial<Record<DamageType, number>>;
}

export type ArmorInit = Pick<ArmorData, "name" | "protection"> & Partial<Omit<ArmorData, "name" | "protection">>;

/** Cobertura relativa al armarse desde un valor base. */
const BASE_COVERAGE: Record<BodyPart, number> = { head: 0.8, torso: 1, leftArm: 0.6, rightArm: 0.6, leftLeg: 0.7, rightLeg: 0.7 };

/** Armadura: se desgasta sólo en estado; la calidad no cambia nunca por desgaste. */
export class Armor {
  public name: string;
  public protection: Partial<Record<BodyPart, number>>;
  public weight: number;
  public movementPenalty: number;
  public condition: number;
  public quality: QualityTier;
  public resistances: Partial<Record<DamageType, number>>;

  constructor(init: ArmorInit) {
    this.name = init.name;
    this.protection = {};
    for (const part of BODY_PARTS) {
      const v = init.protection[part];
      if (v !== undefined) this.protection[part] = assertFiniteNonNegative(`protection.${part}`, v);
    }
    this.weight = assertFiniteNonNegative("weight", init.weight ?? 0);
    this.movementPenalty = assertFiniteNonNegative("movementPenalty", init.movementPenalty ?? 0);
    this.condition = assertInRange("condition", init.condition ?? 100, 0, 100);
    this.quality = assertOneOf("quality", init.quality ?? "normal", QUALITY_TIERS);
    this.resistances = {};
    for (const t of DAMAGE_TYPES) {
      const v = init.resistances?.[t];
      if (v !== undefined) this.resistances[t] = assertFiniteNonNegative(`resistances.${t}`, v);
    }
  }

  /** protección[parte] × estado/100 × resistencia[tipo] (1 por defecto) */
  getProtection(part: BodyPart, type: DamageType): number {
    return (this.protection[part] ?? 0) * (this.condition / 100) * (this.resistances[type] ?? 1);
  }

  degrade(amount: number): void {
    this.condition = Math.max(0, this.condition - Math.max(0, amount));
  }

  repair(amount: number): void {
    this.condition = Math.min(100, this.condition + Math.max(0, amount));
  }

  toData(): ArmorData {
    return {
      name: this.name,
      protection: { ...this.protection },
      weight: this.weight,
      movementPenalty: this.movementPenalty,
      condition: this.condition,
      quality: this.quality,
      resistances: { ...this.resistances },
    };
  }

  static fromData(raw: unknown): Armor {
    const r = readRecord("armor", raw);
    return new Armor({
      name: readString(r, "name"),
      protection: readNumberMap(r, "protection", BODY_PARTS),
      weight: readNumber(r, "weight"),
      movementPenalty: readNumber(r, "movementPenalty"),
      condition: readNumber(r, "condition"),
      quality: assertOneOf("quality", r.quality, QUALITY_TIERS),
      resistances: readNumberMap(r, "resistances", DAMAGE_TYPES),
    });
  }
}

/** Armadura con protección repartida desde un valor base (cabeza .8, torso 1, brazos .6, piernas .7). */
export function armorFromBase(name: string, baseProtection: number, extra: Partial<Omit<ArmorData, "name" | "protection">> = {}): Armor {
  const protection: Partial<Record<BodyPart, number>> = {};
  for (const part of BODY_PARTS) protection[part] = baseProtection * BASE_COVERAGE[part];
  return new Armor({ name, protection, ...extra });
}
