// src/battleSystem/core/Weapon.ts
import type { CombatAction, DamageType, QualityTier, WeaponType } from "./CombatTypes";
import { DAMAGE_TYPES, QUALITY_TIERS, WEAPON_TYPES } from "./CombatTypes";
import { BROKEN_CONDITION_THRESHOLD, QUALITY_DAMAGE_MULT, REACH_BONUS_PER_POINT, REACH_MALUS_PER_POINT, UNARMED_REACH, WEAPON_WEAR_BY_ACTION, WEAPON_WEAR_DEFAULT, WEAR_QUALITY_MULT } from "./CombatConfig";
import { MalformedCombatDataError, assertFiniteNonNegative, assertInRange, assertOneOf, readNumber, readRecord, readString, readStringArray } from "./CombatErrors";

export type SpecialProperty = number | string | boolean;

/** Forma plana (serializable) de un arma. */
export interface WeaponData {
  name: string;
  weaponType: WeaponType;
  damageType: DamageType;
  baseDamage: number;
  speed: number; // -3..3
  reach: number;
  weight: number;
  condition: number; // 0..100
  quality: QualityTier;
  techniques: string[];
  specialProperties: Record<string, SpecialProperty>;
}

export type WeaponInit = Pick<WeaponData, "name" | "weaponType" | "damageType" | "baseDamage"> & Partial<Omit<WeaponData, "name" | "weaponType" | "damageType" | "baseDamage">>;

/**
 * Arma como value object.
 * - `degrade` baja el estado y, por debajo de 20, la deja "broken" para siempre.
 * - `repair` sube el estado pero NO devuelve la calidad (asimétrico con Armor).
 */
export class Weapon {
  public name: string;
  public weaponType: WeaponType;
  public damageType: DamageType;
  public baseDamage: number;
  public speed: number;
  public reach: number;
  public weight: number;
  public condition: number;
  public quality: QualityTier;
  public techniques: string[];
  public specialProperties: Record<string, SpecialProperty>;

  constructor(init: WeaponInit) {
    this.name = init.name;
    this.weaponType = assertOneOf("weaponType", init.weaponType, WEAPON_TYPES);
    this.damageType = assertOneOf("damageType", init.damageType, DAMAGE_TYPES);
    this.baseDamage = assertFiniteNonNegative("baseDamage", init.baseDamage);
    this.speed = assertInRange("speed", init.speed ?? 0, -3, 3);
    this.reach = assertFiniteNonNegative("reach", init.reach ?? 1);
    this.weight = assertFiniteNonNegative("weight", init.weight ?? 1);
    this.condition = assertInRange("condition", init.condition ?? 100, 0, 100);
    this.quality = assertOneOf("quality", init.quality ?? "normal", QUALITY_TIERS);
    this.techniques = [...(init.techniques ?? [])];
    this.specialProperties = { ...(init.specialProperties ?? {}) };
  }

  /** base × multiplicador de calidad × estado/100 */
  getEffectiveDamage(): number {
    return this.baseDamage * QUALITY_DAMAGE_MULT[this.quality] * (this.condition / 100);
  }

  degrade(amount: number): void {
    this.condition = Math.max(0, this.condition - Math.max(0, amount));
    if (this.condition < BROKEN_CONDITION_THRESHOLD) this.quality = "broken";
  }

  repair(amount: number): void {
    this.condition = Math.min(100, this.condition + Math.max(0, amount));
  }

  isBroken(): boolean {
    return this.quality === "broken";
  }

  isRanged(): boolean {
    return isRangedWeaponType(this.weaponType);
  }

  toData(): WeaponData {
    return {
      name: this.name,
      weaponType: this.weaponType,
      damageType: this.damageType,
      baseDamage: this.baseDamage,
      speed: this.speed,
      reach: this.reach,
      weight: this.weight,
      condition: this.condition,
      quality: this.quality,
      techniques: [...this.techniques],
      specialProperties: { ...this.specialProperties },
    };
  }

  static fromData(raw: unknown): Weapon {
    const r = readRecord("weapon", raw);
    const props = r.specialProperties === undefined ? {} : readRecord("specialProperties", r.specialProperties);
    const specialProperties: Record<string, SpecialProperty> = {};
    for (const [k, v] of Object.entries(props)) {
      if (typeof v !== "number" && typeof v !== "string" && typeof v !== "boolean") throw new MalformedCombatDataError(`specialProperties.${k}`, v);
      specialProperties[k] = v;
    }
    return new Weapon({
      name: readString(r, "name"),
      weaponType: assertOneOf("weaponType", r.weaponType, WEAPON_TYPES),
      damageType: assertOneOf("damageType", r.damageType, DAMAGE_TYPES),
      baseDamage: readNumber(r, "baseDamage"),
      speed: readNumber(r, "speed"),
      reach: readNumber(r, "reach"),
      weight: readNumber(r, "weight"),
      condition: readNumber(r, "condition"),
      quality: assertOneOf("quality", r.quality, QUALITY_TIERS),
      techniques: readStringArray(r, "techniques"),
      specialProperties,
    });
  }
}

/* ─────────────────────────────────────────────────────────────────────
 * Plantillas por slug
 * ──────────────────────────────────────────────────────────────────── */

const slugify = (s: string) =>
  s
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");

const TEMPLATES: Record<string, WeaponInit> = {
  fists: { name: "Fists", weaponType: "fists", damageType: "blunt", baseDamage: 5, speed: 2, reach: 1, weight: 0, techniques: ["knockout"] },
  dagger: { name: "Dagger", weaponType: "daggers", damageType: "pierce", baseDamage: 12, speed: 2, reach: 1, weight: 1, techniques: ["preciseThrust"] },
  shortsword: { name: "Short Sword", weaponType: "shortSwords", damageType: "cut", baseDamage: 15, speed: 1, reach: 2, weight: 1.5, techniques: ["horizontalSlash", "preciseThrust"] },
  longsword: {
    name: "Longsword",
    weaponType: "longSwords",
    damageType: "cut",
    baseDamage: 20,
    speed: 0,
    reach: 3,
    weight: 2.5,
    techniques: ["horizontalSlash", "preciseThrust", "spinningDance", "masterStrike"],
  },
  greatsword: { name: "Greatsword", weaponType: "greatSwords", damageType: "cut", baseDamage: 28, speed: -2, reach: 4, weight: 5, techniques: ["spinningDance"] },
  axe: { name: "Axe", weaponType: "axes", damageType: "cut", baseDamage: 18, speed: 0, reach: 2, weight: 2, techniques: ["cleave"] },
  greataxe: { name: "Greataxe", weaponType: "greatAxes", damageType: "cut", baseDamage: 26, speed: -2, reach: 3, weight: 5, techniques: ["cleave"] },
  mace: { name: "Mace", weaponType: "maces", damageType: "blunt", baseDamage: 16, speed: 0, reach: 2, weight: 3, techniques: ["knockout"] },
  warhammer: { name: "War Hammer", weaponType: "warHammers", damageType: "blunt", baseDamage: 24, speed: -2, reach: 2, weight: 5 },
  spear: { name: "Spear", weaponType: "spears", damageType: "pierce", baseDamage: 17, speed: 0, reach: 5, weight: 3 },
  staff: { name: "Quarterstaff", weaponType: "staves", damageType: "blunt", baseDamage: 10, speed: 1, reach: 4, weight: 2 },
  shortbow: { name: "Shortbow", weaponType: "bows", damageType: "pierce", baseDamage: 14, speed: 1, reach: 10, weight: 1, techniques: ["piercingShot"] },
  crossbow: { name: "Crossbow", weaponType: "crossbows", damageType: "pierce", baseDamage: 22, speed: -1, reach: 12, weight: 4, techniques: ["piercingShot"] },
  shield: { name: "Round Shield", weaponType: "shields", damageType: "blunt", baseDamage: 4, speed: 0, reach: 1, weight: 4 },
};

/** Alias “de fantasía” → plantilla base. */
const ALIAS: Record<string, string> = {
  unarmed: "fists",
  knife: "dagger",
  stiletto: "dagger",
  gladius: "shortsword",
  sabre: "shortsword",
  sword: "longsword",
  bastard_sword: "longsword",
  claymore: "greatsword",
  zweihander: "greatsword",
  hatchet: "axe",
  battle_axe: "greataxe",
  club: "mace",
  morningstar: "mace",
  maul: "warhammer",
  pike: "spear",
  bow: "shortbow",
  longbow: "shortbow",
  buckler: "shield",
};

export function weaponTemplateKeys(): string[] {
  return Object.keys(TEMPLATES);
}

/** Construye un arma nueva desde una plantilla/alias. Slug desconocido → MalformedCombatDataError. */
export function weaponFromTemplate(slug: string, overrides: Partial<WeaponData> = {}): Weapon {
  const key = slugify(slug);
  const base = TEMPLATES[ALIAS[key] ?? key];
  if (!base) throw new MalformedCombatDataError("weaponTemplate", slug, "plantilla desconocida");
  return new Weapon({ ...base, ...overrides });
}

/* ───────────── Reglas derivadas ───────────── */

export function isRangedWeaponType(t: WeaponType): boolean {
  return t === "bows" || t === "crossbows";
}

/** Desgaste de arma por acción, escalado por calidad. */
export function weaponDegradationFor(action: CombatAction, quality: QualityTier): number {
  const base = WEAPON_WEAR_BY_ACTION[action] ?? WEAPON_WEAR_DEFAULT;
  return base * (WEAR_QUALITY_MULT[quality] ?? 1);
}

/**
 * Ventaja de alcance sobre el rival (se suma a la chance de golpe).
 * +0.1 por punto a favor, -0.05 por punto en contra. Sin arma = alcance 1.
 */
export function reachAdvantage(attacker: Weapon | null, defender: Weapon | null): number {
  const diff = (attacker?.reach ?? UNARMED_REACH) - (defender?.reach ?? UNARMED_REACH);
  if (diff > 0) return diff * REACH_BONUS_PER_POINT;
  if (diff < 0) return diff * REACH_MALUS_PER_POINT;
  return 0;
}
