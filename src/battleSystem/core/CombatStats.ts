// src/battleSystem/core/CombatStats.ts
// Fábrica + (de)serialización del bloque de stats. Valida al construir; nunca a mitad de resolución.
import type { CombatStats } from "./CombatTypes";
import { CombatantMemory } from "./CombatantMemory";
import type { CombatantMemoryData } from "./CombatantMemory";
import { Weapon } from "./Weapon";
import type { WeaponData } from "./Weapon";
import { Armor } from "./Armor";
import type { ArmorData } from "./Armor";
import { MalformedCombatDataError, assertFiniteNonNegative, assertInRange, readBoolean, readNumber, readRecord } from "./CombatErrors";

export type CombatStatsInit = Partial<Omit<CombatStats, "memory">> & { memory?: CombatantMemory };

/** Todo menos las referencias vivas (arma/armadura/memoria van como datos planos). */
export type CombatStatsData = Omit<CombatStats, "weapon" | "armor" | "memory"> & {
  weapon: WeaponData | null;
  armor: ArmorData | null;
  memory: CombatantMemoryData;
};

export function createCombatStats(init: CombatStatsInit = {}): CombatStats {
  const maxHealth = assertFiniteNonNegative("maxHealth", init.maxHealth ?? 100);
  if (maxHealth <= 0) throw new MalformedCombatDataError("maxHealth", maxHealth, "debe ser > 0");
  const maxStamina = assertFiniteNonNegative("maxStamina", init.maxStamina ?? 100);
  const maxVoidEnergy = assertFiniteNonNegative("maxVoidEnergy", init.maxVoidEnergy ?? 0);

  return {
    health: assertInRange("health", init.health ?? maxHealth, 0, maxHealth),
    maxHealth,
    stamina: assertInRange("stamina", init.stamina ?? maxStamina, 0, maxStamina),
    maxStamina,
    pain: assertInRange("pain", init.pain ?? 0, 0, 100),
    exhaustion: assertInRange("exhaustion", init.exhaustion ?? 0, 0, 100),

    strength: assertFiniteNonNegative("strength", init.strength ?? 50),
    agility: assertFiniteNonNegative("agility", init.agility ?? 50),

    attackSpeed: assertFiniteNonNegative("attackSpeed", init.attackSpeed ?? 1),
    damageMultiplier: assertFiniteNonNegative("damageMultiplier", init.damageMultiplier ?? 1),
    defenseMultiplier: assertFiniteNonNegative("defenseMultiplier", init.defenseMultiplier ?? 1),
    speedMultiplier: assertFiniteNonNegative("speedMultiplier", init.speedMultiplier ?? 1),
    accuracyMultiplier: assertFiniteNonNegative("accuracyMultiplier", init.accuracyMultiplier ?? 1),
    criticalChance: assertFiniteNonNegative("criticalChance", init.criticalChance ?? 0),

    isConscious: init.isConscious ?? true,
    isStunned: init.isStunned ?? false,
    stunDuration: assertFiniteNonNegative("stunDuration", init.stunDuration ?? 0),

    isBleeding: init.isBleeding ?? false,
    totalBleedingRate: assertFiniteNonNegative("totalBleedingRate", init.totalBleedingRate ?? 0),

    voidEnergy: assertInRange("voidEnergy", init.voidEnergy ?? maxVoidEnergy, 0, maxVoidEnergy),
    maxVoidEnergy,

    weapon: init.weapon ?? null,
    armor: init.armor ?? null,
    memory: init.memory ?? new CombatantMemory(),
  };
}

export function serializeCombatStats(s: CombatStats): CombatStatsData {
  return {
    health: s.health,
    maxHealth: s.maxHealth,
    stamina: s.stamina,
    maxStamina: s.maxStamina,
    pain: s.pain,
    exhaustion: s.exhaustion,
    strength: s.strength,
    agility: s.agility,
    attackSpeed: s.attackSpeed,
    damageMultiplier: s.damageMultiplier,
    defenseMultiplier: s.defenseMultiplier,
    speedMultiplier: s.speedMultiplier,
    accuracyMultiplier: s.accuracyMultiplier,
    criticalChance: s.criticalChance,
    isConscious: s.isConscious,
    isStunned: s.isStunned,
    stunDuration: s.stunDuration,
    isBleeding: s.isBleeding,
    totalBleedingRate: s.totalBleedingRate,
    voidEnergy: s.voidEnergy,
    maxVoidEnergy: s.maxVoidEnergy,
    weapon: s.weapon ? s.weapon.toData() : null,
    armor: s.armor ? s.armor.toData() : null,
    memory: s.memory.toData(),
  };
}

export function deserializeCombatStats(raw: unknown): CombatStats {
  const r = readRecord("combatStats", raw);
  return createCombatStats({
    health: readNumber(r, "health"),
    maxHealth: readNumber(r, "maxHealth"),
    stamina: readNumber(r, "stamina"),
    maxStamina: readNumber(r, "maxStamina"),
    pain: readNumber(r, "pain"),
    exhaustion: readNumber(r, "exhaustion"),
    strength: readNumber(r, "strength"),
    agility: readNumber(r, "agility"),
    attackSpeed: readNumber(r, "attackSpeed"),
    damageMultiplier: readNumber(r, "damageMultiplier"),
    defenseMultiplier: readNumber(r, "defenseMultiplier"),
    speedMultiplier: readNumber(r, "speedMultiplier"),
    accuracyMultiplier: readNumber(r, "accuracyMultiplier"),
    criticalChance: readNumber(r, "criticalChance"),
    isConscious: readBoolean(r, "isConscious"),
    isStunned: readBoolean(r, "isStunned"),
    stunDuration: readNumber(r, "stunDuration"),
    isBleeding: readBoolean(r, "isBleeding"),
    totalBleedingRate: readNumber(r, "totalBleedingRate"),
    voidEnergy: readNumber(r, "voidEnergy"),
    maxVoidEnergy: readNumber(r, "maxVoidEnergy"),
    weapon: r.weapon === null || r.weapon === undefined ? null : Weapon.fromData(r.weapon),
    armor: r.armor === null || r.armor === undefined ? null : Armor.fromData(r.armor),
    memory: r.memory === undefined ? new CombatantMemory() : CombatantMemory.fromData(r.memory),
  });
}
