// src/battleSystem/core/PainEngine.ts
// Dolor, fatiga y recuperación. Funciones puras salvo las que mutan `stats` explícitamente.
import type { BodyPart, CombatPenalties, CombatStats, DamageType, FatiguePenalties } from "./CombatTypes";
import { bodyRegion } from "./CombatTypes";
import type { Injury } from "./Injury";
import type { Rng } from "./RngFightSeed";
import { rollFloat } from "./RngFightSeed";
import { clamp, ratio } from "./CombatMath";
import {
  DAMAGE_VARIANCE_MAX,
  DAMAGE_VARIANCE_MIN,
  MAX_PAIN,
  PAIN_BAND_INCAPACITATED,
  PAIN_BANDS,
  PAIN_PART_MULT,
  PAIN_PER_DAMAGE,
  PAIN_SPIKE_CAP,
  PAIN_TYPE_MULT,
  PENALTY_CAP,
  UNCONSCIOUS_PAIN,
} from "./CombatConfig";

/** Pico de dolor de un golpe: daño×2 × parte × tipo × U(0.8,1.2), máx 40. Consume 1 sorteo. */
export function painFromDamage(damage: number, part: BodyPart, type: DamageType, rng: Rng): number {
  const base = Math.max(0, damage) * PAIN_PER_DAMAGE;
  const spike = base * PAIN_PART_MULT[bodyRegion(part)] * PAIN_TYPE_MULT[type] * rollFloat(rng, DAMAGE_VARIANCE_MIN, DAMAGE_VARIANCE_MAX);
  return Math.min(PAIN_SPIKE_CAP, spike);
}

/** Penalización por bandas: 0 / .15 / .30 / .45 / 1.0 (≥80 incapacita). */
export function painPenalty(pain: number): number {
  for (const [upper, penalty] of PAIN_BANDS) {
    if (pain < upper) return penalty;
  }
  return PAIN_BAND_INCAPACITATED;
}

/** Suma dolor (acotado a [0,100]) y devuelve el valor aplicado. */
export function addPain(stats: CombatStats, amount: number): number {
  const before = stats.pain;
  stats.pain = clamp(stats.pain + amount, 0, MAX_PAIN);
  return stats.pain - before;
}

/**
 * Penalizaciones de combate (0..0.9 por canal):
 * - dolor sobre 30 → ataque .3 / precisión .5 / defensa .2
 * - agotamiento sobre 50 → velocidad .4 / ataque .2 / defensa .3
 * - heridas por parte → cabeza: precisión, torso: defensa, brazos: ataque, piernas: velocidad
 */
export function calculateCombatPenalties(stats: CombatStats, injuries: readonly Injury[]): CombatPenalties {
  const p: CombatPenalties = { attack: 0, defense: 0, speed: 0, accuracy: 0 };

  if (stats.pain > 30) {
    const f = (stats.pain - 30) / 100;
    p.attack += f * 0.3;
    p.accuracy += f * 0.5;
    p.defense += f * 0.2;
  }

  if (stats.exhaustion > 50) {
    const f = (stats.exhaustion - 50) / 100;
    p.speed += f * 0.4;
    p.attack += f * 0.2;
    p.defense += f * 0.3;
  }

  for (const inj of injuries) {
    switch (bodyRegion(inj.bodyPart)) {
      case "head":
        p.accuracy += inj.severity / 200;
        break;
      case "torso":
        p.defense += inj.severity / 300;
        break;
      case "arm":
        p.attack += inj.severity / 250;
        break;
      case "leg":
        p.speed += inj.severity / 200;
        break;
    }
  }

  return {
    attack: Math.min(PENALTY_CAP, p.attack),
    defense: Math.min(PENALTY_CAP, p.defense),
    speed: Math.min(PENALTY_CAP, p.speed),
    accuracy: Math.min(PENALTY_CAP, p.accuracy),
  };
}

/** Penalizaciones por stamina baja y agotamiento (se suman por canal, sin tope). */
export function calculateFatiguePenalties(stats: CombatStats): FatiguePenalties {
  const p: FatiguePenalties = { speed: 0, damage: 0, defense: 0, accuracy: 0 };
  const staminaPct = ratio(stats.stamina, stats.maxStamina);

  if (staminaPct < 0.3) {
    p.speed += 0.3;
    p.damage += 0.2;
    p.accuracy += 0.2;
  } else if (staminaPct < 0.5) {
    p.speed += 0.15;
    p.damage += 0.1;
    p.accuracy += 0.1;
  }

  if (stats.exhaustion > 50) {
    const f = (stats.exhaustion - 50) / 100;
    p.speed += f * 0.4;
    p.damage += f * 0.3;
    p.defense += f * 0.3;
    p.accuracy += f * 0.25;
  }

  return p;
}

/**
 * Regenera stamina durante `seconds`.
 * Base 1/s en reposo, 0.3/s en combate; agotamiento >50 y >80 la parten a la mitad (cada uno);
 * dolor >30 la reduce proporcionalmente. En reposo además baja el agotamiento 0.1/s.
 */
export function recoverStamina(stats: CombatStats, resting: boolean, seconds: number): number {
  const t = Math.max(0, seconds);
  let rate = resting ? 1 : 0.3;
  if (stats.exhaustion > 50) rate *= 0.5;
  if (stats.exhaustion > 80) rate *= 0.5;
  if (stats.pain > 30) rate *= 1 - stats.pain / 200;

  const before = stats.stamina;
  stats.stamina = Math.min(stats.maxStamina, stats.stamina + rate * t);
  if (resting) stats.exhaustion = Math.max(0, stats.exhaustion - 0.1 * t);
  return stats.stamina - before;
}

/**
 * Alivia el dolor. Con atención médica rinde U(0.8,1.2)×amount, si no U(0.5,1.0)×amount.
 * Un inconsciente con dolor < 60 y vida > 0 tiene 30% de despertar. Devuelve si despertó.
 */
export function reducePain(stats: CombatStats, amount: number, medical: boolean, rng: Rng): { relieved: number; regainedConsciousness: boolean } {
  const eff = Math.max(0, amount) * (medical ? rollFloat(rng, 0.8, 1.2) : rollFloat(rng, 0.5, 1));
  const before = stats.pain;
  stats.pain = clamp(stats.pain - eff, 0, MAX_PAIN);

  let regainedConsciousness = false;
  if (!stats.isConscious && stats.pain < 60 && stats.health > 0 && rng() < 0.3) {
    stats.isConscious = true;
    regainedConsciousness = true;
  }
  return { relieved: before - stats.pain, regainedConsciousness };
}

/** ¿El dolor/vida ya dejan al combatiente fuera? (regla única de inconsciencia) */
export function shouldFallUnconscious(stats: CombatStats): boolean {
  return stats.pain >= UNCONSCIOUS_PAIN || stats.health <= 0;
}
