// src/battleSystem/core/DamageResolver.ts
/* eslint-disable no-console */
/**
 * Resolver central: iniciativa, ataque, defensa y aplicación de daño.
 *
 * Orden de sorteos de `performAttack` (importa para RNG guionado en tests):
 *   1) golpe  2) parte del cuerpo (salvo targetPart)  3) varianza  4) crítico  5) varianza del dolor
 *
 * Política de probabilidades: golpe y defensa se acotan a [0,1] antes de comparar.
 * El resultado expone también el valor sin acotar (`rawHitChance` / `rawChance`).
 */
import type { AttackAction, AttackOutcome, BodyPart, CombatAction, CombatStats, DamageType, DefenseResult, InitiativeResult } from "./CombatTypes";
import { bodyRegion, isDefenseAction } from "./CombatTypes";
import type { Rng } from "./RngFightSeed";
import { rollFloat, rollInt } from "./RngFightSeed";
import { clamp, clamp01 } from "./CombatMath";
import { EnvironmentModifier } from "./EnvironmentModifier";
import type { Armor } from "./Armor";
import { createInjury } from "./Injury";
import type { Injury } from "./Injury";
import { addPain, painFromDamage, shouldFallUnconscious } from "./PainEngine";
import { applyMitigation } from "./combatManager/mitigation";
import { TEXT, effectsDescription, hitDescription, initiativeDescription } from "./CombatFlavor";
import {
  ACTION_DAMAGE_MULT,
  ACTION_HIT_BONUS,
  BASE_CRIT_CHANCE,
  BASE_DEFENSE_CHANCE,
  BASE_HIT_CHANCE,
  BODY_DAMAGE_MULT,
  BODY_PART_WEIGHTS,
  CRIT_DAMAGE_MULT,
  CRIT_SKILL_DIVISOR,
  DAMAGE_VARIANCE_MAX,
  DAMAGE_VARIANCE_MIN,
  DEFAULT_DEFENSE_REDUCTION,
  DEFENSE_BONUS,
  DEFENSE_EXHAUSTION_DIVISOR,
  DEFENSE_PAIN_DIVISOR,
  DEFENSE_REDUCTION,
  DEFENSE_SKILL_DIVISOR,
  EFFECT_THRESHOLDS,
  EXHAUSTION_PER_STAMINA,
  HEAD_STUN_DAMAGE,
  HIT_EXHAUSTION_DIVISOR,
  HIT_PAIN_DIVISOR,
  HIT_SKILL_DIVISOR,
  INITIATIVE_DIE,
  INITIATIVE_EXHAUSTION_MALUS,
  INITIATIVE_EXHAUSTION_THRESHOLD,
  INITIATIVE_PAIN_MALUS,
  INITIATIVE_PAIN_THRESHOLD,
  INJURY_DAMAGE_THRESHOLD,
  MAX_EXHAUSTION,
  STAMINA_COST,
  STUN_MAX_TURNS,
  STUN_MIN_TURNS,
} from "./CombatConfig";
import { COMBAT_DEBUG } from "../../config/combat";

const DBG = COMBAT_DEBUG;

export interface AttackOptions {
  /** Fuerza la parte golpeada (no consume sorteo). */
  targetPart?: BodyPart;
  /** Se suma a la chance de golpe antes del multiplicador de precisión. */
  accuracyBonus?: number;
  critBonus?: number;
  /** 0..1 de armadura ignorada. */
  armorPenetration?: number;
  /** Armadura a considerar; por defecto la del defensor (`dStats.armor`). */
  armor?: Armor | null;
}

export interface DamageResolverOptions {
  rng: Rng;
  environment?: EnvironmentModifier;
}

/** Sortea la parte del cuerpo por suma acumulada (torso si sobra redondeo). */
export function rollBodyPart(rng: Rng): BodyPart {
  const roll = rng();
  let cumulative = 0;
  for (const [part, weight] of BODY_PART_WEIGHTS) {
    cumulative += weight;
    if (roll < cumulative) return part;
  }
  return "torso";
}

export class DamageResolver {
  public readonly rng: Rng;
  public environment: EnvironmentModifier;

  constructor(opts: DamageResolverOptions) {
    this.rng = opts.rng;
    this.environment = opts.environment ?? new EnvironmentModifier();
  }

  // ───────────────── Iniciativa ─────────────────
  calculateInitiative(aStats: CombatStats, dStats: CombatStats, aSkill: number, dSkill: number): InitiativeResult {
    const roll = (stats: CombatStats, skill: number) => {
      let v = skill + rollInt(this.rng, 1, INITIATIVE_DIE);
      if (stats.pain > INITIATIVE_PAIN_THRESHOLD) v -= INITIATIVE_PAIN_MALUS;
      if (stats.exhaustion > INITIATIVE_EXHAUSTION_THRESHOLD) v -= INITIATIVE_EXHAUSTION_MALUS;
      return v;
    };
    const attackerRoll = roll(aStats, aSkill);
    const defenderRoll = roll(dStats, dSkill);
    // empate → defensor
    const attackerFirst = attackerRoll > defenderRoll;
    if (DBG) console.log("[COMBAT] initiative", { attackerRoll, defenderRoll, attackerFirst });
    return { attackerFirst, attackerRoll, defenderRoll, description: initiativeDescription(attackerFirst, attackerRoll, defenderRoll) };
  }

  // ───────────────── Ataque ─────────────────
  performAttack(
    aStats: CombatStats,
    dStats: CombatStats,
    aSkill: number,
    dSkill: number,
    action: AttackAction,
    weaponDamage: number,
    damageType: DamageType,
    opts: AttackOptions = {}
  ): AttackOutcome {
    const cost = STAMINA_COST[action];
    if (aStats.stamina < cost) {
      if (DBG) console.log("[COMBAT] sin stamina", { action, stamina: aStats.stamina, cost });
      return { executed: false, reason: "insufficient_stamina", description: TEXT.tooTiredToAttack };
    }

    aStats.stamina -= cost;
    aStats.exhaustion = Math.min(MAX_EXHAUSTION, aStats.exhaustion + cost * EXHAUSTION_PER_STAMINA);

    const env = this.environment.modifiers();
    const base =
      BASE_HIT_CHANCE +
      (aSkill - dSkill) / HIT_SKILL_DIVISOR +
      ACTION_HIT_BONUS[action] -
      aStats.pain / HIT_PAIN_DIVISOR -
      aStats.exhaustion / HIT_EXHAUSTION_DIVISOR +
      env.accuracy +
      (opts.accuracyBonus ?? 0);
    const rawHitChance = base * aStats.accuracyMultiplier;
    const hitChance = clamp01(rawHitChance);

    const hitDraw = this.rng();
    if (hitDraw > hitChance) {
      if (DBG) console.log("[COMBAT] miss", { action, hitDraw, hitChance, rawHitChance });
      return {
        executed: true,
        result: {
          hit: false,
          critical: false,
          damage: 0,
          bodyPart: null,
          damageType,
          hitChance,
          rawHitChance,
          painCaused: 0,
          injury: null,
          staminaSpent: cost,
          description: TEXT.miss,
        },
      };
    }

    const bodyPart = opts.targetPart ?? rollBodyPart(this.rng);

    let damage =
      weaponDamage *
      ACTION_DAMAGE_MULT[action] *
      BODY_DAMAGE_MULT[bodyRegion(bodyPart)] *
      rollFloat(this.rng, DAMAGE_VARIANCE_MIN, DAMAGE_VARIANCE_MAX) *
      aStats.damageMultiplier *
      (1 + env.damage);

    const critChance = BASE_CRIT_CHANCE + (aSkill - dSkill) / CRIT_SKILL_DIVISOR + aStats.criticalChance + (opts.critBonus ?? 0);
    const critical = this.rng() < critChance;
    if (critical) damage *= CRIT_DAMAGE_MULT;

    const armor = opts.armor === undefined ? dStats.armor : opts.armor;
    const mit = applyMitigation({
      raw: damage,
      defenseMultiplier: dStats.defenseMultiplier,
      armorProtection: armor ? armor.getProtection(bodyPart, damageType) : 0,
      armorPenetration: opts.armorPenetration,
    });
    const finalDamage = mit.final;

    const painCaused = painFromDamage(finalDamage, bodyPart, damageType, this.rng);
    const injury = finalDamage > INJURY_DAMAGE_THRESHOLD ? createInjury(finalDamage, bodyPart, damageType) : null;

    if (DBG) console.log("[COMBAT] hit", { action, bodyPart, critical, raw: damage, final: finalDamage, painCaused, injury: !!injury });

    return {
      executed: true,
      result: {
        hit: true,
        critical,
        damage: finalDamage,
        bodyPart,
        damageType,
        hitChance,
        rawHitChance,
        painCaused,
        injury,
        staminaSpent: cost,
        description: hitDescription(bodyPart, finalDamage, critical),
      },
    };
  }

  // ───────────────── Defensa ─────────────────
  performDefense(dStats: CombatStats, skill: number, action: CombatAction): DefenseResult {
    const cost = STAMINA_COST[action];
    if (dStats.stamina < cost) return { success: false, reduction: 0, chance: 0, rawChance: 0 };
    dStats.stamina -= cost;

    const env = this.environment.modifiers();
    let rawChance = BASE_DEFENSE_CHANCE + skill / DEFENSE_SKILL_DIVISOR + (DEFENSE_BONUS[action] ?? 0);
    rawChance -= dStats.pain / DEFENSE_PAIN_DIVISOR + dStats.exhaustion / DEFENSE_EXHAUSTION_DIVISOR;
    rawChance += env.defense + (action === "dodge" ? env.movement : 0);
    const chance = clamp01(rawChance);

    const reduction = isDefenseAction(action) ? DEFENSE_REDUCTION[action] : DEFAULT_DEFENSE_REDUCTION;
    const success = this.rng() < chance;
    if (DBG) console.log("[COMBAT] defense", { action, chance, rawChance, success });
    return { success, reduction: success ? reduction : 0, chance, rawChance };
  }

  // ───────────────── Aplicación de daño ─────────────────
  applyDamage(stats: CombatStats, damage: number, bodyPart: BodyPart, damageType: DamageType, injury?: Injury | null): string {
    const dmg = Math.max(0, damage);
    stats.health = clamp(stats.health - dmg, 0, stats.maxHealth);
    addPain(stats, painFromDamage(dmg, bodyPart, damageType, this.rng));
    stats.memory.lastDamageTaken = dmg;

    if (shouldFallUnconscious(stats)) {
      stats.isConscious = false;
      return TEXT.unconscious;
    }

    const region = bodyRegion(bodyPart);
    if (region === "head" && dmg > HEAD_STUN_DAMAGE) {
      stats.isStunned = true;
      stats.stunDuration = rollInt(this.rng, STUN_MIN_TURNS, STUN_MAX_TURNS);
      return TEXT.stunned;
    }

    const effects: string[] = [];
    if (dmg > EFFECT_THRESHOLDS[region]) {
      switch (region) {
        case "head":
          effects.push("dizziness");
          break;
        case "torso":
          effects.push("shortness of breath");
          break;
        case "arm":
          effects.push("weakened arm");
          break;
        case "leg":
          effects.push("limping");
          break;
      }
    }

    if (injury?.bleeding) {
      stats.isBleeding = true;
      stats.totalBleedingRate += injury.bleedingRate;
      effects.push("bleeding");
    }

    return effectsDescription(effects);
  }
}
