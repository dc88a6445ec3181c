// src/battleSystem/core/CombatConfig.ts
// Balance y tablas del resolver. Solo datos: la lógica vive en DamageResolver / PainEngine / Equipment.
// Probabilidades como fracciones 0..1, multiplicadores como factores.
// Ajustar con cuidado: casi todo interactúa (coste → agotamiento → penalización → golpe).
import type { AttackAction, BodyPart, BodyRegion, CombatAction, DamageType, DefenseAction, QualityTier } from "./CombatTypes";

/* ───────────── Stamina / agotamiento ───────────── */

export const STAMINA_COST: Record<CombatAction, number> = {
  basic: 5,
  strong: 15,
  fast: 3,
  block: 2,
  dodge: 8,
  parry: 6,
  riposte: 10,
  feint: 4,
  kick: 7,
  push: 5,
};

/** exhaustion += coste × este factor */
export const EXHAUSTION_PER_STAMINA = 0.1;

/* ───────────── Iniciativa ───────────── */

export const INITIATIVE_DIE = 20;
export const INITIATIVE_PAIN_THRESHOLD = 50;
export const INITIATIVE_PAIN_MALUS = 5;
export const INITIATIVE_EXHAUSTION_THRESHOLD = 70;
export const INITIATIVE_EXHAUSTION_MALUS = 10;

/* ───────────── Ataque ───────────── */

export const BASE_HIT_CHANCE = 0.5;
export const HIT_SKILL_DIVISOR = 100;
export const HIT_PAIN_DIVISOR = 200;
export const HIT_EXHAUSTION_DIVISOR = 300;

export const ACTION_HIT_BONUS: Record<AttackAction, number> = {
  basic: 0,
  strong: -0.15,
  fast: 0.1,
  feint: 0.2,
  kick: 0,
  push: 0,
  riposte: 0,
};

export const ACTION_DAMAGE_MULT: Record<AttackAction, number> = {
  basic: 1,
  strong: 1.5,
  fast: 0.7,
  feint: 1,
  kick: 1,
  push: 1,
  riposte: 1,
};

/** Orden fijo: el muestreo acumulado depende de él. */
export const BODY_PART_WEIGHTS: ReadonlyArray<readonly [BodyPart, number]> = [
  ["head", 0.1],
  ["torso", 0.4],
  ["leftArm", 0.15],
  ["rightArm", 0.15],
  ["leftLeg", 0.1],
  ["rightLeg", 0.1],
];

export const BODY_DAMAGE_MULT: Record<BodyRegion, number> = { head: 2, torso: 1, arm: 0.8, leg: 0.7 };

export const DAMAGE_VARIANCE_MIN = 0.8;
export const DAMAGE_VARIANCE_MAX = 1.2;

export const BASE_CRIT_CHANCE = 0.05;
export const CRIT_SKILL_DIVISOR = 500;
export const CRIT_DAMAGE_MULT = 2;

/** Techo de mitigación por defenseMultiplier y por armadura. */
export const MAX_MITIGATION = 0.8;

/* ───────────── Defensa ───────────── */

export const BASE_DEFENSE_CHANCE = 0.3;
export const DEFENSE_SKILL_DIVISOR = 200;
export const DEFENSE_PAIN_DIVISOR = 300;
export const DEFENSE_EXHAUSTION_DIVISOR = 400;

export const DEFENSE_BONUS: Partial<Record<CombatAction, number>> = { block: 0.2, dodge: 0.1, parry: 0.15 };
export const DEFENSE_REDUCTION: Record<DefenseAction, number> = { block: 0.5, dodge: 1.0, parry: 0.7 };
export const DEFAULT_DEFENSE_REDUCTION = 0.3;

/* ───────────── Daño aplicado / dolor ───────────── */

export const UNCONSCIOUS_PAIN = 80;
export const MAX_PAIN = 100;
export const MAX_EXHAUSTION = 100;

export const INJURY_DAMAGE_THRESHOLD = 5;
export const HEAD_STUN_DAMAGE = 15;
export const STUN_MIN_TURNS = 1;
export const STUN_MAX_TURNS = 3;

/** Umbrales de daño para los efectos cualitativos de applyDamage. */
export const EFFECT_THRESHOLDS: Record<BodyRegion, number> = { head: 10, torso: 20, arm: 15, leg: 15 };

export const PAIN_SPIKE_CAP = 40;
export const PAIN_PER_DAMAGE = 2;
export const PAIN_PART_MULT: Record<BodyRegion, number> = { head: 1.5, torso: 1, arm: 0.9, leg: 0.8 };
export const PAIN_TYPE_MULT: Record<DamageType, number> = { cut: 1.2, pierce: 1.3, blunt: 0.9, magic: 1, burn: 1.5, poison: 0.7, fall: 0.8 };

/** Bandas [umbral superior exclusivo, penalización]; el último tramo es ≥ 80. */
export const PAIN_BANDS: ReadonlyArray<readonly [number, number]> = [
  [30, 0],
  [50, 0.15],
  [70, 0.3],
  [80, 0.45],
];
export const PAIN_BAND_INCAPACITATED = 1;

export const PENALTY_CAP = 0.9;

/* ───────────── Heridas ───────────── */

export const INJURY_SEVERITY_PER_DAMAGE = 3;
export const BLEEDING_DAMAGE_THRESHOLD = 10;
export const BLEEDING_RATE_DIVISOR = 20;
export const BLEEDING_TYPES: readonly DamageType[] = ["cut", "pierce"];
export const HEAL_MINUTES_PER_SEVERITY = 10;
export const HEAL_TYPE_MULT: Partial<Record<DamageType, number>> = { burn: 1.5, poison: 2 };

export const BLEED_SELF_STOP_CHANCE = 0.05;
export const HEAL_RATE_TREATED = 2;
export const HEAL_RATE_INFECTED = 0.3;
export const HEAL_RATE_NORMAL = 1;
export const SCAR_SEVERITY_THRESHOLD = 50;
export const SCAR_CHANCE = 0.3;
export const INFECTION_CHANCE_PER_MINUTE = 0.001;
export const INFECTION_SEVERE_THRESHOLD = 30;
export const INFECTION_HEAL_TIME_MULT = 1.5;
export const TREATMENT_HEAL_TIME_MULT = 0.7;

/* ───────────── Equipo ───────────── */

export const QUALITY_DAMAGE_MULT: Record<QualityTier, number> = {
  broken: 0.5,
  weak: 0.7,
  normal: 1,
  good: 1.2,
  masterwork: 1.5,
  legendary: 2,
};

/** Bajo este estado el arma pasa a "broken" (irreversible). */
export const BROKEN_CONDITION_THRESHOLD = 20;

export const WEAPON_WEAR_BY_ACTION: Partial<Record<CombatAction, number>> = { basic: 0.5, strong: 1, fast: 0.3, parry: 0.7 };
export const WEAPON_WEAR_DEFAULT = 0.5;
export const WEAR_QUALITY_MULT: Partial<Record<QualityTier, number>> = { weak: 2, masterwork: 0.5, legendary: 0.3 };
export const ARMOR_WEAR_PER_HIT = 0.5;

export const REACH_BONUS_PER_POINT = 0.1;
export const REACH_MALUS_PER_POINT = 0.05;

/** Arma por defecto cuando el combatiente pelea sin nada en la mano. */
export const UNARMED_DAMAGE = 5;
export const UNARMED_REACH = 1;
/** Daño base de técnicas sin arma. */
export const TECHNIQUE_UNARMED_DAMAGE = 10;
