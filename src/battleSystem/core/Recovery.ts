// src/battleSystem/core/Recovery.ts
// Descanso fuera de combate: stamina, dolor, heridas y algo de vida.
import type { CombatEntity } from "../../interfaces/combat/CombatEntity";
import type { Injury } from "./Injury";
import type { Rng } from "./RngFightSeed";
import { recoverStamina, reducePain } from "./PainEngine";

/** Dolor aliviado por minuto de descanso (antes del factor aleatorio). */
export const REST_PAIN_PER_MINUTE = 0.5;
/** Vida recuperada por minuto si no hay sangrado activo. */
export const REST_HEALTH_PER_MINUTE = 0.1;

export interface RestReport {
  minutes: number;
  staminaRecovered: number;
  painRelieved: number;
  bloodLoss: number;
  healthRecovered: number;
  healedInjuries: Injury[];
  regainedConsciousness: boolean;
}

/**
 * Orden: stamina → dolor (1 sorteo + posible despertar) → heridas (sorteos por herida) → vida.
 * El sangrado se recalcula desde el ledger al final.
 */
export function rest(c: CombatEntity, minutes: number, rng: Rng): RestReport {
  const m = Math.max(0, minutes);
  const s = c.stats();

  const staminaRecovered = recoverStamina(s, true, m * 60);
  const pain = reducePain(s, m * REST_PAIN_PER_MINUTE, false, rng);

  const ledger = c.injuries();
  const upd = ledger.update(m, rng);
  s.health = Math.max(0, s.health - upd.bloodLoss);

  const bleedingRate = ledger.bleedingRate();
  s.totalBleedingRate = bleedingRate;
  s.isBleeding = bleedingRate > 0;

  let healthRecovered = 0;
  if (!s.isBleeding && s.health > 0) {
    const before = s.health;
    s.health = Math.min(s.maxHealth, s.health + m * REST_HEALTH_PER_MINUTE);
    healthRecovered = s.health - before;
  }
  if (s.health <= 0) s.isConscious = false;

  s.isStunned = false;
  s.stunDuration = 0;

  return {
    minutes: m,
    staminaRecovered,
    painRelieved: pain.relieved,
    bloodLoss: upd.bloodLoss,
    healthRecovered,
    healedInjuries: upd.healed,
    regainedConsciousness: pain.regainedConsciousness,
  };
}
