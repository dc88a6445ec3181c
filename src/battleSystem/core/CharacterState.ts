// src/battleSystem/core/CharacterState.ts
// Estado derivado del personaje. Se recalcula desde cero (sin memoria): misma entrada → mismo estado.
import type { CombatStats } from "./CombatTypes";
import type { Injury } from "./Injury";
import { ratio } from "./CombatMath";
import { UNCONSCIOUS_PAIN } from "./CombatConfig";

export const CHARACTER_STATES = ["NORMAL", "TIRED", "EXHAUSTED", "INJURED", "CRITICALLY_INJURED", "UNCONSCIOUS", "DYING", "DEAD"] as const;
export type CharacterState = (typeof CHARACTER_STATES)[number];

export const DYING_HEALTH_FRACTION = 0.2;
export const CRITICAL_HEALTH_FRACTION = 0.5;
export const INJURED_SEVERITY_SUM = 50;
export const EXHAUSTED_THRESHOLD = 70;
export const TIRED_STAMINA_FRACTION = 0.3;

/** Primera regla que aplica gana (DEAD antes que UNCONSCIOUS). */
export function computeCharacterState(stats: CombatStats, injuries: readonly Injury[]): CharacterState {
  if (stats.health <= 0) return "DEAD";
  if (!stats.isConscious || stats.pain >= UNCONSCIOUS_PAIN) return "UNCONSCIOUS";
  const hp = ratio(stats.health, stats.maxHealth);
  if (hp < DYING_HEALTH_FRACTION) return "DYING";
  if (hp < CRITICAL_HEALTH_FRACTION) return "CRITICALLY_INJURED";
  if (injuries.reduce((acc, i) => acc + i.severity, 0) > INJURED_SEVERITY_SUM) return "INJURED";
  if (stats.exhaustion > EXHAUSTED_THRESHOLD) return "EXHAUSTED";
  if (ratio(stats.stamina, stats.maxStamina) < TIRED_STAMINA_FRACTION) return "TIRED";
  return "NORMAL";
}

/** Fuera de combate: muerto o inconsciente. */
export function isIncapacitated(stats: CombatStats, state: CharacterState = computeCharacterState(stats, [])): boolean {
  return state === "DEAD" || state === "UNCONSCIOUS";
}

export type CombatOutcomeLabel = "dead" | "unconscious" | "badlyWounded" | "wounded" | "exhausted" | "fighting";

/** Etiqueta narrativa para el cierre del combate (umbrales en puntos de vida absolutos). */
export function combatOutcomeLabel(stats: CombatStats): CombatOutcomeLabel {
  if (!stats.isConscious) return stats.health <= 0 ? "dead" : "unconscious";
  if (stats.health <= 10) return "badlyWounded";
  if (stats.health <= 30) return "wounded";
  if (stats.exhaustion > 80) return "exhausted";
  return "fighting";
}
