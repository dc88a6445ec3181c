// Patrones de comportamiento de NPCs por arquetipo (probabilidades 0..1, umbral de retirada en % de vida).
import type { Archetype, CombatStance } from "../core/CombatTypes";

export interface ArchetypePattern {
  stancePreference: CombatStance;
  attackProbability: number;
  defenseProbability: number;
  /** Por debajo de este % de vida intenta esquivar. */
  retreatThreshold: number;
  techniqueUsage: number;
  adaptsToPlayer: boolean;
}

export const ARCHETYPE_PATTERNS: Record<Archetype, ArchetypePattern> = {
  aggressive: { stancePreference: "aggressive", attackProbability: 0.7, defenseProbability: 0.2, retreatThreshold: 20, techniqueUsage: 0.3, adaptsToPlayer: false },
  defensive: { stancePreference: "defensive", attackProbability: 0.3, defenseProbability: 0.6, retreatThreshold: 40, techniqueUsage: 0.1, adaptsToPlayer: false },
  tactical: { stancePreference: "balanced", attackProbability: 0.5, defenseProbability: 0.4, retreatThreshold: 30, techniqueUsage: 0.4, adaptsToPlayer: true },
  berserker: { stancePreference: "berserker", attackProbability: 0.9, defenseProbability: 0.05, retreatThreshold: 5, techniqueUsage: 0.5, adaptsToPlayer: false },
  archer: { stancePreference: "evasive", attackProbability: 0.6, defenseProbability: 0.3, retreatThreshold: 50, techniqueUsage: 0.3, adaptsToPlayer: false },
};

/** Sin arquetipo declarado se juega como táctico. */
export const DEFAULT_ARCHETYPE: Archetype = "tactical";

/** Chance de esquivar al quedar bajo el umbral de retirada. */
export const RETREAT_DODGE_CHANCE = 0.7;
export const ADAPTIVE_ATTACK_BOOST = 1.3;
export const ADAPTIVE_DEFENSIVE_TENDENCY = 0.5;
/** Con más stamina que esto elige entre básico y fuerte; si no, rápido. */
export const AI_STRONG_ATTACK_STAMINA = 20;
/** Modo simple: por debajo de esta fracción de vida bloquea. */
export const SIMPLE_MODE_BLOCK_HEALTH = 0.25;
