// src/battleSystem/entities/PlayerCharacter.ts
import type { Archetype } from "../core/CombatTypes";
import { CombatantBase } from "./CombatantBase";
import type { CombatantInit } from "./CombatantBase";
import type { SkillName } from "./SkillSet";

/** Puntos de práctica que da cada golpe conectado (y cada defensa exitosa). */
export const PRACTICE_PER_SUCCESS = 0.1;

/**
 * Personaje del jugador en combate.
 * - Sin arquetipo: sus acciones llegan como comandos, no desde la IA.
 * - Practicar mejora la habilidad usada (sin pasar de 100).
 */
export class PlayerCharacter extends CombatantBase {
  override readonly kind = "player" as const;
  override archetype: Archetype | null = null;

  constructor(init: CombatantInit) {
    super(init, "neutral");
  }

  practice(skill: SkillName, amount: number = PRACTICE_PER_SUCCESS): number {
    return this.skills().improve(skill, amount);
  }
}
