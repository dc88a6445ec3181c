// src/battleSystem/entities/EnemyBot.ts
import type { Archetype } from "../core/CombatTypes";
import { ARCHETYPES } from "../core/CombatTypes";
import { assertOneOf } from "../core/CombatErrors";
import { ARCHETYPE_PATTERNS } from "../constants/archetypes";
import { CombatantBase } from "./CombatantBase";
import type { CombatantInit } from "./CombatantBase";

/**
 * NPC de combate. El arquetipo decide su IA y su postura inicial
 * (si no se pasa una explícita).
 */
export class EnemyBot extends CombatantBase {
  override readonly kind = "enemy" as const;
  override archetype: Archetype;

  constructor(init: CombatantInit & { archetype: Archetype }) {
    super(init, ARCHETYPE_PATTERNS[assertOneOf("archetype", init.archetype, ARCHETYPES)].stancePreference);
    this.archetype = init.archetype;
  }
}
