// src/interfaces/combat/CombatEntity.ts
import type { Archetype, CombatStance, CombatStats, DefenseAction } from "../../battleSystem/core/CombatTypes";
import type { Weapon } from "../../battleSystem/core/Weapon";
import type { Armor } from "../../battleSystem/core/Armor";
import type { InjuryLedger } from "../../battleSystem/core/Injury";
import type { SkillSet } from "../../battleSystem/entities/SkillSet";
import type { SelfBuff } from "../../battleSystem/constants/status";
import type { VoidAbilityId } from "../../battleSystem/constants/voidAbilities";

/**
 * Capacidades que el núcleo de combate necesita de cualquier participante
 * (jugador, NPC, invocación…). El resolver sólo habla con esto: nada de sondear atributos.
 */
export interface CombatEntity {
  readonly id: string;
  readonly name: string;
  level: number;

  stance: CombatStance;
  /** Sólo NPCs; null para el jugador. */
  archetype: Archetype | null;
  /** Defensa preparada para el próximo golpe entrante (se consume al recibirlo). */
  defensiveAction: DefenseAction | null;

  /** Buffs propios que sabe activar. */
  knownBuffs: readonly SelfBuff[];
  /** Habilidades del vacío desbloqueadas. */
  voidAbilities: readonly VoidAbilityId[];

  stats(): CombatStats;
  weapon(): Weapon | null;
  offHand(): Weapon | null;
  armor(): Armor | null;
  skills(): SkillSet;
  injuries(): InjuryLedger;
}
