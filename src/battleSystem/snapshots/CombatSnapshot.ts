// src/battleSystem/snapshots/CombatSnapshot.ts
// Foto plana (JSON-safe) de un combatiente completo y su reconstrucción.
// Los efectos de estado no entran: se limpian al terminar cada encuentro.
import type { CombatStatsData } from "../core/CombatStats";
import { deserializeCombatStats, serializeCombatStats } from "../core/CombatStats";
import type { WeaponData } from "../core/Weapon";
import { Weapon } from "../core/Weapon";
import type { InjuryData } from "../core/Injury";
import { InjuryLedger } from "../core/Injury";
import type { Archetype, CombatStance } from "../core/CombatTypes";
import { ARCHETYPES, STANCES } from "../core/CombatTypes";
import { MalformedCombatDataError, assertOneOf, readNumber, readRecord, readString, readStringArray } from "../core/CombatErrors";
import { SELF_BUFFS } from "../constants/status";
import type { SelfBuff } from "../constants/status";
import { VOID_ABILITY_IDS } from "../constants/voidAbilities";
import type { VoidAbilityId } from "../constants/voidAbilities";
import type { CombatantBase, CombatantKind } from "../entities/CombatantBase";
import { PlayerCharacter } from "../entities/PlayerCharacter";
import { EnemyBot } from "../entities/EnemyBot";
import { SkillSet } from "../entities/SkillSet";
import type { SkillName } from "../entities/SkillSet";

export interface CombatantSnapshot {
  kind: CombatantKind;
  id: string;
  name: string;
  level: number;
  archetype: Archetype | null;
  stance: CombatStance;
  knownBuffs: SelfBuff[];
  voidAbilities: VoidAbilityId[];
  stats: CombatStatsData;
  offHand: WeaponData | null;
  skills: Partial<Record<SkillName, number>>;
  injuries: InjuryData[];
}

export function snapshotCombatant(c: CombatantBase): CombatantSnapshot {
  const offHand = c.offHand();
  return {
    kind: c.kind,
    id: c.id,
    name: c.name,
    level: c.level,
    archetype: c.archetype,
    stance: c.stance,
    knownBuffs: [...c.knownBuffs],
    voidAbilities: [...c.voidAbilities],
    stats: serializeCombatStats(c.stats()),
    offHand: offHand ? offHand.toData() : null,
    skills: c.skills().toData(),
    injuries: c.injuries().toData(),
  };
}

/** Reconstruye jugador o NPC según `kind`. Lanza MalformedCombatDataError si algo no cuadra. */
export function restoreCombatant(raw: unknown): PlayerCharacter | EnemyBot {
  const r = readRecord("combatant", raw);
  const kind = assertOneOf<CombatantKind>("kind", r.kind, ["player", "enemy"]);

  const init = {
    id: readString(r, "id"),
    name: readString(r, "name"),
    level: readNumber(r, "level"),
    stance: assertOneOf("stance", r.stance, STANCES),
    knownBuffs: readStringArray(r, "knownBuffs").map((b, i) => assertOneOf(`knownBuffs[${i}]`, b, SELF_BUFFS)),
    voidAbilities: readStringArray(r, "voidAbilities").map((a, i) => assertOneOf(`voidAbilities[${i}]`, a, VOID_ABILITY_IDS)),
    stats: deserializeCombatStats(r.stats),
    offHand: r.offHand === null || r.offHand === undefined ? null : Weapon.fromData(r.offHand),
    skills: SkillSet.fromData(r.skills),
    injuries: InjuryLedger.fromData(r.injuries),
  };

  if (kind === "player") {
    if (r.archetype !== null && r.archetype !== undefined) throw new MalformedCombatDataError("archetype", r.archetype, "el jugador no lleva arquetipo");
    return new PlayerCharacter(init);
  }
  return new EnemyBot({ ...init, archetype: assertOneOf("archetype", r.archetype, ARCHETYPES) });
}
