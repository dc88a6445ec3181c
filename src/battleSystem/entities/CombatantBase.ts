// src/battleSystem/entities/CombatantBase.ts
import type { CombatEntity } from "../../interfaces/combat/CombatEntity";
import type { Archetype, CombatStance, CombatStats, DefenseAction } from "../core/CombatTypes";
import { STANCES } from "../core/CombatTypes";
import { createCombatStats } from "../core/CombatStats";
import type { CombatStatsInit } from "../core/CombatStats";
import type { Weapon } from "../core/Weapon";
import type { Armor } from "../core/Armor";
import { InjuryLedger } from "../core/Injury";
import { ratio } from "../core/CombatMath";
import { assertOneOf } from "../core/CombatErrors";
import { SkillSet } from "./SkillSet";
import type { SkillName } from "./SkillSet";
import type { SelfBuff } from "../constants/status";
import type { VoidAbilityId } from "../constants/voidAbilities";

export type CombatantKind = "player" | "enemy";

export interface CombatantInit {
  id: string;
  name: string;
  level?: number;
  stats?: CombatStatsInit;
  weapon?: Weapon | null;
  offHand?: Weapon | null;
  armor?: Armor | null;
  skills?: SkillSet | Partial<Record<SkillName, number>>;
  stance?: CombatStance;
  knownBuffs?: readonly SelfBuff[];
  voidAbilities?: readonly VoidAbilityId[];
  injuries?: InjuryLedger;
}

/**
 * Base común de jugador y NPC. Arma y armadura viven dentro del bloque de stats
 * (el resolver las lee desde ahí); la mano secundaria sólo la ve el combatiente.
 */
export abstract class CombatantBase implements CombatEntity {
  abstract readonly kind: CombatantKind;
  abstract archetype: Archetype | null;

  public readonly id: string;
  public readonly name: string;
  public level: number;
  public stance: CombatStance;
  public defensiveAction: DefenseAction | null = null;
  public knownBuffs: readonly SelfBuff[];
  public voidAbilities: readonly VoidAbilityId[];

  protected combatStats: CombatStats;
  protected skillSet: SkillSet;
  protected ledger: InjuryLedger;
  protected offHandWeapon: Weapon | null;

  constructor(init: CombatantInit, defaultStance: CombatStance) {
    this.id = init.id;
    this.name = init.name;
    this.level = Math.max(1, Math.floor(init.level ?? 1));
    this.stance = assertOneOf("stance", init.stance ?? defaultStance, STANCES);
    this.knownBuffs = [...(init.knownBuffs ?? [])];
    this.voidAbilities = [...(init.voidAbilities ?? [])];

    this.combatStats = createCombatStats({
      ...init.stats,
      weapon: init.weapon ?? init.stats?.weapon ?? null,
      armor: init.armor ?? init.stats?.armor ?? null,
    });
    this.skillSet = init.skills instanceof SkillSet ? init.skills : new SkillSet(init.skills ?? {});
    this.ledger = init.injuries ?? new InjuryLedger();
    this.offHandWeapon = init.offHand ?? null;
  }

  stats(): CombatStats {
    return this.combatStats;
  }

  weapon(): Weapon | null {
    return this.combatStats.weapon;
  }

  offHand(): Weapon | null {
    return this.offHandWeapon;
  }

  armor(): Armor | null {
    return this.combatStats.armor;
  }

  skills(): SkillSet {
    return this.skillSet;
  }

  injuries(): InjuryLedger {
    return this.ledger;
  }

  /* ───────── Equipo ───────── */

  equipWeapon(weapon: Weapon | null): void {
    this.combatStats.weapon = weapon;
  }

  equipOffHand(weapon: Weapon | null): void {
    this.offHandWeapon = weapon;
  }

  equipArmor(armor: Armor | null): void {
    this.combatStats.armor = armor;
  }

  /* ───────── Estado ───────── */

  healthRatio(): number {
    return ratio(this.combatStats.health, this.combatStats.maxHealth);
  }

  isAlive(): boolean {
    return this.combatStats.health > 0;
  }

  canAct(): boolean {
    return this.isAlive() && this.combatStats.isConscious;
  }
}
