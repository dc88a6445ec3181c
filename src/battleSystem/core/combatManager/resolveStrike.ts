// Golpe completo entre dos combatientes: alcance → ataque → evasión por efectos → defensa preparada
// → escudo → aplicar daño/herida → desgaste de equipo → memoria.
import type { CombatEntity } from "../../../interfaces/combat/CombatEntity";
import type { AttackAction, AttackOutcome, DefenseAction, DefenseResult, SideKey } from "../CombatTypes";
import type { AttackOptions, DamageResolver } from "../DamageResolver";
import type { StatusEngine } from "../StatusEngine";
import type { Injury } from "../Injury";
import { createInjury } from "../Injury";
import { reachAdvantage, weaponDegradationFor } from "../Weapon";
import { round1 } from "../CombatMath";
import { ARMOR_WEAR_PER_HIT, INJURY_DAMAGE_THRESHOLD } from "../CombatConfig";
import { defenseSkill, strikeProfile, weaponSkill } from "./stats";

export interface StrikeSides {
  attacker: SideKey;
  defender: SideKey;
}

export interface StrikeContext {
  resolver: DamageResolver;
  /** Sin StatusEngine no hay evasión por efectos, escudo ni retención de dolor. */
  status?: StatusEngine;
  sides?: StrikeSides;
}

export interface StrikeResult {
  outcome: AttackOutcome;
  /** Esquivado por un efecto (niebla, paso sombrío). */
  evaded: boolean;
  defense: { action: DefenseAction; result: DefenseResult } | null;
  absorbed: number;
  /** Daño que llegó a la vida. */
  damageApplied: number;
  injury: Injury | null;
  /** Texto de `applyDamage` (efectos) o null si no hubo daño. */
  effectsText: string | null;
}

export function resolveStrike(attacker: CombatEntity, defender: CombatEntity, action: AttackAction, ctx: StrikeContext, opts: AttackOptions = {}): StrikeResult {
  const { resolver, status, sides } = ctx;
  const aStats = attacker.stats();
  const dStats = defender.stats();
  const profile = strikeProfile(attacker);

  const outcome = resolver.performAttack(aStats, dStats, weaponSkill(attacker), defenseSkill(defender), action, profile.damage, profile.type, {
    ...opts,
    accuracyBonus: (opts.accuracyBonus ?? 0) + reachAdvantage(attacker.weapon(), defender.weapon()),
  });

  const empty: StrikeResult = { outcome, evaded: false, defense: null, absorbed: 0, damageApplied: 0, injury: null, effectsText: null };
  if (!outcome.executed) return empty;

  // el defensor toma nota de lo que intentó el rival
  dStats.memory.observe(action);

  const r = outcome.result;
  if (!r.hit || r.bodyPart === null) return empty;

  if (status && sides) {
    const evasion = status.evasion(sides.defender);
    if (evasion > 0 && resolver.rng() < evasion) return { ...empty, evaded: true };
  }

  let damage = r.damage;
  let defense: StrikeResult["defense"] = null;
  const pending = defender.defensiveAction;
  if (pending) {
    defender.defensiveAction = null;
    const result = resolver.performDefense(dStats, defenseSkill(defender), pending);
    defense = { action: pending, result };
    damage *= 1 - result.reduction;
    if (result.success && pending === "parry") {
      const w = defender.weapon();
      if (w) w.degrade(weaponDegradationFor("parry", w.quality));
    }
  }

  let absorbed = 0;
  if (status && sides && damage > 0) {
    const left = status.absorb(sides.defender, damage);
    absorbed = damage - left;
    damage = left;
  }
  damage = round1(damage);

  const weapon = attacker.weapon();
  if (weapon) weapon.degrade(weaponDegradationFor(action, weapon.quality));

  if (damage <= 0) return { ...empty, defense, absorbed };

  const injury = damage > INJURY_DAMAGE_THRESHOLD ? (damage === r.damage ? r.injury : createInjury(damage, r.bodyPart, r.damageType)) : null;
  const effectsText = resolver.applyDamage(dStats, damage, r.bodyPart, r.damageType, injury);
  if (injury) defender.injuries().add(injury);

  const armor = defender.armor();
  if (armor) armor.degrade(ARMOR_WEAR_PER_HIT);

  aStats.memory.lastDamageDealt = damage;
  if (status && sides) status.holdPain(sides.defender);

  return { outcome, evaded: false, defense, absorbed, damageApplied: damage, injury, effectsText };
}
