// Lecturas derivadas de un combatiente (puras/deterministas salvo el d11 de iniciativa).
import type { CombatEntity } from "../../../interfaces/combat/CombatEntity";
import type { DamageType, WeaponType } from "../CombatTypes";
import type { SkillName } from "../../entities/SkillSet";
import type { Rng } from "../RngFightSeed";
import { rollInt } from "../RngFightSeed";
import { UNARMED_DAMAGE } from "../CombatConfig";

const WEAPON_SKILL: Record<WeaponType, SkillName> = {
  fists: "unarmed",
  daggers: "daggers",
  shortSwords: "swords",
  longSwords: "swords",
  greatSwords: "greatSwords",
  axes: "axes",
  greatAxes: "axes",
  hammers: "blunt",
  warHammers: "blunt",
  maces: "blunt",
  shields: "blunt",
  spears: "polearms",
  halberds: "polearms",
  staves: "polearms",
  bows: "archery",
  crossbows: "archery",
};

export function skillForWeapon(type: WeaponType | null): SkillName {
  return type ? WEAPON_SKILL[type] : "unarmed";
}

/** Nivel de la habilidad que corresponde al arma empuñada. */
export function weaponSkill(c: CombatEntity): number {
  return c.skills().level(skillForWeapon(c.weapon()?.weaponType ?? null));
}

/** Habilidad defensiva: +10 con escudo, +15 en guardia defensiva, -10 en postura agresiva. */
export function defenseSkill(c: CombatEntity): number {
  let v = c.skills().level("defense");
  if (hasShield(c)) v += 10;
  if (c.stance === "defensive") v += 15;
  else if (c.stance === "aggressive") v -= 10;
  return Math.max(0, v);
}

export function hasShield(c: CombatEntity): boolean {
  return c.offHand()?.weaponType === "shields" || c.weapon()?.weaponType === "shields";
}

/** Daño y tipo del golpe según el arma (puños: 5 contundente). */
export function strikeProfile(c: CombatEntity): { damage: number; type: DamageType } {
  const w = c.weapon();
  return w ? { damage: w.getEffectiveDamage(), type: w.damageType } : { damage: UNARMED_DAMAGE, type: "blunt" };
}

/**
 * Iniciativa de orden de turnos (mínimo 1):
 * 10 + agilidad×velocidad + velocidadArma×2×attackSpeed − penalización de armadura
 * − dolor sobre 30 (por decena) − agotamiento sobre 50 (por decena) + d(−5..5).
 */
export function combatantInitiative(c: CombatEntity, rng: Rng): number {
  const s = c.stats();
  let v = 10 + c.skills().level("agility") * s.speedMultiplier;
  v += (c.weapon()?.speed ?? 0) * 2 * s.attackSpeed;
  v -= c.armor()?.movementPenalty ?? 0;
  if (s.pain > 30) v -= Math.floor((s.pain - 30) / 10);
  if (s.exhaustion > 50) v -= Math.floor((s.exhaustion - 50) / 10);
  v += rollInt(rng, -5, 5);
  return Math.max(1, v);
}
