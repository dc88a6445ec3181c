// src/battleSystem/core/TechniqueEngine.ts
/* eslint-disable no-console */
/**
 * Técnicas de arma + seguimiento de combos.
 *
 * Orden de sorteos de `execute` (para RNG guionado):
 *   1) golpe  2) crítico  3) sangrado  4) miedo  5) mareo
 * Sólo se sortea lo que la técnica declara.
 */
import type { CombatEntity } from "../../interfaces/combat/CombatEntity";
import type { BodyPart, SideKey } from "./CombatTypes";
import type { RejectReason } from "./CombatErrors";
import type { Rng } from "./RngFightSeed";
import type { Weapon } from "./Weapon";
import type { StatusEngine } from "./StatusEngine";
import { EnvironmentModifier } from "./EnvironmentModifier";
import { TECHNIQUE_DEFS } from "../constants/techniques";
import type { TechniqueDef, TechniqueEffects, TechniqueTier } from "../constants/techniques";
import type { WeaponType } from "./CombatTypes";
import { clamp, clamp01, round1 } from "./CombatMath";
import { applyMitigation } from "./combatManager/mitigation";
import { defenseSkill, weaponSkill } from "./combatManager/stats";
import { createInjury } from "./Injury";
import { addPain, shouldFallUnconscious } from "./PainEngine";
import {
  BASE_CRIT_CHANCE,
  BASE_HIT_CHANCE,
  BLEEDING_RATE_DIVISOR,
  CRIT_DAMAGE_MULT,
  HIT_SKILL_DIVISOR,
  INJURY_DAMAGE_THRESHOLD,
  PAIN_PER_DAMAGE,
  PAIN_SPIKE_CAP,
  TECHNIQUE_UNARMED_DAMAGE,
} from "./CombatConfig";
import { COMBAT_DEBUG } from "../../config/combat";

const DBG = COMBAT_DEBUG;

export class CombatTechnique {
  public readonly id: string;
  public readonly name: string;
  public readonly tier: TechniqueTier;
  public readonly weaponTypes: readonly WeaponType[];
  public readonly skillRequirement: number;
  public readonly staminaCost: number;
  public readonly damageMultiplier: number;
  public readonly accuracyModifier: number;
  public readonly criticalChanceBonus: number;
  public readonly specialEffects: Readonly<TechniqueEffects>;
  public readonly comboChain: readonly string[];
  public readonly description: string;

  constructor(def: TechniqueDef) {
    this.id = def.id;
    this.name = def.name;
    this.tier = def.tier;
    this.weaponTypes = [...def.weaponTypes];
    this.skillRequirement = def.skillRequirement;
    this.staminaCost = def.staminaCost;
    this.damageMultiplier = def.damageMultiplier;
    this.accuracyModifier = def.accuracyModifier;
    this.criticalChanceBonus = def.criticalChanceBonus;
    this.specialEffects = { ...def.specialEffects };
    this.comboChain = [...def.comboChain];
    this.description = def.description;
  }

  /** Sin arma siempre vale; con arma, su tipo tiene que estar permitido. */
  canExecute(skill: number, stamina: number, weapon: Weapon | null): boolean {
    return this.gateFailure(skill, stamina, weapon) === null;
  }

  gateFailure(skill: number, stamina: number, weapon: Weapon | null): RejectReason | null {
    if (skill < this.skillRequirement) return "requirements_not_met";
    if (weapon && !this.weaponTypes.includes(weapon.weaponType)) return "requirements_not_met";
    if (stamina < this.staminaCost) return "insufficient_stamina";
    return null;
  }
}

export const TECHNIQUES: readonly CombatTechnique[] = TECHNIQUE_DEFS.map((d) => new CombatTechnique(d));

export function findTechnique(id: string, catalog: readonly CombatTechnique[] = TECHNIQUES): CombatTechnique | null {
  return catalog.find((t) => t.id === id) ?? null;
}

// ───────────────── Ejecución ─────────────────

export interface TechniqueResult {
  techniqueId: string;
  hit: boolean;
  critical: boolean;
  damage: number;
  hitChance: number;
  rawHitChance: number;
  painCaused: number;
  bodyPart: BodyPart | null;
  /** Etiquetas: critical, bleeding, stun_N, fear, dizzy, area, armor_pierced. */
  effects: string[];
  staminaSpent: number;
  description: string;
}

export type TechniqueOutcome = { executed: true; result: TechniqueResult } | { executed: false; reason: RejectReason; description: string };

export interface TechniqueContext {
  rng: Rng;
  environment?: EnvironmentModifier;
  /** Necesario para aplicar "fear"; sin él el efecto se omite. */
  status?: StatusEngine;
}

export class TechniqueEngine {
  private environment: EnvironmentModifier;

  constructor(
    private ctx: TechniqueContext,
    public readonly catalog: readonly CombatTechnique[] = TECHNIQUES
  ) {
    this.environment = ctx.environment ?? new EnvironmentModifier();
  }

  /** Técnicas que el combatiente podría ejecutar ahora mismo. */
  available(c: CombatEntity): CombatTechnique[] {
    const skill = weaponSkill(c);
    const stamina = c.stats().stamina;
    const weapon = c.weapon();
    return this.catalog.filter((t) => t.canExecute(skill, stamina, weapon));
  }

  execute(attacker: CombatEntity, defender: CombatEntity, techniqueOrId: CombatTechnique | string, defenderSide?: SideKey): TechniqueOutcome {
    const technique = typeof techniqueOrId === "string" ? findTechnique(techniqueOrId, this.catalog) : techniqueOrId;
    if (!technique) return { executed: false, reason: "unknown_technique", description: `Unknown technique "${String(techniqueOrId)}".` };

    const aStats = attacker.stats();
    const dStats = defender.stats();
    const weapon = attacker.weapon();
    const aSkill = weaponSkill(attacker);

    const gate = technique.gateFailure(aSkill, aStats.stamina, weapon);
    if (gate) {
      if (DBG) console.log("[COMBAT] técnica rechazada", { id: technique.id, gate });
      return { executed: false, reason: gate, description: `Cannot perform ${technique.name}!` };
    }

    aStats.stamina -= technique.staminaCost;
    const fx = technique.specialEffects;
    const rng = this.ctx.rng;

    const rawHitChance = BASE_HIT_CHANCE + (aSkill - defenseSkill(defender)) / HIT_SKILL_DIVISOR + technique.accuracyModifier + this.environment.modifiers().accuracy;
    const hitChance = clamp01(rawHitChance);
    const base = { techniqueId: technique.id, hitChance, rawHitChance, staminaSpent: technique.staminaCost };

    if (rng() > hitChance) {
      return {
        executed: true,
        result: { ...base, hit: false, critical: false, damage: 0, painCaused: 0, bodyPart: null, effects: [], description: `${technique.name} misses!` },
      };
    }

    const effects: string[] = [];
    let damage = (weapon ? weapon.getEffectiveDamage() : TECHNIQUE_UNARMED_DAMAGE) * technique.damageMultiplier;

    const critical = rng() < BASE_CRIT_CHANCE + technique.criticalChanceBonus;
    if (critical) {
      damage *= CRIT_DAMAGE_MULT;
      effects.push("critical");
    }

    const bodyPart: BodyPart = fx.targetHead ? "head" : "torso";
    const penetration = Math.max(fx.armorPenetration ?? 0, fx.ignoreArmor ?? 0);
    const armor = dStats.armor;
    const damageType = weapon?.damageType ?? "blunt";
    // las técnicas ignoran defenseMultiplier: sólo la armadura mitiga
    damage = applyMitigation({
      raw: damage,
      defenseMultiplier: 0,
      armorProtection: armor ? armor.getProtection(bodyPart, damageType) : 0,
      armorPenetration: penetration,
    }).final;
    if (penetration > 0 && armor) effects.push("armor_pierced");

    const bleeds = fx.bleedingChance !== undefined && rng() < fx.bleedingChance;
    const fears = fx.fear !== undefined && rng() < fx.fear;
    const dizzy = fx.dizzyChance !== undefined && rng() < fx.dizzyChance;
    if (fx.areaDamage) effects.push("area");

    // aplicar
    dStats.health = clamp(dStats.health - damage, 0, dStats.maxHealth);
    const painCaused = addPain(dStats, Math.min(PAIN_SPIKE_CAP, damage * PAIN_PER_DAMAGE));
    dStats.memory.lastDamageTaken = damage;
    aStats.memory.lastDamageDealt = damage;

    if (bleeds) {
      dStats.isBleeding = true;
      dStats.totalBleedingRate += damage / BLEEDING_RATE_DIVISOR;
      effects.push("bleeding");
    }

    if (fx.targetHead && damage > INJURY_DAMAGE_THRESHOLD) defender.injuries().add(createInjury(damage, bodyPart, damageType));

    if (fears && this.ctx.status && defenderSide) {
      const r = this.ctx.status.apply(defenderSide, "fear");
      if (r.applied) effects.push("fear");
    }

    let unconscious = false;
    if (shouldFallUnconscious(dStats)) {
      dStats.isConscious = false;
      unconscious = true;
    } else if (fx.stunDuration !== undefined) {
      dStats.isStunned = true;
      dStats.stunDuration = fx.stunDuration;
      effects.push(`stun_${fx.stunDuration}`);
    } else if (dizzy) {
      dStats.isStunned = true;
      dStats.stunDuration = Math.max(dStats.stunDuration, 1);
      effects.push("dizzy");
    }

    const dmgText = round1(damage).toFixed(1);
    const description = `${technique.name} hits for ${dmgText} damage!${unconscious ? " The target collapses!" : ""}`;
    if (DBG) console.log("[COMBAT] técnica", { id: technique.id, critical, damage, effects });

    return { executed: true, result: { ...base, hit: true, critical, damage, painCaused, bodyPart, effects, description } };
  }
}

// ───────────────── Combos ─────────────────

export const COMBO_HISTORY_CAP = 10;
export const COMBO_WINDOW_ROUNDS = 2;

/**
 * Historial acotado por combatiente con una ventana de 2 rondas.
 * Si la ventana está cerrada, el paso nuevo reinicia el historial y la abre.
 */
export class ComboTracker {
  private history = new Map<string, string[]>();
  private windows = new Map<string, number>();

  constructor(private catalog: readonly CombatTechnique[] = TECHNIQUES) {}

  record(combatantId: string, step: string): void {
    const open = (this.windows.get(combatantId) ?? 0) > 0;
    const list = open ? [...(this.history.get(combatantId) ?? []), step] : [step];
    if (!open) this.windows.set(combatantId, COMBO_WINDOW_ROUNDS);
    this.history.set(combatantId, list.slice(-COMBO_HISTORY_CAP));
  }

  /** Registra el paso y devuelve la técnica de combo cuya cadena coincide con la cola del historial. */
  checkComboOpportunity(combatantId: string, step: string): CombatTechnique | null {
    this.record(combatantId, step);
    const list = this.history.get(combatantId) ?? [];
    for (const t of this.catalog) {
      if (t.tier !== "combo" || t.comboChain.length === 0 || t.comboChain.length > list.length) continue;
      const tail = list.slice(-t.comboChain.length);
      if (t.comboChain.every((s, i) => s === tail[i])) return t;
    }
    return null;
  }

  /** Una ronda menos; al cerrarse la ventana se olvida el historial. */
  tickWindows(): void {
    for (const [id, left] of this.windows) {
      if (left <= 1) {
        this.windows.delete(id);
        this.history.delete(id);
      } else this.windows.set(id, left - 1);
    }
  }

  historyOf(combatantId: string): readonly string[] {
    return this.history.get(combatantId) ?? [];
  }
}
