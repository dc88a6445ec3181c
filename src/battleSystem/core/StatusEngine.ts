// src/battleSystem/core/StatusEngine.ts
/* eslint-disable no-console */
/**
 * Efectos activos (buffs/debuffs) por bando.
 * - Cada efecto es una variante de la unión `CombatEffect` con apply/revert explícitos.
 * - Los multiplicadores NO se multiplican/dividen incrementalmente: se recalculan desde la BASE
 *   capturada en `attach()` × factores de los efectos vigentes, cada vez que la lista cambia.
 * - Los DoT (poison/burning) tiquean en `onRoundStart`, antes de decrementar duraciones.
 */
import type { CombatStats, MultiplierKey, SideKey } from "./CombatTypes";
import { MULTIPLIER_KEYS } from "./CombatTypes";
import type { Rng } from "./RngFightSeed";
import { clamp, ratio } from "./CombatMath";
import { MAX_PAIN } from "./CombatConfig";
import { shouldFallUnconscious } from "./PainEngine";
import { EFFECT_CATALOG, isEffectKind } from "../constants/status";
import type { EffectKind } from "../constants/status";
import { MalformedCombatDataError, readNumber, readRecord } from "./CombatErrors";
import { COMBAT_DEBUG } from "../../config/combat";

const DBG = COMBAT_DEBUG;

/* ========== Unión de efectos ========== */

type DotKind = "poison" | "burning";
type PlainKind = Exclude<EffectKind, "lastStand" | "painImmunity" | "energyShield" | DotKind>;

export type CombatEffect =
  | { kind: PlainKind; turnsLeft: number; source?: SideKey }
  | { kind: "lastStand"; turnsLeft: null; source?: SideKey }
  | { kind: "painImmunity"; turnsLeft: number; storedPain: number; source?: SideKey }
  | { kind: "energyShield"; turnsLeft: number; absorb: number; source?: SideKey }
  | { kind: DotKind; turnsLeft: number; damagePerTurn: number; source?: SideKey };

export type EffectOptions = { turns?: number; damagePerTurn?: number; absorb?: number; source?: SideKey };

export type DotTickEvent = { victim: SideKey; kind: DotKind; damage: number; source?: SideKey };
export type ExpireEvent = { side: SideKey; kind: EffectKind };

export type ApplyResult = { applied: true; effect: CombatEffect } | { applied: false; reason: "not_attached" | "condition_not_met" | "resisted" };

/** Por debajo de esta fracción de vida se habilita Last Stand. */
export const LAST_STAND_HEALTH_FRACTION = 0.2;

/** Construye la variante correcta de la unión para un `kind`. */
export function makeEffect(kind: EffectKind, opts: EffectOptions = {}): CombatEffect {
  const def = EFFECT_CATALOG[kind];
  const turns = Math.max(1, Math.floor(opts.turns ?? def.baseDuration ?? 1));
  const source = opts.source;
  switch (kind) {
    case "lastStand":
      return { kind, turnsLeft: null, source };
    case "painImmunity":
      return { kind, turnsLeft: turns, storedPain: 0, source };
    case "energyShield":
      return { kind, turnsLeft: turns, absorb: Math.max(0, opts.absorb ?? def.absorb ?? 0), source };
    case "poison":
    case "burning":
      return { kind, turnsLeft: turns, damagePerTurn: Math.max(0, opts.damagePerTurn ?? def.damagePerTurn ?? 0), source };
    default:
      return { kind, turnsLeft: turns, source };
  }
}

/** Efecto de entrada: sólo los que tocan algo más que multiplicadores. */
export function applyEffect(stats: CombatStats, effect: CombatEffect): void {
  if (effect.kind === "painImmunity") {
    effect.storedPain = stats.pain;
    stats.pain = 0;
  }
}

/** Efecto de salida, simétrico a `applyEffect`. */
export function revertEffect(stats: CombatStats, effect: CombatEffect): void {
  if (effect.kind === "painImmunity") {
    stats.pain = clamp(stats.pain + effect.storedPain, 0, MAX_PAIN);
    effect.storedPain = 0;
    if (shouldFallUnconscious(stats)) stats.isConscious = false;
  }
}

type Attached = { stats: CombatStats; base: Record<MultiplierKey, number> };

export type SerializedEffects = Record<SideKey, CombatEffect[]> & { base: Partial<Record<SideKey, Record<MultiplierKey, number>>> };

const snapshotBase = (s: CombatStats): Record<MultiplierKey, number> => ({
  attackSpeed: s.attackSpeed,
  damageMultiplier: s.damageMultiplier,
  defenseMultiplier: s.defenseMultiplier,
  speedMultiplier: s.speedMultiplier,
  accuracyMultiplier: s.accuracyMultiplier,
  criticalChance: s.criticalChance,
});

export class StatusEngine {
  private effects: Record<SideKey, CombatEffect[]> = { player: [], enemy: [] };
  private attached: Partial<Record<SideKey, Attached>> = {};

  constructor(private rng: Rng) {}

  // ───────────────── Registro ─────────────────
  /** Vincula un bando con su bloque de stats y guarda la base de multiplicadores. */
  attach(side: SideKey, stats: CombatStats) {
    this.attached[side] = { stats, base: snapshotBase(stats) };
    this.recompute(side);
  }

  baseOf(side: SideKey): Readonly<Record<MultiplierKey, number>> | null {
    return this.attached[side]?.base ?? null;
  }

  // ───────────────── Query ─────────────────
  list(side: SideKey): readonly CombatEffect[] {
    return this.effects[side];
  }

  has(side: SideKey, kind: EffectKind): boolean {
    return this.effects[side].some((e) => e.kind === kind);
  }

  /** Probabilidad de esquiva automática por efectos (la mayor vigente). */
  evasion(side: SideKey): number {
    return this.effects[side].reduce((acc, e) => Math.max(acc, EFFECT_CATALOG[e.kind].evasion ?? 0), 0);
  }

  // ───────────────── Aplicación ─────────────────
  apply(side: SideKey, kind: EffectKind, opts: EffectOptions = {}): ApplyResult {
    const att = this.attached[side];
    if (!att) return { applied: false, reason: "not_attached" };
    if (kind === "lastStand" && ratio(att.stats.health, att.stats.maxHealth) >= LAST_STAND_HEALTH_FRACTION) return { applied: false, reason: "condition_not_met" };

    const list = this.effects[side];
    const current = list.find((e) => e.kind === kind);
    if (current) {
      // refresco: se queda con la duración mayor (y el escudo/DoT más fuerte)
      const fresh = makeEffect(kind, opts);
      if (current.turnsLeft !== null && fresh.turnsLeft !== null) current.turnsLeft = Math.max(current.turnsLeft, fresh.turnsLeft);
      if (current.kind === "energyShield" && fresh.kind === "energyShield") current.absorb = Math.max(current.absorb, fresh.absorb);
      if ((current.kind === "poison" || current.kind === "burning") && (fresh.kind === "poison" || fresh.kind === "burning")) {
        current.damagePerTurn = Math.max(current.damagePerTurn, fresh.damagePerTurn);
      }
      if (DBG) console.log("[STATUS] Refresca", { side, kind, turnsLeft: current.turnsLeft });
      return { applied: true, effect: current };
    }

    const effect = makeEffect(kind, opts);
    applyEffect(att.stats, effect);
    list.push(effect);
    this.recompute(side);
    if (DBG) console.log("[STATUS] Aplica", { side, kind, turnsLeft: effect.turnsLeft });
    return { applied: true, effect };
  }

  /** Igual que `apply` pero con un sorteo previo (chance 0..1). */
  tryApply(side: SideKey, kind: EffectKind, chance: number, opts: EffectOptions = {}): ApplyResult {
    if (!(this.rng() < chance)) return { applied: false, reason: "resisted" };
    return this.apply(side, kind, opts);
  }

  remove(side: SideKey, kind: EffectKind): boolean {
    const att = this.attached[side];
    const list = this.effects[side];
    const idx = list.findIndex((e) => e.kind === kind);
    if (idx < 0) return false;
    const [effect] = list.splice(idx, 1);
    if (att && effect) revertEffect(att.stats, effect);
    this.recompute(side);
    return true;
  }

  /** Revierte todo (fin de encuentro). */
  clear(side: SideKey) {
    for (const kind of this.effects[side].map((e) => e.kind)) this.remove(side, kind);
  }

  // ───────────────── Interacciones puntuales ─────────────────
  /** Escudo de energía: absorbe lo que pueda y devuelve el daño restante. */
  absorb(side: SideKey, damage: number): number {
    const shield = this.effects[side].find((e) => e.kind === "energyShield");
    if (!shield || shield.kind !== "energyShield" || damage <= 0) return damage;
    const taken = Math.min(shield.absorb, damage);
    shield.absorb -= taken;
    if (shield.absorb <= 0) this.remove(side, "energyShield");
    return damage - taken;
  }

  /** Con Will Shield activo, el dolor nuevo se retiene hasta que expire. */
  holdPain(side: SideKey) {
    const att = this.attached[side];
    const imm = this.effects[side].find((e) => e.kind === "painImmunity");
    if (!att || !imm || imm.kind !== "painImmunity" || att.stats.pain <= 0) return;
    imm.storedPain = clamp(imm.storedPain + att.stats.pain, 0, MAX_PAIN);
    att.stats.pain = 0;
    if (att.stats.health > 0) att.stats.isConscious = true;
  }

  // ───────────────── Ronda ─────────────────
  /**
   * Llamar al INICIO de cada ronda: DoT → decremento → expiración (revert) → recálculo.
   * Devuelve los ticks de DoT para que el CombatManager los convierta en eventos.
   */
  onRoundStart(round: number, pushEvent: (e: ExpireEvent) => void = () => {}): DotTickEvent[] {
    const ticks: DotTickEvent[] = [];
    for (const side of ["player", "enemy"] as const) {
      const att = this.attached[side];
      if (!att) continue;

      for (const e of this.effects[side]) {
        if ((e.kind === "poison" || e.kind === "burning") && e.damagePerTurn > 0) {
          const damage = Math.min(att.stats.health, e.damagePerTurn);
          att.stats.health -= damage;
          if (att.stats.health <= 0) att.stats.isConscious = false;
          ticks.push({ victim: side, kind: e.kind, damage, source: e.source });
        }
      }

      for (const e of [...this.effects[side]]) {
        if (e.turnsLeft === null) continue;
        e.turnsLeft -= 1;
        if (e.turnsLeft <= 0) {
          this.remove(side, e.kind);
          pushEvent({ side, kind: e.kind });
          if (DBG) console.log("[STATUS] Expira", { side, kind: e.kind });
        }
      }
    }
    if (DBG) console.log("[STATUS] onRoundStart", { round, player: this.effects.player.length, enemy: this.effects.enemy.length });
    return ticks;
  }

  // ───────────────── Recalculo desde base ─────────────────
  private recompute(side: SideKey) {
    const att = this.attached[side];
    if (!att) return;
    const next: Record<MultiplierKey, number> = { ...att.base };
    let critBonus = 0;
    for (const e of this.effects[side]) {
      const def = EFFECT_CATALOG[e.kind];
      for (const k of MULTIPLIER_KEYS) next[k] *= def.factors?.[k] ?? 1;
      critBonus += def.critBonus ?? 0;
    }
    next.criticalChance += critBonus;
    for (const k of MULTIPLIER_KEYS) att.stats[k] = next[k];
  }

  // ───────────────── Persistencia ─────────────────
  /** Incluye la base de cada bando: al restaurar, los stats ya llevan los factores aplicados. */
  serialize(): SerializedEffects {
    const base: SerializedEffects["base"] = {};
    for (const side of ["player", "enemy"] as const) {
      const b = this.baseOf(side);
      if (b) base[side] = { ...b };
    }
    return { player: this.effects.player.map((e) => ({ ...e })), enemy: this.effects.enemy.map((e) => ({ ...e })), base };
  }

  /** Restaura efectos SIN volver a aplicar sus efectos de entrada (ya están en los stats). */
  hydrate(payload: unknown) {
    const r = readRecord("effects", payload);
    const rawBase = r.base === undefined ? {} : readRecord("effects.base", r.base);
    for (const side of ["player", "enemy"] as const) {
      const att = this.attached[side];
      if (att && rawBase[side] !== undefined) att.base = parseBase(rawBase[side], `effects.base.${side}`);
      const rawList = r[side];
      if (rawList === undefined) continue;
      if (!Array.isArray(rawList)) throw new MalformedCombatDataError(`effects.${side}`, rawList, "se esperaba una lista");
      this.effects[side] = rawList.map((raw, i) => parseEffect(raw, `effects.${side}[${i}]`));
      this.recompute(side);
    }
  }
}

function parseBase(raw: unknown, field: string): Record<MultiplierKey, number> {
  const r = readRecord(field, raw);
  return {
    attackSpeed: readNumber(r, "attackSpeed"),
    damageMultiplier: readNumber(r, "damageMultiplier"),
    defenseMultiplier: readNumber(r, "defenseMultiplier"),
    speedMultiplier: readNumber(r, "speedMultiplier"),
    accuracyMultiplier: readNumber(r, "accuracyMultiplier"),
    criticalChance: readNumber(r, "criticalChance"),
  };
}

function parseEffect(raw: unknown, field: string): CombatEffect {
  const r = readRecord(field, raw);
  const kind = r.kind;
  if (!isEffectKind(kind)) throw new MalformedCombatDataError(`${field}.kind`, kind);
  const source = r.source === "player" || r.source === "enemy" ? r.source : undefined;
  if (kind === "lastStand") return { kind, turnsLeft: null, source };
  const turnsLeft = readNumber(r, "turnsLeft");
  switch (kind) {
    case "painImmunity":
      return { kind, turnsLeft, storedPain: readNumber(r, "storedPain"), source };
    case "energyShield":
      return { kind, turnsLeft, absorb: readNumber(r, "absorb"), source };
    case "poison":
    case "burning":
      return { kind, turnsLeft, damagePerTurn: readNumber(r, "damagePerTurn"), source };
    default:
      return { kind, turnsLeft, source };
  }
}
