// src/battleSystem/core/CombatManager.ts
/* eslint-disable no-console */
// Orquestador del encuentro: inicio de ronda (efectos, sangrado, stamina, enfriamientos),
// turnos por comando o por IA, y cierre con una única señal de fin.
import type { CombatEntity } from "../../interfaces/combat/CombatEntity";
import type { AttackAction, BodyPart, CombatStance, DefenseAction, InitiativeResult, SideKey } from "./CombatTypes";
import { isDefenseAction } from "./CombatTypes";
import type { RejectReason } from "./CombatErrors";
import type { Rng } from "./RngFightSeed";
import { DamageResolver } from "./DamageResolver";
import { EnvironmentModifier } from "./EnvironmentModifier";
import { StatusEngine } from "./StatusEngine";
import type { DotTickEvent } from "./StatusEngine";
import { ComboTracker, TechniqueEngine, TECHNIQUES } from "./TechniqueEngine";
import type { CombatTechnique, TechniqueResult } from "./TechniqueEngine";
import { VoidAbilityEngine } from "./VoidAbilities";
import type { VoidCastResult } from "./VoidAbilities";
import { computeCharacterState, isIncapacitated } from "./CharacterState";
import type { CharacterState } from "./CharacterState";
import { recoverStamina } from "./PainEngine";
import { ratio } from "./CombatMath";
import { ACTION_LABEL, TEXT } from "./CombatFlavor";
import { resolveStrike } from "./combatManager/resolveStrike";
import type { StrikeResult } from "./combatManager/resolveStrike";
import { combatantInitiative } from "./combatManager/stats";
import { AIDecisionEngine } from "../ai/AIDecisionEngine";
import type { AIDecision } from "../ai/AIDecisionEngine";
import { EFFECT_CATALOG } from "../constants/status";
import type { EffectKind, SelfBuff } from "../constants/status";
import type { VoidAbilityId } from "../constants/voidAbilities";
import { LAST_STAND_HEALTH_FRACTION } from "./StatusEngine";
import type { AiMode } from "../../config/combat";
import { COMBAT_DEBUG } from "../../config/combat";

const DBG = COMBAT_DEBUG;

/** Segundos de combate que representa una ronda (regeneración de stamina). */
export const ROUND_SECONDS = 6;

export type EncounterOutcome = "victory" | "defeat" | "flee";

export interface EncounterListener {
  onEncounterStart?(info: { player: string; enemy: string; firstActor: SideKey }): void;
  onEncounterEnd?(outcome: EncounterOutcome): void;
}

export type PlayerCommand =
  | { type: "attack"; action: AttackAction; targetPart?: BodyPart }
  | { type: "defend"; action: DefenseAction }
  | { type: "technique"; id: string }
  | { type: "buff"; buff: SelfBuff }
  | { type: "void"; ability: VoidAbilityId }
  | { type: "stance"; stance: CombatStance }
  | { type: "flee" };

export type TurnEvent =
  | { type: "initiative"; firstActor: SideKey; result: InitiativeResult }
  | { type: "skip"; actor: SideKey; reason: "stunned" | "unconscious"; description: string }
  | { type: "attack"; actor: SideKey; action: AttackAction; strike: StrikeResult; description: string }
  | { type: "defend"; actor: SideKey; action: DefenseAction; description: string }
  | { type: "technique"; actor: SideKey; result: TechniqueResult }
  | { type: "buff"; actor: SideKey; buff: SelfBuff; description: string }
  | { type: "void"; actor: SideKey; result: VoidCastResult }
  | { type: "stance"; actor: SideKey; stance: CombatStance }
  | { type: "rejected"; actor: SideKey; reason: RejectReason; description: string }
  | { type: "dot"; victim: SideKey; kind: DotTickEvent["kind"]; damage: number }
  | { type: "bleed"; victim: SideKey; damage: number }
  | { type: "expire"; actor: SideKey; effect: EffectKind }
  | { type: "lastStand"; actor: SideKey }
  | { type: "combo"; actor: SideKey; techniqueId: string; description: string }
  | { type: "state"; actor: SideKey; state: CharacterState }
  | { type: "flee"; actor: SideKey; description: string }
  | { type: "end"; outcome: EncounterOutcome };

export interface CombatManagerOptions {
  rng: Rng;
  environment?: EnvironmentModifier;
  listener?: EncounterListener;
  aiMode?: AiMode;
  techniques?: readonly CombatTechnique[];
}

const other = (side: SideKey): SideKey => (side === "player" ? "enemy" : "player");

export class CombatManager {
  public readonly resolver: DamageResolver;
  public readonly status: StatusEngine;
  public readonly techniques: TechniqueEngine;
  public readonly voidAbilities: VoidAbilityEngine;
  public readonly combos: ComboTracker;
  public readonly ai: AIDecisionEngine;

  private rng: Rng;
  private listener: EncounterListener;
  private rounds = 0;
  private started = false;
  private firstActor: SideKey = "player";
  private result: EncounterOutcome | null = null;
  private states: Record<SideKey, CharacterState>;

  constructor(
    public readonly player: CombatEntity,
    public readonly enemy: CombatEntity,
    opts: CombatManagerOptions
  ) {
    this.rng = opts.rng;
    this.listener = opts.listener ?? {};
    const environment = opts.environment ?? new EnvironmentModifier();
    const catalog = opts.techniques ?? TECHNIQUES;

    this.resolver = new DamageResolver({ rng: this.rng, environment });
    this.status = new StatusEngine(this.rng);
    this.status.attach("player", player.stats());
    this.status.attach("enemy", enemy.stats());
    this.techniques = new TechniqueEngine({ rng: this.rng, environment, status: this.status }, catalog);
    this.voidAbilities = new VoidAbilityEngine(this.status);
    this.combos = new ComboTracker(catalog);
    this.ai = new AIDecisionEngine({ rng: this.rng, mode: opts.aiMode, techniques: catalog });

    this.states = { player: this.computeState("player"), enemy: this.computeState("enemy") };
  }

  // ───────────────── Consultas ─────────────────
  entity(side: SideKey): CombatEntity {
    return side === "player" ? this.player : this.enemy;
  }

  get round(): number {
    return this.rounds;
  }

  get outcome(): EncounterOutcome | null {
    return this.result;
  }

  get initiativeWinner(): SideKey {
    return this.firstActor;
  }

  stateOf(side: SideKey): CharacterState {
    return this.states[side];
  }

  isOver(): boolean {
    return this.result !== null;
  }

  // ───────────────── Ciclo ─────────────────
  /** Iniciativa (empate → enemigo) y señal de inicio. Idempotente. */
  start(): TurnEvent[] {
    if (this.started) return [];
    this.started = true;

    const pScore = combatantInitiative(this.player, this.rng);
    const eScore = combatantInitiative(this.enemy, this.rng);
    const result = this.resolver.calculateInitiative(this.player.stats(), this.enemy.stats(), pScore, eScore);
    this.firstActor = result.attackerFirst ? "player" : "enemy";

    if (DBG) console.log("[COMBAT] start", { player: this.player.id, enemy: this.enemy.id, firstActor: this.firstActor });
    this.listener.onEncounterStart?.({ player: this.player.name, enemy: this.enemy.name, firstActor: this.firstActor });
    return [{ type: "initiative", firstActor: this.firstActor, result }];
  }

  /** Inicio de ronda: DoT/expiración → sangrado → stamina → enfriamientos y ventanas de combo. */
  startRound(): TurnEvent[] {
    const events = this.start();
    if (this.result) return events;
    this.rounds++;

    const ticks = this.status.onRoundStart(this.rounds, (e) => events.push({ type: "expire", actor: e.side, effect: e.kind }));
    for (const t of ticks) events.push({ type: "dot", victim: t.victim, kind: t.kind, damage: t.damage });

    for (const side of ["player", "enemy"] as const) {
      const s = this.entity(side).stats();
      if (s.isBleeding && s.totalBleedingRate > 0 && s.health > 0) {
        const damage = Math.min(s.health, s.totalBleedingRate);
        s.health -= damage;
        if (s.health <= 0) s.isConscious = false;
        events.push({ type: "bleed", victim: side, damage });
      }
      recoverStamina(s, false, ROUND_SECONDS);
    }

    this.voidAbilities.tickCooldowns();
    this.combos.tickWindows();

    this.settle(events);
    return events;
  }

  playerTurn(command: PlayerCommand): TurnEvent[] {
    return this.act("player", command);
  }

  /** Turno del enemigo decidido por la IA. */
  enemyTurn(): TurnEvent[] {
    return this.aiTurn("enemy");
  }

  /** Turno de cualquier bando decidido por la IA (duelos automáticos). */
  aiTurn(side: SideKey): TurnEvent[] {
    if (this.result) return [];
    const decision = this.ai.decide(this.entity(side), this.entity(other(side)));
    return this.act(side, decisionToCommand(decision));
  }

  /** victory / defeat / null. Ambos caídos cuenta como derrota. */
  checkOutcome(): "victory" | "defeat" | null {
    if (isIncapacitated(this.player.stats(), this.computeState("player"))) return "defeat";
    if (isIncapacitated(this.enemy.stats(), this.computeState("enemy"))) return "victory";
    return null;
  }

  // ───────────────── Turno ─────────────────
  act(side: SideKey, command: PlayerCommand): TurnEvent[] {
    const events = this.start();
    if (this.result) return events;

    const actor = this.entity(side);
    const target = this.entity(other(side));
    const s = actor.stats();

    if (s.isStunned) {
      if (s.stunDuration > 0) {
        s.stunDuration -= 1;
        if (s.stunDuration <= 0) s.isStunned = false;
        events.push({ type: "skip", actor: side, reason: "stunned", description: `${actor.name} ${TEXT.stunnedSkip}` });
        this.settle(events);
        return events;
      }
      s.isStunned = false;
    }

    if (!s.isConscious) {
      events.push({ type: "skip", actor: side, reason: "unconscious", description: `${actor.name} ${TEXT.unconsciousSkip}` });
      this.settle(events);
      return events;
    }

    let step: string | null = null;
    switch (command.type) {
      case "flee":
        events.push({ type: "flee", actor: side, description: `${actor.name} flees the fight.` });
        this.finish("flee", events);
        return events;

      case "stance":
        actor.stance = command.stance;
        events.push({ type: "stance", actor: side, stance: command.stance });
        break;

      case "defend":
        actor.defensiveAction = command.action;
        target.stats().memory.observe(command.action);
        events.push({ type: "defend", actor: side, action: command.action, description: `${actor.name} prepares to ${ACTION_LABEL[command.action]}.` });
        step = command.action;
        break;

      case "attack": {
        const strike = resolveStrike(actor, target, command.action, { resolver: this.resolver, status: this.status, sides: { attacker: side, defender: other(side) } }, { targetPart: command.targetPart });
        if (!strike.outcome.executed) {
          events.push({ type: "rejected", actor: side, reason: strike.outcome.reason, description: strike.outcome.description });
          break;
        }
        events.push({ type: "attack", actor: side, action: command.action, strike, description: strikeDescription(strike) });
        step = command.action;
        break;
      }

      case "technique": {
        const out = this.techniques.execute(actor, target, command.id, other(side));
        if (!out.executed) {
          events.push({ type: "rejected", actor: side, reason: out.reason, description: out.description });
          break;
        }
        target.stats().memory.observe("basic");
        this.status.holdPain(other(side));
        events.push({ type: "technique", actor: side, result: out.result });
        step = out.result.techniqueId;
        break;
      }

      case "buff": {
        const rejected = this.activateBuff(side, command.buff);
        if (rejected) events.push({ type: "rejected", actor: side, reason: rejected, description: `${actor.name} cannot use ${EFFECT_CATALOG[command.buff].name}.` });
        else events.push({ type: "buff", actor: side, buff: command.buff, description: `${actor.name} activates ${EFFECT_CATALOG[command.buff].name}.` });
        break;
      }

      case "void": {
        const out = this.voidAbilities.cast({ entity: actor, side }, { entity: target, side: other(side) }, command.ability);
        if (out.executed) events.push({ type: "void", actor: side, result: out.result });
        else events.push({ type: "rejected", actor: side, reason: out.reason, description: out.description });
        break;
      }
    }

    if (step !== null) {
      const combo = this.combos.checkComboOpportunity(actor.id, step);
      if (combo) events.push({ type: "combo", actor: side, techniqueId: combo.id, description: `Combo available: ${combo.name}!` });
    }

    this.settle(events);
    return events;
  }

  // ───────────────── Internos ─────────────────
  private activateBuff(side: SideKey, buff: SelfBuff): RejectReason | null {
    const actor = this.entity(side);
    const s = actor.stats();
    const cost = EFFECT_CATALOG[buff].staminaCost ?? 0;
    if (!actor.knownBuffs.includes(buff)) return "requirements_not_met";
    if (buff === "lastStand" && ratio(s.health, s.maxHealth) >= LAST_STAND_HEALTH_FRACTION) return "requirements_not_met";
    if (s.stamina < cost) return "insufficient_stamina";
    s.stamina -= cost;
    this.status.apply(side, buff, { source: side });
    return null;
  }

  /** Tras cada paso: Last Stand automático, inmunidad a aturdimiento, estados y fin. */
  private settle(events: TurnEvent[]) {
    for (const side of ["player", "enemy"] as const) {
      const c = this.entity(side);
      const s = c.stats();
      if (c.knownBuffs.includes("lastStand") && !this.status.has(side, "lastStand") && s.health > 0) {
        if (this.status.apply(side, "lastStand", { source: side }).applied) events.push({ type: "lastStand", actor: side });
      }
      if (this.status.has(side, "lastStand")) {
        s.isStunned = false;
        s.stunDuration = 0;
      }

      const state = this.computeState(side);
      if (state !== this.states[side]) {
        this.states[side] = state;
        events.push({ type: "state", actor: side, state });
      }
    }

    const outcome = this.checkOutcome();
    if (outcome) this.finish(outcome, events);
  }

  private finish(outcome: EncounterOutcome, events: TurnEvent[]) {
    if (this.result) return;
    this.result = outcome;
    this.status.clear("player");
    this.status.clear("enemy");
    if (DBG) console.log("[COMBAT] end", { outcome, rounds: this.rounds });
    this.listener.onEncounterEnd?.(outcome);
    events.push({ type: "end", outcome });
  }

  private computeState(side: SideKey): CharacterState {
    const c = this.entity(side);
    return computeCharacterState(c.stats(), c.injuries().all());
  }
}

export function decisionToCommand(d: AIDecision): PlayerCommand {
  if (d.technique) return { type: "technique", id: d.technique.id };
  if (isDefenseAction(d.action)) return { type: "defend", action: d.action };
  return { type: "attack", action: d.action };
}

function strikeDescription(s: StrikeResult): string {
  if (!s.outcome.executed) return s.outcome.description;
  const parts = [s.outcome.result.description];
  if (s.evaded) parts.push("The blow passes through empty air.");
  if (s.defense) parts.push(s.defense.result.success ? `${capitalize(ACTION_LABEL[s.defense.action])} succeeds.` : `${capitalize(ACTION_LABEL[s.defense.action])} fails.`);
  if (s.absorbed > 0) parts.push(`The shield absorbs ${s.absorbed.toFixed(1)}.`);
  if (s.effectsText) parts.push(s.effectsText);
  return parts.join(" ");
}

const capitalize = (t: string) => t.charAt(0).toUpperCase() + t.slice(1);
