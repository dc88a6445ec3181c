/* eslint-disable no-console */
// src/battleSystem/duel/duelRunner.ts
import { CombatManager } from "../core/CombatManager";
import type { TurnEvent } from "../core/CombatManager";
import type { CombatEntity } from "../../interfaces/combat/CombatEntity";
import type { SideKey } from "../core/CombatTypes";
import type { EnvironmentModifier } from "../core/EnvironmentModifier";
import { rngFromSeed } from "../core/RngFightSeed";
import { round1 } from "../core/CombatMath";
import type { AiMode } from "../../config/combat";
import { DUEL_DEBUG, DUEL_MAX_TURNS } from "../../config/combat";

/* ───────── Tipos del runner ───────── */
export type TimelineEvent = "hit" | "crit" | "miss" | "evade" | "defend" | "technique" | "buff" | "void" | "dot_tick" | "bleed" | "skip" | "rejected";

export interface TimelineEntry {
  turn: number;
  round: number;
  actor: SideKey;
  event: TimelineEvent;
  damage: number;
  playerHP: number;
  enemyHP: number;
  tags: string[];
}

export interface DuelResult {
  outcome: "win" | "lose" | "draw";
  /** Acciones individuales ejecutadas (ambos bandos). */
  turns: number;
  rounds: number;
  timeline: TimelineEntry[];
  log: string[];
  finalHP: {
    player: number;
    enemy: number;
    playerMax: number;
    enemyMax: number;
  };
}

export interface DuelOptions {
  player: CombatEntity;
  enemy: CombatEntity;
  /** Misma semilla + mismos combatientes ⇒ mismo combate. */
  seed: number | string;
  environment?: EnvironmentModifier;
  maxTurns?: number;
  aiMode?: AiMode;
}

const dbg = (...a: unknown[]) => {
  if (DUEL_DEBUG) console.log(...a);
};

/* ───────── Eventos → timeline ───────── */
type Classified = { actor: SideKey; event: TimelineEvent; damage: number; tags: string[] };

function classify(ev: TurnEvent): Classified | null {
  switch (ev.type) {
    case "attack": {
      if (!ev.strike.outcome.executed) return null;
      const r = ev.strike.outcome.result;
      const event: TimelineEvent = !r.hit ? "miss" : ev.strike.evaded ? "evade" : r.critical ? "crit" : "hit";
      const tags: string[] = [ev.action];
      if (r.bodyPart) tags.push(`part:${r.bodyPart}`);
      if (ev.strike.defense) tags.push(`${ev.strike.defense.action}:${ev.strike.defense.result.success ? "ok" : "fail"}`);
      return { actor: ev.actor, event, damage: ev.strike.damageApplied, tags };
    }
    case "technique":
      return {
        actor: ev.actor,
        event: ev.result.hit ? (ev.result.critical ? "crit" : "technique") : "miss",
        damage: ev.result.damage,
        tags: [`technique:${ev.result.techniqueId}`, ...ev.result.effects],
      };
    case "defend":
      return { actor: ev.actor, event: "defend", damage: 0, tags: [ev.action] };
    case "buff":
      return { actor: ev.actor, event: "buff", damage: 0, tags: [`buff:${ev.buff}`] };
    case "void":
      return { actor: ev.actor, event: "void", damage: ev.result.damage, tags: [`void:${ev.result.abilityId}`] };
    case "dot":
      return { actor: ev.victim, event: "dot_tick", damage: ev.damage, tags: [`dot:${ev.kind}`] };
    case "bleed":
      return { actor: ev.victim, event: "bleed", damage: ev.damage, tags: [] };
    case "skip":
      return { actor: ev.actor, event: "skip", damage: 0, tags: [ev.reason] };
    case "rejected":
      return { actor: ev.actor, event: "rejected", damage: 0, tags: [ev.reason] };
    default:
      return null;
  }
}

function describe(ev: TurnEvent, names: Record<SideKey, string>): string | null {
  switch (ev.type) {
    case "initiative":
      return `${names[ev.firstActor]} acts first. ${ev.result.description}`;
    case "attack":
      return `${names[ev.actor]}: ${ev.description}`;
    case "technique":
      return `${names[ev.actor]}: ${ev.result.description}`;
    case "void":
      return `${names[ev.actor]}: ${ev.result.description}`;
    case "defend":
    case "buff":
    case "skip":
    case "flee":
    case "combo":
      return ev.description;
    case "rejected":
      return `${names[ev.actor]}: ${ev.description}`;
    case "stance":
      return `${names[ev.actor]} switches to a ${ev.stance} stance.`;
    case "dot":
      return `${names[ev.victim]} suffers ${ev.damage.toFixed(1)} ${ev.kind} damage.`;
    case "bleed":
      return `${names[ev.victim]} bleeds for ${ev.damage.toFixed(1)}.`;
    case "expire":
      return `${names[ev.actor]}: ${ev.effect} wears off.`;
    case "lastStand":
      return `${names[ev.actor]} makes a last stand!`;
    case "state":
      return `${names[ev.actor]} is now ${ev.state}.`;
    case "end":
      return `Fight over: ${ev.outcome}.`;
  }
}

/* ───────── Runner ───────── */
/**
 * Duelo automático: ambos bandos los decide la IA, ronda a ronda, en el orden
 * de iniciativa. Termina por KO o por el límite de turnos (empate).
 */
export function runDuel(opts: DuelOptions): DuelResult {
  const { player, enemy, seed } = opts;
  const maxTurns = Math.max(1, Math.floor(opts.maxTurns ?? DUEL_MAX_TURNS));
  const rng = rngFromSeed(seed);
  dbg(`[DUEL] seed=${seed} maxTurns=${maxTurns} ${player.id} vs ${enemy.id}`);

  const cm = new CombatManager(player, enemy, { rng, environment: opts.environment, aiMode: opts.aiMode });
  const names: Record<SideKey, string> = { player: player.name, enemy: enemy.name };

  const timeline: TimelineEntry[] = [];
  const log: string[] = [];
  let turn = 0;
  let endReason: "ko" | "flee" | "limit" = "ko";

  const hp = (c: CombatEntity) => round1(Math.max(0, c.stats().health));
  const record = (events: TurnEvent[]) => {
    for (const ev of events) {
      const line = describe(ev, names);
      if (line) log.push(line);
      const c = classify(ev);
      if (!c) continue;
      timeline.push({ turn, round: cm.round, actor: c.actor, event: c.event, damage: round1(c.damage), playerHP: hp(player), enemyHP: hp(enemy), tags: c.tags });
    }
  };

  record(cm.start());

  duel: while (!cm.isOver()) {
    record(cm.startRound());
    const order: SideKey[] = cm.initiativeWinner === "player" ? ["player", "enemy"] : ["enemy", "player"];
    for (const side of order) {
      if (cm.isOver()) break duel;
      if (turn >= maxTurns) {
        endReason = "limit";
        dbg(`[DUEL] límite de turnos alcanzado (${maxTurns})`);
        break duel;
      }
      turn++;
      record(cm.aiTurn(side));
    }
  }

  const outcome: DuelResult["outcome"] = cm.outcome === "victory" ? "win" : cm.outcome === "defeat" ? "lose" : "draw";
  if (cm.outcome === "flee") endReason = "flee";

  const finalHP = {
    player: hp(player),
    enemy: hp(enemy),
    playerMax: player.stats().maxHealth,
    enemyMax: enemy.stats().maxHealth,
  };

  if (DUEL_DEBUG) {
    const counts = timeline.reduce<Partial<Record<TimelineEvent, number>>>((m, e) => {
      m[e.event] = (m[e.event] ?? 0) + 1;
      return m;
    }, {});
    console.log(`[DUEL] result outcome=${outcome} end=${endReason} turns=${turn} rounds=${cm.round} pHP=${finalHP.player} eHP=${finalHP.enemy}`, counts);
  }

  return { outcome, turns: turn, rounds: cm.round, timeline, log, finalHP };
}
