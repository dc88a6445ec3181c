// src/battleSystem/ai/AIDecisionEngine.ts
/* eslint-disable no-console */
/**
 * Decisión de NPCs.
 * - "table": patrón por arquetipo (retirada → adaptación → ataque/defensa/otras).
 * - "simple": cadena fija sin sorteos (arquero → básico, berserker → fuerte, <25% vida → bloqueo).
 *
 * Orden de sorteos en "table":
 *   [retirada] → tirada principal → [uso de técnica → elección de técnica] → elección de acción
 */
import type { CombatEntity } from "../../interfaces/combat/CombatEntity";
import type { AttackAction, CombatAction, DefenseAction } from "../core/CombatTypes";
import type { Rng } from "../core/RngFightSeed";
import { pickOne } from "../core/RngFightSeed";
import { ratio } from "../core/CombatMath";
import { TECHNIQUES } from "../core/TechniqueEngine";
import type { CombatTechnique } from "../core/TechniqueEngine";
import { weaponSkill } from "../core/combatManager/stats";
import {
  ADAPTIVE_ATTACK_BOOST,
  ADAPTIVE_DEFENSIVE_TENDENCY,
  AI_STRONG_ATTACK_STAMINA,
  ARCHETYPE_PATTERNS,
  DEFAULT_ARCHETYPE,
  RETREAT_DODGE_CHANCE,
  SIMPLE_MODE_BLOCK_HEALTH,
} from "../constants/archetypes";
import type { ArchetypePattern } from "../constants/archetypes";
import { AI_MODE, COMBAT_DEBUG } from "../../config/combat";
import type { AiMode } from "../../config/combat";

const DBG = COMBAT_DEBUG;

export interface AIDecision {
  action: CombatAction;
  technique: CombatTechnique | null;
}

export interface AIDecisionEngineOptions {
  rng: Rng;
  mode?: AiMode;
  techniques?: readonly CombatTechnique[];
}

const HEAVY_OR_BASIC: readonly AttackAction[] = ["basic", "strong"];
const DEFENSES: readonly DefenseAction[] = ["block", "parry", "dodge"];
const OTHERS: readonly AttackAction[] = ["feint", "kick"];

export class AIDecisionEngine {
  public readonly mode: AiMode;
  private rng: Rng;
  private techniques: readonly CombatTechnique[];

  constructor(opts: AIDecisionEngineOptions) {
    this.rng = opts.rng;
    this.mode = opts.mode ?? AI_MODE;
    this.techniques = opts.techniques ?? TECHNIQUES;
  }

  patternFor(npc: CombatEntity): ArchetypePattern {
    return ARCHETYPE_PATTERNS[npc.archetype ?? DEFAULT_ARCHETYPE];
  }

  decide(npc: CombatEntity, opponent: CombatEntity): AIDecision {
    const d = this.mode === "simple" ? this.decideSimple(npc) : this.decideTable(npc);
    if (DBG) console.log("[AI] decide", { npc: npc.id, vs: opponent.id, mode: this.mode, action: d.action, technique: d.technique?.id ?? null });
    return d;
  }

  private decideSimple(npc: CombatEntity): AIDecision {
    const s = npc.stats();
    if (npc.archetype === "archer" && npc.weapon()?.isRanged()) return { action: "basic", technique: null };
    if (npc.archetype === "berserker") return { action: "strong", technique: null };
    if (ratio(s.health, s.maxHealth) < SIMPLE_MODE_BLOCK_HEALTH) return { action: "block", technique: null };
    return { action: "basic", technique: null };
  }

  private decideTable(npc: CombatEntity): AIDecision {
    const s = npc.stats();
    const pattern = this.patternFor(npc);

    if (ratio(s.health, s.maxHealth) * 100 < pattern.retreatThreshold && this.rng() < RETREAT_DODGE_CHANCE) {
      return { action: "dodge", technique: null };
    }

    let attackProbability = pattern.attackProbability;
    // lo que el NPC vio hacer a su rival
    if (pattern.adaptsToPlayer && s.memory.analyzePatterns().defensiveTendency > ADAPTIVE_DEFENSIVE_TENDENCY) {
      attackProbability *= ADAPTIVE_ATTACK_BOOST;
    }

    const roll = this.rng();
    if (roll < attackProbability) {
      if (this.rng() < pattern.techniqueUsage && npc.weapon()) {
        const skill = weaponSkill(npc);
        const usable = this.techniques.filter((t) => t.canExecute(skill, s.stamina, npc.weapon()));
        const technique = pickOne(this.rng, usable);
        if (technique) return { action: "basic", technique };
      }
      if (s.stamina > AI_STRONG_ATTACK_STAMINA) return { action: pickOne(this.rng, HEAVY_OR_BASIC) ?? "basic", technique: null };
      return { action: "fast", technique: null };
    }

    if (roll < attackProbability + pattern.defenseProbability) {
      return { action: pickOne(this.rng, DEFENSES) ?? "block", technique: null };
    }

    return { action: pickOne(this.rng, OTHERS) ?? "feint", technique: null };
  }
}
