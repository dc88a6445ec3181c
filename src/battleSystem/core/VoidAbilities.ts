// src/battleSystem/core/VoidAbilities.ts
/* eslint-disable no-console */
import type { CombatEntity } from "../../interfaces/combat/CombatEntity";
import type { SideKey } from "./CombatTypes";
import type { RejectReason } from "./CombatErrors";
import type { StatusEngine } from "./StatusEngine";
import type { EffectKind } from "../constants/status";
import { VOID_ABILITIES, isVoidAbilityId } from "../constants/voidAbilities";
import type { VoidAbilityId } from "../constants/voidAbilities";
import { clamp } from "./CombatMath";
import { MAX_PAIN } from "./CombatConfig";
import { shouldFallUnconscious } from "./PainEngine";
import { COMBAT_DEBUG } from "../../config/combat";

const DBG = COMBAT_DEBUG;

export interface VoidCastResult {
  abilityId: VoidAbilityId;
  damage: number;
  healed: number;
  painTaken: number;
  effect: EffectKind | null;
  description: string;
}

export type VoidCastOutcome = { executed: true; result: VoidCastResult } | { executed: false; reason: RejectReason; description: string };

export type VoidCaster = { entity: CombatEntity; side: SideKey };

/**
 * Gating + ejecución de habilidades del vacío y sus enfriamientos por combatiente.
 * Orden de validación: id → desbloqueo/nivel → enfriamiento → energía. Nada se muta si falla.
 */
export class VoidAbilityEngine {
  private cooldowns = new Map<string, Map<VoidAbilityId, number>>();

  constructor(private status: StatusEngine) {}

  cooldownOf(casterId: string, id: VoidAbilityId): number {
    return this.cooldowns.get(casterId)?.get(id) ?? 0;
  }

  /** ¿Se podría lanzar ahora? null si sí; si no, la razón. */
  check(caster: CombatEntity, abilityId: string): RejectReason | null {
    if (!isVoidAbilityId(abilityId)) return "unknown_technique";
    const def = VOID_ABILITIES[abilityId];
    if (!caster.voidAbilities.includes(abilityId) || caster.level < def.levelRequirement) return "requirements_not_met";
    if (this.cooldownOf(caster.id, abilityId) > 0) return "on_cooldown";
    if (caster.stats().voidEnergy < def.energyCost) return "insufficient_void_energy";
    return null;
  }

  cast(caster: VoidCaster, target: VoidCaster, abilityId: string): VoidCastOutcome {
    const reason = this.check(caster.entity, abilityId);
    if (reason !== null || !isVoidAbilityId(abilityId)) {
      const why = reason ?? "unknown_technique";
      if (DBG) console.log("[COMBAT] void rechazada", { caster: caster.entity.id, abilityId, reason: why });
      return { executed: false, reason: why, description: `Cannot use ${abilityId} (${why}).` };
    }

    const def = VOID_ABILITIES[abilityId];
    const cs = caster.entity.stats();
    const ts = target.entity.stats();

    // el vacío siempre cobra en dolor
    const painBefore = cs.pain;
    cs.pain = clamp(cs.pain + def.painIncrease, 0, MAX_PAIN);
    const painTaken = cs.pain - painBefore;
    cs.voidEnergy -= def.energyCost;

    const parts: string[] = [];
    let damage = 0;
    if (def.damage) {
      damage = Math.min(ts.health, def.damage);
      ts.health -= damage;
      ts.memory.lastDamageTaken = damage;
      cs.memory.lastDamageDealt = damage;
      if (ts.health <= 0) ts.isConscious = false;
      parts.push(`${def.damage} void damage!`);
    }

    let healed = 0;
    if (def.heal) {
      const before = cs.health;
      cs.health = Math.min(cs.maxHealth, cs.health + def.heal);
      healed = cs.health - before;
      parts.push(`Heals ${healed} health.`);
    }

    let effect: EffectKind | null = null;
    if (def.effect) {
      const side = def.effect.on === "self" ? caster.side : target.side;
      const applied = this.status.apply(side, def.effect.kind, { turns: def.effect.turns, source: caster.side });
      if (applied.applied) effect = def.effect.kind;
    }

    this.status.holdPain(caster.side);
    if (shouldFallUnconscious(cs)) cs.isConscious = false;

    this.setCooldown(caster.entity.id, abilityId, def.cooldown);

    if (DBG) console.log("[COMBAT] void", { caster: caster.entity.id, abilityId, damage, healed, effect, pain: cs.pain });
    return {
      executed: true,
      result: {
        abilityId,
        damage,
        healed,
        painTaken,
        effect,
        description: `${def.name}: ${parts.length ? parts.join(" ") : def.description}`,
      },
    };
  }

  /** Una ronda menos para todos; los que llegan a 0 se liberan. */
  tickCooldowns(): void {
    for (const map of this.cooldowns.values()) {
      for (const [id, left] of map) {
        if (left <= 1) map.delete(id);
        else map.set(id, left - 1);
      }
    }
  }

  private setCooldown(casterId: string, id: VoidAbilityId, rounds: number) {
    let map = this.cooldowns.get(casterId);
    if (!map) {
      map = new Map();
      this.cooldowns.set(casterId, map);
    }
    map.set(id, rounds);
  }
}
