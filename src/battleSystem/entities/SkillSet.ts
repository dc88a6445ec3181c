// src/battleSystem/entities/SkillSet.ts
import { MalformedCombatDataError, assertOneOf, readRecord } from "../core/CombatErrors";

export const SKILL_NAMES = ["unarmed", "daggers", "swords", "greatSwords", "axes", "blunt", "polearms", "archery", "defense", "agility"] as const;
export type SkillName = (typeof SKILL_NAMES)[number];

export const MAX_SKILL_LEVEL = 100;

/** Niveles de habilidad 0..100. Lo que no se declaró vale 0. */
export class SkillSet {
  private levels = new Map<SkillName, number>();

  constructor(initial: Partial<Record<SkillName, number>> = {}) {
    for (const name of SKILL_NAMES) {
      const v = initial[name];
      if (v !== undefined) this.set(name, v);
    }
  }

  level(name: SkillName): number {
    return this.levels.get(name) ?? 0;
  }

  set(name: SkillName, value: number): void {
    if (!Number.isFinite(value) || value < 0) throw new MalformedCombatDataError(`skills.${name}`, value);
    this.levels.set(name, Math.min(MAX_SKILL_LEVEL, value));
  }

  improve(name: SkillName, amount: number): number {
    this.set(name, this.level(name) + Math.max(0, amount));
    return this.level(name);
  }

  toData(): Partial<Record<SkillName, number>> {
    const out: Partial<Record<SkillName, number>> = {};
    for (const [k, v] of this.levels) out[k] = v;
    return out;
  }

  static fromData(raw: unknown): SkillSet {
    const r = readRecord("skills", raw);
    const set = new SkillSet();
    for (const [k, v] of Object.entries(r)) {
      const name = assertOneOf(`skills.${k}`, k, SKILL_NAMES);
      if (typeof v !== "number") throw new MalformedCombatDataError(`skills.${k}`, v);
      set.set(name, v);
    }
    return set;
  }
}
