// src/battleSystem/core/CombatantMemory.ts
// Memoria acotada de lo que hizo el rival. Alimenta la IA (tendencia defensiva) y los combos.
import type { CombatAction } from "./CombatTypes";
import { COMBAT_ACTIONS, isDefenseAction } from "./CombatTypes";
import { assertOneOf, readNumber, readRecord, readStringArray } from "./CombatErrors";

export const MEMORY_CAPACITY = 20;

export interface PatternAnalysis {
  mostCommonAction: CombatAction | null;
  actionVariety: number;
  /** Fracción (0..1) de acciones defensivas observadas. */
  defensiveTendency: number;
  discoveredWeaknesses: string[];
}

export interface CombatantMemoryData {
  capacity: number;
  observed: CombatAction[];
  weaknesses: string[];
  lastDamageTaken: number;
  lastDamageDealt: number;
}

export class CombatantMemory {
  private buffer: CombatAction[] = [];
  private counts = new Map<CombatAction, number>();
  private weaknesses = new Set<string>();
  public lastDamageTaken = 0;
  public lastDamageDealt = 0;

  constructor(public readonly capacity = MEMORY_CAPACITY) {}

  /** Registra una acción; si el buffer está lleno descarta la más vieja (y su conteo). */
  observe(action: CombatAction): void {
    this.buffer.push(action);
    this.counts.set(action, (this.counts.get(action) ?? 0) + 1);
    if (this.buffer.length > this.capacity) {
      const dropped = this.buffer.shift();
      if (dropped !== undefined) {
        const left = (this.counts.get(dropped) ?? 1) - 1;
        if (left <= 0) this.counts.delete(dropped);
        else this.counts.set(dropped, left);
      }
    }
  }

  discoverWeakness(tag: string): void {
    this.weaknesses.add(tag);
  }

  recent(): readonly CombatAction[] {
    return this.buffer;
  }

  lastAction(): CombatAction | null {
    return this.buffer[this.buffer.length - 1] ?? null;
  }

  frequency(action: CombatAction): number {
    return this.counts.get(action) ?? 0;
  }

  analyzePatterns(): PatternAnalysis {
    let mostCommonAction: CombatAction | null = null;
    let best = 0;
    // primer máximo en orden de aparición en el buffer
    for (const a of this.buffer) {
      const n = this.counts.get(a) ?? 0;
      if (n > best) {
        best = n;
        mostCommonAction = a;
      }
    }
    const defensive = this.buffer.filter(isDefenseAction).length;
    return {
      mostCommonAction,
      actionVariety: this.counts.size,
      defensiveTendency: this.buffer.length ? defensive / this.buffer.length : 0,
      discoveredWeaknesses: [...this.weaknesses],
    };
  }

  toData(): CombatantMemoryData {
    return {
      capacity: this.capacity,
      observed: [...this.buffer],
      weaknesses: [...this.weaknesses],
      lastDamageTaken: this.lastDamageTaken,
      lastDamageDealt: this.lastDamageDealt,
    };
  }

  static fromData(raw: unknown): CombatantMemory {
    const r = readRecord("memory", raw);
    const mem = new CombatantMemory(Math.max(1, Math.floor(readNumber(r, "capacity"))));
    for (const [i, a] of readStringArray(r, "observed").entries()) mem.observe(assertOneOf(`observed[${i}]`, a, COMBAT_ACTIONS));
    for (const w of readStringArray(r, "weaknesses")) mem.discoverWeakness(w);
    mem.lastDamageTaken = readNumber(r, "lastDamageTaken");
    mem.lastDamageDealt = readNumber(r, "lastDamageDealt");
    return mem;
  }
}
