// src/battleSystem/core/CombatMath.ts
// Helpers numéricos puros. Stats, daño y dolor son float; el redondeo a 1 decimal sólo al aplicar daño.

export const clamp = (v: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, v));
export const clamp01 = (v: number) => clamp(v, 0, 1);

/** Redondeo a 1 decimal (daño final). */
export const round1 = (v: number) => Math.round(v * 10) / 10;

/** Fracción 0..1 de actual/máximo; 0 si el máximo no es positivo. */
export const ratio = (current: number, max: number) => (max > 0 ? current / max : 0);

export const isFiniteNumber = (v: unknown): v is number => typeof v === "number" && Number.isFinite(v);
