// src/battleSystem/core/RngFightSeed.ts
// Única fuente de azar del núcleo. Todo resolver recibe un `Rng` explícito (nada de Math.random).
// Los tests inyectan secuencias guionadas; los duelos, una semilla.

export type Rng = () => number;

/** FNV-1a de 32 bits: texto → semilla. */
export function seedFromText(text: string): number {
  let h = 0x811c9dc5;
  for (const ch of text) {
    h ^= ch.codePointAt(0) ?? 0;
    h = Math.imul(h, 0x01000193) >>> 0;
  }
  return h;
}

/** Mulberry32 en [0,1). La semilla 0 se trata como 1. */
export function mulberry32(seed: number): Rng {
  let state = seed >>> 0 || 1;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let x = Math.imul(state ^ (state >>> 15), state | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 0x100000000;
  };
}

/** Semilla numérica o texto (id de encuentro, nombre de arena…). */
export function rngFromSeed(seed: number | string): Rng {
  return mulberry32(typeof seed === "string" ? seedFromText(seed) : seed);
}

/** Entero en [min, max] inclusive; un sorteo. */
export function rollInt(rng: Rng, min: number, max: number): number {
  const lo = Math.floor(Math.min(min, max));
  const hi = Math.floor(Math.max(min, max));
  return Math.min(hi, lo + Math.floor(rng() * (hi - lo + 1)));
}

/** Float uniforme en [min, max). */
export function rollFloat(rng: Rng, min: number, max: number): number {
  return min + rng() * (max - min);
}

/** Un elemento al azar; con la lista vacía no sortea y devuelve null. */
export function pickOne<T>(rng: Rng, items: readonly T[]): T | null {
  if (items.length === 0) return null;
  return items[Math.min(items.length - 1, Math.floor(rng() * items.length))] ?? null;
}
