import type { Rng } from "../../src/battleSystem/core/RngFightSeed";

export type ScriptedRng = Rng & { remaining(): number };

/** Devuelve los sorteos en orden; si el código pide uno de más, falla. */
export function scriptedRng(values: readonly number[]): ScriptedRng {
  let i = 0;
  const rng = () => {
    const v = values[i];
    if (v === undefined) throw new Error(`scriptedRng: sin sorteos (se pidieron ${i + 1})`);
    i++;
    return v;
  };
  return Object.assign(rng, { remaining: () => values.length - i });
}

/** Siempre el mismo valor (para bucles largos). */
export const constantRng = (v: number): Rng => () => v;
