// src/battleSystem/core/EnvironmentModifier.ts
// Factores de escena → deltas aditivos SIN acotar. El resolver los suma tal cual.

export const ENVIRONMENT_FACTORS = ["darkness", "slippery", "narrowSpace", "unevenGround", "fog", "rain", "wind", "height", "water"] as const;
export type EnvironmentFactor = (typeof ENVIRONMENT_FACTORS)[number];

export interface EnvironmentDeltas {
  accuracy: number;
  damage: number;
  defense: number;
  movement: number;
}

const NO_DELTAS: EnvironmentDeltas = { accuracy: 0, damage: 0, defense: 0, movement: 0 };

export const FACTOR_DELTAS: Record<EnvironmentFactor, Partial<EnvironmentDeltas>> = {
  darkness: { accuracy: -0.3, defense: -0.2 },
  slippery: { movement: -0.3, defense: -0.15 },
  narrowSpace: { movement: -0.2, accuracy: -0.1 }, // castiga armas largas
  unevenGround: { movement: -0.2 },
  fog: { accuracy: -0.2 },
  rain: { accuracy: -0.1, damage: -0.1 },
  wind: { accuracy: -0.15 }, // sobre todo arqueros
  height: { damage: 0.1, defense: 0.1 },
  water: { movement: -0.25, defense: -0.1 },
};

const ALIASES: Record<string, EnvironmentFactor> = {
  dark: "darkness",
  darkness: "darkness",
  wet: "slippery",
  slippery: "slippery",
  ice: "slippery",
  narrow: "narrowSpace",
  narrow_space: "narrowSpace",
  narrowspace: "narrowSpace",
  corridor: "narrowSpace",
  uneven: "unevenGround",
  uneven_ground: "unevenGround",
  unevenground: "unevenGround",
  rubble: "unevenGround",
  fog: "fog",
  mist: "fog",
  rain: "rain",
  wind: "wind",
  height: "height",
  high_ground: "height",
  water: "water",
  shallows: "water",
};

/** Nombre libre → factor. null si no se reconoce. */
export function parseEnvironmentFactor(name: string): EnvironmentFactor | null {
  const key = name.trim().toLowerCase().replace(/[\s-]+/g, "_");
  return ALIASES[key] ?? null;
}

export class EnvironmentModifier {
  private active = new Set<EnvironmentFactor>();

  constructor(factors: Iterable<EnvironmentFactor> = []) {
    for (const f of factors) this.active.add(f);
  }

  add(factor: EnvironmentFactor): this {
    this.active.add(factor);
    return this;
  }

  remove(factor: EnvironmentFactor): this {
    this.active.delete(factor);
    return this;
  }

  has(factor: EnvironmentFactor): boolean {
    return this.active.has(factor);
  }

  factors(): EnvironmentFactor[] {
    return ENVIRONMENT_FACTORS.filter((f) => this.active.has(f));
  }

  /** Suma aditiva de todos los factores activos. */
  modifiers(): EnvironmentDeltas {
    const out = { ...NO_DELTAS };
    for (const f of this.factors()) {
      const d = FACTOR_DELTAS[f];
      out.accuracy += d.accuracy ?? 0;
      out.damage += d.damage ?? 0;
      out.defense += d.defense ?? 0;
      out.movement += d.movement ?? 0;
    }
    return out;
  }
}
