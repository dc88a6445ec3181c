// src/battleSystem/core/CombatErrors.ts
// Único error que se propaga: datos mal formados al construir/deserializar.
// Recursos insuficientes o técnicas inválidas NO son errores: van como resultado (`executed: false`).

export class MalformedCombatDataError extends Error {
  constructor(
    public readonly field: string,
    public readonly value: unknown,
    detail?: string
  ) {
    super(`Dato de combate inválido en "${field}": ${JSON.stringify(value) ?? String(value)}${detail ? ` (${detail})` : ""}`);
    this.name = "MalformedCombatDataError";
  }
}

/** Razones no fatales por las que una acción no se ejecutó. */
export type RejectReason = "insufficient_stamina" | "insufficient_void_energy" | "unknown_technique" | "requirements_not_met" | "on_cooldown";

export function assertFiniteNonNegative(field: string, v: unknown): number {
  if (typeof v !== "number" || !Number.isFinite(v) || v < 0) throw new MalformedCombatDataError(field, v, "se esperaba un número finito ≥ 0");
  return v;
}

export function assertInRange(field: string, v: unknown, lo: number, hi: number): number {
  if (typeof v !== "number" || !Number.isFinite(v) || v < lo || v > hi) throw new MalformedCombatDataError(field, v, `fuera de [${lo}, ${hi}]`);
  return v;
}

export function assertOneOf<T extends string>(field: string, v: unknown, allowed: readonly T[]): T {
  const hit = allowed.find((a) => a === v);
  if (hit === undefined) throw new MalformedCombatDataError(field, v, `valores válidos: ${allowed.join(", ")}`);
  return hit;
}

/* ───────────── Lectura de datos planos (deserialización) ───────────── */

export const isRecord = (v: unknown): v is Record<string, unknown> => typeof v === "object" && v !== null && !Array.isArray(v);

export function readRecord(field: string, v: unknown): Record<string, unknown> {
  if (!isRecord(v)) throw new MalformedCombatDataError(field, v, "se esperaba un objeto");
  return v;
}

export function readNumber(rec: Record<string, unknown>, field: string): number {
  const v = rec[field];
  if (typeof v !== "number" || !Number.isFinite(v)) throw new MalformedCombatDataError(field, v, "se esperaba un número finito");
  return v;
}

export function readBoolean(rec: Record<string, unknown>, field: string): boolean {
  const v = rec[field];
  if (typeof v !== "boolean") throw new MalformedCombatDataError(field, v, "se esperaba un booleano");
  return v;
}

export function readString(rec: Record<string, unknown>, field: string): string {
  const v = rec[field];
  if (typeof v !== "string") throw new MalformedCombatDataError(field, v, "se esperaba un texto");
  return v;
}

export function readStringArray(rec: Record<string, unknown>, field: string): string[] {
  const v = rec[field];
  if (!Array.isArray(v)) throw new MalformedCombatDataError(field, v, "se esperaba una lista");
  return v.map((x, i) => {
    if (typeof x !== "string") throw new MalformedCombatDataError(`${field}[${i}]`, x, "se esperaba un texto");
    return x;
  });
}

/** Mapa clave→número restringido a un dominio de claves cerrado. */
export function readNumberMap<K extends string>(rec: Record<string, unknown>, field: string, keys: readonly K[]): Partial<Record<K, number>> {
  const raw = readRecord(field, rec[field]);
  const out: Partial<Record<K, number>> = {};
  for (const [k, v] of Object.entries(raw)) {
    const key = assertOneOf(`${field}.${k}`, k, keys);
    if (typeof v !== "number" || !Number.isFinite(v) || v < 0) throw new MalformedCombatDataError(`${field}.${k}`, v, "se esperaba un número finito ≥ 0");
    out[key] = v;
  }
  return out;
}
