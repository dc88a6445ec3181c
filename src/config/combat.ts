/* eslint-disable no-console */
// src/config/combat.ts
// Flags de entorno del núcleo de combate. Se leen una sola vez al cargar el módulo.
// dotenv se inicializa en src/index.ts antes de importar esto.

export type AiMode = "table" | "simple";

const flag = (v: string | undefined) => v === "1" || String(v ?? "").toLowerCase() === "true";

const positiveInt = (v: string | undefined, d: number) => {
  const n = Number(v);
  return Number.isFinite(n) && n >= 1 ? Math.floor(n) : d;
};

const aiMode = (v: string | undefined): AiMode => (String(v ?? "").toLowerCase() === "simple" ? "simple" : "table");

/** Logs del resolver (`[COMBAT]`, `[STATUS]`, `[AI]`). */
export const COMBAT_DEBUG = flag(process.env.COMBAT_DEBUG);

/** Logs del duelo automático (`[DUEL]`). */
export const DUEL_DEBUG = flag(process.env.DUEL_DEBUG);

/** Límite de seguridad para runDuel (turnos individuales). */
export const DUEL_MAX_TURNS = positiveInt(process.env.DUEL_MAX_TURNS, 500);

/** Modo por defecto del AIDecisionEngine. */
export const AI_MODE: AiMode = aiMode(process.env.AI_MODE);

if (COMBAT_DEBUG) console.log(`[COMBAT] config: AI_MODE=${AI_MODE} DUEL_MAX_TURNS=${DUEL_MAX_TURNS}`);
