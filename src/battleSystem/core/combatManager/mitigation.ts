// Pipeline de mitigación. Devuelve daño final (1 decimal) y el breakdown para eventos/logs.
import { MAX_MITIGATION } from "../CombatConfig";
import { clamp01, round1 } from "../CombatMath";

export type MitigationInput = {
  raw: number;
  /** defenseMultiplier del defensor (se acota a 0.8 como fracción mitigada). */
  defenseMultiplier: number;
  /** Protección efectiva de la armadura en la parte golpeada (puntos, 10 = 10%). */
  armorProtection?: number;
  /** 0..1: fracción de armadura ignorada. */
  armorPenetration?: number;
};

export type MitigationResult = {
  final: number;
  defenseFactor: number;
  armorFactor: number;
};

export function applyMitigation(m: MitigationInput): MitigationResult {
  let dmg = Math.max(0, m.raw);

  // defenseMultiplier como fracción mitigada, techo 80%
  const defenseFactor = 1 - Math.min(MAX_MITIGATION, Math.max(0, m.defenseMultiplier));
  dmg *= defenseFactor;

  // Armadura
  let armorFactor = 1;
  const prot = m.armorProtection ?? 0;
  if (prot > 0) {
    const pen = clamp01(m.armorPenetration ?? 0);
    armorFactor = 1 - Math.min(MAX_MITIGATION, (prot / 100) * (1 - pen));
    dmg *= armorFactor;
  }

  return { final: round1(dmg), defenseFactor, armorFactor };
}
