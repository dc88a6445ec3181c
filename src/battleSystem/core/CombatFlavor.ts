// src/battleSystem/core/CombatFlavor.ts
// Textos narrativos del resolver. Frases cortas, sin saltos de línea ni formato de UI.
import type { BodyPart, CombatAction } from "./CombatTypes";

export const PART_LABEL: Record<BodyPart, string> = {
  head: "head",
  torso: "torso",
  leftArm: "left arm",
  rightArm: "right arm",
  leftLeg: "left leg",
  rightLeg: "right leg",
};

export const ACTION_LABEL: Record<CombatAction, string> = {
  basic: "basic attack",
  strong: "strong attack",
  fast: "quick attack",
  feint: "feint",
  kick: "kick",
  push: "shove",
  riposte: "riposte",
  block: "block",
  dodge: "dodge",
  parry: "parry",
};

export const TEXT = {
  tooTiredToAttack: "Too exhausted to attack!",
  miss: "The attack misses!",
  unconscious: "Loses consciousness!",
  stunned: "Is stunned!",
  feelsPain: "Feels the pain.",
  stunnedSkip: "is stunned and loses the turn.",
  unconsciousSkip: "lies unconscious.",
} as const;

export function hitDescription(part: BodyPart, damage: number, critical: boolean): string {
  return critical ? `CRITICAL hit to the ${PART_LABEL[part]}! ${damage.toFixed(1)} damage!` : `Hit to the ${PART_LABEL[part]}. ${damage.toFixed(1)} damage.`;
}

export function effectsDescription(effects: readonly string[]): string {
  return effects.length ? `Effects: ${effects.join(", ")}` : TEXT.feelsPain;
}

export function initiativeDescription(attackerFirst: boolean, attackerRoll: number, defenderRoll: number): string {
  return attackerFirst ? `The attacker seizes the initiative (${attackerRoll} vs ${defenderRoll}).` : `The defender keeps the initiative (${defenderRoll} vs ${attackerRoll}).`;
}
