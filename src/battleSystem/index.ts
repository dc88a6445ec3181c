// src/battleSystem/index.ts
/**
 * API pública del núcleo de combate.
 * Sin IO ni red: todo el azar entra por un `Rng` inyectable.
 */

// ───────────────────────────────────────────
// Core / Engine
// ───────────────────────────────────────────
export { CombatManager, ROUND_SECONDS, decisionToCommand } from "./core/CombatManager";
export type { CombatManagerOptions, EncounterListener, EncounterOutcome, PlayerCommand, TurnEvent } from "./core/CombatManager";
export { DamageResolver, rollBodyPart } from "./core/DamageResolver";
export type { AttackOptions, DamageResolverOptions } from "./core/DamageResolver";
export { resolveStrike } from "./core/combatManager/resolveStrike";
export type { StrikeContext, StrikeResult, StrikeSides } from "./core/combatManager/resolveStrike";
export { applyMitigation } from "./core/combatManager/mitigation";
export { combatantInitiative, defenseSkill, hasShield, skillForWeapon, strikeProfile, weaponSkill } from "./core/combatManager/stats";
export * from "./core/CombatTypes";
export * as CombatConfig from "./core/CombatConfig";
export { mulberry32, pickOne, rngFromSeed, rollFloat, rollInt, seedFromText } from "./core/RngFightSeed";
export type { Rng } from "./core/RngFightSeed";
export { clamp, clamp01, ratio, round1 } from "./core/CombatMath";
export { createCombatStats, serializeCombatStats, deserializeCombatStats } from "./core/CombatStats";
export type { CombatStatsData, CombatStatsInit } from "./core/CombatStats";
export { MalformedCombatDataError } from "./core/CombatErrors";
export type { RejectReason } from "./core/CombatErrors";

// ───────────────────────────────────────────
// Dolor, heridas, estado y descanso
// ───────────────────────────────────────────
export { addPain, calculateCombatPenalties, calculateFatiguePenalties, painFromDamage, painPenalty, recoverStamina, reducePain, shouldFallUnconscious } from "./core/PainEngine";
export { Injury, InjuryLedger, createInjury } from "./core/Injury";
export type { InjuryData, LedgerUpdate } from "./core/Injury";
export { CHARACTER_STATES, combatOutcomeLabel, computeCharacterState, isIncapacitated } from "./core/CharacterState";
export type { CharacterState, CombatOutcomeLabel } from "./core/CharacterState";
export { rest } from "./core/Recovery";
export type { RestReport } from "./core/Recovery";
export { CombatantMemory } from "./core/CombatantMemory";
export type { PatternAnalysis } from "./core/CombatantMemory";
export { EnvironmentModifier, ENVIRONMENT_FACTORS, parseEnvironmentFactor } from "./core/EnvironmentModifier";
export type { EnvironmentFactor } from "./core/EnvironmentModifier";

// ───────────────────────────────────────────
// Equipo
// ───────────────────────────────────────────
export { Weapon, weaponFromTemplate, weaponTemplateKeys, reachAdvantage, weaponDegradationFor } from "./core/Weapon";
export type { WeaponData } from "./core/Weapon";
export { Armor, armorFromBase } from "./core/Armor";
export type { ArmorData } from "./core/Armor";

// ───────────────────────────────────────────
// Efectos, técnicas, vacío e IA
// ───────────────────────────────────────────
export { StatusEngine } from "./core/StatusEngine";
export type { CombatEffect, DotTickEvent, ExpireEvent } from "./core/StatusEngine";
export { EFFECT_CATALOG, EFFECT_KINDS, SELF_BUFFS } from "./constants/status";
export type { EffectKind, SelfBuff } from "./constants/status";
export { CombatTechnique, ComboTracker, TechniqueEngine, TECHNIQUES, findTechnique } from "./core/TechniqueEngine";
export type { TechniqueOutcome, TechniqueResult } from "./core/TechniqueEngine";
export { VoidAbilityEngine } from "./core/VoidAbilities";
export type { VoidCastOutcome, VoidCastResult } from "./core/VoidAbilities";
export { VOID_ABILITIES, VOID_ABILITY_IDS } from "./constants/voidAbilities";
export type { VoidAbilityId } from "./constants/voidAbilities";
export { AIDecisionEngine } from "./ai/AIDecisionEngine";
export type { AIDecision } from "./ai/AIDecisionEngine";
export { ARCHETYPE_PATTERNS } from "./constants/archetypes";

// ───────────────────────────────────────────
// Entidades, snapshots y duelo
// ───────────────────────────────────────────
export type { CombatEntity } from "../interfaces/combat/CombatEntity";
export { PlayerCharacter } from "./entities/PlayerCharacter";
export { EnemyBot } from "./entities/EnemyBot";
export { SkillSet, SKILL_NAMES } from "./entities/SkillSet";
export type { SkillName } from "./entities/SkillSet";
export { snapshotCombatant, restoreCombatant } from "./snapshots/CombatSnapshot";
export type { CombatantSnapshot } from "./snapshots/CombatSnapshot";
export { runDuel } from "./duel/duelRunner";
export type { DuelOptions, DuelResult, TimelineEntry, TimelineEvent } from "./duel/duelRunner";
export { sampleEnemy, sampleShieldBearer, sampleSwordsman } from "./fixtures/Fixtures";
