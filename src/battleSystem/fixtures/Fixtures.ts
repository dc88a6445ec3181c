// src/battleSystem/fixtures/Fixtures.ts
// Combatientes de ejemplo para pruebas manuales y duelos de demo.
// Cada llamada devuelve instancias nuevas: el combate muta stats, armas y heridas.
import { weaponFromTemplate } from "../core/Weapon";
import { armorFromBase } from "../core/Armor";
import type { Archetype } from "../core/CombatTypes";
import { PlayerCharacter } from "../entities/PlayerCharacter";
import { EnemyBot } from "../entities/EnemyBot";
import { SkillSet } from "../entities/SkillSet";
import type { SkillName } from "../entities/SkillSet";

export function sampleSwordsman(id = "player-1"): PlayerCharacter {
  return new PlayerCharacter({
    id,
    name: "Aren",
    level: 20,
    stats: { strength: 60, agility: 55, maxVoidEnergy: 50 },
    weapon: weaponFromTemplate("longsword"),
    armor: armorFromBase("Chainmail", 20),
    skills: { swords: 30, defense: 25, agility: 20 },
    knownBuffs: ["berserk", "lastStand", "energyShield"],
    voidAbilities: ["voidTouch", "shadowStep"],
  });
}

export function sampleShieldBearer(id = "player-2"): PlayerCharacter {
  return new PlayerCharacter({
    id,
    name: "Mira",
    level: 12,
    stats: { strength: 55, agility: 40 },
    weapon: weaponFromTemplate("mace"),
    offHand: weaponFromTemplate("shield"),
    armor: armorFromBase("Scale Armor", 30, { weight: 12, movementPenalty: 0.1 }),
    skills: { blunt: 25, defense: 35 },
    knownBuffs: ["stoneBody"],
  });
}

/* ───────── NPCs por arquetipo ───────── */

const ENEMY_KIT: Record<Archetype, { name: string; weapon: string; skill: SkillName; armor: number }> = {
  aggressive: { name: "Raider", weapon: "axe", skill: "axes", armor: 10 },
  defensive: { name: "Warden", weapon: "mace", skill: "blunt", armor: 30 },
  tactical: { name: "Duelist", weapon: "shortsword", skill: "swords", armor: 15 },
  berserker: { name: "Reaver", weapon: "greatsword", skill: "greatSwords", armor: 5 },
  archer: { name: "Skirmisher", weapon: "shortbow", skill: "archery", armor: 8 },
};

export function sampleEnemy(archetype: Archetype, id = `enemy-${archetype}`): EnemyBot {
  const kit = ENEMY_KIT[archetype];
  const skills = new SkillSet({ defense: 15 });
  skills.set(kit.skill, 20);
  return new EnemyBot({
    id,
    name: kit.name,
    level: 10,
    archetype,
    weapon: weaponFromTemplate(kit.weapon),
    armor: armorFromBase("Leather", kit.armor),
    skills,
  });
}
