import { describe, it, expect } from "vitest";
import { CombatManager, decisionToCommand } from "../../src/battleSystem/core/CombatManager";
import type { EncounterOutcome, TurnEvent } from "../../src/battleSystem/core/CombatManager";
import { PlayerCharacter } from "../../src/battleSystem/entities/PlayerCharacter";
import type { CombatantInit } from "../../src/battleSystem/entities/CombatantBase";
import { EnemyBot } from "../../src/battleSystem/entities/EnemyBot";
import type { CombatStatsInit } from "../../src/battleSystem/core/CombatStats";
import { scriptedRng } from "../helpers/scriptedRng";

// iniciativa: d11 de cada uno (0 y 0) y luego d20 de cada uno → 30 vs 11, empieza el jugador
const INITIATIVE = [0.5, 0.5, 0.99, 0];
// golpe a parte fija: golpe, varianza, crítico, dolor(ataque), dolor(aplicado)
const TORSO_HIT = [0, 0.5, 0.99, 0.5, 0.5];

const setup = (opts: { player?: Partial<CombatantInit>; enemy?: CombatStatsInit; draws?: number[]; aiMode?: "table" | "simple" } = {}) => {
  const player = new PlayerCharacter({ id: "p", name: "Brawler", ...opts.player, stats: { damageMultiplier: 4, defenseMultiplier: 0, ...opts.player?.stats } });
  const enemy = new EnemyBot({ id: "e", name: "Dummy", archetype: "aggressive", stats: { defenseMultiplier: 0, ...opts.enemy } });
  const rng = scriptedRng([...INITIATIVE, ...(opts.draws ?? [])]);
  const ends: EncounterOutcome[] = [];
  const starts: string[] = [];
  const cm = new CombatManager(player, enemy, {
    rng,
    aiMode: opts.aiMode,
    listener: { onEncounterStart: (i) => starts.push(`${i.player}|${i.enemy}|${i.firstActor}`), onEncounterEnd: (o) => ends.push(o) },
  });
  return { player, enemy, rng, cm, ends, starts };
};

const types = (events: TurnEvent[]) => events.map((e) => e.type);

describe("CombatManager", () => {
  it("inicio: iniciativa una sola vez", () => {
    const { cm, starts } = setup();
    const events = cm.start();
    expect(events).toHaveLength(1);
    const [ini] = events;
    expect(ini?.type === "initiative" && ini.result.description).toBe("The attacker seizes the initiative (30 vs 11).");
    expect(cm.initiativeWinner).toBe("player");
    expect(cm.start()).toEqual([]);
    expect(starts).toEqual(["Brawler|Dummy|player"]);
  });

  it("ataque del jugador: daño, herida y cambio de estado", () => {
    const { cm, enemy, rng } = setup({ draws: TORSO_HIT });
    cm.start();
    const events = cm.playerTurn({ type: "attack", action: "basic", targetPart: "torso" });

    expect(types(events)).toEqual(["attack", "state"]);
    const [attack, state] = events;
    expect(attack?.type === "attack" && attack.description).toBe("Hit to the torso. 20.0 damage. Feels the pain.");
    expect(state).toEqual({ type: "state", actor: "enemy", state: "INJURED" });
    expect(enemy.stats().health).toBe(80);
    expect(enemy.injuries().all()[0]?.severity).toBe(60);
    expect(cm.stateOf("enemy")).toBe("INJURED");
    expect(cm.isOver()).toBe(false);
    expect(rng.remaining()).toBe(0);
  });

  it("victoria al dejar fuera al enemigo; después no hay más turnos", () => {
    const { cm, ends } = setup({ enemy: { health: 1 }, draws: TORSO_HIT });
    cm.start();
    const events = cm.playerTurn({ type: "attack", action: "basic", targetPart: "torso" });
    expect(events[events.length - 1]).toEqual({ type: "end", outcome: "victory" });
    expect(cm.outcome).toBe("victory");
    expect(ends).toEqual(["victory"]);
    expect(cm.enemyTurn()).toEqual([]);
    expect(cm.startRound()).toEqual([]);
    expect(ends).toEqual(["victory"]);
  });

  it("aturdido pierde el turno", () => {
    const { cm, player } = setup();
    cm.start();
    player.stats().isStunned = true;
    player.stats().stunDuration = 1;
    const events = cm.playerTurn({ type: "attack", action: "basic" });
    expect(events).toEqual([{ type: "skip", actor: "player", reason: "stunned", description: "Brawler is stunned and loses the turn." }]);
    expect(player.stats().isStunned).toBe(false);
  });

  it("huir cierra el encuentro", () => {
    const { cm, ends } = setup();
    const events = cm.playerTurn({ type: "flee" });
    expect(types(events)).toEqual(["initiative", "flee", "end"]);
    expect(cm.outcome).toBe("flee");
    expect(ends).toEqual(["flee"]);
  });

  it("buffs: desconocido rechazado, conocido cobra stamina", () => {
    const { cm } = setup();
    cm.start();
    expect(cm.playerTurn({ type: "buff", buff: "berserk" })).toEqual([
      { type: "rejected", actor: "player", reason: "requirements_not_met", description: "Brawler cannot use Berserk." },
    ]);

    const known = setup({ player: { knownBuffs: ["berserk"] } });
    known.cm.start();
    const events = known.cm.playerTurn({ type: "buff", buff: "berserk" });
    expect(events[0]).toEqual({ type: "buff", actor: "player", buff: "berserk", description: "Brawler activates Berserk." });
    expect(known.player.stats().stamina).toBe(70);
    expect(known.player.stats().damageMultiplier).toBe(6);
    expect(known.cm.status.has("player", "berserk")).toBe(true);
  });

  it("sangrado al inicio de ronda", () => {
    const { cm, player } = setup({ player: { stats: { isBleeding: true, totalBleedingRate: 2 } } });
    cm.start();
    const events = cm.startRound();
    expect(events).toEqual([{ type: "bleed", victim: "player", damage: 2 }]);
    expect(cm.round).toBe(1);
    expect(player.stats().health).toBe(98);
  });

  it("Last Stand automático bajo 20% y anula el aturdimiento", () => {
    const { cm, player } = setup({ player: { knownBuffs: ["lastStand"], stats: { health: 10 } } });
    cm.start();
    const events = cm.playerTurn({ type: "stance", stance: "defensive" });
    expect(events).toEqual([
      { type: "stance", actor: "player", stance: "defensive" },
      { type: "lastStand", actor: "player" },
    ]);
    expect(player.stance).toBe("defensive");

    player.stats().isStunned = true;
    player.stats().stunDuration = 2;
    cm.startRound();
    expect(player.stats().isStunned).toBe(false);
    expect(player.stats().stunDuration).toBe(0);
  });

  it("habilidad del vacío desde el comando", () => {
    const { cm, enemy } = setup({ player: { level: 10, voidAbilities: ["voidTouch"], stats: { maxVoidEnergy: 20 } } });
    cm.start();
    const events = cm.playerTurn({ type: "void", ability: "voidTouch" });
    expect(events[0]?.type).toBe("void");
    expect(enemy.stats().health).toBe(75);
    expect(cm.voidAbilities.cooldownOf("p", "voidTouch")).toBe(2);
  });

  it("defensa preparada queda registrada en la memoria del rival", () => {
    const { cm, player, enemy } = setup();
    cm.start();
    const events = cm.playerTurn({ type: "defend", action: "parry" });
    expect(events).toEqual([{ type: "defend", actor: "player", action: "parry", description: "Brawler prepares to parry." }]);
    expect(player.defensiveAction).toBe("parry");
    expect(enemy.stats().memory.lastAction()).toBe("parry");
  });

  it("turno de IA en modo simple", () => {
    // golpe, parte (torso), varianza, crítico, dolor(ataque), dolor(aplicado)
    const { cm, player } = setup({ aiMode: "simple", draws: [0, 0.3, 0.5, 0.99, 0.5, 0.5] });
    cm.start();
    const events = cm.enemyTurn();
    const [attack] = events;
    expect(attack?.type === "attack" && attack.actor).toBe("enemy");
    expect(player.stats().health).toBe(95);
  });

  it("decisión → comando", () => {
    expect(decisionToCommand({ action: "dodge", technique: null })).toEqual({ type: "defend", action: "dodge" });
    expect(decisionToCommand({ action: "kick", technique: null })).toEqual({ type: "attack", action: "kick" });
  });
});
