import { describe, it, expect } from "vitest";
import { resolveStrike } from "../../src/battleSystem/core/combatManager/resolveStrike";
import { DamageResolver } from "../../src/battleSystem/core/DamageResolver";
import { StatusEngine } from "../../src/battleSystem/core/StatusEngine";
import { PlayerCharacter } from "../../src/battleSystem/entities/PlayerCharacter";
import { EnemyBot } from "../../src/battleSystem/entities/EnemyBot";
import { weaponFromTemplate } from "../../src/battleSystem/core/Weapon";
import { scriptedRng } from "../helpers/scriptedRng";

// puños ×4 = 20 de daño; el defensor no mitiga por multiplicador
const pair = () => ({
  attacker: new PlayerCharacter({ id: "p", name: "Brawler", stats: { damageMultiplier: 4 } }),
  defender: new EnemyBot({ id: "e", name: "Dummy", archetype: "aggressive", stats: { defenseMultiplier: 0 } }),
});

describe("resolveStrike", () => {
  it("bloqueo exitoso reduce a la mitad y deja herida", () => {
    const { attacker, defender } = pair();
    defender.defensiveAction = "block";
    // golpe, varianza, crítico, dolor(ataque), defensa, dolor(aplicado)
    const rng = scriptedRng([0, 0.5, 0.99, 0.5, 0.4, 0.5]);
    const r = resolveStrike(attacker, defender, "basic", { resolver: new DamageResolver({ rng }) }, { targetPart: "torso" });

    expect(r.defense).toEqual({ action: "block", result: { success: true, reduction: 0.5, chance: 0.5, rawChance: 0.5 } });
    expect(r.damageApplied).toBe(10);
    expect(r.injury?.severity).toBe(30);
    expect(r.injury?.bleeding).toBe(false);
    expect(r.effectsText).toBe("Feels the pain.");
    expect(defender.defensiveAction).toBeNull();
    expect(defender.stats().health).toBe(90);
    expect(defender.stats().pain).toBeCloseTo(18, 10);
    expect(defender.stats().stamina).toBe(98);
    expect(defender.injuries().all()).toHaveLength(1);
    expect(defender.stats().memory.lastAction()).toBe("basic");
    expect(attacker.stats().memory.lastDamageDealt).toBe(10);
    expect(rng.remaining()).toBe(0);
  });

  it("la evasión por efecto anula el golpe", () => {
    const { attacker, defender } = pair();
    const rng = scriptedRng([0, 0.5, 0.99, 0.5, 0.2]);
    const status = new StatusEngine(rng);
    status.attach("player", attacker.stats());
    status.attach("enemy", defender.stats());
    status.apply("enemy", "shadowStep");

    const r = resolveStrike(attacker, defender, "basic", { resolver: new DamageResolver({ rng }), status, sides: { attacker: "player", defender: "enemy" } }, { targetPart: "torso" });
    expect(r.evaded).toBe(true);
    expect(r.damageApplied).toBe(0);
    expect(defender.stats().health).toBe(100);
    expect(attacker.stats().stamina).toBe(95);
    expect(rng.remaining()).toBe(0);
  });

  it("el escudo de energía absorbe antes de la vida", () => {
    const { attacker, defender } = pair();
    const rng = scriptedRng([0, 0.5, 0.99, 0.5, 0.5]);
    const status = new StatusEngine(rng);
    status.attach("player", attacker.stats());
    status.attach("enemy", defender.stats());
    status.apply("enemy", "energyShield", { absorb: 15 });

    const r = resolveStrike(attacker, defender, "basic", { resolver: new DamageResolver({ rng }), status, sides: { attacker: "player", defender: "enemy" } }, { targetPart: "torso" });
    expect(r.absorbed).toBe(15);
    expect(r.damageApplied).toBe(5);
    expect(r.injury).toBeNull();
    expect(status.has("enemy", "energyShield")).toBe(false);
    expect(defender.stats().health).toBe(95);
    expect(defender.stats().pain).toBeCloseTo(9, 10);
    expect(rng.remaining()).toBe(0);
  });

  it("una parada exitosa desgasta el arma del defensor", () => {
    const { attacker, defender } = pair();
    const dagger = weaponFromTemplate("dagger");
    defender.equipWeapon(dagger);
    defender.defensiveAction = "parry";
    const rng = scriptedRng([0, 0.5, 0.99, 0.5, 0.1, 0.5]);
    const r = resolveStrike(attacker, defender, "basic", { resolver: new DamageResolver({ rng }) }, { targetPart: "torso" });

    expect(r.defense?.result.success).toBe(true);
    expect(r.damageApplied).toBe(6);
    expect(dagger.condition).toBeCloseTo(99.3, 10);
    expect(defender.stats().health).toBe(94);
  });

  it("fallo: no hay daño ni defensa consumida", () => {
    const { attacker, defender } = pair();
    defender.defensiveAction = "dodge";
    const rng = scriptedRng([0.99]);
    const r = resolveStrike(attacker, defender, "strong", { resolver: new DamageResolver({ rng }) });
    expect(r.outcome.executed && r.outcome.result.hit).toBe(false);
    expect(r.defense).toBeNull();
    expect(defender.defensiveAction).toBe("dodge");
  });
});
