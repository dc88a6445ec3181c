import { describe, it, expect } from "vitest";
import { VoidAbilityEngine } from "../../src/battleSystem/core/VoidAbilities";
import { StatusEngine } from "../../src/battleSystem/core/StatusEngine";
import { PlayerCharacter } from "../../src/battleSystem/entities/PlayerCharacter";
import { sampleEnemy, sampleSwordsman } from "../../src/battleSystem/fixtures/Fixtures";
import type { CombatantBase } from "../../src/battleSystem/entities/CombatantBase";
import { scriptedRng } from "../helpers/scriptedRng";

const setup = (caster: CombatantBase = sampleSwordsman()) => {
  const target = sampleEnemy("aggressive");
  const status = new StatusEngine(scriptedRng([]));
  status.attach("player", caster.stats());
  status.attach("enemy", target.stats());
  const engine = new VoidAbilityEngine(status);
  return { caster, target, status, engine, c: { entity: caster, side: "player" as const }, t: { entity: target, side: "enemy" as const } };
};

describe("VoidAbilityEngine", () => {
  it("voidTouch daña, cobra energía y dolor y entra en enfriamiento", () => {
    const { caster, target, engine, c, t } = setup();
    const out = engine.cast(c, t, "voidTouch");
    expect(out.executed).toBe(true);
    if (!out.executed) return;
    expect(out.result).toEqual({ abilityId: "voidTouch", damage: 25, healed: 0, painTaken: 15, effect: null, description: "Void Touch: 25 void damage!" });
    expect(target.stats().health).toBe(75);
    expect(caster.stats().voidEnergy).toBe(40);
    expect(caster.stats().pain).toBe(15);
    expect(engine.cooldownOf(caster.id, "voidTouch")).toBe(2);

    const again = engine.cast(c, t, "voidTouch");
    expect(again).toEqual({ executed: false, reason: "on_cooldown", description: "Cannot use voidTouch (on_cooldown)." });

    engine.tickCooldowns();
    expect(engine.cooldownOf(caster.id, "voidTouch")).toBe(1);
    engine.tickCooldowns();
    expect(engine.cooldownOf(caster.id, "voidTouch")).toBe(0);
    expect(engine.check(caster, "voidTouch")).toBeNull();
  });

  it("shadowStep aplica evasión al lanzador", () => {
    const { caster, status, engine, c, t } = setup();
    const out = engine.cast(c, t, "shadowStep");
    expect(out.executed).toBe(true);
    if (!out.executed) return;
    expect(out.result.effect).toBe("shadowStep");
    expect(out.result.description).toBe("Shadow Step: Steps through the shadows, out of reach.");
    expect(status.has("player", "shadowStep")).toBe(true);
    expect(status.evasion("player")).toBe(0.5);
    expect(caster.stats().pain).toBe(10);
    expect(caster.stats().voidEnergy).toBe(35);
  });

  it("rechaza sin mutar nada", () => {
    const { caster, target, engine, c, t } = setup();
    expect(engine.cast(c, t, "fireball")).toEqual({ executed: false, reason: "unknown_technique", description: "Cannot use fireball (unknown_technique)." });
    expect(engine.cast(c, t, "realityTear")).toMatchObject({ executed: false, reason: "requirements_not_met" });
    expect(caster.stats().voidEnergy).toBe(50);
    expect(caster.stats().pain).toBe(0);
    expect(target.stats().health).toBe(100);
  });

  it("nivel insuficiente y energía insuficiente", () => {
    const rookie = new PlayerCharacter({ id: "p", name: "Rookie", level: 5, stats: { maxVoidEnergy: 50 }, voidAbilities: ["voidTouch"] });
    expect(setup(rookie).engine.check(rookie, "voidTouch")).toBe("requirements_not_met");

    const drained = new PlayerCharacter({ id: "p", name: "Drained", level: 20, stats: { maxVoidEnergy: 50, voidEnergy: 5 }, voidAbilities: ["voidTouch"] });
    expect(setup(drained).engine.check(drained, "voidTouch")).toBe("insufficient_void_energy");
  });

  it("voidAbsorption daña y cura hasta el máximo", () => {
    const leech = new PlayerCharacter({ id: "p", name: "Leech", level: 25, stats: { maxVoidEnergy: 40, health: 90 }, voidAbilities: ["voidAbsorption"] });
    const { engine, c, t } = setup(leech);
    const out = engine.cast(c, t, "voidAbsorption");
    expect(out.executed).toBe(true);
    if (!out.executed) return;
    expect(out.result.damage).toBe(30);
    expect(out.result.healed).toBe(10);
    expect(out.result.description).toBe("Void Absorption: 30 void damage! Heals 10 health.");
    expect(leech.stats().health).toBe(100);
    expect(leech.stats().voidEnergy).toBe(20);
  });

  it("el dolor del vacío puede dejar inconsciente al lanzador", () => {
    const frail = new PlayerCharacter({ id: "p", name: "Frail", level: 20, stats: { maxVoidEnergy: 50, pain: 70 }, voidAbilities: ["voidTouch"] });
    const { engine, c, t } = setup(frail);
    const out = engine.cast(c, t, "voidTouch");
    expect(out.executed).toBe(true);
    expect(frail.stats().pain).toBe(85);
    expect(frail.stats().isConscious).toBe(false);
  });
});
