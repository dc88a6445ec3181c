import { describe, it, expect } from "vitest";
import { Weapon, weaponFromTemplate, weaponTemplateKeys, weaponDegradationFor, reachAdvantage } from "../../src/battleSystem/core/Weapon";
import { Armor, armorFromBase } from "../../src/battleSystem/core/Armor";
import { createCombatStats, deserializeCombatStats, serializeCombatStats } from "../../src/battleSystem/core/CombatStats";
import { MalformedCombatDataError } from "../../src/battleSystem/core/CombatErrors";
import { QUALITY_TIERS } from "../../src/battleSystem/core/CombatTypes";

describe("Weapon", () => {
  it("bajo estado 20 queda rota: daño × 0.5 × estado", () => {
    const w = weaponFromTemplate("longsword");
    w.degrade(85);
    expect(w.condition).toBe(15);
    expect(w.quality).toBe("broken");
    expect(w.isBroken()).toBe(true);
    expect(w.getEffectiveDamage()).toBeCloseTo(1.5, 10);
  });

  it("reparar no devuelve la calidad", () => {
    const w = weaponFromTemplate("axe");
    w.degrade(90);
    w.repair(500);
    expect(w.condition).toBe(100);
    expect(w.quality).toBe("broken");
  });

  it("el daño efectivo crece con el estado y con la calidad", () => {
    let prev = -1;
    for (let condition = 0; condition <= 100; condition += 10) {
      const dmg = new Weapon({ name: "Test", weaponType: "axes", damageType: "cut", baseDamage: 10, condition, quality: "normal" }).getEffectiveDamage();
      expect(dmg).toBeGreaterThanOrEqual(prev);
      prev = dmg;
    }
    prev = -1;
    for (const quality of QUALITY_TIERS) {
      const dmg = new Weapon({ name: "Test", weaponType: "axes", damageType: "cut", baseDamage: 10, quality }).getEffectiveDamage();
      expect(dmg).toBeGreaterThanOrEqual(prev);
      prev = dmg;
    }
  });

  it("desgaste por acción y calidad", () => {
    expect(weaponDegradationFor("strong", "weak")).toBe(2);
    expect(weaponDegradationFor("parry", "masterwork")).toBeCloseTo(0.35, 10);
    expect(weaponDegradationFor("kick", "normal")).toBe(0.5);
  });

  it("ventaja de alcance", () => {
    const spear = weaponFromTemplate("spear");
    const dagger = weaponFromTemplate("dagger");
    expect(reachAdvantage(spear, dagger)).toBeCloseTo(0.4, 10);
    expect(reachAdvantage(dagger, spear)).toBeCloseTo(-0.2, 10);
    expect(reachAdvantage(null, null)).toBe(0);
  });

  it("plantillas y alias", () => {
    expect(weaponFromTemplate("Bastard Sword").weaponType).toBe("longSwords");
    expect(weaponFromTemplate("bow").isRanged()).toBe(true);
    expect(weaponTemplateKeys()).toContain("greataxe");
    expect(() => weaponFromTemplate("lightsaber")).toThrow(MalformedCombatDataError);
  });

  it("datos mal formados al construir", () => {
    expect(() => new Weapon({ name: "Bad", weaponType: "axes", damageType: "cut", baseDamage: -1 })).toThrow(MalformedCombatDataError);
    expect(() => Weapon.fromData({ ...weaponFromTemplate("axe").toData(), damageType: "sonic" })).toThrow(MalformedCombatDataError);
  });
});

describe("Armor", () => {
  it("protección por parte × estado × resistencia", () => {
    const a = armorFromBase("Plate", 40, { resistances: { blunt: 0.5 } });
    expect(a.getProtection("head", "cut")).toBe(32);
    expect(a.getProtection("torso", "blunt")).toBe(20);
    a.degrade(50);
    expect(a.getProtection("torso", "cut")).toBe(20);
    expect(a.quality).toBe("normal");
  });

  it("repair tope 100 y degrade tope 0", () => {
    const a = new Armor({ name: "Gambeson", protection: { torso: 10 } });
    a.degrade(150);
    expect(a.condition).toBe(0);
    a.repair(250);
    expect(a.condition).toBe(100);
    expect(a.getProtection("head", "cut")).toBe(0);
  });
});

describe("round-trip de datos planos", () => {
  it("CombatStats con arma, armadura y memoria", () => {
    const stats = createCombatStats({ health: 70, pain: 12.5, stamina: 40, weapon: weaponFromTemplate("mace"), armor: armorFromBase("Leather", 10), maxVoidEnergy: 30 });
    stats.memory.observe("block");
    stats.memory.observe("strong");
    stats.memory.lastDamageTaken = 7;

    const data = JSON.parse(JSON.stringify(serializeCombatStats(stats)));
    const back = deserializeCombatStats(data);
    expect(serializeCombatStats(back)).toEqual(serializeCombatStats(stats));
    expect(back.memory.recent()).toEqual(["block", "strong"]);
  });

  it("Weapon y Armor", () => {
    const w = weaponFromTemplate("crossbow", { condition: 64, specialProperties: { silver: true } });
    expect(Weapon.fromData(JSON.parse(JSON.stringify(w.toData()))).toData()).toEqual(w.toData());
    const a = armorFromBase("Scale", 25, { weight: 8 });
    expect(Armor.fromData(JSON.parse(JSON.stringify(a.toData()))).toData()).toEqual(a.toData());
  });

  it("stats mal formados", () => {
    expect(() => createCombatStats({ maxHealth: -5 })).toThrow(MalformedCombatDataError);
    expect(() => createCombatStats({ health: 150, maxHealth: 100 })).toThrow(MalformedCombatDataError);
    expect(() => deserializeCombatStats({ health: "lots" })).toThrow(MalformedCombatDataError);
  });
});
