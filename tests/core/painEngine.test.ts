import { describe, it, expect } from "vitest";
import { addPain, calculateCombatPenalties, calculateFatiguePenalties, painFromDamage, painPenalty, recoverStamina, reducePain, shouldFallUnconscious } from "../../src/battleSystem/core/PainEngine";
import { createCombatStats } from "../../src/battleSystem/core/CombatStats";
import { Injury } from "../../src/battleSystem/core/Injury";
import { scriptedRng } from "../helpers/scriptedRng";

describe("painPenalty", () => {
  it("respeta la tabla de bandas", () => {
    expect(painPenalty(0)).toBe(0);
    expect(painPenalty(29.9)).toBe(0);
    expect(painPenalty(30)).toBe(0.15);
    expect(painPenalty(49.9)).toBe(0.15);
    expect(painPenalty(50)).toBe(0.3);
    expect(painPenalty(69.9)).toBe(0.3);
    expect(painPenalty(70)).toBe(0.45);
    expect(painPenalty(79.9)).toBe(0.45);
    expect(painPenalty(80)).toBe(1);
    expect(painPenalty(100)).toBe(1);
  });

  it("es monótona no decreciente", () => {
    let prev = painPenalty(0);
    for (let p = 0; p <= 100; p += 0.5) {
      const cur = painPenalty(p);
      expect(cur).toBeGreaterThanOrEqual(prev);
      prev = cur;
    }
  });
});

describe("dolor", () => {
  it("painFromDamage tiene techo de 40", () => {
    expect(painFromDamage(50, "head", "burn", scriptedRng([0.99]))).toBe(40);
    expect(painFromDamage(10, "leftLeg", "poison", scriptedRng([0.5]))).toBeCloseTo(11.2, 10);
  });

  it("addPain acota a [0, 100] y devuelve lo aplicado", () => {
    const s = createCombatStats({ pain: 90 });
    expect(addPain(s, 30)).toBe(10);
    expect(s.pain).toBe(100);
    const t = createCombatStats({ pain: 5 });
    expect(addPain(t, -20)).toBe(-5);
    expect(t.pain).toBe(0);
  });

  it("shouldFallUnconscious: dolor ≥ 80 o vida ≤ 0", () => {
    expect(shouldFallUnconscious(createCombatStats({ pain: 79 }))).toBe(false);
    expect(shouldFallUnconscious(createCombatStats({ pain: 80 }))).toBe(true);
    expect(shouldFallUnconscious(createCombatStats({ health: 0 }))).toBe(true);
  });

  it("reducePain sin atención: U(0.5, 1.0)", () => {
    const s = createCombatStats({ pain: 50 });
    const r = reducePain(s, 20, false, scriptedRng([0]));
    expect(r).toEqual({ relieved: 10, regainedConsciousness: false });
    expect(s.pain).toBe(40);
  });

  it("reducePain puede despertar a un inconsciente", () => {
    const s = createCombatStats({ pain: 70, health: 50, isConscious: false });
    const r = reducePain(s, 20, true, scriptedRng([0.5, 0.1]));
    expect(r.relieved).toBeCloseTo(20, 10);
    expect(r.regainedConsciousness).toBe(true);
    expect(s.isConscious).toBe(true);
  });
});

describe("penalizaciones", () => {
  it("dolor, agotamiento y heridas por zona", () => {
    const s = createCombatStats({ pain: 80, exhaustion: 70 });
    const head = new Injury({ bodyPart: "head", severity: 40, damageType: "blunt" });
    const p = calculateCombatPenalties(s, [head]);
    expect(p.attack).toBeCloseTo(0.19, 10);
    expect(p.accuracy).toBeCloseTo(0.45, 10);
    expect(p.defense).toBeCloseTo(0.16, 10);
    expect(p.speed).toBeCloseTo(0.08, 10);
  });

  it("cada canal tiene techo 0.9", () => {
    const s = createCombatStats();
    const injuries = [new Injury({ bodyPart: "head", severity: 100, damageType: "blunt" }), new Injury({ bodyPart: "head", severity: 100, damageType: "cut" })];
    expect(calculateCombatPenalties(s, injuries).accuracy).toBe(0.9);
  });

  it("fatiga por stamina baja", () => {
    expect(calculateFatiguePenalties(createCombatStats({ stamina: 20 }))).toEqual({ speed: 0.3, damage: 0.2, defense: 0, accuracy: 0.2 });
    expect(calculateFatiguePenalties(createCombatStats({ stamina: 40 }))).toEqual({ speed: 0.15, damage: 0.1, defense: 0, accuracy: 0.1 });
    expect(calculateFatiguePenalties(createCombatStats())).toEqual({ speed: 0, damage: 0, defense: 0, accuracy: 0 });
  });
});

describe("recoverStamina", () => {
  it("en combate 0.3/s", () => {
    const s = createCombatStats({ stamina: 50 });
    expect(recoverStamina(s, false, 6)).toBeCloseTo(1.8, 10);
    expect(s.stamina).toBeCloseTo(51.8, 10);
  });

  it("en reposo 1/s, agotamiento > 50 la parte y baja el agotamiento", () => {
    const s = createCombatStats({ stamina: 50, exhaustion: 60 });
    expect(recoverStamina(s, true, 10)).toBe(5);
    expect(s.exhaustion).toBe(59);
  });

  it("el dolor reduce el ritmo y nunca pasa del máximo", () => {
    const s = createCombatStats({ stamina: 50, pain: 40 });
    expect(recoverStamina(s, true, 10)).toBeCloseTo(8, 10);
    const full = createCombatStats({ stamina: 99 });
    expect(recoverStamina(full, true, 60)).toBe(1);
    expect(full.stamina).toBe(100);
  });
});
