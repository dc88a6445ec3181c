import { describe, it, expect } from "vitest";
import { mulberry32, pickOne, rngFromSeed, rollFloat, rollInt, seedFromText } from "../../src/battleSystem/core/RngFightSeed";
import { scriptedRng } from "../helpers/scriptedRng";

describe("RngFightSeed", () => {
  it("mulberry32 repite la secuencia para la misma semilla", () => {
    const a = mulberry32(42);
    const b = mulberry32(42);
    const seqA = [a(), a(), a(), a()];
    expect(seqA).toEqual([b(), b(), b(), b()]);
    for (const v of seqA) {
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("semilla 0 equivale a semilla 1", () => {
    expect(mulberry32(0)()).toBe(mulberry32(1)());
  });

  it("semilla de texto estable", () => {
    expect(seedFromText("")).toBe(0x811c9dc5);
    expect(seedFromText("arena-7")).toBe(seedFromText("arena-7"));
    expect(rngFromSeed("arena-7")()).toBe(mulberry32(seedFromText("arena-7"))());
    expect(rngFromSeed("arena-7")()).not.toBe(rngFromSeed("arena-8")());
    expect(rngFromSeed(5)()).toBe(mulberry32(5)());
  });

  it("rollInt cubre el rango inclusivo", () => {
    expect(rollInt(scriptedRng([0]), 1, 20)).toBe(1);
    expect(rollInt(scriptedRng([0.5]), 1, 20)).toBe(11);
    expect(rollInt(scriptedRng([0.9999]), 1, 20)).toBe(20);
    expect(rollInt(scriptedRng([0]), -5, 5)).toBe(-5);
  });

  it("rollFloat usa un único sorteo", () => {
    const rng = scriptedRng([0.5]);
    expect(rollFloat(rng, 0.8, 1.2)).toBeCloseTo(1.0, 10);
    expect(rng.remaining()).toBe(0);
  });

  it("pickOne", () => {
    expect(pickOne(scriptedRng([0.6]), ["a", "b", "c"])).toBe("b");
    expect(pickOne(scriptedRng([0.99999]), ["a", "b", "c"])).toBe("c");
    expect(pickOne(scriptedRng([]), [])).toBeNull();
  });
});
