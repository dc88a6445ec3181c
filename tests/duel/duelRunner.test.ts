import { describe, it, expect } from "vitest";
import { runDuel } from "../../src/battleSystem/duel/duelRunner";
import { sampleEnemy, sampleSwordsman } from "../../src/battleSystem/fixtures/Fixtures";

const duel = (seed: number | string, maxTurns?: number) => runDuel({ player: sampleSwordsman(), enemy: sampleEnemy("aggressive"), seed, maxTurns, aiMode: "table" });

describe("runDuel", () => {
  it("misma semilla, mismo combate", () => {
    expect(duel(1337)).toEqual(duel(1337));
    expect(duel("arena-7")).toEqual(duel("arena-7"));
  });

  it("termina con un resultado coherente", () => {
    const r = duel(42);
    expect(["win", "lose", "draw"]).toContain(r.outcome);
    expect(r.turns).toBeLessThanOrEqual(500);
    expect(r.log[0]).toMatch(/^(Aren|Raider) acts first\. /);
    for (const e of r.timeline) {
      expect(e.turn).toBeLessThanOrEqual(r.turns);
      expect(e.playerHP).toBeGreaterThanOrEqual(0);
      expect(e.enemyHP).toBeGreaterThanOrEqual(0);
    }
    if (r.outcome === "win") expect(r.log[r.log.length - 1]).toBe("Fight over: victory.");
    if (r.outcome === "lose") expect(r.log[r.log.length - 1]).toBe("Fight over: defeat.");
    expect(r.finalHP.playerMax).toBe(100);
    expect(r.finalHP.enemyMax).toBe(100);
  });

  it("el límite de turnos da empate", () => {
    const r = duel(7, 1);
    expect(r.outcome).toBe("draw");
    expect(r.turns).toBe(1);
    expect(r.rounds).toBe(1);
    expect(r.timeline.every((e) => e.turn <= 1)).toBe(true);
  });
});
