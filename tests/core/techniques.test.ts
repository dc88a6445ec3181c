import { describe, it, expect } from "vitest";
import { ComboTracker, TechniqueEngine, TECHNIQUES, findTechnique } from "../../src/battleSystem/core/TechniqueEngine";
import { StatusEngine } from "../../src/battleSystem/core/StatusEngine";
import { weaponFromTemplate } from "../../src/battleSystem/core/Weapon";
import { armorFromBase } from "../../src/battleSystem/core/Armor";
import { PlayerCharacter } from "../../src/battleSystem/entities/PlayerCharacter";
import type { CombatantInit } from "../../src/battleSystem/entities/CombatantBase";
import { scriptedRng } from "../helpers/scriptedRng";

const fighter = (init: Partial<CombatantInit> = {}) => new PlayerCharacter({ id: "a", name: "Attacker", ...init });
const target = (init: Partial<CombatantInit> = {}) => new PlayerCharacter({ id: "d", name: "Target", ...init });

describe("TechniqueEngine.execute", () => {
  it("Cleave: sangrado por sorteo, sólo la armadura mitiga", () => {
    const rng = scriptedRng([0.5, 0.9, 0.5]);
    const engine = new TechniqueEngine({ rng });
    const attacker = fighter({ weapon: weaponFromTemplate("axe"), skills: { axes: 20 } });
    const defender = target({ skills: { defense: 10 } });

    const out = engine.execute(attacker, defender, "cleave");
    expect(out.executed).toBe(true);
    if (!out.executed) return;
    const r = out.result;
    expect(r.hit).toBe(true);
    expect(r.hitChance).toBeCloseTo(0.6, 10);
    expect(r.critical).toBe(false);
    expect(r.damage).toBeCloseTo(32.4, 10);
    expect(r.painCaused).toBe(40);
    expect(r.effects).toEqual(["bleeding"]);
    expect(r.bodyPart).toBe("torso");
    expect(r.description).toBe("Cleave hits for 32.4 damage!");

    const d = defender.stats();
    expect(d.health).toBeCloseTo(67.6, 10);
    expect(d.isBleeding).toBe(true);
    expect(d.totalBleedingRate).toBeCloseTo(1.62, 10);
    expect(attacker.stats().stamina).toBe(85);
    expect(attacker.stats().memory.lastDamageDealt).toBeCloseTo(32.4, 10);
    expect(rng.remaining()).toBe(0);
  });

  it("Knockout sin arma: cabeza, herida y aturdimiento de 2", () => {
    const rng = scriptedRng([0.1, 0.9]);
    const engine = new TechniqueEngine({ rng });
    const attacker = fighter({ skills: { unarmed: 20 } });
    const defender = target();

    const out = engine.execute(attacker, defender, "knockout");
    expect(out.executed).toBe(true);
    if (!out.executed) return;
    expect(out.result.damage).toBe(20);
    expect(out.result.bodyPart).toBe("head");
    expect(out.result.effects).toEqual(["stun_2"]);

    const d = defender.stats();
    expect(d.isStunned).toBe(true);
    expect(d.stunDuration).toBe(2);
    expect(defender.injuries().byPart("head")).toHaveLength(1);
    expect(defender.injuries().byPart("head")[0]?.severity).toBe(60);
  });

  it("Master Strike: medio blindaje ignorado y miedo sobre el defensor", () => {
    const rng = scriptedRng([0.99, 0.9, 0.1]);
    const status = new StatusEngine(scriptedRng([]));
    const engine = new TechniqueEngine({ rng, status });
    const attacker = fighter({ weapon: weaponFromTemplate("longsword"), skills: { swords: 60 } });
    const defender = target({ armor: armorFromBase("Plate", 50) });
    status.attach("enemy", defender.stats());

    const out = engine.execute(attacker, defender, "masterStrike", "enemy");
    expect(out.executed).toBe(true);
    if (!out.executed) return;
    expect(out.result.hitChance).toBe(1);
    expect(out.result.damage).toBe(45);
    expect(out.result.effects).toEqual(["armor_pierced", "fear"]);
    expect(out.result.description).toBe("Master Strike hits for 45.0 damage!");
    expect(status.has("enemy", "fear")).toBe(true);
    expect(defender.stats().accuracyMultiplier).toBeCloseTo(0.85, 10);
  });

  it("fallo: gasta stamina y no toca al defensor", () => {
    const engine = new TechniqueEngine({ rng: scriptedRng([0.5]) });
    const attacker = fighter({ weapon: weaponFromTemplate("shortsword"), skills: { swords: 5 } });
    const defender = target({ skills: { defense: 50 } });

    const out = engine.execute(attacker, defender, "horizontalSlash");
    expect(out.executed).toBe(true);
    if (!out.executed) return;
    expect(out.result.hit).toBe(false);
    expect(out.result.hitChance).toBeCloseTo(0.05, 10);
    expect(out.result.description).toBe("Horizontal Slash misses!");
    expect(attacker.stats().stamina).toBe(92);
    expect(defender.stats().health).toBe(100);
  });

  it("el defensor que llega a 80 de dolor se desploma", () => {
    const engine = new TechniqueEngine({ rng: scriptedRng([0, 0.9, 0.9]) });
    const attacker = fighter({ weapon: weaponFromTemplate("axe"), skills: { axes: 20 } });
    const defender = target({ stats: { pain: 60 } });

    const out = engine.execute(attacker, defender, "cleave");
    expect(out.executed).toBe(true);
    if (!out.executed) return;
    expect(out.result.description).toBe("Cleave hits for 32.4 damage! The target collapses!");
    expect(defender.stats().isConscious).toBe(false);
  });

  it("rechazos sin mutar estado", () => {
    const engine = new TechniqueEngine({ rng: scriptedRng([]) });
    const swordsman = fighter({ weapon: weaponFromTemplate("longsword"), skills: { swords: 30 } });

    expect(engine.execute(swordsman, target(), "masterStrike")).toEqual({ executed: false, reason: "requirements_not_met", description: "Cannot perform Master Strike!" });
    expect(engine.execute(swordsman, target(), "cleave")).toEqual({ executed: false, reason: "requirements_not_met", description: "Cannot perform Cleave!" });
    expect(engine.execute(swordsman, target(), "nope")).toEqual({ executed: false, reason: "unknown_technique", description: 'Unknown technique "nope".' });

    const tired = fighter({ skills: { unarmed: 20 }, stats: { stamina: 10 } });
    expect(engine.execute(tired, target(), "knockout")).toEqual({ executed: false, reason: "insufficient_stamina", description: "Cannot perform Knockout!" });
    expect(swordsman.stats().stamina).toBe(100);
    expect(tired.stats().stamina).toBe(10);
  });

  it("available filtra por habilidad, arma y stamina", () => {
    const engine = new TechniqueEngine({ rng: scriptedRng([]) });
    const swordsman = fighter({ weapon: weaponFromTemplate("longsword"), skills: { swords: 30 } });
    expect(engine.available(swordsman).map((t) => t.id)).toEqual(["horizontalSlash", "preciseThrust", "spinningDance"]);
    expect(findTechnique("piercingShot")?.weaponTypes).toEqual(["bows", "crossbows"]);
    expect(TECHNIQUES).toHaveLength(7);
  });
});

describe("ComboTracker", () => {
  it("dos Horizontal Slash seguidos abren Spinning Dance", () => {
    const combos = new ComboTracker();
    expect(combos.checkComboOpportunity("a", "horizontalSlash")).toBeNull();
    expect(combos.checkComboOpportunity("a", "horizontalSlash")?.id).toBe("spinningDance");
    expect(combos.historyOf("a")).toEqual(["horizontalSlash", "horizontalSlash"]);
    expect(combos.historyOf("b")).toEqual([]);
  });

  it("la ventana dura dos rondas y luego se olvida el historial", () => {
    const combos = new ComboTracker();
    combos.record("a", "horizontalSlash");
    combos.tickWindows();
    expect(combos.historyOf("a")).toEqual(["horizontalSlash"]);
    combos.tickWindows();
    expect(combos.historyOf("a")).toEqual([]);
    expect(combos.checkComboOpportunity("a", "horizontalSlash")).toBeNull();
  });

  it("el historial se acota a 10 pasos", () => {
    const combos = new ComboTracker();
    for (let i = 0; i < 12; i++) combos.record("a", i % 2 ? "basic" : "block");
    expect(combos.historyOf("a")).toHaveLength(10);
    expect(combos.historyOf("a")[9]).toBe("basic");
  });
});
