// src/battleSystem/core/Injury.ts
/**
 * Ciclo de vida de una herida:
 * - nace del daño aplicado (> 5), con sangrado sólo para cortes/perforaciones fuertes;
 * - cada `update(minutos)` sangra, cura, puede infectarse o dejar cicatriz;
 * - se retira del ledger cuando `update` informa `healed`.
 *
 * Precedencia de curación: tratada (×2) gana sobre infectada (×0.3).
 * Una herida tratada e infectada sigue curando a ritmo de tratada.
 */
import type { BodyPart, DamageType } from "./CombatTypes";
import { BODY_PARTS, DAMAGE_TYPES } from "./CombatTypes";
import type { Rng } from "./RngFightSeed";
import {
  BLEED_SELF_STOP_CHANCE,
  BLEEDING_DAMAGE_THRESHOLD,
  BLEEDING_RATE_DIVISOR,
  BLEEDING_TYPES,
  HEAL_MINUTES_PER_SEVERITY,
  HEAL_RATE_INFECTED,
  HEAL_RATE_NORMAL,
  HEAL_RATE_TREATED,
  HEAL_TYPE_MULT,
  INFECTION_CHANCE_PER_MINUTE,
  INFECTION_HEAL_TIME_MULT,
  INFECTION_SEVERE_THRESHOLD,
  INJURY_SEVERITY_PER_DAMAGE,
  SCAR_CHANCE,
  SCAR_SEVERITY_THRESHOLD,
  TREATMENT_HEAL_TIME_MULT,
} from "./CombatConfig";
import { MalformedCombatDataError, assertFiniteNonNegative, assertInRange, assertOneOf, readBoolean, readNumber, readRecord } from "./CombatErrors";

export interface InjuryData {
  bodyPart: BodyPart;
  severity: number;
  damageType: DamageType;
  bleeding: boolean;
  bleedingRate: number;
  infected: boolean;
  treated: boolean;
  timeToHeal: number; // minutos
  permanentScar: boolean;
}

export interface InjuryUpdate {
  bloodLoss: number;
  healed: boolean;
}

export class Injury {
  public bodyPart: BodyPart;
  public severity: number;
  public damageType: DamageType;
  public bleeding: boolean;
  public bleedingRate: number;
  public infected: boolean;
  public treated: boolean;
  public timeToHeal: number;
  public permanentScar: boolean;

  constructor(data: Pick<InjuryData, "bodyPart" | "severity" | "damageType"> & Partial<InjuryData>) {
    this.bodyPart = assertOneOf("bodyPart", data.bodyPart, BODY_PARTS);
    this.damageType = assertOneOf("damageType", data.damageType, DAMAGE_TYPES);
    this.severity = assertInRange("severity", data.severity, 0, 100);
    this.bleeding = data.bleeding ?? false;
    this.bleedingRate = assertFiniteNonNegative("bleedingRate", data.bleedingRate ?? 0);
    this.infected = data.infected ?? false;
    this.treated = data.treated ?? false;
    this.timeToHeal = assertFiniteNonNegative("timeToHeal", data.timeToHeal ?? this.severity * HEAL_MINUTES_PER_SEVERITY);
    this.permanentScar = data.permanentScar ?? false;
  }

  /** Avanza `deltaMinutes`. Sorteos en orden: corte de sangrado, cicatriz, infección. */
  update(deltaMinutes: number, rng: Rng): InjuryUpdate {
    const delta = Math.max(0, deltaMinutes);
    let bloodLoss = 0;

    if (this.bleeding && !this.treated) {
      bloodLoss = this.bleedingRate * (delta / 60);
      if (rng() < BLEED_SELF_STOP_CHANCE) {
        this.bleeding = false;
        this.bleedingRate = 0;
      }
    }

    if (this.timeToHeal > 0) {
      const healingRate = this.treated ? HEAL_RATE_TREATED : this.infected ? HEAL_RATE_INFECTED : HEAL_RATE_NORMAL;
      this.timeToHeal = Math.max(0, this.timeToHeal - delta * healingRate);

      if (this.timeToHeal <= 0) {
        if (this.severity > SCAR_SEVERITY_THRESHOLD && rng() < SCAR_CHANCE) this.permanentScar = true;
        return { bloodLoss, healed: true };
      }
    }

    if (!this.treated && !this.infected) {
      let infectionChance = INFECTION_CHANCE_PER_MINUTE * delta;
      if (this.severity > INFECTION_SEVERE_THRESHOLD) infectionChance *= 2;
      if (rng() < infectionChance) {
        this.infected = true;
        this.timeToHeal *= INFECTION_HEAL_TIME_MULT;
      }
    }

    return { bloodLoss, healed: false };
  }

  /** Vendaje/tratamiento: corta el sangrado y acorta la curación. */
  treat(): void {
    this.treated = true;
    this.bleeding = false;
    this.timeToHeal *= TREATMENT_HEAL_TIME_MULT;
  }

  toData(): InjuryData {
    return {
      bodyPart: this.bodyPart,
      severity: this.severity,
      damageType: this.damageType,
      bleeding: this.bleeding,
      bleedingRate: this.bleedingRate,
      infected: this.infected,
      treated: this.treated,
      timeToHeal: this.timeToHeal,
      permanentScar: this.permanentScar,
    };
  }

  static fromData(raw: unknown): Injury {
    const r = readRecord("injury", raw);
    return new Injury({
      bodyPart: assertOneOf("bodyPart", r.bodyPart, BODY_PARTS),
      severity: readNumber(r, "severity"),
      damageType: assertOneOf("damageType", r.damageType, DAMAGE_TYPES),
      bleeding: readBoolean(r, "bleeding"),
      bleedingRate: readNumber(r, "bleedingRate"),
      infected: readBoolean(r, "infected"),
      treated: readBoolean(r, "treated"),
      timeToHeal: readNumber(r, "timeToHeal"),
      permanentScar: readBoolean(r, "permanentScar"),
    });
  }
}

/** Fábrica: severidad = min(100, daño×3); sangra sólo corte/perforación con daño > 10. */
export function createInjury(damage: number, bodyPart: BodyPart, damageType: DamageType): Injury {
  const dmg = Math.max(0, damage);
  const severity = Math.min(100, dmg * INJURY_SEVERITY_PER_DAMAGE);
  const bleeding = BLEEDING_TYPES.includes(damageType) && dmg > BLEEDING_DAMAGE_THRESHOLD;
  const timeToHeal = severity * HEAL_MINUTES_PER_SEVERITY * (HEAL_TYPE_MULT[damageType] ?? 1);
  return new Injury({
    bodyPart,
    severity,
    damageType,
    bleeding,
    bleedingRate: bleeding ? dmg / BLEEDING_RATE_DIVISOR : 0,
    timeToHeal,
  });
}

/* ───────────────── Colección por parte del cuerpo ───────────────── */

export interface LedgerUpdate {
  bloodLoss: number;
  healed: Injury[];
}

export class InjuryLedger {
  private parts: Record<BodyPart, Injury[]> = { head: [], torso: [], leftArm: [], rightArm: [], leftLeg: [], rightLeg: [] };

  add(injury: Injury): void {
    this.parts[injury.bodyPart].push(injury);
  }

  byPart(part: BodyPart): readonly Injury[] {
    return this.parts[part];
  }

  all(): Injury[] {
    return BODY_PARTS.flatMap((p) => this.parts[p]);
  }

  get size(): number {
    return this.all().length;
  }

  totalSeverity(): number {
    return this.all().reduce((acc, i) => acc + i.severity, 0);
  }

  severityByPart(): Record<BodyPart, number> {
    const out: Record<BodyPart, number> = { head: 0, torso: 0, leftArm: 0, rightArm: 0, leftLeg: 0, rightLeg: 0 };
    for (const part of BODY_PARTS) out[part] = this.parts[part].reduce((acc, i) => acc + i.severity, 0);
    return out;
  }

  /** Ritmo de sangrado vigente (heridas sangrando y sin tratar). */
  bleedingRate(): number {
    return this.all().reduce((acc, i) => acc + (i.bleeding && !i.treated ? i.bleedingRate : 0), 0);
  }

  /** Avanza todas las heridas (orden fijo por parte) y retira las curadas. */
  update(deltaMinutes: number, rng: Rng): LedgerUpdate {
    let bloodLoss = 0;
    const healed: Injury[] = [];
    for (const part of BODY_PARTS) {
      const kept: Injury[] = [];
      for (const inj of this.parts[part]) {
        const r = inj.update(deltaMinutes, rng);
        bloodLoss += r.bloodLoss;
        if (r.healed) healed.push(inj);
        else kept.push(inj);
      }
      this.parts[part] = kept;
    }
    return { bloodLoss, healed };
  }

  mostSevereUntreated(): Injury | null {
    let worst: Injury | null = null;
    for (const inj of this.all()) {
      if (!inj.treated && (!worst || inj.severity > worst.severity)) worst = inj;
    }
    return worst;
  }

  clear(): void {
    for (const part of BODY_PARTS) this.parts[part] = [];
  }

  toData(): InjuryData[] {
    return this.all().map((i) => i.toData());
  }

  static fromData(raw: unknown): InjuryLedger {
    const ledger = new InjuryLedger();
    if (!Array.isArray(raw)) throw new MalformedCombatDataError("injuries", raw, "se esperaba una lista");
    for (const item of raw) ledger.add(Injury.fromData(item));
    return ledger;
  }
}
