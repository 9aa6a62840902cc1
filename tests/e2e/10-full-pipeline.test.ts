import { describe, expect, it } from "vitest";
import { runPipeline } from "../../src/pipeline/index.js";
import type { PipelineResult, RawTables } from "../../src/types.js";
import {
  beforeDeath,
  bloodCulture,
  bodySize,
  buildTables,
  combine,
  crrt,
  diagnosis,
  imv,
  lab,
  normalLabs,
  silentLogger,
  stay,
} from "../helpers/tables.js";

/**
 * L10 · Full end-to-end pipeline
 *
 * A small site extract covering the cohort-defining scenarios:
 *   aged out, kidney-only organ quality, CRRT without liver labs,
 *   ventilation outside the lookback, positive blood culture, and a
 *   discharge home. Every hospitalization must land in exactly one terminal
 *   state per definition, and the run must be repeatable.
 */

// ── Site extract ──────────────────────────────────────────────────────────────

const EXTRACT = combine(
  // Aged 80 at death, otherwise eligible
  stay("h-80", { birthDate: "1944-03-10T00:00:00.000Z" }),
  normalLabs("h-80"),
  bodySize("h-80", 80, 180),
  imv("h-80", beforeDeath(6)),
  diagnosis("h-80", "I21.4"),

  // IMV at death - 40h, creatinine 3.5 only, BMI 28, no qualifying cause
  stay("h-kidney"),
  lab("h-kidney", "creatinine", 3.5, beforeDeath(30)),
  bodySize("h-kidney", 85.75, 175),
  imv("h-kidney", beforeDeath(40)),

  // CRRT with creatinine 2.0 and no liver labs
  stay("h-crrt"),
  lab("h-crrt", "creatinine", 2.0, beforeDeath(30)),
  crrt("h-crrt", beforeDeath(120)),
  bodySize("h-crrt", 80, 180),
  imv("h-crrt", beforeDeath(6)),
  diagnosis("h-crrt", "I63.9"),

  // Ventilated only 50h before death
  stay("h-late-imv", { location: "Ward" }),
  normalLabs("h-late-imv"),
  bodySize("h-late-imv", 80, 180),
  imv("h-late-imv", beforeDeath(50)),
  diagnosis("h-late-imv", "V43.52XA"),

  // Positive blood culture 12h before death
  stay("h-culture"),
  normalLabs("h-culture"),
  bodySize("h-culture", 80, 180),
  imv("h-culture", beforeDeath(6)),
  diagnosis("h-culture", "I21.4"),
  bloodCulture("h-culture", "no_growth", beforeDeath(30)),
  bloodCulture("h-culture", "Staphylococcus_Aureus", beforeDeath(12)),

  // Discharged home
  stay("h-home", { dischargeCategory: "Home", deathDttm: null })
);

function terminals(result: PipelineResult): Record<string, [string, string]> {
  const out: Record<string, [string, string]> = {};
  for (const h of result.hospitalizations) {
    const label = (t: typeof h.calc) => (t.status === "included" ? "included" : `excluded@${t.stage}`);
    out[h.hospitalization.hospitalizationId] = [label(h.calc), label(h.clif)];
  }
  return out;
}

function reversed(tables: RawTables): RawTables {
  const flip = (t: RawTables[keyof RawTables]) => ({ columns: t.columns, rows: [...t.rows].reverse() });
  return {
    patient: flip(tables.patient),
    hospitalization: flip(tables.hospitalization),
    adt: flip(tables.adt),
    vitals: flip(tables.vitals),
    labs: flip(tables.labs),
    respiratory_support: flip(tables.respiratory_support),
    microbiology_culture: flip(tables.microbiology_culture),
    crrt_therapy: flip(tables.crrt_therapy),
    hospital_diagnosis: flip(tables.hospital_diagnosis),
    patient_assessments: flip(tables.patient_assessments),
  };
}

// ── Tests ─────────────────────────────────────────────────────────────────────

describe("L10 · full E2E pipeline", () => {
  const result = runPipeline(buildTables(EXTRACT), { siteName: "Test Site", logger: silentLogger() });

  it("assigns every hospitalization one terminal state per definition", () => {
    expect(terminals(result)).toEqual({
      "h-80": ["excluded@age_eligible", "excluded@age_eligible"],
      "h-kidney": ["excluded@cause_eligible", "included"],
      "h-crrt": ["included", "excluded@organ_quality_eligible"],
      "h-late-imv": ["included", "excluded@imv_eligible"],
      "h-culture": ["included", "excluded@no_contraindication"],
      "h-home": ["excluded@expired", "excluded@expired"],
    });
  });

  it("passes kidney-only organ quality at creatinine 3.5 with BMI 28", () => {
    const h = result.hospitalizations.find((a) => a.hospitalization.hospitalizationId === "h-kidney");

    expect(h?.features?.vitals.bmi).toBeCloseTo(28, 6);
    expect(h?.flags?.clif.kidneyEligible).toBe(true);
    expect(h?.flags?.clif.liverEligible).toBe(false);
    expect(h?.flags?.clif.organQualityEligible).toBe(true);
  });

  it("fails organ quality on CRRT plus missing liver labs", () => {
    const h = result.hospitalizations.find((a) => a.hospitalization.hospitalizationId === "h-crrt");

    expect(h?.features?.crrt).toEqual({ crrtEver: true, recordCount: 1 });
    expect(h?.flags?.clif.kidneyEligible).toBe(false);
    expect(h?.flags?.clif.liverEligible).toBe(false);
    expect(h?.flags?.clif.organQualityEligible).toBe(false);
  });

  it("records the aged-out death under the age stage in both funnels", () => {
    for (const definition of ["CALC", "CLIF"] as const) {
      const ageRow = result.funnels[definition].rows.find((r) => r.stage === "age_eligible");
      expect(ageRow?.nDropped).toBe(1);
    }
  });

  it("produces funnels that end at the included cohorts", () => {
    expect(result.funnels.CALC.rows.map((r) => r.nRemaining)).toEqual([5, 5, 4, 3, 3]);
    expect(result.funnels.CLIF.rows.map((r) => r.nRemaining)).toEqual([5, 5, 5, 4, 3, 2, 1]);
    expect(result.cohorts.CALC.includedCount).toBe(3);
    expect(result.cohorts.CLIF.includedCount).toBe(1);
  });

  it("produces identical results when re-run on the same tables", () => {
    const again = runPipeline(buildTables(EXTRACT), { siteName: "Test Site", logger: silentLogger() });

    expect(again.hospitalizations).toEqual(result.hospitalizations);
    expect(again.cohorts).toEqual(result.cohorts);
    expect(again.funnels).toEqual(result.funnels);
    expect(again.tableOne).toEqual(result.tableOne);
  });

  it("does not depend on input row order", () => {
    const shuffled = runPipeline(reversed(buildTables(EXTRACT)), { logger: silentLogger() });

    expect(terminals(shuffled)).toEqual(terminals(result));
    const features = (r: PipelineResult) =>
      Object.fromEntries(r.hospitalizations.map((h) => [h.hospitalization.hospitalizationId, h.features]));
    expect(features(shuffled)).toEqual(features(result));
  });
});
