import { describe, expect, it } from "vitest";
import { composeCohort } from "../../src/pipeline/cohortComposer.js";
import { evaluateEligibility } from "../../src/pipeline/criteriaEvaluator.js";
import { buildFunnel, toFunnelTable } from "../../src/pipeline/funnelTracker.js";
import type { CohortComposition, CohortSubject } from "../../src/types.js";
import { makeFeatures, makeHospitalization } from "../helpers/records.js";

// ── Helpers ───────────────────────────────────────────────────────────────────

function subject(id: string, overrides: { expired?: boolean; age?: number } = {}): CohortSubject {
  const expired = overrides.expired ?? true;
  const age = overrides.age ?? 60;
  return {
    hospitalization: makeHospitalization({
      hospitalizationId: id,
      isDeathHospitalization: expired,
      deathTs: expired ? new Date("2024-03-10T12:00:00.000Z") : null,
      ageAtDeath: expired ? age : null,
    }),
    flags: expired ? evaluateEligibility(makeFeatures({ ageAtDeath: age })) : null,
  };
}

// ── Tests ─────────────────────────────────────────────────────────────────────

describe("L7 · funnelTracker", () => {
  it("turns the stage trace into flow-diagram rows", () => {
    const composition = composeCohort("CALC", [
      subject("h-1", { expired: false }),
      subject("h-2", { age: 82 }),
      subject("h-3"),
    ]);
    const funnel = buildFunnel(composition);

    expect(funnel.definition).toBe("CALC");
    expect(funnel.total).toBe(3);
    expect(funnel.rows.map((r) => [r.order, r.stage, r.nRemaining, r.nDropped, r.percentOfTotal])).toEqual([
      [1, "expired", 2, 1, 66.67],
      [2, "death_time_resolved", 2, 0, 66.67],
      [3, "age_eligible", 1, 1, 33.33],
      [4, "cause_eligible", 1, 0, 33.33],
      [5, "no_contraindication", 1, 0, 33.33],
    ]);
    expect(funnel.rows[2].dropReason).toBe("Older than 75 at death, or age unknown");
  });

  it("ends at the included cohort size", () => {
    const composition = composeCohort("CLIF", [subject("h-1"), subject("h-2"), subject("h-3", { age: 90 })]);
    const funnel = buildFunnel(composition);

    expect(funnel.rows[funnel.rows.length - 1].nRemaining).toBe(composition.includedCount);
    expect(composition.includedCount).toBe(2);
  });

  it("reports zero percentages for an empty input", () => {
    const funnel = buildFunnel(composeCohort("CLIF", []));

    expect(funnel.total).toBe(0);
    expect(funnel.rows.every((r) => r.nRemaining === 0 && r.percentOfTotal === 0)).toBe(true);
  });

  it("rejects a trace whose remaining count grows", () => {
    const broken: CohortComposition = {
      definition: "CALC",
      outcomes: [],
      includedCount: 0,
      trace: [
        {
          stage: "expired",
          label: "Inpatient hospital deaths",
          cohortSizeBefore: 0,
          cohortSizeAfter: 2,
          excludedCount: -2,
          exclusionReason: "Not expired",
        },
      ],
    };

    expect(() => buildFunnel(broken)).toThrow("CALC funnel grows at stage expired: 0 → 2");
  });

  it("rejects a trace that does not end at the included count", () => {
    const composition = composeCohort("CALC", [subject("h-1")]);
    const broken: CohortComposition = { ...composition, includedCount: 0 };

    expect(() => buildFunnel(broken)).toThrow(
      "CALC funnel ends at 1 but 0 hospitalizations are included"
    );
  });

  it("flattens funnels into export rows with a stage-0 total", () => {
    const funnel = buildFunnel(composeCohort("CALC", [subject("h-1"), subject("h-2", { age: 80 })]));
    const table = toFunnelTable([funnel]);

    expect(table[0]).toEqual({
      definition: "CALC",
      stage: 0,
      filterDescription: "All hospitalizations",
      n: 2,
      percentage: 100,
    });
    expect(table[3]).toEqual({
      definition: "CALC",
      stage: 3,
      filterDescription: "Aged <=75 at death",
      n: 1,
      percentage: 50,
    });
    expect(table).toHaveLength(6);
  });
});
