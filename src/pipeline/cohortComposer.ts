import type {
  CohortComposition,
  CohortDefinition,
  CohortOutcome,
  CohortSubject,
  StageDefinition,
  StageName,
  StageStep,
  StageTrace,
  TerminalState,
} from "../types.js";

// ── Shared stages ─────────────────────────────────────────────────────────────

const EXPIRED: StageDefinition = {
  name: "expired",
  label: "Inpatient hospital deaths",
  exclusionReason: "Not expired, or superseded by a later death hospitalization",
  passes: (s) => s.hospitalization.isDeathHospitalization,
};

const DEATH_TIME_RESOLVED: StageDefinition = {
  name: "death_time_resolved",
  label: "Death time available",
  exclusionReason: "Missing death time",
  passes: (s) => s.hospitalization.deathTs !== null && s.flags !== null,
};

// ── Definitions ───────────────────────────────────────────────────────────────

export const CALC_STAGES: readonly StageDefinition[] = [
  EXPIRED,
  DEATH_TIME_RESOLVED,
  {
    name: "age_eligible",
    label: "Aged <=75 at death",
    exclusionReason: "Older than 75 at death, or age unknown",
    passes: (s) => s.flags?.calc.ageEligible ?? false,
  },
  {
    name: "cause_eligible",
    label: "Cause of death consistent with donation",
    exclusionReason: "No ischemic heart, cerebrovascular or external-cause diagnosis",
    passes: (s) => s.flags?.calc.causeEligible ?? false,
  },
  {
    name: "no_contraindication",
    label: "No contraindications",
    exclusionReason: "Sepsis or active cancer diagnosis",
    passes: (s) => s.flags?.calc.noContraindication ?? false,
  },
];

export const CLIF_STAGES: readonly StageDefinition[] = [
  EXPIRED,
  DEATH_TIME_RESOLVED,
  {
    name: "location_eligible",
    label: "Died in ED, ward, stepdown or ICU",
    exclusionReason: "Location at death not ED, ward, stepdown or ICU, or unknown",
    passes: (s) => s.flags?.clif.locationEligible ?? false,
  },
  {
    name: "age_eligible",
    label: "Aged <=75 at death",
    exclusionReason: "Older than 75 at death, or age unknown",
    passes: (s) => s.flags?.clif.ageEligible ?? false,
  },
  {
    name: "imv_eligible",
    label: "IMV within 48hrs of death",
    exclusionReason: "No invasive mechanical ventilation within 48h of death",
    passes: (s) => s.flags?.clif.imvEligible ?? false,
  },
  {
    name: "no_contraindication",
    label: "No contraindications",
    exclusionReason: "Sepsis, active cancer, or positive blood culture within 48h",
    passes: (s) => s.flags?.clif.noContraindication ?? false,
  },
  {
    name: "organ_quality_eligible",
    label: "Pass organ quality assessment",
    exclusionReason: "Neither kidney nor liver eligible, or BMI above 50 or unknown",
    passes: (s) => s.flags?.clif.organQualityEligible ?? false,
  },
];

export const STAGES: Record<CohortDefinition, readonly StageDefinition[]> = {
  CALC: CALC_STAGES,
  CLIF: CLIF_STAGES,
};

// ── Composition ───────────────────────────────────────────────────────────────

/**
 * Runs one hospitalization through a definition's stages in order and stops
 * at the first failing stage. Exactly one terminal state results.
 */
export function evaluateCohort(
  subject: CohortSubject,
  definition: CohortDefinition
): CohortOutcome {
  const steps: StageStep[] = [];
  let terminal: TerminalState = { status: "included" };

  for (const stage of STAGES[definition]) {
    const passed = stage.passes(subject);
    steps.push({ stage: stage.name, passed });

    if (!passed) {
      terminal = { status: "excluded", stage: stage.name };
      break; // short-circuit: later stages are not evaluated
    }
  }

  return {
    definition,
    hospitalizationId: subject.hospitalization.hospitalizationId,
    terminal,
    steps,
  };
}

/**
 * Evaluates every subject and folds the outcomes into the append-only stage
 * trace: one tuple per stage, in stage order.
 */
export function composeCohort(
  definition: CohortDefinition,
  subjects: readonly CohortSubject[]
): CohortComposition {
  const outcomes = subjects.map((s) => evaluateCohort(s, definition));

  const excludedAt = new Map<StageName, number>();
  for (const o of outcomes) {
    if (o.terminal.status === "excluded") {
      excludedAt.set(o.terminal.stage, (excludedAt.get(o.terminal.stage) ?? 0) + 1);
    }
  }

  const trace: StageTrace[] = [];
  let remaining = outcomes.length;
  for (const stage of STAGES[definition]) {
    const excludedCount = excludedAt.get(stage.name) ?? 0;
    trace.push({
      stage: stage.name,
      label: stage.label,
      cohortSizeBefore: remaining,
      cohortSizeAfter: remaining - excludedCount,
      excludedCount,
      exclusionReason: stage.exclusionReason,
    });
    remaining -= excludedCount;
  }

  return {
    definition,
    outcomes,
    trace,
    includedCount: outcomes.filter((o) => o.terminal.status === "included").length,
  };
}
