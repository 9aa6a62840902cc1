import type {
  DiagnosisFeatures,
  EligibilityFlags,
  FeatureRecord,
  FlagName,
  LabFeatures,
} from "../types.js";

/**
 * Verdict for any criterion whose required input is unknown. Both donor
 * definitions treat missing data as failing the check.
 */
export const MISSING_DATA_VERDICT = false;

export const MAX_DONOR_AGE_YEARS = 75;
export const CREATININE_LIMIT = 4;
export const BILIRUBIN_TOTAL_LIMIT = 4;
export const AST_LIMIT = 700;
export const ALT_LIMIT = 700;
export const MAX_BMI = 50;

export const ELIGIBLE_DEATH_LOCATIONS: ReadonlySet<string> = new Set([
  "ed",
  "ward",
  "stepdown",
  "icu",
]);

function whenKnown<T>(value: T | null, check: (v: T) => boolean): boolean {
  return value === null ? MISSING_DATA_VERDICT : check(value);
}

// ── Single criteria ───────────────────────────────────────────────────────────

export function evaluateAge(ageAtDeath: number | null): boolean {
  return whenKnown(ageAtDeath, (age) => age <= MAX_DONOR_AGE_YEARS);
}

export function evaluateLocation(locationAtDeath: string | null): boolean {
  return whenKnown(locationAtDeath, (loc) => ELIGIBLE_DEATH_LOCATIONS.has(loc));
}

/** CALC cause: ischemic heart, cerebrovascular or external cause. */
export function evaluateCause(diagnoses: DiagnosisFeatures): boolean {
  const c = diagnoses.categories;
  return c.ischemic_heart || c.cerebrovascular || c.external_cause;
}

export function evaluateNoContraindication(
  diagnoses: DiagnosisFeatures,
  positiveBloodCulture: boolean
): boolean {
  const c = diagnoses.categories;
  return !c.sepsis && !c.active_cancer && !positiveBloodCulture;
}

export function evaluateKidney(labs: LabFeatures, crrtEver: boolean): boolean {
  const creatinineOk = whenKnown(labs.creatinine, (m) => m.value < CREATININE_LIMIT);
  return creatinineOk && !crrtEver;
}

/** All three labs required; partial data is not partial credit. */
export function evaluateLiver(labs: LabFeatures): boolean {
  const { bilirubin_total, ast, alt } = labs;
  if (bilirubin_total === null || ast === null || alt === null) return MISSING_DATA_VERDICT;
  return bilirubin_total.value < BILIRUBIN_TOTAL_LIMIT && ast.value < AST_LIMIT && alt.value < ALT_LIMIT;
}

export function evaluateBmi(bmi: number | null): boolean {
  return whenKnown(bmi, (value) => value <= MAX_BMI);
}

// ── Combined flags ────────────────────────────────────────────────────────────

/**
 * Evaluates every criterion for both definitions. Total over all inputs:
 * unknown values resolve through MISSING_DATA_VERDICT and are listed in
 * `defaultedByMissingData`.
 */
export function evaluateEligibility(features: FeatureRecord): EligibilityFlags {
  const { labs, diagnoses } = features;

  const ageEligible = evaluateAge(features.ageAtDeath);
  const locationEligible = evaluateLocation(features.location.locationAtDeath);
  const causeEligible = evaluateCause(diagnoses);
  const calcNoContraindication = evaluateNoContraindication(diagnoses, false);
  const clifNoContraindication = evaluateNoContraindication(
    diagnoses,
    features.microbiology.positiveBloodCulture48h
  );
  const kidneyEligible = evaluateKidney(labs, features.crrt.crrtEver);
  const liverEligible = evaluateLiver(labs);
  const bmiEligible = evaluateBmi(features.vitals.bmi);
  const organQualityEligible = (kidneyEligible || liverEligible) && bmiEligible;
  const imvEligible = features.respiratory.imvWithin48h;

  const defaulted: FlagName[] = [];
  if (features.ageAtDeath === null) defaulted.push("age_eligible");
  if (features.location.locationAtDeath === null) defaulted.push("location_eligible");
  if (labs.creatinine === null && !features.crrt.crrtEver) defaulted.push("kidney_eligible");
  if (labs.bilirubin_total === null || labs.ast === null || labs.alt === null) {
    defaulted.push("liver_eligible");
  }
  if (features.vitals.bmi === null) defaulted.push("bmi_eligible");

  return {
    calc: {
      ageEligible,
      causeEligible,
      noContraindication: calcNoContraindication,
      overallEligible: ageEligible && causeEligible && calcNoContraindication,
    },
    clif: {
      locationEligible,
      ageEligible,
      imvEligible,
      noContraindication: clifNoContraindication,
      kidneyEligible,
      liverEligible,
      bmiEligible,
      organQualityEligible,
      overallEligible:
        locationEligible &&
        ageEligible &&
        imvEligible &&
        clifNoContraindication &&
        organQualityEligible,
    },
    defaultedByMissingData: defaulted,
  };
}
