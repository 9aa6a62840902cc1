import type { AssessmentFeatures, PatientAssessmentRow } from "../../types.js";

/**
 * Most recent GCS total and RASS before death, for descriptive tables only.
 * Expects rows restricted to the before-death window, oldest first.
 */
export function aggregateAssessments(rows: readonly PatientAssessmentRow[]): AssessmentFeatures {
  let gcsTotal: number | null = null;
  let rass: number | null = null;

  for (const row of rows) {
    if (row.numerical_value === null) continue;
    if (row.assessment_category === "gcs_total") gcsTotal = row.numerical_value;
    else if (row.assessment_category === "rass") rass = row.numerical_value;
  }

  return { gcsTotal, rass };
}
