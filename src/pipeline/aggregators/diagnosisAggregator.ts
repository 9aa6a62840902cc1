import { isWithinInterval } from "date-fns";
import type {
  DataIssue,
  DiagnosisCategory,
  DiagnosisFeatures,
  HospitalDiagnosisRow,
  TimeWindow,
} from "../../types.js";
import { isIcd10Format, type IcdCodeTable } from "../icdClassifier.js";

export interface DiagnosisAggregation {
  features: DiagnosisFeatures;
  issues: DataIssue[];
}

export function emptyDiagnosisCategories(): Record<DiagnosisCategory, boolean> {
  return {
    ischemic_heart: false,
    cerebrovascular: false,
    external_cause: false,
    sepsis: false,
    active_cancer: false,
  };
}

/**
 * Any-match over the stay's diagnoses. Rows without a timestamp count for
 * the whole stay; timed rows must fall inside the lifetime window. Rows in a
 * non-ICD-10 format are skipped and reported, never fatal.
 */
export function aggregateDiagnoses(
  rows: readonly HospitalDiagnosisRow[],
  lifetime: TimeWindow,
  codeTable: IcdCodeTable
): DiagnosisAggregation {
  const categories = emptyDiagnosisCategories();
  const issues: DataIssue[] = [];
  let considered = 0;
  let skipped = 0;

  for (const row of rows) {
    if (row.recorded_dttm !== null && !isWithinInterval(row.recorded_dttm, lifetime)) continue;

    if (!isIcd10Format(row.diagnosis_code_format)) {
      skipped++;
      issues.push({
        kind: "unknown_code_format",
        table: "hospital_diagnosis",
        hospitalizationId: row.hospitalization_id,
        detail: `code ${row.diagnosis_code ?? "<null>"} has format ${
          row.diagnosis_code_format ?? "<null>"
        }`,
      });
      continue;
    }
    if (row.diagnosis_code === null) continue;

    considered++;
    for (const category of codeTable.classify(row.diagnosis_code)) {
      categories[category] = true;
    }
  }

  return {
    features: { categories, recordsConsidered: considered, recordsSkipped: skipped },
    issues,
  };
}
