import type { VitalFeatures, VitalRow } from "../../types.js";

/** weight_kg / (height_cm / 100)²; unknown unless both inputs are known and height is positive. */
export function computeBmi(weightKg: number | null, heightCm: number | null): number | null {
  if (weightKg === null || heightCm === null || heightCm <= 0) return null;
  const heightM = heightCm / 100;
  return weightKg / (heightM * heightM);
}

/**
 * Nearest-prior-observation reduction: the last recorded weight and height
 * at or before death. Expects rows restricted to the before-death window,
 * oldest first.
 */
export function aggregateVitals(rows: readonly VitalRow[]): VitalFeatures {
  let weightKg: number | null = null;
  let heightCm: number | null = null;

  for (const row of rows) {
    if (row.vital_value === null) continue;
    if (row.vital_category === "weight_kg") weightKg = row.vital_value;
    else if (row.vital_category === "height_cm") heightCm = row.vital_value;
  }

  return {
    weightKg,
    heightCm,
    bmi: computeBmi(weightKg, heightCm),
    firstRecordedAt: rows[0]?.recorded_dttm ?? null,
    lastRecordedAt: rows[rows.length - 1]?.recorded_dttm ?? null,
  };
}
