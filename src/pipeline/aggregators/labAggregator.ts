import type { LabFeatures, LabRow, OrganLab } from "../../types.js";

export const ORGAN_LABS: readonly OrganLab[] = ["creatinine", "bilirubin_total", "ast", "alt"];

function isOrganLab(category: string | null): category is OrganLab {
  return ORGAN_LABS.some((lab) => lab === category);
}

/**
 * Worst (maximum) value per organ lab. Every organ-quality threshold is an
 * upper bound, so the maximum is the clinically relevant value. Expects the
 * rows already restricted to the lifetime window, oldest first; on equal
 * maxima the earliest collection wins.
 */
export function aggregateLabs(rows: readonly LabRow[]): LabFeatures {
  const worst: LabFeatures = { creatinine: null, bilirubin_total: null, ast: null, alt: null };

  for (const row of rows) {
    const cat = row.lab_category;
    const value = row.lab_value_numeric;
    if (!isOrganLab(cat) || value === null) continue;

    const current = worst[cat];
    if (current === null || value > current.value) {
      worst[cat] = { value, collectedAt: row.lab_collect_dttm };
    }
  }

  return worst;
}
