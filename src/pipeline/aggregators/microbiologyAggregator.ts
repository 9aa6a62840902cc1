import type { MicrobiologyCultureRow, MicrobiologyFeatures } from "../../types.js";

export function isBloodCulture(row: MicrobiologyCultureRow): boolean {
  return row.fluid_category === "blood_buffy" && row.method_category === "culture";
}

/** No organism recorded, or an explicit no-growth result. */
export function isNegativeCulture(row: MicrobiologyCultureRow): boolean {
  return row.organism_category === null || row.organism_category.includes("no_growth");
}

/** Positive blood cultures among rows already inside the culture window. */
export function aggregateMicrobiology(
  rows: readonly MicrobiologyCultureRow[]
): MicrobiologyFeatures {
  const cultures = rows.filter(isBloodCulture);
  return {
    positiveBloodCulture48h: cultures.some((r) => !isNegativeCulture(r)),
    bloodCultureCount48h: cultures.length,
  };
}
