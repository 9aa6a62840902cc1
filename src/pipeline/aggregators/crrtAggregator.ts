import type { CrrtFeatures, CrrtTherapyRow } from "../../types.js";

/** CRRT anywhere in the stay counts; no window applies. */
export function aggregateCrrt(rows: readonly CrrtTherapyRow[]): CrrtFeatures {
  return { crrtEver: rows.length > 0, recordCount: rows.length };
}
