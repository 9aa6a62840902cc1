import type { RespiratoryFeatures, RespiratorySupportRow } from "../../types.js";

/** Any invasive mechanical ventilation record among rows already inside the IMV window. */
export function aggregateRespiratorySupport(
  rows: readonly RespiratorySupportRow[]
): RespiratoryFeatures {
  const imv = rows.filter((r) => r.device_category === "imv");
  return {
    imvWithin48h: imv.length > 0,
    lastImvAt: imv[imv.length - 1]?.recorded_dttm ?? null,
  };
}
