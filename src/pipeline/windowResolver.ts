import { subHours } from "date-fns";
import { MissingTimestampError } from "../errors.js";
import type { DeathWindows, Hospitalization, TimeWindow } from "../types.js";

export const LOOKBACK_HOURS = 48;
const DAYS_PER_YEAR = 365.25;
const MS_PER_DAY = 86_400_000;

// Earliest representable Date; open start for windows not bounded by admission.
export const UNBOUNDED_START = new Date(-8.64e15);

type DeathTimeSource = Pick<
  Hospitalization,
  "hospitalizationId" | "dischargeCategory" | "dischargeDttm"
> & { deathDttm: Date | null };

/**
 * Canonical death timestamp for an expired hospitalization:
 *   1. the patient's death time, clamped to discharge when recorded later
 *   2. otherwise the discharge time
 * Throws MissingTimestampError when neither exists.
 */
export function resolveDeathTimestamp(source: DeathTimeSource): Date {
  const { deathDttm, dischargeDttm } = source;

  if (deathDttm !== null) {
    if (dischargeDttm !== null && deathDttm.getTime() > dischargeDttm.getTime()) {
      return dischargeDttm;
    }
    return deathDttm;
  }
  if (source.dischargeCategory === "expired" && dischargeDttm !== null) {
    return dischargeDttm;
  }
  throw new MissingTimestampError(source.hospitalizationId);
}

/** Lookback window of `hours` ending at (and including) `end`. */
export function lookbackWindow(end: Date, hours = LOOKBACK_HOURS): TimeWindow {
  return { start: subHours(end, hours), end };
}

export function resolveWindows(
  deathTs: Date,
  admissionDttm: Date | null,
  dischargeDttm: Date | null
): DeathWindows {
  const lifetimeEnd =
    dischargeDttm !== null && dischargeDttm.getTime() >= deathTs.getTime()
      ? dischargeDttm
      : deathTs;
  const start = admissionDttm ?? UNBOUNDED_START;

  return {
    imv: lookbackWindow(deathTs),
    culture: lookbackWindow(deathTs),
    lifetime: { start: minDate(start, lifetimeEnd), end: lifetimeEnd },
    // Not bounded by admission: pre-admission height and weight still count.
    beforeDeath: { start: UNBOUNDED_START, end: deathTs },
  };
}

/**
 * Age in years at `deathTs`, from whole elapsed days. Days are counted on
 * absolute time, so the result does not shift with the host time zone or DST.
 */
export function computeAgeYears(birthDate: Date | null, deathTs: Date): number | null {
  if (birthDate === null) return null;
  const days = Math.floor((deathTs.getTime() - birthDate.getTime()) / MS_PER_DAY);
  return days / DAYS_PER_YEAR;
}

function minDate(a: Date, b: Date): Date {
  return a.getTime() <= b.getTime() ? a : b;
}
