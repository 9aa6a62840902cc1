import { differenceInMinutes } from "date-fns";
import type { AdtRow, LocationFeatures } from "../../types.js";

const MINUTES_PER_DAY = 60 * 24;

function durationDays(start: Date | null, end: Date | null): number | null {
  if (start === null || end === null) return null;
  return differenceInMinutes(end, start) / MINUTES_PER_DAY;
}

/**
 * Location at death plus length-of-stay features from the ADT movements of
 * one hospitalization, ordered by in_dttm then out_dttm.
 *
 * Location at death is the last movement that began at or before death.
 */
export function aggregateLocation(rows: readonly AdtRow[], deathTs: Date): LocationFeatures {
  const timed = rows.filter((r) => r.in_dttm !== null);

  let locationAtDeath: string | null = null;
  for (const row of timed) {
    if (row.in_dttm !== null && row.in_dttm.getTime() <= deathTs.getTime()) {
      locationAtDeath = row.location_category;
    }
  }

  const ever = (cat: string) => rows.some((r) => r.location_category === cat);

  const outs = rows
    .map((r) => r.out_dttm)
    .filter((d): d is Date => d !== null)
    .map((d) => d.getTime());
  const lastOut = outs.length > 0 ? new Date(Math.max(...outs)) : null;
  const firstIn = timed[0]?.in_dttm ?? null;
  const firstIcu = timed.find((r) => r.location_category === "icu");

  return {
    locationAtDeath,
    everIcu: ever("icu"),
    everWard: ever("ward"),
    everEd: ever("ed"),
    everStepdown: ever("stepdown"),
    firstAdmissionLocation: timed[0]?.location_category ?? null,
    hospitalLosDays: durationDays(firstIn, lastOut),
    firstIcuLosDays: firstIcu ? durationDays(firstIcu.in_dttm, firstIcu.out_dttm) : null,
  };
}
