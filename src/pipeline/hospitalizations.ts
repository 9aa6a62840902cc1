import { MissingTimestampError } from "../errors.js";
import type { DataIssue, Hospitalization, HospitalizationRow, PatientRow } from "../types.js";
import { compareNullableStrings } from "./tableSource.js";
import { computeAgeYears, resolveDeathTimestamp } from "./windowResolver.js";

export interface MaterializedHospitalizations {
  hospitalizations: Hospitalization[];
  issues: DataIssue[];
}

/**
 * A patient can carry several expired hospitalizations (data error or
 * resuscitation). Only the one discharged last counts as the death
 * hospitalization; ties go to the greater hospitalization_id.
 */
function selectDeathHospitalizations(rows: readonly HospitalizationRow[]): Set<string> {
  const latest = new Map<string, HospitalizationRow>();
  for (const row of rows) {
    if (row.discharge_category !== "expired") continue;
    const current = latest.get(row.patient_id);
    if (current === undefined || compareDischarge(row, current) > 0) {
      latest.set(row.patient_id, row);
    }
  }
  return new Set([...latest.values()].map((r) => r.hospitalization_id));
}

function compareDischarge(a: HospitalizationRow, b: HospitalizationRow): number {
  // An untimed discharge loses to any timed one.
  const at = a.discharge_dttm?.getTime() ?? -Infinity;
  const bt = b.discharge_dttm?.getTime() ?? -Infinity;
  if (at !== bt) return at - bt;
  return compareNullableStrings(a.hospitalization_id, b.hospitalization_id);
}

/**
 * Joins hospitalizations to patients and resolves death time and age for each
 * death hospitalization. Never throws on row data: unresolvable cases come
 * back with `deathTs = null` plus a data issue.
 */
export function materializeHospitalizations(
  rows: readonly HospitalizationRow[],
  patients: ReadonlyMap<string, PatientRow>
): MaterializedHospitalizations {
  const deathHospitalizations = selectDeathHospitalizations(rows);
  const issues: DataIssue[] = [];

  const hospitalizations = rows.map((row): Hospitalization => {
    const patient = patients.get(row.patient_id);
    const isDeathHospitalization = deathHospitalizations.has(row.hospitalization_id);

    if (row.discharge_category === "expired" && !isDeathHospitalization) {
      issues.push({
        kind: "duplicate_death_hospitalization",
        table: "hospitalization",
        hospitalizationId: row.hospitalization_id,
        detail: `patient ${row.patient_id} has a later expired hospitalization`,
      });
    }

    let deathTs: Date | null = null;
    if (isDeathHospitalization) {
      try {
        deathTs = resolveDeathTimestamp({
          hospitalizationId: row.hospitalization_id,
          dischargeCategory: row.discharge_category,
          dischargeDttm: row.discharge_dttm,
          deathDttm: patient?.death_dttm ?? null,
        });
      } catch (err) {
        if (!(err instanceof MissingTimestampError)) throw err;
        issues.push({
          kind: "missing_timestamp",
          table: "hospitalization",
          hospitalizationId: row.hospitalization_id,
          detail: err.message,
        });
      }
    }

    const birthDate = patient?.birth_date ?? null;
    if (deathTs !== null && birthDate === null) {
      issues.push({
        kind: "missing_required_field",
        table: "patient",
        hospitalizationId: row.hospitalization_id,
        detail: patient
          ? `birth_date missing for patient ${row.patient_id}`
          : `patient ${row.patient_id} not found in patient table`,
      });
    }

    return {
      hospitalizationId: row.hospitalization_id,
      patientId: row.patient_id,
      admissionDttm: row.admission_dttm,
      dischargeDttm: row.discharge_dttm,
      dischargeCategory: row.discharge_category,
      admissionTypeCategory: row.admission_type_category,
      birthDate,
      raceCategory: patient?.race_category ?? null,
      ethnicityCategory: patient?.ethnicity_category ?? null,
      sexCategory: patient?.sex_category ?? null,
      isDeathHospitalization,
      deathTs,
      ageAtDeath: deathTs === null ? null : computeAgeYears(birthDate, deathTs),
    };
  });

  return { hospitalizations, issues };
}
