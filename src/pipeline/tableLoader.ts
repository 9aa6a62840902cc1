import type { OutlierRanges } from "../config.js";
import type {
  AdtRow,
  CrrtTherapyRow,
  DataIssue,
  HospitalDiagnosisRow,
  HospitalizationRow,
  LabRow,
  MicrobiologyCultureRow,
  PatientAssessmentRow,
  PatientRow,
  PipelineLogger,
  RawTables,
  RespiratorySupportRow,
  VitalRow,
} from "../types.js";
import { applyOutlierHandling } from "./outlierHandler.js";
import {
  ADT_TABLE,
  CRRT_THERAPY_TABLE,
  HOSPITALIZATION_TABLE,
  HOSPITAL_DIAGNOSIS_TABLE,
  InMemoryEventTable,
  LABS_TABLE,
  MICROBIOLOGY_CULTURE_TABLE,
  PATIENT_ASSESSMENTS_TABLE,
  PATIENT_TABLE,
  RESPIRATORY_SUPPORT_TABLE,
  VITALS_TABLE,
  compareNullableDates,
  compareNullableNumbers,
  compareNullableStrings,
  parseTable,
  type EventSource,
  type ParsedTable,
} from "./tableSource.js";

export interface ClinicalTables {
  patients: ReadonlyMap<string, PatientRow>;
  hospitalizations: readonly HospitalizationRow[];
  adt: EventSource<AdtRow>;
  vitals: EventSource<VitalRow>;
  labs: EventSource<LabRow>;
  respiratorySupport: EventSource<RespiratorySupportRow>;
  microbiologyCulture: EventSource<MicrobiologyCultureRow>;
  crrtTherapy: EventSource<CrrtTherapyRow>;
  hospitalDiagnosis: EventSource<HospitalDiagnosisRow>;
  patientAssessments: EventSource<PatientAssessmentRow>;
}

export interface TableLoadResult {
  tables: ClinicalTables;
  issues: DataIssue[];
}

// ── Duplicate keys ────────────────────────────────────────────────────────────

/** Sorts rows with the field present ahead of rows where it is null. */
function presentFirst(a: unknown, b: unknown): number {
  return Number(a === null) - Number(b === null);
}

/** Most complete death and birth data first, then field values. */
export function preferPatient(a: PatientRow, b: PatientRow): number {
  return (
    presentFirst(a.death_dttm, b.death_dttm) ||
    presentFirst(a.birth_date, b.birth_date) ||
    compareNullableDates(a.death_dttm, b.death_dttm) ||
    compareNullableDates(a.birth_date, b.birth_date) ||
    compareNullableStrings(a.sex_category, b.sex_category) ||
    compareNullableStrings(a.race_category, b.race_category) ||
    compareNullableStrings(a.ethnicity_category, b.ethnicity_category)
  );
}

/** Timed rows first, then the later discharge, then field values. */
export function preferHospitalization(a: HospitalizationRow, b: HospitalizationRow): number {
  return (
    presentFirst(a.discharge_dttm, b.discharge_dttm) ||
    presentFirst(a.admission_dttm, b.admission_dttm) ||
    compareNullableDates(b.discharge_dttm, a.discharge_dttm) ||
    compareNullableDates(a.admission_dttm, b.admission_dttm) ||
    compareNullableStrings(a.patient_id, b.patient_id) ||
    compareNullableStrings(a.discharge_category, b.discharge_category) ||
    compareNullableStrings(a.admission_type_category, b.admission_type_category)
  );
}

/**
 * Keeps one row per key, chosen by `prefer` so the survivor never depends on
 * input order. Every other row is reported as a `duplicate_record` issue.
 */
export function collapseDuplicates<T>(
  rows: readonly T[],
  keyOf: (row: T) => string,
  prefer: (a: T, b: T) => number,
  issueFor: (dropped: T) => DataIssue
): ParsedTable<T> {
  const groups = new Map<string, T[]>();
  for (const row of rows) {
    const group = groups.get(keyOf(row));
    if (group) group.push(row);
    else groups.set(keyOf(row), [row]);
  }

  const kept: T[] = [];
  const issues: DataIssue[] = [];
  for (const group of groups.values()) {
    const [best, ...dropped] = [...group].sort(prefer);
    kept.push(best);
    issues.push(...dropped.map(issueFor));
  }
  return { rows: kept, issues };
}

// ── Loading ───────────────────────────────────────────────────────────────────

/**
 * Validates and indexes the ten source tables. Throws MalformedTableError
 * when any table lacks a required column; every other defect is reported as
 * a data issue.
 */
export function loadTables(
  raw: RawTables,
  outlierRanges: OutlierRanges,
  logger: PipelineLogger
): TableLoadResult {
  const issues: DataIssue[] = [];
  const collect = <T>(parsed: { rows: T[]; issues: DataIssue[] }): T[] => {
    issues.push(...parsed.issues);
    return parsed.rows;
  };

  // Parse everything first so a malformed table aborts before any work.
  const patientRows = collect(parseTable(PATIENT_TABLE, raw.patient));
  const hospitalizationRows = collect(parseTable(HOSPITALIZATION_TABLE, raw.hospitalization));
  const adt = collect(parseTable(ADT_TABLE, raw.adt));
  const vitalsParsed = collect(parseTable(VITALS_TABLE, raw.vitals));
  const labsParsed = collect(parseTable(LABS_TABLE, raw.labs));
  const respiratory = collect(parseTable(RESPIRATORY_SUPPORT_TABLE, raw.respiratory_support));
  const micro = collect(parseTable(MICROBIOLOGY_CULTURE_TABLE, raw.microbiology_culture));
  const crrt = collect(parseTable(CRRT_THERAPY_TABLE, raw.crrt_therapy));
  const diagnoses = collect(parseTable(HOSPITAL_DIAGNOSIS_TABLE, raw.hospital_diagnosis));
  const assessmentsParsed = collect(
    parseTable(PATIENT_ASSESSMENTS_TABLE, raw.patient_assessments)
  );

  const vitals = collect(
    applyOutlierHandling(vitalsParsed, "vitals", outlierRanges, {
      category: (r) => r.vital_category,
      value: (r) => r.vital_value,
      clear: (r) => ({ ...r, vital_value: null }),
    })
  );
  const labs = collect(
    applyOutlierHandling(labsParsed, "labs", outlierRanges, {
      category: (r) => r.lab_category,
      value: (r) => r.lab_value_numeric,
      clear: (r) => ({ ...r, lab_value_numeric: null }),
    })
  );
  const assessments = collect(
    applyOutlierHandling(assessmentsParsed, "patient_assessments", outlierRanges, {
      category: (r) => r.assessment_category,
      value: (r) => r.numerical_value,
      clear: (r) => ({ ...r, numerical_value: null }),
    })
  );

  const patients = new Map(
    collect(
      collapseDuplicates(patientRows, (r) => r.patient_id, preferPatient, (r) => ({
        kind: "duplicate_record",
        table: "patient",
        hospitalizationId: null,
        detail: `dropped a duplicate row for patient ${r.patient_id}`,
      }))
    ).map((r): [string, PatientRow] => [r.patient_id, r])
  );
  const hospitalizations = collect(
    collapseDuplicates(
      hospitalizationRows,
      (r) => r.hospitalization_id,
      preferHospitalization,
      (r) => ({
        kind: "duplicate_record",
        table: "hospitalization",
        hospitalizationId: r.hospitalization_id,
        detail: `dropped a duplicate row for hospitalization ${r.hospitalization_id}`,
      })
    )
  );

  logger.info(
    `Loaded ${patients.size} patients, ${hospitalizations.length} hospitalizations, ` +
      `${labs.length} labs, ${vitals.length} vitals, ${adt.length} ADT rows, ` +
      `${diagnoses.length} diagnoses (${issues.length} data issues)`
  );

  return {
    tables: {
      patients,
      hospitalizations,
      adt: new InMemoryEventTable(
        adt,
        (r) => r.in_dttm,
        (a, b) =>
          compareNullableDates(a.out_dttm, b.out_dttm) ||
          compareNullableStrings(a.location_category, b.location_category)
      ),
      vitals: new InMemoryEventTable(
        vitals,
        (r) => r.recorded_dttm,
        (a, b) =>
          compareNullableStrings(a.vital_category, b.vital_category) ||
          compareNullableNumbers(a.vital_value, b.vital_value)
      ),
      labs: new InMemoryEventTable(
        labs,
        (r) => r.lab_collect_dttm,
        (a, b) =>
          compareNullableStrings(a.lab_category, b.lab_category) ||
          compareNullableNumbers(a.lab_value_numeric, b.lab_value_numeric)
      ),
      respiratorySupport: new InMemoryEventTable(
        respiratory,
        (r) => r.recorded_dttm,
        (a, b) => compareNullableStrings(a.device_category, b.device_category)
      ),
      microbiologyCulture: new InMemoryEventTable(
        micro,
        (r) => r.collect_dttm,
        (a, b) => compareNullableStrings(a.organism_category, b.organism_category)
      ),
      crrtTherapy: new InMemoryEventTable(crrt, (r) => r.recorded_dttm),
      hospitalDiagnosis: new InMemoryEventTable(
        diagnoses,
        (r) => r.recorded_dttm,
        (a, b) => compareNullableStrings(a.diagnosis_code, b.diagnosis_code)
      ),
      patientAssessments: new InMemoryEventTable(
        assessments,
        (r) => r.recorded_dttm,
        (a, b) =>
          compareNullableStrings(a.assessment_category, b.assessment_category) ||
          compareNullableNumbers(a.numerical_value, b.numerical_value)
      ),
    },
    issues,
  };
}
