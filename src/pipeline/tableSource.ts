import { isWithinInterval } from "date-fns";
import { z } from "zod";
import { MalformedTableError } from "../errors.js";
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
  RawTable,
  RespiratorySupportRow,
  SourceTableName,
  SrtrDonorRow,
  TimeWindow,
  VitalRow,
} from "../types.js";

// ── Lenient column parsers ────────────────────────────────────────────────────
// A bad cell degrades to null; only a missing column is fatal.

const identifier = z.union([
  z.string().trim().min(1),
  z.number().finite().transform((n) => String(n)),
]);

const text = z.unknown().transform((v): string | null => {
  if (v === null || v === undefined) return null;
  const s = String(v).trim();
  return s === "" ? null : s;
});

const category = text.transform((s) => (s === null ? null : s.toLowerCase()));

const numeric = z.unknown().transform((v): number | null => {
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (typeof v === "string" && v.trim() !== "") {
    const n = Number(v);
    return Number.isFinite(n) ? n : null;
  }
  return null;
});

const timestamp = z.unknown().transform((v): Date | null => {
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? null : v;
  if (typeof v === "string" || typeof v === "number") {
    if (typeof v === "string" && v.trim() === "") return null;
    const d = new Date(v);
    return Number.isNaN(d.getTime()) ? null : d;
  }
  return null;
});

// ── Table definitions ─────────────────────────────────────────────────────────

interface TableDefinition<T> {
  name: SourceTableName;
  requiredColumns: readonly string[];
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export const PATIENT_TABLE: TableDefinition<PatientRow> = {
  name: "patient",
  requiredColumns: ["patient_id", "birth_date", "death_dttm"],
  schema: z.object({
    patient_id: identifier,
    birth_date: timestamp,
    death_dttm: timestamp,
    race_category: category,
    ethnicity_category: category,
    sex_category: category,
  }),
};

export const HOSPITALIZATION_TABLE: TableDefinition<HospitalizationRow> = {
  name: "hospitalization",
  requiredColumns: [
    "hospitalization_id",
    "patient_id",
    "admission_dttm",
    "discharge_dttm",
    "discharge_category",
  ],
  schema: z.object({
    hospitalization_id: identifier,
    patient_id: identifier,
    admission_dttm: timestamp,
    discharge_dttm: timestamp,
    discharge_category: category,
    admission_type_category: category,
  }),
};

export const ADT_TABLE: TableDefinition<AdtRow> = {
  name: "adt",
  requiredColumns: ["hospitalization_id", "in_dttm", "out_dttm", "location_category"],
  schema: z.object({
    hospitalization_id: identifier,
    in_dttm: timestamp,
    out_dttm: timestamp,
    location_category: category,
  }),
};

export const VITALS_TABLE: TableDefinition<VitalRow> = {
  name: "vitals",
  requiredColumns: ["hospitalization_id", "recorded_dttm", "vital_category", "vital_value"],
  schema: z.object({
    hospitalization_id: identifier,
    recorded_dttm: timestamp,
    vital_category: category,
    vital_value: numeric,
  }),
};

export const LABS_TABLE: TableDefinition<LabRow> = {
  name: "labs",
  requiredColumns: [
    "hospitalization_id",
    "lab_collect_dttm",
    "lab_category",
    "lab_value_numeric",
  ],
  schema: z.object({
    hospitalization_id: identifier,
    lab_collect_dttm: timestamp,
    lab_category: category,
    lab_value_numeric: numeric,
  }),
};

export const RESPIRATORY_SUPPORT_TABLE: TableDefinition<RespiratorySupportRow> = {
  name: "respiratory_support",
  requiredColumns: ["hospitalization_id", "recorded_dttm", "device_category"],
  schema: z.object({
    hospitalization_id: identifier,
    recorded_dttm: timestamp,
    device_category: category,
  }),
};

export const MICROBIOLOGY_CULTURE_TABLE: TableDefinition<MicrobiologyCultureRow> = {
  name: "microbiology_culture",
  requiredColumns: [
    "hospitalization_id",
    "collect_dttm",
    "fluid_category",
    "method_category",
    "organism_category",
  ],
  schema: z.object({
    hospitalization_id: identifier,
    collect_dttm: timestamp,
    fluid_category: category,
    method_category: category,
    organism_category: category,
  }),
};

export const CRRT_THERAPY_TABLE: TableDefinition<CrrtTherapyRow> = {
  name: "crrt_therapy",
  requiredColumns: ["hospitalization_id", "recorded_dttm"],
  schema: z.object({
    hospitalization_id: identifier,
    recorded_dttm: timestamp,
  }),
};

export const HOSPITAL_DIAGNOSIS_TABLE: TableDefinition<HospitalDiagnosisRow> = {
  name: "hospital_diagnosis",
  requiredColumns: ["hospitalization_id", "diagnosis_code", "diagnosis_code_format"],
  schema: z.object({
    hospitalization_id: identifier,
    recorded_dttm: timestamp,
    diagnosis_code: text,
    diagnosis_code_format: category,
  }),
};

export const PATIENT_ASSESSMENTS_TABLE: TableDefinition<PatientAssessmentRow> = {
  name: "patient_assessments",
  requiredColumns: [
    "hospitalization_id",
    "recorded_dttm",
    "assessment_category",
    "numerical_value",
  ],
  schema: z.object({
    hospitalization_id: identifier,
    recorded_dttm: timestamp,
    assessment_category: category,
    numerical_value: numeric,
  }),
};

/** Only the join keys are required; absent clinical columns read as null. */
export const SRTR_DONOR_TABLE: TableDefinition<SrtrDonorRow> = {
  name: "srtr_donor",
  requiredColumns: ["DONOR_ID", "DON_GENDER", "DON_RECOV_DT"],
  schema: z.object({
    DONOR_ID: identifier,
    DON_AGE: numeric,
    DON_GENDER: text,
    DON_RACE_SRTR: text,
    DON_HGT_CM: numeric,
    DON_WGT_KG: numeric,
    DON_CREAT: numeric,
    DON_RECOV_DT: timestamp,
    DON_CAD_DON_COD: text,
    DON_HIST_DIAB: text,
    DON_HIST_HYPERTEN: text,
    DON_DCD_SUPPORT_WITHDRAW_DT: timestamp,
  }),
};

// ── Parsing ───────────────────────────────────────────────────────────────────

export interface ParsedTable<T> {
  rows: T[];
  issues: DataIssue[];
}

/**
 * Checks the table's columns, then parses every row. Rows without a usable
 * identifier are dropped and reported as `invalid_row` issues.
 */
export function parseTable<T>(definition: TableDefinition<T>, raw: RawTable): ParsedTable<T> {
  const present = new Set(raw.columns);
  const missing = definition.requiredColumns.filter((c) => !present.has(c));
  if (missing.length > 0) {
    throw new MalformedTableError(definition.name, missing);
  }

  const rows: T[] = [];
  const issues: DataIssue[] = [];

  raw.rows.forEach((row, index) => {
    const parsed = definition.schema.safeParse(row);
    if (parsed.success) {
      rows.push(parsed.data);
      return;
    }
    const hospitalizationId = row["hospitalization_id"];
    issues.push({
      kind: "invalid_row",
      table: definition.name,
      hospitalizationId:
        typeof hospitalizationId === "string" || typeof hospitalizationId === "number"
          ? String(hospitalizationId)
          : null,
      detail: `row ${index}: ${parsed.error.issues
        .map((i) => `${i.path.join(".")} ${i.message}`)
        .join("; ")}`,
    });
  });

  return { rows, issues };
}

// ── Event sources ─────────────────────────────────────────────────────────────

/** Uniform "filter by hospitalization and time window" capability. */
export interface EventSource<T> {
  /**
   * Records of one hospitalization, oldest first. With a window, only records
   * whose timestamp lies inside it (inclusive); untimed records are dropped.
   */
  select(hospitalizationId: string, window?: TimeWindow): T[];
  hospitalizationIds(): ReadonlySet<string>;
}

/**
 * In-memory implementation. Rows are grouped by hospitalization and sorted
 * by timestamp once, untimed rows last. `tieBreak` orders rows sharing a
 * timestamp so reductions never depend on input order.
 */
export class InMemoryEventTable<T extends { hospitalization_id: string }>
  implements EventSource<T>
{
  private readonly byHospitalization = new Map<string, T[]>();

  constructor(
    rows: readonly T[],
    private readonly timestampOf: (row: T) => Date | null,
    tieBreak: (a: T, b: T) => number = () => 0
  ) {
    for (const row of rows) {
      const bucket = this.byHospitalization.get(row.hospitalization_id);
      if (bucket) bucket.push(row);
      else this.byHospitalization.set(row.hospitalization_id, [row]);
    }
    for (const bucket of this.byHospitalization.values()) {
      bucket.sort((a, b) => compareNullableDates(timestampOf(a), timestampOf(b)) || tieBreak(a, b));
    }
  }

  select(hospitalizationId: string, window?: TimeWindow): T[] {
    const rows = this.byHospitalization.get(hospitalizationId) ?? [];
    if (!window) return [...rows];
    return rows.filter((r) => {
      const ts = this.timestampOf(r);
      return ts !== null && isWithinInterval(ts, window);
    });
  }

  hospitalizationIds(): ReadonlySet<string> {
    return new Set(this.byHospitalization.keys());
  }
}

/** Ascending; nulls sort after every date. */
export function compareNullableDates(a: Date | null, b: Date | null): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a.getTime() - b.getTime();
}

/** Ascending; nulls first. */
export function compareNullableNumbers(a: number | null, b: number | null): number {
  if (a === null && b === null) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return a - b;
}

export function compareNullableStrings(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return a < b ? -1 : 1;
}
