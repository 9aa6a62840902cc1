// ── Source tables ─────────────────────────────────────────────────────────────

export type TableName =
  | "patient"
  | "hospitalization"
  | "adt"
  | "vitals"
  | "labs"
  | "respiratory_support"
  | "microbiology_culture"
  | "crrt_therapy"
  | "hospital_diagnosis"
  | "patient_assessments";

/** Registry extract used for donor linkage; not one of the clinical tables. */
export type RegistryTableName = "srtr_donor";

export type SourceTableName = TableName | RegistryTableName;

/** A table as handed over by a format adapter (CSV, Parquet, in-memory). */
export interface RawTable {
  columns: string[];
  rows: Record<string, unknown>[];
}

export type RawTables = Record<TableName, RawTable>;

export interface PatientRow {
  patient_id: string;
  birth_date: Date | null;
  death_dttm: Date | null;
  race_category: string | null;
  ethnicity_category: string | null;
  sex_category: string | null;
}

export interface HospitalizationRow {
  hospitalization_id: string;
  patient_id: string;
  admission_dttm: Date | null;
  discharge_dttm: Date | null;
  discharge_category: string | null;
  admission_type_category: string | null;
}

export interface AdtRow {
  hospitalization_id: string;
  in_dttm: Date | null;
  out_dttm: Date | null;
  location_category: string | null;
}

export interface VitalRow {
  hospitalization_id: string;
  recorded_dttm: Date | null;
  vital_category: string | null;
  vital_value: number | null;
}

export interface LabRow {
  hospitalization_id: string;
  lab_collect_dttm: Date | null;
  lab_category: string | null;
  lab_value_numeric: number | null;
}

export interface RespiratorySupportRow {
  hospitalization_id: string;
  recorded_dttm: Date | null;
  device_category: string | null;
}

export interface MicrobiologyCultureRow {
  hospitalization_id: string;
  collect_dttm: Date | null;
  fluid_category: string | null;
  method_category: string | null;
  organism_category: string | null;
}

export interface CrrtTherapyRow {
  hospitalization_id: string;
  recorded_dttm: Date | null;
}

export interface HospitalDiagnosisRow {
  hospitalization_id: string;
  /** Optional in the source schema; rows without it count for the whole stay. */
  recorded_dttm: Date | null;
  diagnosis_code: string | null;
  diagnosis_code_format: string | null;
}

export interface PatientAssessmentRow {
  hospitalization_id: string;
  recorded_dttm: Date | null;
  assessment_category: string | null;
  numerical_value: number | null;
}

/** Deceased-donor record in the registry's own column names. */
export interface SrtrDonorRow {
  DONOR_ID: string;
  DON_AGE: number | null;
  DON_GENDER: string | null;
  DON_RACE_SRTR: string | null;
  DON_HGT_CM: number | null;
  DON_WGT_KG: number | null;
  DON_CREAT: number | null;
  DON_RECOV_DT: Date | null;
  DON_CAD_DON_COD: string | null;
  DON_HIST_DIAB: string | null;
  DON_HIST_HYPERTEN: string | null;
  /** Set only for donation after circulatory death */
  DON_DCD_SUPPORT_WITHDRAW_DT: Date | null;
}

// ── Time windows ──────────────────────────────────────────────────────────────

/** Closed interval; `start <= end` always holds. */
export interface TimeWindow {
  start: Date;
  end: Date;
}

export interface DeathWindows {
  /** [death − 48h, death] */
  imv: TimeWindow;
  /** [death − 48h, death] */
  culture: TimeWindow;
  /** [admission, discharge]; labs and diagnoses count for the whole stay */
  lifetime: TimeWindow;
  /** Open start up to death, for most-recent-observation reductions */
  beforeDeath: TimeWindow;
}

// ── Hospitalization ───────────────────────────────────────────────────────────

export interface Hospitalization {
  hospitalizationId: string;
  patientId: string;
  admissionDttm: Date | null;
  dischargeDttm: Date | null;
  dischargeCategory: string | null;
  admissionTypeCategory: string | null;
  birthDate: Date | null;
  raceCategory: string | null;
  ethnicityCategory: string | null;
  sexCategory: string | null;
  /** Expired, and the patient's last expired hospitalization */
  isDeathHospitalization: boolean;
  /** Canonical death time; null when not a death hospitalization or unresolvable */
  deathTs: Date | null;
  ageAtDeath: number | null;
}

// ── Features ──────────────────────────────────────────────────────────────────

export type OrganLab = "creatinine" | "bilirubin_total" | "ast" | "alt";

export interface LabMeasurement {
  value: number;
  collectedAt: Date | null;
}

/** null = no usable value in the window (unknown, not negative) */
export type LabFeatures = Record<OrganLab, LabMeasurement | null>;

export interface VitalFeatures {
  weightKg: number | null;
  heightCm: number | null;
  bmi: number | null;
  firstRecordedAt: Date | null;
  lastRecordedAt: Date | null;
}

export interface RespiratoryFeatures {
  imvWithin48h: boolean;
  lastImvAt: Date | null;
}

export interface MicrobiologyFeatures {
  positiveBloodCulture48h: boolean;
  bloodCultureCount48h: number;
}

export interface CrrtFeatures {
  crrtEver: boolean;
  recordCount: number;
}

export type DiagnosisCategory =
  | "ischemic_heart"
  | "cerebrovascular"
  | "external_cause"
  | "sepsis"
  | "active_cancer";

export interface DiagnosisFeatures {
  categories: Record<DiagnosisCategory, boolean>;
  recordsConsidered: number;
  /** Rows whose code format is not ICD-10(-CM) */
  recordsSkipped: number;
}

export interface AssessmentFeatures {
  gcsTotal: number | null;
  rass: number | null;
}

export interface LocationFeatures {
  locationAtDeath: string | null;
  everIcu: boolean;
  everWard: boolean;
  everEd: boolean;
  everStepdown: boolean;
  firstAdmissionLocation: string | null;
  hospitalLosDays: number | null;
  firstIcuLosDays: number | null;
}

export interface FeatureRecord {
  hospitalizationId: string;
  ageAtDeath: number | null;
  labs: LabFeatures;
  vitals: VitalFeatures;
  respiratory: RespiratoryFeatures;
  microbiology: MicrobiologyFeatures;
  crrt: CrrtFeatures;
  diagnoses: DiagnosisFeatures;
  assessments: AssessmentFeatures;
  location: LocationFeatures;
}

// ── Eligibility ───────────────────────────────────────────────────────────────

export type FlagName =
  | "age_eligible"
  | "location_eligible"
  | "cause_eligible"
  | "no_contraindication"
  | "kidney_eligible"
  | "liver_eligible"
  | "bmi_eligible"
  | "organ_quality_eligible"
  | "imv_eligible";

export interface CalcFlags {
  ageEligible: boolean;
  causeEligible: boolean;
  noContraindication: boolean;
  overallEligible: boolean;
}

export interface ClifFlags {
  locationEligible: boolean;
  ageEligible: boolean;
  imvEligible: boolean;
  /** Includes the positive-blood-culture check */
  noContraindication: boolean;
  kidneyEligible: boolean;
  liverEligible: boolean;
  bmiEligible: boolean;
  organQualityEligible: boolean;
  overallEligible: boolean;
}

export interface EligibilityFlags {
  calc: CalcFlags;
  clif: ClifFlags;
  /** Flags that failed only because a required input was unknown */
  defaultedByMissingData: FlagName[];
}

// ── Cohorts ───────────────────────────────────────────────────────────────────

export type CohortDefinition = "CALC" | "CLIF";

export type StageName =
  | "expired"
  | "death_time_resolved"
  | "location_eligible"
  | "age_eligible"
  | "cause_eligible"
  | "imv_eligible"
  | "no_contraindication"
  | "organ_quality_eligible";

export interface CohortSubject {
  hospitalization: Hospitalization;
  /** null when no death time could be resolved */
  flags: EligibilityFlags | null;
}

export interface StageDefinition {
  name: StageName;
  label: string;
  exclusionReason: string;
  passes: (subject: CohortSubject) => boolean;
}

export type TerminalState =
  | { status: "included" }
  | { status: "excluded"; stage: StageName };

export interface StageStep {
  stage: StageName;
  passed: boolean;
}

export interface CohortOutcome {
  definition: CohortDefinition;
  hospitalizationId: string;
  terminal: TerminalState;
  /** Stages evaluated, up to and including the first failure */
  steps: StageStep[];
}

export interface StageTrace {
  stage: StageName;
  label: string;
  cohortSizeBefore: number;
  cohortSizeAfter: number;
  excludedCount: number;
  exclusionReason: string;
}

export interface CohortComposition {
  definition: CohortDefinition;
  outcomes: CohortOutcome[];
  trace: StageTrace[];
  includedCount: number;
}

// ── Funnel ────────────────────────────────────────────────────────────────────

export interface FunnelRow {
  order: number;
  stage: StageName;
  label: string;
  nRemaining: number;
  nDropped: number;
  dropReason: string;
  /** n_remaining as a share of all hospitalizations, 0–100, two decimals */
  percentOfTotal: number;
}

export interface FunnelReport {
  definition: CohortDefinition;
  total: number;
  rows: FunnelRow[];
}

// ── Data issues ───────────────────────────────────────────────────────────────

export type DataIssueKind =
  | "missing_timestamp"
  | "missing_required_field"
  | "unknown_code_format"
  | "duplicate_death_hospitalization"
  | "duplicate_record"
  | "invalid_row"
  | "outlier_value";

export interface DataIssue {
  kind: DataIssueKind;
  table: SourceTableName | null;
  hospitalizationId: string | null;
  detail: string;
}

// ── Pipeline ──────────────────────────────────────────────────────────────────

export type PipelineLogger = Pick<Console, "info" | "warn">;

export interface AnnotatedHospitalization {
  hospitalization: Hospitalization;
  features: FeatureRecord | null;
  flags: EligibilityFlags | null;
  calc: TerminalState;
  clif: TerminalState;
}

export interface TableOneRow {
  variable: string;
  category: string;
  overall: string;
  calc: string;
  clif: string;
}

export interface PipelineResult {
  siteName: string | null;
  codeListVersion: string;
  totalHospitalizations: number;
  hospitalizations: AnnotatedHospitalization[];
  cohorts: Record<CohortDefinition, CohortComposition>;
  funnels: Record<CohortDefinition, FunnelReport>;
  tableOne: TableOneRow[];
  issues: DataIssue[];
  issueCounts: Record<DataIssueKind, number>;
}
