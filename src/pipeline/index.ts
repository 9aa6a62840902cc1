import {
  loadIcdCodeLists,
  loadOutlierRanges,
  type OutlierRanges,
  type RunConfig,
} from "../config.js";
import { buildTableOne } from "../summary/tableOne.js";
import type {
  AnnotatedHospitalization,
  CohortSubject,
  DataIssue,
  DataIssueKind,
  EligibilityFlags,
  FeatureRecord,
  PipelineLogger,
  PipelineResult,
  RawTables,
} from "../types.js";
import { composeCohort } from "./cohortComposer.js";
import { evaluateEligibility } from "./criteriaEvaluator.js";
import { buildFeatureRecord } from "./featureBuilder.js";
import { buildFunnel } from "./funnelTracker.js";
import { materializeHospitalizations } from "./hospitalizations.js";
import { createIcdCodeTable, type IcdCodeTable } from "./icdClassifier.js";
import { loadTables } from "./tableLoader.js";

export interface PipelineOptions {
  /** Metadata only */
  siteName?: string;
  /** Defaults to the bundled reference/icd10_code_lists.json */
  codeTable?: IcdCodeTable;
  /** Defaults to the bundled reference/outlier_ranges.json */
  outlierRanges?: OutlierRanges;
  logger?: PipelineLogger;
}

/** Site name plus reference data, honouring any path overrides in the run config. */
export function optionsFromConfig(config: RunConfig, logger?: PipelineLogger): PipelineOptions {
  return {
    siteName: config.site_name,
    codeTable: createIcdCodeTable(loadIcdCodeLists(config.code_lists_path)),
    outlierRanges: loadOutlierRanges(config.outlier_ranges_path),
    logger,
  };
}

function countIssues(issues: readonly DataIssue[]): Record<DataIssueKind, number> {
  const counts: Record<DataIssueKind, number> = {
    missing_timestamp: 0,
    missing_required_field: 0,
    unknown_code_format: 0,
    duplicate_death_hospitalization: 0,
    duplicate_record: 0,
    invalid_row: 0,
    outlier_value: 0,
  };
  for (const issue of issues) counts[issue.kind]++;
  return counts;
}

/**
 * Full cohort pipeline:
 *   1. Validate and index the ten source tables, nulling outliers
 *   2. Materialize hospitalizations, resolving death time and age
 *   3. Fold event tables into one feature record per death hospitalization
 *   4. Evaluate CALC and CLIF criteria
 *   5. Compose both cohorts stage by stage and build the funnels
 *
 * Deterministic: the same tables always produce the same result.
 */
export function runPipeline(raw: RawTables, options: PipelineOptions = {}): PipelineResult {
  const logger = options.logger ?? console;
  const codeTable = options.codeTable ?? createIcdCodeTable(loadIcdCodeLists());
  const outlierRanges = options.outlierRanges ?? loadOutlierRanges();

  const loaded = loadTables(raw, outlierRanges, logger);
  const { tables } = loaded;
  const issues: DataIssue[] = [...loaded.issues];

  const materialized = materializeHospitalizations(tables.hospitalizations, tables.patients);
  issues.push(...materialized.issues);

  const adtIds = tables.adt.hospitalizationIds();
  const evaluated = materialized.hospitalizations.map((hospitalization) => {
    let features: FeatureRecord | null = null;
    let flags: EligibilityFlags | null = null;

    if (hospitalization.deathTs !== null) {
      if (!adtIds.has(hospitalization.hospitalizationId)) {
        logger.warn(`Death hospitalization ${hospitalization.hospitalizationId} has no ADT rows`);
      }
      const built = buildFeatureRecord(hospitalization, hospitalization.deathTs, tables, codeTable);
      issues.push(...built.issues);
      features = built.features;
      flags = evaluateEligibility(features);
    }
    return { hospitalization, features, flags };
  });

  const subjects: CohortSubject[] = evaluated.map(({ hospitalization, flags }) => ({
    hospitalization,
    flags,
  }));
  const calc = composeCohort("CALC", subjects);
  const clif = composeCohort("CLIF", subjects);

  const annotated: AnnotatedHospitalization[] = evaluated.map((e, i) => ({
    ...e,
    calc: calc.outcomes[i].terminal,
    clif: clif.outcomes[i].terminal,
  }));

  const issueCounts = countIssues(issues);
  for (const [kind, n] of Object.entries(issueCounts)) {
    if (n > 0) logger.warn(`${n} data issue(s) of kind ${kind}`);
  }

  const withFeatures = annotated.filter((a) => a.features !== null);
  const withLab = (pick: (a: AnnotatedHospitalization) => unknown) =>
    withFeatures.filter((a) => pick(a) !== null).length;
  logger.info(
    `Organ labs: creatinine ${withLab((a) => a.features?.labs.creatinine ?? null)}, ` +
      `bilirubin ${withLab((a) => a.features?.labs.bilirubin_total ?? null)}, ` +
      `AST ${withLab((a) => a.features?.labs.ast ?? null)}, ` +
      `ALT ${withLab((a) => a.features?.labs.alt ?? null)} of ${withFeatures.length} deaths`
  );
  logger.info(`CALC cohort: ${calc.includedCount}; CLIF cohort: ${clif.includedCount}`);

  return {
    siteName: options.siteName ?? null,
    codeListVersion: codeTable.version,
    totalHospitalizations: annotated.length,
    hospitalizations: annotated,
    cohorts: { CALC: calc, CLIF: clif },
    funnels: { CALC: buildFunnel(calc), CLIF: buildFunnel(clif) },
    tableOne: buildTableOne(annotated),
    issues,
    issueCounts,
  };
}

export { ConfigError, MalformedTableError, MissingTimestampError } from "../errors.js";
export { loadIcdCodeLists, loadOutlierRanges, loadRunConfig } from "../config.js";
export { toFunnelTable, type FunnelTableRow } from "./funnelTracker.js";
export {
  linkRegistryDonors,
  toLinkageReport,
  type LinkageOptions,
  type LinkageReportRow,
  type LinkageResult,
  type LinkedCandidate,
  type RegistryMatch,
} from "../linkage/srtrLinkage.js";
export type * from "../types.js";
