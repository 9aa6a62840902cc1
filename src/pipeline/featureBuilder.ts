import type { DataIssue, FeatureRecord, Hospitalization } from "../types.js";
import { aggregateAssessments } from "./aggregators/assessmentAggregator.js";
import { aggregateCrrt } from "./aggregators/crrtAggregator.js";
import { aggregateDiagnoses } from "./aggregators/diagnosisAggregator.js";
import { aggregateLabs } from "./aggregators/labAggregator.js";
import { aggregateLocation } from "./aggregators/locationAggregator.js";
import { aggregateMicrobiology } from "./aggregators/microbiologyAggregator.js";
import { aggregateRespiratorySupport } from "./aggregators/respiratoryAggregator.js";
import { aggregateVitals } from "./aggregators/vitalsAggregator.js";
import type { IcdCodeTable } from "./icdClassifier.js";
import type { ClinicalTables } from "./tableLoader.js";
import { resolveWindows } from "./windowResolver.js";

export interface FeatureBuild {
  features: FeatureRecord;
  issues: DataIssue[];
}

/**
 * Folds every event table into one feature record for a hospitalization with
 * a resolved death time. Each aggregator sees only the rows of its window.
 */
export function buildFeatureRecord(
  hospitalization: Hospitalization,
  deathTs: Date,
  tables: ClinicalTables,
  codeTable: IcdCodeTable
): FeatureBuild {
  const id = hospitalization.hospitalizationId;
  const windows = resolveWindows(deathTs, hospitalization.admissionDttm, hospitalization.dischargeDttm);

  const diagnoses = aggregateDiagnoses(
    tables.hospitalDiagnosis.select(id),
    windows.lifetime,
    codeTable
  );

  return {
    features: {
      hospitalizationId: id,
      ageAtDeath: hospitalization.ageAtDeath,
      labs: aggregateLabs(tables.labs.select(id, windows.lifetime)),
      vitals: aggregateVitals(tables.vitals.select(id, windows.beforeDeath)),
      respiratory: aggregateRespiratorySupport(tables.respiratorySupport.select(id, windows.imv)),
      microbiology: aggregateMicrobiology(tables.microbiologyCulture.select(id, windows.culture)),
      crrt: aggregateCrrt(tables.crrtTherapy.select(id)),
      diagnoses: diagnoses.features,
      assessments: aggregateAssessments(tables.patientAssessments.select(id, windows.beforeDeath)),
      location: aggregateLocation(tables.adt.select(id), deathTs),
    },
    issues: diagnoses.issues,
  };
}
