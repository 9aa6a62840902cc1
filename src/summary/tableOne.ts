import type { AnnotatedHospitalization, TableOneRow } from "../types.js";

type Group = readonly AnnotatedHospitalization[];

interface CategoricalVariable {
  label: string;
  pick: (h: AnnotatedHospitalization) => string | null;
}

interface NumericVariable {
  label: string;
  pick: (h: AnnotatedHospitalization) => number | null;
}

const CATEGORICAL: CategoricalVariable[] = [
  { label: "Race Category", pick: (h) => h.hospitalization.raceCategory },
  { label: "Ethnicity Category", pick: (h) => h.hospitalization.ethnicityCategory },
  { label: "Sex Category", pick: (h) => h.hospitalization.sexCategory },
  {
    label: "First Admission Location",
    pick: (h) => h.features?.location.firstAdmissionLocation ?? null,
  },
];

const NUMERIC: NumericVariable[] = [
  { label: "Age At Death", pick: (h) => h.hospitalization.ageAtDeath },
  { label: "Hospital Length Of Stay Days", pick: (h) => h.features?.location.hospitalLosDays ?? null },
  { label: "First ICU LOS Days", pick: (h) => h.features?.location.firstIcuLosDays ?? null },
  { label: "BMI", pick: (h) => h.features?.vitals.bmi ?? null },
  { label: "Creatinine Value", pick: (h) => h.features?.labs.creatinine?.value ?? null },
  { label: "Bilirubin Total Value", pick: (h) => h.features?.labs.bilirubin_total?.value ?? null },
  { label: "AST Value", pick: (h) => h.features?.labs.ast?.value ?? null },
  { label: "ALT Value", pick: (h) => h.features?.labs.alt?.value ?? null },
  { label: "RASS Value", pick: (h) => h.features?.assessments.rass ?? null },
  { label: "GCS Total Value", pick: (h) => h.features?.assessments.gcsTotal ?? null },
];

/** Linear interpolation between closest ranks; `sorted` must be ascending and non-empty. */
export function quantile(sorted: readonly number[], q: number): number {
  const pos = (sorted.length - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

function pct(n: number, total: number): string {
  return (total > 0 ? (n / total) * 100 : 0).toFixed(1);
}

function collectionPeriod(group: Group): string {
  const years = group
    .map((h) => h.hospitalization.admissionDttm?.getUTCFullYear())
    .filter((y): y is number => y !== undefined);
  if (years.length === 0) return "N/A";
  const min = Math.min(...years);
  const max = Math.max(...years);
  return min === max ? String(min) : `${min} - ${max}`;
}

function medianIqr(group: Group, variable: NumericVariable): string {
  const values = group
    .map(variable.pick)
    .filter((v): v is number => v !== null)
    .sort((a, b) => a - b);
  if (values.length === 0) return "N/A";
  const fmt = (v: number) => v.toFixed(1);
  return `${fmt(quantile(values, 0.5))} (${fmt(quantile(values, 0.25))}-${fmt(quantile(values, 0.75))})`;
}

function validCount(group: Group, variable: NumericVariable): string {
  const valid = group.filter((h) => variable.pick(h) !== null).length;
  return `${valid} (${pct(valid, group.length)}%), ${group.length - valid} missing`;
}

/**
 * Descriptive baseline table for three groups: every death hospitalization
 * with a resolved death time, the CALC cohort and the CLIF cohort.
 */
export function buildTableOne(hospitalizations: readonly AnnotatedHospitalization[]): TableOneRow[] {
  const overall = hospitalizations.filter((h) => h.features !== null);
  const calc = overall.filter((h) => h.calc.status === "included");
  const clif = overall.filter((h) => h.clif.status === "included");

  const row = (variable: string, category: string, cell: (g: Group) => string): TableOneRow => ({
    variable,
    category,
    overall: cell(overall),
    calc: cell(calc),
    clif: cell(clif),
  });

  const rows: TableOneRow[] = [
    row("Unique Patients", "", (g) => String(new Set(g.map((h) => h.hospitalization.patientId)).size)),
    row("Unique Hospitalizations", "", (g) => String(g.length)),
    row("Data Collection Period", "", collectionPeriod),
  ];

  for (const variable of CATEGORICAL) {
    const categories = [
      ...new Set(overall.map(variable.pick).filter((c): c is string => c !== null)),
    ].sort();
    for (const category of categories) {
      rows.push(
        row(variable.label, category, (g) => {
          const n = g.filter((h) => variable.pick(h) === category).length;
          return `${n} (${pct(n, g.length)}%)`;
        })
      );
    }
  }

  for (const variable of NUMERIC) {
    rows.push(row(variable.label, "Median (IQR)", (g) => medianIqr(g, variable)));
    rows.push(row(variable.label, "N valid (% available)", (g) => validCount(g, variable)));
  }

  return rows;
}
