import type { CohortComposition, FunnelReport, FunnelRow } from "../types.js";

function percentOf(n: number, total: number): number {
  if (total === 0) return 0;
  return Math.round((n / total) * 10000) / 100;
}

/**
 * Turns a definition's stage trace into flow-diagram rows.
 * Throws if the trace breaks the funnel invariants: remaining counts must
 * never grow, and the last stage must leave exactly the included cohort.
 */
export function buildFunnel(composition: CohortComposition): FunnelReport {
  const total = composition.outcomes.length;

  const rows: FunnelRow[] = composition.trace.map((t, i) => ({
    order: i + 1,
    stage: t.stage,
    label: t.label,
    nRemaining: t.cohortSizeAfter,
    nDropped: t.excludedCount,
    dropReason: t.exclusionReason,
    percentOfTotal: percentOf(t.cohortSizeAfter, total),
  }));

  let previous = total;
  for (const row of rows) {
    if (row.nRemaining > previous || row.nRemaining < 0) {
      throw new Error(
        `${composition.definition} funnel grows at stage ${row.stage}: ${previous} → ${row.nRemaining}`
      );
    }
    previous = row.nRemaining;
  }
  if (previous !== composition.includedCount) {
    throw new Error(
      `${composition.definition} funnel ends at ${previous} but ${composition.includedCount} hospitalizations are included`
    );
  }

  return { definition: composition.definition, total, rows };
}

/** Flat rows in the Definition/Stage/Filter/N/Percentage layout used for CSV export. */
export interface FunnelTableRow {
  definition: string;
  stage: number;
  filterDescription: string;
  n: number;
  percentage: number;
}

export function toFunnelTable(reports: readonly FunnelReport[]): FunnelTableRow[] {
  return reports.flatMap((r) => [
    {
      definition: r.definition,
      stage: 0,
      filterDescription: "All hospitalizations",
      n: r.total,
      percentage: r.total === 0 ? 0 : 100,
    },
    ...r.rows.map((row) => ({
      definition: r.definition,
      stage: row.order,
      filterDescription: row.label,
      n: row.nRemaining,
      percentage: row.percentOfTotal,
    })),
  ]);
}
