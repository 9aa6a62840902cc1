import type { OutlierRanges, OutlierTable } from "../config.js";
import type { DataIssue } from "../types.js";

export interface OutlierAccessor<T> {
  category(row: T): string | null;
  value(row: T): number | null;
  /** Copy of the row with its value set to null */
  clear(row: T): T;
}

export interface OutlierResult<T> {
  rows: T[];
  issues: DataIssue[];
}

/**
 * Nulls out values outside the plausible range configured for their
 * category, so implausible measurements (height_cm = 0, say) become unknown
 * instead of feeding a criterion. Categories without a range pass through.
 */
export function applyOutlierHandling<T extends { hospitalization_id: string }>(
  rows: readonly T[],
  table: OutlierTable,
  ranges: OutlierRanges,
  accessor: OutlierAccessor<T>
): OutlierResult<T> {
  const tableRanges = ranges.tables[table];
  const issues: DataIssue[] = [];

  const cleaned = rows.map((row) => {
    const cat = accessor.category(row);
    const value = accessor.value(row);
    if (cat === null || value === null) return row;

    const range = tableRanges[cat];
    if (range === undefined || (value >= range.min && value <= range.max)) return row;

    issues.push({
      kind: "outlier_value",
      table,
      hospitalizationId: row.hospitalization_id,
      detail: `${cat} = ${value} outside [${range.min}, ${range.max}]`,
    });
    return accessor.clear(row);
  });

  return { rows: cleaned, issues };
}
