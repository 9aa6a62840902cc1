import type { SourceTableName } from "./types.js";

/**
 * An expired hospitalization with neither a patient death time nor a
 * discharge time. The hospitalization is excluded from every cohort.
 */
export class MissingTimestampError extends Error {
  constructor(readonly hospitalizationId: string) {
    super(`No death or discharge timestamp for expired hospitalization ${hospitalizationId}`);
    this.name = "MissingTimestampError";
  }
}

/** A source table lacks required columns entirely. Fatal for the run. */
export class MalformedTableError extends Error {
  constructor(
    readonly table: SourceTableName,
    readonly missingColumns: string[]
  ) {
    super(`Table "${table}" is missing required column(s): ${missingColumns.join(", ")}`);
    this.name = "MalformedTableError";
  }
}

/** Run configuration or reference data failed validation. Fatal for the run. */
export class ConfigError extends Error {
  constructor(
    readonly source: string,
    readonly issues: string[]
  ) {
    super(`Invalid configuration in ${source}: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}
