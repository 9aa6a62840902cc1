import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigError } from "./errors.js";

// ── Run configuration ─────────────────────────────────────────────────────────

export const RunConfigSchema = z.object({
  site_name: z.string().trim().min(1),
  tables_path: z.string().min(1).optional(),
  file_type: z.enum(["csv", "parquet"]).default("parquet"),
  code_lists_path: z.string().min(1).optional(),
  outlier_ranges_path: z.string().min(1).optional(),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;

// ── Reference data ────────────────────────────────────────────────────────────

const IcdHeadSchema = z
  .string()
  .regex(/^[A-Z][0-9][0-9A-Z]$/, "expected a three-character ICD-10 category, e.g. I20");

export const DiagnosisCategorySchema = z.enum([
  "ischemic_heart",
  "cerebrovascular",
  "external_cause",
  "sepsis",
  "active_cancer",
]);

export const IcdCodeListsSchema = z.object({
  version: z.string().min(1),
  categories: z
    .array(
      z
        .object({
          name: DiagnosisCategorySchema,
          description: z.string().optional(),
          ranges: z.array(z.tuple([IcdHeadSchema, IcdHeadSchema])).default([]),
          codes: z.array(z.string().min(3)).default([]),
        })
        .refine((c) => c.ranges.every(([start, end]) => start <= end), {
          message: "range start must not sort after range end",
        })
    )
    .min(1),
});

export type IcdCodeLists = z.infer<typeof IcdCodeListsSchema>;

const RangeSchema = z
  .object({ min: z.number(), max: z.number() })
  .refine((r) => r.min <= r.max, { message: "min must not exceed max" });

export const OutlierRangesSchema = z.object({
  version: z.string().min(1),
  tables: z.object({
    vitals: z.record(z.string(), RangeSchema).default({}),
    labs: z.record(z.string(), RangeSchema).default({}),
    patient_assessments: z.record(z.string(), RangeSchema).default({}),
  }),
});

export type OutlierRanges = z.infer<typeof OutlierRangesSchema>;
export type OutlierTable = keyof OutlierRanges["tables"];

// Bundled reference files live beside src/ and dist/ alike.
const BUNDLED_CODE_LISTS = new URL("../reference/icd10_code_lists.json", import.meta.url);
const BUNDLED_OUTLIER_RANGES = new URL("../reference/outlier_ranges.json", import.meta.url);

// ── Loading ───────────────────────────────────────────────────────────────────

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function readJson(path: string | URL): unknown {
  const label = typeof path === "string" ? path : fileURLToPath(path);
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err) {
    throw new ConfigError(label, [`cannot read file: ${describeError(err)}`]);
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new ConfigError(label, [`invalid JSON: ${describeError(err)}`]);
  }
}

/**
 * Validates an already-parsed value against a schema, converting zod issues
 * into a ConfigError that names the source.
 */
export function parseWithSchema<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  source: string
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(
      source,
      result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
    );
  }
  return result.data;
}

export function loadRunConfig(path: string): RunConfig {
  return parseWithSchema(RunConfigSchema, readJson(path), path);
}

export function loadIcdCodeLists(path?: string): IcdCodeLists {
  const source = path ?? BUNDLED_CODE_LISTS;
  return parseWithSchema(
    IcdCodeListsSchema,
    readJson(source),
    typeof source === "string" ? source : fileURLToPath(source)
  );
}

export function loadOutlierRanges(path?: string): OutlierRanges {
  const source = path ?? BUNDLED_OUTLIER_RANGES;
  return parseWithSchema(
    OutlierRangesSchema,
    readJson(source),
    typeof source === "string" ? source : fileURLToPath(source)
  );
}
