import type { IcdCodeLists } from "../config.js";
import type { DiagnosisCategory } from "../types.js";

/**
 * Immutable ICD-10-CM lookup. Injected into the diagnosis aggregator so tests
 * can supply synthetic code lists.
 */
export interface IcdCodeTable {
  readonly version: string;
  classify(code: string): ReadonlySet<DiagnosisCategory>;
}

const ICD10_FORMATS: ReadonlySet<string> = new Set(["icd10", "icd10cm"]);
const NO_MATCH: ReadonlySet<DiagnosisCategory> = new Set();

/** Uppercase and drop everything but letters and digits: "i21.4 " → "I214". */
export function normalizeIcdCode(code: string): string {
  return code.toUpperCase().replace(/[^A-Z0-9]/g, "");
}

/** "ICD-10-CM", "icd10cm" and "ICD10" are all accepted. */
export function isIcd10Format(format: string | null): boolean {
  if (format === null) return false;
  return ICD10_FORMATS.has(format.toLowerCase().replace(/[^a-z0-9]/g, ""));
}

/**
 * Builds a lookup from validated code lists.
 *
 * Range entries compare the three-character category head of a normalized
 * code ("I214" → "I21"), so ["I20", "I25"] matches I20.0 through I25.9.
 * Heads are letter-digit-alphanumeric, which sort correctly as plain strings
 * (including heads like C7A). Code entries match the full normalized code.
 */
export function createIcdCodeTable(lists: IcdCodeLists): IcdCodeTable {
  const ranges: { category: DiagnosisCategory; start: string; end: string }[] = [];
  const exact = new Map<string, DiagnosisCategory[]>();

  for (const entry of lists.categories) {
    for (const [start, end] of entry.ranges) {
      ranges.push({ category: entry.name, start, end });
    }
    for (const code of entry.codes) {
      const key = normalizeIcdCode(code);
      exact.set(key, [...(exact.get(key) ?? []), entry.name]);
    }
  }

  return {
    version: lists.version,
    classify(code: string): ReadonlySet<DiagnosisCategory> {
      const normalized = normalizeIcdCode(code);
      if (!/^[A-Z][0-9][0-9A-Z]/.test(normalized)) return NO_MATCH;

      const head = normalized.slice(0, 3);
      const matched = new Set<DiagnosisCategory>(exact.get(normalized) ?? []);
      for (const r of ranges) {
        if (head >= r.start && head <= r.end) matched.add(r.category);
      }
      return matched.size === 0 ? NO_MATCH : matched;
    },
  };
}
