import { SRTR_DONOR_TABLE, compareNullableStrings, parseTable } from "../pipeline/tableSource.js";
import { quantile } from "../summary/tableOne.js";
import type {
  AnnotatedHospitalization,
  DataIssue,
  PipelineLogger,
  PipelineResult,
  RawTable,
  SrtrDonorRow,
} from "../types.js";

const MS_PER_DAY = 86_400_000;

/** Death-to-recovery gaps beyond this are flagged for manual review. */
export const SUSPICIOUS_DATE_GAP_DAYS = 30;

// ── Standardized records ──────────────────────────────────────────────────────

export type Sex = "M" | "F";

/** A hospitalization included in at least one cohort, in registry terms. */
export interface LinkageCandidate {
  hospitalizationId: string;
  patientId: string;
  /** UTC calendar day of death, at midnight */
  deathDate: Date;
  sex: Sex | null;
  ageYears: number | null;
  race: string | null;
  heightCm: number | null;
  weightKg: number | null;
  creatinine: number | null;
  calcIncluded: boolean;
  clifIncluded: boolean;
}

export interface RegistryDonor {
  donorId: string;
  sex: Sex | null;
  ageYears: number | null;
  race: string | null;
  heightCm: number | null;
  weightKg: number | null;
  creatinine: number | null;
  recoveryDate: Date | null;
  causeOfDeath: string | null;
  diabetes: string | null;
  hypertension: string | null;
  donationType: "DCD" | "DBD";
}

function utcDay(d: Date): number {
  return Math.floor(d.getTime() / MS_PER_DAY);
}

function startOfUtcDay(d: Date): Date {
  return new Date(utcDay(d) * MS_PER_DAY);
}

function standardizeCandidateSex(value: string | null): Sex | null {
  if (value === "male") return "M";
  if (value === "female") return "F";
  return null;
}

/** Registry sex codes: anything starting with m or f, any case. */
export function standardizeRegistrySex(value: string | null): Sex | null {
  if (value === null) return null;
  if (/^m/i.test(value)) return "M";
  if (/^f/i.test(value)) return "F";
  return null;
}

export function potentialDonors(
  hospitalizations: readonly AnnotatedHospitalization[]
): LinkageCandidate[] {
  const candidates: LinkageCandidate[] = [];
  for (const a of hospitalizations) {
    const h = a.hospitalization;
    const calcIncluded = a.calc.status === "included";
    const clifIncluded = a.clif.status === "included";
    if (h.deathTs === null || !(calcIncluded || clifIncluded)) continue;

    candidates.push({
      hospitalizationId: h.hospitalizationId,
      patientId: h.patientId,
      deathDate: startOfUtcDay(h.deathTs),
      sex: standardizeCandidateSex(h.sexCategory),
      ageYears: h.ageAtDeath === null ? null : Math.round(h.ageAtDeath),
      race: h.raceCategory?.toUpperCase() ?? null,
      heightCm: a.features?.vitals.heightCm ?? null,
      weightKg: a.features?.vitals.weightKg ?? null,
      creatinine: a.features?.labs.creatinine?.value ?? null,
      calcIncluded,
      clifIncluded,
    });
  }
  return candidates;
}

export function toRegistryDonor(row: SrtrDonorRow): RegistryDonor {
  return {
    donorId: row.DONOR_ID,
    sex: standardizeRegistrySex(row.DON_GENDER),
    ageYears: row.DON_AGE === null ? null : Math.trunc(row.DON_AGE),
    race: row.DON_RACE_SRTR?.toUpperCase() ?? null,
    heightCm: row.DON_HGT_CM,
    weightKg: row.DON_WGT_KG,
    creatinine: row.DON_CREAT,
    recoveryDate: row.DON_RECOV_DT === null ? null : startOfUtcDay(row.DON_RECOV_DT),
    causeOfDeath: row.DON_CAD_DON_COD,
    diabetes: row.DON_HIST_DIAB,
    hypertension: row.DON_HIST_HYPERTEN,
    donationType: row.DON_DCD_SUPPORT_WITHDRAW_DT === null ? "DBD" : "DCD",
  };
}

// ── Tiers ─────────────────────────────────────────────────────────────────────

export type MatchTier = 1 | 2 | 3;

export interface TierRule {
  tier: MatchTier;
  name: string;
  /** Largest allowed |recovery date − death date| */
  dateWindowDays: number;
  baseScore: number;
  /** Checked after sex and the date window */
  accepts: (candidate: LinkageCandidate, donor: RegistryDonor) => boolean;
}

function within(a: number | null, b: number | null, tolerance: number): boolean {
  return a !== null && b !== null && Math.abs(a - b) <= tolerance;
}

export const MATCH_TIERS: readonly TierRule[] = [
  {
    tier: 1,
    name: "Exact Match",
    dateWindowDays: 3,
    baseScore: 0.9,
    accepts: (c, d) => within(c.ageYears, d.ageYears, 1) && c.race !== null && c.race === d.race,
  },
  {
    tier: 2,
    name: "Clinical Match",
    dateWindowDays: 7,
    baseScore: 0.7,
    accepts: (c, d) =>
      within(c.ageYears, d.ageYears, 2) &&
      (within(c.heightCm, d.heightCm, 5) || within(c.weightKg, d.weightKg, 5)),
  },
  {
    tier: 3,
    name: "Composite Match",
    dateWindowDays: 14,
    baseScore: 0.5,
    // Two of four clinical variables must agree.
    accepts: (c, d) =>
      [
        within(c.ageYears, d.ageYears, 3),
        within(c.heightCm, d.heightCm, 10),
        within(c.weightKg, d.weightKg, 10),
        within(c.creatinine, d.creatinine, 0.5),
      ].filter(Boolean).length >= 2,
  },
];

// ── Matching ──────────────────────────────────────────────────────────────────

export interface RegistryMatch {
  hospitalizationId: string;
  donor: RegistryDonor;
  tier: MatchTier;
  /** Tier base score adjusted by date proximity, two decimals */
  score: number;
  /** Recovery date minus death date; negative when recovery came first */
  dateDiffDays: number;
}

export function matchScore(rule: TierRule, dateDiffDays: number): number {
  const gap = Math.abs(dateDiffDays);
  const adjustment = gap <= 1 ? 0.1 : gap <= 3 ? 0.05 : gap <= 7 ? 0 : -0.05;
  return Math.round((rule.baseScore + adjustment) * 100) / 100;
}

/** Every candidate–donor pair that satisfies one tier. */
export function matchAtTier(
  rule: TierRule,
  candidates: readonly LinkageCandidate[],
  donors: readonly RegistryDonor[]
): RegistryMatch[] {
  const matches: RegistryMatch[] = [];
  for (const candidate of candidates) {
    if (candidate.sex === null) continue;
    for (const donor of donors) {
      if (donor.sex !== candidate.sex || donor.recoveryDate === null) continue;
      const dateDiffDays = utcDay(donor.recoveryDate) - utcDay(candidate.deathDate);
      if (Math.abs(dateDiffDays) > rule.dateWindowDays) continue;
      if (!rule.accepts(candidate, donor)) continue;
      matches.push({
        hospitalizationId: candidate.hospitalizationId,
        donor,
        tier: rule.tier,
        score: matchScore(rule, dateDiffDays),
        dateDiffDays,
      });
    }
  }
  return matches;
}

/**
 * Runs the tiers strictest first. Candidates and donors matched at one tier
 * are not offered to the next.
 */
export function tieredMatches(
  candidates: readonly LinkageCandidate[],
  donors: readonly RegistryDonor[],
  logger: PipelineLogger
): RegistryMatch[] {
  const all: RegistryMatch[] = [];
  let remainingCandidates = candidates;
  let remainingDonors = donors;

  for (const rule of MATCH_TIERS) {
    if (remainingCandidates.length === 0 || remainingDonors.length === 0) break;

    const matched = matchAtTier(rule, remainingCandidates, remainingDonors);
    const hospitalizationIds = new Set(matched.map((m) => m.hospitalizationId));
    const donorIds = new Set(matched.map((m) => m.donor.donorId));
    remainingCandidates = remainingCandidates.filter((c) => !hospitalizationIds.has(c.hospitalizationId));
    remainingDonors = remainingDonors.filter((d) => !donorIds.has(d.donorId));

    logger.info(`Tier ${rule.tier} (${rule.name}): ${matched.length} match(es)`);
    all.push(...matched);
  }
  return all;
}

function compareMatches(a: RegistryMatch, b: RegistryMatch): number {
  return (
    a.tier - b.tier ||
    b.score - a.score ||
    Math.abs(a.dateDiffDays) - Math.abs(b.dateDiffDays) ||
    compareNullableStrings(a.donor.donorId, b.donor.donorId)
  );
}

/**
 * One match per hospitalization: lowest tier, then highest score, then the
 * smallest date gap, then the lower donor id.
 */
export function resolveDuplicateMatches(matches: readonly RegistryMatch[]): RegistryMatch[] {
  const best = new Map<string, RegistryMatch>();
  for (const match of matches) {
    const current = best.get(match.hospitalizationId);
    if (current === undefined || compareMatches(match, current) < 0) {
      best.set(match.hospitalizationId, match);
    }
  }
  return [...best.values()];
}

// ── Validation and conversion ─────────────────────────────────────────────────

export interface TierSummary {
  tier: MatchTier;
  name: string;
  matches: number;
  meanScore: number;
  minScore: number;
  maxScore: number;
}

export interface LinkageValidation {
  /** Registry donors claimed by more than one hospitalization */
  duplicateDonors: number;
  meanDateDiffDays: number | null;
  medianDateDiffDays: number | null;
  maxDateDiffDays: number | null;
  suspiciousDateMatches: number;
  /** Tiers with at least one match, in tier order */
  tiers: TierSummary[];
}

export function validateMatches(matches: readonly RegistryMatch[]): LinkageValidation {
  const perDonor = new Map<string, number>();
  for (const m of matches) perDonor.set(m.donor.donorId, (perDonor.get(m.donor.donorId) ?? 0) + 1);

  const gaps = matches.map((m) => Math.abs(m.dateDiffDays)).sort((a, b) => a - b);
  const tiers: TierSummary[] = [];
  for (const rule of MATCH_TIERS) {
    const scores = matches.filter((m) => m.tier === rule.tier).map((m) => m.score);
    if (scores.length === 0) continue;
    tiers.push({
      tier: rule.tier,
      name: rule.name,
      matches: scores.length,
      meanScore: scores.reduce((sum, s) => sum + s, 0) / scores.length,
      minScore: Math.min(...scores),
      maxScore: Math.max(...scores),
    });
  }

  return {
    duplicateDonors: [...perDonor.values()].filter((n) => n > 1).length,
    meanDateDiffDays: gaps.length === 0 ? null : gaps.reduce((sum, g) => sum + g, 0) / gaps.length,
    medianDateDiffDays: gaps.length === 0 ? null : quantile(gaps, 0.5),
    maxDateDiffDays: gaps.length === 0 ? null : gaps[gaps.length - 1],
    suspiciousDateMatches: gaps.filter((g) => g > SUSPICIOUS_DATE_GAP_DAYS).length,
    tiers,
  };
}

export interface ConversionRate {
  potential: number;
  actual: number;
  /** actual / potential; 0 when there are no potential donors */
  rate: number;
}

export interface ConversionStats {
  overall: ConversionRate;
  calc: ConversionRate;
  clif: ConversionRate;
  byAge: Record<string, ConversionRate>;
  bySex: Record<Sex, ConversionRate>;
}

export const AGE_GROUPS: readonly { label: string; min: number; max: number }[] = [
  { label: "18-39", min: 18, max: 39 },
  { label: "40-54", min: 40, max: 54 },
  { label: "55-64", min: 55, max: 64 },
  { label: "65-75", min: 65, max: 75 },
];

export function conversionRates(
  candidates: readonly LinkageCandidate[],
  matches: readonly RegistryMatch[]
): ConversionStats {
  const matched = new Set(matches.map((m) => m.hospitalizationId));
  const rateOf = (keep: (c: LinkageCandidate) => boolean): ConversionRate => {
    const pool = candidates.filter(keep);
    const actual = pool.filter((c) => matched.has(c.hospitalizationId)).length;
    return { potential: pool.length, actual, rate: pool.length > 0 ? actual / pool.length : 0 };
  };

  const byAge: Record<string, ConversionRate> = {};
  for (const group of AGE_GROUPS) {
    byAge[group.label] = rateOf(
      (c) => c.ageYears !== null && c.ageYears >= group.min && c.ageYears <= group.max
    );
  }

  return {
    overall: rateOf(() => true),
    calc: rateOf((c) => c.calcIncluded),
    clif: rateOf((c) => c.clifIncluded),
    byAge,
    bySex: { M: rateOf((c) => c.sex === "M"), F: rateOf((c) => c.sex === "F") },
  };
}

// ── Linkage ───────────────────────────────────────────────────────────────────

export interface LinkedCandidate {
  candidate: LinkageCandidate;
  match: RegistryMatch | null;
}

export interface LinkageResult {
  siteName: string | null;
  candidates: LinkedCandidate[];
  matches: RegistryMatch[];
  registryDonorCount: number;
  validation: LinkageValidation;
  conversion: ConversionStats;
  issues: DataIssue[];
}

export interface LinkageOptions {
  logger?: PipelineLogger;
}

/**
 * Links the cohort members of a pipeline run to a site's registry extract:
 *   1. Standardize both sides (sex as M/F, race upper-cased, dates as days)
 *   2. Match tier by tier, exact → clinical → composite
 *   3. Keep the best match per hospitalization
 *   4. Validate the matches and compute conversion rates
 *
 * Throws MalformedTableError when the extract lacks a join column.
 */
export function linkRegistryDonors(
  result: PipelineResult,
  registry: RawTable,
  options: LinkageOptions = {}
): LinkageResult {
  const logger = options.logger ?? console;
  const parsed = parseTable(SRTR_DONOR_TABLE, registry);
  const donors = parsed.rows.map(toRegistryDonor);
  const candidates = potentialDonors(result.hospitalizations);

  logger.info(`Linking ${candidates.length} potential donors to ${donors.length} registry donors`);
  if (parsed.issues.length > 0) {
    logger.warn(`${parsed.issues.length} registry row(s) dropped as invalid`);
  }

  const matches = resolveDuplicateMatches(tieredMatches(candidates, donors, logger));
  if (matches.length === 0) logger.warn("No registry matches in any tier");

  const validation = validateMatches(matches);
  if (validation.duplicateDonors > 0) {
    logger.warn(
      `${validation.duplicateDonors} registry donor(s) matched to more than one hospitalization`
    );
  }
  if (validation.suspiciousDateMatches > 0) {
    logger.warn(
      `${validation.suspiciousDateMatches} match(es) more than ${SUSPICIOUS_DATE_GAP_DAYS} days from death`
    );
  }

  const byHospitalization = new Map(matches.map((m): [string, RegistryMatch] => [m.hospitalizationId, m]));
  logger.info(`Linked ${matches.length} of ${candidates.length} potential donors`);

  return {
    siteName: result.siteName,
    candidates: candidates.map((candidate) => ({
      candidate,
      match: byHospitalization.get(candidate.hospitalizationId) ?? null,
    })),
    matches,
    registryDonorCount: donors.length,
    validation,
    conversion: conversionRates(candidates, matches),
    issues: parsed.issues,
  };
}

// ── Report ────────────────────────────────────────────────────────────────────

/** Metric/Value rows for the linkage summary export. */
export interface LinkageReportRow {
  metric: string;
  value: string;
}

function percent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

export function toLinkageReport(linkage: LinkageResult): LinkageReportRow[] {
  const candidates = linkage.candidates.map((l) => l.candidate);
  const row = (metric: string, value: string | number): LinkageReportRow => ({
    metric,
    value: String(value),
  });

  const rows = [
    row("Site", linkage.siteName ?? ""),
    row("Potential donors", candidates.length),
    row("CALC eligible", candidates.filter((c) => c.calcIncluded).length),
    row("CLIF eligible", candidates.filter((c) => c.clifIncluded).length),
    row("Registry donors", linkage.registryDonorCount),
    row("Matched", linkage.matches.length),
    ...linkage.validation.tiers.map((t) => row(`Tier ${t.tier} matches`, t.matches)),
    row("Overall conversion rate", percent(linkage.conversion.overall.rate)),
    row("CALC conversion rate", percent(linkage.conversion.calc.rate)),
    row("CLIF conversion rate", percent(linkage.conversion.clif.rate)),
    row("Duplicate registry donors", linkage.validation.duplicateDonors),
  ];
  const meanGap = linkage.validation.meanDateDiffDays;
  if (meanGap !== null) rows.push(row("Mean date difference (days)", meanGap.toFixed(1)));
  return rows;
}
