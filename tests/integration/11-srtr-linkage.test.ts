import { describe, expect, it } from "vitest";
import { MalformedTableError } from "../../src/errors.js";
import {
  MATCH_TIERS,
  matchScore,
  resolveDuplicateMatches,
  standardizeRegistrySex,
  toRegistryDonor,
  type RegistryDonor,
  type RegistryMatch,
} from "../../src/linkage/srtrLinkage.js";
import { linkRegistryDonors, runPipeline, toLinkageReport } from "../../src/pipeline/index.js";
import type { RawTable } from "../../src/types.js";
import {
  beforeDeath,
  bodySize,
  buildTables,
  combine,
  diagnosis,
  imv,
  normalLabs,
  silentLogger,
  stay,
  type Row,
  type StayOptions,
  type TableRows,
} from "../helpers/tables.js";

/**
 * L11 · Registry linkage
 *
 * Cohort members from a pipeline run are matched to a registry extract of
 * recovered donors, tier by tier, and summarized as conversion rates.
 */

// ── Fixture ───────────────────────────────────────────────────────────────────

/** Eligible under both definitions: ICU death on IMV, normal labs, BMI 24.7. */
function eligible(id: string, options: StayOptions = {}): TableRows {
  return combine(
    stay(id, options),
    normalLabs(id),
    bodySize(id, 80, 180),
    imv(id, beforeDeath(6)),
    diagnosis(id, "I63.9")
  );
}

const REGISTRY_COLUMNS = [
  "DONOR_ID",
  "DON_AGE",
  "DON_GENDER",
  "DON_RACE_SRTR",
  "DON_HGT_CM",
  "DON_WGT_KG",
  "DON_CREAT",
  "DON_RECOV_DT",
  "DON_DCD_SUPPORT_WITHDRAW_DT",
];

function registry(rows: Row[]): RawTable {
  return { columns: [...REGISTRY_COLUMNS], rows };
}

function donor(id: string, overrides: Row = {}): Row {
  return {
    DONOR_ID: id,
    DON_AGE: 60,
    DON_GENDER: "F",
    DON_RACE_SRTR: "White",
    DON_HGT_CM: null,
    DON_WGT_KG: null,
    DON_CREAT: null,
    DON_RECOV_DT: "2024-03-11",
    DON_DCD_SUPPORT_WITHDRAW_DT: null,
    ...overrides,
  };
}

// Deaths all fall on 2024-03-10.
const SITE = combine(
  eligible("h-a"),
  eligible("h-b", { sex: "Male" }),
  eligible("h-c", { birthDate: "1954-03-10T00:00:00.000Z" }),
  eligible("h-d", { sex: "Male", birthDate: "1984-03-10T00:00:00.000Z" }),
  stay("h-home", { dischargeCategory: "Home", deathDttm: null })
);

const REGISTRY = registry([
  // Same day +1, same age and race
  donor("D-1"),
  // +5 days, age 62, height within 5 cm
  donor("D-2", { DON_GENDER: "M", DON_AGE: 62, DON_RACE_SRTR: "Black", DON_HGT_CM: 183, DON_WGT_KG: 95, DON_RECOV_DT: "2024-03-15" }),
  // +10 days, age, height and weight agree
  donor("D-3", {
    DON_AGE: 70,
    DON_HGT_CM: 175,
    DON_WGT_KG: 88,
    DON_CREAT: 3.0,
    DON_RECOV_DT: "2024-03-20",
    DON_DCD_SUPPORT_WITHDRAW_DT: "2024-03-19",
  }),
  // Recovered months earlier
  donor("D-4", { DON_GENDER: "M", DON_AGE: 45, DON_RECOV_DT: "2024-01-01" }),
]);

function matchOf(linkage: ReturnType<typeof linkRegistryDonors>, id: string): RegistryMatch | null {
  const linked = linkage.candidates.find((l) => l.candidate.hospitalizationId === id);
  if (!linked) throw new Error(`hospitalization ${id} is not a candidate`);
  return linked.match;
}

function registryDonor(id: string, overrides: Partial<RegistryDonor> = {}): RegistryDonor {
  return {
    donorId: id,
    sex: "F",
    ageYears: 60,
    race: "WHITE",
    heightCm: null,
    weightKg: null,
    creatinine: null,
    recoveryDate: new Date("2024-03-11T00:00:00.000Z"),
    causeOfDeath: null,
    diabetes: null,
    hypertension: null,
    donationType: "DBD",
    ...overrides,
  };
}

// ── Tests ─────────────────────────────────────────────────────────────────────

describe("L11 · srtrLinkage", () => {
  const result = runPipeline(buildTables(SITE), { siteName: "Test Site", logger: silentLogger() });

  it("offers only cohort members with a death time as candidates", () => {
    const linkage = linkRegistryDonors(result, REGISTRY, { logger: silentLogger() });

    expect(linkage.candidates.map((l) => l.candidate.hospitalizationId)).toEqual(["h-a", "h-b", "h-c", "h-d"]);
    expect(linkage.candidates[0].candidate).toMatchObject({
      deathDate: new Date("2024-03-10T00:00:00.000Z"),
      sex: "F",
      ageYears: 60,
      race: "WHITE",
      heightCm: 180,
      weightKg: 80,
      creatinine: 1.0,
      calcIncluded: true,
      clifIncluded: true,
    });
    expect(linkage.registryDonorCount).toBe(4);
  });

  it("matches each candidate at the strictest tier it satisfies", () => {
    const linkage = linkRegistryDonors(result, REGISTRY, { logger: silentLogger() });

    const summary = (m: RegistryMatch | null) => m && [m.donor.donorId, m.tier, m.score, m.dateDiffDays];
    expect(summary(matchOf(linkage, "h-a"))).toEqual(["D-1", 1, 1, 1]);
    expect(summary(matchOf(linkage, "h-b"))).toEqual(["D-2", 2, 0.7, 5]);
    expect(summary(matchOf(linkage, "h-c"))).toEqual(["D-3", 3, 0.45, 10]);
    expect(matchOf(linkage, "h-d")).toBeNull();
    expect(matchOf(linkage, "h-c")?.donor.donationType).toBe("DCD");
  });

  it("computes conversion rates overall, per definition and per group", () => {
    const { conversion } = linkRegistryDonors(result, REGISTRY, { logger: silentLogger() });

    expect(conversion.overall).toEqual({ potential: 4, actual: 3, rate: 0.75 });
    expect(conversion.calc).toEqual({ potential: 4, actual: 3, rate: 0.75 });
    expect(conversion.clif).toEqual({ potential: 4, actual: 3, rate: 0.75 });
    expect(conversion.byAge["18-39"]).toEqual({ potential: 0, actual: 0, rate: 0 });
    expect(conversion.byAge["40-54"]).toEqual({ potential: 1, actual: 0, rate: 0 });
    expect(conversion.byAge["55-64"]).toEqual({ potential: 2, actual: 2, rate: 1 });
    expect(conversion.byAge["65-75"]).toEqual({ potential: 1, actual: 1, rate: 1 });
    expect(conversion.bySex).toEqual({
      M: { potential: 2, actual: 1, rate: 0.5 },
      F: { potential: 2, actual: 2, rate: 1 },
    });
  });

  it("validates date gaps and per-tier scores", () => {
    const { validation } = linkRegistryDonors(result, REGISTRY, { logger: silentLogger() });

    expect(validation.duplicateDonors).toBe(0);
    expect(validation.meanDateDiffDays).toBeCloseTo(16 / 3, 6);
    expect(validation.medianDateDiffDays).toBe(5);
    expect(validation.maxDateDiffDays).toBe(10);
    expect(validation.suspiciousDateMatches).toBe(0);
    expect(validation.tiers.map((t) => [t.tier, t.name, t.matches, t.meanScore])).toEqual([
      [1, "Exact Match", 1, 1],
      [2, "Clinical Match", 1, 0.7],
      [3, "Composite Match", 1, 0.45],
    ]);
  });

  it("logs the per-tier counts", () => {
    const logger = silentLogger();
    linkRegistryDonors(result, REGISTRY, { logger });

    expect(logger.info).toHaveBeenCalledWith("Linking 4 potential donors to 4 registry donors");
    expect(logger.info).toHaveBeenCalledWith("Tier 1 (Exact Match): 1 match(es)");
    expect(logger.info).toHaveBeenCalledWith("Tier 3 (Composite Match): 1 match(es)");
    expect(logger.info).toHaveBeenCalledWith("Linked 3 of 4 potential donors");
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("builds the metric/value summary rows", () => {
    const report = toLinkageReport(linkRegistryDonors(result, REGISTRY, { logger: silentLogger() }));

    expect(report).toEqual([
      { metric: "Site", value: "Test Site" },
      { metric: "Potential donors", value: "4" },
      { metric: "CALC eligible", value: "4" },
      { metric: "CLIF eligible", value: "4" },
      { metric: "Registry donors", value: "4" },
      { metric: "Matched", value: "3" },
      { metric: "Tier 1 matches", value: "1" },
      { metric: "Tier 2 matches", value: "1" },
      { metric: "Tier 3 matches", value: "1" },
      { metric: "Overall conversion rate", value: "75.0%" },
      { metric: "CALC conversion rate", value: "75.0%" },
      { metric: "CLIF conversion rate", value: "75.0%" },
      { metric: "Duplicate registry donors", value: "0" },
      { metric: "Mean date difference (days)", value: "5.3" },
    ]);
  });

  it("keeps the closest donor and reports a donor claimed twice", () => {
    const twins = runPipeline(buildTables(combine(eligible("h-x"), eligible("h-y"))), {
      logger: silentLogger(),
    });
    const logger = silentLogger();
    const linkage = linkRegistryDonors(
      twins,
      registry([donor("D-far", { DON_RECOV_DT: "2024-03-12" }), donor("D-near", { DON_RECOV_DT: "2024-03-10" })]),
      { logger }
    );

    expect(linkage.matches.map((m) => [m.hospitalizationId, m.donor.donorId, m.score])).toEqual([
      ["h-x", "D-near", 1],
      ["h-y", "D-near", 1],
    ]);
    expect(linkage.validation.duplicateDonors).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith("1 registry donor(s) matched to more than one hospitalization");
  });

  it("warns when no tier finds a match", () => {
    const logger = silentLogger();
    const linkage = linkRegistryDonors(result, registry([donor("D-4", { DON_RECOV_DT: "2023-01-01" })]), {
      logger,
    });

    expect(linkage.matches).toEqual([]);
    expect(linkage.validation.meanDateDiffDays).toBeNull();
    expect(linkage.conversion.overall.rate).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith("No registry matches in any tier");
  });

  it("reports registry rows without a donor id as invalid", () => {
    const logger = silentLogger();
    const linkage = linkRegistryDonors(result, registry([donor("D-1"), { DONOR_ID: null }]), { logger });

    expect(linkage.registryDonorCount).toBe(1);
    expect(linkage.issues).toHaveLength(1);
    expect(linkage.issues[0].kind).toBe("invalid_row");
    expect(linkage.issues[0].table).toBe("srtr_donor");
    expect(linkage.issues[0].detail).toMatch(/^row 1: DONOR_ID /);
    expect(logger.warn).toHaveBeenCalledWith("1 registry row(s) dropped as invalid");
  });

  it("rejects an extract without a recovery date column", () => {
    const extract: RawTable = { columns: ["DONOR_ID", "DON_GENDER"], rows: [] };

    expect(() => linkRegistryDonors(result, extract, { logger: silentLogger() })).toThrow(MalformedTableError);
    expect(() => linkRegistryDonors(result, extract, { logger: silentLogger() })).toThrow(
      'Table "srtr_donor" is missing required column(s): DON_RECOV_DT'
    );
  });
});

describe("L11 · registry standardization and scoring", () => {
  it("reads registry sex codes by their first letter", () => {
    expect(standardizeRegistrySex("M")).toBe("M");
    expect(standardizeRegistrySex("female")).toBe("F");
    expect(standardizeRegistrySex("U")).toBeNull();
    expect(standardizeRegistrySex(null)).toBeNull();
  });

  it("derives donation type from the support-withdrawal date", () => {
    const row = {
      DONOR_ID: "D-1",
      DON_AGE: 41.8,
      DON_GENDER: "M",
      DON_RACE_SRTR: "Asian",
      DON_HGT_CM: 170,
      DON_WGT_KG: 70,
      DON_CREAT: 0.9,
      DON_RECOV_DT: new Date("2024-03-11T18:30:00.000Z"),
      DON_CAD_DON_COD: "Anoxia",
      DON_HIST_DIAB: null,
      DON_HIST_HYPERTEN: "No",
      DON_DCD_SUPPORT_WITHDRAW_DT: null,
    };

    expect(toRegistryDonor(row)).toMatchObject({
      ageYears: 41,
      race: "ASIAN",
      recoveryDate: new Date("2024-03-11T00:00:00.000Z"),
      donationType: "DBD",
    });
    expect(
      toRegistryDonor({ ...row, DON_DCD_SUPPORT_WITHDRAW_DT: new Date("2024-03-11T00:00:00.000Z") }).donationType
    ).toBe("DCD");
  });

  it("adjusts the tier score by date proximity", () => {
    const [exact, , composite] = MATCH_TIERS;

    expect(matchScore(exact, 0)).toBe(1);
    expect(matchScore(exact, -3)).toBe(0.95);
    expect(matchScore(composite, 7)).toBe(0.5);
    expect(matchScore(composite, 14)).toBe(0.45);
  });

  it("resolves duplicates by tier, then score, then date gap, then donor id", () => {
    const match = (donorId: string, tier: 1 | 2 | 3, score: number, dateDiffDays: number): RegistryMatch => ({
      hospitalizationId: "h-1",
      donor: registryDonor(donorId),
      tier,
      score,
      dateDiffDays,
    });

    const pick = (matches: RegistryMatch[]) => resolveDuplicateMatches(matches).map((m) => m.donor.donorId);
    expect(pick([match("D-2", 2, 0.7, 0), match("D-1", 1, 0.9, 3)])).toEqual(["D-1"]);
    expect(pick([match("D-1", 3, 0.45, 10), match("D-2", 3, 0.5, 5)])).toEqual(["D-2"]);
    expect(pick([match("D-1", 2, 0.7, 6), match("D-2", 2, 0.7, -4)])).toEqual(["D-2"]);
    expect(pick([match("D-2", 1, 1, 1), match("D-1", 1, 1, -1)])).toEqual(["D-1"]);
  });
});
