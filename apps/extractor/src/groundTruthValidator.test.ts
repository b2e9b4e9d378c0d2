import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createOrUpdateDrug, getOrCreateCompany, getOrCreateTrial, linkDrugTrial, openDatabase, type Db } from "database";
import { loadConfig } from "./config.js";
import type { GroundTruthRow, PipelineDrug } from "./groundTruth.js";
import { renderGroundTruthReport, writeGroundTruthOutputs } from "./groundTruthReport.js";
import {
  compareSets,
  countTrialEntries,
  runGroundTruthValidation,
  summarize,
  validateAgainstGroundTruth,
  validateClinicalTrials,
  validateCompanyCoverage,
  validateMechanisms,
} from "./groundTruthValidator.js";

const config = loadConfig({});

const row = (genericName: string, fields: Partial<GroundTruthRow> = {}): GroundTruthRow => ({
  genericName,
  brandName: null,
  fdaApproval: null,
  drugClass: null,
  target: null,
  mechanism: null,
  indication: null,
  trials: null,
  company: null,
  tickets: null,
  ...fields,
});

const groundTruth: GroundTruthRow[] = [
  row("Pembrolizumab", { company: "Merck", mechanism: "Blocks PD-1", trials: "NCT01234567|NCT07654321" }),
  row("Nivolumab", { company: "Bristol Myers Squibb", mechanism: "PD-1 inhibitor" }),
  row("Atezolizumab", { company: "Roche", mechanism: "Blocks PD-L1", trials: "NCT05555555" }),
];

const pipeline: PipelineDrug[] = [
  { name: "pembrolizumab", company: "Merck & Co.", mechanism: "blocks pd-1", trialCount: 1 },
  { name: "Nivolumab", company: "Bristol Myers Squibb", mechanism: "Binds the PD-1 receptor", trialCount: 3 },
  { name: "Ipilimumab", company: "Genentech", mechanism: null, trialCount: 0 },
];

describe("set metrics", () => {
  it("computes precision, recall and F1", () => {
    const result = compareSets(
      "drug_names",
      ["pembrolizumab", "nivolumab", "atezolizumab"],
      ["pembrolizumab", "nivolumab", "ipilimumab"]
    );
    expect(result.precision).toBeCloseTo(2 / 3);
    expect(result.recall).toBeCloseTo(2 / 3);
    expect(result.f1_score).toBeCloseTo(2 / 3);
    expect(result.missing_from_pipeline).toEqual(["atezolizumab"]);
    expect(result.extra_in_pipeline).toEqual(["ipilimumab"]);
  });

  it("scores an empty pipeline as zero", () => {
    expect(compareSets("drug_names", ["a"], [])).toMatchObject({ precision: 0, recall: 0, f1_score: 0 });
  });

  it("maps company aliases on both sides", () => {
    const result = validateCompanyCoverage(groundTruth, pipeline, config.groundTruth.companyMappings);
    expect(result.f1_score).toBe(1);
    expect(result.total_ground_truth).toBe(3);
  });
});

describe("mechanisms and trials", () => {
  it("counts exact and partial mechanism matches over common drugs", () => {
    const result = validateMechanisms(
      [...groundTruth, row("Ipilimumab", { mechanism: "Blocks CTLA-4" })],
      [...pipeline.slice(0, 2), { name: "Ipilimumab", company: null, mechanism: "Targets CTLA4", trialCount: 0 }],
      10
    );
    expect(result).toMatchObject({ exact_matches: 1, partial_matches: 1, mismatches: 1, total_common_drugs: 3 });
    expect(result.accuracy).toBeCloseTo(0.5);
    expect(result.mismatch_details).toEqual([
      { drug: "ipilimumab", ground_truth: "Blocks CTLA-4", pipeline: "Targets CTLA4" },
    ]);
  });

  it("compares trial counts for drugs in both sets", () => {
    expect(countTrialEntries("NCT01234567| NCT07654321 | ")).toBe(2);
    const result = validateClinicalTrials(groundTruth, pipeline, 10);
    expect(result).toMatchObject({ overall_coverage: 0.5, total_gt_trials: 2, total_pipeline_trials: 1 });
    expect(result.coverage_analysis).toEqual([
      { drug: "pembrolizumab", gt_trials: 2, pipeline_trials: 1, coverage_ratio: 0.5 },
    ]);
  });
});

describe("summary and report", () => {
  const now = new Date("2024-01-02T03:04:05.000Z");

  it("flags failed checks as an error", () => {
    const summary = summarize([{ metric: "mechanisms", error: "boom" }], config.groundTruth.thresholds);
    expect(summary.overall_health).toBe("Error");
    expect(summary.key_metrics).toEqual({});
  });

  it("renders the report", () => {
    const results = validateAgainstGroundTruth(groundTruth, pipeline, config.groundTruth, now);
    expect(results.summary.overall_health).toBe("Needs Attention");
    const sub = "-".repeat(20);
    const rule = "=".repeat(60);
    expect(renderGroundTruthReport(results).split("\n")).toEqual([
      rule,
      "GROUND TRUTH VALIDATION REPORT",
      rule,
      "Generated: 2024-01-02T03:04:05.000Z",
      "",
      "SUMMARY",
      sub,
      "Overall Health: Needs Attention",
      "Total Validations: 4",
      "",
      "KEY METRICS",
      sub,
      "drug_names_f1: 0.667",
      "company_coverage_f1: 1.000",
      "mechanisms_accuracy: 0.750",
      "clinical_trials_coverage: 0.500",
      "",
      "DETAILED RESULTS",
      sub,
      "",
      "DRUG_NAMES:",
      "  Precision: 0.667",
      "  Recall: 0.667",
      "  F1 Score: 0.667",
      "  Missing from pipeline: 1 items",
      "    atezolizumab",
      "",
      "COMPANY_COVERAGE:",
      "  Precision: 1.000",
      "  Recall: 1.000",
      "  F1 Score: 1.000",
      "",
      "MECHANISMS:",
      "  Accuracy: 0.750",
      "  Exact: 1, Partial: 1, Mismatched: 0",
      "",
      "CLINICAL_TRIALS:",
      "  Coverage: 0.500",
      "  Trials: 1 of 2",
      "",
      "RECOMMENDATIONS",
      sub,
      "1. Improve drug name extraction - F1 score below 0.8",
      "",
      rule,
    ]);
  });
});

describe("runGroundTruthValidation", () => {
  let db: Db;
  let dir: string;

  beforeEach(() => {
    db = openDatabase(":memory:");
    dir = mkdtempSync(join(tmpdir(), "ground-truth-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    db.close();
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("validates the store against a spreadsheet and writes both outputs", () => {
    const merck = getOrCreateCompany(db, "Merck & Co.").row;
    const drug = createOrUpdateDrug(
      db,
      { generic_name: "Pembrolizumab", mechanism_of_action: "Blocks PD-1", company_id: merck.id },
      () => true
    );
    linkDrugTrial(db, drug?.drug.id ?? -1, getOrCreateTrial(db, { nct_id: "NCT01234567" }).row.id);
    const csvPath = join(dir, "ground_truth.csv");
    writeFileSync(csvPath, "Generic Name,Company,Mechanism,Current Clinical Trials\nPembrolizumab,Merck,Blocks PD-1,NCT01234567\n");

    const results = runGroundTruthValidation(csvPath, db, config);
    expect(results.summary).toMatchObject({
      overall_health: "Good",
      key_metrics: {
        drug_names_f1: 1,
        company_coverage_f1: 1,
        mechanisms_accuracy: 1,
        clinical_trials_coverage: 1,
      },
      recommendations: [],
    });

    const { jsonPath, reportPath } = writeGroundTruthOutputs(results, join(dir, "out"));
    expect(JSON.parse(readFileSync(jsonPath, "utf8"))).toEqual(results);
    expect(readFileSync(reportPath, "utf8")).toContain("Overall Health: Good");
  });

  it("stops when the ground truth cannot be loaded", () => {
    expect(() => runGroundTruthValidation(join(dir, "missing.xlsx"), db, config)).toThrow(
      /cannot read ground truth/
    );
  });
});
