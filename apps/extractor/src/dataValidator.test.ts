import { describe, it, expect, vi, afterEach } from "vitest";
import type { DrugSummary } from "database";
import type { FdaLabel } from "./collectors/openFda.js";
import { loadConfig } from "./config.js";
import {
  computeOverallConfidence,
  confidenceLevel,
  defaultSources,
  fdaLabelConfidence,
  renderValidationReport,
  validateDrugs,
  type FdaLookup,
} from "./dataValidator.js";

const config = loadConfig({});

const fullLabel: FdaLabel = {
  openfda: {
    brand_name: ["KEYTRUDA"],
    generic_name: ["pembrolizumab"],
    manufacturer_name: ["Merck Sharp & Dohme LLC"],
    application_number: ["BLA125514"],
  },
  indications_and_usage: ["Melanoma."],
};

const summary = (id: number, generic_name: string, company_name: string | null = null): DrugSummary => ({
  id,
  generic_name,
  company_name,
  mechanism_of_action: null,
  trial_count: 0,
  avg_target_confidence: null,
  avg_indication_confidence: null,
});

describe("confidence scoring", () => {
  it("scores FDA matches by field and label completeness", () => {
    expect(fdaLabelConfidence({ label: fullLabel, matchedBy: "brand_name" })).toBe(1);
    expect(fdaLabelConfidence({ label: { openfda: { generic_name: ["x"] } }, matchedBy: "substance_name" })).toBeCloseTo(
      0.87
    );
  });

  it("weights sources and skips unavailable ones", () => {
    const fda = { source: "fda", status: "partial" as const, confidence: 0.9, detail: null };
    const sec = { source: "sec", status: "not_available" as const, confidence: 0, detail: null };
    const pubmed = { source: "pubmed", status: "error" as const, confidence: 0, detail: "down" };
    expect(computeOverallConfidence([fda, sec], 0.8, null, config.sourceWeights)).toBeCloseTo(0.98);
    expect(computeOverallConfidence([fda, pubmed], null, null, config.sourceWeights)).toBeCloseTo(0.9 / 1.1);
    expect(computeOverallConfidence([sec], null, null, config.sourceWeights)).toBe(0);
    expect(computeOverallConfidence([fda], 1, 1, config.sourceWeights)).toBe(1);
  });

  it("buckets scores by threshold", () => {
    expect(confidenceLevel(0.8, config.confidence)).toBe("high");
    expect(confidenceLevel(0.6, config.confidence)).toBe("medium");
    expect(confidenceLevel(0.59, config.confidence)).toBe("low");
    expect(confidenceLevel(0.1, config.confidence)).toBe("very_low");
  });
});

describe("validateDrugs", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  const lookup: FdaLookup = async (name) => {
    if (name === "Pembrolizumab") return { label: fullLabel, matchedBy: "brand_name" };
    if (name === "Brokenumab") throw new Error("openFDA 503");
    return null;
  };

  it("validates drugs and ranks them by confidence", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const results = await validateDrugs(
      [
        summary(1, "Unknownumab"),
        summary(2, "Pembrolizumab", "Merck & Co."),
        summary(3, "Brokenumab"),
      ],
      defaultSources(config, lookup),
      config
    );

    expect(results.map((r) => [r.drugName, r.status, r.level])).toEqual([
      ["Pembrolizumab", "validated", "high"],
      ["Unknownumab", "not_found", "very_low"],
      ["Brokenumab", "error", "very_low"],
    ]);
    expect(results[0]?.results.map((r) => r.status)).toEqual(["validated", "not_available", "not_available"]);
    expect(results[0]?.results[0]?.detail).toBe("matched by brand_name");
  });

  it("renders the text report", async () => {
    const validations = await validateDrugs(
      [summary(2, "Pembrolizumab", "Merck & Co.")],
      defaultSources(config, lookup),
      config
    );
    const rule = "=".repeat(80);
    expect(renderValidationReport(validations, config.confidence, new Date("2024-01-02T03:04:05.000Z")).split("\n")).toEqual([
      "DRUG DATA VALIDATION REPORT",
      "Generated: 2024-01-02T03:04:05.000Z",
      "Total Drugs Validated: 1",
      "",
      rule,
      "",
      "SUMMARY STATISTICS:",
      "High Confidence (>=0.8): 1 drugs",
      "Medium Confidence (0.6-0.8): 0 drugs",
      "Low Confidence (0.4-0.6): 0 drugs",
      "Very Low Confidence (<0.4): 0 drugs",
      "",
      rule,
      "",
      "1. Pembrolizumab (Merck & Co.)",
      "   Overall Confidence: 1.000 (validated)",
      "     fda: 1.000 (validated)",
      "     sec: 0.000 (not_available)",
      "     pubmed: 0.000 (not_available)",
      "",
    ]);
  });
});
