/**
 * Cross-checks stored drugs against external sources and folds the per-source
 * confidences, plus target/indication richness, into one overall score per drug.
 * Only the FDA source does real work; SEC and PubMed answer "not_available".
 */

import type { DrugSummary } from "database";
import type { AppConfig } from "./config.js";
import { lookupFdaLabel, type FdaLabelMatch } from "./collectors/openFda.js";

export type SourceStatus = "validated" | "partial" | "not_found" | "not_available" | "error";

export interface SourceResult {
  source: string;
  status: SourceStatus;
  confidence: number;
  detail: string | null;
}

export interface ValidationSource {
  readonly name: string;
  validate(drugName: string, companyName: string | null): Promise<SourceResult>;
}

export type FdaLookup = (drugName: string) => Promise<FdaLabelMatch | null>;

const FDA_BASE_CONFIDENCE: Record<FdaLabelMatch["matchedBy"], number> = {
  brand_name: 0.95,
  generic_name: 0.9,
  substance_name: 0.85,
};

/** Base confidence by match field, +0.02 per populated label field, capped at 1. */
export function fdaLabelConfidence(match: FdaLabelMatch): number {
  const ofda = match.label.openfda;
  const present = [
    ofda?.brand_name?.length,
    ofda?.generic_name?.length,
    ofda?.manufacturer_name?.length,
    ofda?.application_number?.length,
    match.label.indications_and_usage?.length,
  ].filter((n) => (n ?? 0) > 0).length;
  return Math.min(1, FDA_BASE_CONFIDENCE[match.matchedBy] + present * 0.02);
}

export function fdaSource(mediumThreshold: number, lookup: FdaLookup = lookupFdaLabel): ValidationSource {
  const name = "fda";
  return {
    name,
    async validate(drugName) {
      try {
        const match = await lookup(drugName);
        if (!match) return { source: name, status: "not_found", confidence: 0, detail: null };
        const confidence = fdaLabelConfidence(match);
        return {
          source: name,
          status: confidence > mediumThreshold ? "validated" : "partial",
          confidence,
          detail: `matched by ${match.matchedBy}`,
        };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[validate] FDA lookup failed for ${drugName}:`, message);
        return { source: name, status: "error", confidence: 0, detail: message };
      }
    },
  };
}

/** Placeholder for sources with no live integration. */
export function unavailableSource(name: string): ValidationSource {
  return {
    name,
    validate: async () => ({ source: name, status: "not_available", confidence: 0, detail: null }),
  };
}

export function defaultSources(config: AppConfig, lookup?: FdaLookup): ValidationSource[] {
  return [fdaSource(config.confidence.medium, lookup), unavailableSource("sec"), unavailableSource("pubmed")];
}

export function computeOverallConfidence(
  results: SourceResult[],
  avgTargetConfidence: number | null,
  avgIndicationConfidence: number | null,
  weights: Readonly<Record<string, number>>
): number {
  let weighted = 0;
  let totalWeight = 0;
  for (const r of results) {
    if (r.status === "not_available") continue;
    const weight = weights[r.source] ?? weights.unknown ?? 0.1;
    weighted += r.confidence * weight;
    totalWeight += weight;
  }
  let score = totalWeight > 0 ? weighted / totalWeight : 0;
  if (avgTargetConfidence !== null) score += Math.min(0.1, avgTargetConfidence * 0.1);
  if (avgIndicationConfidence !== null) score += Math.min(0.1, avgIndicationConfidence * 0.1);
  return Math.min(1, Math.max(0, score));
}

export type ConfidenceLevel = "high" | "medium" | "low" | "very_low";

export function confidenceLevel(score: number, thresholds: AppConfig["confidence"]): ConfidenceLevel {
  if (score >= thresholds.high) return "high";
  if (score >= thresholds.medium) return "medium";
  if (score >= thresholds.low) return "low";
  return "very_low";
}

export interface DrugValidation {
  drugId: number;
  drugName: string;
  companyName: string | null;
  results: SourceResult[];
  overall: number;
  status: SourceStatus;
  level: ConfidenceLevel;
}

export async function validateDrug(
  drug: DrugSummary,
  sources: ValidationSource[],
  config: AppConfig
): Promise<DrugValidation> {
  const results: SourceResult[] = [];
  for (const source of sources) {
    results.push(await source.validate(drug.generic_name, drug.company_name));
  }
  const overall = computeOverallConfidence(
    results,
    drug.avg_target_confidence,
    drug.avg_indication_confidence,
    config.sourceWeights
  );
  const found = results.some((r) => r.status === "validated" || r.status === "partial");
  let status: SourceStatus;
  if (found) status = overall > config.confidence.medium ? "validated" : "partial";
  else status = results.some((r) => r.status === "error") ? "error" : "not_found";
  return {
    drugId: drug.id,
    drugName: drug.generic_name,
    companyName: drug.company_name,
    results,
    overall,
    status,
    level: confidenceLevel(overall, config.confidence),
  };
}

/** Validates sequentially (source rate limits) and returns the results best first. */
export async function validateDrugs(
  drugs: DrugSummary[],
  sources: ValidationSource[],
  config: AppConfig
): Promise<DrugValidation[]> {
  const out: DrugValidation[] = [];
  for (const drug of drugs) out.push(await validateDrug(drug, sources, config));
  return rankByConfidence(out);
}

export function rankByConfidence(validations: DrugValidation[]): DrugValidation[] {
  return [...validations].sort((a, b) => b.overall - a.overall);
}

const RULE = "=".repeat(80);

export function renderValidationReport(
  validations: DrugValidation[],
  thresholds: AppConfig["confidence"],
  now: Date = new Date()
): string {
  const count = (level: ConfidenceLevel) => validations.filter((v) => v.level === level).length;
  const lines = [
    "DRUG DATA VALIDATION REPORT",
    `Generated: ${now.toISOString()}`,
    `Total Drugs Validated: ${validations.length}`,
    "",
    RULE,
    "",
    "SUMMARY STATISTICS:",
    `High Confidence (>=${thresholds.high}): ${count("high")} drugs`,
    `Medium Confidence (${thresholds.medium}-${thresholds.high}): ${count("medium")} drugs`,
    `Low Confidence (${thresholds.low}-${thresholds.medium}): ${count("low")} drugs`,
    `Very Low Confidence (<${thresholds.low}): ${count("very_low")} drugs`,
    "",
    RULE,
    "",
  ];
  validations.forEach((v, i) => {
    lines.push(`${i + 1}. ${v.drugName}${v.companyName ? ` (${v.companyName})` : ""}`);
    lines.push(`   Overall Confidence: ${v.overall.toFixed(3)} (${v.status})`);
    for (const r of v.results) {
      lines.push(`     ${r.source}: ${r.confidence.toFixed(3)} (${r.status})`);
    }
    lines.push("");
  });
  return lines.join("\n");
}
