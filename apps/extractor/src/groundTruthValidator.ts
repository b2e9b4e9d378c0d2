/**
 * Accuracy of the pipeline store against a curated ground truth: drug-name and company
 * set overlap (precision/recall/F1), mechanism agreement, and clinical-trial coverage.
 * Both inputs are loaded before any metric; each metric then runs on its own, so one
 * failing check is reported as an error without blocking the others.
 */

import type { Db } from "database";
import type { AppConfig } from "./config.js";
import {
  loadGroundTruth,
  loadPipelineSnapshot,
  type GroundTruthRow,
  type PipelineDrug,
} from "./groundTruth.js";

export const normalizeName = (s: string) => s.trim().toLowerCase();

export interface SetComparison {
  metric: "drug_names" | "company_coverage";
  precision: number;
  recall: number;
  f1_score: number;
  matches: number;
  missing_from_pipeline: string[];
  extra_in_pipeline: string[];
  total_ground_truth: number;
  total_pipeline: number;
}

export interface MechanismMismatch {
  drug: string;
  ground_truth: string;
  pipeline: string;
}

export interface MechanismComparison {
  metric: "mechanisms";
  accuracy: number;
  exact_matches: number;
  partial_matches: number;
  mismatches: number;
  total_common_drugs: number;
  mismatch_details: MechanismMismatch[];
}

export interface TrialCoverageEntry {
  drug: string;
  gt_trials: number;
  pipeline_trials: number;
  coverage_ratio: number;
}

export interface TrialCoverage {
  metric: "clinical_trials";
  overall_coverage: number;
  total_gt_trials: number;
  total_pipeline_trials: number;
  common_drugs_analyzed: number;
  coverage_analysis: TrialCoverageEntry[];
}

export type MetricName = "drug_names" | "company_coverage" | "mechanisms" | "clinical_trials";

export interface MetricError {
  metric: MetricName;
  error: string;
}

export type MetricResult = SetComparison | MechanismComparison | TrialCoverage | MetricError;

export type OverallHealth = "Good" | "Needs Attention" | "Poor" | "Error";

export interface ValidationSummary {
  total_validations: number;
  overall_health: OverallHealth;
  key_metrics: Record<string, number>;
  recommendations: string[];
}

export interface GroundTruthResults {
  timestamp: string;
  validations: Record<MetricName, MetricResult>;
  summary: ValidationSummary;
}

type GroundTruthConfig = AppConfig["groundTruth"];

export function compareSets(
  metric: SetComparison["metric"],
  groundTruth: Iterable<string>,
  pipeline: Iterable<string>
): SetComparison {
  const gt = new Set(groundTruth);
  const pipe = new Set(pipeline);
  const matches = [...gt].filter((x) => pipe.has(x));
  const precision = pipe.size > 0 ? matches.length / pipe.size : 0;
  const recall = gt.size > 0 ? matches.length / gt.size : 0;
  const f1 = precision + recall > 0 ? (2 * precision * recall) / (precision + recall) : 0;
  return {
    metric,
    precision,
    recall,
    f1_score: f1,
    matches: matches.length,
    missing_from_pipeline: [...gt].filter((x) => !pipe.has(x)).sort(),
    extra_in_pipeline: [...pipe].filter((x) => !gt.has(x)).sort(),
    total_ground_truth: gt.size,
    total_pipeline: pipe.size,
  };
}

export function validateDrugNames(gt: GroundTruthRow[], pipeline: PipelineDrug[]): SetComparison {
  return compareSets(
    "drug_names",
    gt.map((r) => normalizeName(r.genericName)),
    pipeline.map((d) => normalizeName(d.name))
  );
}

/** Company names are compared after alias mapping on both sides ("roche" -> "roche/genentech"). */
export function validateCompanyCoverage(
  gt: GroundTruthRow[],
  pipeline: PipelineDrug[],
  mappings: Readonly<Record<string, string>>
): SetComparison {
  const canonical = (name: string) => {
    const key = normalizeName(name);
    return mappings[key] ?? key;
  };
  const present = (names: Array<string | null>) =>
    names.filter((n): n is string => n !== null && n.trim().length > 0).map(canonical);
  return compareSets(
    "company_coverage",
    present(gt.map((r) => r.company)),
    present(pipeline.map((d) => d.company))
  );
}

function byName<R, T>(rows: R[], name: (row: R) => string, value: (row: R) => T | null): Map<string, T> {
  const out = new Map<string, T>();
  for (const row of rows) {
    const v = value(row);
    if (v !== null) out.set(normalizeName(name(row)), v);
  }
  return out;
}

export function validateMechanisms(
  gt: GroundTruthRow[],
  pipeline: PipelineDrug[],
  maxDetails: number
): MechanismComparison {
  const gtMech = byName(gt, (r) => r.genericName, (r) => r.mechanism);
  const pipeMech = byName(pipeline, (d) => d.name, (d) => d.mechanism?.trim() || null);
  const common = [...gtMech.keys()].filter((k) => pipeMech.has(k));

  let exact = 0;
  let partial = 0;
  const mismatches: MechanismMismatch[] = [];
  for (const drug of common) {
    const gtText = gtMech.get(drug) ?? "";
    const pipeText = pipeMech.get(drug) ?? "";
    const g = gtText.toLowerCase();
    const p = pipeText.toLowerCase();
    if (g === p) exact++;
    else if (g.split(/\s+/).some((w) => w.length > 3 && p.includes(w))) partial++;
    else mismatches.push({ drug, ground_truth: gtText, pipeline: pipeText });
  }

  return {
    metric: "mechanisms",
    accuracy: common.length > 0 ? (exact + partial * 0.5) / common.length : 0,
    exact_matches: exact,
    partial_matches: partial,
    mismatches: mismatches.length,
    total_common_drugs: common.length,
    mismatch_details: mismatches.slice(0, maxDetails),
  };
}

export function countTrialEntries(cell: string): number {
  return cell.split("|").filter((t) => t.trim().length > 0).length;
}

export function validateClinicalTrials(
  gt: GroundTruthRow[],
  pipeline: PipelineDrug[],
  maxDetails: number
): TrialCoverage {
  const gtCounts = byName(gt, (r) => r.genericName, (r) => (r.trials === null ? null : countTrialEntries(r.trials)));
  const pipeCounts = byName(pipeline, (d) => d.name, (d) => d.trialCount);
  const common = [...gtCounts.keys()].filter((k) => pipeCounts.has(k));

  let totalGt = 0;
  let totalPipe = 0;
  const analysis: TrialCoverageEntry[] = [];
  for (const drug of common) {
    const gtCount = gtCounts.get(drug) ?? 0;
    const pipeCount = pipeCounts.get(drug) ?? 0;
    totalGt += gtCount;
    totalPipe += pipeCount;
    analysis.push({
      drug,
      gt_trials: gtCount,
      pipeline_trials: pipeCount,
      coverage_ratio: gtCount > 0 ? pipeCount / gtCount : 0,
    });
  }

  return {
    metric: "clinical_trials",
    overall_coverage: totalGt > 0 ? totalPipe / totalGt : 0,
    total_gt_trials: totalGt,
    total_pipeline_trials: totalPipe,
    common_drugs_analyzed: common.length,
    coverage_analysis: analysis.slice(0, maxDetails),
  };
}

export function isMetricError(result: MetricResult): result is MetricError {
  return "error" in result;
}

function keyMetric(result: MetricResult): [string, number] | null {
  if (isMetricError(result)) return null;
  switch (result.metric) {
    case "drug_names":
      return ["drug_names_f1", result.f1_score];
    case "company_coverage":
      return ["company_coverage_f1", result.f1_score];
    case "mechanisms":
      return ["mechanisms_accuracy", result.accuracy];
    case "clinical_trials":
      return ["clinical_trials_coverage", result.overall_coverage];
  }
}

export function summarize(results: MetricResult[], thresholds: GroundTruthConfig["thresholds"]): ValidationSummary {
  const keyMetrics: Record<string, number> = {};
  for (const r of results) {
    const entry = keyMetric(r);
    if (entry) keyMetrics[entry[0]] = entry[1];
  }

  const recommendations: string[] = [];
  const below = (key: string, threshold: number) => keyMetrics[key] !== undefined && keyMetrics[key] < threshold;
  if (below("drug_names_f1", thresholds.drugNamesF1)) {
    recommendations.push(`Improve drug name extraction - F1 score below ${thresholds.drugNamesF1}`);
  }
  if (below("mechanisms_accuracy", thresholds.mechanismsAccuracy)) {
    recommendations.push(`Improve mechanism extraction - accuracy below ${thresholds.mechanismsAccuracy}`);
  }
  if (below("clinical_trials_coverage", thresholds.trialCoverage)) {
    recommendations.push(`Improve clinical trial collection - coverage below ${thresholds.trialCoverage}`);
  }
  if (below("company_coverage_f1", thresholds.companyF1)) {
    recommendations.push(`Improve company name resolution - F1 score below ${thresholds.companyF1}`);
  }

  let health: OverallHealth;
  if (results.some(isMetricError)) health = "Error";
  else if (recommendations.length === 0) health = "Good";
  else if (recommendations.length <= 2) health = "Needs Attention";
  else health = "Poor";

  return {
    total_validations: results.length,
    overall_health: health,
    key_metrics: keyMetrics,
    recommendations,
  };
}

function runCheck(metric: MetricName, check: () => MetricResult): MetricResult {
  try {
    return check();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[validate] ${metric} check failed:`, message);
    return { metric, error: message };
  }
}

/** All four checks over already-loaded inputs. */
export function validateAgainstGroundTruth(
  gt: GroundTruthRow[],
  pipeline: PipelineDrug[],
  config: GroundTruthConfig,
  now: Date = new Date()
): GroundTruthResults {
  const validations: Record<MetricName, MetricResult> = {
    drug_names: runCheck("drug_names", () => validateDrugNames(gt, pipeline)),
    company_coverage: runCheck("company_coverage", () =>
      validateCompanyCoverage(gt, pipeline, config.companyMappings)
    ),
    mechanisms: runCheck("mechanisms", () => validateMechanisms(gt, pipeline, config.maxMismatchDetails)),
    clinical_trials: runCheck("clinical_trials", () =>
      validateClinicalTrials(gt, pipeline, config.maxMismatchDetails)
    ),
  };
  return {
    timestamp: now.toISOString(),
    validations,
    summary: summarize(Object.values(validations), config.thresholds),
  };
}

/** Loads both inputs, then validates. Throws GroundTruthLoadError when either cannot be loaded. */
export function runGroundTruthValidation(groundTruthPath: string, db: Db, config: AppConfig): GroundTruthResults {
  const gt = loadGroundTruth(groundTruthPath);
  const pipeline = loadPipelineSnapshot(db);
  console.log(`[validate] ground truth: ${gt.length} drugs; pipeline: ${pipeline.length} drugs`);
  const results = validateAgainstGroundTruth(gt, pipeline, config.groundTruth);
  console.log(`[validate] overall health: ${results.summary.overall_health}`);
  return results;
}
