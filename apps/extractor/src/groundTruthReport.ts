import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { isMetricError, type GroundTruthResults } from "./groundTruthValidator.js";

const RULE = "=".repeat(60);
const SUBRULE = "-".repeat(20);

export function renderGroundTruthReport(results: GroundTruthResults, maxMissingItems = 5): string {
  const { summary } = results;
  const lines = [RULE, "GROUND TRUTH VALIDATION REPORT", RULE, `Generated: ${results.timestamp}`, ""];

  lines.push("SUMMARY", SUBRULE);
  lines.push(`Overall Health: ${summary.overall_health}`);
  lines.push(`Total Validations: ${summary.total_validations}`, "");

  lines.push("KEY METRICS", SUBRULE);
  for (const [metric, value] of Object.entries(summary.key_metrics)) {
    lines.push(`${metric}: ${value.toFixed(3)}`);
  }
  lines.push("");

  lines.push("DETAILED RESULTS", SUBRULE);
  for (const result of Object.values(results.validations)) {
    lines.push("", `${result.metric.toUpperCase()}:`);
    if (isMetricError(result)) {
      lines.push(`  Error: ${result.error}`);
      continue;
    }
    switch (result.metric) {
      case "drug_names":
      case "company_coverage":
        lines.push(`  Precision: ${result.precision.toFixed(3)}`);
        lines.push(`  Recall: ${result.recall.toFixed(3)}`);
        lines.push(`  F1 Score: ${result.f1_score.toFixed(3)}`);
        if (result.missing_from_pipeline.length > 0) {
          lines.push(`  Missing from pipeline: ${result.missing_from_pipeline.length} items`);
          if (result.missing_from_pipeline.length <= maxMissingItems) {
            lines.push(`    ${result.missing_from_pipeline.join(", ")}`);
          }
        }
        break;
      case "mechanisms":
        lines.push(`  Accuracy: ${result.accuracy.toFixed(3)}`);
        lines.push(`  Exact: ${result.exact_matches}, Partial: ${result.partial_matches}, Mismatched: ${result.mismatches}`);
        break;
      case "clinical_trials":
        lines.push(`  Coverage: ${result.overall_coverage.toFixed(3)}`);
        lines.push(`  Trials: ${result.total_pipeline_trials} of ${result.total_gt_trials}`);
        break;
    }
  }

  if (summary.recommendations.length > 0) {
    lines.push("", "RECOMMENDATIONS", SUBRULE);
    summary.recommendations.forEach((rec, i) => lines.push(`${i + 1}. ${rec}`));
  }
  lines.push("", RULE);
  return lines.join("\n");
}

/** Writes validation_results.json and validation_report.txt into outDir. */
export function writeGroundTruthOutputs(
  results: GroundTruthResults,
  outDir: string,
  maxMissingItems?: number
): { jsonPath: string; reportPath: string } {
  mkdirSync(outDir, { recursive: true });
  const jsonPath = join(outDir, "validation_results.json");
  const reportPath = join(outDir, "validation_report.txt");
  writeFileSync(jsonPath, JSON.stringify(results, null, 2));
  writeFileSync(reportPath, renderGroundTruthReport(results, maxMissingItems));
  return { jsonPath, reportPath };
}
