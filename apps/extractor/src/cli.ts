import { getDatabase, listDrugSummaries, type Db } from "database";
import { createEntityRecognizer } from "pharma-ai";
import { ConfigError, ExtractionModeSchema, loadConfig, type AppConfig, type ExtractionMode } from "./config.js";
import { trialsCollector } from "./collectors/clinicalTrials.js";
import { websiteCollector } from "./collectors/companyWebsite.js";
import { labelsCollector } from "./collectors/openFda.js";
import { pubmedCollector } from "./collectors/pubmed.js";
import { storeDocuments } from "./collectors/store.js";
import { runCollector, type CollectedDocument } from "./collectors/types.js";
import { defaultSources, renderValidationReport, validateDrugs } from "./dataValidator.js";
import { deduplicateDrugs } from "./deduplicate.js";
import { renderGroundTruthReport, writeGroundTruthOutputs } from "./groundTruthReport.js";
import { runGroundTruthValidation } from "./groundTruthValidator.js";
import { runExtraction } from "./pipeline.js";
import { loadSeedTable, type SeedCompany, type SeedTable } from "./seedData.js";

export const USAGE = `Usage: extractor <command> [options]

  collect        [--companies merck,pfizer] [--drugs pembrolizumab,nivolumab] [--limit N]
  extract        [--mode simple|standard|comprehensive]
  dedupe
  validate-data  [--limit N]
  validate       --ground-truth <file.xlsx|file.csv> [--out <dir>]`;

/** Value following `name`, if any. */
export function optionValue(args: string[], name: string): string | undefined {
  const i = args.indexOf(name);
  if (i < 0) return undefined;
  const value = args[i + 1];
  return value === undefined || value.startsWith("--") ? undefined : value;
}

/** Comma-separated option, trimmed, empties dropped. */
export function listOption(args: string[], name: string): string[] {
  const value = optionValue(args, name);
  if (!value) return [];
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function intOption(args: string[], name: string): number | undefined {
  const value = optionValue(args, name);
  if (value === undefined) return undefined;
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0) throw new ConfigError(`${name} must be a positive integer, got "${value}"`);
  return n;
}

export function parseMode(value: string | undefined): ExtractionMode | undefined {
  if (value === undefined) return undefined;
  const parsed = ExtractionModeSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`--mode must be one of ${ExtractionModeSchema.options.join(", ")}, got "${value}"`);
  }
  return parsed.data;
}

/** Roster companies matching any of the given names or keywords; all of them when none are given. */
export function selectCompanies(seed: SeedTable, wanted: string[]): SeedCompany[] {
  if (wanted.length === 0) return seed.companies;
  const terms = wanted.map((w) => w.toLowerCase());
  return seed.companies.filter((c) =>
    terms.some((t) => c.name.toLowerCase().includes(t) || c.keywords.some((k) => k === t))
  );
}

/** Landing, pipeline and products pages of a roster company with a website. */
export function companyPageUrls(company: SeedCompany): string[] {
  if (!company.website) return [];
  const base = company.website.replace(/\/+$/, "");
  return [base, `${base}/pipeline`, `${base}/products`];
}

async function collect(db: Db, config: AppConfig, seed: SeedTable, args: string[]): Promise<void> {
  const companies = selectCompanies(seed, listOption(args, "--companies"));
  const drugNames = listOption(args, "--drugs");
  const drugs =
    drugNames.length > 0
      ? drugNames
      : seed.drugs.filter((d) => companies.some((c) => c.name === d.company)).map((d) => d.generic_name);
  const limit = intOption(args, "--limit") ?? 10;

  const pubmed = pubmedCollector({
    tool: config.ncbi.tool,
    email: config.ncbi.email,
    apiKey: config.ncbi.apiKey,
  });

  const save = (source: string, docs: CollectedDocument[]) => {
    const { inserted, duplicates } = storeDocuments(db, docs);
    console.log(`[collect] ${source}: ${inserted} new, ${duplicates} already stored`);
  };

  for (const company of companies) {
    save(company.name, await runCollector(websiteCollector, { company: company.name, urls: companyPageUrls(company) }));
  }
  for (const drug of drugs) {
    save(`${drug} (openFDA)`, await runCollector(labelsCollector, { drugName: drug }));
    save(`${drug} (trials)`, await runCollector(trialsCollector, { query: drug, limit }));
    save(`${drug} (PubMed)`, await runCollector(pubmed, { term: drug, maxResults: limit }));
  }
}

/** Runs one command; returns the process exit code. */
export async function runCli(argv: string[], env: Record<string, string | undefined> = process.env): Promise<number> {
  const [command, ...args] = argv;
  if (!command || command === "--help" || command === "-h") {
    console.log(USAGE);
    return command ? 0 : 1;
  }

  const config = loadConfig(env, { mode: parseMode(optionValue(args, "--mode")) });
  const db = getDatabase(config.databasePath);

  switch (command) {
    case "collect": {
      await collect(db, config, loadSeedTable(), args);
      return 0;
    }
    case "extract": {
      const recognizer = createEntityRecognizer({ apiKey: config.openai.apiKey, model: config.openai.model });
      if (!recognizer) console.warn("[extract] OPENAI_API_KEY not set; using pattern matching only");
      const summary = await runExtraction(db, config, { seed: loadSeedTable(), recognizer });
      console.log(JSON.stringify(summary, null, 2));
      return summary.batchError ? 1 : 0;
    }
    case "dedupe": {
      const summary = deduplicateDrugs(db);
      console.log(
        `[dedupe] ${summary.groupsMerged} groups merged, ${summary.drugsDeleted} deleted, ${summary.drugsRenamed} renamed`
      );
      return 0;
    }
    case "validate-data": {
      const limit = intOption(args, "--limit");
      const drugs = listDrugSummaries(db);
      const validations = await validateDrugs(
        limit === undefined ? drugs : drugs.slice(0, limit),
        defaultSources(config),
        config
      );
      console.log(renderValidationReport(validations, config.confidence));
      return 0;
    }
    case "validate": {
      const groundTruthPath = optionValue(args, "--ground-truth");
      if (!groundTruthPath) {
        console.error("validate requires --ground-truth <file>");
        return 1;
      }
      const results = runGroundTruthValidation(groundTruthPath, db, config);
      const maxMissing = config.groundTruth.maxMissingItems;
      const { jsonPath, reportPath } = writeGroundTruthOutputs(
        results,
        optionValue(args, "--out") ?? config.outputDir,
        maxMissing
      );
      console.log(renderGroundTruthReport(results, maxMissing));
      console.log(`[validate] wrote ${jsonPath} and ${reportPath}`);
      return 0;
    }
    default:
      console.error(`Unknown command "${command}"\n\n${USAGE}`);
      return 1;
  }
}
