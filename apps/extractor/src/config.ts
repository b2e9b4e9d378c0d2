/**
 * Runtime configuration: parsed once from the environment (dotenv is loaded by the CLI entry),
 * validated with zod, and frozen. Pipeline and validators receive it by reference.
 */

import { z } from "zod";

export const ExtractionModeSchema = z.enum(["simple", "standard", "comprehensive"]);
export type ExtractionMode = z.infer<typeof ExtractionModeSchema>;

export interface ExtractionCapabilities {
  /** Persist seed drugs for roster companies that have no documents. */
  useSeedFallback: boolean;
  /** Extract mechanism-of-action text around drug mentions. */
  extractMechanism: boolean;
  /** Run target/indication extraction over FDA documents. */
  extractTargetsFromFda: boolean;
  /** Create trials from NCT ids in any document, not only trial documents. */
  linkTrialsAnywhere: boolean;
  /** Attach targets and indications found in literature abstracts to drugs already stored. */
  extractFromLiterature: boolean;
  /** Fall back to corporate-suffix regexes when no keyword maps to a company. */
  inferCompanyNames: boolean;
}

export const EXTRACTION_PRESETS: Readonly<Record<ExtractionMode, ExtractionCapabilities>> = {
  simple: {
    useSeedFallback: true,
    extractMechanism: false,
    extractTargetsFromFda: false,
    linkTrialsAnywhere: false,
    extractFromLiterature: false,
    inferCompanyNames: false,
  },
  standard: {
    useSeedFallback: false,
    extractMechanism: false,
    extractTargetsFromFda: false,
    linkTrialsAnywhere: false,
    extractFromLiterature: false,
    inferCompanyNames: false,
  },
  comprehensive: {
    useSeedFallback: false,
    extractMechanism: true,
    extractTargetsFromFda: true,
    linkTrialsAnywhere: true,
    extractFromLiterature: true,
    inferCompanyNames: true,
  },
};

/** Frozen at load; nothing mutates it afterwards. */
export interface AppConfig {
  readonly databasePath: string;
  readonly outputDir: string;
  readonly mode: ExtractionMode;
  readonly capabilities: Readonly<ExtractionCapabilities>;
  readonly extraction: {
    readonly windows: { readonly target: number; readonly indication: number };
    readonly maxCandidates: number;
    readonly nctProximity: number;
    readonly mechanismProximity: number;
  };
  readonly confidence: { readonly high: number; readonly medium: number; readonly low: number };
  readonly sourceWeights: Readonly<Record<string, number>>;
  readonly groundTruth: {
    readonly thresholds: {
      readonly drugNamesF1: number;
      readonly companyF1: number;
      readonly mechanismsAccuracy: number;
      readonly trialCoverage: number;
    };
    readonly companyMappings: Readonly<Record<string, string>>;
    readonly maxMismatchDetails: number;
    readonly maxMissingItems: number;
  };
  readonly openai: { readonly apiKey: string | undefined; readonly model: string };
  readonly ncbi: { readonly tool: string; readonly email: string | undefined; readonly apiKey: string | undefined };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const EnvSchema = z.object({
  DATABASE_PATH: z.string().min(1).default("data/pipeline.db"),
  OUTPUT_DIR: z.string().min(1).default("output"),
  EXTRACTION_MODE: ExtractionModeSchema.default("comprehensive"),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
  NCBI_TOOL: z.string().min(1).default("pipelinescope"),
  NCBI_EMAIL: z.string().email().optional(),
  NCBI_API_KEY: z.string().min(1).optional(),
});

function deepFreeze<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child && typeof child === "object" && !Object.isFrozen(child)) deepFreeze(child);
  }
  Object.freeze(value);
  return value;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: { mode?: ExtractionMode; databasePath?: string; outputDir?: string } = {}
): AppConfig {
  // Blank lines in .env come through as "", which means unset.
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid environment: ${issues}`);
  }
  const e = parsed.data;
  const mode = overrides.mode ?? e.EXTRACTION_MODE;
  return deepFreeze<AppConfig>({
    databasePath: overrides.databasePath ?? e.DATABASE_PATH,
    outputDir: overrides.outputDir ?? e.OUTPUT_DIR,
    mode,
    capabilities: { ...EXTRACTION_PRESETS[mode] },
    extraction: {
      windows: { target: 200, indication: 400 },
      maxCandidates: 15,
      nctProximity: 500,
      mechanismProximity: 200,
    },
    confidence: { high: 0.8, medium: 0.6, low: 0.4 },
    sourceWeights: { fda: 1.0, unknown: 0.1 },
    groundTruth: {
      thresholds: { drugNamesF1: 0.8, companyF1: 0.8, mechanismsAccuracy: 0.7, trialCoverage: 0.5 },
      companyMappings: {
        roche: "roche/genentech",
        genentech: "roche/genentech",
        jnj: "johnson & johnson",
        merck: "merck & co.",
        gilead: "gilead sciences",
        regeneron: "regeneron pharmaceuticals",
        astellas: "astellas pharma",
        daiichi: "daiichi sankyo",
      },
      maxMismatchDetails: 10,
      maxMissingItems: 5,
    },
    openai: { apiKey: e.OPENAI_API_KEY, model: e.OPENAI_MODEL },
    ncbi: { tool: e.NCBI_TOOL, email: e.NCBI_EMAIL, apiKey: e.NCBI_API_KEY },
  });
}
