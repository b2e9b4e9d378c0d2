/**
 * Closed vocabularies for drug-name validation and target/indication recognition.
 * Loaded once from data/*.json and validated with zod.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

const stringList = z.array(z.string().min(1));

const TargetLexiconSchema = z.object({
  known: stringList,
  stopWords: stringList,
  mechanismIndicators: stringList,
});

const IndicationLexiconSchema = z.object({
  known: stringList,
  entityTerms: stringList,
  oncologyTerms: stringList,
  treatmentIndicators: stringList,
});

const DrugNameRulesSchema = z.object({
  studyCodePrefixes: stringList,
  genericTerms: stringList,
  stopWords: stringList,
  incompleteEndings: stringList,
  descriptivePhrases: stringList,
  suffixes: stringList,
  adcPayloads: stringList,
  knownDrugs: stringList,
  sponsorCodePatterns: stringList,
});

export type TargetLexicon = z.infer<typeof TargetLexiconSchema>;
export type IndicationLexicon = z.infer<typeof IndicationLexiconSchema>;
export type DrugNameRules = z.infer<typeof DrugNameRulesSchema>;

function loadJson<T>(file: string, schema: z.ZodType<T>): T {
  const raw = readFileSync(new URL(`../data/${file}`, import.meta.url), "utf8");
  return schema.parse(JSON.parse(raw));
}

export const targetLexicon: TargetLexicon = loadJson("targets.json", TargetLexiconSchema);
export const indicationLexicon: IndicationLexicon = loadJson("indications.json", IndicationLexiconSchema);
export const drugNameRules: DrugNameRules = loadJson("drugNameRules.json", DrugNameRulesSchema);

/** Upper-cased symbol -> canonical spelling ("MTOR" -> "mTOR"). */
export const KNOWN_TARGETS_BY_UPPER: ReadonlyMap<string, string> = new Map(
  targetLexicon.known.map((t) => [t.toUpperCase(), t] as const)
);
export const TARGET_STOP_WORDS: ReadonlySet<string> = new Set(targetLexicon.stopWords.map((w) => w.toUpperCase()));
export const KNOWN_INDICATIONS: ReadonlySet<string> = new Set(indicationLexicon.known.map((i) => i.toLowerCase()));
