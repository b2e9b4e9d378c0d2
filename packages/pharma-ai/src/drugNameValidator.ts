/**
 * Drug-name gate applied before any drug row is created. Conservative: a name is
 * accepted only on positive evidence (suffix morphology, known list, sponsor code).
 */

import { drugNameRules } from "./lexicon.js";

export interface DrugNameOptions {
  /** Admit multi-word names where one word carries drug morphology ("Patritumab Deruxtecan"). */
  extended?: boolean;
}

export type DrugNameVerdict =
  | { valid: true; reason: "suffix" | "known" | "sponsor_code" | "compound_name" }
  | {
      valid: false;
      reason:
        | "length"
        | "trial_id"
        | "study_code"
        | "generic_term"
        | "stop_word"
        | "incomplete_phrase"
        | "descriptive_phrase"
        | "no_indicator";
    };

const TRIAL_ID = /^NCT\d+/i;
const STUDY_CODE = new RegExp(`^(?:${drugNameRules.studyCodePrefixes.join("|")})\\d+$`, "i");
const SPONSOR_CODES = drugNameRules.sponsorCodePatterns.map((p) => new RegExp(p, "i"));
const GENERIC_TERMS = new Set(drugNameRules.genericTerms);
const STOP_WORDS = new Set(drugNameRules.stopWords);
const KNOWN_DRUGS = new Set(drugNameRules.knownDrugs);

function hasDrugSuffix(word: string): boolean {
  return drugNameRules.suffixes.some((s) => word.endsWith(s));
}

export function classifyDrugName(name: string, options: DrugNameOptions = {}): DrugNameVerdict {
  const extended = options.extended ?? true;
  const trimmed = name.trim();
  const lower = trimmed.toLowerCase();

  if (trimmed.length < 3 || trimmed.length > 100) return { valid: false, reason: "length" };
  if (TRIAL_ID.test(trimmed)) return { valid: false, reason: "trial_id" };
  if (STUDY_CODE.test(trimmed)) return { valid: false, reason: "study_code" };
  if (GENERIC_TERMS.has(lower)) return { valid: false, reason: "generic_term" };
  if (STOP_WORDS.has(lower)) return { valid: false, reason: "stop_word" };
  if (drugNameRules.incompleteEndings.some((e) => lower.endsWith(e))) {
    return { valid: false, reason: "incomplete_phrase" };
  }
  if (drugNameRules.descriptivePhrases.some((p) => lower.includes(p))) {
    return { valid: false, reason: "descriptive_phrase" };
  }

  if (hasDrugSuffix(lower)) return { valid: true, reason: "suffix" };
  if (KNOWN_DRUGS.has(lower)) return { valid: true, reason: "known" };
  if (SPONSOR_CODES.some((re) => re.test(lower))) return { valid: true, reason: "sponsor_code" };
  if (extended) {
    const words = lower.split(/\s+/);
    if (
      words.length >= 2 &&
      words.some((w) => hasDrugSuffix(w) || KNOWN_DRUGS.has(w) || drugNameRules.adcPayloads.includes(w))
    ) {
      return { valid: true, reason: "compound_name" };
    }
  }
  return { valid: false, reason: "no_indicator" };
}

export function isValidDrugName(name: string, options: DrugNameOptions = {}): boolean {
  return classifyDrugName(name, options).valid;
}
