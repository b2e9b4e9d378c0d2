/**
 * Regex helpers over document text: drug candidates, NCT ids, mechanism and brand
 * phrases, drug class, approval year, and trial status/phase.
 */

import { containsAsTokens, normalizeKey } from "database";
import { drugNameRules, isValidDrugName } from "pharma-ai";

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const DRUG_PATTERNS = [
  new RegExp(`\\b(?:${drugNameRules.knownDrugs.map(escapeRegExp).join("|")})\\b`, "gi"),
  new RegExp(`\\b[a-z]+mab\\s+(?:${drugNameRules.adcPayloads.join("|")})\\b`, "gi"),
  /\b(?:MK-\d+|RG\d+)\b/gi,
  /\b[a-z]+(?:mab|nib|cept|leucel)\b/gi,
];

/**
 * Drug names mentioned in the text, in order of first appearance, each passing the
 * name gate. A name that is a whole-token part of a longer candidate is dropped.
 */
export function findDrugCandidates(text: string, isValidName: (name: string) => boolean = isValidDrugName): string[] {
  const found = new Map<string, { name: string; index: number }>();
  for (const re of DRUG_PATTERNS) {
    for (const m of text.matchAll(re)) {
      const name = m[0].replace(/\s+/g, " ");
      const key = normalizeKey(name);
      const index = m.index ?? 0;
      const current = found.get(key);
      if (current && current.index <= index) continue;
      if (!isValidName(name)) continue;
      found.set(key, { name, index });
    }
  }
  const all = [...found.values()].sort((a, b) => a.index - b.index);
  return all
    .filter((c) => !all.some((o) => o !== c && o.name.length > c.name.length && containsAsTokens(o.name, c.name)))
    .map((c) => c.name);
}

const NCT_RE = /\bNCT\d{8}\b/gi;

/** Every NCT id in the text, upper-cased, once each, in order of first appearance. */
export function extractNctIds(text: string): string[] {
  const seen = new Set<string>();
  for (const m of text.matchAll(NCT_RE)) seen.add(m[0].toUpperCase());
  return [...seen];
}

/** NCT ids whose first occurrence lies within `proximity` chars of the first mention of `name`. */
export function nctIdsNear(text: string, name: string, proximity: number): string[] {
  const lower = text.toLowerCase();
  const drugPos = lower.indexOf(name.trim().toLowerCase());
  if (drugPos === -1) return [];
  return extractNctIds(text).filter((id) => Math.abs(lower.indexOf(id.toLowerCase()) - drugPos) < proximity);
}

const MECHANISM_PATTERNS = [
  /inhibits?\s+([^.]{10,100})/i,
  /blocks?\s+([^.]{10,100})/i,
  /targets?\s+([^.]{10,100})/i,
  /binds?\s+to\s+([^.]{10,100})/i,
];

export function extractMechanism(text: string, name: string, radius: number): string | null {
  const drugPos = text.toLowerCase().indexOf(name.trim().toLowerCase());
  if (drugPos === -1) return null;
  const context = text.slice(Math.max(0, drugPos - radius), Math.min(text.length, drugPos + radius));
  for (const re of MECHANISM_PATTERNS) {
    const m = re.exec(context);
    if (m?.[1]) return m[1].trim();
  }
  return null;
}

/** Relationship verb for a drug-target edge, read off the mechanism text. */
export function relationshipFromMechanism(mechanism: string | null | undefined): string {
  const lower = (mechanism ?? "").toLowerCase();
  if (/\bblocks?\b/.test(lower)) return "blocks";
  if (/\bbinds?\b/.test(lower)) return "binds";
  if (/\bactivat/.test(lower)) return "activates";
  if (/\bmodulat/.test(lower)) return "modulates";
  return "inhibits";
}

const BRAND_PATTERNS = [
  /brand name[:\s]+([A-Z][A-Za-z0-9-]+)/i,
  /trademark[:\s]+([A-Z][A-Za-z0-9-]+)/i,
  /commercially known as[:\s]+([A-Z][A-Za-z0-9-]+)/i,
];

export function extractBrandName(text: string): string | null {
  for (const re of BRAND_PATTERNS) {
    const m = re.exec(text);
    if (m?.[1]) return m[1];
  }
  return null;
}

const DRUG_CLASSES = [
  "monoclonal antibody",
  "small molecule",
  "adc",
  "antibody-drug conjugate",
  "therapeutic protein",
  "peptide",
  "vaccine",
  "bispecific antibody",
];

/** First class phrase listed in the text, title-cased ("ADC" stays upper-case). */
export function extractDrugClass(text: string): string | null {
  const lower = text.toLowerCase();
  for (const cls of DRUG_CLASSES) {
    if (!new RegExp(`\\b${cls}\\b`).test(lower)) continue;
    if (cls === "adc") return "ADC";
    return cls.replace(/\b[a-z]/g, (c) => c.toUpperCase());
  }
  return null;
}

/** Class implied by the name's stem. */
export function inferDrugClass(name: string): string | null {
  const lower = name.trim().toLowerCase();
  const words = lower.split(/\s+/);
  if (words.some((w) => drugNameRules.adcPayloads.includes(w))) return "ADC";
  if (lower.endsWith("mab")) return "Monoclonal Antibody";
  if (lower.endsWith("nib")) return "Small Molecule";
  if (lower.endsWith("cept")) return "Therapeutic Protein";
  if (lower.endsWith("leucel")) return "CAR-T Cell Therapy";
  if (/^(mk-|rg)\d+/.test(lower)) return "Small Molecule";
  return null;
}

const APPROVAL_YEAR_PATTERNS = [/approved[:\s]+(\d{4})/i, /approval[:\s]+(\d{4})/i, /(\d{4})[:\s]+approval/i];

/** ISO date (January 1st) of the first approval year phrase. */
export function extractApprovalDate(text: string): string | null {
  for (const re of APPROVAL_YEAR_PATTERNS) {
    const m = re.exec(text);
    if (m?.[1]) return `${m[1]}-01-01`;
  }
  return null;
}

export function mentionsApproval(text: string): boolean {
  return /approv(?:al|ed)/i.test(text);
}

const TRIAL_STATUSES = ["recruiting", "completed", "active", "suspended", "terminated", "withdrawn"];

export function trialStatus(text: string): string {
  const lower = text.toLowerCase();
  const hit = TRIAL_STATUSES.find((s) => lower.includes(s));
  return hit ? hit.charAt(0).toUpperCase() + hit.slice(1) : "Unknown";
}

export function trialPhase(text: string): string {
  const m = /phase\s+([1-4])/i.exec(text);
  return m?.[1] ? `Phase ${m[1]}` : "Unknown";
}
