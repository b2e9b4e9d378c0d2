/**
 * Target and indication extraction around drug mentions.
 * Closed-vocabulary lookup + regex families, with an optional recognizer pass.
 * Pure over text except for the recognizer call.
 */

import type { EntityRecognizer } from "./entityRecognizer.js";
import {
  indicationLexicon,
  KNOWN_INDICATIONS,
  KNOWN_TARGETS_BY_UPPER,
  TARGET_STOP_WORDS,
  targetLexicon,
} from "./lexicon.js";

export type CandidateSource = "known" | "pattern" | "recognizer";

export interface TargetCandidate {
  name: string;
  target_type: string;
  confidence_score: number;
  mechanism: string;
  source: CandidateSource;
}

export type ApprovalStatus = "Approved" | "Clinical Trial" | "Preclinical" | "Unknown";

export interface IndicationCandidate {
  name: string;
  indication_type: "cancer" | "disease";
  confidence_score: number;
  approval_status: ApprovalStatus;
  source: CandidateSource;
}

export interface ExtractionWindows {
  target: number;
  indication: number;
}

export interface TargetIndicationOptions {
  windows?: Partial<ExtractionWindows>;
  maxResults?: number;
  recognizer?: EntityRecognizer | null;
}

export interface TargetIndicationResult {
  targets: TargetCandidate[];
  indications: IndicationCandidate[];
}

export const DEFAULT_WINDOWS: ExtractionWindows = { target: 200, indication: 400 };
const DEFAULT_MAX_RESULTS = 15;
const MIN_CONFIDENCE = 0.3;
const TARGET_PROXIMITY = 200;
const INDICATION_PROXIMITY = 300;

interface TextWindow {
  text: string;
  lower: string;
  drugOffset: number;
}

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

// Short all-letter symbols (MET, KIT, RET) are also English words; they match on exact case only.
const isWordLike = (symbol: string) => /^[A-Za-z]{1,3}$/.test(symbol);

const KNOWN_TARGET_PATTERNS = targetLexicon.known.map((symbol) => {
  const source = `(?<![A-Za-z0-9])${escapeRegExp(symbol)}(?![A-Za-z0-9])`;
  return {
    symbol,
    exact: new RegExp(source),
    anyCase: isWordLike(symbol) ? null : new RegExp(source, "i"),
  };
});

const KNOWN_INDICATION_PATTERNS = indicationLexicon.known.map((name) => ({
  name: name.toLowerCase(),
  re: new RegExp(`\\b${escapeRegExp(name.toLowerCase())}\\b`, "g"),
}));

const TARGET_FAMILIES: Array<{ re: RegExp; type: string }> = [
  { re: /\b[a-z]+ase\b/gi, type: "enzyme" },
  { re: /\b[a-z]+in\b/gi, type: "protein" },
  { re: /\b[a-z]+mab\b/gi, type: "antibody" },
  { re: /\b[a-z]+nib\b/gi, type: "inhibitor" },
  { re: /\b[A-Z]{2,10}\b/g, type: "gene_symbol" },
];

function drugWindows(text: string, drugName: string, radius: number): TextWindow[] {
  const needle = drugName.trim().toLowerCase();
  if (!needle) return [];
  const lowerText = text.toLowerCase();
  const out: TextWindow[] = [];
  let idx = lowerText.indexOf(needle);
  while (idx !== -1) {
    const start = Math.max(0, idx - radius);
    const end = Math.min(text.length, idx + needle.length + radius);
    out.push({ text: text.slice(start, end), lower: lowerText.slice(start, end), drugOffset: idx - start });
    idx = lowerText.indexOf(needle, idx + needle.length);
  }
  return out;
}

function countIndicators(lower: string, indicators: string[]): number {
  return indicators.filter((w) => lower.includes(w)).length;
}

function score(window: TextWindow, position: number, known: boolean, indicators: string[], proximity: number): number {
  let confidence = 0.5;
  if (known) confidence += 0.3;
  confidence += 0.1 * countIndicators(window.lower, indicators);
  if (Math.abs(window.drugOffset - position) < proximity) confidence += 0.1;
  return Math.round(Math.min(1, confidence) * 100) / 100;
}

export function knownTargetType(symbol: string): string {
  return /^CD\d+$/i.test(symbol) ? "cell_surface_marker" : "gene_protein";
}

export function indicationType(name: string): "cancer" | "disease" {
  const lower = name.toLowerCase();
  return indicationLexicon.oncologyTerms.some((t) => lower.includes(t)) ? "cancer" : "disease";
}

function entityTargetType(upper: string): string {
  if (upper.endsWith("ASE")) return "enzyme";
  if (upper.endsWith("IN")) return "protein";
  if (/^[A-Z]{1,6}$/.test(upper)) return "gene_protein";
  return "unknown";
}

export function mechanismFromWindow(window: string): string {
  const sentences = window.split(/(?<=[.!?])\s+/);
  const hit = sentences.find((s) => countIndicators(s.toLowerCase(), targetLexicon.mechanismIndicators) > 0);
  if (hit) return hit.trim();
  return window.length > 200 ? `${window.slice(0, 200)}...` : window;
}

export function approvalStatusFromContext(context: string): ApprovalStatus {
  const lower = context.toLowerCase();
  if (lower.includes("approved")) return "Approved";
  if (["clinical trial", "phase", "study"].some((w) => lower.includes(w))) return "Clinical Trial";
  if (["preclinical", "in vitro", "in vivo"].some((w) => lower.includes(w))) return "Preclinical";
  return "Unknown";
}

function targetsInWindow(window: TextWindow, drugLower: string, entities: string[]): TargetCandidate[] {
  const indicators = targetLexicon.mechanismIndicators;
  const mechanism = mechanismFromWindow(window.text);
  const out: TargetCandidate[] = [];
  const push = (name: string, type: string, position: number, known: boolean, source: CandidateSource) => {
    out.push({
      name,
      target_type: type,
      confidence_score: score(window, position, known, indicators, TARGET_PROXIMITY),
      mechanism,
      source,
    });
  };

  for (const { symbol, exact, anyCase } of KNOWN_TARGET_PATTERNS) {
    const m = exact.exec(window.text) ?? anyCase?.exec(window.text);
    if (m) push(symbol, knownTargetType(symbol), m.index, true, "known");
  }

  for (const { re, type } of TARGET_FAMILIES) {
    for (const m of window.text.matchAll(re)) {
      const word = m[0];
      const upper = word.toUpperCase();
      if (word.length < 3 || TARGET_STOP_WORDS.has(upper) || KNOWN_TARGETS_BY_UPPER.has(upper)) continue;
      if (word.toLowerCase() === drugLower) continue;
      push(word, type, m.index ?? 0, false, "pattern");
    }
  }

  for (const entity of entities) {
    const upper = entity.toUpperCase();
    if (entity.length < 3 || /\s/.test(entity) || TARGET_STOP_WORDS.has(upper)) continue;
    const canonical = KNOWN_TARGETS_BY_UPPER.get(upper);
    const known = canonical !== undefined;
    if (!known && !upper.endsWith("ASE") && !upper.endsWith("IN") && !/^[A-Z]{1,6}$/.test(upper)) continue;
    const position = window.lower.indexOf(entity.toLowerCase());
    if (position === -1 || entity.toLowerCase() === drugLower) continue;
    if (canonical !== undefined) push(canonical, knownTargetType(canonical), position, true, "recognizer");
    else push(entity, entityTargetType(upper), position, false, "recognizer");
  }

  return out;
}

interface Span {
  name: string;
  start: number;
  end: number;
}

const within = (inner: Span, outer: Span) =>
  outer.end - outer.start > inner.end - inner.start && outer.start <= inner.start && inner.end <= outer.end;

/** First occurrence of each known indication that is not part of a longer known one ("lung cancer" in "small cell lung cancer"). */
export function knownIndicationHits(lower: string): Array<{ name: string; index: number }> {
  const spans: Span[] = KNOWN_INDICATION_PATTERNS.flatMap(({ name, re }) =>
    [...lower.matchAll(re)].map((m) => {
      const start = m.index ?? 0;
      return { name, start, end: start + m[0].length };
    })
  );
  const hits = new Map<string, number>();
  for (const span of spans) {
    if (hits.has(span.name) || spans.some((other) => within(span, other))) continue;
    hits.set(span.name, span.start);
  }
  return [...hits].map(([name, index]) => ({ name, index }));
}

function indicationsInWindow(window: TextWindow, entities: string[]): IndicationCandidate[] {
  const indicators = indicationLexicon.treatmentIndicators;
  const status = approvalStatusFromContext(window.lower);
  const out: IndicationCandidate[] = [];
  const push = (name: string, position: number, known: boolean, source: CandidateSource) => {
    out.push({
      name,
      indication_type: indicationType(name),
      confidence_score: score(window, position, known, indicators, INDICATION_PROXIMITY),
      approval_status: status,
      source,
    });
  };

  for (const { name, index } of knownIndicationHits(window.lower)) push(name, index, true, "known");

  for (const entity of entities) {
    const lower = entity.toLowerCase();
    const known = KNOWN_INDICATIONS.has(lower);
    if (!known && !indicationLexicon.entityTerms.some((t) => lower.includes(t))) continue;
    const position = window.lower.indexOf(lower);
    if (position === -1) continue;
    push(lower, position, known, "recognizer");
  }

  return out;
}

/** Keep the highest-confidence occurrence per case-insensitive name, best first. */
export function rankCandidates<T extends { name: string; confidence_score: number }>(candidates: T[], limit: number): T[] {
  const best = new Map<string, T>();
  for (const c of candidates) {
    if (c.confidence_score <= MIN_CONFIDENCE) continue;
    const key = c.name.toLowerCase();
    const current = best.get(key);
    if (!current || c.confidence_score > current.confidence_score) best.set(key, c);
  }
  return [...best.values()].sort((a, b) => b.confidence_score - a.confidence_score).slice(0, limit);
}

async function recognize(recognizer: EntityRecognizer | null | undefined, text: string): Promise<string[]> {
  if (!recognizer) return [];
  try {
    return await recognizer.recognize(text);
  } catch (err) {
    console.warn("[pharma-ai] entity recognizer failed, using lexical extraction only:", err instanceof Error ? err.message : err);
    return [];
  }
}

export function extractTargets(
  text: string,
  drugName: string,
  options: Omit<TargetIndicationOptions, "recognizer"> = {}
): TargetCandidate[] {
  const radius = options.windows?.target ?? DEFAULT_WINDOWS.target;
  const drugLower = drugName.trim().toLowerCase();
  const all = drugWindows(text, drugName, radius).flatMap((w) => targetsInWindow(w, drugLower, []));
  return rankCandidates(all, options.maxResults ?? DEFAULT_MAX_RESULTS);
}

export function extractIndications(
  text: string,
  drugName: string,
  options: Omit<TargetIndicationOptions, "recognizer"> = {}
): IndicationCandidate[] {
  const radius = options.windows?.indication ?? DEFAULT_WINDOWS.indication;
  const all = drugWindows(text, drugName, radius).flatMap((w) => indicationsInWindow(w, []));
  return rankCandidates(all, options.maxResults ?? DEFAULT_MAX_RESULTS);
}

/**
 * Both passes, with recognizer entities (when a recognizer is given) added per window.
 * Recognizer failures are logged and the lexical results still returned.
 */
export async function extractTargetsAndIndications(
  text: string,
  drugName: string,
  options: TargetIndicationOptions = {}
): Promise<TargetIndicationResult> {
  const limit = options.maxResults ?? DEFAULT_MAX_RESULTS;
  const drugLower = drugName.trim().toLowerCase();
  const targetWindows = drugWindows(text, drugName, options.windows?.target ?? DEFAULT_WINDOWS.target);
  const indicationWindows = drugWindows(text, drugName, options.windows?.indication ?? DEFAULT_WINDOWS.indication);

  const targets: TargetCandidate[] = [];
  const indications: IndicationCandidate[] = [];
  for (let i = 0; i < indicationWindows.length; i++) {
    const wide = indicationWindows[i];
    const narrow = targetWindows[i];
    const entities = await recognize(options.recognizer, wide.text);
    if (narrow) targets.push(...targetsInWindow(narrow, drugLower, entities));
    indications.push(...indicationsInWindow(wide, entities));
  }
  return { targets: rankCandidates(targets, limit), indications: rankCandidates(indications, limit) };
}
