/**
 * openFDA drug labels: https://api.fda.gov/drug/label.json
 * Used both as a document collector and as the lookup behind FDA validation.
 */

import { z } from "zod";
import { fetchWithRetry } from "../fetchWithRetry.js";
import type { CollectedDocument, Collector } from "./types.js";

const OPENFDA_LABEL = "https://api.fda.gov/drug/label.json";

const texts = z.array(z.string()).optional();

const LabelSchema = z.object({
  id: z.string().optional(),
  set_id: z.string().optional(),
  effective_time: z.string().optional(),
  openfda: z
    .object({
      brand_name: texts,
      generic_name: texts,
      substance_name: texts,
      manufacturer_name: texts,
      application_number: texts,
    })
    .optional(),
  indications_and_usage: texts,
  mechanism_of_action: texts,
  clinical_pharmacology: texts,
  description: texts,
});

const LabelResponseSchema = z.object({ results: z.array(LabelSchema).default([]) });

export type FdaLabel = z.infer<typeof LabelSchema>;

export type LabelMatchField = "brand_name" | "generic_name" | "substance_name";

export interface FdaLabelMatch {
  label: FdaLabel;
  matchedBy: LabelMatchField;
}

const LABEL_SECTIONS = ["indications_and_usage", "mechanism_of_action", "clinical_pharmacology", "description"] as const;

export async function searchLabels(field: LabelMatchField, name: string, limit = 1): Promise<FdaLabel[]> {
  const term = name.trim();
  if (!term) return [];
  const url = `${OPENFDA_LABEL}?search=openfda.${field}:"${encodeURIComponent(term)}"&limit=${limit}`;
  const res = await fetchWithRetry(url, {}, { maxRetries: 2, initialMs: 500 });
  // openFDA answers 404 when nothing matches
  if (res.status === 404) return [];
  if (!res.ok) throw new Error(`openFDA ${res.status}`);
  return LabelResponseSchema.parse(await res.json()).results;
}

/** First label matching by brand, then generic, then substance name. */
export async function lookupFdaLabel(drugName: string): Promise<FdaLabelMatch | null> {
  for (const field of ["brand_name", "generic_name", "substance_name"] as const) {
    const [label] = await searchLabels(field, drugName);
    if (label) return { label, matchedBy: field };
  }
  return null;
}

export function labelToDocument(label: FdaLabel): CollectedDocument {
  const ofda = label.openfda;
  const brand = ofda?.brand_name?.[0];
  const generic = ofda?.generic_name?.[0];
  const lines: string[] = [];
  if (brand) lines.push(`Brand name: ${brand}`);
  if (generic) lines.push(`Generic name: ${generic}`);
  if (ofda?.manufacturer_name?.length) lines.push(`Manufacturer: ${ofda.manufacturer_name.join(", ")}`);
  if (ofda?.application_number?.length) lines.push(`Application number: ${ofda.application_number.join(", ")}`);
  if (label.effective_time) lines.push(`Label effective: ${label.effective_time}`);
  for (const key of LABEL_SECTIONS) {
    const val = label[key];
    if (val?.length) lines.push(val.join("\n\n").slice(0, 15000));
  }
  return {
    source_url: label.set_id ? `${OPENFDA_LABEL}?search=set_id:${label.set_id}` : OPENFDA_LABEL,
    title: [generic, brand].filter(Boolean).join(" / ") || null,
    content: lines.join("\n"),
    source_type: "fda_drug_approval",
  };
}

export interface LabelQuery {
  drugName: string;
  limit?: number;
}

export async function collectLabels({ drugName, limit = 3 }: LabelQuery): Promise<FdaLabel[]> {
  try {
    const byGeneric = await searchLabels("generic_name", drugName, limit);
    if (byGeneric.length) return byGeneric;
    return await searchLabels("brand_name", drugName, limit);
  } catch (err) {
    console.error(`[collect] openFDA failed for "${drugName}"`, err);
    return [];
  }
}

export const labelsCollector: Collector<LabelQuery, FdaLabel> = {
  name: "openFDA",
  collect: collectLabels,
  parse: (label) => [labelToDocument(label)],
};
