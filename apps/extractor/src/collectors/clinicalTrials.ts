/**
 * ClinicalTrials.gov Data API v2: studies by free-text query (drug or sponsor name).
 */

import { z } from "zod";
import { fetchWithRetry } from "../fetchWithRetry.js";
import type { CollectedDocument, Collector } from "./types.js";

const CT_BASE = "https://clinicaltrials.gov/api/v2/studies";

const StudySchema = z.object({
  protocolSection: z
    .object({
      identificationModule: z.object({ nctId: z.string().optional(), briefTitle: z.string().optional() }).optional(),
      statusModule: z.object({ overallStatus: z.string().optional() }).optional(),
      designModule: z.object({ phases: z.array(z.string()).optional() }).optional(),
      conditionsModule: z.object({ conditions: z.array(z.string()).optional() }).optional(),
      armsInterventionsModule: z
        .object({ interventions: z.array(z.object({ name: z.string().optional() })).optional() })
        .optional(),
      sponsorCollaboratorsModule: z.object({ leadSponsor: z.object({ name: z.string().optional() }).optional() }).optional(),
      descriptionModule: z.object({ briefSummary: z.string().optional() }).optional(),
    })
    .optional(),
});

const StudiesResponseSchema = z.object({ studies: z.array(StudySchema).default([]) });

export type Study = z.infer<typeof StudySchema>;

export interface TrialQuery {
  query: string;
  limit?: number;
}

/** "PHASE2" / "EARLY_PHASE1" -> "Phase 2" / "Early Phase 1". */
function formatPhase(phase: string): string {
  return phase
    .replace(/_/g, " ")
    .replace(/PHASE\s*(\d)/i, "Phase $1")
    .replace(/^EARLY/i, "Early");
}

function formatStatus(status: string): string {
  return status
    .toLowerCase()
    .split("_")
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(" ");
}

export async function collectStudies({ query, limit = 20 }: TrialQuery): Promise<Study[]> {
  const params = new URLSearchParams({
    "query.term": query.trim(),
    format: "json",
    pageSize: String(Math.min(limit, 100)),
  });
  try {
    const res = await fetchWithRetry(`${CT_BASE}?${params.toString()}`, {}, { maxRetries: 2, initialMs: 800 });
    if (!res.ok) {
      console.error(`[collect] clinicaltrials.gov ${res.status} for "${query}"`);
      return [];
    }
    return StudiesResponseSchema.parse(await res.json()).studies;
  } catch (err) {
    console.error(`[collect] clinicaltrials.gov failed for "${query}"`, err);
    return [];
  }
}

export function parseStudy(study: Study): CollectedDocument[] {
  const p = study.protocolSection;
  const nctId = p?.identificationModule?.nctId;
  if (!nctId) return [];
  const title = p?.identificationModule?.briefTitle ?? null;
  const phases = (p?.designModule?.phases ?? []).map(formatPhase);
  const status = p?.statusModule?.overallStatus;
  const conditions = p?.conditionsModule?.conditions ?? [];
  const interventions = (p?.armsInterventionsModule?.interventions ?? []).flatMap((i) => (i.name ? [i.name] : []));
  const sponsor = p?.sponsorCollaboratorsModule?.leadSponsor?.name;

  const lines = [
    `${nctId}: ${title ?? "Untitled study"}`,
    status ? `Status: ${formatStatus(status)}` : null,
    phases.length ? `Phase: ${phases.join(", ")}` : null,
    conditions.length ? `Conditions: ${conditions.join("; ")}` : null,
    interventions.length ? `Interventions: ${interventions.join("; ")}` : null,
    sponsor ? `Sponsor: ${sponsor}` : null,
    p?.descriptionModule?.briefSummary ?? null,
  ];
  return [
    {
      source_url: `https://clinicaltrials.gov/study/${nctId}`,
      title,
      content: lines.filter((l): l is string => l !== null).join("\n"),
      source_type: "clinical_trial",
    },
  ];
}

export const trialsCollector: Collector<TrialQuery, Study> = {
  name: "clinicaltrials.gov",
  collect: collectStudies,
  parse: parseStudy,
};
