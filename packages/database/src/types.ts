/**
 * Row shapes for the pipeline store. Columns mirror the SQLite schema in schema.ts;
 * JSON-bearing columns (drugs.nct_codes) are decoded into their domain form by the repository.
 */

export interface DocumentRow {
  id: number;
  source_url: string;
  title: string | null;
  content: string;
  content_hash: string;
  source_type: string;
  retrieval_date: string;
}

export interface NewDocument {
  source_url: string;
  title: string | null;
  content: string;
  content_hash: string;
  source_type: string;
  retrieval_date?: string;
}

export interface CompanyRow {
  id: number;
  name: string;
  website: string | null;
  description: string | null;
  created_at: string;
}

export interface DrugRow {
  id: number;
  generic_name: string;
  brand_name: string | null;
  drug_class: string | null;
  mechanism_of_action: string | null;
  fda_approval_status: number;
  fda_approval_date: string | null;
  company_id: number | null;
  nct_codes: string;
  created_at: string;
}

export interface Drug {
  id: number;
  generic_name: string;
  brand_name: string | null;
  drug_class: string | null;
  mechanism_of_action: string | null;
  fda_approval_status: boolean;
  fda_approval_date: string | null;
  company_id: number | null;
  nct_codes: string[];
  created_at: string;
}

/** Fields an extractor may supply for a drug; null/undefined never overwrite stored values. */
export interface DrugInput {
  generic_name: string;
  brand_name?: string | null;
  drug_class?: string | null;
  mechanism_of_action?: string | null;
  fda_approval_status?: boolean | null;
  fda_approval_date?: string | null;
  company_id?: number | null;
  nct_codes?: string[];
}

export interface TargetRow {
  id: number;
  name: string;
  target_type: string | null;
}

export interface IndicationRow {
  id: number;
  name: string;
  indication_type: string | null;
}

export interface DrugTargetRow {
  drug_id: number;
  target_id: number;
  relationship_type: string | null;
  confidence_score: number | null;
}

export interface DrugIndicationRow {
  drug_id: number;
  indication_id: number;
  approval_status: string | null;
  confidence_score: number | null;
}

export interface ClinicalTrialRow {
  id: number;
  nct_id: string;
  title: string | null;
  status: string | null;
  phase: string | null;
  sponsor_id: number | null;
  created_at: string;
}

export interface TrialInput {
  nct_id: string;
  title?: string | null;
  status?: string | null;
  phase?: string | null;
  sponsor_id?: number | null;
}

export interface EntityCounts {
  documents: number;
  companies: number;
  drugs: number;
  targets: number;
  indications: number;
  clinical_trials: number;
  drug_targets: number;
  drug_indications: number;
  drug_trials: number;
}

/** Flattened per-drug view used by validators. */
export interface DrugSummary {
  id: number;
  generic_name: string;
  company_name: string | null;
  mechanism_of_action: string | null;
  trial_count: number;
  avg_target_confidence: number | null;
  avg_indication_confidence: number | null;
}
