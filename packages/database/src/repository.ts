/**
 * Store operations: content-hash document inserts, get-or-create for companies,
 * targets and indications, create-or-update for drugs, and the association tables.
 */

import type { Db } from "./client.js";
import { containsAsTokens, normalizeKey } from "./normalize.js";
import type {
  ClinicalTrialRow,
  CompanyRow,
  DocumentRow,
  Drug,
  DrugIndicationRow,
  DrugInput,
  DrugRow,
  DrugSummary,
  DrugTargetRow,
  EntityCounts,
  IndicationRow,
  NewDocument,
  TargetRow,
  TrialInput,
} from "./types.js";

export interface GetOrCreateResult<T> {
  row: T;
  created: boolean;
}

/** Exact normalized-key match first, whole-token containment second; lowest id wins. */
function resolveByName<T extends { id: number }>(rows: T[], name: string, nameOf: (row: T) => string): T | undefined {
  const key = normalizeKey(name);
  if (!key) return undefined;
  const exact = rows.find((r) => normalizeKey(nameOf(r)) === key);
  if (exact) return exact;
  return rows.find((r) => containsAsTokens(nameOf(r), key));
}

// --- documents ---

export function insertDocument(db: Db, doc: NewDocument): { id: number; inserted: boolean } {
  const info = db
    .prepare(
      `INSERT OR IGNORE INTO documents (source_url, title, content, content_hash, source_type, retrieval_date)
       VALUES (?, ?, ?, ?, ?, ?)`
    )
    .run(
      doc.source_url,
      doc.title,
      doc.content,
      doc.content_hash,
      doc.source_type,
      doc.retrieval_date ?? new Date().toISOString()
    );
  if (info.changes > 0) return { id: Number(info.lastInsertRowid), inserted: true };
  const existing = db
    .prepare<[string], { id: number }>("SELECT id FROM documents WHERE content_hash = ?")
    .get(doc.content_hash);
  if (!existing) throw new Error(`document ${doc.content_hash} neither inserted nor found`);
  return { id: existing.id, inserted: false };
}

export function listDocuments(db: Db): DocumentRow[] {
  return db.prepare<[], DocumentRow>("SELECT * FROM documents ORDER BY id").all();
}

// --- companies ---

export function listCompanies(db: Db): CompanyRow[] {
  return db.prepare<[], CompanyRow>("SELECT * FROM companies ORDER BY id").all();
}

export function findCompany(db: Db, name: string): CompanyRow | undefined {
  return resolveByName(listCompanies(db), name, (c) => c.name);
}

export function getCompanyById(db: Db, id: number): CompanyRow | undefined {
  return db.prepare<[number], CompanyRow>("SELECT * FROM companies WHERE id = ?").get(id);
}

export function getOrCreateCompany(
  db: Db,
  name: string,
  fields: { website?: string | null; description?: string | null } = {}
): GetOrCreateResult<CompanyRow> {
  const trimmed = name.trim();
  const existing = findCompany(db, trimmed);
  if (existing) {
    db.prepare(
      "UPDATE companies SET website = COALESCE(website, ?), description = COALESCE(description, ?) WHERE id = ?"
    ).run(fields.website ?? null, fields.description ?? null, existing.id);
    return { row: getCompanyById(db, existing.id) ?? existing, created: false };
  }
  const info = db
    .prepare("INSERT INTO companies (name, website, description) VALUES (?, ?, ?)")
    .run(trimmed, fields.website ?? null, fields.description ?? null);
  const row = getCompanyById(db, Number(info.lastInsertRowid));
  if (!row) throw new Error(`company ${trimmed} missing after insert`);
  return { row, created: true };
}

// --- targets / indications ---

export function listTargets(db: Db): TargetRow[] {
  return db.prepare<[], TargetRow>("SELECT * FROM targets ORDER BY id").all();
}

export function getOrCreateTarget(db: Db, name: string, targetType: string | null): GetOrCreateResult<TargetRow> {
  const trimmed = name.trim();
  const existing = resolveByName(listTargets(db), trimmed, (t) => t.name);
  if (existing) {
    if (existing.target_type == null && targetType != null) {
      db.prepare("UPDATE targets SET target_type = ? WHERE id = ?").run(targetType, existing.id);
      return { row: { ...existing, target_type: targetType }, created: false };
    }
    return { row: existing, created: false };
  }
  const info = db.prepare("INSERT INTO targets (name, target_type) VALUES (?, ?)").run(trimmed, targetType);
  return { row: { id: Number(info.lastInsertRowid), name: trimmed, target_type: targetType }, created: true };
}

export function listIndications(db: Db): IndicationRow[] {
  return db.prepare<[], IndicationRow>("SELECT * FROM indications ORDER BY id").all();
}

export function getOrCreateIndication(
  db: Db,
  name: string,
  indicationType: string | null
): GetOrCreateResult<IndicationRow> {
  const trimmed = name.trim();
  const existing = resolveByName(listIndications(db), trimmed, (i) => i.name);
  if (existing) {
    if (existing.indication_type == null && indicationType != null) {
      db.prepare("UPDATE indications SET indication_type = ? WHERE id = ?").run(indicationType, existing.id);
      return { row: { ...existing, indication_type: indicationType }, created: false };
    }
    return { row: existing, created: false };
  }
  const info = db
    .prepare("INSERT INTO indications (name, indication_type) VALUES (?, ?)")
    .run(trimmed, indicationType);
  return { row: { id: Number(info.lastInsertRowid), name: trimmed, indication_type: indicationType }, created: true };
}

// --- drugs ---

export function parseNctCodes(raw: string | null): string[] {
  if (!raw) return [];
  const value: unknown = JSON.parse(raw);
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === "string");
}

export function toDrug(row: DrugRow): Drug {
  return {
    ...row,
    fda_approval_status: row.fda_approval_status === 1,
    nct_codes: parseNctCodes(row.nct_codes),
  };
}

export function listDrugs(db: Db): Drug[] {
  return db.prepare<[], DrugRow>("SELECT * FROM drugs ORDER BY id").all().map(toDrug);
}

export function getDrugById(db: Db, id: number): Drug | undefined {
  const row = db.prepare<[number], DrugRow>("SELECT * FROM drugs WHERE id = ?").get(id);
  return row ? toDrug(row) : undefined;
}

export function findDrug(db: Db, name: string): Drug | undefined {
  return resolveByName(listDrugs(db), name, (d) => d.generic_name);
}

function mergeCodes(current: string[], incoming: string[] | undefined): string[] {
  const merged = [...current];
  for (const code of incoming ?? []) if (!merged.includes(code)) merged.push(code);
  return merged;
}

/** Fill null columns of an existing drug from input; populated columns are left as they are. */
export function fillDrugFields(db: Db, drug: Drug, input: Omit<DrugInput, "generic_name">): Drug {
  const codes = mergeCodes(drug.nct_codes, input.nct_codes);
  db.prepare(
    `UPDATE drugs SET
       brand_name = COALESCE(brand_name, ?),
       drug_class = COALESCE(drug_class, ?),
       mechanism_of_action = COALESCE(mechanism_of_action, ?),
       fda_approval_status = MAX(fda_approval_status, ?),
       fda_approval_date = COALESCE(fda_approval_date, ?),
       company_id = COALESCE(company_id, ?),
       nct_codes = ?
     WHERE id = ?`
  ).run(
    input.brand_name ?? null,
    input.drug_class ?? null,
    input.mechanism_of_action ?? null,
    input.fda_approval_status ? 1 : 0,
    input.fda_approval_date ?? null,
    input.company_id ?? null,
    JSON.stringify(codes),
    drug.id
  );
  const updated = getDrugById(db, drug.id);
  if (!updated) throw new Error(`drug ${drug.id} disappeared during update`);
  return updated;
}

/**
 * Create-or-update: an existing drug (by name resolution) gets its null fields filled;
 * otherwise the name must pass isValidName before a row is inserted. Returns null on rejection.
 */
export function createOrUpdateDrug(
  db: Db,
  input: DrugInput,
  isValidName: (name: string) => boolean
): { drug: Drug; created: boolean } | null {
  const name = input.generic_name.trim();
  const existing = findDrug(db, name);
  if (existing) return { drug: fillDrugFields(db, existing, input), created: false };
  if (!isValidName(name)) return null;
  const info = db
    .prepare(
      `INSERT INTO drugs (generic_name, brand_name, drug_class, mechanism_of_action, fda_approval_status, fda_approval_date, company_id, nct_codes)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    )
    .run(
      name,
      input.brand_name ?? null,
      input.drug_class ?? null,
      input.mechanism_of_action ?? null,
      input.fda_approval_status ? 1 : 0,
      input.fda_approval_date ?? null,
      input.company_id ?? null,
      JSON.stringify(mergeCodes([], input.nct_codes))
    );
  const drug = getDrugById(db, Number(info.lastInsertRowid));
  if (!drug) throw new Error(`drug ${name} missing after insert`);
  return { drug, created: true };
}

export function renameDrug(db: Db, id: number, genericName: string): void {
  db.prepare("UPDATE drugs SET generic_name = ? WHERE id = ?").run(genericName, id);
}

export function deleteDrug(db: Db, id: number): void {
  db.prepare("DELETE FROM drugs WHERE id = ?").run(id);
}

// --- associations ---

export function linkDrugTarget(
  db: Db,
  drugId: number,
  targetId: number,
  relationshipType: string | null,
  confidence: number | null = null
): boolean {
  const info = db
    .prepare(
      "INSERT OR IGNORE INTO drug_targets (drug_id, target_id, relationship_type, confidence_score) VALUES (?, ?, ?, ?)"
    )
    .run(drugId, targetId, relationshipType, confidence);
  return info.changes > 0;
}

export function linkDrugIndication(
  db: Db,
  drugId: number,
  indicationId: number,
  approvalStatus: string | null,
  confidence: number | null = null
): boolean {
  const info = db
    .prepare(
      "INSERT OR IGNORE INTO drug_indications (drug_id, indication_id, approval_status, confidence_score) VALUES (?, ?, ?, ?)"
    )
    .run(drugId, indicationId, approvalStatus, confidence);
  return info.changes > 0;
}

export function listDrugTargets(db: Db, drugId: number): DrugTargetRow[] {
  return db
    .prepare<[number], DrugTargetRow>("SELECT * FROM drug_targets WHERE drug_id = ? ORDER BY target_id")
    .all(drugId);
}

export function listDrugIndications(db: Db, drugId: number): DrugIndicationRow[] {
  return db
    .prepare<[number], DrugIndicationRow>("SELECT * FROM drug_indications WHERE drug_id = ? ORDER BY indication_id")
    .all(drugId);
}

// --- clinical trials ---

export function findTrialByNctId(db: Db, nctId: string): ClinicalTrialRow | undefined {
  return db
    .prepare<[string], ClinicalTrialRow>("SELECT * FROM clinical_trials WHERE nct_id = ?")
    .get(nctId.trim().toUpperCase());
}

/** One row per nct_id; repeated mentions only fill fields that are still null. */
export function getOrCreateTrial(db: Db, input: TrialInput): GetOrCreateResult<ClinicalTrialRow> {
  const nctId = input.nct_id.trim().toUpperCase();
  const existing = findTrialByNctId(db, nctId);
  if (existing) {
    db.prepare(
      `UPDATE clinical_trials SET
         title = COALESCE(title, ?),
         status = CASE WHEN status IS NULL OR status = 'Unknown' THEN COALESCE(?, status) ELSE status END,
         phase = CASE WHEN phase IS NULL OR phase = 'Unknown' THEN COALESCE(?, phase) ELSE phase END,
         sponsor_id = COALESCE(sponsor_id, ?)
       WHERE id = ?`
    ).run(input.title ?? null, input.status ?? null, input.phase ?? null, input.sponsor_id ?? null, existing.id);
    return { row: findTrialByNctId(db, nctId) ?? existing, created: false };
  }
  db.prepare("INSERT INTO clinical_trials (nct_id, title, status, phase, sponsor_id) VALUES (?, ?, ?, ?, ?)").run(
    nctId,
    input.title ?? null,
    input.status ?? null,
    input.phase ?? null,
    input.sponsor_id ?? null
  );
  const row = findTrialByNctId(db, nctId);
  if (!row) throw new Error(`trial ${nctId} missing after insert`);
  return { row, created: true };
}

export function linkDrugTrial(db: Db, drugId: number, trialId: number): boolean {
  const info = db.prepare("INSERT OR IGNORE INTO drug_trials (drug_id, trial_id) VALUES (?, ?)").run(drugId, trialId);
  return info.changes > 0;
}

export function listDrugTrialIds(db: Db, drugId: number): number[] {
  return db
    .prepare<[number], { trial_id: number }>("SELECT trial_id FROM drug_trials WHERE drug_id = ? ORDER BY trial_id")
    .all(drugId)
    .map((r) => r.trial_id);
}

// --- reporting ---

export function countEntities(db: Db): EntityCounts {
  const count = (table: string): number =>
    db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get()?.n ?? 0;
  return {
    documents: count("documents"),
    companies: count("companies"),
    drugs: count("drugs"),
    targets: count("targets"),
    indications: count("indications"),
    clinical_trials: count("clinical_trials"),
    drug_targets: count("drug_targets"),
    drug_indications: count("drug_indications"),
    drug_trials: count("drug_trials"),
  };
}

export function listDrugSummaries(db: Db): DrugSummary[] {
  return db
    .prepare<[], DrugSummary>(
      `SELECT d.id, d.generic_name, c.name AS company_name, d.mechanism_of_action,
         (SELECT COUNT(*) FROM drug_trials dt WHERE dt.drug_id = d.id) AS trial_count,
         (SELECT AVG(confidence_score) FROM drug_targets x WHERE x.drug_id = d.id) AS avg_target_confidence,
         (SELECT AVG(confidence_score) FROM drug_indications y WHERE y.drug_id = d.id) AS avg_indication_confidence
       FROM drugs d LEFT JOIN companies c ON c.id = d.company_id
       ORDER BY d.id`
    )
    .all();
}
