import type Database from "better-sqlite3";

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS documents (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    source_url TEXT NOT NULL,
    title TEXT,
    content TEXT NOT NULL,
    content_hash TEXT NOT NULL UNIQUE,
    source_type TEXT NOT NULL,
    retrieval_date TEXT NOT NULL DEFAULT (datetime('now'))
  );
  CREATE INDEX IF NOT EXISTS idx_documents_source_type ON documents(source_type);

  CREATE TABLE IF NOT EXISTS companies (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    website TEXT,
    description TEXT,
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
  );

  CREATE TABLE IF NOT EXISTS drugs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    generic_name TEXT NOT NULL,
    brand_name TEXT,
    drug_class TEXT,
    mechanism_of_action TEXT,
    fda_approval_status INTEGER NOT NULL DEFAULT 0,
    fda_approval_date TEXT,
    company_id INTEGER REFERENCES companies(id),
    nct_codes TEXT NOT NULL DEFAULT '[]',
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
  );
  CREATE INDEX IF NOT EXISTS idx_drugs_company ON drugs(company_id);

  CREATE TABLE IF NOT EXISTS targets (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    target_type TEXT
  );

  CREATE TABLE IF NOT EXISTS indications (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    indication_type TEXT
  );

  CREATE TABLE IF NOT EXISTS drug_targets (
    drug_id INTEGER NOT NULL REFERENCES drugs(id) ON DELETE CASCADE,
    target_id INTEGER NOT NULL REFERENCES targets(id) ON DELETE CASCADE,
    relationship_type TEXT,
    confidence_score REAL,
    UNIQUE (drug_id, target_id)
  );

  CREATE TABLE IF NOT EXISTS drug_indications (
    drug_id INTEGER NOT NULL REFERENCES drugs(id) ON DELETE CASCADE,
    indication_id INTEGER NOT NULL REFERENCES indications(id) ON DELETE CASCADE,
    approval_status TEXT,
    confidence_score REAL,
    UNIQUE (drug_id, indication_id)
  );

  CREATE TABLE IF NOT EXISTS clinical_trials (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    nct_id TEXT NOT NULL UNIQUE,
    title TEXT,
    status TEXT,
    phase TEXT,
    sponsor_id INTEGER REFERENCES companies(id),
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
  );

  CREATE TABLE IF NOT EXISTS drug_trials (
    drug_id INTEGER NOT NULL REFERENCES drugs(id) ON DELETE CASCADE,
    trial_id INTEGER NOT NULL REFERENCES clinical_trials(id) ON DELETE CASCADE,
    UNIQUE (drug_id, trial_id)
  );
`;

export function applySchema(db: Database.Database): void {
  db.pragma("foreign_keys = ON");
  db.exec(SCHEMA_SQL);
}
