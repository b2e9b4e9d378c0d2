/**
 * Inputs of a ground-truth validation run: the curated spreadsheet (xlsx or csv, read
 * with SheetJS) and a snapshot of the pipeline store. Either failing to load is fatal.
 */

import { readFileSync } from "node:fs";
import * as XLSX from "xlsx";
import { listDrugSummaries, type Db } from "database";

export class GroundTruthLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GroundTruthLoadError";
  }
}

export interface GroundTruthRow {
  genericName: string;
  brandName: string | null;
  fdaApproval: string | null;
  drugClass: string | null;
  target: string | null;
  mechanism: string | null;
  indication: string | null;
  /** `|`-delimited NCT ids or trial titles. */
  trials: string | null;
  company: string | null;
  tickets: string | null;
}

type Field = keyof GroundTruthRow;

/** Accepted header spellings per field, first match wins. */
const COLUMNS: Record<Field, string[]> = {
  genericName: ["Generic Name", "Generic name"],
  brandName: ["Brand Name", "Brand name"],
  fdaApproval: ["FDA Approval"],
  drugClass: ["Drug Class", "Drug class"],
  target: ["Target"],
  mechanism: ["Mechanism"],
  indication: ["Indication Approved"],
  trials: ["Current Clinical Trials"],
  company: ["Company", "Partner"],
  tickets: ["Tickets"],
};

function cellText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  const text = String(value).trim();
  return text.length > 0 ? text : null;
}

function pick(row: Record<string, unknown>, field: Field): string | null {
  for (const header of COLUMNS[field]) {
    if (header in row) return cellText(row[header]);
  }
  return null;
}

/** Rows of the first sheet; rows without a generic name are dropped. */
export function parseGroundTruth(buffer: Buffer): GroundTruthRow[] {
  const workbook = XLSX.read(buffer, { type: "buffer", cellDates: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) throw new GroundTruthLoadError("ground truth workbook has no sheets");

  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, {
    raw: false,
    defval: null,
    dateNF: "yyyy-mm-dd",
  });
  if (rows.length > 0 && !COLUMNS.genericName.some((h) => rows.some((r) => h in r))) {
    throw new GroundTruthLoadError(`ground truth has no ${COLUMNS.genericName.join("/")} column`);
  }

  const out: GroundTruthRow[] = [];
  for (const row of rows) {
    const genericName = pick(row, "genericName");
    if (!genericName) continue;
    out.push({
      genericName,
      brandName: pick(row, "brandName"),
      fdaApproval: pick(row, "fdaApproval"),
      drugClass: pick(row, "drugClass"),
      target: pick(row, "target"),
      mechanism: pick(row, "mechanism"),
      indication: pick(row, "indication"),
      trials: pick(row, "trials"),
      company: pick(row, "company"),
      tickets: pick(row, "tickets"),
    });
  }
  return out;
}

export function loadGroundTruth(path: string): GroundTruthRow[] {
  let buffer: Buffer;
  try {
    buffer = readFileSync(path);
  } catch (err) {
    throw new GroundTruthLoadError(`cannot read ground truth ${path}`, { cause: err });
  }
  try {
    return parseGroundTruth(buffer);
  } catch (err) {
    if (err instanceof GroundTruthLoadError) throw err;
    throw new GroundTruthLoadError(`cannot parse ground truth ${path}`, { cause: err });
  }
}

export interface PipelineDrug {
  name: string;
  company: string | null;
  mechanism: string | null;
  trialCount: number;
}

export function loadPipelineSnapshot(db: Db): PipelineDrug[] {
  try {
    return listDrugSummaries(db).map((d) => ({
      name: d.generic_name,
      company: d.company_name,
      mechanism: d.mechanism_of_action,
      trialCount: d.trial_count,
    }));
  } catch (err) {
    throw new GroundTruthLoadError("cannot read pipeline store", { cause: err });
  }
}
