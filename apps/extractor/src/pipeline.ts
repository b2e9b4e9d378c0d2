/**
 * Entity extraction over stored documents.
 *
 * One pipeline, three presets (simple / standard / comprehensive) selected through
 * ExtractionCapabilities. A run has two phases:
 *  1. analyze: per document, a transform of (document, seed table, capabilities) into a
 *     DocumentExtraction. Async only for the optional entity recognizer.
 *  2. persist: one transaction for the run, a savepoint per document. A document that
 *     fails is rolled back, logged with its id and skipped.
 * The trial linkage pass runs last, inside the same transaction.
 */

import {
  createOrUpdateDrug,
  findDrug,
  getOrCreateCompany,
  getOrCreateIndication,
  getOrCreateTarget,
  getOrCreateTrial,
  linkDrugIndication,
  linkDrugTarget,
  listDocuments,
  withTransaction,
  type Db,
  type DocumentRow,
  type DrugInput,
} from "database";
import {
  extractTargetsAndIndications,
  indicationType,
  isValidDrugName,
  knownTargetType,
  KNOWN_TARGETS_BY_UPPER,
  type EntityRecognizer,
  type IndicationCandidate,
  type TargetCandidate,
} from "pharma-ai";
import { resolveCompany, type ResolvedCompany } from "./companyResolver.js";
import type { AppConfig, ExtractionCapabilities } from "./config.js";
import { seedBrandFor, seedDrugsFor, type SeedDrug, type SeedTable } from "./seedData.js";
import {
  extractApprovalDate,
  extractBrandName,
  extractDrugClass,
  extractMechanism,
  extractNctIds,
  findDrugCandidates,
  inferDrugClass,
  mentionsApproval,
  nctIdsNear,
  relationshipFromMechanism,
  trialPhase,
  trialStatus,
} from "./textPatterns.js";
import { linkTrials } from "./trialLinker.js";

export type DocumentKind = "company" | "fda" | "drug_profile" | "trial" | "literature" | "other";

export function documentKind(sourceType: string): DocumentKind {
  if (sourceType.startsWith("company_")) return "company";
  if (sourceType.startsWith("fda_")) return "fda";
  if (sourceType.startsWith("drugs_com_")) return "drug_profile";
  if (sourceType === "clinical_trials" || sourceType === "clinical_trial") return "trial";
  if (sourceType.startsWith("pubmed")) return "literature";
  return "other";
}

export interface ExtractedDrug {
  input: Omit<DrugInput, "company_id">;
  targets: TargetCandidate[];
  indications: IndicationCandidate[];
  /** Only link targets and indications; never create the drug or touch its fields. */
  existingOnly: boolean;
}

export interface ExtractedTrial {
  nct_id: string;
  title: string | null;
  status: string | null;
  phase: string | null;
  /** The document's company sponsors the trial (a trial record naming one study). */
  sponsoredByCompany: boolean;
}

export interface DocumentExtraction {
  documentId: number;
  company: ResolvedCompany | null;
  drugs: ExtractedDrug[];
  trials: ExtractedTrial[];
}

export interface ExtractionError {
  documentId: number | null;
  message: string;
}

export interface ExtractionSummary {
  mode: AppConfig["mode"];
  documentsProcessed: number;
  documentsSkipped: number;
  errors: ExtractionError[];
  companies: number;
  drugs: number;
  drugsUpdated: number;
  seedDrugs: number;
  targets: number;
  indications: number;
  trials: number;
  trialLinks: number;
  /** Set when the whole batch was rolled back. */
  batchError: string | null;
}

export interface PipelineDeps {
  seed: SeedTable;
  recognizer?: EntityRecognizer | null;
  isValidName?: (name: string) => boolean;
}

export interface Counters {
  companies: number;
  drugs: number;
  drugsUpdated: number;
  seedDrugs: number;
  targets: number;
  indications: number;
  trials: number;
}

type NameGate = (name: string) => boolean;

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

function emptyCounters(): Counters {
  return { companies: 0, drugs: 0, drugsUpdated: 0, seedDrugs: 0, targets: 0, indications: 0, trials: 0 };
}

const COUNTER_KEYS = [
  "companies",
  "drugs",
  "drugsUpdated",
  "seedDrugs",
  "targets",
  "indications",
  "trials",
] as const satisfies ReadonlyArray<keyof Counters>;

function addCounters(into: Counters, from: Counters): void {
  for (const key of COUNTER_KEYS) into[key] += from[key];
}

function websiteOf(url: string): string | null {
  return URL.canParse(url) ? new URL(url).origin : null;
}

function nameGate(deps: PipelineDeps): NameGate {
  return deps.isValidName ?? ((name) => isValidDrugName(name));
}

/** Documents the given capabilities look at. */
export function selectDocuments(docs: DocumentRow[], caps: ExtractionCapabilities): DocumentRow[] {
  return docs.filter((d) => {
    const kind = documentKind(d.source_type);
    if (kind === "literature") return caps.linkTrialsAnywhere || caps.extractFromLiterature;
    return kind !== "other" || caps.linkTrialsAnywhere;
  });
}

/**
 * The drug a label or drug profile is about: the first drug named before " / " in the title
 * ("pembrolizumab / KEYTRUDA"), else the first drug named anywhere in it.
 */
export function titleDrug(title: string | null, isValidName: NameGate): string | null {
  if (!title) return null;
  const lead = title.split(" / ")[0] ?? "";
  return findDrugCandidates(lead, isValidName)[0] ?? findDrugCandidates(title, isValidName)[0] ?? null;
}

function extractTrials(doc: DocumentRow, kind: DocumentKind): ExtractedTrial[] {
  const trialDoc = kind === "trial";
  const ids = extractNctIds(doc.content);
  return ids.map((nct_id) => ({
    nct_id,
    title: trialDoc ? doc.title : null,
    status: trialDoc ? trialStatus(doc.content) : null,
    phase: trialDoc ? trialPhase(doc.content) : null,
    sponsoredByCompany: trialDoc && ids.length === 1,
  }));
}

async function literatureDrugs(doc: DocumentRow, config: AppConfig, deps: PipelineDeps): Promise<ExtractedDrug[]> {
  const { extraction } = config;
  const out: ExtractedDrug[] = [];
  for (const name of findDrugCandidates(`${doc.title ?? ""}\n${doc.content}`, nameGate(deps))) {
    const found = await extractTargetsAndIndications(doc.content, name, {
      windows: extraction.windows,
      maxResults: extraction.maxCandidates,
      recognizer: deps.recognizer,
    });
    if (found.targets.length === 0 && found.indications.length === 0) continue;
    out.push({ input: { generic_name: name }, ...found, existingOnly: true });
  }
  return out;
}

export async function analyzeDocument(doc: DocumentRow, config: AppConfig, deps: PipelineDeps): Promise<DocumentExtraction> {
  const kind = documentKind(doc.source_type);
  const caps = config.capabilities;
  const { extraction } = config;
  const isValidName = nameGate(deps);
  const out: DocumentExtraction = { documentId: doc.id, company: null, drugs: [], trials: [] };

  if (kind === "trial" || caps.linkTrialsAnywhere) out.trials = extractTrials(doc, kind);
  if (kind === "literature" && caps.extractFromLiterature) out.drugs = await literatureDrugs(doc, config, deps);
  if (kind === "literature" || kind === "other") return out;

  // Labels and drug profiles describe one drug; other names in them are combination partners and comparators.
  const singleDrugDoc = kind === "fda" || kind === "drug_profile";
  let names: string[];
  if (singleDrugDoc) {
    const subject = titleDrug(doc.title, isValidName);
    if (!subject) return out;
    names = [subject];
  } else {
    names = findDrugCandidates(`${doc.title ?? ""}\n${doc.content}`, isValidName);
  }

  const company = resolveCompany(doc, deps.seed, { inferNames: caps.inferCompanyNames, drugNames: names });
  if (!company) return out;
  out.company = company.website === null && kind === "company" ? { ...company, website: websiteOf(doc.source_url) } : company;

  for (const name of names) {
    const input: Omit<DrugInput, "company_id"> = {
      generic_name: name,
      brand_name: (singleDrugDoc ? extractBrandName(doc.content) : null) ?? seedBrandFor(deps.seed, name),
      drug_class: (singleDrugDoc ? extractDrugClass(doc.content) : null) ?? inferDrugClass(name),
      mechanism_of_action: caps.extractMechanism ? extractMechanism(doc.content, name, extraction.mechanismProximity) : null,
      fda_approval_status: kind === "fda" ? mentionsApproval(doc.content) : null,
      fda_approval_date: kind === "fda" ? extractApprovalDate(doc.content) : null,
      nct_codes: nctIdsNear(doc.content, name, extraction.nctProximity),
    };
    let targets: TargetCandidate[] = [];
    let indications: IndicationCandidate[] = [];
    if (caps.extractTargetsFromFda && singleDrugDoc) {
      const found = await extractTargetsAndIndications(doc.content, name, {
        windows: extraction.windows,
        maxResults: extraction.maxCandidates,
        recognizer: deps.recognizer,
      });
      targets = found.targets;
      indications = found.indications;
    }
    out.drugs.push({ input, targets, indications, existingOnly: false });
  }
  return out;
}

function linkCandidates(
  db: Db,
  drugId: number,
  targets: TargetCandidate[],
  indications: IndicationCandidate[],
  counters: Counters
): void {
  for (const t of targets) {
    const target = getOrCreateTarget(db, t.name, t.target_type);
    if (target.created) counters.targets++;
    linkDrugTarget(db, drugId, target.row.id, relationshipFromMechanism(t.mechanism), t.confidence_score);
  }
  for (const i of indications) {
    const indication = getOrCreateIndication(db, i.name, i.indication_type);
    if (indication.created) counters.indications++;
    linkDrugIndication(db, drugId, indication.row.id, i.approval_status, i.confidence_score);
  }
}

export function persistExtraction(db: Db, extraction: DocumentExtraction, isValidName: NameGate): Counters {
  const counters = emptyCounters();
  let companyId: number | null = null;
  if (extraction.company) {
    const company = getOrCreateCompany(db, extraction.company.name, { website: extraction.company.website });
    if (company.created) counters.companies++;
    companyId = company.row.id;
  }

  for (const { input, targets, indications, existingOnly } of extraction.drugs) {
    if (existingOnly) {
      const known = findDrug(db, input.generic_name);
      if (known) linkCandidates(db, known.id, targets, indications, counters);
      continue;
    }
    const result = createOrUpdateDrug(db, { ...input, company_id: companyId }, isValidName);
    if (!result) continue;
    if (result.created) counters.drugs++;
    else counters.drugsUpdated++;
    linkCandidates(db, result.drug.id, targets, indications, counters);
  }

  for (const { sponsoredByCompany, ...trial } of extraction.trials) {
    const res = getOrCreateTrial(db, { ...trial, sponsor_id: sponsoredByCompany ? companyId : null });
    if (res.created) counters.trials++;
  }
  return counters;
}

/** Curated drugs for a roster company, persisted with full confidence. */
export function persistSeedDrugs(
  db: Db,
  companyName: string,
  website: string | null,
  drugs: SeedDrug[],
  isValidName: NameGate
): Counters {
  const counters = emptyCounters();
  const company = getOrCreateCompany(db, companyName, { website });
  if (company.created) counters.companies++;
  for (const seed of drugs) {
    const result = createOrUpdateDrug(
      db,
      {
        generic_name: seed.generic_name,
        brand_name: seed.brand_name,
        drug_class: seed.drug_class,
        mechanism_of_action: seed.mechanism_of_action,
        fda_approval_status: seed.fda_approval_date !== null,
        fda_approval_date: seed.fda_approval_date,
        company_id: company.row.id,
        nct_codes: seed.nct_codes,
      },
      isValidName
    );
    if (!result) continue;
    if (result.created) counters.seedDrugs++;
    const relationship = relationshipFromMechanism(seed.mechanism_of_action);
    for (const name of seed.targets) {
      const canonical = KNOWN_TARGETS_BY_UPPER.get(name.toUpperCase());
      const target = getOrCreateTarget(db, name, canonical ? knownTargetType(canonical) : "protein");
      if (target.created) counters.targets++;
      linkDrugTarget(db, result.drug.id, target.row.id, relationship, 1);
    }
    const status = seed.fda_approval_date !== null ? "Approved" : "Clinical Trial";
    for (const name of seed.indications) {
      const indication = getOrCreateIndication(db, name, indicationType(name));
      if (indication.created) counters.indications++;
      linkDrugIndication(db, result.drug.id, indication.row.id, status, 1);
    }
  }
  return counters;
}

/** Roster companies with no document whose URL names them get their seed drugs. */
function seedUncoveredCompanies(
  db: Db,
  deps: PipelineDeps,
  docs: DocumentRow[],
  counters: Counters,
  errors: ExtractionError[]
): void {
  for (const company of deps.seed.companies) {
    const covered = docs.some((d) => company.keywords.some((k) => d.source_url.toLowerCase().includes(k)));
    if (covered) continue;
    try {
      const seeded = withTransaction(db, () =>
        persistSeedDrugs(db, company.name, company.website, seedDrugsFor(deps.seed, company.name), nameGate(deps))
      );
      addCounters(counters, seeded);
    } catch (err) {
      console.error(`[extract] seed drugs for ${company.name} failed:`, errorMessage(err));
      errors.push({ documentId: null, message: `${company.name}: ${errorMessage(err)}` });
    }
  }
}

export async function runExtraction(db: Db, config: AppConfig, deps: PipelineDeps): Promise<ExtractionSummary> {
  const docs = selectDocuments(listDocuments(db), config.capabilities);
  console.log(`[extract] mode=${config.mode}: analyzing ${docs.length} documents`);

  const errors: ExtractionError[] = [];
  const analyzed: DocumentExtraction[] = [];
  for (const doc of docs) {
    try {
      analyzed.push(await analyzeDocument(doc, config, deps));
    } catch (err) {
      console.error(`[extract] document ${doc.id}: analysis failed:`, errorMessage(err));
      errors.push({ documentId: doc.id, message: errorMessage(err) });
    }
  }

  const isValidName = nameGate(deps);
  const counters = emptyCounters();
  let persisted = 0;
  let trialLinks = 0;
  try {
    withTransaction(db, () => {
      for (const extraction of analyzed) {
        try {
          addCounters(counters, withTransaction(db, () => persistExtraction(db, extraction, isValidName)));
          persisted++;
        } catch (err) {
          console.error(`[extract] document ${extraction.documentId}: persist failed:`, errorMessage(err));
          errors.push({ documentId: extraction.documentId, message: errorMessage(err) });
        }
      }
      if (config.capabilities.useSeedFallback) seedUncoveredCompanies(db, deps, docs, counters, errors);
      trialLinks = linkTrials(db);
    });
  } catch (err) {
    console.error("[extract] batch rolled back:", errorMessage(err));
    return {
      mode: config.mode,
      documentsProcessed: 0,
      documentsSkipped: docs.length,
      errors,
      ...emptyCounters(),
      trialLinks: 0,
      batchError: errorMessage(err),
    };
  }

  const summary: ExtractionSummary = {
    mode: config.mode,
    documentsProcessed: persisted,
    documentsSkipped: docs.length - persisted,
    errors,
    ...counters,
    trialLinks,
    batchError: null,
  };
  console.log(
    `[extract] done: ${summary.documentsProcessed} processed, ${summary.documentsSkipped} skipped, ` +
      `${summary.companies} companies, ${summary.drugs + summary.seedDrugs} drugs, ${summary.trials} trials, ` +
      `${summary.trialLinks} trial links`
  );
  return summary;
}
