/**
 * Post-hoc drug merge: rows whose generic names differ only in case or surrounding
 * whitespace collapse into the earliest row, then every name is title-cased.
 */

import {
  deleteDrug,
  fillDrugFields,
  linkDrugIndication,
  linkDrugTarget,
  linkDrugTrial,
  listDrugIndications,
  listDrugs,
  listDrugTargets,
  listDrugTrialIds,
  renameDrug,
  titleCase,
  withTransaction,
  type Db,
  type Drug,
} from "database";

export interface DedupSummary {
  groupsMerged: number;
  drugsDeleted: number;
  drugsRenamed: number;
}

/** Move trials, targets and indications of `duplicate` onto `primary` and fill its null fields. */
export function mergeDrugInto(db: Db, primary: Drug, duplicate: Drug): Drug {
  for (const trialId of listDrugTrialIds(db, duplicate.id)) linkDrugTrial(db, primary.id, trialId);
  for (const t of listDrugTargets(db, duplicate.id)) {
    linkDrugTarget(db, primary.id, t.target_id, t.relationship_type, t.confidence_score);
  }
  for (const i of listDrugIndications(db, duplicate.id)) {
    linkDrugIndication(db, primary.id, i.indication_id, i.approval_status, i.confidence_score);
  }
  const merged = fillDrugFields(db, primary, {
    brand_name: duplicate.brand_name,
    drug_class: duplicate.drug_class,
    mechanism_of_action: duplicate.mechanism_of_action,
    fda_approval_status: duplicate.fda_approval_status,
    fda_approval_date: duplicate.fda_approval_date,
    company_id: duplicate.company_id,
    nct_codes: duplicate.nct_codes,
  });
  deleteDrug(db, duplicate.id);
  return merged;
}

export function deduplicateDrugs(db: Db): DedupSummary {
  try {
    return withTransaction(db, () => {
      const groups = new Map<string, Drug[]>();
      for (const drug of listDrugs(db)) {
        const key = drug.generic_name.trim().toLowerCase();
        const group = groups.get(key);
        if (group) group.push(drug);
        else groups.set(key, [drug]);
      }

      const summary: DedupSummary = { groupsMerged: 0, drugsDeleted: 0, drugsRenamed: 0 };
      for (const [key, group] of groups) {
        const [first, ...duplicates] = group;
        if (!first || duplicates.length === 0) continue;
        let primary = first;
        for (const dup of duplicates) {
          primary = mergeDrugInto(db, primary, dup);
          summary.drugsDeleted++;
        }
        summary.groupsMerged++;
        console.log(`[dedupe] merged ${duplicates.length} duplicate(s) of "${key}" into drug ${primary.id}`);
      }

      for (const drug of listDrugs(db)) {
        const display = titleCase(drug.generic_name.trim());
        if (display === drug.generic_name) continue;
        renameDrug(db, drug.id, display);
        summary.drugsRenamed++;
      }
      return summary;
    });
  } catch (err) {
    console.error("[dedupe] rolled back:", err instanceof Error ? err.message : err);
    throw err;
  }
}
