import { findTrialByNctId, linkDrugTrial, listDrugs, type Db } from "database";

/**
 * Second pass after extraction: attach each drug to the stored trials its nct_codes name.
 * Codes with no stored trial are skipped. Returns the number of new links.
 */
export function linkTrials(db: Db): number {
  let created = 0;
  for (const drug of listDrugs(db)) {
    for (const code of drug.nct_codes) {
      const trial = findTrialByNctId(db, code);
      if (trial && linkDrugTrial(db, drug.id, trial.id)) created++;
    }
  }
  return created;
}
