/**
 * Curated roster of companies and their known drugs (data/seed.json).
 * The roster also carries the keyword -> canonical company name map.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

const SeedCompanySchema = z.object({
  name: z.string().min(1),
  website: z.string().url().nullable(),
  keywords: z.array(z.string().min(1)).min(1),
});

const SeedDrugSchema = z.object({
  company: z.string().min(1),
  generic_name: z.string().min(1),
  brand_name: z.string().nullable(),
  drug_class: z.string().nullable(),
  mechanism_of_action: z.string().nullable(),
  fda_approval_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).nullable(),
  targets: z.array(z.string().min(1)),
  indications: z.array(z.string().min(1)),
  nct_codes: z.array(z.string().regex(/^NCT\d{8}$/)),
});

export const SeedTableSchema = z.object({
  companies: z.array(SeedCompanySchema),
  drugs: z.array(SeedDrugSchema),
});

export type SeedCompany = z.infer<typeof SeedCompanySchema>;
export type SeedDrug = z.infer<typeof SeedDrugSchema>;
export type SeedTable = z.infer<typeof SeedTableSchema>;

export function loadSeedTable(path: URL | string = new URL("../data/seed.json", import.meta.url)): SeedTable {
  return SeedTableSchema.parse(JSON.parse(readFileSync(path, "utf8")));
}

export function seedDrugsFor(seed: SeedTable, companyName: string): SeedDrug[] {
  return seed.drugs.filter((d) => d.company === companyName);
}

/** Roster company that owns a drug, matched on generic or brand name. */
export function seedCompanyForDrug(seed: SeedTable, drugName: string): SeedCompany | undefined {
  const lower = drugName.trim().toLowerCase();
  const drug = seed.drugs.find(
    (d) => d.generic_name.toLowerCase() === lower || d.brand_name?.toLowerCase() === lower
  );
  return drug ? seed.companies.find((c) => c.name === drug.company) : undefined;
}

export function seedBrandFor(seed: SeedTable, drugName: string): string | null {
  const lower = drugName.trim().toLowerCase();
  return seed.drugs.find((d) => d.generic_name.toLowerCase() === lower)?.brand_name ?? null;
}
