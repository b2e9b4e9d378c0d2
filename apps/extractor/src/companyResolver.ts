/**
 * Company attribution for a document: roster keywords first (source URL, then title and
 * content), then corporate-suffix inference, then the owner of a drug named in the text.
 */

import { seedCompanyForDrug, type SeedTable } from "./seedData.js";

export interface ResolvedCompany {
  name: string;
  website: string | null;
  via: "url" | "keyword" | "inferred" | "drug";
}

export interface CompanySource {
  source_url: string;
  title: string | null;
  content: string;
}

const SUFFIX_PATTERN =
  /\b([A-Z][a-z]+(?:\s+[A-Z][a-z]+)*)\s+(?:Inc|Corp|Corporation|Company|Co|Ltd|Limited|Pharmaceuticals|Pharma|Biotech|Biotechnology)\b/;
const HEADING_PATTERN = /\b(?:About|Company|Overview)\s+([A-Z][a-z]+(?:\s+[A-Z][a-z]+)*)/;
const NAME_STOP_WORDS = new Set(["the", "and", "or", "for", "with", "by", "our", "this", "about", "company", "overview"]);

function byKeyword(seed: SeedTable, haystack: string): SeedTable["companies"][number] | undefined {
  return seed.companies.find((c) => c.keywords.some((k) => haystack.includes(k)));
}

export function inferCompanyName(text: string): string | null {
  for (const re of [SUFFIX_PATTERN, HEADING_PATTERN]) {
    const name = re.exec(text)?.[1]?.trim();
    if (name && name.length > 3 && !NAME_STOP_WORDS.has(name.toLowerCase())) return name;
  }
  return null;
}

export function resolveCompany(
  doc: CompanySource,
  seed: SeedTable,
  options: { inferNames: boolean; drugNames?: string[] }
): ResolvedCompany | null {
  const fromUrl = byKeyword(seed, doc.source_url.toLowerCase());
  if (fromUrl) return { name: fromUrl.name, website: fromUrl.website, via: "url" };

  const text = `${doc.title ?? ""}\n${doc.content}`;
  const fromText = byKeyword(seed, text.toLowerCase());
  if (fromText) return { name: fromText.name, website: fromText.website, via: "keyword" };

  if (options.inferNames) {
    const inferred = inferCompanyName(text);
    if (inferred) return { name: inferred, website: null, via: "inferred" };
  }

  for (const drug of options.drugNames ?? []) {
    const owner = seedCompanyForDrug(seed, drug);
    if (owner) return { name: owner.name, website: owner.website, via: "drug" };
  }
  return null;
}
