import { describe, it, expect } from "vitest";
import { inferCompanyName, resolveCompany } from "./companyResolver.js";
import type { SeedTable } from "./seedData.js";

const seed: SeedTable = {
  companies: [
    { name: "Merck & Co.", website: "https://www.merck.com", keywords: ["merck"] },
    { name: "Bristol Myers Squibb", website: "https://www.bms.com", keywords: ["bristol", "bms"] },
  ],
  drugs: [
    {
      company: "Bristol Myers Squibb",
      generic_name: "Nivolumab",
      brand_name: "OPDIVO",
      drug_class: "Monoclonal Antibody",
      mechanism_of_action: "Blocks PD-1",
      fda_approval_date: "2014-12-22",
      targets: ["PD-1"],
      indications: ["Melanoma"],
      nct_codes: [],
    },
  ],
};

const doc = (source_url: string, content: string, title: string | null = null) => ({ source_url, title, content });

describe("resolveCompany", () => {
  it("prefers a keyword in the source URL", () => {
    expect(resolveCompany(doc("https://www.merck.com/pipeline", "Bristol partnered"), seed, { inferNames: false })).toEqual({
      name: "Merck & Co.",
      website: "https://www.merck.com",
      via: "url",
    });
  });

  it("falls back to keywords in title and content", () => {
    const resolved = resolveCompany(doc("https://news.example.com/x", "Bristol announced data"), seed, {
      inferNames: false,
    });
    expect(resolved?.name).toBe("Bristol Myers Squibb");
    expect(resolved?.via).toBe("keyword");
  });

  it("infers a name from a corporate suffix only when enabled", () => {
    const d = doc("https://news.example.com/y", "Acme Biologics Inc announced results");
    expect(resolveCompany(d, seed, { inferNames: true })).toEqual({ name: "Acme Biologics", website: null, via: "inferred" });
    expect(resolveCompany(d, seed, { inferNames: false })).toBeNull();
  });

  it("uses the roster owner of a mentioned drug last", () => {
    const resolved = resolveCompany(doc("https://labels.example.com/1", "OPDIVO label text"), seed, {
      inferNames: false,
      drugNames: ["OPDIVO"],
    });
    expect(resolved).toEqual({ name: "Bristol Myers Squibb", website: "https://www.bms.com", via: "drug" });
  });
});

describe("inferCompanyName", () => {
  it("reads names after section headings", () => {
    expect(inferCompanyName("Overview Zenith Therapeutics")).toBe("Zenith Therapeutics");
  });

  it("rejects short and stop-word names", () => {
    expect(inferCompanyName("About The")).toBeNull();
    expect(inferCompanyName("nothing capitalised here")).toBeNull();
  });
});
