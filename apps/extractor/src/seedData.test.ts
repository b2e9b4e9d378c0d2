import { describe, it, expect } from "vitest";
import { loadSeedTable, seedBrandFor, seedCompanyForDrug, seedDrugsFor } from "./seedData.js";

describe("seed roster", () => {
  const seed = loadSeedTable();

  it("loads the bundled roster", () => {
    expect(seed.companies.map((c) => c.name)).toContain("Merck & Co.");
    expect(seedDrugsFor(seed, "Merck & Co.")[0]?.generic_name).toBe("Pembrolizumab");
  });

  it("finds the owner by generic or brand name", () => {
    expect(seedCompanyForDrug(seed, " pembrolizumab ")?.name).toBe("Merck & Co.");
    expect(seedCompanyForDrug(seed, "KEYTRUDA")?.name).toBe("Merck & Co.");
    expect(seedCompanyForDrug(seed, "aspirin")).toBeUndefined();
  });

  it("looks up brands by generic name only", () => {
    expect(seedBrandFor(seed, "Pembrolizumab")).toBe("KEYTRUDA");
    expect(seedBrandFor(seed, "KEYTRUDA")).toBeNull();
  });
});
