import { describe, it, expect } from "vitest";
import { classifyDrugName, isValidDrugName } from "./drugNameValidator.js";

describe("isValidDrugName", () => {
  it("accepts and rejects the reference cases", () => {
    expect(isValidDrugName("NCT01234567")).toBe(false);
    expect(isValidDrugName("Pembrolizumab")).toBe(true);
    expect(isValidDrugName("the")).toBe(false);
    expect(isValidDrugName("MK-3475")).toBe(true);
    expect(isValidDrugName("Patritumab Deruxtecan")).toBe(true);
  });

  it("rejects by the first matching rule", () => {
    expect(classifyDrugName("ab").reason).toBe("length");
    expect(classifyDrugName("x".repeat(101)).reason).toBe("length");
    expect(classifyDrugName("nct0001").reason).toBe("trial_id");
    expect(classifyDrugName("Lung123").reason).toBe("study_code");
    expect(classifyDrugName("PanTumor7").reason).toBe("study_code");
    expect(classifyDrugName("IgG1").reason).toBe("generic_term");
    expect(classifyDrugName("TROP2").reason).toBe("generic_term");
    expect(classifyDrugName("antibody").reason).toBe("stop_word");
    expect(classifyDrugName("Pembrolizumab is").reason).toBe("incomplete_phrase");
    expect(classifyDrugName("novel drug conjugate").reason).toBe("descriptive_phrase");
    expect(classifyDrugName("Ifinatamab peptide").reason).toBe("descriptive_phrase");
  });

  it("accepts on each positive indicator", () => {
    expect(classifyDrugName("Osimertinib")).toEqual({ valid: true, reason: "suffix" });
    expect(classifyDrugName("Axicabtagene ciloleucel")).toEqual({ valid: true, reason: "suffix" });
    expect(classifyDrugName("Kymriah")).toEqual({ valid: true, reason: "known" });
    expect(classifyDrugName("RG6114")).toEqual({ valid: true, reason: "sponsor_code" });
    expect(classifyDrugName("Sacituzumab Tirumotecan")).toEqual({ valid: true, reason: "compound_name" });
  });

  it("only admits multi-word names in the extended variant", () => {
    expect(isValidDrugName("Ifinatamab Deruxtecan", { extended: false })).toBe(false);
    expect(isValidDrugName("Ifinatamab Deruxtecan", { extended: true })).toBe(true);
  });

  it("rejects names without a positive indicator", () => {
    expect(isValidDrugName("Oncology")).toBe(false);
    expect(isValidDrugName("Lung")).toBe(false);
  });
});
