import { describe, it, expect, vi, afterEach } from "vitest";
import {
  approvalStatusFromContext,
  extractIndications,
  extractTargets,
  extractTargetsAndIndications,
  knownIndicationHits,
  mechanismFromWindow,
  rankCandidates,
} from "./targetIndicationExtractor.js";
import type { EntityRecognizer } from "./entityRecognizer.js";

describe("extractTargets", () => {
  it("finds a known target near the drug and scores it", () => {
    const targets = extractTargets("Pembrolizumab blocks PD-1 on T cells.", "Pembrolizumab");
    expect(targets).toEqual([
      {
        name: "PD-1",
        target_type: "gene_protein",
        confidence_score: 1,
        mechanism: "Pembrolizumab blocks PD-1 on T cells.",
        source: "known",
      },
    ]);
  });

  it("unions known-vocabulary and pattern candidates, best first", () => {
    const targets = extractTargets("Drugxmab binds to HER2 and inhibits kinase activity.", "Drugxmab");
    expect(targets.map((t) => [t.name, t.target_type, t.confidence_score])).toEqual([
      ["HER2", "gene_protein", 1],
      ["kinase", "enzyme", 0.8],
    ]);
  });

  it("does not report the drug itself or partial CD symbols", () => {
    const targets = extractTargets("Testuximab targets CD190 on B cells.", "Testuximab");
    const names = targets.map((t) => t.name);
    expect(names).toContain("CD190");
    expect(names).not.toContain("CD19");
    expect(names).not.toContain("Testuximab");
  });

  it("matches known symbols written in another case under their canonical spelling", () => {
    const targets = extractTargets("Drugxnib inhibits MTOR and Her2 signalling.", "Drugxnib");
    expect(targets.map((t) => [t.name, t.target_type, t.confidence_score, t.source])).toEqual([
      ["HER2", "gene_protein", 1, "known"],
      ["mTOR", "gene_protein", 1, "known"],
    ]);
  });

  it("matches short word-like symbols on exact case only", () => {
    const names = extractTargets("Drugxnib met its endpoint; MET amplification was common.", "Drugxnib").map((t) => t.name);
    expect(names).toEqual(["MET"]);
  });

  it("returns nothing when the drug is not mentioned", () => {
    expect(extractTargets("EGFR inhibitors are common.", "Pembrolizumab")).toEqual([]);
  });

  it("keeps confidences within [0, 1]", () => {
    const text =
      "Drugxnib inhibits EGFR, targets ALK, blocks MET signalling, binds to KRAS, activates CD19 and modulates BRAF. " +
      "Drugxnib also inhibits telomerase and modulates tubulin.";
    const targets = extractTargets(text, "Drugxnib");
    expect(targets.length).toBeGreaterThan(0);
    for (const t of targets) {
      expect(t.confidence_score).toBeGreaterThanOrEqual(0);
      expect(t.confidence_score).toBeLessThanOrEqual(1);
    }
  });
});

describe("extractIndications", () => {
  it("matches known indications with treatment keywords", () => {
    const indications = extractIndications(
      "Drugxmab is approved for the treatment of melanoma and non-small cell lung cancer.",
      "Drugxmab"
    );
    expect(indications.map((i) => i.name)).toEqual(["melanoma", "non-small cell lung cancer"]);
    for (const i of indications) {
      expect(i.confidence_score).toBe(1);
      expect(i.approval_status).toBe("Approved");
      expect(i.indication_type).toBe("cancer");
    }
  });
});

describe("knownIndicationHits", () => {
  it("drops a known name that only occurs inside a longer known name", () => {
    expect(knownIndicationHits("advanced non-small cell lung cancer")).toEqual([
      { name: "non-small cell lung cancer", index: 9 },
    ]);
  });

  it("keeps a separate occurrence of the shorter name", () => {
    expect(knownIndicationHits("small cell lung cancer and lung cancer screening")).toEqual([
      { name: "lung cancer", index: 27 },
      { name: "small cell lung cancer", index: 0 },
    ]);
  });
});

describe("rankCandidates", () => {
  it("keeps the highest-confidence duplicate and caps the list", () => {
    const ranked = rankCandidates(
      [
        { name: "EGFR", confidence_score: 0.6 },
        { name: "egfr", confidence_score: 0.9 },
        { name: "noise", confidence_score: 0.2 },
      ],
      15
    );
    expect(ranked).toEqual([{ name: "egfr", confidence_score: 0.9 }]);

    const many = Array.from({ length: 20 }, (_, i) => ({ name: `T${i}`, confidence_score: 0.5 + i / 100 }));
    const top = rankCandidates(many, 15);
    expect(top).toHaveLength(15);
    expect(top[0].name).toBe("T19");
  });
});

describe("context helpers", () => {
  it("picks the first sentence with a mechanism indicator", () => {
    expect(mechanismFromWindow("Overview first. It inhibits BTK. Later text.")).toBe("It inhibits BTK.");
    expect(mechanismFromWindow("No verbs here")).toBe("No verbs here");
    expect(mechanismFromWindow("x".repeat(250))).toBe(`${"x".repeat(200)}...`);
  });

  it("derives approval status from context", () => {
    expect(approvalStatusFromContext("FDA approved in 2014")).toBe("Approved");
    expect(approvalStatusFromContext("a Phase 3 study")).toBe("Clinical Trial");
    expect(approvalStatusFromContext("in vitro work")).toBe("Preclinical");
    expect(approvalStatusFromContext("nothing")).toBe("Unknown");
  });
});

describe("extractTargetsAndIndications", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("adds recognizer entities that match the vocabulary or morphology", async () => {
    const recognizer: EntityRecognizer = {
      recognize: vi.fn(async () => ["smo", "Crohn disease", "signalling"]),
    };
    const result = await extractTargetsAndIndications(
      "Drugxnib activates smo signalling in Crohn disease patients.",
      "Drugxnib",
      { recognizer }
    );
    expect(result.targets.map((t) => [t.name, t.target_type, t.confidence_score, t.source])).toEqual([
      ["smo", "gene_protein", 0.7, "recognizer"],
    ]);
    expect(result.indications).toEqual([
      {
        name: "crohn disease",
        indication_type: "disease",
        confidence_score: 0.6,
        approval_status: "Unknown",
        source: "recognizer",
      },
    ]);
  });

  it("falls back to lexical extraction when the recognizer fails", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const recognizer: EntityRecognizer = {
      recognize: async () => {
        throw new Error("model unavailable");
      },
    };
    const text = "Pembrolizumab blocks PD-1 on T cells.";
    const result = await extractTargetsAndIndications(text, "Pembrolizumab", { recognizer });
    expect(result.targets).toEqual(extractTargets(text, "Pembrolizumab"));
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("works without a recognizer", async () => {
    const result = await extractTargetsAndIndications("Pembrolizumab blocks PD-1 on T cells.", "Pembrolizumab");
    expect(result.targets.map((t) => t.name)).toEqual(["PD-1"]);
    expect(result.indications).toEqual([]);
  });
});
