import { describe, it, expect, vi, afterEach } from "vitest";
import { trialsCollector, type Study } from "./clinicalTrials.js";

const study: Study = {
  protocolSection: {
    identificationModule: { nctId: "NCT01234567", briefTitle: "Test Study" },
    statusModule: { overallStatus: "ACTIVE_NOT_RECRUITING" },
    designModule: { phases: ["PHASE2", "PHASE3"] },
    conditionsModule: { conditions: ["Melanoma"] },
    armsInterventionsModule: { interventions: [{ name: "Pembrolizumab" }, {}] },
    sponsorCollaboratorsModule: { leadSponsor: { name: "Merck Sharp & Dohme LLC" } },
  },
};

describe("trialsCollector", () => {
  const collector = trialsCollector;

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("turns a study into a trial document", () => {
    expect(collector.parse(study)).toEqual([
      {
        source_url: "https://clinicaltrials.gov/study/NCT01234567",
        title: "Test Study",
        content: [
          "NCT01234567: Test Study",
          "Status: Active Not Recruiting",
          "Phase: Phase 2, Phase 3",
          "Conditions: Melanoma",
          "Interventions: Pembrolizumab",
          "Sponsor: Merck Sharp & Dohme LLC",
        ].join("\n"),
        source_type: "clinical_trial",
      },
    ]);
  });

  it("skips studies without an NCT id", () => {
    expect(collector.parse({ protocolSection: {} })).toEqual([]);
  });

  it("queries the studies endpoint by term", async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response(JSON.stringify({ studies: [study] }), { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const studies = await collector.collect({ query: " pembrolizumab ", limit: 5 });
    expect(studies).toHaveLength(1);
    const url = String(fetchMock.mock.calls[0]?.[0]);
    expect(url).toBe("https://clinicaltrials.gov/api/v2/studies?query.term=pembrolizumab&format=json&pageSize=5");
  });

  it("returns nothing on a client error", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("bad", { status: 400 })));
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    expect(await collector.collect({ query: "x" })).toEqual([]);
  });
});
