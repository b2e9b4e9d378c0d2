import { describe, it, expect } from "vitest";
import { ConfigError, loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("defaults to comprehensive mode", () => {
    const config = loadConfig({});
    expect(config.mode).toBe("comprehensive");
    expect(config.databasePath).toBe("data/pipeline.db");
    expect(config.capabilities.extractTargetsFromFda).toBe(true);
    expect(config.capabilities.useSeedFallback).toBe(false);
  });

  it("takes the mode from the environment, overridable by the caller", () => {
    expect(loadConfig({ EXTRACTION_MODE: "simple" }).capabilities.useSeedFallback).toBe(true);
    const standard = loadConfig({ EXTRACTION_MODE: "simple" }, { mode: "standard" });
    expect(standard.mode).toBe("standard");
    expect(standard.capabilities.useSeedFallback).toBe(false);
    expect(standard.capabilities.extractFromLiterature).toBe(false);
    expect(loadConfig({}).capabilities.extractFromLiterature).toBe(true);
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ OPENAI_API_KEY: "", NCBI_EMAIL: "" });
    expect(config.openai.apiKey).toBeUndefined();
    expect(config.ncbi.email).toBeUndefined();
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ EXTRACTION_MODE: "fast" })).toThrow(ConfigError);
    expect(() => loadConfig({ NCBI_EMAIL: "not-an-email" })).toThrow(/NCBI_EMAIL/);
  });

  it("is frozen", () => {
    const config = loadConfig({ OPENAI_API_KEY: "test-secret" });
    expect(config.openai.apiKey).toBe("test-secret");
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.capabilities)).toBe(true);
    expect(Object.isFrozen(config.groundTruth.thresholds)).toBe(true);
  });
});
