import { describe, it, expect } from "vitest";
import {
  availableProviders,
  credentialFor,
  loadConfig,
  modelFor,
  validateConfig,
} from "../config.js";
import { ConfigurationError } from "../errors.js";
import { getSourcesByCategory, getSourceUrls, isSourceCategory } from "../sources.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});
    expect(config.DEFAULT_LLM_PROVIDER).toBe("openai");
    expect(config.MAX_TOKENS).toBe(4096);
    expect(config.DATA_DIR).toBe("data");
    expect(config.OUTPUT_DIR).toBe("outputs");
    expect(config.LOG_DIR).toBe("logs");
    expect(config.MAX_ARTICLES_PER_SOURCE).toBe(10);
    expect(config.FETCH_CONCURRENCY).toBe(3);
    expect(config.SEMANTIC_FILTER).toBe(true);
    expect(config.LOG_LEVEL).toBe("info");
  });

  it("coerces numbers and flags", () => {
    const config = loadConfig({ MAX_TOKENS: "1024", SEMANTIC_FILTER: "false" });
    expect(config.MAX_TOKENS).toBe(1024);
    expect(config.SEMANTIC_FILTER).toBe(false);
  });

  it("treats blank credentials as unset", () => {
    const config = loadConfig({ OPENAI_API_KEY: "  ", GEMINI_API_KEY: "test-secret" });
    expect(credentialFor(config, "openai")).toBeUndefined();
    expect(credentialFor(config, "gemini")).toBe("test-secret");
  });

  it("returns a frozen value", () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });

  it("names the offending variable on invalid input", () => {
    expect(() => loadConfig({ DEFAULT_LLM_PROVIDER: "mistral" })).toThrow(ConfigurationError);
    try {
      loadConfig({ MAX_TOKENS: "lots" });
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.configKey).toBe("MAX_TOKENS");
      }
    }
  });
});

describe("provider lookups", () => {
  it("lists providers with credentials in priority order", () => {
    const config = loadConfig({ GEMINI_API_KEY: "test-secret", ANTHROPIC_API_KEY: "test-secret" });
    expect(availableProviders(config)).toEqual(["anthropic", "gemini"]);
  });

  it("applies DEFAULT_LLM_MODEL only to the default provider", () => {
    const config = loadConfig({ DEFAULT_LLM_PROVIDER: "gemini", DEFAULT_LLM_MODEL: "gemini-1.5-pro" });
    expect(modelFor(config, "gemini")).toBe("gemini-1.5-pro");
    expect(modelFor(config, "openai")).toBe("gpt-4o-mini");
    expect(modelFor(config, "anthropic")).toBe("claude-3-haiku-20240307");
  });

  it("reports a missing credential as a problem", () => {
    expect(validateConfig(loadConfig({}))).toHaveLength(1);
    expect(validateConfig(loadConfig({ OPENAI_API_KEY: "test-secret" }))).toEqual([]);
  });
});

describe("source catalog", () => {
  it("falls back to the default set for unknown categories", () => {
    expect(getSourcesByCategory("nonsense")).toEqual(getSourcesByCategory("default"));
  });

  it("unions every category under all", () => {
    const all = getSourceUrls("all");
    for (const category of ["default", "international", "tech"]) {
      for (const url of getSourceUrls(category)) expect(all).toContain(url);
    }
    expect(all).toHaveLength(11);
  });

  it("recognises category names", () => {
    expect(isSourceCategory("tech")).toBe(true);
    expect(isSourceCategory("sports")).toBe(false);
  });
});
