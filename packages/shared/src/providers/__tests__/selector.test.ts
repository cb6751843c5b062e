import { describe, it, expect } from "vitest";
import { ConfigurationError } from "../../errors.js";
import { selectProvider } from "../selector.js";

describe("selectProvider", () => {
  it("returns the requested provider when it has a credential", () => {
    expect(selectProvider("gemini", ["openai", "gemini"])).toEqual({
      requested: "gemini",
      provider: "gemini",
      substituted: false,
    });
  });

  it("falls back in priority order when the requested provider is missing", () => {
    const selection = selectProvider("anthropic", new Set(["gemini", "openai"] as const));
    expect(selection.provider).toBe("openai");
    expect(selection.substituted).toBe(true);
    expect(selection.requested).toBe("anthropic");
  });

  it("never returns the unavailable provider", () => {
    for (const available of [["openai"], ["gemini"], ["openai", "gemini"]] as const) {
      expect(selectProvider("anthropic", available).provider).not.toBe("anthropic");
    }
  });

  it("honours a custom priority list", () => {
    const selection = selectProvider("anthropic", ["openai", "gemini"], [
      "gemini",
      "openai",
      "anthropic",
    ]);
    expect(selection.provider).toBe("gemini");
  });

  it("throws a ConfigurationError when nothing is available", () => {
    expect(() => selectProvider("openai", [])).toThrow(ConfigurationError);
    try {
      selectProvider("gemini", []);
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.configKey).toBe("API_KEYS");
        expect(error.code).toBe("CONFIG_ERROR");
      }
    }
  });
});
