import { describe, expect, it } from "vitest";
import { getConfig } from "../config.js";
import { DEFAULT_INTENTS_FILE } from "../intents/store.js";

describe("getConfig", () => {
  it("uses defaults when nothing is set", () => {
    expect(getConfig({})).toEqual({
      resolver: { keywordThreshold: 75, intentsFile: DEFAULT_INTENTS_FILE },
      server: { port: 3002 },
    });
  });

  it("reads values from the environment", () => {
    const config = getConfig({ INTENT_KEYWORD_THRESHOLD: "60", INTENTS_FILE: "/tmp/custom.json", PORT: "8080" });
    expect(config.resolver).toEqual({ keywordThreshold: 60, intentsFile: "/tmp/custom.json" });
    expect(config.server.port).toBe(8080);
  });

  it("treats blank values as unset", () => {
    expect(getConfig({ INTENT_KEYWORD_THRESHOLD: "  ", PORT: "" }).resolver.keywordThreshold).toBe(75);
  });

  it("rejects an out-of-range threshold", () => {
    expect(() => getConfig({ INTENT_KEYWORD_THRESHOLD: "150" })).toThrow(/INTENT_KEYWORD_THRESHOLD/);
  });

  it("rejects a non-numeric port", () => {
    expect(() => getConfig({ PORT: "abc" })).toThrow(/PORT/);
  });
});
