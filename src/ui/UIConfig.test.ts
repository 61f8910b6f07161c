import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG, mergeConfig } from "./UIConfig";
import { FontInfo } from "./FontRegistry";

describe("mergeConfig", () => {
  it("returns the defaults for an empty partial", () => {
    const config = mergeConfig({});

    expect(config.alignment.bypassKinds).toEqual(["selectable", "combo"]);
    expect(config.autoComplete).toEqual({ maxMatches: 5, confirmKey: "Enter" });
    expect(config.fonts.default.key).toBe("default:13");
    expect(config.warnings).toBe(true);
  });

  it("overrides single fields without dropping their siblings", () => {
    const config = mergeConfig({ autoComplete: { maxMatches: 2 } });

    expect(config.autoComplete.maxMatches).toBe(2);
    expect(config.autoComplete.confirmKey).toBe("Enter");
  });

  it("replaces whole sections and flags", () => {
    const config = mergeConfig({
      alignment: { bypassKinds: [] },
      fonts: { default: new FontInfo("Inter", 15) },
      warnings: false,
    });

    expect(config.alignment.bypassKinds).toEqual([]);
    expect(config.fonts.default.key).toBe("Inter:15");
    expect(config.warnings).toBe(false);
  });

  it("leaves DEFAULT_CONFIG untouched", () => {
    mergeConfig({ autoComplete: { confirmKey: "Tab" } });
    expect(DEFAULT_CONFIG.autoComplete.confirmKey).toBe("Enter");
  });
});
