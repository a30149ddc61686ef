import { describe, it, expect } from "vitest";
import { ResolvedOptions } from "./resolved-options";

describe("ResolvedOptions.merge", () => {
  const options = ResolvedOptions.merge({
    default: new Map<string, string | number>([
      ["bus", "can"],
      ["rate", 1],
      ["mode", "fast"],
    ]),
    "config-file": new Map<string, string | number>([
      ["bus", "lin"],
      ["rate", 10],
    ]),
    "command-line": new Map([["bus", "flexray"]]),
  });

  it("prefers command line over config file over default", () => {
    expect(options.get("bus")).toEqual({ value: "flexray", source: "command-line" });
    expect(options.get("rate")).toEqual({ value: 10, source: "config-file" });
    expect(options.get("mode")).toEqual({ value: "fast", source: "default" });
  });

  it("leaves options without any value out", () => {
    expect(options.has("output-directory")).toBe(false);
    expect(options.getString("output-directory")).toBeUndefined();
    expect(options.sourceOf("output-directory")).toBeUndefined();
  });

  it("returns typed values only for matching types", () => {
    expect(options.getInteger("rate")).toBe(10);
    expect(options.getString("rate")).toBeUndefined();
    expect(options.getFlag("bus")).toBe(false);
  });

  it("wraps a single string for list access", () => {
    expect(options.getStrings("bus")).toEqual(["flexray"]);
  });
});
