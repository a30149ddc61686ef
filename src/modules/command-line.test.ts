import { describe, it, expect } from "vitest";
import { CommandLineParser } from "./command-line";
import { buildOptionSchema } from "./schema";
import { ArgumentError } from "../utils/errors";
import { FakeConverter } from "../testing/fake-converter";

const parser = new CommandLineParser(
  "fakeconv",
  buildOptionSchema(new FakeConverter()),
);

describe("CommandLineParser.parse", () => {
  it("collects bare tokens as input files", () => {
    const result = parser.parse(["a.mf4", "b.mf4"]);
    expect(result.values.get("input-files")).toEqual(["a.mf4", "b.mf4"]);
    expect(result.unrecognized).toEqual([]);
  });

  it("reads the -i list", () => {
    const result = parser.parse(["-i", "x.mf4", "y.mf4"]);
    expect(result.values.get("input-files")).toEqual(["x.mf4", "y.mf4"]);
  });

  it("puts -i values before bare tokens", () => {
    const result = parser.parse(["a.mf4", "-i", "b.mf4"]);
    expect(result.values.get("input-files")).toEqual(["b.mf4", "a.mf4"]);
  });

  it("reads valued and flag options", () => {
    const result = parser.parse([
      "--verbose",
      "3",
      "-O",
      "out",
      "--non-interactive",
      "-t",
      "u",
    ]);

    expect(result.values.get("verbose")).toBe(3);
    expect(result.values.get("output-directory")).toBe("out");
    expect(result.values.get("non-interactive")).toBe(true);
    expect(result.values.get("timezone")).toBe("u");
  });

  it("reports only values given on the command line", () => {
    const result = parser.parse(["a.mf4"]);
    expect(result.values.has("verbose")).toBe(false);
    expect(result.values.has("help")).toBe(false);
  });

  it("splits combined short flags", () => {
    const result = parser.parse(["-hv"]);
    expect(result.values.get("help")).toBe(true);
    expect(result.values.get("version")).toBe(true);
  });

  it("accepts configuration-file options on the command line", () => {
    const result = parser.parse(["--rate", "5", "--bus=lin"]);
    expect(result.values.get("rate")).toBe(5);
    expect(result.values.get("bus")).toBe("lin");
  });

  it("collects every unknown flag and keeps parsing after it", () => {
    const result = parser.parse(["--bogus", "a.mf4", "-x", "--verbose", "2"]);

    expect(result.unrecognized).toEqual(["--bogus", "-x"]);
    expect(result.values.get("input-files")).toEqual(["a.mf4"]);
    expect(result.values.get("verbose")).toBe(2);
  });

  it("keeps negative numbers as option values", () => {
    expect(parser.parse(["--verbose", "-1"]).values.get("verbose")).toBe(-1);
  });

  it("throws for a value-taking option without a value", () => {
    expect(() => parser.parse(["-O"])).toThrow(ArgumentError);
    expect(() => parser.parse(["-O"])).toThrow(
      "option '-O, --output-directory <path>' argument missing",
    );
  });

  it("throws for a non-integer verbosity", () => {
    expect(() => parser.parse(["--verbose", "abc"])).toThrow(
      "option '--verbose <level>' argument 'abc' is invalid. Not an integer.",
    );
  });

  it("gives the same result for the same tokens", () => {
    const argv = ["-i", "a.mf4", "--mode", "slow", "--bogus"];
    expect(parser.parse(argv)).toEqual(parser.parse(argv));
  });
});

describe("CommandLineParser.helpInformation", () => {
  const help = parser.helpInformation();

  it("lists command-line options", () => {
    expect(help).toContain("-I, --input-directory <path>");
    expect(help).toContain("-i, --input-files <paths...>");
    expect(help).toContain("--mode <value>");
  });

  it("hides configuration-file options", () => {
    expect(help).not.toContain("--rate");
    expect(help).not.toContain("--bus");
  });
});
