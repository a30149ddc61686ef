import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { resolveOptions } from "./resolver";
import { buildOptionSchema } from "./schema";
import { ConfigFileError, PluginError } from "../utils/errors";
import { FakeConverter } from "../testing/fake-converter";
import type { ResolvedOptions } from "../utils/resolved-options";
import type { ParseStatus } from "../types";

describe("resolveOptions", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "resolver-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function resolve(argv: string[], plugin = new FakeConverter()) {
    return resolveOptions(argv, plugin, buildOptionSchema(plugin), { cwd: dir });
  }

  describe("status", () => {
    it("requests help when there are no arguments", async () => {
      const { status } = await resolve([]);
      expect(status.helpRequested).toBe(true);
      expect(status.noInputFiles).toBe(true);
      expect(status.unrecognizedOptions).toBe(false);
    });

    it("sets help and version together", async () => {
      const { status } = await resolve(["-h", "--version", "a.mf4"]);
      expect(status).toEqual({
        helpRequested: true,
        versionRequested: true,
        unrecognizedOptions: false,
        noInputFiles: false,
      });
    });

    it("flags unknown tokens", async () => {
      const result = await resolve(["--bogus", "a.mf4"]);
      expect(result.status.unrecognizedOptions).toBe(true);
      expect(result.unrecognized).toEqual(["--bogus"]);
    });

    it("merges the status returned by the plugin", async () => {
      const plugin = new FakeConverter({ status: { versionRequested: true } });
      const { status } = await resolve(["a.mf4"], plugin);
      expect(status.versionRequested).toBe(true);
    });

    it("wraps errors thrown by the plugin", async () => {
      class BrokenConverter extends FakeConverter {
        parseOptions(_options: ResolvedOptions): Partial<ParseStatus> {
          throw new Error("bad mode");
        }
      }

      await expect(resolve(["a.mf4"], new BrokenConverter())).rejects.toThrow(
        new PluginError(
          "Error occurred during specialized input argument parsing: bad mode",
        ),
      );
    });
  });

  describe("verbosity", () => {
    it("maps the level", async () => {
      expect((await resolve(["a.mf4"])).logLevel).toBe("error");
      expect((await resolve(["--verbose", "0", "a.mf4"])).logLevel).toBe("fatal");
      expect((await resolve(["--verbose", "4", "a.mf4"])).logLevel).toBe("debug");
    });

    it.each(["6", "-1", "42"])("treats %s as unrecognized", async (value) => {
      const result = await resolve(["--verbose", value, "a.mf4"]);
      expect(result.status.unrecognizedOptions).toBe(true);
      expect(result.unrecognized).toEqual([`--verbose ${value}`]);
      expect(result.logLevel).toBe("error");
    });
  });

  describe("common options", () => {
    it("hands the resolved settings to the plugin", async () => {
      const plugin = new FakeConverter();
      const result = await resolve(["--non-interactive", "-t", "u", "a.mf4"], plugin);

      expect(result.common).toEqual({ nonInteractive: true, timeDisplay: "utc" });
      expect(plugin.receivedCommon).toBe(result.common);
      expect(Object.isFrozen(result.common)).toBe(true);
    });

    it("defaults to logger local time", async () => {
      expect((await resolve(["a.mf4"])).common.timeDisplay).toBe("logger-local");
      expect((await resolve(["-t", "", "a.mf4"])).common.timeDisplay).toBe(
        "logger-local",
      );
      expect((await resolve(["-t", "p", "a.mf4"])).common.timeDisplay).toBe(
        "pc-local",
      );
    });
  });

  describe("configuration file", () => {
    const configured = () => new FakeConverter({ configFile: true });

    it("lets the command line win over the file and the file over defaults", async () => {
      await writeFile(path.join(dir, "fakeconv_config.ini"), "bus=lin\nrate=10\n");

      const { options } = await resolve(["--bus", "flexray", "a.mf4"], configured());

      expect(options.get("bus")).toEqual({ value: "flexray", source: "command-line" });
      expect(options.get("rate")).toEqual({ value: 10, source: "config-file" });
      expect(options.get("mode")).toEqual({ value: "fast", source: "default" });
    });

    it("records a missing file for later logging", async () => {
      const { deferred } = await resolve(["a.mf4"], configured());
      expect(deferred).toEqual([
        { level: "info", message: "No configuration file found, skipping." },
      ]);
    });

    it("skips the lookup when the plugin has no configuration file", async () => {
      const { deferred } = await resolve(["a.mf4"]);
      expect(deferred).toEqual([]);
    });

    it("reports unknown keys at debug level", async () => {
      await writeFile(path.join(dir, "fakeconv_config.ini"), "colour=red\n");

      const { deferred } = await resolve(["a.mf4"], configured());
      expect(deferred).toContainEqual({
        level: "debug",
        message: 'Ignoring unknown configuration file key "colour".',
      });
    });

    it("fails on an invalid value", async () => {
      await writeFile(path.join(dir, "fakeconv_config.ini"), "rate=abc\n");
      await expect(resolve(["a.mf4"], configured())).rejects.toThrow(ConfigFileError);
    });
  });

  describe("input files", () => {
    it("keeps explicit files in command-line order", async () => {
      const { inputFiles, status } = await resolve(["y.mf4", "x.mf4"]);
      expect(inputFiles).toEqual(["y.mf4", "x.mf4"]);
      expect(status.noInputFiles).toBe(false);
    });

    it("reports no inputs when neither files nor a directory are given", async () => {
      const { inputFiles, status } = await resolve(["--verbose", "2"]);
      expect(inputFiles).toEqual([]);
      expect(status.noInputFiles).toBe(true);
    });

    it("lists matching files of the input directory and ignores explicit files", async () => {
      const input = path.join(dir, "input");
      await mkdir(path.join(input, "nested.mf4"), { recursive: true });
      for (const name of ["m.mf4", "b.mf4", "c.txt", "z.mf4", "a.mf4", "d.MF4"]) {
        await writeFile(path.join(input, name), name);
      }

      const result = await resolve(["-I", "input", "other.mf4"]);

      const directoryOrder = (await readdir(input, { withFileTypes: true }))
        .filter((entry) => entry.isFile() && path.extname(entry.name) === ".mf4")
        .map((entry) => path.join(input, entry.name));

      expect(directoryOrder).toHaveLength(4);
      expect(result.inputFiles).toEqual(directoryOrder);
    });

    it("logs a missing input directory and leaves the batch empty", async () => {
      const result = await resolve(["-I", "missing"]);

      expect(result.inputFiles).toEqual([]);
      expect(result.status.noInputFiles).toBe(false);
      expect(result.deferred).toEqual([
        {
          level: "error",
          message: `Input directory does not exist: ${path.join(dir, "missing")}`,
        },
      ]);
    });

    it("resolves the same argv identically", async () => {
      const input = path.join(dir, "input");
      await mkdir(input);
      for (const name of ["c.mf4", "a.mf4", "b.mf4"]) {
        await writeFile(path.join(input, name), name);
      }

      const argv = ["-I", "input", "--mode", "slow", "-O", "out"];
      const first = await resolve(argv);
      const second = await resolve(argv);

      expect(second.options.toJSON()).toEqual(first.options.toJSON());
      expect(second.inputFiles).toEqual(first.inputFiles);
      expect(second.status).toEqual(first.status);
    });
  });
});
