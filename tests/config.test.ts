import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, writeFile, rm } from "node:fs/promises";
import path from "node:path";
import { tmpdir } from "node:os";
import { defaultConfig } from "../src/config/defaultConfig.js";
import { loadConfig, mergeWithDefaults, parseConfig } from "../src/config/loadConfig.js";

describe("mergeWithDefaults", () => {
  it("returns the defaults for an empty object", () => {
    expect(mergeWithDefaults({})).toEqual(defaultConfig);
  });

  it("merges nested objects key by key", () => {
    const merged = parseConfig({ report: { outputFile: "styled.html" } });
    expect(merged.report).toEqual({
      sourceFile: "report_data.html",
      outputFile: "styled.html",
      summaryFile: "custom_report.json"
    });
  });

  it("replaces arrays outright", () => {
    const merged = parseConfig({
      palette: { channelColors: [{ keyword: "RADIO", color: "#123456" }] }
    });
    expect(merged.palette.channelColors).toEqual([{ keyword: "RADIO", color: "#123456" }]);
    expect(merged.palette.primary).toBe("#6366f1");
  });

  it("lets null disable the summary file", () => {
    expect(parseConfig({ report: { summaryFile: null } }).report.summaryFile).toBeNull();
  });

  it("passes non-objects through for validation to reject", () => {
    expect(mergeWithDefaults([1, 2])).toEqual([1, 2]);
    expect(() => parseConfig("config")).toThrow("Invalid config: config: Expected object, received string");
  });

  it("does not mutate the defaults", () => {
    parseConfig({ title: "Q3 review", palette: { primary: "#000000" } });
    expect(defaultConfig.title).toBe("Media Mix Modeling Report");
    expect(defaultConfig.palette.primary).toBe("#6366f1");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "mmmr-cfg-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads a partial config file over the defaults", async () => {
    const cfgPath = path.join(dir, "config.json");
    await writeFile(
      cfgPath,
      JSON.stringify({
        title: "Quarterly media review",
        palette: { success: "#22c55e" }
      })
    );

    const config = await loadConfig(cfgPath);
    expect(config.title).toBe("Quarterly media review");
    expect(config.palette.success).toBe("#22c55e");
    expect(config.palette.secondary).toBe("#8b5cf6");
    expect(config.runtime).toEqual(defaultConfig.runtime);
  });

  it("throws on missing file with cause", async () => {
    const cfgPath = path.join(dir, "missing.json");
    await expect(loadConfig(cfgPath)).rejects.toMatchObject({
      message: `Unable to read config file at ${cfgPath}`,
      cause: expect.anything()
    });
  });

  it("throws on invalid JSON with cause", async () => {
    const cfgPath = path.join(dir, "bad.json");
    await writeFile(cfgPath, "not json{{{");

    await expect(loadConfig(cfgPath)).rejects.toMatchObject({
      message: `Invalid JSON in config file at ${cfgPath}`,
      cause: expect.any(SyntaxError)
    });
  });

  it("throws on Zod validation failure", async () => {
    const cfgPath = path.join(dir, "invalid.json");
    await writeFile(cfgPath, JSON.stringify({ palette: { primary: "blue" } }));

    await expect(loadConfig(cfgPath)).rejects.toThrow(
      "Invalid config: palette.primary: Colour must be a hex value such as #6366f1"
    );
  });

  it("rejects an output file outside the model folder", async () => {
    const cfgPath = path.join(dir, "escape.json");
    await writeFile(cfgPath, JSON.stringify({ report: { outputFile: "../elsewhere.html" } }));

    await expect(loadConfig(cfgPath)).rejects.toThrow(
      "Invalid config: report.outputFile: Must be a plain file name without directory separators"
    );
  });
});
