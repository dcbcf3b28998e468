import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { exitCodeFor, runCustomReport } from "../src/index.js";
import { errorMessage, ModelRecordError, UsageError } from "../src/utils/errors.js";
import { pathExists } from "../src/utils/fs.js";
import { buildReportHtml } from "./helpers/reportFixture.js";
import { createTestLogger } from "./helpers/testLogger.js";

const GENERATED_AT = "2025-01-01T00:00:00.000Z";

describe("runCustomReport", () => {
  let root: string;
  let modelDir: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "mmmr-run-"));
    modelDir = path.join(root, "model_20240301");
    await mkdir(modelDir);
    await writeFile(path.join(modelDir, "report_data.html"), buildReportHtml(), "utf8");
    await writeFile(
      path.join(modelDir, "metadata.yaml"),
      "created_at: '2024-03-01T09:30:00'\ndate_range:\n  start: '2023-01-02'\n  end: '2023-12-25'\n",
      "utf8"
    );
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("writes the report and summary beside the source report", async () => {
    const logger = createTestLogger();
    const result = await runCustomReport(modelDir, { logger, generatedAt: GENERATED_AT });

    expect(result.exitCode).toBe(0);
    expect(result.reportPath).toBe(path.join(modelDir, "custom_report.html"));
    expect(result.summaryPath).toBe(path.join(modelDir, "custom_report.json"));
    expect(result.insights).toHaveLength(4);

    const html = await readFile(result.reportPath, "utf8");
    expect(html).toContain('id="model-fit-chart"');
    expect(html).toContain('id="contribution-channel-chart"');
    expect(html).toContain("<span>Period: 2023-01-02 → 2023-12-25</span>");
    expect(html).toContain(`Generated ${GENERATED_AT}`);

    const summary: unknown = JSON.parse(await readFile(path.join(modelDir, "custom_report.json"), "utf8"));
    expect(summary).toMatchObject({
      schemaVersion: "1.0.0",
      toolVersion: "0.1.0",
      generatedAt: GENERATED_AT,
      model: {
        folder: "model_20240301",
        createdAt: "2024-03-01T09:30:00",
        periodStart: "2023-01-02",
        periodEnd: "2023-12-25"
      },
      fitScore: 0.812,
      fitQuality: "excellent",
      roiByChannel: [
        { channel: "Facebook", roi: 2.1 },
        { channel: "Google Ads", roi: 1.3 },
        { channel: "TikTok", roi: 0.6 }
      ],
      charts: { modelFit: "transformed", contributionChannel: "transformed" },
      artifacts: { source: "report_data.html", report: "custom_report.html" }
    });
  });

  it("leaves the source report untouched", async () => {
    await runCustomReport(modelDir, { logger: createTestLogger(), generatedAt: GENERATED_AT });
    expect(await readFile(path.join(modelDir, "report_data.html"), "utf8")).toBe(buildReportHtml());
  });

  it("produces identical output on a second run", async () => {
    const first = await runCustomReport(modelDir, { logger: createTestLogger(), generatedAt: GENERATED_AT });
    const firstHtml = await readFile(first.reportPath, "utf8");
    await runCustomReport(modelDir, { logger: createTestLogger(), generatedAt: GENERATED_AT });
    expect(await readFile(first.reportPath, "utf8")).toBe(firstHtml);
  });

  it("logs progress and missing charts", async () => {
    await writeFile(
      path.join(modelDir, "report_data.html"),
      buildReportHtml({ fitScore: null, contribution: null }),
      "utf8"
    );
    const logger = createTestLogger();
    await runCustomReport(modelDir, { logger, generatedAt: GENERATED_AT });

    expect(logger.info.mock.calls.map(([message]) => message)).toEqual([
      "Loaded model",
      "Report written",
      "Summary written"
    ]);
    expect(logger.warn).toHaveBeenCalledWith("Fit score not found in source report", {
      file: "report_data.html"
    });
    expect(logger.warn).toHaveBeenCalledWith("Chart block missing, placeholder rendered", {
      kind: "contributionChannel"
    });
  });

  it("honours --out and --no-summary", async () => {
    const result = await runCustomReport(modelDir, {
      logger: createTestLogger(),
      out: "styled.html",
      summary: false
    });

    expect(result.reportPath).toBe(path.join(modelDir, "styled.html"));
    expect(result.summaryPath).toBeNull();
    expect(await pathExists(path.join(modelDir, "styled.html"))).toBe(true);
    expect(await pathExists(path.join(modelDir, "custom_report.json"))).toBe(false);
  });

  it("applies a config file", async () => {
    const configPath = path.join(root, "config.json");
    await writeFile(
      configPath,
      JSON.stringify({ title: "Quarterly review", report: { summaryFile: null } }),
      "utf8"
    );

    const result = await runCustomReport(modelDir, { logger: createTestLogger(), config: configPath });
    expect(result.summaryPath).toBeNull();
    expect(await readFile(result.reportPath, "utf8")).toContain("<h1>Quarterly review</h1>");
  });

  it("rejects an output file that would overwrite the source", async () => {
    await expect(
      runCustomReport(modelDir, { logger: createTestLogger(), out: "report_data.html" })
    ).rejects.toBeInstanceOf(UsageError);
    expect(await pathExists(path.join(modelDir, "custom_report.html"))).toBe(false);
  });

  it("rejects an output file that would be overwritten by the summary", async () => {
    const error: unknown = await runCustomReport(modelDir, {
      logger: createTestLogger(),
      out: "custom_report.json"
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UsageError);
    expect(errorMessage(error)).toBe(
      "Invalid output options: summaryFile: summaryFile must differ from sourceFile and outputFile"
    );
    expect(await pathExists(path.join(modelDir, "custom_report.json"))).toBe(false);
  });

  it("allows the summary file name as output when no summary is written", async () => {
    const result = await runCustomReport(modelDir, {
      logger: createTestLogger(),
      out: "custom_report.json",
      summary: false
    });

    expect(result.summaryPath).toBeNull();
    expect(await readFile(result.reportPath, "utf8")).toMatch(/^<!doctype html>/);
  });

  it("rejects an output name inside a subfolder", async () => {
    const error: unknown = await runCustomReport(modelDir, {
      logger: createTestLogger(),
      out: "sub/x.html"
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UsageError);
    expect(errorMessage(error)).toBe(
      "Invalid output options: outputFile: Must be a plain file name without directory separators"
    );
    expect(await pathExists(path.join(modelDir, "sub"))).toBe(false);
  });

  it("rejects an output path outside the model folder", async () => {
    await expect(
      runCustomReport(modelDir, { logger: createTestLogger(), out: "../escape.html" })
    ).rejects.toThrow(UsageError);
    expect(await pathExists(path.join(root, "escape.html"))).toBe(false);
  });

  it("reports an invalid config file as a usage error", async () => {
    const configPath = path.join(root, "bad.json");
    await writeFile(configPath, JSON.stringify({ palette: { primary: "blue" } }), "utf8");

    const error: unknown = await runCustomReport(modelDir, {
      logger: createTestLogger(),
      config: configPath
    }).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(UsageError);
    expect(exitCodeFor(error)).toBe(2);
  });

  it("fails for a missing model folder", async () => {
    const error: unknown = await runCustomReport(path.join(root, "missing"), {
      logger: createTestLogger()
    }).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ModelRecordError);
    expect(exitCodeFor(error)).toBe(1);
  });
});

describe("exitCodeFor", () => {
  it("maps unknown errors to 1", () => {
    expect(exitCodeFor(new Error("boom"))).toBe(1);
    expect(exitCodeFor("boom")).toBe(1);
  });
});
