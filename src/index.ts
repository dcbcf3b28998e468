import path from "node:path";
import { createRequire } from "node:module";
import { defaultConfig } from "./config/defaultConfig.js";
import { formatZodError, loadConfig } from "./config/loadConfig.js";
import { ReportFilesSchema } from "./config/schema.js";
import type { Config, ReportFiles } from "./config/schema.js";
import type { InsightRecord } from "./insights/engine.js";
import { loadModelRecord } from "./model/record.js";
import { buildCustomReport } from "./report/customReport.js";
import { buildSummary } from "./report/summary.js";
import { validatePathWithinBase, writeJson, writeText } from "./utils/fs.js";
import { errorMessage, ModelRecordError, UsageError } from "./utils/errors.js";
import { createLogger } from "./utils/logger.js";
import type { LogFormat, Logger } from "./utils/logger.js";
import { durationMs, nowIso } from "./utils/timing.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

export { extractMetrics, extractFitScore, extractRoiByChannel } from "./extract/metrics.js";
export type { ExtractedMetrics } from "./extract/metrics.js";
export { locateChartBlock, CHART_KINDS } from "./charts/locator.js";
export type { ChartKind } from "./charts/locator.js";
export { locateAndTransform, readChartBlock, transformChartBlock } from "./charts/transform.js";
export type { ChartBlock } from "./charts/transform.js";
export { generateInsights, describeFitQuality } from "./insights/engine.js";
export type { InsightRecord, InsightCategory } from "./insights/engine.js";
export { buildHtmlReport } from "./report/html.js";
export type { ReportInput } from "./report/templates/reportTemplate.js";
export { buildCustomReport } from "./report/customReport.js";
export { loadModelRecord } from "./model/record.js";
export type { ModelIdentity, ModelRecord } from "./model/record.js";
export type { CustomReportSummary } from "./report/summary.js";
export type { Config } from "./config/schema.js";
export { ModelRecordError, UsageError } from "./utils/errors.js";

export interface RunOptions {
  /** Path to a JSON config file; the built-in defaults apply when omitted. */
  config?: string;
  /** Overrides `report.outputFile`. */
  out?: string;
  /** `false` skips the JSON summary even when the config names a file. */
  summary?: boolean;
  verbose?: boolean;
  logFormat?: LogFormat;
  logger?: Logger;
  /** Timestamp stamped into both artifacts; defaults to the current time. */
  generatedAt?: string;
}

export interface RunResult {
  exitCode: number;
  reportPath: string;
  summaryPath: string | null;
  insights: InsightRecord[];
}

async function resolveConfig(options: RunOptions): Promise<Config> {
  let config: Config = defaultConfig;
  if (options.config) {
    try {
      config = await loadConfig(path.resolve(process.cwd(), options.config));
    } catch (error) {
      throw new UsageError(errorMessage(error), { cause: error });
    }
  }

  const report: ReportFiles = {
    ...config.report,
    ...(options.summary === false ? { summaryFile: null } : {}),
    ...(options.out !== undefined ? { outputFile: options.out } : {})
  };
  const result = ReportFilesSchema.safeParse(report);
  if (!result.success) {
    throw new UsageError(`Invalid output options: ${formatZodError(result.error)}`);
  }
  return { ...config, report: result.data };
}

function artifactPath(modelDir: string, fileName: string): string {
  const target = path.join(modelDir, fileName);
  try {
    validatePathWithinBase(target, modelDir);
  } catch (error) {
    throw new UsageError(errorMessage(error), { cause: error });
  }
  return target;
}

/**
 * Produces the restyled report (and JSON summary) for one stored model.
 * Throws `UsageError` for bad options and `ModelRecordError` when the model
 * cannot be read; nothing is written in either case.
 */
export async function runCustomReport(modelDir: string, options: RunOptions = {}): Promise<RunResult> {
  const logger =
    options.logger ?? createLogger({ verbose: options.verbose ?? false, format: options.logFormat });
  const startTime = Date.now();
  const config = await resolveConfig(options);

  const record = await loadModelRecord(modelDir, { sourceFile: config.report.sourceFile });
  logger.info("Loaded model", { folder: record.identity.folder, path: record.path });

  const reportPath = artifactPath(record.path, config.report.outputFile);
  const summaryPath =
    config.report.summaryFile === null ? null : artifactPath(record.path, config.report.summaryFile);

  const generatedAt = options.generatedAt ?? nowIso();
  const report = buildCustomReport(record, { config, generatedAt, logger });

  if (report.metrics.fitScore === null) {
    logger.warn("Fit score not found in source report", { file: config.report.sourceFile });
  }
  for (const [kind, block] of Object.entries(report.charts)) {
    if (block === null) {
      logger.warn("Chart block missing, placeholder rendered", { kind });
    }
  }

  await writeText(reportPath, report.html);
  logger.info("Report written", { path: reportPath, insights: report.insights.length });

  if (summaryPath !== null) {
    const summary = buildSummary({
      toolVersion: pkg.version,
      generatedAt,
      identity: record.identity,
      metrics: report.metrics,
      charts: report.charts,
      insights: report.insights,
      artifacts: { source: config.report.sourceFile, report: config.report.outputFile }
    });
    await writeJson(summaryPath, summary);
    logger.info("Summary written", { path: summaryPath });
  }

  logger.debug("Run finished", { durationMs: durationMs(startTime) });
  return { exitCode: 0, reportPath, summaryPath, insights: report.insights };
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof UsageError || error instanceof ModelRecordError) {
    return error.exitCode;
  }
  return 1;
}
