import { CHART_KIND_ORDER } from "../charts/locator.js";
import { locateAndTransform } from "../charts/transform.js";
import type { Config } from "../config/schema.js";
import { extractMetrics } from "../extract/metrics.js";
import type { ExtractedMetrics } from "../extract/metrics.js";
import { generateInsights } from "../insights/engine.js";
import type { InsightRecord } from "../insights/engine.js";
import type { ModelRecord } from "../model/record.js";
import type { Logger } from "../utils/logger.js";
import { StepTimer } from "../utils/timing.js";
import { buildHtmlReport } from "./html.js";
import type { RenderedCharts } from "./templates/reportTemplate.js";

export interface CustomReportOptions {
  config: Config;
  generatedAt: string | null;
  logger?: Logger;
}

export interface CustomReport {
  metrics: ExtractedMetrics;
  charts: RenderedCharts;
  insights: InsightRecord[];
  html: string;
}

/**
 * Runs extraction, chart restyling, insight generation and rendering over an
 * already loaded model record. Steps that fail degrade to placeholders; this
 * function does no I/O.
 */
export function buildCustomReport(
  record: Pick<ModelRecord, "identity" | "reportText">,
  options: CustomReportOptions
): CustomReport {
  const { config } = options;
  const logger = options.logger?.child("pipeline");
  const timer = StepTimer.start("custom-report");

  const metrics = extractMetrics(record.reportText);
  const withRoi = Array.from(metrics.roiByChannel.values()).filter((roi) => roi !== null).length;
  logger?.debug("Metrics extracted", {
    fitScore: metrics.fitScore,
    channels: metrics.roiByChannel.size,
    channelsWithRoi: withRoi,
    ms: timer.step("metrics").durationMs
  });

  const charts: RenderedCharts = { modelFit: null, contributionChannel: null };
  for (const kind of CHART_KIND_ORDER) {
    charts[kind] = locateAndTransform(record.reportText, kind, {
      palette: config.palette,
      logger: options.logger?.child("charts")
    });
  }
  logger?.debug("Chart blocks processed", {
    modelFit: charts.modelFit !== null,
    contributionChannel: charts.contributionChannel !== null,
    ms: timer.step("charts").durationMs
  });

  const insights = generateInsights(metrics.fitScore, metrics.roiByChannel);
  logger?.debug("Insights generated", {
    count: insights.length,
    ms: timer.step("insights").durationMs
  });

  const html = buildHtmlReport({
    title: config.title,
    identity: record.identity,
    metrics,
    charts,
    insights,
    runtime: config.runtime,
    palette: config.palette,
    generatedAt: options.generatedAt
  });
  timer.step("render");

  const result = timer.finish();
  logger?.debug("Report rendered", { bytes: html.length, totalMs: result.totalMs });

  return { metrics, charts, insights, html };
}
