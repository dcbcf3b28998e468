import type { ExtractedMetrics } from "../extract/metrics.js";
import { describeFitQuality } from "../insights/engine.js";
import type { FitQualityTone, InsightRecord } from "../insights/engine.js";
import type { ModelIdentity } from "../model/record.js";
import type { RenderedCharts } from "./templates/reportTemplate.js";

export const SCHEMA_VERSION = "1.0.0";
export const SUMMARY_SCHEMA_URI = "urn:mmm-report-kit:summary:v1";

export type ChartStatus = "transformed" | "missing";

export interface SummaryArtifacts {
  source: string;
  report: string;
}

export interface CustomReportSummary {
  $schema: string;
  schemaVersion: string;
  toolVersion: string;
  generatedAt: string | null;
  model: ModelIdentity;
  fitScore: number | null;
  fitQuality: FitQualityTone | null;
  /** Discovery order, including channels without a usable ROI. */
  roiByChannel: Array<{ channel: string; roi: number | null }>;
  charts: Record<keyof RenderedCharts, ChartStatus>;
  insights: InsightRecord[];
  artifacts: SummaryArtifacts;
}

export interface SummaryInput {
  toolVersion: string;
  generatedAt: string | null;
  identity: ModelIdentity;
  metrics: ExtractedMetrics;
  charts: RenderedCharts;
  insights: InsightRecord[];
  artifacts: SummaryArtifacts;
}

function chartStatus(block: string | null): ChartStatus {
  return block === null ? "missing" : "transformed";
}

export function buildSummary(input: SummaryInput): CustomReportSummary {
  const { metrics } = input;
  return {
    $schema: SUMMARY_SCHEMA_URI,
    schemaVersion: SCHEMA_VERSION,
    toolVersion: input.toolVersion,
    generatedAt: input.generatedAt,
    model: { ...input.identity },
    fitScore: metrics.fitScore,
    fitQuality: metrics.fitScore === null ? null : describeFitQuality(metrics.fitScore).tone,
    roiByChannel: Array.from(metrics.roiByChannel, ([channel, roi]) => ({ channel, roi })),
    charts: {
      modelFit: chartStatus(input.charts.modelFit),
      contributionChannel: chartStatus(input.charts.contributionChannel)
    },
    insights: input.insights.map((insight) => ({ ...insight })),
    artifacts: { ...input.artifacts }
  };
}
