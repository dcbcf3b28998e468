export type ChartKind = "modelFit" | "contributionChannel";

export interface ChartKindDefinition {
  /** Element id used by the source report; the first occurrence anchors the block. */
  marker: string;
  /** Element id the block carries in the restyled report. */
  targetId: string;
}

export const CHART_KINDS: Record<ChartKind, ChartKindDefinition> = {
  modelFit: {
    marker: "expected-actual-outcome-chart",
    targetId: "model-fit-chart"
  },
  contributionChannel: {
    marker: "channel-drivers-chart",
    targetId: "contribution-channel-chart"
  }
};

export const CHART_KIND_ORDER: readonly ChartKind[] = ["modelFit", "contributionChannel"];

// Alternative spellings of the chart container tag, tried in this order.
export const BLOCK_START_TAGS = ["<chart>", "<chart-embed"] as const;
export const BLOCK_END_TAG = "</script>";

/** Start of the last `tag` that ends at or before `limit`, or -1. */
function lastIndexEndingBefore(text: string, tag: string, limit: number): number {
  const fromIndex = limit - tag.length;
  if (fromIndex < 0) {
    return -1;
  }
  return text.lastIndexOf(tag, fromIndex);
}

/**
 * Isolates the section of the report that holds one chart: from the nearest
 * container tag before the kind's marker through the first closing script
 * tag after it. `null` when any boundary is missing.
 */
export function locateChartBlock(sourceText: string, kind: ChartKind): string | null {
  const { marker } = CHART_KINDS[kind];
  const markerIndex = sourceText.indexOf(marker);
  if (markerIndex === -1) {
    return null;
  }

  let start = -1;
  for (const tag of BLOCK_START_TAGS) {
    start = lastIndexEndingBefore(sourceText, tag, markerIndex);
    if (start !== -1) {
      break;
    }
  }
  if (start === -1) {
    return null;
  }

  const endIndex = sourceText.indexOf(BLOCK_END_TAG, markerIndex);
  if (endIndex === -1) {
    return null;
  }

  return sourceText.slice(start, endIndex + BLOCK_END_TAG.length);
}
