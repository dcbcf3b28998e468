import { defaultConfig } from "../config/defaultConfig.js";
import type { Palette } from "../config/schema.js";
import { BASELINE_CATEGORY } from "../extract/metrics.js";
import type { Logger } from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";
import { CHART_KINDS, locateChartBlock } from "./locator.js";
import type { ChartKind } from "./locator.js";
import {
  decodeEmbeddedSpec,
  encodeEmbeddedSpec,
  findEmbeddedSpecLiteral,
  isJsonObject
} from "./specCodec.js";
import type { JsonObject, JsonValue } from "./specCodec.js";

export interface ChartBlock {
  kind: ChartKind;
  rawText: string;
  /** `null` when the block carries no embedded specification literal. */
  spec: JsonObject | null;
}

export interface TransformOptions {
  palette?: Palette;
  logger?: Logger;
}

const DESCRIPTION_ELEMENT = /<chart-description>[\s\S]*?<\/chart-description>/g;

// ---------------------------------------------------------------------------
// Spec traversal
// ---------------------------------------------------------------------------

function colorEncodings(spec: JsonObject): JsonObject[] {
  const layers = spec.layer;
  if (!Array.isArray(layers)) {
    return [];
  }
  const encodings: JsonObject[] = [];
  for (const layer of layers) {
    if (!isJsonObject(layer) || !isJsonObject(layer.encoding)) {
      continue;
    }
    const color = layer.encoding.color;
    if (isJsonObject(color)) {
      encodings.push(color);
    }
  }
  return encodings;
}

function clearTitle(spec: JsonObject): void {
  if ("title" in spec) {
    spec.title = null;
  }
}

function containsIgnoreCase(haystack: JsonValue | undefined, needle: string): boolean {
  return typeof haystack === "string" && haystack.toLowerCase().includes(needle.toLowerCase());
}

/** First keyword contained in the value (case-insensitive), else the primary colour. */
export function colorForChannel(value: JsonValue, palette: Palette): string {
  const upper = String(value).toUpperCase();
  const entry = palette.channelColors.find(({ keyword }) => upper.includes(keyword.toUpperCase()));
  return entry ? entry.color : palette.primary;
}

function colorForSeries(value: JsonValue, palette: Palette): string {
  const lower = String(value).toLowerCase();
  if (lower.includes("expected")) {
    return palette.primary;
  }
  if (lower.includes("actual")) {
    return palette.success;
  }
  return palette.primary;
}

// ---------------------------------------------------------------------------
// Kind-specific mutations
// ---------------------------------------------------------------------------

/** Recolours the contribution chart; the baseline bucket keeps its own colour. */
export function restyleContributionSpec(spec: JsonObject, palette: Palette): void {
  for (const color of colorEncodings(spec)) {
    if ("condition" in color) {
      const condition = color.condition;
      if (isJsonObject(condition) && containsIgnoreCase(condition.test, BASELINE_CATEGORY)) {
        condition.value = palette.secondary;
      }
      if ("value" in color) {
        color.value = palette.primary;
      }
      continue;
    }

    const scale = color.scale;
    if (isJsonObject(scale) && "range" in scale) {
      const domain = Array.isArray(scale.domain) ? scale.domain : [];
      const range = domain.map((value) => colorForChannel(value, palette));
      if (range.length > 0) {
        scale.range = range;
      }
    }
  }
  clearTitle(spec);
}

/** Drops the baseline series from the model-fit chart and recolours the rest. */
export function restyleModelFitSpec(spec: JsonObject, palette: Palette): void {
  const datasets = spec.datasets;
  if (isJsonObject(datasets)) {
    for (const [name, rows] of Object.entries(datasets)) {
      if (Array.isArray(rows)) {
        datasets[name] = rows.filter(
          (row) => !(isJsonObject(row) && row.type === BASELINE_CATEGORY)
        );
      }
    }
  }

  for (const color of colorEncodings(spec)) {
    const scale = color.scale;
    if (isJsonObject(scale) && Array.isArray(scale.domain)) {
      const domain = scale.domain.filter((value) => value !== BASELINE_CATEGORY);
      scale.domain = domain;
      if ("range" in scale) {
        scale.range = domain.map((value) => colorForSeries(value, palette)).slice(0, domain.length);
      }
      continue;
    }

    if ("condition" in color) {
      if ("value" in color) {
        color.value = palette.primary;
      }
      const condition = color.condition;
      if (isJsonObject(condition) && "value" in condition) {
        if (containsIgnoreCase(condition.test, "expected")) {
          condition.value = palette.primary;
        } else if (containsIgnoreCase(condition.test, "actual")) {
          condition.value = palette.success;
        }
      }
    }
  }
  clearTitle(spec);
}

const RESTYLERS: Record<ChartKind, (spec: JsonObject, palette: Palette) => void> = {
  modelFit: restyleModelFitSpec,
  contributionChannel: restyleContributionSpec
};

// ---------------------------------------------------------------------------
// Block-level operations
// ---------------------------------------------------------------------------

/** Points every reference to the source element id at the kind's new id. */
export function renameChartElement(blockText: string, kind: ChartKind): string {
  const { marker, targetId } = CHART_KINDS[kind];
  return blockText
    .replaceAll(`id="${marker}"`, () => `id="${targetId}"`)
    .replaceAll(`#${marker}`, () => `#${targetId}`)
    .replaceAll(marker, () => targetId);
}

export function stripChartDescriptions(blockText: string): string {
  return blockText.replace(DESCRIPTION_ELEMENT, "");
}

/** Locates a chart block and decodes its specification, if it embeds one. */
export function readChartBlock(sourceText: string, kind: ChartKind): ChartBlock | null {
  const rawText = locateChartBlock(sourceText, kind);
  if (rawText === null) {
    return null;
  }
  try {
    const literal = findEmbeddedSpecLiteral(rawText);
    return { kind, rawText, spec: literal === null ? null : decodeEmbeddedSpec(literal) };
  } catch {
    return null;
  }
}

/**
 * Applies the kind's restyling to one located block and returns the new block
 * text. The whole block is `null` if any step fails; partially rewritten
 * text is never returned.
 */
export function transformChartBlock(
  blockText: string,
  kind: ChartKind,
  options: TransformOptions = {}
): string | null {
  const palette = options.palette ?? defaultConfig.palette;
  try {
    let result = blockText;

    const literal = findEmbeddedSpecLiteral(blockText);
    if (literal !== null) {
      const spec = decodeEmbeddedSpec(literal);
      RESTYLERS[kind](spec, palette);
      const encoded = encodeEmbeddedSpec(spec);
      result = result.replaceAll(literal, () => encoded);
    }

    return renameChartElement(stripChartDescriptions(result), kind);
  } catch (error) {
    options.logger?.warn("Chart block could not be transformed", {
      kind,
      reason: errorMessage(error)
    });
    return null;
  }
}

export function locateAndTransform(
  sourceText: string,
  kind: ChartKind,
  options: TransformOptions = {}
): string | null {
  const blockText = locateChartBlock(sourceText, kind);
  if (blockText === null) {
    options.logger?.debug("Chart block not found", { kind, marker: CHART_KINDS[kind].marker });
    return null;
  }
  return transformChartBlock(blockText, kind, options);
}
