/**
 * Metric extraction from a generated model report.
 *
 * The report is HTML with the model's summary tables inline and chart data
 * embedded as JSON (sometimes inside an escaped string literal), so every
 * value here is found by a named pattern rather than by parsing a schema.
 */

export const BASELINE_CATEGORY = "baseline";

export interface ExtractedMetrics {
  readonly fitScore: number | null;
  /** Discovery order; `null` marks a channel seen without a usable ROI. */
  readonly roiByChannel: ReadonlyMap<string, number | null>;
}

interface NamedPattern {
  name: string;
  regex: RegExp;
}

// ---------------------------------------------------------------------------
// Patterns
// ---------------------------------------------------------------------------

const FIT_SCORE_PATTERNS: NamedPattern[] = [
  { name: "header-cell", regex: /<th>R-squared<\/th>[\s\S]*?<td[^>]*>([0-9.]+)<\/td>/ },
  { name: "label-anywhere", regex: /R-squared[\s\S]*?<td[^>]*>([0-9.]+)<\/td>/i }
];

// Tried in order; the `[^}]*` gap keeps a match inside one JSON object.
export const ROI_PATTERNS: readonly NamedPattern[] = [
  {
    name: "escaped-channel-first",
    regex: /\\"channel\\":\s*\\"([^\\"]+)\\"[^}]*\\"roi\\":\s*([0-9.]+)/g
  },
  { name: "raw-channel-first", regex: /"channel":\s*"([^"]+)"[^}]*"roi":\s*([0-9.]+)/g },
  {
    name: "escaped-roi-first",
    regex: /\\"roi\\":\s*([0-9.]+)[^}]*\\"channel\\":\s*\\"([^\\"]+)\\"/g
  },
  { name: "raw-roi-first", regex: /"roi":\s*([0-9.]+)[^}]*"channel":\s*"([^"]+)"/g }
];

export const CHANNEL_PATTERNS: readonly NamedPattern[] = [
  { name: "escaped-channel", regex: /\\"channel\\":\s*\\"([^\\"]+)\\"/g },
  { name: "raw-channel", regex: /"channel":\s*"([^"]+)"/g }
];

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const DECIMAL = /^(?:\d+\.?\d*|\.\d+)$/;

/** Parses `12`, `0.5`, `.5` or `1.`; anything else (`1.2.3`, `.`) is `null`. */
export function parseDecimal(raw: string): number | null {
  if (!DECIMAL.test(raw)) {
    return null;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

export function isBaselineCategory(name: string): boolean {
  return name.toLowerCase() === BASELINE_CATEGORY;
}

function cleanRoiText(raw: string): string {
  return raw
    .replace(/\.+$/, "")
    .replace(/,+$/, "")
    .replace(/[^0-9.]/g, "");
}

function* matchesOf(text: string, pattern: NamedPattern): Generator<RegExpMatchArray> {
  // Fresh instance so shared global regexes never leak lastIndex between calls.
  yield* text.matchAll(new RegExp(pattern.regex.source, pattern.regex.flags));
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

export function extractFitScore(sourceText: string): number | null {
  for (const pattern of FIT_SCORE_PATTERNS) {
    const match = pattern.regex.exec(sourceText);
    const captured = match?.[1];
    if (captured === undefined) {
      continue;
    }
    const value = parseDecimal(captured);
    if (value !== null) {
      return value;
    }
  }
  return null;
}

/**
 * Collects channel → ROI pairs from every JSON fragment in the report,
 * whichever key order and quoting the fragment uses. The first ROI found for
 * a channel is kept. Channels named anywhere without a parsable ROI are
 * appended with `null` after the pattern scan.
 */
export function extractRoiByChannel(sourceText: string): Map<string, number | null> {
  const roiByChannel = new Map<string, number | null>();
  const seenWithoutRoi = new Set<string>();

  for (const pattern of ROI_PATTERNS) {
    for (const match of matchesOf(sourceText, pattern)) {
      const first = (match[1] ?? "").trim();
      const second = (match[2] ?? "").trim();
      const [channel, roiText] = /^[A-Za-z]/.test(first) ? [first, second] : [second, first];

      if (isBaselineCategory(channel)) {
        continue;
      }

      const roi = parseDecimal(cleanRoiText(roiText));
      if (roi === null) {
        seenWithoutRoi.add(channel);
        continue;
      }
      if (!roiByChannel.has(channel)) {
        roiByChannel.set(channel, roi);
      }
    }
  }

  for (const pattern of CHANNEL_PATTERNS) {
    for (const match of matchesOf(sourceText, pattern)) {
      const channel = (match[1] ?? "").trim();
      if (!isBaselineCategory(channel)) {
        seenWithoutRoi.add(channel);
      }
    }
  }

  for (const channel of seenWithoutRoi) {
    if (!roiByChannel.has(channel)) {
      roiByChannel.set(channel, null);
    }
  }

  return roiByChannel;
}

export function emptyMetrics(): ExtractedMetrics {
  return Object.freeze({ fitScore: null, roiByChannel: new Map<string, number | null>() });
}

/** Never throws: any failure yields metrics with every field absent. */
export function extractMetrics(sourceText: string): ExtractedMetrics {
  try {
    return Object.freeze({
      fitScore: extractFitScore(sourceText),
      roiByChannel: extractRoiByChannel(sourceText)
    });
  } catch {
    return emptyMetrics();
  }
}

/** Channels with a usable ROI, highest first; ties keep discovery order. */
export function rankChannelsByRoi(
  roiByChannel: ReadonlyMap<string, number | null>
): Array<{ channel: string; roi: number }> {
  const ranked: Array<{ channel: string; roi: number }> = [];
  for (const [channel, roi] of roiByChannel) {
    if (roi !== null && !isBaselineCategory(channel)) {
      ranked.push({ channel, roi });
    }
  }
  return ranked.sort((a, b) => b.roi - a.roi);
}
