import type { ChartRuntime, Palette } from "../../config/schema.js";
import { rankChannelsByRoi } from "../../extract/metrics.js";
import type { ExtractedMetrics } from "../../extract/metrics.js";
import { describeFitQuality } from "../../insights/engine.js";
import type { InsightRecord } from "../../insights/engine.js";
import type { ModelIdentity } from "../../model/record.js";

export interface RenderedCharts {
  modelFit: string | null;
  contributionChannel: string | null;
}

export interface ReportInput {
  title: string;
  identity: ModelIdentity;
  metrics: ExtractedMetrics;
  charts: RenderedCharts;
  insights: InsightRecord[] | null;
  runtime: ChartRuntime;
  /** Only the primary, secondary and success colours reach the page styles. */
  palette: Palette;
  /** Supplied by the caller so identical input renders identical output. */
  generatedAt: string | null;
}

export const PLACEHOLDERS = {
  results: "Results will be displayed here",
  modelFit: "Model fit charts will be displayed here",
  contributionChannel: "Contribution charts will be displayed here",
  insights:
    "No insights available at the moment. Insights will be automatically generated from model data."
} as const;

const ISO_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})/;

export function escapeHtml(value: string): string {
  return value
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;")
    .replaceAll("'", "&#39;");
}

/** `2024-03-05T14:07:09` → `05/03/2024 at 14:07`; other values pass through. */
export function formatCreatedAt(value: string | null): string | null {
  if (value === null) {
    return null;
  }
  const match = ISO_DATE_TIME.exec(value);
  if (!match) {
    return value;
  }
  const [, year, month, day, hours, minutes] = match;
  return `${day}/${month}/${year} at ${hours}:${minutes}`;
}

/** Period bounds are shown as dates only. */
export function formatPeriodDate(value: string | null): string | null {
  if (value === null) {
    return null;
  }
  return value.length > 10 ? value.slice(0, 10) : value;
}

export function formatRoi(value: number): string {
  return value.toFixed(2);
}

function placeholder(message: string): string {
  return `<div class="placeholder">${escapeHtml(message)}</div>`;
}

function badge(icon: string, text: string): string {
  return `<div class="badge"><span class="badge-icon">${icon}</span><span>${escapeHtml(text)}</span></div>`;
}

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

function renderHeaderMeta(identity: ModelIdentity): string {
  const badges = [badge("🏷️", `Model: ${identity.folder}`)];
  const start = formatPeriodDate(identity.periodStart);
  const end = formatPeriodDate(identity.periodEnd);
  if (start !== null && end !== null) {
    badges.push(badge("📅", `Period: ${start} → ${end}`));
  }
  const created = formatCreatedAt(identity.createdAt);
  if (created !== null && created !== identity.folder) {
    badges.push(badge("🕐", `Created: ${created}`));
  }
  return badges.join("\n          ");
}

export function renderFitScoreCard(fitScore: number | null): string {
  if (fitScore === null) {
    return placeholder(PLACEHOLDERS.results);
  }
  const quality = describeFitQuality(fitScore);
  return `
      <div class="stats-grid">
        <div class="stat-card">
          <div class="stat-value">${fitScore.toFixed(3)}</div>
          <div class="stat-label">R² Score</div>
          <div class="quality-badge ${quality.tone}">✓ ${escapeHtml(quality.label)}</div>
        </div>
      </div>
      <details class="r2-details">
        <summary>What is the R² score?</summary>
        <p>
          The <strong>R² (coefficient of determination)</strong> measures the quality of the model's fit to observed data.
          It indicates the <strong>percentage of variation</strong> in your data that is explained by the model.
        </p>
        <p><strong>Your model interpretation:</strong><br>${quality.interpretation}</p>
        <p class="muted">The closer R² is to 1, the more accurately the model can predict observed results.</p>
      </details>`;
}

export function renderRoiList(roiByChannel: ReadonlyMap<string, number | null>): string {
  const ranked = rankChannelsByRoi(roiByChannel);
  if (ranked.length === 0) {
    return placeholder(PLACEHOLDERS.results);
  }
  const items = ranked.map(({ channel, roi }) => {
    const name = escapeHtml(channel);
    const value = formatRoi(roi);
    return `
        <div class="roi-item">
          <div class="roi-item-content">
            <div class="roi-channel-name">${name}</div>
            <div class="roi-description">For <strong>$1 invested</strong> in ${name} → ROI = <strong>$${value}</strong></div>
          </div>
          <div class="roi-value-container">
            <div class="roi-value">${value}</div>
            <div class="roi-label">ROI</div>
          </div>
        </div>`;
  });
  return `<div class="roi-visualization">${items.join("")}
      </div>`;
}

export function renderInsights(insights: InsightRecord[] | null): string {
  if (insights === null || insights.length === 0) {
    return placeholder(PLACEHOLDERS.insights);
  }
  const items = insights.map(
    (insight) => `
        <div class="insight-item ${insight.category}">
          <div class="insight-title">${escapeHtml(insight.title)}</div>
          <div class="insight-description">${escapeHtml(insight.description)}</div>
          <div class="insight-action">${escapeHtml(insight.action)}</div>
        </div>`
  );
  return `<div class="insights-container">${items.join("")}
      </div>`;
}

function renderChart(blockHtml: string | null, fallback: string): string {
  return blockHtml ?? placeholder(fallback);
}

function card(icon: string, heading: string, body: string, extraClass = ""): string {
  return `
    <div class="card${extraClass ? ` ${extraClass}` : ""}">
      <div class="card-header">
        <div class="card-icon">${icon}</div>
        <h2>${escapeHtml(heading)}</h2>
      </div>
      <div class="card-content">${body}
      </div>
    </div>`;
}

// ---------------------------------------------------------------------------
// Document
// ---------------------------------------------------------------------------

export function renderReportTemplate(input: ReportInput): string {
  const { identity, metrics, charts, runtime, palette } = input;
  const title = escapeHtml(input.title);
  const generated =
    input.generatedAt !== null
      ? `<footer class="footer">Generated ${escapeHtml(input.generatedAt)}</footer>`
      : "";

  const overview = [
    card("⚡", "Model Performance", renderFitScoreCard(metrics.fitScore)),
    card(
      "💹",
      "ROI by Media Channel",
      `
      <p class="lead">Return on investment for each dollar spent per channel</p>
      ${renderRoiList(metrics.roiByChannel)}`
    )
  ].join("");

  const visualizations = [
    card(
      "📈",
      "Model Fit",
      `
      <p>Comparison between expected revenues from the model and observed actual revenues, allowing to evaluate prediction accuracy.</p>
      ${renderChart(charts.modelFit, PLACEHOLDERS.modelFit)}`,
      "chart-card"
    ),
    card(
      "📊",
      "Contribution Channel",
      `
      <p>Breakdown of each media channel's contribution (baseline and marketing channels) to overall performance, showing the relative impact of each source.</p>
      ${renderChart(charts.contributionChannel, PLACEHOLDERS.contributionChannel)}`,
      "chart-card"
    )
  ].join("");

  const recommendations = card(
    "💡",
    "Actionable Recommendations",
    `
      <p class="lead">Actionable recommendations based on your MMM model analysis to optimize your marketing decisions.</p>
      ${renderInsights(input.insights)}`
  );

  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>${title} - ${escapeHtml(identity.folder)}</title>
  <script src="${escapeHtml(runtime.vega)}"></script>
  <script src="${escapeHtml(runtime.vegaLite)}"></script>
  <script src="${escapeHtml(runtime.vegaEmbed)}"></script>
  <style>
    :root {
      --primary: ${escapeHtml(palette.primary)};
      --primary-dark: #4f46e5;
      --secondary: ${escapeHtml(palette.secondary)};
      --success: ${escapeHtml(palette.success)};
      --warning: #f59e0b;
      --danger: #ef4444;
      --info: #3b82f6;
      --bg: #f8fafc;
      --card: #ffffff;
      --text: #1e293b;
      --muted: #64748b;
      --border: #e2e8f0;
      --shadow: 0 10px 26px rgba(30, 41, 59, 0.08);
    }

    * {
      box-sizing: border-box;
    }

    body {
      margin: 0;
      font-family: Inter, -apple-system, "Segoe UI", Roboto, sans-serif;
      background: linear-gradient(135deg, #667eea 0%, #764ba2 100%);
      color: var(--text);
      line-height: 1.6;
    }

    .container {
      max-width: 1200px;
      margin: 0 auto;
      padding: 40px 24px;
    }

    .header {
      background: rgba(255, 255, 255, 0.95);
      border-radius: 24px;
      padding: 40px;
      margin-bottom: 32px;
      box-shadow: var(--shadow);
    }

    .header h1 {
      margin: 0 0 8px;
      font-size: 2.4rem;
      color: var(--primary-dark);
    }

    .subtitle,
    .muted,
    .lead {
      color: var(--muted);
    }

    .header-meta {
      display: flex;
      flex-wrap: wrap;
      gap: 12px;
      margin-top: 20px;
    }

    .badge {
      display: inline-flex;
      align-items: center;
      gap: 8px;
      padding: 8px 16px;
      border-radius: 999px;
      background: rgba(99, 102, 241, 0.1);
      color: var(--primary-dark);
      font-weight: 600;
      font-size: 0.9rem;
    }

    .section {
      margin-bottom: 32px;
    }

    .section-title {
      color: #ffffff;
      font-size: 1.5rem;
      margin: 0 0 16px;
    }

    .grid {
      display: grid;
      grid-template-columns: repeat(auto-fit, minmax(320px, 1fr));
      gap: 24px;
    }

    .grid.vertical {
      grid-template-columns: 1fr;
    }

    .card {
      background: var(--card);
      border-radius: 20px;
      border: 1px solid var(--border);
      box-shadow: var(--shadow);
      overflow: hidden;
    }

    .card-header {
      display: flex;
      align-items: center;
      gap: 12px;
      padding: 20px 24px;
      background: linear-gradient(135deg, rgba(99, 102, 241, 0.1) 0%, rgba(139, 92, 246, 0.1) 100%);
      border-bottom: 1px solid var(--border);
    }

    .card-header h2 {
      margin: 0;
      font-size: 1.2rem;
    }

    .card-icon {
      font-size: 1.5rem;
    }

    .card-content {
      padding: 24px;
    }

    .chart-card .card-content {
      overflow-x: auto;
    }

    .stats-grid {
      display: grid;
      grid-template-columns: repeat(auto-fit, minmax(160px, 1fr));
      gap: 16px;
    }

    .stat-card {
      text-align: center;
      padding: 24px;
      border-radius: 16px;
      border: 2px solid rgba(99, 102, 241, 0.2);
      background: linear-gradient(135deg, rgba(99, 102, 241, 0.05) 0%, rgba(139, 92, 246, 0.05) 100%);
    }

    .stat-value {
      font-size: 2.6rem;
      font-weight: 800;
      color: var(--primary);
    }

    .stat-label {
      color: var(--muted);
      text-transform: uppercase;
      letter-spacing: 0.05em;
      font-size: 0.8rem;
    }

    .quality-badge {
      display: inline-block;
      margin-top: 12px;
      padding: 4px 12px;
      border-radius: 999px;
      font-weight: 600;
      font-size: 0.85rem;
    }

    .quality-badge.excellent {
      background: rgba(16, 185, 129, 0.15);
      color: #047857;
    }

    .quality-badge.good {
      background: rgba(59, 130, 246, 0.15);
      color: #1d4ed8;
    }

    .quality-badge.improve {
      background: rgba(245, 158, 11, 0.15);
      color: #b45309;
    }

    .r2-details {
      margin-top: 20px;
      padding: 16px;
      border-radius: 12px;
      background: var(--bg);
    }

    .r2-details summary {
      cursor: pointer;
      font-weight: 600;
      color: var(--primary-dark);
    }

    .roi-visualization {
      display: flex;
      flex-direction: column;
      gap: 12px;
    }

    .roi-item {
      display: flex;
      justify-content: space-between;
      align-items: center;
      gap: 16px;
      padding: 16px 20px;
      border-radius: 14px;
      border: 2px solid rgba(16, 185, 129, 0.2);
      background: linear-gradient(135deg, rgba(16, 185, 129, 0.05) 0%, rgba(16, 185, 129, 0.02) 100%);
    }

    .roi-channel-name {
      font-weight: 700;
    }

    .roi-description {
      color: var(--muted);
      font-size: 0.9rem;
    }

    .roi-value-container {
      text-align: right;
    }

    .roi-value {
      font-size: 1.6rem;
      font-weight: 800;
      color: var(--success);
    }

    .roi-label {
      font-size: 0.75rem;
      color: var(--muted);
    }

    .insights-container {
      display: flex;
      flex-direction: column;
      gap: 16px;
    }

    .insight-item {
      padding: 20px;
      border-radius: 14px;
      border-left: 4px solid var(--info);
      background: rgba(59, 130, 246, 0.06);
    }

    .insight-item.success {
      border-left-color: var(--success);
      background: rgba(16, 185, 129, 0.06);
    }

    .insight-item.warning {
      border-left-color: var(--warning);
      background: rgba(245, 158, 11, 0.06);
    }

    .insight-item.danger {
      border-left-color: var(--danger);
      background: rgba(239, 68, 68, 0.06);
    }

    .insight-title {
      font-weight: 700;
      margin-bottom: 6px;
    }

    .insight-action {
      margin-top: 10px;
      font-weight: 500;
    }

    .placeholder {
      padding: 32px;
      text-align: center;
      color: var(--muted);
      border: 2px dashed var(--border);
      border-radius: 14px;
    }

    .footer {
      text-align: center;
      color: rgba(255, 255, 255, 0.8);
      font-size: 0.85rem;
    }

    @media print {
      body {
        background: #ffffff;
      }

      .section-title,
      .footer {
        color: var(--text);
      }

      .card {
        box-shadow: none;
        break-inside: avoid;
      }
    }
  </style>
</head>
<body>
  <div class="container">
    <div class="header">
      <h1>${title}</h1>
      <p class="subtitle">Detailed analysis of model performance</p>
      <div class="header-meta">
          ${renderHeaderMeta(identity)}
      </div>
    </div>

    <div class="section" id="overview">
      <h2 class="section-title">Overview</h2>
      <div class="grid">${overview}
      </div>
    </div>

    <div class="section" id="visualizations">
      <h2 class="section-title">Visualizations</h2>
      <div class="grid vertical">${visualizations}
      </div>
    </div>

    <div class="section" id="insights">
      <h2 class="section-title">Insights</h2>
      <div class="grid vertical">${recommendations}
      </div>
    </div>
    ${generated}
  </div>
</body>
</html>
`;
}
