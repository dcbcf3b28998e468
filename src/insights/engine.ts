import { rankChannelsByRoi } from "../extract/metrics.js";

export type InsightCategory = "success" | "info" | "warning" | "danger";

export interface InsightRecord {
  category: InsightCategory;
  title: string;
  description: string;
  action: string;
}

export type FitQualityTone = "excellent" | "good" | "improve";

export interface FitQuality {
  tone: FitQualityTone;
  label: string;
  /** HTML fragment; only the formatted score is interpolated. */
  interpretation: string;
}

// Fit score bands.
const FIT_EXCELLENT = 0.75;
const FIT_ACCEPTABLE = 0.5;

// ROI is revenue per unit of spend, so 1.0 is breakeven.
const ROI_BREAKEVEN = 1.0;
const ROI_HIGH = 1.5;
const WORST_TO_BEST_RATIO_LIMIT = 0.7;
const MIN_DIVERSIFICATION_SPREAD = 0.3;
const PORTFOLIO_STRONG_MEAN = 1.2;
const PORTFOLIO_TARGET_UPLIFT = 1.1;

export function clamp(value: number, lo: number, hi: number): number {
  if (value < lo) return lo;
  if (value > hi) return hi;
  return value;
}

function money(value: number): string {
  return value.toFixed(2);
}

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

function fitScoreInsight(fitScore: number | null): InsightRecord | null {
  if (fitScore === null || fitScore >= FIT_EXCELLENT) {
    return null;
  }
  const score = fitScore.toFixed(3);
  if (fitScore >= FIT_ACCEPTABLE) {
    const improvementPotential = Math.floor((FIT_EXCELLENT - fitScore) * 100);
    return {
      category: "warning",
      title: "⚠️ Model needs improvement for better accuracy",
      description: `With an R² of ${score}, the model explains a significant portion of the variation but can be improved by approximately ${improvementPotential} points.`,
      action: "Enrich your data (external variables, seasonality, events) to improve model accuracy."
    };
  }
  const improvementNeeded = Math.floor((FIT_ACCEPTABLE - fitScore) * 100);
  return {
    category: "danger",
    title: "🔴 Model requires revision",
    description: `With an R² of ${score}, the model explains less than half of the variation. It requires approximately ${improvementNeeded} points of improvement to be reliable.`,
    action: "Review model variables and collect more data to improve prediction quality."
  };
}

function bestChannelInsight(channel: string, roi: number): InsightRecord {
  if (roi > ROI_HIGH) {
    const increasePct = clamp(Math.floor((roi - ROI_BREAKEVEN) * 20), 10, 30);
    return {
      category: "success",
      title: `🚀 ${channel}: High-performing channel to prioritize`,
      description: `With a ROI of ${money(roi)}, every dollar invested in ${channel} generates $${money(roi)} in revenue. This is your most profitable channel.`,
      action: `Gradually increase the budget allocated to ${channel} by ${increasePct}% to maximize return on investment.`
    };
  }
  if (roi > ROI_BREAKEVEN) {
    const increasePct = clamp(Math.floor((roi - ROI_BREAKEVEN) * 30), 5, 15);
    return {
      category: "info",
      title: `📈 ${channel}: Profitable channel`,
      description: `With a ROI of ${money(roi)}, ${channel} generates a positive return on investment.`,
      action: `Maintain or slightly increase the ${channel} budget by ${increasePct}% while testing new creative approaches.`
    };
  }
  return {
    category: "warning",
    title: "⚠️ All channels underperforming",
    description: `Even the best channel (${channel}) has a ROI of ${money(roi)}, below 1.0.`,
    action: "Review your creative strategies, targets, and messaging. Test new approaches before increasing budgets."
  };
}

function worstChannelInsight(
  best: { channel: string; roi: number },
  worst: { channel: string; roi: number }
): InsightRecord | null {
  const ratio = best.roi > 0 ? worst.roi / best.roi : 0;
  if (ratio >= WORST_TO_BEST_RATIO_LIMIT) {
    return null;
  }
  const gap = best.roi - worst.roi;
  const reductionPct = clamp(Math.floor((1 - ratio) * 50), 15, 40);
  const reallocationPct = clamp(Math.floor(gap * 25), 20, 35);
  const lessPerformantPct = Math.floor((1 - ratio) * 100);
  return {
    category: "warning",
    title: `🔍 ${worst.channel}: Channel to optimize`,
    description: `With a ROI of ${money(worst.roi)}, ${worst.channel} is ${money(gap)} points below ${best.channel} (ROI: ${money(best.roi)}), ${lessPerformantPct}% less performant.`,
    action: `Analyze ${worst.channel} performance: targeted audiences, creatives, placements. Reduce budget by ${reductionPct}% and reallocate ${reallocationPct}% to ${best.channel}.`
  };
}

function diversificationInsight(rois: number[]): InsightRecord | null {
  const max = Math.max(...rois);
  const min = Math.min(...rois);
  const spread = max - min;
  if (spread <= MIN_DIVERSIFICATION_SPREAD) {
    return null;
  }
  const rangePct = max > 0 ? Math.floor((spread / max) * 100) : 0;
  const reallocationPct = clamp(Math.floor(rangePct / 3), 10, 30);
  return {
    category: "info",
    title: "💼 Channel diversification",
    description: `Your channels show varied ROI (from ${money(min)} to ${money(max)}), with a gap of ${money(spread)} points (${rangePct}% variation), indicating optimization opportunities.`,
    action: `Reallocate ${reallocationPct}% of budget from underperforming channels to the most profitable ones, while maintaining minimal presence to test new opportunities.`
  };
}

function portfolioInsight(rois: number[]): InsightRecord | null {
  const mean = rois.reduce((sum, roi) => sum + roi, 0) / rois.length;
  const profitable = rois.filter((roi) => roi > ROI_BREAKEVEN).length;
  const successRate = Math.floor((profitable / rois.length) * 100);
  const description = `Your media mix generates on average $${money(mean)} in revenue for every dollar invested. ${successRate}% of your channels (${profitable}/${rois.length}) are profitable.`;

  if (mean > PORTFOLIO_STRONG_MEAN) {
    return {
      category: "success",
      title: "💰 Positive overall performance",
      description,
      action: "Maintain this performance by continuing to optimize budgets toward the most performing channels and regularly testing new approaches."
    };
  }
  if (mean > ROI_BREAKEVEN) {
    return {
      category: "info",
      title: "📊 Moderate overall performance",
      description,
      action: `Optimize your budgets by reallocating to the most performing channels to improve the overall average to $${money(mean * PORTFOLIO_TARGET_UPLIFT)}.`
    };
  }
  return null;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Turns the extracted metrics into recommendations. The order is fixed:
 * model fit, best channel, worst channel, diversification, portfolio.
 */
export function generateInsights(
  fitScore: number | null,
  roiByChannel: ReadonlyMap<string, number | null>
): InsightRecord[] {
  const insights: InsightRecord[] = [];
  const push = (insight: InsightRecord | null): void => {
    if (insight) {
      insights.push(insight);
    }
  };

  push(fitScoreInsight(fitScore));

  const ranked = rankChannelsByRoi(roiByChannel);
  const best = ranked[0];
  const worst = ranked[ranked.length - 1];
  if (best === undefined || worst === undefined) {
    return insights;
  }

  push(bestChannelInsight(best.channel, best.roi));
  if (ranked.length >= 2) {
    push(worstChannelInsight(best, worst));
  }
  const rois = ranked.map(({ roi }) => roi);
  if (ranked.length >= 3) {
    push(diversificationInsight(rois));
  }
  push(portfolioInsight(rois));

  return insights;
}

export function describeFitQuality(fitScore: number): FitQuality {
  const score = fitScore.toFixed(3);
  if (fitScore >= FIT_EXCELLENT) {
    return {
      tone: "excellent",
      label: "Excellent",
      interpretation: `<strong>R² = ${score} (≥ 0.75)</strong>: The model explains at least 75% of the variation in your data. This is an <strong>excellent</strong> fit indicating that the model captures trends and relationships in your marketing data very well.`
    };
  }
  if (fitScore >= FIT_ACCEPTABLE) {
    return {
      tone: "good",
      label: "Good",
      interpretation: `<strong>R² = ${score} (0.5 - 0.75)</strong>: The model explains between 50% and 75% of the variation in your data. This is a <strong>good</strong> fit, but there is still room for improvement to better capture marketing relationships.`
    };
  }
  return {
    tone: "improve",
    label: "Needs Improvement",
    interpretation: `<strong>R² = ${score} (&lt; 0.5)</strong>: The model explains less than 50% of the variation in your data. The fit <strong>needs improvement</strong>. It would be beneficial to review model variables or enrich the data to better capture marketing relationships.`
  };
}
