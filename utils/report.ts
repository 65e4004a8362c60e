import type { AnalysisResult, AnalysisSummary, IndicatorMatch, TextStats } from "../types";

export function formatCategoryName(name: string): string {
  return name
    .split("_")
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
    .join(" ");
}

/** Most frequent first; equal counts keep catalog order. */
export function rankIndicators(result: AnalysisResult): IndicatorMatch[] {
  return Object.values(result.indicators).sort((a, b) => b.count - a.count);
}

export function summarizeResult(result: AnalysisResult, maxPhrases = 5): AnalysisSummary {
  return {
    score: result.finalScore,
    verdict: result.verdict,
    redFlags: rankIndicators(result).map((match) => ({
      category: match.category,
      displayName: formatCategoryName(match.category),
      count: match.count,
      weight: match.weight,
      phrases: match.phrases.slice(0, maxPhrases),
    })),
    credibilityMarkers: Object.entries(result.credibility).map(([category, count]) => ({
      category,
      displayName: formatCategoryName(category),
      count,
    })),
    features: result.features,
  };
}

export function quickStats(text: string): TextStats {
  return {
    characters: text.length,
    words: text.split(/\s+/).filter((word) => word.length > 0).length,
  };
}
