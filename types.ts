export interface AnalyzeRequest {
  text: string;
}

export interface IndicatorCategory {
  name: string;
  phrases: readonly string[];
  weight: number; // severity, > 0
}

export interface CredibilityCategory {
  name: string;
  phrases: readonly string[];
}

export interface DetectorCatalog {
  indicators: readonly IndicatorCategory[];
  credibility: readonly CredibilityCategory[];
}

export interface IndicatorMatch {
  category: string;
  count: number;
  phrases: string[];
  weight: number;
}

export interface TextFeatures {
  wordCount: number;
  sentenceCount: number;
  avgWordLength: number;
  capsRatio: number; // 0–1
  excessivePunctuation: number;
  questionRatio: number; // 0–1
}

export type VerdictTier = "low" | "medium" | "high";

export interface Verdict {
  label: string;
  tier: VerdictTier;
  description: string;
  recommendation: string;
}

export interface AnalysisResult {
  finalScore: number; // 0–100
  verdict: Verdict;
  indicators: Record<string, IndicatorMatch>;
  credibility: Record<string, number>;
  features: TextFeatures;
}

export interface RedFlag {
  category: string;
  displayName: string;
  count: number;
  weight: number;
  phrases: string[];
}

export interface CredibilityMarker {
  category: string;
  displayName: string;
  count: number;
}

export interface AnalysisSummary {
  score: number;
  verdict: Verdict;
  redFlags: RedFlag[];
  credibilityMarkers: CredibilityMarker[];
  features: TextFeatures;
}

export interface TextStats {
  characters: number;
  words: number;
}

export type AnalyzeResponse =
  | {
      ok: true;
      result: AnalysisResult;
      summary: AnalysisSummary;
      stats: TextStats;
    }
  | {
      ok: false;
      reason: "insufficient_input";
      message: string;
    };
