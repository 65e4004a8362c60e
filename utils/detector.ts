import type { AnalysisResult, DetectorCatalog } from "../types";
import { DEFAULT_CATALOG, parseCatalog } from "./catalog";
import { getConfig } from "./config";
import {
  compileCredibility,
  compileIndicators,
  extractTextFeatures,
  matchCredibility,
  matchIndicators,
  normalizeText,
  type CompiledCategory,
  type CompiledIndicatorCategory,
} from "./heuristics";
import { DEFAULT_SCORING, fuseScore, getVerdict, type ScoringParameters } from "./scoring";

export const DEFAULT_MIN_TEXT_LENGTH = 10;

export interface DetectorOptions {
  minTextLength?: number;
  scoring?: Partial<ScoringParameters>;
}

/**
 * Rule-based fake news scorer. Catalog and options are fixed at
 * construction, so one instance can serve any number of calls.
 */
export class FakeNewsDetector {
  private readonly indicators: readonly CompiledIndicatorCategory[];
  private readonly credibility: readonly CompiledCategory[];
  private readonly scoring: Readonly<ScoringParameters>;
  readonly minTextLength: number;

  constructor(catalog: DetectorCatalog = DEFAULT_CATALOG, options: DetectorOptions = {}) {
    const checked = parseCatalog(catalog);
    this.indicators = compileIndicators(checked.indicators);
    this.credibility = compileCredibility(checked.credibility);
    this.scoring = { ...DEFAULT_SCORING, ...options.scoring };

    const minTextLength = options.minTextLength ?? DEFAULT_MIN_TEXT_LENGTH;
    if (!Number.isInteger(minTextLength) || minTextLength < 0) {
      throw new RangeError(`minTextLength must be a non-negative integer, got ${minTextLength}`);
    }
    this.minTextLength = minTextLength;
  }

  /** Returns null when the text is too short to judge. */
  analyze(text: string): AnalysisResult | null {
    if (text.trim().length < this.minTextLength) {
      return null;
    }

    const normalized = normalizeText(text);
    const indicators = matchIndicators(normalized, this.indicators);
    const credibility = matchCredibility(normalized, this.credibility);
    const features = extractTextFeatures(text);

    const finalScore = fuseScore(indicators.score, credibility.score, features, this.scoring);

    return {
      finalScore,
      verdict: getVerdict(finalScore, this.scoring),
      indicators: indicators.matches,
      credibility: credibility.matches,
      features,
    };
  }
}

let sharedDetector: FakeNewsDetector | undefined;

/** Shared detector over the bundled catalog and the environment's settings. */
export function getDefaultDetector(): FakeNewsDetector {
  sharedDetector ??= new FakeNewsDetector(DEFAULT_CATALOG, {
    minTextLength: getConfig().minTextLength,
  });
  return sharedDetector;
}
