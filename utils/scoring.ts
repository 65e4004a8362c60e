import type { TextFeatures, Verdict } from "../types";

/**
 * Heuristic constants of the score formula. None of them come from
 * calibration data; override them per detector to experiment.
 */
export interface ScoringParameters {
  fakeScale: number;
  credibilityScale: number;
  credibilityFactor: number;
  complexityBonus: number;
  complexityMinWords: number;
  complexityMinAvgWordLength: number;
  capsPenalty: number;
  punctuationPenalty: number;
  questionableFrom: number;
  fakeFrom: number;
}

export const DEFAULT_SCORING: Readonly<ScoringParameters> = {
  fakeScale: 50,
  credibilityScale: 20,
  credibilityFactor: 0.3,
  complexityBonus: 10,
  complexityMinWords: 100,
  complexityMinAvgWordLength: 5,
  capsPenalty: 20,
  punctuationPenalty: 5,
  questionableFrom: 30,
  fakeFrom: 60,
};

const VERDICTS: Record<Verdict["tier"], Verdict> = {
  low: {
    label: "Likely Reliable",
    tier: "low",
    description: "This article shows characteristics of reliable news.",
    recommendation: "Still verify with multiple trusted sources.",
  },
  medium: {
    label: "Questionable",
    tier: "medium",
    description: "This article shows some red flags.",
    recommendation: "Verify information carefully before sharing.",
  },
  high: {
    label: "Likely Fake/Misleading",
    tier: "high",
    description: "This article shows strong indicators of fake or misleading news.",
    recommendation: "Exercise extreme caution. Do not share without verification.",
  },
};

// Half-way cases go to the even neighbour, e.g. 0.625 -> 0.62, 0.375 -> 0.38.
function roundHalfEven(value: number, digits: number): number {
  const factor = 10 ** digits;
  const scaled = value * factor;
  const floor = Math.floor(scaled);

  if (scaled - floor === 0.5) {
    return (floor % 2 === 0 ? floor : floor + 1) / factor;
  }
  return Math.round(scaled) / factor;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function fuseScore(
  fakeScore: number,
  credibilityScore: number,
  features: TextFeatures,
  params: Readonly<ScoringParameters> = DEFAULT_SCORING,
): number {
  const normalizedFake = Math.min(100, (fakeScore / params.fakeScale) * 100);
  const normalizedCred = Math.min(100, (credibilityScore / params.credibilityScale) * 100);

  const complexityBonus =
    features.wordCount > params.complexityMinWords &&
    features.avgWordLength > params.complexityMinAvgWordLength
      ? params.complexityBonus
      : 0;

  const stylePenalty =
    features.capsRatio * params.capsPenalty +
    features.excessivePunctuation * params.punctuationPenalty;

  const raw =
    normalizedFake - normalizedCred * params.credibilityFactor - complexityBonus + stylePenalty;

  return roundHalfEven(clamp(raw, 0, 100), 2);
}

export function getVerdict(
  score: number,
  params: Readonly<ScoringParameters> = DEFAULT_SCORING,
): Verdict {
  if (score < params.questionableFrom) return { ...VERDICTS.low };
  if (score < params.fakeFrom) return { ...VERDICTS.medium };
  return { ...VERDICTS.high };
}
