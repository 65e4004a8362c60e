import type {
  CredibilityCategory,
  IndicatorCategory,
  IndicatorMatch,
  TextFeatures,
} from "../types";

const URL_PATTERN = /http\S+|www.\S+/g;
const PUNCTUATION_RUN = /[!?]{2,}/g;

// Letters, digits and underscore in any script count as word characters.
const WORD_CLASS = "[\\p{L}\\p{N}_]";
const WORD_CHAR = /[\p{L}\p{N}_]/u;

export interface PhrasePattern {
  phrase: string;
  pattern: RegExp;
}

export interface CompiledCategory {
  name: string;
  patterns: PhrasePattern[];
}

export interface CompiledIndicatorCategory extends CompiledCategory {
  weight: number;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// A word boundary at either edge of the phrase: a word-character edge must
// not touch another word character, a punctuation edge must touch one.
function leadingBoundary(edge: string): string {
  return WORD_CHAR.test(edge) ? `(?<!${WORD_CLASS})` : `(?<=${WORD_CLASS})`;
}

function trailingBoundary(edge: string): string {
  return WORD_CHAR.test(edge) ? `(?!${WORD_CLASS})` : `(?=${WORD_CLASS})`;
}

/** Whole-word, literal pattern for one catalog phrase. */
export function compilePhrase(phrase: string): PhrasePattern {
  const chars = Array.from(phrase);
  const first = chars[0] ?? "";
  const last = chars[chars.length - 1] ?? "";
  const source = `${leadingBoundary(first)}${escapeRegExp(phrase)}${trailingBoundary(last)}`;

  return { phrase, pattern: new RegExp(source, "gu") };
}

export function compileIndicators(
  categories: readonly IndicatorCategory[],
): CompiledIndicatorCategory[] {
  return categories.map((category) => ({
    name: category.name,
    weight: category.weight,
    patterns: category.phrases.map(compilePhrase),
  }));
}

export function compileCredibility(
  categories: readonly CredibilityCategory[],
): CompiledCategory[] {
  return categories.map((category) => ({
    name: category.name,
    patterns: category.phrases.map(compilePhrase),
  }));
}

export function normalizeText(text: string): string {
  return text.toLowerCase().replace(URL_PATTERN, "");
}

function countOccurrences(text: string, { pattern }: PhrasePattern): number {
  return text.match(pattern)?.length ?? 0;
}

function scanCategory(text: string, category: CompiledCategory) {
  let count = 0;
  const phrases: string[] = [];

  for (const entry of category.patterns) {
    const hits = countOccurrences(text, entry);
    if (hits > 0) {
      count += hits;
      phrases.push(entry.phrase);
    }
  }

  return { count, phrases };
}

export function matchIndicators(
  normalized: string,
  categories: readonly CompiledIndicatorCategory[],
): { matches: Record<string, IndicatorMatch>; score: number } {
  const matches: Record<string, IndicatorMatch> = {};
  let score = 0;

  for (const category of categories) {
    const { count, phrases } = scanCategory(normalized, category);
    if (count === 0) continue;

    matches[category.name] = {
      category: category.name,
      count,
      phrases,
      weight: category.weight,
    };
    score += count * category.weight;
  }

  return { matches, score };
}

export function matchCredibility(
  normalized: string,
  categories: readonly CompiledCategory[],
): { matches: Record<string, number>; score: number } {
  const matches: Record<string, number> = {};
  let score = 0;

  for (const category of categories) {
    const { count } = scanCategory(normalized, category);
    if (count === 0) continue;

    matches[category.name] = count;
    score += count;
  }

  return { matches, score };
}

// Cased and entirely uppercase, e.g. "SHOCKING!!!" but not "2024" or "!!!".
function isUpperCaseWord(word: string): boolean {
  return word === word.toUpperCase() && word !== word.toLowerCase();
}

function codePointLength(word: string): number {
  return Array.from(word).length;
}

/** Surface statistics of the raw (not normalized) text. */
export function extractTextFeatures(text: string): TextFeatures {
  const words = text.split(/\s+/).filter((word) => word.length > 0);
  const sentences = text
    .split(".")
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);

  const wordCount = words.length;
  const sentenceCount = sentences.length;
  const lengths = words.map(codePointLength);
  const totalLength = lengths.reduce((sum, length) => sum + length, 0);
  const capsWords = words.filter((word, index) => lengths[index] > 2 && isUpperCaseWord(word));
  const questions = sentences.filter((sentence) => sentence.endsWith("?"));

  return {
    wordCount,
    sentenceCount,
    avgWordLength: totalLength / Math.max(wordCount, 1),
    capsRatio: capsWords.length / Math.max(wordCount, 1),
    excessivePunctuation: text.match(PUNCTUATION_RUN)?.length ?? 0,
    questionRatio: questions.length / Math.max(sentenceCount, 1),
  };
}
