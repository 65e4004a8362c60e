export * from "./types";
export { CatalogError, DEFAULT_CATALOG, parseCatalog } from "./utils/catalog";
export {
  DEFAULT_MIN_TEXT_LENGTH,
  FakeNewsDetector,
  getDefaultDetector,
  type DetectorOptions,
} from "./utils/detector";
export {
  extractTextFeatures,
  matchCredibility,
  matchIndicators,
  normalizeText,
} from "./utils/heuristics";
export { formatCategoryName, quickStats, rankIndicators, summarizeResult } from "./utils/report";
export { DEFAULT_SCORING, fuseScore, getVerdict, type ScoringParameters } from "./utils/scoring";
