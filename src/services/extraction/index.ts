export { Extractor, computeStatistics, isUncertain, uncertaintyReasonsFor, PARSE_FAILURE_NOTE } from './extractor.js';
export { ConfidenceScorer } from './confidence.js';
export { locateJson } from './json-locator.js';
export type { LocatedJson, JsonLocatorStrategy } from './json-locator.js';
export {
  parseQuantity,
  normalizeUnit,
  parseSpecifications,
  parseConfidence,
  confidenceLevelFor,
  UNIT_SYNONYMS,
  DEFAULT_QUANTITY,
  DEFAULT_UNIT,
  DEFAULT_CONFIDENCE,
} from './normalize.js';
export type { ExtractorOptions, BatchConfidence, LowConfidenceItem, ConfidenceBreakdown } from './types.js';
