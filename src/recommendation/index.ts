/**
 * Recommendation Module
 */

export { RecommendationMatcher, medianOf } from './RecommendationMatcher.js';
export { matchKeywords, stem, tokenize } from './keywordMatch.js';
export { DEFAULT_RECOMMENDATION_CONFIG } from './types.js';
export type {
  KeywordMatch,
  Recommendation,
  RecommendationConfig,
  RecommendOptions
} from './types.js';
