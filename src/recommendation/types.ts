/**
 * Recommendation Types
 */

import type { ProviderCategory } from '../core/types.js';

/**
 * A catalog provider suggested for a failure context
 */
export interface Recommendation {
  providerId: string;
  /** matched / declared keywords (0-1) */
  matchScore: number;
  /** Declared keywords found in the context */
  matchedKeywords: string[];
  description: string;
  /** matchScore plus the reliability boost, clamped (0-1) */
  confidence: number;
}

export interface RecommendationConfig {
  /** Added to confidence when a provider's avgScore is above the catalog median */
  reliabilityBoost: number;
  maxResults: number;
  /** Recommendations below this confidence are dropped */
  minConfidence: number;
}

export const DEFAULT_RECOMMENDATION_CONFIG: RecommendationConfig = {
  reliabilityBoost: 0.1,
  maxResults: 5,
  minConfidence: 0
};

export interface RecommendOptions {
  /** Only consider providers of these categories */
  categories?: readonly ProviderCategory[];
  maxResults?: number;
}

export interface KeywordMatch {
  matched: string[];
  matchScore: number;
}
