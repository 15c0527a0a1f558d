/**
 * Recommendation Matcher
 *
 * Suggests catalog providers for a failure context by keyword overlap.
 * Providers whose learned avgScore sits above the catalog-wide median
 * get a small confidence boost.
 */

import type { CapabilityCatalog } from '../catalog/CapabilityCatalog.js';
import { clamp01, compareIds } from '../core/types.js';
import type { LearningStore } from '../learning/LearningStore.js';
import { matchKeywords, tokenize } from './keywordMatch.js';
import {
  type Recommendation,
  type RecommendationConfig,
  type RecommendOptions,
  DEFAULT_RECOMMENDATION_CONFIG
} from './types.js';

export class RecommendationMatcher {
  private catalog: CapabilityCatalog;
  private learning: LearningStore;
  private config: RecommendationConfig;

  constructor(
    catalog: CapabilityCatalog,
    learning: LearningStore,
    config: Partial<RecommendationConfig> = {}
  ) {
    this.catalog = catalog;
    this.learning = learning;
    this.config = { ...DEFAULT_RECOMMENDATION_CONFIG, ...config };
  }

  /**
   * Rank providers against a context text. An empty result is valid.
   */
  recommend(
    contextText: string,
    excludeProviderIds: Iterable<string> = [],
    options: RecommendOptions = {}
  ): Recommendation[] {
    const excluded = new Set(excludeProviderIds);
    const categories = options.categories ? new Set(options.categories) : null;
    const maxResults = options.maxResults ?? this.config.maxResults;

    const tokens = tokenize(contextText);
    if (tokens.size === 0) return [];

    const scores = this.providerScores();
    const median = medianOf(Array.from(scores.values()));

    const recommendations: Recommendation[] = [];
    for (const provider of this.catalog.list()) {
      if (excluded.has(provider.id)) continue;
      if (categories && !categories.has(provider.category)) continue;

      const { matched, matchScore } = matchKeywords(provider.keywords, tokens);
      if (matchScore === 0) continue;

      const avgScore = scores.get(provider.id) ?? this.learning.initialScore;
      const boost = avgScore > median ? this.config.reliabilityBoost : 0;
      const confidence = clamp01(matchScore + boost);
      if (confidence < this.config.minConfidence) continue;

      recommendations.push({
        providerId: provider.id,
        matchScore: clamp01(matchScore),
        matchedKeywords: matched,
        description: provider.description,
        confidence
      });
    }

    recommendations.sort((a, b) =>
      b.confidence - a.confidence ||
      b.matchScore - a.matchScore ||
      compareIds(a.providerId, b.providerId)
    );

    return recommendations.slice(0, Math.max(0, maxResults));
  }

  /**
   * avgScore per catalog provider (untried providers use the initial score)
   */
  private providerScores(): Map<string, number> {
    const weights = this.learning.weightsSnapshot();
    const scores = new Map<string, number>();
    for (const provider of this.catalog.list()) {
      scores.set(provider.id, weights.get(provider.id)?.avgScore ?? this.learning.initialScore);
    }
    return scores;
  }

  getConfig(): RecommendationConfig {
    return { ...this.config };
  }
}

/**
 * Median of a list of numbers (0 for an empty list)
 */
export function medianOf(values: number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}
