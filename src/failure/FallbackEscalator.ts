/**
 * Fallback Escalator
 *
 * Decides whether a failing request chain should fall back, and how far.
 * The level is the length of the chain's trailing run of unacceptable
 * results, capped at MANUAL_INTERVENTION; an acceptable result ends the
 * run and the next failure starts again at level 1.
 *
 * Stateless: everything is read from the record store on each check.
 */

import type { CapabilityCatalog } from '../catalog/CapabilityCatalog.js';
import {
  type ExecutionRecord,
  ProviderCategory,
  PROVIDER_CATEGORIES,
  isSuccessStatus
} from '../core/types.js';
import type { RecommendationMatcher } from '../recommendation/RecommendationMatcher.js';
import type { SQLiteStorage } from '../storage/SQLiteStorage.js';
import { suggestChecks } from './diagnostics.js';
import {
  type FallbackConfig,
  type FallbackDecision,
  DEFAULT_FALLBACK_CONFIG,
  FallbackLevel,
  LEVEL_DESCRIPTIONS
} from './types.js';

export class FallbackEscalator {
  private storage: SQLiteStorage;
  private catalog: CapabilityCatalog;
  private matcher: RecommendationMatcher;
  private config: FallbackConfig;

  constructor(
    storage: SQLiteStorage,
    catalog: CapabilityCatalog,
    matcher: RecommendationMatcher,
    config: Partial<FallbackConfig> = {}
  ) {
    this.storage = storage;
    this.catalog = catalog;
    this.matcher = matcher;
    this.config = { ...DEFAULT_FALLBACK_CONFIG, ...config };
  }

  /**
   * Check whether the chain the failed providers belong to should fall back.
   * Never throws.
   */
  check(failedProviderIds: readonly string[], chainId?: string): FallbackDecision {
    try {
      return this.evaluate(failedProviderIds, chainId);
    } catch (error) {
      console.error('[Escalator] Fallback check failed:', error instanceof Error ? error.message : error);
      return {
        shouldFallback: true,
        level: FallbackLevel.MANUAL_INTERVENTION,
        description: `${LEVEL_DESCRIPTIONS[FallbackLevel.MANUAL_INTERVENTION]} (fallback check failed)`,
        recommendedTools: [],
        recommendedServices: [],
        chainId: chainId ?? null,
        failureStreak: 0,
        userVisible: true,
        suggestedChecks: []
      };
    }
  }

  /**
   * Whether a record counts toward a failure streak
   */
  isUnacceptable(record: Pick<ExecutionRecord, 'status' | 'score'>): boolean {
    return !isSuccessStatus(record.status) || record.score < this.config.acceptabilityThreshold;
  }

  private evaluate(failedProviderIds: readonly string[], chainId?: string): FallbackDecision {
    const failed = Array.from(new Set(failedProviderIds));
    const chain = chainId ?? this.storage.getLatestChainForProviders(failed);

    if (failed.length === 0 || chain === null) {
      return noFallback(chain);
    }

    const streak = this.trailingStreak(chain);
    if (streak.length === 0) {
      return noFallback(chain);
    }

    const level = levelFor(streak.length);
    const newest = streak[0];

    const excluded = new Set(failed);
    for (const record of streak) {
      for (const providerId of record.providersUsed) excluded.add(providerId);
    }

    const failedCategory = this.catalog.get(failed[0])?.category ?? newest.plan.primaryCategory;
    const context = newest.error ? `${newest.request.text} ${newest.error}` : newest.request.text;
    const recommendedTools = this.recommendForLevel(level, context, excluded, failedCategory);

    console.log(`[Escalator] Chain ${chain}: ${streak.length} unacceptable result(s), level ${level}`);

    return {
      shouldFallback: true,
      level,
      description: LEVEL_DESCRIPTIONS[level],
      recommendedTools,
      recommendedServices: [...this.config.servicesByLevel[level]],
      chainId: chain,
      failureStreak: streak.length,
      userVisible: level >= FallbackLevel.TOOL_EXECUTION,
      suggestedChecks: suggestChecks(newest.status)
    };
  }

  /**
   * Newest-first run of unacceptable records at the head of the chain
   */
  private trailingStreak(chainId: string): ExecutionRecord[] {
    const streak: ExecutionRecord[] = [];
    for (const record of this.storage.getRecordsByChain(chainId, this.config.historyLimit)) {
      if (!this.isUnacceptable(record)) break;
      streak.push(record);
    }
    return streak;
  }

  private recommendForLevel(
    level: FallbackLevel,
    context: string,
    excluded: ReadonlySet<string>,
    failedCategory: ProviderCategory
  ): string[] {
    let categories: ProviderCategory[];
    switch (level) {
      case FallbackLevel.RETRY_SAME_CATEGORY:
        categories = [failedCategory];
        break;
      case FallbackLevel.SWITCH_CATEGORY:
        categories = PROVIDER_CATEGORIES.filter(c => c !== failedCategory);
        break;
      case FallbackLevel.TOOL_EXECUTION:
        categories = [ProviderCategory.EXECUTION];
        break;
      case FallbackLevel.MANUAL_INTERVENTION:
      default:
        return [];
    }

    return this.matcher
      .recommend(context, excluded, { categories, maxResults: this.config.maxRecommendations })
      .map(r => r.providerId);
  }

  getConfig(): FallbackConfig {
    return { ...this.config };
  }
}

/**
 * Level for a streak length (1 -> retry ... 4+ -> manual)
 */
export function levelFor(streakLength: number): FallbackLevel {
  if (streakLength <= 1) return FallbackLevel.RETRY_SAME_CATEGORY;
  if (streakLength === 2) return FallbackLevel.SWITCH_CATEGORY;
  if (streakLength === 3) return FallbackLevel.TOOL_EXECUTION;
  return FallbackLevel.MANUAL_INTERVENTION;
}

function noFallback(chainId: string | null): FallbackDecision {
  return {
    shouldFallback: false,
    level: FallbackLevel.RETRY_SAME_CATEGORY,
    description: 'No fallback needed',
    recommendedTools: [],
    recommendedServices: [],
    chainId,
    failureStreak: 0,
    userVisible: false,
    suggestedChecks: []
  };
}
