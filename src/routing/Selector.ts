/**
 * Selector - Hybrid Provider Router
 *
 * Classifies a request and turns it into a SelectionPlan: one primary
 * provider for the request's complexity class, plus up to maxSecondaries
 * providers when the text asks for more than one kind of work
 * (e.g. "find the latest figures and then calculate the growth").
 *
 * Provider choice reads a snapshot of the learning weights and the
 * catalog; nothing here writes to either.
 */

import { v4 as uuidv4 } from 'uuid';
import type { CapabilityCatalog } from '../catalog/CapabilityCatalog.js';
import { parseRequestContext } from '../core/context.js';
import {
  type CapabilityProvider,
  type Request,
  type RequestInput,
  type SelectionPlan,
  ComplexityClass,
  ProviderCategory,
  clamp01,
  compareIds,
  complexityOrdinal
} from '../core/types.js';
import type { LearningStore } from '../learning/LearningStore.js';
import type { LearningWeight } from '../learning/types.js';
import { ComplexityClassifier } from './ComplexityClassifier.js';
import { findPhrases } from './patterns.js';
import { issueResolvedPlan, issueUnresolvedPlan } from './plan.js';
import {
  type ClassificationConfig,
  type SelectionStats,
  type SelectorConfig,
  CueGroup,
  DEFAULT_SELECTOR_CONFIG
} from './types.js';

type WeightSnapshot = ReadonlyMap<string, Readonly<LearningWeight>>;

const CUE_GROUPS: readonly CueGroup[] = [
  CueGroup.SEARCH,
  CueGroup.ANALYSIS,
  CueGroup.EXECUTION,
  CueGroup.GENERATION
];

export class Selector {
  private catalog: CapabilityCatalog;
  private learning: LearningStore;
  private classifier: ComplexityClassifier;
  private config: SelectorConfig;

  private stats: SelectionStats = emptyStats();
  private confidenceSum = 0;

  constructor(
    catalog: CapabilityCatalog,
    learning: LearningStore,
    config: Partial<SelectorConfig> = {},
    classification: Partial<ClassificationConfig> = {}
  ) {
    this.catalog = catalog;
    this.learning = learning;
    this.config = { ...DEFAULT_SELECTOR_CONFIG, ...config };
    this.classifier = new ComplexityClassifier(classification);
  }

  /**
   * Build a classified, read-only request
   *
   * @throws RequestContextError if the context is not plain JSON
   */
  createRequest(input: RequestInput): Request {
    const context = parseRequestContext(input.context ?? {});
    const id = uuidv4();
    return Object.freeze({
      id,
      text: input.text,
      context: Object.freeze(context),
      chainId: input.chainId ?? id,
      complexity: this.classifier.classify(input.text),
      createdAt: new Date()
    });
  }

  /**
   * Produce a plan for a request. Never throws for a missing category;
   * the plan comes back unresolved instead.
   */
  select(request: Request): SelectionPlan {
    const plan = this.plan(request, this.learning.weightsSnapshot());
    this.updateStats(plan);
    return plan;
  }

  /**
   * createRequest + select
   */
  route(input: RequestInput): SelectionPlan {
    return this.select(this.createRequest(input));
  }

  /**
   * Cue groups present in the text, in declaration order
   */
  detectCueGroups(text: string): CueGroup[] {
    return CUE_GROUPS.filter(group => findPhrases(text, this.config.cueKeywords[group]).length > 0);
  }

  /**
   * Best provider of a category under the given weights
   */
  bestProvider(category: ProviderCategory, weights: WeightSnapshot = this.learning.weightsSnapshot()): CapabilityProvider | undefined {
    const candidates = this.catalog.byCategory(category);
    candidates.sort((a, b) => this.compareProviders(a, b, weights));
    return candidates[0];
  }

  private plan(request: Request, weights: WeightSnapshot): SelectionPlan {
    const primaryCategory = this.config.categoryByComplexity[request.complexity];
    const primary = this.bestProvider(primaryCategory, weights);

    if (!primary) {
      return issueUnresolvedPlan(request, primaryCategory);
    }

    const secondaries = this.selectSecondaries(request.text, primaryCategory, weights);

    const searchFirst = secondaries.filter(p => p.category === ProviderCategory.SEARCH);
    const after = secondaries.filter(p => p.category !== ProviderCategory.SEARCH);
    const executionOrder = [...searchFirst, primary, ...after].map(p => p.id);

    return issueResolvedPlan({
      request,
      primaryCategory,
      primary: primary.id,
      secondaries: secondaries.map(p => p.id),
      executionOrder,
      confidence: this.confidence(primary.id, request.complexity, weights)
    });
  }

  private selectSecondaries(
    text: string,
    primaryCategory: ProviderCategory,
    weights: WeightSnapshot
  ): CapabilityProvider[] {
    const groups = this.detectCueGroups(text);
    if (groups.length < 2) return [];

    const categories = new Set<ProviderCategory>();
    for (const group of groups) {
      const category = this.config.categoryByCue[group];
      if (category !== primaryCategory) categories.add(category);
    }

    const secondaries: CapabilityProvider[] = [];
    for (const category of categories) {
      const best = this.bestProvider(category, weights);
      if (best) secondaries.push(best);
    }

    secondaries.sort((a, b) => this.compareProviders(a, b, weights));
    return secondaries.slice(0, Math.max(0, this.config.maxSecondaries));
  }

  /**
   * Highest avgScore, then lowest avgLatencyMs, then lowest id.
   * Untried providers score the initial score and have no latency yet,
   * so they sort after tried providers of equal score.
   */
  private compareProviders(a: CapabilityProvider, b: CapabilityProvider, weights: WeightSnapshot): number {
    const wa = weights.get(a.id);
    const wb = weights.get(b.id);
    const scoreA = wa?.avgScore ?? this.learning.initialScore;
    const scoreB = wb?.avgScore ?? this.learning.initialScore;
    if (scoreA !== scoreB) return scoreB > scoreA ? 1 : -1;

    const latencyA = wa?.avgLatencyMs ?? Number.POSITIVE_INFINITY;
    const latencyB = wb?.avgLatencyMs ?? Number.POSITIVE_INFINITY;
    if (latencyA !== latencyB) return latencyA < latencyB ? -1 : 1;

    return compareIds(a.id, b.id);
  }

  private confidence(primaryId: string, complexity: ComplexityClass, weights: WeightSnapshot): number {
    const { confidenceWeights: w, confidencePrior: prior } = this.config;
    const weight = weights.get(primaryId);
    const successRate = weight && weight.useCount > 0
      ? weight.successCount / weight.useCount
      : prior;

    let confidence = w.successRate * successRate
      + w.complexity * (1 / complexityOrdinal(complexity))
      + w.prior * prior;

    if (complexity === ComplexityClass.SIMPLE) {
      confidence = Math.max(confidence, this.config.simpleConfidenceFloor);
    }
    return clamp01(confidence);
  }

  private updateStats(plan: SelectionPlan): void {
    this.stats.totalSelections++;
    this.stats.complexityCounts[plan.complexity]++;
    if (plan.status === 'unresolved') {
      this.stats.unresolvedCount++;
    } else if (plan.secondaries.length > 0) {
      this.stats.hybridCount++;
    }
    this.confidenceSum += plan.confidence;
    this.stats.avgConfidence = this.confidenceSum / this.stats.totalSelections;
  }

  getStats(): SelectionStats {
    return { ...this.stats, complexityCounts: { ...this.stats.complexityCounts } };
  }

  resetStats(): void {
    this.stats = emptyStats();
    this.confidenceSum = 0;
  }

  getConfig(): SelectorConfig {
    return { ...this.config };
  }
}

function emptyStats(): SelectionStats {
  return {
    totalSelections: 0,
    complexityCounts: {
      [ComplexityClass.SIMPLE]: 0,
      [ComplexityClass.MEDIUM]: 0,
      [ComplexityClass.COMPLEX]: 0
    },
    hybridCount: 0,
    unresolvedCount: 0,
    avgConfidence: 0
  };
}
