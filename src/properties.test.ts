/**
 * Randomized invariant checks over a seeded generator, so failures
 * reproduce.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SQLiteStorage } from './storage/SQLiteStorage.js';
import { LearningStore } from './learning/LearningStore.js';
import { Selector } from './routing/Selector.js';
import { ExecutionRecorder } from './recording/ExecutionRecorder.js';
import { RecommendationMatcher } from './recommendation/RecommendationMatcher.js';
import { FallbackEscalator, levelFor } from './failure/FallbackEscalator.js';
import { FallbackLevel } from './failure/types.js';
import type { CapabilityCatalog, CatalogEntry } from './catalog/CapabilityCatalog.js';
import { ProviderCategory, RESULT_STATUSES, ResultStatus, isSuccessStatus } from './core/types.js';
import { catalogOf } from './testing/fixtures.js';

const ITERATIONS = 1000;

function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function pick<T>(random: () => number, items: readonly T[]): T {
  return items[Math.floor(random() * items.length)];
}

const WORDS = [
  'summarize', 'latest', 'news', 'then', 'analyze', 'compare', 'run', 'script',
  'write', 'draft', 'report', 'figures', 'first', 'finally', 'today', 'search',
  'calculate', 'step', 'by', 'the', 'market', '1.', '2.', '2024'
];

function randomText(random: () => number): string {
  const length = 1 + Math.floor(random() * 40);
  const words: string[] = [];
  for (let i = 0; i < length; i++) words.push(pick(random, WORDS));
  return words.join(' ');
}

function randomCatalog(random: () => number): CapabilityCatalog {
  const entries: CatalogEntry[] = [];
  const count = 1 + Math.floor(random() * 6);
  const categories = Object.values(ProviderCategory);
  for (let i = 0; i < count; i++) {
    entries.push({
      id: `p${i}`,
      category: pick(random, categories),
      keywords: [pick(random, WORDS), pick(random, WORDS)]
    });
  }
  return catalogOf(entries);
}

describe('invariants', () => {
  let storage: SQLiteStorage;
  let learning: LearningStore;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    storage = new SQLiteStorage({ sqlitePath: ':memory:', enableWAL: false });
    learning = new LearningStore(storage);
  });

  afterEach(() => {
    storage.close();
    vi.restoreAllMocks();
  });

  it('should keep plans and weights within bounds', () => {
    const random = mulberry32(7);
    const catalog = randomCatalog(random);
    const selector = new Selector(catalog, learning);
    const recorder = new ExecutionRecorder(storage, learning);

    for (let i = 0; i < ITERATIONS; i++) {
      const plan = selector.route({ text: randomText(random) });

      expect(plan.confidence).toBeGreaterThanOrEqual(0);
      expect(plan.confidence).toBeLessThanOrEqual(1);

      if (plan.status === 'resolved') {
        expect(catalog.get(plan.primary)?.category).toBe(plan.primaryCategory);
        expect(plan.executionOrder.filter(id => id === plan.primary)).toHaveLength(1);
        expect([...plan.executionOrder].sort()).toEqual([plan.primary, ...plan.secondaries].sort());
        expect(plan.secondaries.length).toBeLessThanOrEqual(2);
      } else {
        expect(catalog.byCategory(plan.primaryCategory)).toHaveLength(0);
      }

      const status = pick(random, RESULT_STATUSES);
      const providersUsed = plan.status === 'resolved' ? [...plan.executionOrder] : [];
      const before = learning.weightsSnapshot();

      recorder.record(plan.request, plan, {
        status,
        score: random() * 1.4 - 0.2,
        executionTimeMs: random() * 2000,
        providersUsed
      });

      for (const id of providersUsed) {
        const weight = learning.getWeight(id);
        expect(weight).toBeDefined();
        if (!weight) continue;
        expect(weight.avgScore).toBeGreaterThanOrEqual(0);
        expect(weight.avgScore).toBeLessThanOrEqual(1);
        expect(weight.avgLatencyMs).toBeGreaterThanOrEqual(0);
        expect(weight.successCount).toBeLessThanOrEqual(weight.useCount);

        if (status === ResultStatus.SUCCESS_PERFECT) {
          const previous = before.get(id)?.avgScore ?? 0;
          expect(weight.avgScore).toBeGreaterThanOrEqual(previous);
        }
      }
    }

    const stats = learning.statistics();
    expect(stats.totalRecords).toBe(ITERATIONS);
    expect(learning.weightsSnapshot()).toEqual(learning.weightsSnapshot());
  }, 30_000);

  it('should escalate with the trailing streak of a chain', () => {
    const random = mulberry32(42);
    const catalog = randomCatalog(random);
    const selector = new Selector(catalog, learning);
    const recorder = new ExecutionRecorder(storage, learning);
    const escalator = new FallbackEscalator(storage, catalog, new RecommendationMatcher(catalog, learning));
    const chainId = 'property-chain';

    let streak = 0;
    for (let i = 0; i < ITERATIONS; i++) {
      const plan = selector.route({ text: randomText(random), chainId });
      const status = pick(random, RESULT_STATUSES);
      const score = random();
      const providersUsed = ['p0'];

      recorder.record(plan.request, plan, { status, score, executionTimeMs: 10, providersUsed });
      streak = isSuccessStatus(status) && score >= 0.6 ? 0 : streak + 1;

      const decision = escalator.check(providersUsed, chainId);
      expect(decision.shouldFallback).toBe(streak > 0);
      expect(decision.failureStreak).toBe(Math.min(streak, 50));
      if (streak > 0) {
        expect(decision.level).toBe(levelFor(streak));
        expect(decision.userVisible).toBe(decision.level >= FallbackLevel.TOOL_EXECUTION);
        expect(decision.recommendedTools).not.toContain('p0');
        expect(decision.recommendedTools.length).toBeLessThanOrEqual(3);
      }
    }
  }, 30_000);

  it('should recommend nothing for unrelated text', () => {
    const random = mulberry32(3);
    for (let i = 0; i < 50; i++) {
      const matcher = new RecommendationMatcher(randomCatalog(random), learning);
      expect(matcher.recommend('zebra quartz violin')).toEqual([]);
    }
  });
});
