/**
 * Recommendation Matcher Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SQLiteStorage } from '../storage/SQLiteStorage.js';
import { LearningStore } from '../learning/LearningStore.js';
import { RecommendationMatcher, medianOf } from './RecommendationMatcher.js';
import { matchKeywords, stem, tokenize } from './keywordMatch.js';
import { ProviderCategory, ResultStatus } from '../core/types.js';
import { catalogOf, makeRecord } from '../testing/fixtures.js';

describe('keywordMatch', () => {
  describe('tokenize', () => {
    it('should lower-case and split on non-alphanumerics', () => {
      expect(Array.from(tokenize('Search the LATEST-news, 2024!'))).toEqual(['search', 'the', 'latest', 'news', '2024']);
    });

    it('should return nothing for blank text', () => {
      expect(tokenize('  ... ').size).toBe(0);
    });
  });

  describe('stem', () => {
    it('should fold common verb forms together', () => {
      expect(stem('searching')).toBe('search');
      expect(stem('searched')).toBe('search');
      expect(stem('searches')).toBe('search');
      expect(stem('search')).toBe('search');
    });

    it('should undouble a final consonant after stripping', () => {
      expect(stem('running')).toBe('run');
      expect(stem('calling')).toBe('call');
    });

    it('should handle plurals', () => {
      expect(stem('queries')).toBe('query');
      expect(stem('calls')).toBe('call');
      expect(stem('class')).toBe('class');
    });

    it('should drop a trailing e', () => {
      expect(stem('generate')).toBe(stem('generated'));
      expect(stem('rate')).toBe('rat');
    });
  });

  describe('matchKeywords', () => {
    it('should score matched over declared', () => {
      const result = matchKeywords(new Set(['search', 'news', 'archive']), tokenize('searching news'));

      expect(result.matched).toEqual(['news', 'search']);
      expect(result.matchScore).toBeCloseTo(2 / 3, 10);
    });

    it('should require every word of a multi-word keyword', () => {
      const declared = new Set(['stock price', 'news']);

      expect(matchKeywords(declared, tokenize('stock prices today'))).toEqual({ matched: ['stock price'], matchScore: 0.5 });
      expect(matchKeywords(declared, tokenize('stock levels')).matchScore).toBe(0);
    });

    it('should score zero for no declared keywords', () => {
      expect(matchKeywords(new Set(), tokenize('anything'))).toEqual({ matched: [], matchScore: 0 });
    });
  });
});

describe('medianOf', () => {
  it('should take the middle value', () => {
    expect(medianOf([3, 1, 2])).toBe(2);
    expect(medianOf([4, 1, 3, 2])).toBe(2.5);
    expect(medianOf([])).toBe(0);
  });
});

describe('RecommendationMatcher', () => {
  let storage: SQLiteStorage;
  let learning: LearningStore;
  let matcher: RecommendationMatcher;

  beforeEach(() => {
    storage = new SQLiteStorage({ sqlitePath: ':memory:', enableWAL: false });
    learning = new LearningStore(storage);
    matcher = new RecommendationMatcher(catalogOf([
      { id: 'writer', category: ProviderCategory.GENERATION, keywords: ['write', 'generate'], description: 'Writes text' },
      { id: 'searcher', category: ProviderCategory.SEARCH, keywords: ['latest', 'search'] },
      { id: 'economist', category: ProviderCategory.REASONING, keywords: ['inflation', 'rate', 'analyze', 'trend'] }
    ]), learning);
  });

  afterEach(() => {
    storage.close();
  });

  it('should rank by confidence then id', () => {
    const results = matcher.recommend('What is the latest inflation rate?');

    expect(results.map(r => r.providerId)).toEqual(['economist', 'searcher']);
    expect(results[0].matchedKeywords).toEqual(['inflation', 'rate']);
    expect(results[0].matchScore).toBe(0.5);
    expect(results[0].confidence).toBe(0.5);
    expect(results[1].matchedKeywords).toEqual(['latest']);
  });

  it('should boost providers scoring above the median', () => {
    learning.ingest(makeRecord({ providersUsed: ['searcher'], status: ResultStatus.SUCCESS_PERFECT }));

    const results = matcher.recommend('What is the latest inflation rate?');

    expect(results.map(r => r.providerId)).toEqual(['searcher', 'economist']);
    expect(results[0].confidence).toBeCloseTo(0.6, 10);
    expect(results[0].matchScore).toBe(0.5);
    expect(results[1].confidence).toBe(0.5);
  });

  it('should skip excluded providers', () => {
    const results = matcher.recommend('What is the latest inflation rate?', ['economist']);
    expect(results.map(r => r.providerId)).toEqual(['searcher']);
  });

  it('should filter by category and limit results', () => {
    expect(matcher.recommend('latest inflation', [], { categories: [ProviderCategory.SEARCH] }).map(r => r.providerId))
      .toEqual(['searcher']);
    expect(matcher.recommend('latest inflation', [], { maxResults: 1 })).toHaveLength(1);
  });

  it('should carry the provider description', () => {
    const [result] = matcher.recommend('write something');
    expect(result.providerId).toBe('writer');
    expect(result.description).toBe('Writes text');
  });

  it('should return nothing without any overlap', () => {
    expect(matcher.recommend('bake a cake')).toEqual([]);
    expect(matcher.recommend('')).toEqual([]);
  });

  it('should drop results under the minimum confidence', () => {
    const strict = new RecommendationMatcher(catalogOf([
      { id: 'economist', category: ProviderCategory.REASONING, keywords: ['inflation', 'rate', 'analyze', 'trend'] }
    ]), learning, { minConfidence: 0.5 });

    expect(strict.recommend('inflation today')).toEqual([]);
    expect(strict.recommend('inflation rate')).toHaveLength(1);
  });
});
