/**
 * SQLite Storage Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { SQLiteStorage } from './SQLiteStorage.js';
import { ProviderCategory, ResultStatus, UNRESOLVED_PROVIDER } from '../core/types.js';
import { issueUnresolvedPlan } from '../routing/plan.js';
import { makeRecord, makeRequest } from '../testing/fixtures.js';

describe('SQLiteStorage', () => {
  let storage: SQLiteStorage;

  beforeEach(() => {
    storage = new SQLiteStorage({ sqlitePath: ':memory:', enableWAL: false });
  });

  afterEach(() => {
    storage.close();
  });

  describe('execution records', () => {
    it('should read back an appended record', () => {
      const record = makeRecord({
        providersUsed: ['searcher', 'writer'],
        status: ResultStatus.SUCCESS_PARTIAL,
        score: 0.7,
        executionTimeMs: 1500,
        text: 'Summarize the latest news',
        error: 'truncated output',
        userSatisfaction: 4
      });
      storage.appendRecord(record);

      const loaded = storage.getRecord(record.id);
      expect(loaded).not.toBeNull();
      expect(loaded?.chainId).toBe(record.chainId);
      expect(loaded?.status).toBe(ResultStatus.SUCCESS_PARTIAL);
      expect(loaded?.score).toBe(0.7);
      expect(loaded?.executionTimeMs).toBe(1500);
      expect(loaded?.providersUsed).toEqual(['searcher', 'writer']);
      expect(loaded?.error).toBe('truncated output');
      expect(loaded?.userSatisfaction).toBe(4);
      expect(loaded?.learningValue).toBe(record.learningValue);
      expect(loaded?.createdAt.getTime()).toBe(record.createdAt.getTime());
      expect(loaded?.request.text).toBe('Summarize the latest news');
      expect(loaded?.request.createdAt.getTime()).toBe(record.request.createdAt.getTime());
      expect(loaded?.plan.primary).toBe('searcher');
      expect(loaded?.plan.secondaries).toEqual(['writer']);
    });

    it('should leave optional fields undefined', () => {
      const record = makeRecord({ providersUsed: ['writer'], status: ResultStatus.SUCCESS_PERFECT });
      storage.appendRecord(record);

      const loaded = storage.getRecord(record.id);
      expect(loaded?.error).toBeUndefined();
      expect(loaded?.userSatisfaction).toBeUndefined();
    });

    it('should round-trip an unresolved plan', () => {
      const request = makeRequest('Draft a thank-you note');
      const plan = issueUnresolvedPlan(request, ProviderCategory.GENERATION);
      const base = makeRecord({ providersUsed: [], status: ResultStatus.FAILURE_CONFIG, score: 0 });
      storage.appendRecord({ ...base, request, plan, chainId: request.chainId });

      const loaded = storage.getRecord(base.id);
      expect(loaded?.plan.status).toBe('unresolved');
      expect(loaded?.plan.primary).toBe(UNRESOLVED_PROVIDER);
      expect(loaded?.plan.confidence).toBe(0);
    });

    it('should return null for an unknown record', () => {
      expect(storage.getRecord('missing')).toBeNull();
    });

    it('should list a chain newest first', () => {
      const first = makeRecord({ providersUsed: ['a'], status: ResultStatus.FAILURE_SYSTEM, chainId: 'chain-1' });
      const second = makeRecord({ providersUsed: ['b'], status: ResultStatus.FAILURE_USER, chainId: 'chain-1' });
      const other = makeRecord({ providersUsed: ['c'], status: ResultStatus.SUCCESS_PERFECT, chainId: 'chain-2' });
      storage.appendRecord(first);
      storage.appendRecord(second);
      storage.appendRecord(other);

      expect(storage.getRecordsByChain('chain-1').map(r => r.id)).toEqual([second.id, first.id]);
      expect(storage.getRecordsByChain('chain-1', 1).map(r => r.id)).toEqual([second.id]);
      expect(storage.countRecords()).toBe(3);
    });

    it('should list records by status', () => {
      const failed = makeRecord({ providersUsed: ['a'], status: ResultStatus.FAILURE_SYSTEM });
      storage.appendRecord(failed);
      storage.appendRecord(makeRecord({ providersUsed: ['a'], status: ResultStatus.SUCCESS_PERFECT }));

      expect(storage.getRecordsByStatus(ResultStatus.FAILURE_SYSTEM).map(r => r.id)).toEqual([failed.id]);
      expect(storage.getRecordsByStatus(ResultStatus.FAILURE_CONFIG)).toEqual([]);
    });

    it('should find the chain of the most recent record using a provider', () => {
      storage.appendRecord(makeRecord({ providersUsed: ['a'], status: ResultStatus.FAILURE_SYSTEM, chainId: 'c1' }));
      storage.appendRecord(makeRecord({ providersUsed: ['b', 'x'], status: ResultStatus.FAILURE_SYSTEM, chainId: 'c2' }));

      expect(storage.getLatestChainForProviders(['a'])).toBe('c1');
      expect(storage.getLatestChainForProviders(['x'])).toBe('c2');
      expect(storage.getLatestChainForProviders(['a', 'b'])).toBe('c2');
      expect(storage.getLatestChainForProviders(['zzz'])).toBeNull();
      expect(storage.getLatestChainForProviders([])).toBeNull();
    });

    it('should find the chain of an unresolved plan by its primary', () => {
      const request = makeRequest('Compare the two reports', { chainId: 'c3' });
      const plan = issueUnresolvedPlan(request, ProviderCategory.REASONING);
      const base = makeRecord({ providersUsed: [], status: ResultStatus.FAILURE_CONFIG, score: 0 });
      storage.appendRecord({ ...base, request, plan, chainId: 'c3' });
      storage.appendRecord(makeRecord({ providersUsed: ['a'], status: ResultStatus.FAILURE_SYSTEM, chainId: 'c1' }));

      expect(storage.getLatestChainForProviders([UNRESOLVED_PROVIDER])).toBe('c3');
    });
  });

  describe('provider weights', () => {
    it('should insert and update a weight row', () => {
      const updatedAt = new Date('2024-05-01T10:00:00.000Z');
      storage.upsertWeight({ providerId: 'p', useCount: 1, successCount: 1, avgScore: 0.5, avgLatencyMs: 200, updatedAt });
      storage.upsertWeight({ providerId: 'p', useCount: 2, successCount: 1, avgScore: 0.41, avgLatencyMs: 260, updatedAt });

      expect(storage.getWeight('p')).toEqual({
        providerId: 'p',
        useCount: 2,
        successCount: 1,
        avgScore: 0.41,
        avgLatencyMs: 260,
        updatedAt
      });
      expect(storage.getWeight('missing')).toBeNull();
    });

    it('should list weights in provider order', () => {
      const updatedAt = new Date();
      storage.upsertWeight({ providerId: 'b', useCount: 1, successCount: 0, avgScore: 0, avgLatencyMs: 0, updatedAt });
      storage.upsertWeight({ providerId: 'a', useCount: 1, successCount: 1, avgScore: 1, avgLatencyMs: 0, updatedAt });

      expect(storage.getAllWeights().map(w => w.providerId)).toEqual(['a', 'b']);
    });
  });

  describe('status counts', () => {
    it('should start every status at zero and increment', () => {
      storage.incrementStatusCount(ResultStatus.FAILURE_USER);
      storage.incrementStatusCount(ResultStatus.FAILURE_USER);
      storage.incrementStatusCount(ResultStatus.SUCCESS_PERFECT);

      const counts = storage.getStatusCounts();
      expect(counts[ResultStatus.FAILURE_USER]).toBe(2);
      expect(counts[ResultStatus.SUCCESS_PERFECT]).toBe(1);
      expect(counts[ResultStatus.FAILURE_RESOURCE]).toBe(0);
    });
  });

  describe('transactions', () => {
    it('should roll back when the callback throws', () => {
      const updatedAt = new Date();
      expect(() => storage.transaction(() => {
        storage.upsertWeight({ providerId: 'p', useCount: 1, successCount: 1, avgScore: 1, avgLatencyMs: 0, updatedAt });
        throw new Error('boom');
      })).toThrow('boom');

      expect(storage.getWeight('p')).toBeNull();
    });
  });

  describe('file databases', () => {
    it('should persist records across reopen', () => {
      const dir = mkdtempSync(join(tmpdir(), 'switchyard-storage-'));
      const path = join(dir, 'test.db');
      try {
        const first = new SQLiteStorage({ sqlitePath: path, enableWAL: true });
        first.appendRecord(makeRecord({ providersUsed: ['a'], status: ResultStatus.SUCCESS_PERFECT }));
        first.close();

        const second = new SQLiteStorage({ sqlitePath: path, enableWAL: true });
        expect(second.countRecords()).toBe(1);
        second.close();
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });
});
