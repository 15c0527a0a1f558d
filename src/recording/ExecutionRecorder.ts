/**
 * Execution Recorder
 *
 * Persists the outcome of running a SelectionPlan and forwards it to the
 * Learning Store. Records are append-only; submitting the same outcome
 * twice records two events.
 */

import { v4 as uuidv4 } from 'uuid';
import { OrphanRecordError, RequestMismatchError } from '../core/errors.js';
import {
  type ExecutionRecord,
  type Request,
  type ResultStatus,
  type SelectionPlan,
  clamp01
} from '../core/types.js';
import type { LearningStore } from '../learning/LearningStore.js';
import { isIssuedPlan } from '../routing/plan.js';
import type { SQLiteStorage } from '../storage/SQLiteStorage.js';
import { assessLearningValue } from './learningValue.js';

/**
 * What the caller reports after executing a plan
 */
export interface ExecutionReport {
  status: ResultStatus;
  /** Success score (0-1); clamped */
  score: number;
  /** Wall-clock execution time; negative values become 0 */
  executionTimeMs: number;
  /** Providers actually invoked, in invocation order */
  providersUsed: readonly string[];
  error?: string;
  /** User rating (1-5); rounded and clamped */
  userSatisfaction?: number;
}

export class ExecutionRecorder {
  private storage: SQLiteStorage;
  private learning: LearningStore;

  constructor(storage: SQLiteStorage, learning: LearningStore) {
    this.storage = storage;
    this.learning = learning;
  }

  /**
   * Record an execution outcome
   *
   * @throws OrphanRecordError if the plan was not issued by the Selector
   * @throws RequestMismatchError if the request is not the plan's request
   */
  record(request: Request, plan: SelectionPlan, report: ExecutionReport): ExecutionRecord {
    if (!isIssuedPlan(plan)) {
      throw new OrphanRecordError(plan.id);
    }
    if (request.id !== plan.request.id) {
      throw new RequestMismatchError(request.id, plan.request.id);
    }

    const score = clamp01(report.score);
    if (score !== report.score) {
      console.warn(`[Recorder] Score ${report.score} clamped to ${score}`);
    }

    const executionTimeMs = Number.isFinite(report.executionTimeMs) ? Math.max(0, report.executionTimeMs) : 0;
    if (executionTimeMs !== report.executionTimeMs) {
      console.warn(`[Recorder] Execution time ${report.executionTimeMs} clamped to ${executionTimeMs}`);
    }

    const userSatisfaction = normalizeSatisfaction(report.userSatisfaction);
    const providersUsed = Object.freeze([...report.providersUsed]);

    const record: ExecutionRecord = Object.freeze({
      id: uuidv4(),
      chainId: request.chainId,
      request,
      plan,
      status: report.status,
      score,
      executionTimeMs,
      providersUsed,
      ...(report.error !== undefined ? { error: report.error } : {}),
      ...(userSatisfaction !== undefined ? { userSatisfaction } : {}),
      learningValue: assessLearningValue({
        complexity: request.complexity,
        status: report.status,
        score,
        providerCount: providersUsed.length
      }),
      createdAt: new Date()
    });

    this.storage.appendRecord(record);
    this.learning.ingest(record);

    return record;
  }

  /**
   * Records of a request chain, newest first
   */
  getChain(chainId: string, limit?: number): ExecutionRecord[] {
    return this.storage.getRecordsByChain(chainId, limit);
  }

  getRecord(id: string): ExecutionRecord | null {
    return this.storage.getRecord(id);
  }

  getRecordsByStatus(status: ResultStatus, limit?: number): ExecutionRecord[] {
    return this.storage.getRecordsByStatus(status, limit);
  }

  countRecords(): number {
    return this.storage.countRecords();
  }
}

function normalizeSatisfaction(value: number | undefined): number | undefined {
  if (value === undefined || Number.isNaN(value)) return undefined;
  const rating = Math.max(1, Math.min(5, Math.round(value)));
  if (rating !== value) {
    console.warn(`[Recorder] User satisfaction ${value} clamped to ${rating}`);
  }
  return rating;
}
