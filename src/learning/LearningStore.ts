/**
 * Learning Store
 *
 * Aggregates execution records into per-provider weights. Scores and
 * latencies are exponentially smoothed; the first observation of a
 * provider seeds both averages.
 *
 * Each provider row is updated in its own SQLite transaction, so updates
 * to one provider apply in submission order and never wait on another.
 */

import {
  type ExecutionRecord,
  ResultStatus,
  RESULT_STATUSES,
  clamp01,
  isSuccessStatus
} from '../core/types.js';
import type { SQLiteStorage } from '../storage/SQLiteStorage.js';
import { shapeReward } from './reward.js';
import {
  type LearningConfig,
  type LearningStatistics,
  type LearningWeight,
  DEFAULT_LEARNING_CONFIG
} from './types.js';

export class LearningStore {
  private storage: SQLiteStorage;
  private config: LearningConfig;

  constructor(storage: SQLiteStorage, config: Partial<LearningConfig> = {}) {
    this.storage = storage;
    this.config = { ...DEFAULT_LEARNING_CONFIG, ...config };
  }

  /**
   * Fold a record into the weights of every provider it used
   */
  ingest(record: ExecutionRecord): void {
    const observed = this.observedScore(record);
    const latency = Math.max(0, record.executionTimeMs);
    const success = isSuccessStatus(record.status);

    for (const providerId of record.providersUsed) {
      this.storage.transaction(() => {
        const current = this.storage.getWeight(providerId);
        this.storage.upsertWeight(this.updateWeight(providerId, current, observed, latency, success));
      });
    }

    this.storage.incrementStatusCount(record.status);
  }

  /**
   * Score the EMA observes for a record
   */
  observedScore(record: Pick<ExecutionRecord, 'status' | 'score'>): number {
    if (record.status === ResultStatus.SUCCESS_PERFECT) return 1;
    const score = clamp01(record.score);
    if (!isSuccessStatus(record.status)) {
      return Math.min(score, this.config.failureScoreCeiling);
    }
    return score;
  }

  /**
   * Frozen copy of all provider weights
   */
  weightsSnapshot(): ReadonlyMap<string, Readonly<LearningWeight>> {
    const snapshot = new Map<string, Readonly<LearningWeight>>();
    for (const weight of this.storage.getAllWeights()) {
      snapshot.set(weight.providerId, Object.freeze(weight));
    }
    return snapshot;
  }

  getWeight(providerId: string): Readonly<LearningWeight> | undefined {
    const weight = this.storage.getWeight(providerId);
    return weight ? Object.freeze(weight) : undefined;
  }

  /**
   * avgScore a provider with no history is assumed to have
   */
  get initialScore(): number {
    return this.config.initialScore;
  }

  statistics(): LearningStatistics {
    const statusCounts = this.storage.getStatusCounts();
    let totalRecords = 0;
    let successRecords = 0;
    for (const status of RESULT_STATUSES) {
      totalRecords += statusCounts[status];
      if (isSuccessStatus(status)) successRecords += statusCounts[status];
    }

    return {
      totalRecords,
      overallSuccessRate: totalRecords > 0 ? successRecords / totalRecords : 0,
      perProviderWeights: this.weightsSnapshot(),
      statusCounts
    };
  }

  /**
   * Shaped reward for adaptive policies (unclamped)
   */
  reward(record: ExecutionRecord): number {
    return shapeReward(record, this.config.reward);
  }

  getConfig(): LearningConfig {
    return { ...this.config };
  }

  private updateWeight(
    providerId: string,
    current: LearningWeight | null,
    observed: number,
    latency: number,
    success: boolean
  ): LearningWeight {
    const alpha = this.config.alpha;

    if (!current || current.useCount === 0) {
      return {
        providerId,
        useCount: 1,
        successCount: success ? 1 : 0,
        avgScore: observed,
        avgLatencyMs: latency,
        updatedAt: new Date()
      };
    }

    return {
      providerId,
      useCount: current.useCount + 1,
      successCount: current.successCount + (success ? 1 : 0),
      avgScore: clamp01(current.avgScore + alpha * (observed - current.avgScore)),
      avgLatencyMs: Math.max(0, current.avgLatencyMs + alpha * (latency - current.avgLatencyMs)),
      updatedAt: new Date()
    };
  }
}
