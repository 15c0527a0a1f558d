/**
 * Learning Store Types
 *
 * Per-provider learning weights, reward shaping parameters and the
 * aggregate statistics exposed for monitoring.
 */

import { ResultStatus } from '../core/types.js';

/**
 * Running statistics for one provider
 */
export interface LearningWeight {
  providerId: string;
  /** Number of executions the provider took part in */
  useCount: number;
  /** Number of those executions with a success status */
  successCount: number;
  /** Exponentially weighted moving average of observed score (0-1) */
  avgScore: number;
  /** Exponentially weighted moving average of execution time (ms) */
  avgLatencyMs: number;
  updatedAt: Date;
}

/**
 * Reward shaping parameters
 */
export interface RewardConfig {
  /** Base reward per result status */
  statusReward: Record<ResultStatus, number>;
  /** Multiplier applied to the success score */
  scoreScale: number;
  /** Bonus at zero execution time */
  efficiencyBonus: number;
  /** Execution time (ms) at which the efficiency bonus has halved */
  efficiencyHalfTimeMs: number;
  /** Largest absolute contribution of user satisfaction */
  satisfactionWeight: number;
}

/**
 * Learning Store configuration
 */
export interface LearningConfig {
  /** EMA smoothing factor: avg += alpha * (observed - avg) */
  alpha: number;
  /** avgScore of a provider with no history */
  initialScore: number;
  /** Observed score of a failure never exceeds this */
  failureScoreCeiling: number;
  reward: RewardConfig;
}

export const DEFAULT_REWARD_CONFIG: RewardConfig = {
  statusReward: {
    [ResultStatus.SUCCESS_PERFECT]: 1.0,
    [ResultStatus.SUCCESS_PARTIAL]: 0.6,
    [ResultStatus.SUCCESS_ACCEPTABLE]: 0.3,
    [ResultStatus.FAILURE_USER]: -0.2,
    [ResultStatus.FAILURE_SYSTEM]: -0.5,
    [ResultStatus.FAILURE_CONFIG]: -0.4,
    [ResultStatus.FAILURE_RESOURCE]: -0.3
  },
  scoreScale: 0.5,
  efficiencyBonus: 0.2,
  efficiencyHalfTimeMs: 5000,
  satisfactionWeight: 0.2
};

export const DEFAULT_LEARNING_CONFIG: LearningConfig = {
  alpha: 0.3,
  initialScore: 0.5,
  failureScoreCeiling: 0.2,
  reward: DEFAULT_REWARD_CONFIG
};

/**
 * Aggregate statistics over everything ingested
 */
export interface LearningStatistics {
  totalRecords: number;
  /** Fraction of records with a success status */
  overallSuccessRate: number;
  perProviderWeights: ReadonlyMap<string, Readonly<LearningWeight>>;
  statusCounts: Record<ResultStatus, number>;
}
