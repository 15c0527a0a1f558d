/**
 * Reward shaping for adaptive policies consuming execution records.
 *
 * reward = statusReward[status]
 *        + scoreScale * score
 *        + efficiencyBonus * halfTime / (halfTime + executionTime)
 *        + satisfactionWeight * (satisfaction - 3) / 2
 *
 * The sum is left unclamped.
 */

import type { ExecutionRecord } from '../core/types.js';
import { type RewardConfig, DEFAULT_REWARD_CONFIG } from './types.js';

export type RewardInput = Pick<ExecutionRecord, 'status' | 'score' | 'executionTimeMs' | 'userSatisfaction'>;

export function shapeReward(input: RewardInput, config: RewardConfig = DEFAULT_REWARD_CONFIG): number {
  const base = config.statusReward[input.status];
  const scoreTerm = config.scoreScale * input.score;

  const elapsed = Math.max(0, input.executionTimeMs);
  const efficiency = config.efficiencyHalfTimeMs > 0
    ? config.efficiencyBonus * config.efficiencyHalfTimeMs / (config.efficiencyHalfTimeMs + elapsed)
    : 0;

  let satisfaction = 0;
  if (input.userSatisfaction !== undefined) {
    const rating = Math.max(1, Math.min(5, input.userSatisfaction));
    satisfaction = config.satisfactionWeight * (rating - 3) / 2;
  }

  return base + scoreTerm + efficiency + satisfaction;
}
