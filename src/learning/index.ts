/**
 * Learning Module
 */

export { LearningStore } from './LearningStore.js';
export { shapeReward } from './reward.js';
export type { RewardInput } from './reward.js';
export { DEFAULT_LEARNING_CONFIG, DEFAULT_REWARD_CONFIG } from './types.js';
export type {
  LearningWeight,
  LearningConfig,
  LearningStatistics,
  RewardConfig
} from './types.js';
