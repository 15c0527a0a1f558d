/**
 * Learning value of an execution record: how useful the record is as a
 * training example. Harder requests, clean successes, high scores and
 * multi-provider runs are worth more; failures are worth less.
 */

import {
  type ComplexityClass,
  LearningValue,
  ResultStatus,
  clamp01,
  complexityOrdinal
} from '../core/types.js';

const COMPLEXITY_BASE = [0.1, 0.3, 0.5] as const;

export interface LearningValueInput {
  complexity: ComplexityClass;
  status: ResultStatus;
  score: number;
  providerCount: number;
}

/**
 * Raw learning value points (unclamped)
 */
export function learningValuePoints(input: LearningValueInput): number {
  let points = COMPLEXITY_BASE[complexityOrdinal(input.complexity) - 1];

  switch (input.status) {
    case ResultStatus.SUCCESS_PERFECT:
    case ResultStatus.SUCCESS_PARTIAL:
      points += 0.3;
      break;
    case ResultStatus.SUCCESS_ACCEPTABLE:
      points += 0.1;
      break;
    default:
      points -= 0.2;
  }

  points += 0.2 * clamp01(input.score);
  if (input.providerCount > 1) points += 0.2;

  return points;
}

export function assessLearningValue(input: LearningValueInput): LearningValue {
  const points = learningValuePoints(input);
  if (points >= 0.8) return LearningValue.HIGH;
  if (points >= 0.5) return LearningValue.MEDIUM;
  if (points >= 0.2) return LearningValue.LOW;
  return LearningValue.NEGATIVE;
}
