/**
 * Selection plan construction.
 *
 * Plans are frozen and remembered in a WeakSet when issued, so the
 * recorder can refuse records for plans the Selector never produced.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  type ProviderCategory,
  type Request,
  type ResolvedPlan,
  type SelectionPlan,
  type UnresolvedPlan,
  UNRESOLVED_PROVIDER,
  clamp01
} from '../core/types.js';

const issuedPlans = new WeakSet<SelectionPlan>();

export interface ResolvedPlanInput {
  request: Request;
  primaryCategory: ProviderCategory;
  primary: string;
  secondaries: string[];
  executionOrder: string[];
  confidence: number;
}

export function issueResolvedPlan(input: ResolvedPlanInput): ResolvedPlan {
  const plan: ResolvedPlan = Object.freeze({
    id: uuidv4(),
    status: 'resolved' as const,
    request: input.request,
    complexity: input.request.complexity,
    primaryCategory: input.primaryCategory,
    primary: input.primary,
    secondaries: Object.freeze([...input.secondaries]),
    executionOrder: Object.freeze([...input.executionOrder]),
    confidence: clamp01(input.confidence),
    createdAt: new Date()
  });
  issuedPlans.add(plan);
  return plan;
}

export function issueUnresolvedPlan(request: Request, primaryCategory: ProviderCategory): UnresolvedPlan {
  const plan: UnresolvedPlan = Object.freeze({
    id: uuidv4(),
    status: 'unresolved' as const,
    request,
    complexity: request.complexity,
    primaryCategory,
    primary: UNRESOLVED_PROVIDER,
    secondaries: Object.freeze([] as const),
    executionOrder: Object.freeze([] as const),
    confidence: 0 as const,
    createdAt: new Date()
  });
  issuedPlans.add(plan);
  return plan;
}

/**
 * Whether the plan object was produced by the Selector in this process
 */
export function isIssuedPlan(plan: SelectionPlan): boolean {
  return issuedPlans.has(plan);
}

