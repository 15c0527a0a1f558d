/**
 * Core Types
 *
 * Shared type definitions for Switchyard: providers, requests,
 * selection plans and execution records.
 */

import type { JsonObject } from './context.js';

/**
 * Category a capability provider belongs to
 */
export enum ProviderCategory {
  /** Multi-step / sequential reasoners */
  REASONING = 'reasoning',
  /** Lightweight single-shot generators */
  GENERATION = 'generation',
  /** Search-augmented agents */
  SEARCH = 'search',
  /** Code and tool execution */
  EXECUTION = 'execution'
}

export const PROVIDER_CATEGORIES: readonly ProviderCategory[] = [
  ProviderCategory.REASONING,
  ProviderCategory.GENERATION,
  ProviderCategory.SEARCH,
  ProviderCategory.EXECUTION
];

/**
 * Complexity class derived from request text
 */
export enum ComplexityClass {
  SIMPLE = 'simple',
  MEDIUM = 'medium',
  COMPLEX = 'complex'
}

/**
 * Ordinal of a complexity class (simple = 1)
 */
export function complexityOrdinal(complexity: ComplexityClass): number {
  switch (complexity) {
    case ComplexityClass.SIMPLE:
      return 1;
    case ComplexityClass.MEDIUM:
      return 2;
    case ComplexityClass.COMPLEX:
      return 3;
    default: {
      const unreachable: never = complexity;
      throw new Error(`Unknown complexity class: ${String(unreachable)}`);
    }
  }
}

/**
 * Outcome of executing a selection plan
 */
export enum ResultStatus {
  SUCCESS_PERFECT = 'success_perfect',
  SUCCESS_PARTIAL = 'success_partial',
  SUCCESS_ACCEPTABLE = 'success_acceptable',
  /** Malformed or out-of-scope request */
  FAILURE_USER = 'failure_user',
  /** Provider invocation crashed */
  FAILURE_SYSTEM = 'failure_system',
  /** Catalog or category misconfiguration */
  FAILURE_CONFIG = 'failure_config',
  /** Timeout or quota exhaustion */
  FAILURE_RESOURCE = 'failure_resource'
}

export const RESULT_STATUSES: readonly ResultStatus[] = Object.values(ResultStatus);

export function emptyStatusCounts(): Record<ResultStatus, number> {
  return {
    [ResultStatus.SUCCESS_PERFECT]: 0,
    [ResultStatus.SUCCESS_PARTIAL]: 0,
    [ResultStatus.SUCCESS_ACCEPTABLE]: 0,
    [ResultStatus.FAILURE_USER]: 0,
    [ResultStatus.FAILURE_SYSTEM]: 0,
    [ResultStatus.FAILURE_CONFIG]: 0,
    [ResultStatus.FAILURE_RESOURCE]: 0
  };
}

export function isSuccessStatus(status: ResultStatus): boolean {
  switch (status) {
    case ResultStatus.SUCCESS_PERFECT:
    case ResultStatus.SUCCESS_PARTIAL:
    case ResultStatus.SUCCESS_ACCEPTABLE:
      return true;
    case ResultStatus.FAILURE_USER:
    case ResultStatus.FAILURE_SYSTEM:
    case ResultStatus.FAILURE_CONFIG:
    case ResultStatus.FAILURE_RESOURCE:
      return false;
    default: {
      const unreachable: never = status;
      throw new Error(`Unknown result status: ${String(unreachable)}`);
    }
  }
}

/**
 * How much a record is worth as training signal
 */
export enum LearningValue {
  HIGH = 'high_value',
  MEDIUM = 'medium_value',
  LOW = 'low_value',
  NEGATIVE = 'negative_value'
}

/**
 * A provider known to the capability catalog
 */
export interface CapabilityProvider {
  /** Stable provider id */
  readonly id: string;
  /** Display name */
  readonly name: string;
  readonly category: ProviderCategory;
  /** Declared keywords, lower-cased */
  readonly keywords: ReadonlySet<string>;
  readonly description: string;
}

/**
 * Input for building a request
 */
export interface RequestInput {
  text: string;
  context?: Record<string, unknown>;
  /** Request chain this request continues (defaults to the request id) */
  chainId?: string;
}

/**
 * A classified incoming request
 */
export interface Request {
  readonly id: string;
  readonly text: string;
  /** Free-form JSON data carried with the request */
  readonly context: Readonly<JsonObject>;
  readonly chainId: string;
  readonly complexity: ComplexityClass;
  readonly createdAt: Date;
}

/**
 * Sentinel primary for plans that could not be resolved
 */
export const UNRESOLVED_PROVIDER = '__unresolved__';

interface SelectionPlanBase {
  readonly id: string;
  readonly request: Request;
  readonly complexity: ComplexityClass;
  /** Category the primary slot was resolved against */
  readonly primaryCategory: ProviderCategory;
  readonly createdAt: Date;
}

export interface ResolvedPlan extends SelectionPlanBase {
  readonly status: 'resolved';
  readonly primary: string;
  readonly secondaries: readonly string[];
  /** Intended invocation order over primary and secondaries */
  readonly executionOrder: readonly string[];
  /** Confidence in the plan (0-1) */
  readonly confidence: number;
}

export interface UnresolvedPlan extends SelectionPlanBase {
  readonly status: 'unresolved';
  readonly primary: typeof UNRESOLVED_PROVIDER;
  readonly secondaries: readonly [];
  readonly executionOrder: readonly [];
  readonly confidence: 0;
}

export type SelectionPlan = ResolvedPlan | UnresolvedPlan;

/**
 * Append-only outcome of running a plan
 */
export interface ExecutionRecord {
  readonly id: string;
  readonly chainId: string;
  readonly request: Request;
  readonly plan: SelectionPlan;
  readonly status: ResultStatus;
  /** Success score (0-1) */
  readonly score: number;
  readonly executionTimeMs: number;
  /** Providers actually invoked */
  readonly providersUsed: readonly string[];
  readonly error?: string;
  /** User satisfaction rating (1-5) */
  readonly userSatisfaction?: number;
  readonly learningValue: LearningValue;
  readonly createdAt: Date;
}

/**
 * Clamp a value into [0, 1]; NaN becomes 0
 */
export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

/**
 * Stable id order (code-point comparison)
 */
export function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
