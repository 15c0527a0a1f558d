/**
 * Test fixtures: small catalogs and hand-built execution records.
 */

import { v4 as uuidv4 } from 'uuid';
import { CapabilityCatalog, type CatalogEntry } from '../catalog/CapabilityCatalog.js';
import {
  ComplexityClass,
  ProviderCategory,
  type ExecutionRecord,
  type Request,
  type ResultStatus
} from '../core/types.js';
import { assessLearningValue } from '../recording/learningValue.js';
import { issueResolvedPlan } from '../routing/plan.js';

export function catalogOf(entries: CatalogEntry[]): CapabilityCatalog {
  return CapabilityCatalog.fromEntries(entries, 'fixture');
}

/**
 * One provider per category
 */
export function basicCatalog(): CapabilityCatalog {
  return catalogOf([
    { id: 'writer', category: ProviderCategory.GENERATION, keywords: ['write', 'draft'] },
    { id: 'searcher', category: ProviderCategory.SEARCH, keywords: ['search', 'latest'] },
    { id: 'reasoner', category: ProviderCategory.REASONING, keywords: ['analyze', 'compare'] },
    { id: 'runner', category: ProviderCategory.EXECUTION, keywords: ['run', 'calculate'] }
  ]);
}

export function makeRequest(text: string = 'test request', options: { chainId?: string; complexity?: ComplexityClass } = {}): Request {
  const id = uuidv4();
  return Object.freeze({
    id,
    text,
    context: Object.freeze({}),
    chainId: options.chainId ?? id,
    complexity: options.complexity ?? ComplexityClass.SIMPLE,
    createdAt: new Date()
  });
}

export interface RecordFixtureOptions {
  providersUsed: string[];
  status: ResultStatus;
  score?: number;
  executionTimeMs?: number;
  chainId?: string;
  text?: string;
  error?: string;
  userSatisfaction?: number;
}

/**
 * Build a record directly, bypassing the recorder
 */
export function makeRecord(options: RecordFixtureOptions): ExecutionRecord {
  const request = makeRequest(options.text, options.chainId ? { chainId: options.chainId } : {});
  const primary = options.providersUsed[0] ?? 'none';
  const plan = issueResolvedPlan({
    request,
    primaryCategory: ProviderCategory.GENERATION,
    primary,
    secondaries: options.providersUsed.slice(1),
    executionOrder: options.providersUsed.length > 0 ? [...options.providersUsed] : [primary],
    confidence: 0.5
  });
  const score = options.score ?? 1;

  return {
    id: uuidv4(),
    chainId: request.chainId,
    request,
    plan,
    status: options.status,
    score,
    executionTimeMs: options.executionTimeMs ?? 100,
    providersUsed: [...options.providersUsed],
    ...(options.error !== undefined ? { error: options.error } : {}),
    ...(options.userSatisfaction !== undefined ? { userSatisfaction: options.userSatisfaction } : {}),
    learningValue: assessLearningValue({
      complexity: request.complexity,
      status: options.status,
      score,
      providerCount: options.providersUsed.length
    }),
    createdAt: new Date()
  };
}
