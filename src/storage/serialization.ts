/**
 * JSON columns of execution_records, parsed back with zod.
 */

import { z } from 'zod';
import { JsonObjectSchema } from '../core/context.js';
import {
  ComplexityClass,
  LearningValue,
  ProviderCategory,
  ResultStatus,
  UNRESOLVED_PROVIDER,
  type ExecutionRecord,
  type Request,
  type SelectionPlan
} from '../core/types.js';
import type { RecordRow } from './types.js';

const RequestSchema = z.object({
  id: z.string(),
  text: z.string(),
  context: JsonObjectSchema,
  chainId: z.string(),
  complexity: z.nativeEnum(ComplexityClass),
  createdAt: z.coerce.date()
});

const PlanBaseSchema = z.object({
  id: z.string(),
  request: RequestSchema,
  complexity: z.nativeEnum(ComplexityClass),
  primaryCategory: z.nativeEnum(ProviderCategory),
  createdAt: z.coerce.date()
});

const PlanSchema = z.discriminatedUnion('status', [
  PlanBaseSchema.extend({
    status: z.literal('resolved'),
    primary: z.string(),
    secondaries: z.array(z.string()),
    executionOrder: z.array(z.string()),
    confidence: z.number()
  }),
  PlanBaseSchema.extend({
    status: z.literal('unresolved'),
    primary: z.literal(UNRESOLVED_PROVIDER),
    secondaries: z.tuple([]),
    executionOrder: z.tuple([]),
    confidence: z.literal(0)
  })
]);

export function parseRequest(json: string): Request {
  return RequestSchema.parse(JSON.parse(json));
}

export function parsePlan(json: string): SelectionPlan {
  return PlanSchema.parse(JSON.parse(json));
}

export function rowToRecord(row: RecordRow): ExecutionRecord {
  const record: ExecutionRecord = {
    id: row.id,
    chainId: row.chain_id,
    request: parseRequest(row.request_json),
    plan: parsePlan(row.plan_json),
    status: z.nativeEnum(ResultStatus).parse(row.status),
    score: row.score,
    executionTimeMs: row.execution_time_ms,
    providersUsed: z.array(z.string()).parse(JSON.parse(row.providers_used)),
    learningValue: z.nativeEnum(LearningValue).parse(row.learning_value),
    createdAt: new Date(row.created_at),
    ...(row.error !== null ? { error: row.error } : {}),
    ...(row.user_satisfaction !== null ? { userSatisfaction: row.user_satisfaction } : {})
  };
  return record;
}
