/**
 * Request context validation.
 *
 * Contexts are persisted with every execution record, so they must be
 * plain JSON: no bigint, Date, function, undefined or non-finite values,
 * and no cycles.
 */

import { z } from 'zod';
import { RequestContextError } from './errors.js';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema)
  ])
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

function findCycle(value: unknown, ancestors: object[], path: string): string | null {
  if (typeof value !== 'object' || value === null) return null;
  if (ancestors.includes(value)) return path || '(root)';

  ancestors.push(value);
  for (const [key, child] of Object.entries(value)) {
    const cycle = findCycle(child, ancestors, path ? `${path}.${key}` : key);
    if (cycle) return cycle;
  }
  ancestors.pop();
  return null;
}

/**
 * Validate a request context and return a JSON-only copy
 *
 * @throws RequestContextError
 */
export function parseRequestContext(context: Record<string, unknown>): JsonObject {
  const cycle = findCycle(context, [], '');
  if (cycle) {
    throw new RequestContextError([`${cycle}: circular reference`]);
  }

  const parsed = JsonObjectSchema.safeParse(context);
  if (!parsed.success) {
    throw new RequestContextError(parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`));
  }
  return parsed.data;
}
