/**
 * Switchyard - Adaptive Provider Router
 *
 * Routes requests to capability providers by complexity, learns from
 * execution outcomes, and escalates failing request chains.
 */

// Core exports
export { RoutingEngine } from './core/RoutingEngine.js';
export type { RoutingEngineOptions } from './core/RoutingEngine.js';
export { getDefaultConfig, validateConfig, mergeConfig } from './core/config.js';
export type { SwitchyardConfig, SwitchyardConfigOverrides } from './core/config.js';
export {
  CatalogError,
  OrphanRecordError,
  RequestMismatchError,
  ConfigValidationError,
  RequestContextError
} from './core/errors.js';
export { JsonValueSchema, JsonObjectSchema, parseRequestContext } from './core/context.js';
export type { JsonValue, JsonObject } from './core/context.js';

// Export enums as values (not just types)
export {
  ProviderCategory,
  ComplexityClass,
  ResultStatus,
  LearningValue,
  PROVIDER_CATEGORIES,
  RESULT_STATUSES,
  UNRESOLVED_PROVIDER,
  complexityOrdinal,
  isSuccessStatus,
  clamp01
} from './core/types.js';

// Export interfaces as types
export type {
  CapabilityProvider,
  RequestInput,
  Request,
  ResolvedPlan,
  UnresolvedPlan,
  SelectionPlan,
  ExecutionRecord
} from './core/types.js';

// Catalog exports
export { CapabilityCatalog, CatalogEntrySchema, DEFAULT_CATALOG_PATH } from './catalog/CapabilityCatalog.js';
export type { CatalogEntry } from './catalog/CapabilityCatalog.js';

// Storage exports
export { SQLiteStorage } from './storage/SQLiteStorage.js';
export { DEFAULT_STORAGE_CONFIG } from './storage/types.js';
export type { StorageConfig } from './storage/types.js';

// Routing exports
export * from './routing/index.js';

// Recording exports
export * from './recording/index.js';

// Learning exports
export * from './learning/index.js';

// Recommendation exports
export * from './recommendation/index.js';

// Failure exports
export * from './failure/index.js';
