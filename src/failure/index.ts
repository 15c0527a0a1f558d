/**
 * Failure Module
 *
 * Fallback escalation for failing request chains.
 */

export { FallbackEscalator, levelFor } from './FallbackEscalator.js';
export { suggestChecks } from './diagnostics.js';
export {
  FallbackLevel,
  DEFAULT_FALLBACK_CONFIG,
  LEVEL_DESCRIPTIONS
} from './types.js';
export type { FallbackConfig, FallbackDecision } from './types.js';
