/**
 * Configuration
 *
 * Default configuration and environment variable loading for Switchyard.
 */

import { config as loadDotenv } from 'dotenv';
import { join } from 'path';
import { DEFAULT_CATALOG_PATH } from '../catalog/CapabilityCatalog.js';
import { type FallbackConfig, DEFAULT_FALLBACK_CONFIG } from '../failure/types.js';
import { type LearningConfig, DEFAULT_LEARNING_CONFIG } from '../learning/types.js';
import { type RecommendationConfig, DEFAULT_RECOMMENDATION_CONFIG } from '../recommendation/types.js';
import {
  type ClassificationConfig,
  type SelectorConfig,
  DEFAULT_CLASSIFICATION_CONFIG,
  DEFAULT_SELECTOR_CONFIG
} from '../routing/types.js';
import type { StorageConfig } from '../storage/types.js';

// .env in the working directory
loadDotenv();

export interface SwitchyardConfig {
  dataDir: string;
  /** Capability catalog JSON file */
  catalogPath: string;
  storage: StorageConfig;
  classification: ClassificationConfig;
  selection: SelectorConfig;
  learning: LearningConfig;
  fallback: FallbackConfig;
  recommendation: RecommendationConfig;
}

/**
 * Section-wise partial configuration
 */
export type SwitchyardConfigOverrides = {
  [K in keyof SwitchyardConfig]?: SwitchyardConfig[K] extends object
    ? Partial<SwitchyardConfig[K]>
    : SwitchyardConfig[K];
};

function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  return raw === undefined || raw === '' ? fallback : parseFloat(raw);
}

export function getDefaultConfig(dataDir?: string): SwitchyardConfig {
  const baseDir = dataDir ?? process.env.SWITCHYARD_DATA_DIR ?? './data';

  // An explicit data directory wins over SWITCHYARD_DB_PATH
  const envDbPath = dataDir === undefined ? process.env.SWITCHYARD_DB_PATH : undefined;
  const storage: StorageConfig = {
    sqlitePath: envDbPath || join(baseDir, 'switchyard.db'),
    enableWAL: process.env.SWITCHYARD_ENABLE_WAL !== 'false'
  };

  const classification: ClassificationConfig = {
    ...DEFAULT_CLASSIFICATION_CONFIG,
    simpleMaxLength: envNumber('SWITCHYARD_SIMPLE_MAX_LENGTH', DEFAULT_CLASSIFICATION_CONFIG.simpleMaxLength),
    complexMinLength: envNumber('SWITCHYARD_COMPLEX_MIN_LENGTH', DEFAULT_CLASSIFICATION_CONFIG.complexMinLength),
    detectDates: process.env.SWITCHYARD_DETECT_DATES !== 'false'
  };

  const selection: SelectorConfig = {
    ...DEFAULT_SELECTOR_CONFIG,
    maxSecondaries: envNumber('SWITCHYARD_MAX_SECONDARIES', DEFAULT_SELECTOR_CONFIG.maxSecondaries),
    simpleConfidenceFloor: envNumber('SWITCHYARD_SIMPLE_CONFIDENCE_FLOOR', DEFAULT_SELECTOR_CONFIG.simpleConfidenceFloor)
  };

  const learning: LearningConfig = {
    ...DEFAULT_LEARNING_CONFIG,
    alpha: envNumber('SWITCHYARD_LEARNING_ALPHA', DEFAULT_LEARNING_CONFIG.alpha),
    initialScore: envNumber('SWITCHYARD_INITIAL_SCORE', DEFAULT_LEARNING_CONFIG.initialScore),
    failureScoreCeiling: envNumber('SWITCHYARD_FAILURE_SCORE_CEILING', DEFAULT_LEARNING_CONFIG.failureScoreCeiling)
  };

  const fallback: FallbackConfig = {
    ...DEFAULT_FALLBACK_CONFIG,
    acceptabilityThreshold: envNumber('SWITCHYARD_ACCEPTABILITY_THRESHOLD', DEFAULT_FALLBACK_CONFIG.acceptabilityThreshold),
    maxRecommendations: envNumber('SWITCHYARD_MAX_RECOMMENDATIONS', DEFAULT_FALLBACK_CONFIG.maxRecommendations)
  };

  const recommendation: RecommendationConfig = {
    ...DEFAULT_RECOMMENDATION_CONFIG,
    reliabilityBoost: envNumber('SWITCHYARD_RELIABILITY_BOOST', DEFAULT_RECOMMENDATION_CONFIG.reliabilityBoost)
  };

  return {
    dataDir: baseDir,
    catalogPath: process.env.SWITCHYARD_CATALOG ?? DEFAULT_CATALOG_PATH,
    storage,
    classification,
    selection,
    learning,
    fallback,
    recommendation
  };
}

function inUnitRange(value: number): boolean {
  return value >= 0 && value <= 1;
}

export function validateConfig(config: SwitchyardConfig): string[] {
  const errors: string[] = [];

  if (!config.storage.sqlitePath) {
    errors.push('storage.sqlitePath is required');
  }

  const { simpleMaxLength, complexMinLength } = config.classification;
  if (!(simpleMaxLength >= 0)) {
    errors.push('classification.simpleMaxLength must be non-negative');
  }
  if (!(complexMinLength > simpleMaxLength)) {
    errors.push('classification.complexMinLength must be greater than simpleMaxLength');
  }

  const { confidenceWeights: w } = config.selection;
  if (![w.successRate, w.complexity, w.prior].every(inUnitRange)) {
    errors.push('selection.confidenceWeights must each be between 0 and 1');
  } else if (Math.abs(w.successRate + w.complexity + w.prior - 1) > 1e-6) {
    errors.push('selection.confidenceWeights must sum to 1');
  }
  if (!inUnitRange(config.selection.confidencePrior)) {
    errors.push('selection.confidencePrior must be between 0 and 1');
  }
  if (!inUnitRange(config.selection.simpleConfidenceFloor)) {
    errors.push('selection.simpleConfidenceFloor must be between 0 and 1');
  }
  if (!Number.isInteger(config.selection.maxSecondaries) || config.selection.maxSecondaries < 0) {
    errors.push('selection.maxSecondaries must be a non-negative integer');
  }

  if (!(config.learning.alpha > 0 && config.learning.alpha <= 1)) {
    errors.push('learning.alpha must be in (0, 1]');
  }
  if (!inUnitRange(config.learning.initialScore)) {
    errors.push('learning.initialScore must be between 0 and 1');
  }
  if (!inUnitRange(config.learning.failureScoreCeiling)) {
    errors.push('learning.failureScoreCeiling must be between 0 and 1');
  }

  if (!inUnitRange(config.fallback.acceptabilityThreshold)) {
    errors.push('fallback.acceptabilityThreshold must be between 0 and 1');
  }
  if (!Number.isInteger(config.fallback.maxRecommendations) || config.fallback.maxRecommendations < 1) {
    errors.push('fallback.maxRecommendations must be a positive integer');
  }

  if (!inUnitRange(config.recommendation.reliabilityBoost)) {
    errors.push('recommendation.reliabilityBoost must be between 0 and 1');
  }

  return errors;
}

export function mergeConfig(
  base: SwitchyardConfig,
  overrides: SwitchyardConfigOverrides
): SwitchyardConfig {
  return {
    dataDir: overrides.dataDir ?? base.dataDir,
    catalogPath: overrides.catalogPath ?? base.catalogPath,
    storage: { ...base.storage, ...overrides.storage },
    classification: { ...base.classification, ...overrides.classification },
    selection: { ...base.selection, ...overrides.selection },
    learning: { ...base.learning, ...overrides.learning },
    fallback: { ...base.fallback, ...overrides.fallback },
    recommendation: { ...base.recommendation, ...overrides.recommendation }
  };
}
