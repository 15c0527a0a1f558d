/**
 * Routing Types
 *
 * Type definitions for the complexity classifier and the hybrid Selector.
 */

import { ComplexityClass, ProviderCategory } from '../core/types.js';

/**
 * Cue groups that signal which kinds of providers a request needs
 */
export enum CueGroup {
  SEARCH = 'search',
  ANALYSIS = 'analysis',
  EXECUTION = 'execution',
  GENERATION = 'generation'
}

/**
 * Rules for deriving a ComplexityClass from request text
 */
export interface ClassificationConfig {
  /** Requests up to this many characters vote for SIMPLE */
  simpleMaxLength: number;
  /** Requests at least this long vote for COMPLEX */
  complexMinLength: number;
  /** Multi-step / sequencing phrases */
  multiStepCues: string[];
  /** Information-freshness phrases */
  freshnessCues: string[];
  /** Treat 4-digit years and month names as freshness cues */
  detectDates: boolean;
}

/**
 * Weights for the confidence blend (should sum to 1)
 */
export interface ConfidenceWeights {
  /** Primary provider's running success rate */
  successRate: number;
  /** Inverse complexity ordinal */
  complexity: number;
  /** Fixed prior */
  prior: number;
}

/**
 * Selector configuration
 */
export interface SelectorConfig {
  /** Default primary category per complexity class */
  categoryByComplexity: Record<ComplexityClass, ProviderCategory>;
  /** Category each cue group asks for */
  categoryByCue: Record<CueGroup, ProviderCategory>;
  /** Phrases that trigger each cue group */
  cueKeywords: Record<CueGroup, string[]>;
  /** Maximum number of secondary providers */
  maxSecondaries: number;
  confidenceWeights: ConfidenceWeights;
  /** Prior used in the blend and as success rate for untried providers */
  confidencePrior: number;
  /** Minimum confidence of a resolved SIMPLE plan */
  simpleConfidenceFloor: number;
}

export const DEFAULT_CLASSIFICATION_CONFIG: ClassificationConfig = {
  simpleMaxLength: 60,
  complexMinLength: 240,
  multiStepCues: [
    'then', 'and also', 'after that', 'afterwards', 'followed by',
    'first', 'next', 'finally', 'step by step', 'once done'
  ],
  freshnessCues: [
    'latest', 'current', 'currently', 'today', 'recent', 'recently',
    'now', 'this week', 'this month', 'this year', 'news', 'up to date'
  ],
  detectDates: true
};

export const DEFAULT_SELECTOR_CONFIG: SelectorConfig = {
  categoryByComplexity: {
    [ComplexityClass.SIMPLE]: ProviderCategory.GENERATION,
    [ComplexityClass.MEDIUM]: ProviderCategory.SEARCH,
    [ComplexityClass.COMPLEX]: ProviderCategory.REASONING
  },
  categoryByCue: {
    [CueGroup.SEARCH]: ProviderCategory.SEARCH,
    [CueGroup.ANALYSIS]: ProviderCategory.REASONING,
    [CueGroup.EXECUTION]: ProviderCategory.EXECUTION,
    [CueGroup.GENERATION]: ProviderCategory.GENERATION
  },
  cueKeywords: {
    [CueGroup.SEARCH]: ['search', 'look up', 'find', 'latest', 'current', 'news', 'source'],
    [CueGroup.ANALYSIS]: ['analyze', 'analyse', 'analysis', 'compare', 'evaluate', 'explain why', 'reason about'],
    [CueGroup.EXECUTION]: ['run', 'execute', 'calculate', 'compute', 'script', 'code'],
    [CueGroup.GENERATION]: ['write', 'draft', 'generate', 'summarize', 'summarise', 'translate']
  },
  maxSecondaries: 2,
  confidenceWeights: {
    successRate: 0.5,
    complexity: 0.3,
    prior: 0.2
  },
  confidencePrior: 0.5,
  simpleConfidenceFloor: 0.6
};

/**
 * Signals extracted from request text
 */
export interface RequestSignals {
  length: number;
  multiStepCues: string[];
  freshnessCues: string[];
  numberedSteps: number;
}

/**
 * Selection statistics
 */
export interface SelectionStats {
  totalSelections: number;
  complexityCounts: Record<ComplexityClass, number>;
  /** Plans with at least one secondary provider */
  hybridCount: number;
  unresolvedCount: number;
  avgConfidence: number;
}
