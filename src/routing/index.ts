/**
 * Routing Module
 *
 * Complexity classification and hybrid provider selection.
 */

export { Selector } from './Selector.js';
export { ComplexityClassifier } from './ComplexityClassifier.js';
export { compilePhrase, findPhrases } from './patterns.js';
export { isIssuedPlan } from './plan.js';
export {
  CueGroup,
  DEFAULT_CLASSIFICATION_CONFIG,
  DEFAULT_SELECTOR_CONFIG
} from './types.js';
export type {
  ClassificationConfig,
  ConfidenceWeights,
  SelectorConfig,
  RequestSignals,
  SelectionStats
} from './types.js';
