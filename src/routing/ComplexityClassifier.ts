/**
 * Complexity Classifier
 *
 * Rule-based classification of request text into a ComplexityClass.
 * Each class collects votes from length and cue signals; the class with
 * the most votes wins and ties go to the higher class, so a borderline
 * request gets the richer provider set.
 */

import { ComplexityClass } from '../core/types.js';
import { findPhrases } from './patterns.js';
import {
  type ClassificationConfig,
  type RequestSignals,
  DEFAULT_CLASSIFICATION_CONFIG
} from './types.js';

const YEAR_PATTERN = /\b(19|20)\d{2}\b/;
const MONTH_PATTERN = /\b(january|february|march|april|may|june|july|august|september|october|november|december)\b/i;
const NUMBERED_STEP_PATTERN = /(^|\s)\d+[.)]\s/g;

export class ComplexityClassifier {
  private config: ClassificationConfig;

  constructor(config: Partial<ClassificationConfig> = {}) {
    this.config = { ...DEFAULT_CLASSIFICATION_CONFIG, ...config };
  }

  /**
   * Extract the length and cue signals from request text
   */
  signals(text: string): RequestSignals {
    const trimmed = text.trim();
    const freshnessCues = findPhrases(trimmed, this.config.freshnessCues);

    if (this.config.detectDates) {
      const year = trimmed.match(YEAR_PATTERN);
      if (year) freshnessCues.push(year[0]);
      const month = trimmed.match(MONTH_PATTERN);
      if (month) freshnessCues.push(month[0].toLowerCase());
    }

    return {
      length: trimmed.length,
      multiStepCues: findPhrases(trimmed, this.config.multiStepCues),
      freshnessCues,
      numberedSteps: (trimmed.match(NUMBERED_STEP_PATTERN) ?? []).length
    };
  }

  /**
   * Classify request text
   */
  classify(text: string): ComplexityClass {
    const votes = this.vote(this.signals(text));

    // Highest class first so that ties resolve upward
    const ordered = [ComplexityClass.COMPLEX, ComplexityClass.MEDIUM, ComplexityClass.SIMPLE];
    let best = ComplexityClass.SIMPLE;
    let bestVotes = -1;
    for (const complexity of ordered) {
      if (votes[complexity] > bestVotes) {
        best = complexity;
        bestVotes = votes[complexity];
      }
    }
    return best;
  }

  /**
   * Count votes per class
   */
  vote(signals: RequestSignals): Record<ComplexityClass, number> {
    const hasMultiStep = signals.multiStepCues.length > 0 || signals.numberedSteps >= 2;
    const hasFreshness = signals.freshnessCues.length > 0;

    let complex = 0;
    if (hasMultiStep) complex++;
    if (signals.multiStepCues.length + signals.numberedSteps >= 3) complex++;
    if (signals.length >= this.config.complexMinLength) complex++;

    let medium = 0;
    if (hasFreshness) medium++;
    if (signals.length > this.config.simpleMaxLength && signals.length < this.config.complexMinLength) {
      medium++;
    }

    let simple = 0;
    if (signals.length <= this.config.simpleMaxLength) simple++;
    if (!hasMultiStep && !hasFreshness) simple++;

    return {
      [ComplexityClass.SIMPLE]: simple,
      [ComplexityClass.MEDIUM]: medium,
      [ComplexityClass.COMPLEX]: complex
    };
  }

  getConfig(): ClassificationConfig {
    return { ...this.config };
  }
}
