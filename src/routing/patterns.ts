/**
 * Phrase patterns shared by the classifier and the Selector.
 */

const REGEX_CACHE = new Map<string, RegExp>();

/**
 * Compile a phrase into a case-insensitive word-boundary regex (cached)
 */
export function compilePhrase(phrase: string): RegExp {
  const key = phrase.toLowerCase();
  let regex = REGEX_CACHE.get(key);
  if (!regex) {
    // Escape special regex characters and create word boundary pattern
    const escaped = key.replace(/[.*+?^${}()|[\]\\]/g, '\\$&').replace(/\s+/g, '\\s+');
    regex = new RegExp(`\\b${escaped}\\b`, 'i');
    REGEX_CACHE.set(key, regex);
  }
  return regex;
}

/**
 * Phrases from the list that occur in the text, in list order
 */
export function findPhrases(text: string, phrases: readonly string[]): string[] {
  return phrases.filter(phrase => compilePhrase(phrase).test(text));
}
