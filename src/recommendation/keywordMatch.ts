/**
 * Keyword matching between declared provider keywords and free text.
 *
 * Tokens are compared after a light suffix stemmer, so "searching",
 * "searched" and "searches" all match the keyword "search". A multi-word
 * keyword matches only when every one of its words does.
 */

import type { KeywordMatch } from './types.js';

const TOKEN_SPLIT = /[^a-z0-9]+/;
const UNDOUBLED = new Set(['l', 's', 'z']);

/**
 * Lower-cased word tokens of a text
 */
export function tokenize(text: string): Set<string> {
  return new Set(text.toLowerCase().split(TOKEN_SPLIT).filter(t => t.length > 0));
}

/**
 * Reduce a word to a comparison stem
 */
export function stem(word: string): string {
  let w = word.toLowerCase();
  let stripped = false;

  if (w.length > 4 && w.endsWith('ies')) {
    w = w.slice(0, -3) + 'y';
  } else if (w.length > 5 && w.endsWith('ing')) {
    w = w.slice(0, -3);
    stripped = true;
  } else if (w.length > 4 && w.endsWith('ed')) {
    w = w.slice(0, -2);
    stripped = true;
  } else if (w.length > 4 && /(s|x|z|ch|sh)es$/.test(w)) {
    w = w.slice(0, -2);
  } else if (w.length > 3 && w.endsWith('s') && !w.endsWith('ss')) {
    w = w.slice(0, -1);
  }

  // running -> runn -> run
  if (stripped && w.length > 2) {
    const last = w[w.length - 1];
    if (last === w[w.length - 2] && !UNDOUBLED.has(last) && !/[aeiou]/.test(last)) {
      w = w.slice(0, -1);
    }
  }

  if (w.length > 3 && w.endsWith('e')) {
    w = w.slice(0, -1);
  }

  return w;
}

/**
 * Match declared keywords against context tokens. Pure.
 *
 * @returns the matched keywords (sorted) and matched / declared
 */
export function matchKeywords(declared: ReadonlySet<string>, contextTokens: ReadonlySet<string>): KeywordMatch {
  if (declared.size === 0) {
    return { matched: [], matchScore: 0 };
  }

  const stems = new Set<string>();
  for (const token of contextTokens) {
    stems.add(stem(token));
  }

  const matched: string[] = [];
  for (const keyword of declared) {
    const words = keyword.toLowerCase().split(TOKEN_SPLIT).filter(w => w.length > 0);
    if (words.length > 0 && words.every(word => stems.has(stem(word)))) {
      matched.push(keyword);
    }
  }

  matched.sort();
  return { matched, matchScore: matched.length / declared.size };
}
