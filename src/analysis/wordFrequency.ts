import type { StopwordResource } from '../config/profile.js';
import type { WordCount, WordFrequencyResult } from '../types/index.js';

export const UNAVAILABLE_WORDS: readonly WordCount[] = [
  { word: 'analysis', count: 1 },
  { word: 'unavailable', count: 1 },
];

export interface WordFrequencyOptions {
  domainStopwords: readonly string[];
  minTokenLength: number;
  limit: number;
}

const ALPHABETIC = /^\p{L}+$/u;

/**
 * Splits on anything but letters, digits and apostrophes; edge apostrophes are
 * trimmed. The typographic apostrophe counts as `'`.
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/\u2019/g, "'")
    .split(/[^\p{L}\p{N}']+/u)
    .map((token) => token.replace(/^'+|'+$/g, ''))
    .filter((token) => token.length > 0);
}

export function wordFrequency(
  texts: readonly string[],
  stopwords: StopwordResource,
  options: WordFrequencyOptions,
): WordFrequencyResult {
  if (stopwords.status === 'unavailable') {
    return { status: 'unavailable', reason: stopwords.reason, words: UNAVAILABLE_WORDS.map((entry) => ({ ...entry })) };
  }

  const excluded = new Set([...stopwords.words, ...options.domainStopwords]);
  const counts = new Map<string, number>();
  for (const text of texts) {
    for (const token of tokenize(text)) {
      if (token.length < options.minTokenLength || !ALPHABETIC.test(token) || excluded.has(token)) {
        continue;
      }
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }
  }

  // Map iteration follows first occurrence and the sort is stable, so ties keep that order.
  const words = [...counts.entries()]
    .map(([word, count]) => ({ word, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, options.limit);
  return { status: 'ok', words };
}
