import { SCORE_BONUSES, TITLE_MARKER } from '../config/search/constants';

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(WORD_PATTERN) ?? [];
}

function termFrequencies(words: string[]): Map<string, number> {
  const freq = new Map<string, number>();
  for (const word of words) {
    freq.set(word, (freq.get(word) ?? 0) + 1);
  }
  return freq;
}

/**
 * Term-frequency relevance of `text` for `query`.
 *
 * The base score averages, over the unique query words, each word's share of
 * the text's words. Fixed bonuses are added when the whole query occurs in the
 * text and when a text mentioning "title" contains any query word.
 * Never throws; returns 0 for empty input.
 */
export function score(query: string, text: string): number {
  try {
    if (!query || !text) return 0;

    const queryWords = new Set(tokenize(query));
    const textWords = tokenize(text);
    if (queryWords.size === 0 || textWords.length === 0) return 0;

    const freq = termFrequencies(textWords);
    const total = textWords.length;
    let sum = 0;
    for (const word of queryWords) {
      sum += (freq.get(word) ?? 0) / total;
    }
    const base = sum / queryWords.size;

    const lowerText = text.toLowerCase();
    const exactBonus = lowerText.includes(query.toLowerCase()) ? SCORE_BONUSES.exactMatch : 0;

    let titleBonus = 0;
    if (lowerText.includes(TITLE_MARKER)) {
      for (const word of queryWords) {
        if (lowerText.includes(word)) {
          titleBonus = SCORE_BONUSES.titleMatch;
          break;
        }
      }
    }

    return base + exactBonus + titleBonus;
  } catch {
    return 0;
  }
}
