import type { Normalizer } from './normalizer';
import { yieldToEventLoop } from '../utils/async';

// Same set as ASCII punctuation: !"#$%&'()*+,-./:;<=>?@[\]^_`{|}~
const EDGE_PUNCTUATION = /^[!-\/:-@[-`{-~]+|[!-\/:-@[-`{-~]+$/g;
const QUOTE_GLYPHS = /[«»…]/g;

export const NEGATION_PARTICLE = 'не';

export interface SplitByWordsOptions {
  signal?: AbortSignal;
  /** Number of words processed between event-loop yields. */
  yieldEvery?: number;
}

export const cleanWord = (word: string): string =>
  word.replace(QUOTE_GLYPHS, '').replace(EDGE_PUNCTUATION, '');

export const isCountedWord = (normalized: string): boolean =>
  normalized.length > 2 || normalized === NEGATION_PARTICLE;

/**
 * Splits text on whitespace and returns normalized forms in their original order,
 * dropping words of two characters or less except the negation particle.
 */
export const splitByWords = async (
  text: string,
  normalizer: Normalizer,
  options: SplitByWordsOptions = {},
): Promise<string[]> => {
  const yieldEvery = Math.max(1, Math.floor(options.yieldEvery ?? 64));
  const words: string[] = [];
  let sinceYield = 0;

  for (const raw of text.split(/\s+/)) {
    if (!raw) continue;
    const cleaned = cleanWord(raw).toLowerCase();
    const normalized = normalizer.normalize(cleaned);
    if (isCountedWord(normalized)) {
      words.push(normalized);
    }
    sinceYield += 1;
    if (sinceYield >= yieldEvery) {
      sinceYield = 0;
      await yieldToEventLoop(options.signal);
    }
  }

  return words;
};
