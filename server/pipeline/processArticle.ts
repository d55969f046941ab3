import type { ArticleOutcome, FailedArticle } from '../../shared/types';
import type { Logger } from '../obs/logger';
import type { Normalizer } from '../analysis/normalizer';
import type { ChargedLexicon } from '../analysis/scoring';
import type { ArticleClient } from '../retrieval/fetcher';
import { calculateJaundiceRate } from '../analysis/scoring';
import { splitByWords } from '../analysis/tokenizer';
import { resolveSanitizer, sanitizerKeyForUrl, type SanitizedArticle, type SanitizerRegistry } from '../adapters/registry';
import { withDeadline } from '../utils/async';
import { ArticleNotFoundError, ArticleTimeoutError, FetchError, errorMessage } from './errors';

export type ArticleStage = 'pending' | 'fetching' | 'extracting' | 'tokenizing' | 'scoring';

export interface ArticleContext {
  client: ArticleClient;
  normalizer: Normalizer;
  chargedWords: ChargedLexicon;
  timeoutMs: number;
  logger: Logger;
  sanitizers?: SanitizerRegistry;
  tokenizerYieldEvery?: number;
}

export const FETCH_ERROR_TITLE = 'URL not exist';
export const TIMEOUT_TITLE = 'Response timeout expired';

export const parsingErrorTitle = (label: string): string => `Article on ${label}`;

const failure = (status: FailedArticle['status'], title: string): FailedArticle => ({
  title,
  status,
  rate: null,
  count_words: null,
});

export const classifyFailure = (error: unknown, url: string): FailedArticle => {
  if (error instanceof ArticleTimeoutError) {
    return failure('TIMEOUT', TIMEOUT_TITLE);
  }
  if (error instanceof FetchError) {
    return failure('FETCH_ERROR', FETCH_ERROR_TITLE);
  }
  if (error instanceof ArticleNotFoundError) {
    return failure('PARSING_ERROR', parsingErrorTitle(error.label));
  }
  return failure('PARSING_ERROR', parsingErrorTitle(url));
};

/**
 * Runs fetch, extraction, tokenizing and scoring for one URL under a single deadline.
 * Never rejects: every failure is converted into an outcome.
 */
export const processArticle = async (url: string, context: ArticleContext): Promise<ArticleOutcome> => {
  const { logger } = context;
  const startedAt = Date.now();
  // last stage entered; reported when the article fails
  let stage: ArticleStage = 'pending';

  const pipeline = async (signal: AbortSignal): Promise<ArticleOutcome> => {
    const sanitize = resolveSanitizer(url, context.sanitizers);

    stage = 'fetching';
    const html = await context.client.fetchHtml(url, signal);

    stage = 'extracting';
    let article: SanitizedArticle;
    try {
      article = sanitize(html, true);
    } catch (error) {
      if (error instanceof ArticleNotFoundError) throw error;
      throw new ArticleNotFoundError(sanitizerKeyForUrl(url) ?? url, { cause: error });
    }

    stage = 'tokenizing';
    const words = await splitByWords(article.text, context.normalizer, {
      signal,
      yieldEvery: context.tokenizerYieldEvery,
    });

    stage = 'scoring';
    const rate = calculateJaundiceRate(words, context.chargedWords);
    return { title: article.title, status: 'OK', rate, count_words: words.length };
  };

  let outcome: ArticleOutcome;
  try {
    outcome = await withDeadline(context.timeoutMs, pipeline, () => new ArticleTimeoutError(context.timeoutMs));
  } catch (error) {
    outcome = classifyFailure(error, url);
    const known =
      error instanceof ArticleTimeoutError || error instanceof FetchError || error instanceof ArticleNotFoundError;
    if (!known) {
      logger.warn('Unexpected article failure', { url, stage, error: errorMessage(error) });
    } else {
      logger.debug('Article failed', { url, stage, error: errorMessage(error) });
    }
  }

  logger.info('Article processed', {
    url,
    status: outcome.status,
    ...(outcome.status === 'OK' ? {} : { stage }),
    elapsedMs: Date.now() - startedAt,
  });
  return outcome;
};
