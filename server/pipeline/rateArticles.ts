import type { AppConfig } from '../../shared/config';
import type { ArticleOutcome } from '../../shared/types';
import type { Logger } from '../obs/logger';
import type { ChargedLexicon } from '../analysis/scoring';
import type { SanitizerRegistry } from '../adapters/registry';
import { createDictionaryNormalizer, type Normalizer } from '../analysis/normalizer';
import { loadChargedWords } from '../analysis/lexicon';
import { createArticleClient, type ArticleClient } from '../retrieval/fetcher';
import { processArticle } from './processArticle';

export interface BatchResources {
  client: ArticleClient;
  normalizer: Normalizer;
  chargedWords: ChargedLexicon;
}

export interface RateArticlesArgs {
  urls: readonly string[];
  config: AppConfig;
  logger: Logger;
  /** Pre-built resources; anything missing is created from `config` for this batch only. */
  resources?: Partial<BatchResources>;
  sanitizers?: SanitizerRegistry;
}

/**
 * Builds the resources shared read-only by all workers of a batch. Configuration problems
 * (missing word lists, unreadable lemma table) reject here, before any URL is processed.
 */
export const createBatchResources = async (
  config: AppConfig,
  overrides: Partial<BatchResources> = {},
): Promise<BatchResources> => {
  const [chargedWords, normalizer] = await Promise.all([
    overrides.chargedWords ?? loadChargedWords(config.analysis.chargedDictDir),
    overrides.normalizer ?? createDictionaryNormalizer(config.analysis.lemmaDictPath),
  ]);
  const client = overrides.client ?? createArticleClient({ userAgent: config.analysis.userAgent });
  return { client, normalizer, chargedWords };
};

/**
 * Rates every URL concurrently and resolves once all of them have an outcome.
 * Outcome `i` belongs to `urls[i]`; duplicates are processed independently.
 */
export const rateArticles = async ({
  urls,
  config,
  logger,
  resources,
  sanitizers,
}: RateArticlesArgs): Promise<ArticleOutcome[]> => {
  const startedAt = Date.now();
  const { client, normalizer, chargedWords } = await createBatchResources(config, resources);

  const outcomes = await Promise.all(
    urls.map((url) =>
      processArticle(url, {
        client,
        normalizer,
        chargedWords,
        sanitizers,
        timeoutMs: config.analysis.articleTimeoutMs,
        tokenizerYieldEvery: config.analysis.tokenizerYieldEvery,
        logger,
      }),
    ),
  );

  const counts: Record<string, number> = {};
  for (const outcome of outcomes) {
    counts[outcome.status] = (counts[outcome.status] ?? 0) + 1;
  }
  logger.info('Batch rating complete', {
    urls: urls.length,
    statuses: counts,
    elapsedMs: Date.now() - startedAt,
  });

  return outcomes;
};
