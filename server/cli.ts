import 'dotenv/config';
import type { ArticleOutcome } from '../shared/types';
import { loadConfig } from './config/config';
import { createLogger } from './obs/logger';
import { errorMessage } from './pipeline/errors';
import { rateArticles } from './pipeline/rateArticles';

const formatOutcome = (outcome: ArticleOutcome): string =>
  [
    `Title: ${outcome.title}`,
    `Status: ${outcome.status}`,
    `Rate: ${outcome.rate ?? '-'}`,
    `Words in article: ${outcome.count_words ?? '-'}`,
  ].join('\n');

const main = async (): Promise<number> => {
  const urls = process.argv.slice(2).filter(Boolean);
  if (!urls.length) {
    console.error('Usage: npm run rate -- <url> [url ...]');
    return 2;
  }

  const config = loadConfig();
  const logger = createLogger(config);
  const startedAt = Date.now();
  const outcomes = await rateArticles({ urls, config, logger });

  /* eslint-disable no-console */
  outcomes.forEach((outcome, idx) => {
    console.log(`\n${urls[idx]}\n${formatOutcome(outcome)}`);
  });
  console.log(`\nAnalysis finished in ${((Date.now() - startedAt) / 1000).toFixed(2)} s`);
  /* eslint-enable no-console */
  return 0;
};

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exitCode = 1;
  });
