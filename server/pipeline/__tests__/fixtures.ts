import { ConfigSchema, type AppConfig } from '../../../shared/config';
import type { ArticleClient } from '../../retrieval/fetcher';
import { createLogger, type LogLevel } from '../../obs/logger';
import { sleep } from '../../utils/async';
import { FetchError } from '../errors';

export const buildTestConfig = (overrides: { articleTimeoutMs?: number; maxUrls?: number } = {}): AppConfig =>
  ConfigSchema.parse({
    environment: 'test',
    server: { port: 3000, maxUrls: overrides.maxUrls ?? 10 },
    analysis: {
      articleTimeoutMs: overrides.articleTimeoutMs ?? 1_000,
      tokenizerYieldEvery: 64,
      userAgent: 'test-agent',
      chargedDictDir: 'charged_dict',
      lemmaDictPath: 'data/lemmas.json5',
    },
    observability: { logLevel: 'error' },
  });

export interface CapturedLog {
  level: LogLevel;
  entry: Record<string, unknown>;
}

export const captureLogger = (logLevel: LogLevel = 'debug') => {
  const lines: CapturedLog[] = [];
  const logger = createLogger({ observability: { logLevel } }, (level, line) => {
    lines.push({ level, entry: JSON.parse(line) });
  });
  return { logger, lines };
};

export const articleHtml = (title: string, body: string): string =>
  `<html><head><title>${title} | ИноСМИ</title></head><body><h1>${title}</h1><article><p>${body}</p></article></body></html>`;

export const ARTICLE_URL = 'https://inosmi.ru/social/20210205/249080434.html';
export const SLOW_URL = 'https://inosmi.ru/economic/slow.html';
export const MISSING_URL = 'https://inosmi.ru/12345/12345.html';

/** Serves a fixed page, hangs on SLOW_URL until aborted, answers 404 for MISSING_URL. */
export const createStubClient = (html: string, slowMs = 5_000): ArticleClient & { requested: string[] } => {
  const requested: string[] = [];
  return {
    requested,
    fetchHtml: async (url, signal) => {
      requested.push(url);
      if (url === SLOW_URL) {
        await sleep(slowMs, signal);
      }
      if (url === MISSING_URL) {
        throw new FetchError('HTTP 404', 404);
      }
      return html;
    },
  };
};
