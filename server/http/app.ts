import cors from 'cors';
import express from 'express';
import type { Express, Request, Response } from 'express';
import type { AppConfig } from '../../shared/config';
import { getPublicConfig, parseUrlsParam } from '../../shared/config';
import type { RateArticlesResponse } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { errorMessage } from '../pipeline/errors';
import { rateArticles, type BatchResources } from '../pipeline/rateArticles';

export interface CreateAppOptions {
  config: AppConfig;
  logger: Logger;
  resources?: Partial<BatchResources>;
}

export const createApp = ({ config, logger, resources }: CreateAppOptions): Express => {
  const app = express();

  app.use(cors());

  if (config.observability.logLevel === 'debug') {
    app.use((req, res, next) => {
      const startedAt = Date.now();
      logger.debug('HTTP request', { method: req.method, path: req.originalUrl });
      res.on('finish', () => {
        logger.debug('HTTP response', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          elapsedMs: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  app.get('/api/healthz', (_req: Request, res: Response) => {
    res.json({ ok: true, ts: new Date().toISOString() });
  });

  app.get('/api/config', (_req: Request, res: Response) => {
    res.json(getPublicConfig(config));
  });

  app.get('/', async (req: Request, res: Response) => {
    const parsed = parseUrlsParam(req.query.urls, config.server.maxUrls);
    if (!parsed.ok) {
      res.status(400).json({ error: parsed.error });
      return;
    }

    try {
      const results = await rateArticles({ urls: parsed.urls, config, logger, resources });
      const body: RateArticlesResponse = { urls: parsed.urls, results };
      res.json(body);
    } catch (error) {
      logger.error('Batch rating failed', { error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to rate articles' });
    }
  });

  return app;
};
