import { z } from 'zod';

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
    maxUrls: z.number().int().positive(),
  }),
  analysis: z.object({
    articleTimeoutMs: z.number().int().positive(),
    tokenizerYieldEvery: z.number().int().positive(),
    userAgent: z.string().min(1),
    chargedDictDir: z.string().min(1),
    lemmaDictPath: z.string().min(1),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export interface PublicConfig {
  maxUrls: number;
  articleTimeoutMs: number;
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  maxUrls: config.server.maxUrls,
  articleTimeoutMs: config.analysis.articleTimeoutMs,
});

export type UrlsParamResult =
  | { ok: true; urls: string[] }
  | { ok: false; error: string };

export const parseUrlsParam = (value: unknown, maxUrls: number): UrlsParamResult => {
  const raw = Array.isArray(value) ? value.join(',') : typeof value === 'string' ? value : '';
  const urls = raw
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
  if (!urls.length) {
    return { ok: false, error: 'Missing urls query parameter' };
  }
  if (urls.length > maxUrls) {
    return { ok: false, error: `too many urls in request, should be ${maxUrls} or less` };
  }
  return { ok: true, urls };
};
