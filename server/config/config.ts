import path from 'node:path';
import { ConfigSchema, type AppConfig, type PublicConfig, getPublicConfig as getPublicConfigShared } from '../../shared/config';

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const environmentFromEnv = (value: string | undefined): AppConfig['environment'] => {
  const environment = (value || 'development').trim().toLowerCase();
  return environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development';
};

export type { AppConfig, PublicConfig };

let cachedConfig: AppConfig | null = null;

const buildConfig = (): AppConfig => {
  // MAX_WAITING_TIME is expressed in seconds
  const maxWaitingSeconds = numberFromEnv(process.env.MAX_WAITING_TIME, 3);

  const rawConfig = {
    environment: environmentFromEnv(process.env.NODE_ENV),
    server: {
      port: numberFromEnv(process.env.PORT, 3000),
      maxUrls: numberFromEnv(process.env.MAX_URLS, 10),
    },
    analysis: {
      articleTimeoutMs: Math.round(maxWaitingSeconds * 1000),
      tokenizerYieldEvery: numberFromEnv(process.env.TOKENIZER_YIELD_EVERY, 64),
      userAgent:
        process.env.ARTICLE_USER_AGENT?.trim() ||
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0 Safari/537.36',
      chargedDictDir: path.resolve(process.env.CHARGED_DICT_DIR || path.join(process.cwd(), 'charged_dict')),
      lemmaDictPath: path.resolve(process.env.LEMMA_DICT_PATH || path.join(process.cwd(), 'data', 'lemmas.json5')),
    },
    observability: {
      logLevel: (process.env.LOG_LEVEL || 'info').toLowerCase(),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};

export const getPublicConfig = (config: AppConfig = loadConfig()): PublicConfig => getPublicConfigShared(config);

export const refreshConfig = (): AppConfig => {
  cachedConfig = null;
  return loadConfig();
};
