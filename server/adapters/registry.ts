import { ArticleNotFoundError } from '../pipeline/errors';
import { sanitizeInosmi } from './inosmi';

export interface SanitizedArticle {
  title: string;
  text: string;
}

export type Sanitizer = (html: string, plaintext: boolean) => SanitizedArticle;

export type SanitizerRegistry = ReadonlyMap<string, Sanitizer>;

export const SANITIZERS: SanitizerRegistry = new Map<string, Sanitizer>([['inosmi_ru', sanitizeInosmi]]);

/**
 * Registry key for a URL: host without a leading `www.`, dots replaced with underscores.
 * Inputs without an http(s) host yield null.
 */
export const sanitizerKeyForUrl = (url: string): string | null => {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return null;
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return null;
  const host = parsed.hostname.toLowerCase().replace(/^www\./, '').replace(/\.$/, '');
  if (!host) return null;
  return host.replace(/\./g, '_');
};

export const resolveSanitizer = (url: string, registry: SanitizerRegistry = SANITIZERS): Sanitizer => {
  const key = sanitizerKeyForUrl(url);
  if (key == null) {
    throw new ArticleNotFoundError(url);
  }
  const sanitizer = registry.get(key);
  if (!sanitizer) {
    throw new ArticleNotFoundError(key);
  }
  return sanitizer;
};
