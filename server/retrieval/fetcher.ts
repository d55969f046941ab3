import { FetchError, errorMessage } from '../pipeline/errors';
import { abortReason, sleep } from '../utils/async';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetchArticleOptions {
  userAgent: string;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
  /** Artificial latency applied before the request; used to exercise deadlines. */
  delayMs?: number;
  sleep?: (ms: number, signal?: AbortSignal | null) => Promise<void>;
}

export const charsetFromContentType = (contentType: string | null): string | null => {
  const match = contentType?.match(/charset\s*=\s*["']?([^"';\s]+)/i);
  return match ? match[1].toLowerCase() : null;
};

// Unknown charset labels fall back to UTF-8.
const decoderFor = (contentType: string | null): TextDecoder => {
  const charset = charsetFromContentType(contentType);
  if (charset) {
    try {
      return new TextDecoder(charset);
    } catch {
      return new TextDecoder('utf-8');
    }
  }
  return new TextDecoder('utf-8');
};

/**
 * Single GET with no retries. Non-2xx responses and transport failures become `FetchError`;
 * an aborted signal rethrows the signal's reason untouched.
 */
export const fetchArticleHtml = async (url: string, options: FetchArticleOptions): Promise<string> => {
  const { signal } = options;
  const fetchImpl = options.fetchImpl ?? fetch;
  const wait = options.sleep ?? sleep;

  if (options.delayMs && options.delayMs > 0) {
    await wait(options.delayMs, signal);
  }
  if (signal?.aborted) {
    throw abortReason(signal);
  }

  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: 'GET',
      headers: {
        'User-Agent': options.userAgent,
        Accept: 'text/html,application/xhtml+xml',
        'Accept-Language': 'ru-RU,ru;q=0.9,en;q=0.8',
      },
      redirect: 'follow',
      signal,
    });
  } catch (error) {
    if (signal?.aborted) {
      throw abortReason(signal);
    }
    throw new FetchError(`Request failed: ${errorMessage(error)}`, null, { cause: error });
  }

  if (!response.ok) {
    throw new FetchError(`HTTP ${response.status}`, response.status);
  }

  try {
    const body = await response.arrayBuffer();
    return decoderFor(response.headers.get('content-type')).decode(body);
  } catch (error) {
    if (signal?.aborted) {
      throw abortReason(signal);
    }
    throw new FetchError(`Failed to read response body: ${errorMessage(error)}`, response.status, { cause: error });
  }
};

/** Shared by every worker of a batch; aborting one request leaves the others running. */
export interface ArticleClient {
  fetchHtml: (url: string, signal?: AbortSignal) => Promise<string>;
}

export const createArticleClient = (options: Omit<FetchArticleOptions, 'signal'>): ArticleClient => ({
  fetchHtml: (url, signal) => fetchArticleHtml(url, { ...options, signal }),
});
