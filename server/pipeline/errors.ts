export class FetchError extends Error {
  readonly statusCode: number | null;

  constructor(message: string, statusCode: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FetchError';
    this.statusCode = statusCode;
  }
}

/** No sanitizer is registered for the URL's host, or the page could not be parsed. */
export class ArticleNotFoundError extends Error {
  readonly label: string;

  constructor(label: string, options?: { cause?: unknown }) {
    super(`Article source not found: ${label}`, options);
    this.name = 'ArticleNotFoundError';
    this.label = label;
  }
}

export class ArticleTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Article processing exceeded ${timeoutMs} ms`);
    this.name = 'ArticleTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
