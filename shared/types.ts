export const PROCESSING_STATUSES = ['OK', 'FETCH_ERROR', 'PARSING_ERROR', 'TIMEOUT'] as const;

export type ProcessingStatus = (typeof PROCESSING_STATUSES)[number];

export type FailureStatus = Exclude<ProcessingStatus, 'OK'>;

export interface RatedArticle {
  title: string;
  status: 'OK';
  rate: number;
  count_words: number;
}

export interface FailedArticle {
  title: string;
  status: FailureStatus;
  rate: null;
  count_words: null;
}

/**
 * One per input URL. `rate` and `count_words` are present exactly when `status` is `OK`.
 */
export type ArticleOutcome = RatedArticle | FailedArticle;

export interface RateArticlesResponse {
  urls: string[];
  results: ArticleOutcome[];
}
