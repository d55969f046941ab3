import { ArticleNotFoundError } from '../pipeline/errors';
import type { SanitizedArticle } from './registry';
import { decodeEntities, extractTagContent, htmlToText, normalizeWhitespace, stripTags } from './html';

const ARTICLE_CONTAINERS = ['article', 'main', 'body'];

export const sanitizeInosmi = (html: string, plaintext = false): SanitizedArticle => {
  const rawTitle = extractTagContent(html, 'h1') ?? extractTagContent(html, 'title') ?? '';
  const title = normalizeWhitespace(decodeEntities(stripTags(rawTitle)));

  let block: string | null = null;
  for (const tag of ARTICLE_CONTAINERS) {
    block = extractTagContent(html, tag);
    if (block) break;
  }
  if (!block) {
    throw new ArticleNotFoundError('inosmi_ru');
  }

  return {
    title,
    text: plaintext ? htmlToText(block) : block,
  };
};
