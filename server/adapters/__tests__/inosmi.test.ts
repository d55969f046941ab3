import { describe, expect, it } from 'vitest';
import { ArticleNotFoundError } from '../../pipeline/errors';
import { sanitizeInosmi } from '../inosmi';

const page = [
  '<html><head><title>Страница | ИноСМИ</title></head><body>',
  '<h1>Заголовок &laquo;статьи&raquo;</h1>',
  '<article><p>Первый абзац.</p><p>Второй&nbsp;абзац &amp; конец</p><script>track()</script></article>',
  '</body></html>',
].join('');

describe('sanitizeInosmi', () => {
  it('returns the headline and the article text', () => {
    expect(sanitizeInosmi(page, true)).toEqual({
      title: 'Заголовок «статьи»',
      text: 'Первый абзац.\nВторой абзац & конец',
    });
  });

  it('keeps markup when plain text is not requested', () => {
    const { text } = sanitizeInosmi(page, false);
    expect(text).toBe('<p>Первый абзац.</p><p>Второй&nbsp;абзац &amp; конец</p><script>track()</script>');
  });

  it('falls back to the document title and body', () => {
    const html = '<html><head><title>Только титул</title></head><body><div>Текст <b>статьи</b></div></body></html>';
    expect(sanitizeInosmi(html, true)).toEqual({ title: 'Только титул', text: 'Текст статьи' });
  });

  it('decodes out-of-range character references to the replacement character', () => {
    const html = '<body><h1>Заголовок</h1><article><p>Кризис &#1114112; рынка &#x110000; и &#xD800; провал &#1082;</p></article></body>';
    expect(sanitizeInosmi(html, true).text).toBe('Кризис \uFFFD рынка \uFFFD и \uFFFD провал к');
  });

  it('fails when the page has no article block', () => {
    expect(() => sanitizeInosmi('<div>обрывок</div>', true)).toThrow(ArticleNotFoundError);
  });
});
