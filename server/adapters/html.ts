export const extractTagContent = (html: string, tag: string): string | null => {
  const re = new RegExp(`<${tag}(?:\\s[^>]*)?>([\\s\\S]*?)<\\/${tag}>`, 'i');
  const match = html.match(re);
  return match ? match[1].trim() : null;
};

export const stripTags = (html: string): string => {
  const withoutScripts = html.replace(/<script[\s\S]*?<\/script>/gi, ' ');
  const withoutStyles = withoutScripts.replace(/<style[\s\S]*?<\/style>/gi, ' ');
  return withoutStyles.replace(/<[^>]+>/g, ' ');
};

// Out-of-range and surrogate references decode to U+FFFD, as in browsers.
const fromCodePointSafe = (code: number): string => {
  if (!Number.isFinite(code) || code > 0x10ffff || (code >= 0xd800 && code <= 0xdfff)) {
    return '\uFFFD';
  }
  return String.fromCodePoint(code);
};

export const decodeEntities = (text: string): string =>
  text
    .replace(/&nbsp;/g, ' ')
    .replace(/&laquo;/g, '«')
    .replace(/&raquo;/g, '»')
    .replace(/&hellip;/g, '…')
    .replace(/&mdash;/g, '—')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&#(\d+);/g, (_match, num: string) => fromCodePointSafe(Number(num)))
    .replace(/&#x([0-9a-f]+);/gi, (_match, hex: string) => fromCodePointSafe(Number.parseInt(hex, 16)))
    .replace(/&amp;/g, '&');

export const normalizeWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim();

/** Turns an HTML fragment into readable text, keeping paragraph breaks. */
export const htmlToText = (html: string): string =>
  stripTags(html.replace(/<\/(p|div|h[1-6]|li|blockquote)>|<br\s*\/?>/gi, '\n'))
    .split('\n')
    .map((line) => normalizeWhitespace(decodeEntities(line)))
    .filter(Boolean)
    .join('\n');
