/**
 * Visible-text extraction from HTML job postings.
 *
 * Regex based; postings are read by a model afterwards, so the goal is
 * readable line structure rather than a faithful DOM rendering.
 */

export interface PageHints {
  title?: string;
  ogTitle?: string;
  siteName?: string;
}

const HIDDEN_ELEMENTS = /<(script|style|noscript|template|svg|head)\b[^>]*>[\s\S]*?<\/\1\s*>/gi;
const BLOCK_TAGS = /<\/?(?:p|div|section|article|header|footer|main|aside|nav|h[1-6]|ul|ol|dl|dt|dd|table|thead|tbody|tr|td|th|blockquote|pre|form|fieldset|figure|figcaption|hr)\b[^>]*>/gi;

const NAMED_ENTITIES = new Map<string, string>([
  ['amp', '&'],
  ['lt', '<'],
  ['gt', '>'],
  ['quot', '"'],
  ['apos', "'"],
  ['nbsp', ' '],
  ['ndash', '–'],
  ['mdash', '—'],
  ['hellip', '…'],
  ['rsquo', '’'],
  ['lsquo', '‘'],
  ['rdquo', '”'],
  ['ldquo', '“'],
  ['bull', '•'],
  ['middot', '·'],
  ['copy', '©'],
  ['reg', '®'],
  ['trade', '™'],
  ['euro', '€']
]);

/**
 * Decode named and numeric character references in one pass, so "&amp;lt;"
 * becomes "&lt;" rather than "<"
 */
export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, ref: string) => {
    if (ref.startsWith('#')) {
      const code = ref[1] === 'x' || ref[1] === 'X'
        ? parseInt(ref.substring(2), 16)
        : parseInt(ref.substring(1), 10);
      return Number.isInteger(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : match;
    }
    return NAMED_ENTITIES.get(ref.toLowerCase()) ?? match;
  });
}

function collapseLines(text: string): string {
  return text
    .split('\n')
    .map(line => line.replace(/[^\S\n]+/g, ' ').trim())
    .filter(line => line.length > 0)
    .join('\n');
}

/**
 * Text a reader would see: hidden elements and comments dropped, block
 * elements and <br> turned into line breaks, entities decoded, whitespace
 * collapsed
 */
export function extractVisibleText(html: string): string {
  const text = html
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(HIDDEN_ELEMENTS, '')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<li\b[^>]*>/gi, '\n- ')
    .replace(/<\/li\s*>/gi, '\n')
    .replace(BLOCK_TAGS, '\n')
    .replace(/<[^>]*>/g, '');

  return collapseLines(decodeEntities(text));
}

function attributesOf(tag: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const match of tag.matchAll(/([\w:-]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g)) {
    attributes[match[1].toLowerCase()] = match[2] ?? match[3] ?? '';
  }
  return attributes;
}

function cleanHint(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const cleaned = decodeEntities(value).replace(/\s+/g, ' ').trim();
  return cleaned.length > 0 ? cleaned : undefined;
}

/**
 * <title>, og:title and og:site_name, which often carry the position and
 * company when the body does not
 */
export function extractPageHints(html: string): PageHints {
  const hints: PageHints = {};

  const title = /<title\b[^>]*>([\s\S]*?)<\/title\s*>/i.exec(html);
  hints.title = cleanHint(title?.[1]);

  for (const match of html.matchAll(/<meta\b[^>]*>/gi)) {
    const attributes = attributesOf(match[0]);
    const key = attributes.property ?? attributes.name;
    if (key === 'og:title' && hints.ogTitle === undefined) {
      hints.ogTitle = cleanHint(attributes.content);
    } else if (key === 'og:site_name' && hints.siteName === undefined) {
      hints.siteName = cleanHint(attributes.content);
    }
  }

  return hints;
}

export function looksLikeHtml(body: string, contentType: string | undefined): boolean {
  if (contentType !== undefined && /html|xml/i.test(contentType)) {
    return true;
  }
  return /<(?:!doctype|html|body|div|p)\b/i.test(body);
}
