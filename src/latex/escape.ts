/**
 * LaTeX escaping
 *
 * Everything dynamic that reaches the document passes through here:
 * sanitize (strip control characters and anything the fonts cannot
 * render, collapse whitespace, cap length), then escape exactly once.
 * `unescapeLatex` inverts `escapeLatex` for every input string.
 */

const ESCAPES: Record<string, string> = {
  '&': '\\&',
  '%': '\\%',
  '$': '\\$',
  '#': '\\#',
  '_': '\\_',
  '{': '\\{',
  '}': '\\}',
  '~': '\\textasciitilde{}',
  '^': '\\textasciicircum{}',
  '\\': '\\textbackslash{}',
  '<': '\\textless{}',
  '>': '\\textgreater{}'
};

const UNESCAPES: Record<string, string> = Object.fromEntries(
  Object.entries(ESCAPES).map(([char, escaped]) => [escaped, char])
);

const SPECIAL_CHARS = /[&%$#_{}~^\\<>]/g;
const ESCAPE_SEQUENCES = /\\textasciitilde\{\}|\\textasciicircum\{\}|\\textbackslash\{\}|\\textless\{\}|\\textgreater\{\}|\\[&%$#_{}]/g;

export function escapeLatex(text: string): string {
  return text.replace(SPECIAL_CHARS, char => ESCAPES[char] ?? char);
}

export function unescapeLatex(text: string): string {
  return text.replace(ESCAPE_SEQUENCES, sequence => UNESCAPES[sequence] ?? sequence);
}

/**
 * Symbols the template fonts lack but that have a plain-text spelling
 */
const TRANSLITERATIONS: Record<string, string> = {
  '\u2010': '-',
  '\u2011': '-',
  '\u2012': '-',
  '\u2212': '-',
  '\u2015': '\u2014',
  '\u2190': '<-',
  '\u2192': '->',
  '\u2194': '<->',
  '\u21D2': '=>',
  '\u2264': '<=',
  '\u2265': '>=',
  '\u2260': '!=',
  '\u2248': '~',
  '\u2032': "'",
  '\u2033': "''"
};

/**
 * Code points that utf8 inputenc with T1 fonts and textcomp can typeset:
 * ASCII, Latin-1, Latin Extended-A and common typographic punctuation
 */
const SUPPORTED = /^[\u0009\u000A\u000D\u0020-\u007E\u00A0-\u017F\u2013\u2014\u2018-\u201E\u2020-\u2022\u2026\u2030\u2039\u203A\u20AC\u2122]$/;

/**
 * Replace or drop every character the document fonts cannot render.
 * Accented letters outside the covered range lose their accents.
 */
export function restrictToFontCoverage(text: string): string {
  let output = '';
  for (const char of text.normalize('NFC')) {
    if (SUPPORTED.test(char)) {
      output += char;
      continue;
    }
    const replacement = TRANSLITERATIONS[char];
    if (replacement !== undefined) {
      output += replacement;
      continue;
    }
    const base = char.normalize('NFD').charAt(0);
    if (base !== char && SUPPORTED.test(base)) {
      output += base;
    }
  }
  return output;
}

/**
 * Remove control characters and unrenderable symbols, collapse whitespace
 * runs and cap the length (in code points), ending truncated text with an
 * ellipsis
 */
export function sanitizeText(text: string, maxChars: number): string {
  const cleaned = restrictToFontCoverage(
    text
      .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F]/g, '')
      .replace(/\s+/g, ' ')
  )
    .replace(/ {2,}/g, ' ')
    .trim();

  const chars = Array.from(cleaned);
  if (chars.length <= maxChars) {
    return cleaned;
  }
  if (maxChars <= 0) {
    return '';
  }
  return chars.slice(0, maxChars - 1).join('').trimEnd() + '…';
}

/**
 * Escape text and turn **bold** and `code` spans into \textbf / \texttt.
 * Markers without a partner are kept as literal text.
 */
export function renderInlineMarkup(text: string): string {
  let output = '';
  let lastIndex = 0;

  for (const match of text.matchAll(/\*\*(.+?)\*\*|`([^`]+)`/g)) {
    const index = match.index ?? 0;
    output += escapeLatex(text.substring(lastIndex, index));
    output += match[1] !== undefined
      ? `\\textbf{${escapeLatex(match[1])}}`
      : `\\texttt{${escapeLatex(match[2])}}`;
    lastIndex = index + match[0].length;
  }

  return output + escapeLatex(text.substring(lastIndex));
}

/**
 * URL usable inside \href{...}, or undefined for schemes other than
 * http, https and mailto
 */
export function safeHref(raw: string): string | undefined {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    return undefined;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:' && url.protocol !== 'mailto:') {
    return undefined;
  }

  return url.href
    .replace(/[\\{}^~|`<>"\s]/g, char => '%' + char.charCodeAt(0).toString(16).toUpperCase().padStart(2, '0'))
    .replace(/%/g, '\\%')
    .replace(/#/g, '\\#');
}

/**
 * Display form of a URL: no scheme, no "www.", no trailing slash
 */
export function displayUrl(raw: string): string {
  return raw
    .trim()
    .replace(/^(?:https?:\/\/|mailto:)/i, '')
    .replace(/^www\./i, '')
    .replace(/\/+$/, '');
}
