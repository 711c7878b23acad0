import { ELLIPSIS, SENTENCE_CUT_MIN_RATIO } from '../config/news.constants';

const WS_RE = /\s+/g;
const TAG_RE = /<\/?[a-zA-Z][^>]*>/g;
const COMMENT_RE = /<!--[\s\S]*?-->/g;
const CDATA_RE = /<!\[CDATA\[([\s\S]*?)\]\]>/gi;
const SCRIPT_STYLE_RE = /<(script|style)\b[^>]*>[\s\S]*?<\/\1\s*>/gi;
const ENTITY_RE = /&(#x[0-9a-f]+|#\d+|[a-z][a-z0-9]*);/gi;
const SENTENCE_END = new Set(['.', '!', '?']);

const ENTITY_MAP: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  ndash: '–',
  mdash: '—',
  hellip: '…',
  laquo: '«',
  raquo: '»',
  ldquo: '“',
  rdquo: '”',
  lsquo: '‘',
  rsquo: '’',
  copy: '©',
  reg: '®',
  trade: '™',
};

export function decodeHtmlEntities(value: string): string {
  if (!value) {
    return '';
  }
  return value.replace(ENTITY_RE, (match, body: string) => {
    if (body.startsWith('#x') || body.startsWith('#X')) {
      return String.fromCodePoint(parseInt(body.slice(2), 16));
    }
    if (body.startsWith('#')) {
      return String.fromCodePoint(Number(body.slice(1)));
    }
    return ENTITY_MAP[body.toLowerCase()] ?? match;
  });
}

export function stripCdata(value: string): string {
  if (!value) {
    return '';
  }
  return value.replace(CDATA_RE, '$1');
}

/**
 * Turns an entry body (HTML, CDATA-wrapped HTML or plain text) into one line
 * of readable text. Returns the input untouched if decoding fails.
 */
export function normalizeText(value: string | null | undefined): string {
  if (!value) {
    return '';
  }
  try {
    const stripped = stripCdata(value)
      .replace(COMMENT_RE, ' ')
      .replace(SCRIPT_STYLE_RE, ' ')
      .replace(TAG_RE, ' ');
    return decodeHtmlEntities(stripped).replace(WS_RE, ' ').trim();
  } catch {
    return value;
  }
}

export function truncateText(text: string, maxLen: number): string {
  if (text.length <= maxLen) {
    return text;
  }
  const cut = text.slice(0, Math.max(0, maxLen));
  for (let i = cut.length - 1; i >= 0; i -= 1) {
    if (!SENTENCE_END.has(cut[i])) {
      continue;
    }
    if (i > maxLen * SENTENCE_CUT_MIN_RATIO) {
      return `${cut.slice(0, i + 1)}${ELLIPSIS}`;
    }
    break;
  }
  return `${cut.trimEnd()}${ELLIPSIS}`;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function toHashtag(tag: string): string {
  const compact = tag.replace(/[^\p{L}\p{N}_]+/gu, '');
  return compact ? `#${compact}` : '';
}
