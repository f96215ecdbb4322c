import {
  MIN_TOKEN_LENGTH,
  TITLE_STOPWORDS,
} from '../config/metrics.constants';

const WS_RE = /\s+/g;
const WORD_RE = /[A-Za-zÀ-ÖØ-öø-ÿ'’]+/g;
const EDGE_APOSTROPHE_RE = /^'+|'+$/g;

/**
 * Split a title into lower-cased keyword tokens, in order and with repeats.
 * Letters include accented Latin; apostrophes are kept inside a word.
 */
export function tokenizeTitle(
  title: string | null | undefined,
  stopwords: ReadonlySet<string> = TITLE_STOPWORDS,
): string[] {
  if (!title) {
    return [];
  }

  const words = title.toLowerCase().match(WORD_RE) ?? [];
  return words
    .map((word) => word.replace(/’/g, "'").replace(EDGE_APOSTROPHE_RE, ''))
    .filter((word) => word.length >= MIN_TOKEN_LENGTH)
    .filter((word) => !stopwords.has(word));
}

export function normalizeTitleKey(title: string | null | undefined): string {
  if (!title) {
    return '';
  }
  return title.trim().toLowerCase().replace(WS_RE, ' ');
}
