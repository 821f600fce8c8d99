/**
 * Shared keyword and phrase matching utilities.
 */

const patternCache = new Map<string, RegExp>();

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const WORD_START = '(?<![\\p{L}\\p{N}])';
const WORD_END = '(?![\\p{L}\\p{N}])';

/** Keywords this short also need a word end, or "hiv" would match "hives". */
const SHORT_KEYWORD_LENGTH = 4;

function pluralSuffix(key: string): string {
  return /(?:s|sh|ch|x|z)$/.test(key) ? '(?:es)?' : 's?';
}


/**
 * Keyword must start at a word boundary. Longer keywords take any suffix
 * ("infant" matches "infants"); short ones only a plural ending, so "rest"
 * matches "rests" but neither "interest" nor "restaurant".
 */
function keywordPattern(keyword: string): RegExp {
  const key = keyword.toLowerCase();
  let pattern = patternCache.get(key);
  if (!pattern) {
    const escaped = escapeRegex(key);
    const source =
      key.length <= SHORT_KEYWORD_LENGTH
        ? `${WORD_START}${escaped}${pluralSuffix(key)}${WORD_END}`
        : `${WORD_START}${escaped}`;
    pattern = new RegExp(source, 'u');
    patternCache.set(key, pattern);
  }
  return pattern;
}

/** Whole-word phrase, optionally pluralised at the end. Not cached: phrases are claim text. */
function phrasePattern(phrase: string): RegExp {
  return new RegExp(`${WORD_START}${escapeRegex(phrase)}${pluralSuffix(phrase)}${WORD_END}`, 'u');
}

export function normalizeText(text: string | null | undefined): string {
  if (!text) return '';
  return text
    .toLowerCase()
    .replace(/[‘’]/g, "'")
    .replace(/\s+/g, ' ')
    .trim();
}

export function containsKeyword(text: string, keyword: string): boolean {
  return keywordPattern(keyword).test(normalizeText(text));
}

/**
 * Keywords present in text, in list order, without duplicates.
 */
export function findKeywords(text: string, keywords: readonly string[]): string[] {
  const normalized = normalizeText(text);
  if (!normalized) return [];

  const found: string[] = [];
  for (const keyword of keywords) {
    if (!found.includes(keyword) && keywordPattern(keyword).test(normalized)) {
      found.push(keyword);
    }
  }
  return found;
}

/**
 * True when one text contains the other as whole words. "ors" is found in
 * "drink ors daily" but not in "neighbors".
 */
export function phrasesOverlap(a: string, b: string): boolean {
  const left = normalizeText(a);
  const right = normalizeText(b);
  if (!left || !right) return false;
  return phrasePattern(right).test(left) || phrasePattern(left).test(right);
}

const LEADING_CONJUNCTIONS = /^(?:and|or|but|also|then)\s+/i;

/**
 * Split free text into clause-sized fragments: sentences, further split on
 * ", " so that list items become separate clauses.
 */
export function splitClauses(text: string): string[] {
  return text
    .split(/[.!?;\n]+|,\s+/)
    .map((clause) => clause.trim().replace(LEADING_CONJUNCTIONS, '').trim())
    .filter((clause) => clause.length > 2);
}
