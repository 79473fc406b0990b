// Short list on purpose: dropping common words keeps them from dominating
// the overlap score without hiding domain terms.
const STOPWORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'but', 'by', 'do', 'does',
  'for', 'from', 'has', 'have', 'how', 'in', 'is', 'it', 'its', 'of', 'on',
  'or', 'that', 'the', 'this', 'to', 'was', 'were', 'what', 'when', 'where',
  'which', 'who', 'why', 'will', 'with',
]);

const TOKEN_SEPARATOR = /[^\p{L}\p{N}]+/u;

/**
 * Light suffix stripping so plural and inflected forms share a term.
 */
export function stem(token: string): string {
  let word = token;
  if (word.length <= 3) {
    return word;
  }

  if (word.endsWith('ies') && word.length > 4) {
    word = `${word.slice(0, -3)}y`;
  } else if (word.endsWith('sses')) {
    word = word.slice(0, -2);
  } else if (
    word.endsWith('s') &&
    !word.endsWith('ss') &&
    !word.endsWith('us') &&
    !word.endsWith('is')
  ) {
    word = word.slice(0, -1);
  }

  if (word.endsWith('ing') && word.length > 5) {
    word = word.slice(0, -3);
  } else if (word.endsWith('ed') && word.length > 4) {
    word = word.slice(0, -2);
  }

  return word;
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(TOKEN_SEPARATOR)
    .filter((token) => token.length > 1 && !STOPWORDS.has(token))
    .map(stem);
}

export interface TermProfile {
  termFrequencies: Record<string, number>;
  tokenCount: number;
}

export function buildTermProfile(text: string): TermProfile {
  const tokens = tokenize(text);
  const termFrequencies: Record<string, number> = {};
  for (const token of tokens) {
    termFrequencies[token] = (termFrequencies[token] ?? 0) + 1;
  }
  return { termFrequencies, tokenCount: tokens.length };
}

export function queryTerms(query: string): string[] {
  return Array.from(new Set(tokenize(query))).sort();
}

/**
 * Sum of the chunk's frequencies for each distinct query term, divided by
 * the chunk's token count. Zero when nothing overlaps.
 */
export function scoreKeywordOverlap(
  terms: readonly string[],
  profile: TermProfile,
): number {
  if (profile.tokenCount === 0) {
    return 0;
  }
  let hits = 0;
  for (const term of terms) {
    hits += profile.termFrequencies[term] ?? 0;
  }
  return hits / profile.tokenCount;
}
