/**
 * Relevance model for transcript segments.
 *
 * Each segment is a document. A query term matches an indexed term in one of three ways:
 *
 * - exact: same term (weight 1)
 * - prefix: the indexed term starts with a query term of at least 3 characters (weight 0.5)
 * - fuzzy: Levenshtein distance 1 (similarity >= 0.72) or 2 (similarity >= 0.86) for query
 *   terms of at least 4 characters sharing a 2-character prefix (weight 0.25)
 *
 * A segment's contribution for one query term is the best `weight * bm25` over the variants
 * it contains. Contributions are summed and scaled by the fraction of query terms that
 * matched anything in the segment.
 */
import { tokenizeText, type TokenizeOptions } from "@/lib/pipeline/keywords";

export const BM25_K1 = 1.2;
export const BM25_B = 0.75;
export const PREFIX_MIN_LENGTH = 3;
export const FUZZY_MIN_LENGTH = 4;

export const MATCH_WEIGHTS = {
  exact: 1,
  prefix: 0.5,
  fuzzy: 0.25,
} as const;

export type MatchKind = keyof typeof MATCH_WEIGHTS;

export type TermVariant = {
  term: string;
  kind: MatchKind;
  weight: number;
};

export type Bm25Input = {
  termFrequency: number;
  documentLength: number;
  averageDocumentLength: number;
  documentFrequency: number;
  documentCount: number;
};

export function tokenizeQuery(query: string, options: TokenizeOptions = {}): string[] {
  return Array.from(new Set(tokenizeText(query, options)));
}

export function inverseDocumentFrequency(documentFrequency: number, documentCount: number): number {
  return Math.log(1 + (documentCount - documentFrequency + 0.5) / (documentFrequency + 0.5));
}

export function bm25TermScore(input: Bm25Input): number {
  if (input.termFrequency <= 0 || input.documentCount <= 0) {
    return 0;
  }

  const averageLength = input.averageDocumentLength > 0 ? input.averageDocumentLength : 1;
  const lengthNorm = 1 - BM25_B + BM25_B * (input.documentLength / averageLength);
  const tf = (input.termFrequency * (BM25_K1 + 1)) / (input.termFrequency + BM25_K1 * lengthNorm);

  return tf * inverseDocumentFrequency(input.documentFrequency, input.documentCount);
}

/**
 * Expands a query term into the indexed terms it matches. `vocabulary` must be the
 * index's term list; the exact variant, when present, comes first.
 */
export function expandQueryTerm(queryTerm: string, vocabulary: Iterable<string>): TermVariant[] {
  const variants: TermVariant[] = [];
  let exact: TermVariant | null = null;

  for (const term of vocabulary) {
    if (term === queryTerm) {
      exact = { term, kind: "exact", weight: MATCH_WEIGHTS.exact };
      continue;
    }

    if (queryTerm.length >= PREFIX_MIN_LENGTH && term.startsWith(queryTerm)) {
      variants.push({ term, kind: "prefix", weight: MATCH_WEIGHTS.prefix });
      continue;
    }

    if (isFuzzyMatch(queryTerm, term)) {
      variants.push({ term, kind: "fuzzy", weight: MATCH_WEIGHTS.fuzzy });
    }
  }

  variants.sort((left, right) => right.weight - left.weight || compareStrings(left.term, right.term));
  return exact ? [exact, ...variants] : variants;
}

export function isFuzzyMatch(queryTerm: string, candidate: string): boolean {
  if (queryTerm.length < FUZZY_MIN_LENGTH || candidate.length < 3 || candidate === queryTerm) {
    return false;
  }

  if (commonPrefixLength(queryTerm, candidate) < 2) {
    return false;
  }

  if (Math.abs(queryTerm.length - candidate.length) > 2) {
    return false;
  }

  const distance = levenshteinDistance(queryTerm, candidate);
  const similarity = 1 - distance / Math.max(queryTerm.length, candidate.length);

  return (distance <= 1 && similarity >= 0.72) || (distance <= 2 && similarity >= 0.86);
}

export function commonPrefixLength(left: string, right: string): number {
  const length = Math.min(left.length, right.length);
  let index = 0;
  while (index < length && left[index] === right[index]) {
    index += 1;
  }
  return index;
}

export function levenshteinDistance(left: string, right: string): number {
  if (left === right) {
    return 0;
  }

  if (!left.length) {
    return right.length;
  }

  if (!right.length) {
    return left.length;
  }

  const previous = new Array<number>(right.length + 1);
  const current = new Array<number>(right.length + 1);

  for (let column = 0; column <= right.length; column += 1) {
    previous[column] = column;
  }

  for (let row = 1; row <= left.length; row += 1) {
    current[0] = row;

    for (let column = 1; column <= right.length; column += 1) {
      const substitutionCost = left[row - 1] === right[column - 1] ? 0 : 1;
      const deletion = previous[column] + 1;
      const insertion = current[column - 1] + 1;
      const substitution = previous[column - 1] + substitutionCost;

      current[column] = Math.min(deletion, insertion, substitution);
    }

    for (let column = 0; column <= right.length; column += 1) {
      previous[column] = current[column];
    }
  }

  return previous[right.length];
}

function compareStrings(left: string, right: string): number {
  if (left === right) {
    return 0;
  }

  return left < right ? -1 : 1;
}

export type RankedMatchKey = {
  score: number;
  publishDate: string | null;
  videoId: string;
  seq: number;
};

/** Score desc, then publish date desc (unknown dates last), video id asc, segment seq asc. */
export function compareRankedMatches(left: RankedMatchKey, right: RankedMatchKey): number {
  if (right.score !== left.score) {
    return right.score - left.score;
  }

  if (left.publishDate !== right.publishDate) {
    if (left.publishDate === null) {
      return 1;
    }

    if (right.publishDate === null) {
      return -1;
    }

    return left.publishDate < right.publishDate ? 1 : -1;
  }

  if (left.videoId !== right.videoId) {
    return compareStrings(left.videoId, right.videoId);
  }

  return left.seq - right.seq;
}
