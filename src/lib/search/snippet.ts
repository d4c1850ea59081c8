import { findTokenSpan, type TokenSpan } from "@/lib/pipeline/keywords";

export const DEFAULT_SNIPPET_LENGTH = 120;

/**
 * Returns at most `maxLength` characters of `fullText` (plus ellipses) centred on the
 * earliest whole-token occurrence of any matched term. Falls back to the head of the
 * text when no term is found.
 */
export function buildSnippet(fullText: string, matchedTerms: string[], maxLength = DEFAULT_SNIPPET_LENGTH): string {
  if (!fullText) {
    return "";
  }

  if (fullText.length <= maxLength) {
    return fullText;
  }

  const anchor = locateEarliestTerm(fullText, matchedTerms);

  if (!anchor) {
    return `${fullText.slice(0, maxLength)}…`;
  }

  const contextPadding = Math.floor((maxLength - anchor.length) / 2);
  const start = Math.max(0, Math.min(anchor.index - contextPadding, fullText.length - maxLength));
  const end = Math.min(fullText.length, start + maxLength);

  const prefix = start > 0 ? "…" : "";
  const suffix = end < fullText.length ? "…" : "";

  return `${prefix}${fullText.slice(start, end)}${suffix}`;
}

function locateEarliestTerm(fullText: string, matchedTerms: string[]): TokenSpan | null {
  let earliest: TokenSpan | null = null;

  for (const term of matchedTerms) {
    const span = findTokenSpan(fullText, term);
    if (span && (earliest === null || span.index < earliest.index)) {
      earliest = span;
    }
  }

  return earliest;
}
