export const ENGLISH_STOPWORDS = [
  "a",
  "an",
  "and",
  "are",
  "as",
  "at",
  "be",
  "but",
  "by",
  "for",
  "if",
  "in",
  "is",
  "it",
  "of",
  "on",
  "or",
  "so",
  "that",
  "the",
  "this",
  "to",
  "was",
  "with",
];

export type StopwordPolicy = "none" | "english";

export type TokenizeOptions = {
  stopwords?: ReadonlySet<string>;
};

const TOKEN_BOUNDARY = /[^\p{L}\p{N}]+/u;

export function resolveStopwords(policy: StopwordPolicy): ReadonlySet<string> {
  if (policy === "english") {
    return new Set(ENGLISH_STOPWORDS);
  }

  return new Set();
}

/**
 * Lowercases and splits on every run of characters that is neither a letter nor a digit.
 * Order and duplicates are preserved; index term frequencies depend on both.
 */
export function tokenizeText(text: string, options: TokenizeOptions = {}): string[] {
  const stopwords = options.stopwords;

  return text
    .toLowerCase()
    .split(TOKEN_BOUNDARY)
    .map((token) => normalizeToken(token))
    .filter((token) => token.length > 0 && !(stopwords?.has(token) ?? false));
}

export function normalizeToken(token: string): string {
  return token.trim().toLowerCase();
}

export type TokenSpan = {
  index: number;
  length: number;
};

/** Locates the first occurrence of `token` in `text` as a whole token, case-insensitively. */
export function findTokenOffset(text: string, token: string): number {
  return findTokenSpan(text, token)?.index ?? -1;
}

/**
 * Like `findTokenOffset`, but returns the span in `text` itself. Lowercasing can change
 * the length of a character ("İ" becomes two code units), so offsets found in the
 * lowercased text are mapped back.
 */
export function findTokenSpan(text: string, token: string): TokenSpan | null {
  const target = normalizeToken(token);

  if (!target) {
    return null;
  }

  const { lower, origins } = lowercaseWithOrigins(text);

  let from = 0;
  while (from <= lower.length - target.length) {
    const index = lower.indexOf(target, from);
    if (index < 0) {
      return null;
    }

    const before = index === 0 ? "" : lower[index - 1];
    const after = lower[index + target.length] ?? "";
    if (!isWordCharacter(before) && !isWordCharacter(after)) {
      const start = origins[index];
      return { index: start, length: origins[index + target.length] - start };
    }

    from = index + 1;
  }

  return null;
}

/** `origins[i]` is the offset in `text` of the character that produced `lower[i]`. */
function lowercaseWithOrigins(text: string): { lower: string; origins: number[] } {
  const whole = text.toLowerCase();
  const origins: number[] = [];

  if (whole.length === text.length) {
    for (let offset = 0; offset <= text.length; offset += 1) {
      origins.push(offset);
    }
    return { lower: whole, origins };
  }

  let lower = "";
  let offset = 0;
  for (const char of text) {
    const lowered = char.toLowerCase();
    for (let unit = 0; unit < lowered.length; unit += 1) {
      origins.push(offset);
    }
    lower += lowered;
    offset += char.length;
  }
  origins.push(offset);

  return { lower, origins };
}

function isWordCharacter(char: string): boolean {
  return char.length > 0 && !TOKEN_BOUNDARY.test(char);
}
