const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]{3,64}$/;
const URL_ID_PATTERNS = [
  /[?&]v=([A-Za-z0-9_-]+)/,
  /youtu\.be\/([A-Za-z0-9_-]+)/,
  /\/(?:shorts|embed|live)\/([A-Za-z0-9_-]+)/,
];

export function isValidVideoId(value: string): boolean {
  return VIDEO_ID_PATTERN.test(value);
}

/**
 * Accepts a bare id or a watch / youtu.be / shorts / embed / live URL. Returns null
 * when no well-formed id can be found.
 */
export function extractVideoId(input: string): string | null {
  const trimmed = input.trim();

  if (isValidVideoId(trimmed)) {
    return trimmed;
  }

  for (const pattern of URL_ID_PATTERNS) {
    const match = trimmed.match(pattern);
    if (match && isValidVideoId(match[1])) {
      return match[1];
    }
  }

  return null;
}
