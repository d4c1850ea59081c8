import {
  YoutubeTranscript,
  YoutubeTranscriptDisabledError,
  YoutubeTranscriptNotAvailableError,
  YoutubeTranscriptNotAvailableLanguageError,
  YoutubeTranscriptTooManyRequestError,
  YoutubeTranscriptVideoUnavailableError,
  type TranscriptResponse,
} from "youtube-transcript";
import { FetchError, describeError } from "@/lib/pipeline/errors";
import type { TranscriptSupplier } from "@/lib/pipeline/transcript/supplier";
import {
  fetchJson3Lines,
  loadYtDlpMetadata,
  pickJson3TrackUrl,
  toMetadataPayload,
} from "@/lib/pipeline/transcript/yt-dlp";
import type { RawTranscriptLine } from "@/lib/pipeline/types";

type YoutubeSupplierOptions = {
  lang?: string;
};

/**
 * Metadata always comes from yt-dlp. Caption lines come from youtube-transcript and
 * fall back to yt-dlp's json3 track when the primary source has nothing usable.
 */
export function createYoutubeTranscriptSupplier(options: YoutubeSupplierOptions = {}): TranscriptSupplier {
  return {
    async fetch(videoId, signal) {
      const metadata = await loadYtDlpMetadata(videoId, signal);
      let primaryError: FetchError | null = null;

      try {
        const primary = await fetchLinesWithYoutubeTranscript(videoId, options.lang);
        if (primary.length > 0) {
          return { ...toMetadataPayload(metadata), lines: primary };
        }
      } catch (error) {
        primaryError = toFetchError(error);
      }

      const json3Url = pickJson3TrackUrl(metadata);
      if (json3Url) {
        const fallback = await fetchJson3Lines(json3Url, signal);
        if (fallback.length > 0) {
          return { ...toMetadataPayload(metadata), lines: fallback };
        }
      }

      throw primaryError ?? new FetchError("NoTranscript", `No usable transcript rows for video ${videoId}`);
    },
  };
}

async function fetchLinesWithYoutubeTranscript(videoId: string, lang?: string): Promise<RawTranscriptLine[]> {
  const transcript = await YoutubeTranscript.fetchTranscript(videoId, lang ? { lang } : undefined);
  return toTranscriptLines(transcript);
}

export function toTranscriptLines(rows: TranscriptResponse[]): RawTranscriptLine[] {
  return rows.map((row) => ({
    start: row.offset,
    end: row.offset + row.duration,
    text: decodeCaptionEntities(row.text),
  }));
}

export function toFetchError(error: unknown): FetchError {
  if (error instanceof FetchError) {
    return error;
  }

  if (error instanceof YoutubeTranscriptTooManyRequestError) {
    return new FetchError("RateLimited", error.message);
  }

  if (error instanceof YoutubeTranscriptVideoUnavailableError) {
    return new FetchError("NotFound", error.message);
  }

  if (
    error instanceof YoutubeTranscriptDisabledError ||
    error instanceof YoutubeTranscriptNotAvailableError ||
    error instanceof YoutubeTranscriptNotAvailableLanguageError
  ) {
    return new FetchError("NoTranscript", error.message);
  }

  return new FetchError("Unavailable", describeError(error));
}

// Caption text arrives HTML-escaped, sometimes twice ("&amp;#39;").
function decodeCaptionEntities(text: string): string {
  let decoded = text;

  for (let pass = 0; pass < 2; pass += 1) {
    decoded = decoded
      .replace(/&amp;/g, "&")
      .replace(/&#39;/g, "'")
      .replace(/&quot;/g, '"')
      .replace(/&lt;/g, "<")
      .replace(/&gt;/g, ">");
  }

  return decoded;
}
