import { execFile as execFileCallback } from "node:child_process";
import { promisify } from "node:util";
import { z } from "zod";
import { FetchError } from "@/lib/pipeline/errors";
import { collapseWhitespace } from "@/lib/pipeline/segmenter";
import type { RawTranscriptLine } from "@/lib/pipeline/types";

const execFile = promisify(execFileCallback);
export const YT_DLP_LANG_PRIORITY = ["en-orig", "en", "en-US", "en-GB"] as const;

const YtDlpTrackSchema = z
  .object({
    ext: z.string().optional(),
    url: z.string().optional(),
  })
  .passthrough();

const TrackPoolSchema = z.record(z.array(YtDlpTrackSchema));

export const YtDlpMetadataSchema = z
  .object({
    id: z.string().optional(),
    title: z.string().optional(),
    channel: z.string().nullish(),
    uploader: z.string().nullish(),
    upload_date: z.string().nullish(),
    duration: z.number().nullish(),
    subtitles: TrackPoolSchema.nullish(),
    automatic_captions: TrackPoolSchema.nullish(),
  })
  .passthrough();

export type YtDlpMetadata = z.infer<typeof YtDlpMetadataSchema>;

type YtJson3Event = {
  tStartMs?: number;
  dDurationMs?: number;
  segs?: Array<{ utf8?: string }>;
};

const YtJson3PayloadSchema = z
  .object({
    events: z
      .array(
        z
          .object({
            tStartMs: z.number().optional(),
            dDurationMs: z.number().optional(),
            segs: z.array(z.object({ utf8: z.string().optional() }).passthrough()).optional(),
          })
          .passthrough(),
      )
      .optional(),
  })
  .passthrough();

export async function loadYtDlpMetadata(videoId: string, signal: AbortSignal): Promise<YtDlpMetadata> {
  let stdout: string;

  try {
    const result = await execFile(
      "yt-dlp",
      ["--skip-download", "--dump-single-json", `https://www.youtube.com/watch?v=${videoId}`],
      {
        maxBuffer: 25 * 1024 * 1024,
        signal,
      },
    );
    stdout = result.stdout;
  } catch (error) {
    throw classifyYtDlpFailure(videoId, error);
  }

  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch (error) {
    throw new FetchError("Unavailable", `yt-dlp returned unreadable JSON for ${videoId}: ${String(error)}`);
  }

  const parsed = YtDlpMetadataSchema.safeParse(json);
  if (!parsed.success) {
    throw new FetchError("Unavailable", `yt-dlp returned an unexpected document for ${videoId}`);
  }

  return parsed.data;
}

export function classifyYtDlpFailure(videoId: string, error: unknown): FetchError {
  const stderr = readStderr(error);
  const message = error instanceof Error ? error.message : "yt-dlp failed";
  const detail = `${message}\n${stderr}`;

  if (/HTTP Error 429|Too Many Requests/i.test(detail)) {
    return new FetchError("RateLimited", `Rate limited while loading ${videoId}`);
  }

  if (/Video unavailable|Private video|This video has been removed|does not exist/i.test(detail)) {
    return new FetchError("NotFound", `Video ${videoId} is unavailable`);
  }

  return new FetchError("Unavailable", `yt-dlp failed for ${videoId}: ${message}`);
}

/**
 * Maps a yt-dlp document onto the supplier payload fields. Values are passed through
 * unvalidated; the pipeline decides whether they form usable metadata.
 */
export function toMetadataPayload(metadata: YtDlpMetadata): Record<string, unknown> {
  return {
    title: metadata.title,
    channel: metadata.channel ?? metadata.uploader ?? undefined,
    publishDate: formatUploadDate(metadata.upload_date),
    durationSec: metadata.duration ?? undefined,
  };
}

export function formatUploadDate(value: string | null | undefined): string | null {
  if (!value || !/^\d{8}$/.test(value)) {
    return null;
  }

  return `${value.slice(0, 4)}-${value.slice(4, 6)}-${value.slice(6, 8)}`;
}

export function pickJson3TrackUrl(metadata: YtDlpMetadata): string | null {
  const pools = [metadata.subtitles, metadata.automatic_captions].filter(
    (pool): pool is NonNullable<YtDlpMetadata["subtitles"]> => pool !== null && pool !== undefined,
  );

  for (const pool of pools) {
    for (const lang of YT_DLP_LANG_PRIORITY) {
      const tracks = pool[lang];
      if (!tracks) {
        continue;
      }

      const match = tracks.find((track) => track.ext === "json3" && typeof track.url === "string");
      if (match?.url) {
        return match.url;
      }
    }
  }

  for (const pool of pools) {
    for (const tracks of Object.values(pool)) {
      const match = tracks.find((track) => track.ext === "json3" && typeof track.url === "string");
      if (match?.url) {
        return match.url;
      }
    }
  }

  return null;
}

export async function fetchJson3Lines(url: string, signal: AbortSignal): Promise<RawTranscriptLine[]> {
  const response = await fetch(url, { signal });

  if (response.status === 429) {
    throw new FetchError("RateLimited", "Caption track request was rate limited");
  }

  if (!response.ok) {
    throw new FetchError("Unavailable", `Caption track request failed with status ${response.status}`);
  }

  const payload = YtJson3PayloadSchema.safeParse(await response.json());
  if (!payload.success) {
    throw new FetchError("Unavailable", "Caption track had an unexpected format");
  }

  return parseYtJson3Lines(payload.data.events ?? []);
}

export function parseYtJson3Lines(events: YtJson3Event[]): RawTranscriptLine[] {
  const rows: RawTranscriptLine[] = [];

  for (const event of events) {
    if (!Array.isArray(event.segs)) {
      continue;
    }

    const startMs = event.tStartMs ?? 0;
    const durationMs = event.dDurationMs ?? 0;

    if (durationMs <= 0) {
      continue;
    }

    const text = collapseWhitespace(
      event.segs.map((segment) => (typeof segment.utf8 === "string" ? segment.utf8 : "")).join(""),
    );

    // json3 tracks carry newline-only events between cues
    if (!text) {
      continue;
    }

    rows.push({
      start: startMs / 1000,
      end: (startMs + durationMs) / 1000,
      text,
    });
  }

  return rows;
}

function readStderr(error: unknown): string {
  if (typeof error === "object" && error !== null && "stderr" in error) {
    const { stderr } = error;
    if (typeof stderr === "string") {
      return stderr;
    }
  }

  return "";
}
