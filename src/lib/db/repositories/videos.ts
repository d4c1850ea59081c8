import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { VideoListFilter } from "@/lib/db/archive-store";
import { REVIEW_STATES, type ReviewState, type VideoRecord } from "@/lib/pipeline/types";
import { retryWithBackoff, type RetryOptions } from "@/lib/utils/retry";

export const VIDEO_COLUMNS =
  "id, title, channel, publish_date, duration_sec, review_state, failure_reason, ingested_at, updated_at";

const LIST_PAGE_SIZE = 1000;

const VideoRowSchema = z.object({
  id: z.string(),
  title: z.string().nullable(),
  channel: z.string().nullable(),
  publish_date: z.string().nullable(),
  duration_sec: z.number().nullable(),
  review_state: z.enum(REVIEW_STATES),
  failure_reason: z.string().nullable(),
  ingested_at: z.string(),
  updated_at: z.string(),
});

export type VideoRow = z.infer<typeof VideoRowSchema>;

export async function getVideoById(client: SupabaseClient, videoId: string): Promise<VideoRecord | null> {
  const { data, error } = await client.from("videos").select(VIDEO_COLUMNS).eq("id", videoId).maybeSingle();

  if (error) {
    throw new Error(`Failed to load video ${videoId}: ${error.message}`);
  }

  return data ? parseVideoRow(data) : null;
}

export async function listVideos(client: SupabaseClient, filter: VideoListFilter = {}): Promise<VideoRecord[]> {
  const videos: VideoRecord[] = [];

  for (let offset = 0; ; offset += LIST_PAGE_SIZE) {
    let query = client.from("videos").select(VIDEO_COLUMNS);

    if (filter.state) {
      query = query.eq("review_state", filter.state);
    }

    const { data, error } = await query.order("id", { ascending: true }).range(offset, offset + LIST_PAGE_SIZE - 1);

    if (error) {
      throw new Error(`Failed to list videos: ${error.message}`);
    }

    const rows = data ?? [];
    for (const row of rows) {
      videos.push(parseVideoRow(row));
    }

    if (rows.length < LIST_PAGE_SIZE) {
      break;
    }
  }

  return videos;
}

export async function transitionReviewState(
  client: SupabaseClient,
  videoId: string,
  from: ReviewState,
  to: ReviewState,
): Promise<VideoRecord | null> {
  const { data, error } = await client.rpc("transition_review_state", {
    p_video_id: videoId,
    p_from: from,
    p_to: to,
  });

  if (error) {
    throw new Error(`transition_review_state rpc failed: ${error.message}`);
  }

  const rows = z.array(z.unknown()).parse(data ?? []);
  return rows.length > 0 ? parseVideoRow(rows[0]) : null;
}

export async function deleteVideo(
  client: SupabaseClient,
  videoId: string,
  retryOptions: RetryOptions = {},
): Promise<void> {
  await retryWithBackoff(async () => {
    const { error } = await client.from("videos").delete().eq("id", videoId);

    if (error) {
      throw new Error(`Failed to delete video ${videoId}: ${error.message}`);
    }
  }, retryOptions);
}

export function toVideoRow(video: VideoRecord): VideoRow {
  return {
    id: video.videoId,
    title: video.title,
    channel: video.channel,
    publish_date: video.publishDate,
    duration_sec: video.durationSec,
    review_state: video.state,
    failure_reason: video.failureReason,
    ingested_at: video.ingestedAt,
    updated_at: video.updatedAt,
  };
}

export function parseVideoRow(value: unknown): VideoRecord {
  const parsed = VideoRowSchema.safeParse(value);

  if (!parsed.success) {
    throw new Error(`Unexpected videos row: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`);
  }

  const row = parsed.data;

  return {
    videoId: row.id,
    title: row.title,
    channel: row.channel,
    publishDate: row.publish_date,
    durationSec: row.duration_sec,
    state: row.review_state,
    failureReason: row.failure_reason,
    ingestedAt: row.ingested_at,
    updatedAt: row.updated_at,
  };
}
