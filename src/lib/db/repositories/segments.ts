import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { toVideoRow } from "@/lib/db/repositories/videos";
import type { Segment, VideoRecord } from "@/lib/pipeline/types";
import { retryWithBackoff, type RetryOptions } from "@/lib/utils/retry";

const SEGMENT_PAGE_SIZE = 1000;

const SegmentRowSchema = z.object({
  video_id: z.string(),
  seq: z.number().int().nonnegative(),
  start_sec: z.number(),
  end_sec: z.number(),
  text: z.string(),
});

export async function getVideoSegments(client: SupabaseClient, videoId: string): Promise<Segment[]> {
  const segments: Segment[] = [];

  for (let offset = 0; ; offset += SEGMENT_PAGE_SIZE) {
    const { data, error } = await client
      .from("segments")
      .select("video_id, seq, start_sec, end_sec, text")
      .eq("video_id", videoId)
      .order("seq", { ascending: true })
      .range(offset, offset + SEGMENT_PAGE_SIZE - 1);

    if (error) {
      throw new Error(`Failed to load video segments: ${error.message}`);
    }

    const rows = data ?? [];
    for (const row of rows) {
      const parsed = SegmentRowSchema.parse(row);
      segments.push({
        videoId: parsed.video_id,
        seq: parsed.seq,
        startSec: parsed.start_sec,
        endSec: parsed.end_sec,
        text: parsed.text,
      });
    }

    if (rows.length < SEGMENT_PAGE_SIZE) {
      break;
    }
  }

  return segments;
}

/**
 * Upserts the video and swaps its segment set inside the `commit_video_ingestion`
 * function, which runs as a single transaction. Safe to retry: the result depends only
 * on the arguments.
 */
export async function commitVideoIngestion(
  client: SupabaseClient,
  video: VideoRecord,
  segments: Segment[],
  retryOptions: RetryOptions = {},
): Promise<void> {
  const segmentRows = segments.map((segment) => ({
    seq: segment.seq,
    start_sec: segment.startSec,
    end_sec: segment.endSec,
    text: segment.text,
  }));

  await retryWithBackoff(async () => {
    const { error } = await client.rpc("commit_video_ingestion", {
      p_video: toVideoRow(video),
      p_segments: segmentRows,
    });

    if (error) {
      throw new Error(`commit_video_ingestion rpc failed: ${error.message}`);
    }
  }, retryOptions);
}
