import type { SupabaseClient } from "@supabase/supabase-js";
import type { ArchiveStore } from "@/lib/db/archive-store";
import { commitVideoIngestion, getVideoSegments } from "@/lib/db/repositories/segments";
import { deleteVideo, getVideoById, listVideos, transitionReviewState } from "@/lib/db/repositories/videos";
import type { RetryOptions } from "@/lib/utils/retry";

export function createSupabaseArchiveStore(client: SupabaseClient, retryOptions: RetryOptions = {}): ArchiveStore {
  return {
    getVideo: (videoId) => getVideoById(client, videoId),
    listVideos: (filter) => listVideos(client, filter),
    transitionReviewState: (videoId, from, to) => transitionReviewState(client, videoId, from, to),
    deleteVideo: (videoId) => deleteVideo(client, videoId, retryOptions),
    getSegments: (videoId) => getVideoSegments(client, videoId),
    commitIngestion: (video, segments) => commitVideoIngestion(client, video, segments, retryOptions),
  };
}
