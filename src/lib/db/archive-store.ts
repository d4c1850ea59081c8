import type { ReviewState, Segment, VideoRecord } from "@/lib/pipeline/types";

export type VideoListFilter = {
  state?: ReviewState;
};

/** Per-video attributes plus the single authoritative review state. */
export interface MetadataStore {
  getVideo(videoId: string): Promise<VideoRecord | null>;
  listVideos(filter?: VideoListFilter): Promise<VideoRecord[]>;
  /**
   * Compare-and-set on the review state. Resolves `null` when the video is missing or
   * no longer in `from`.
   */
  transitionReviewState(videoId: string, from: ReviewState, to: ReviewState): Promise<VideoRecord | null>;
  deleteVideo(videoId: string): Promise<void>;
}

export interface SegmentStore {
  getSegments(videoId: string): Promise<Segment[]>;
}

export interface ArchiveStore extends MetadataStore, SegmentStore {
  /**
   * Upserts the video row and replaces its whole segment set in one atomic step.
   * Readers observe either the previous video and segments or the new ones.
   */
  commitIngestion(video: VideoRecord, segments: Segment[]): Promise<void>;
}
