export const REVIEW_STATES = ["pending", "approved", "rejected", "failed"] as const;

export type ReviewState = (typeof REVIEW_STATES)[number];

export type Logger = (message: string) => void;

export type RawTranscriptLine = {
  start: number;
  end: number;
  text: string;
};

export type VideoMetadata = {
  title: string;
  channel: string;
  publishDate: string | null;
  durationSec: number;
};

export type Segment = {
  videoId: string;
  seq: number;
  startSec: number;
  endSec: number;
  text: string;
};

export type VideoRecord = {
  videoId: string;
  title: string | null;
  channel: string | null;
  publishDate: string | null;
  durationSec: number | null;
  state: ReviewState;
  failureReason: string | null;
  ingestedAt: string;
  updatedAt: string;
};

export type VideoFacets = Pick<VideoRecord, "channel" | "publishDate" | "durationSec">;

export function isReviewState(value: unknown): value is ReviewState {
  return typeof value === "string" && REVIEW_STATES.some((state) => state === value);
}

export function toVideoFacets(video: VideoRecord): VideoFacets {
  return {
    channel: video.channel,
    publishDate: video.publishDate,
    durationSec: video.durationSec,
  };
}
