import type { ReviewState } from "@/lib/pipeline/types";

export const FETCH_ERROR_KINDS = ["NotFound", "Unavailable", "NoTranscript", "RateLimited", "Timeout"] as const;

export type FetchErrorKind = (typeof FETCH_ERROR_KINDS)[number];

/**
 * Raised by transcript suppliers. Every kind is retryable with a forced re-ingest.
 */
export class FetchError extends Error {
  readonly code = "FetchError";
  readonly retryable = true;

  constructor(
    readonly kind: FetchErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "FetchError";
  }
}

export class MalformedTranscriptError extends Error {
  readonly code = "MalformedTranscript";
  readonly retryable = false;

  constructor(
    message: string,
    readonly lineIndex: number | null = null,
  ) {
    super(message);
    this.name = "MalformedTranscriptError";
  }
}

export class MalformedMetadataError extends Error {
  readonly code = "MalformedMetadata";
  readonly retryable = false;

  constructor(message: string) {
    super(message);
    this.name = "MalformedMetadataError";
  }
}

export class InvalidVideoIdError extends Error {
  readonly code = "InvalidVideoId";
  readonly retryable = false;

  constructor(readonly videoId: string) {
    super(`Invalid video id: ${JSON.stringify(videoId)}`);
    this.name = "InvalidVideoIdError";
  }
}

export class IngestCancelledError extends Error {
  readonly code = "IngestCancelled";
  readonly retryable = true;

  constructor(videoId: string) {
    super(`Ingestion of ${videoId} was cancelled before any write`);
    this.name = "IngestCancelledError";
  }
}

/** The atomic store commit failed after retries; the video was recorded as failed instead. */
export class PersistenceError extends Error {
  readonly code = "Persistence";
  readonly retryable = true;

  constructor(videoId: string, cause: string) {
    super(`Could not store ingestion of ${videoId}: ${cause}`);
    this.name = "PersistenceError";
  }
}

export type IngestError =
  | FetchError
  | MalformedTranscriptError
  | MalformedMetadataError
  | InvalidVideoIdError
  | IngestCancelledError
  | PersistenceError;

export class QueryError extends Error {
  readonly code = "EmptyQuery";

  constructor(message = "Query has no searchable terms") {
    super(message);
    this.name = "QueryError";
  }
}

export class ReviewError extends Error {
  constructor(
    message: string,
    readonly videoId: string,
  ) {
    super(message);
    this.name = "ReviewError";
  }
}

export class VideoNotFoundError extends ReviewError {
  readonly code = "VideoNotFound";

  constructor(videoId: string) {
    super(`Video ${videoId} is not in the archive`, videoId);
    this.name = "VideoNotFoundError";
  }
}

export class InvalidTransitionError extends ReviewError {
  readonly code = "InvalidTransition";

  constructor(
    videoId: string,
    readonly from: ReviewState,
    readonly event: string,
  ) {
    super(`Cannot ${event} video ${videoId} while it is ${from}`, videoId);
    this.name = "InvalidTransitionError";
  }
}

export class ConcurrentReviewChangeError extends ReviewError {
  readonly code = "ConcurrentReviewChange";

  constructor(videoId: string, expected: ReviewState) {
    super(`Video ${videoId} left state ${expected} before the transition committed`, videoId);
    this.name = "ConcurrentReviewChangeError";
  }
}

export class IndexSnapshotError extends Error {
  readonly code = "IndexSnapshot";

  constructor(message: string) {
    super(message);
    this.name = "IndexSnapshotError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
