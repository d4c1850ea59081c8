import type { ArchiveStore } from "@/lib/db/archive-store";
import {
  FetchError,
  type FetchErrorKind,
  IngestCancelledError,
  InvalidVideoIdError,
  MalformedMetadataError,
  MalformedTranscriptError,
  PersistenceError,
  describeError,
  type IngestError,
} from "@/lib/pipeline/errors";
import { requireManualApproval, type AutoApprovalPolicy } from "@/lib/pipeline/ingest/auto-approval";
import type { DedupLedger } from "@/lib/pipeline/ingest/dedup-ledger";
import { segmentTranscript } from "@/lib/pipeline/segmenter";
import { parseTranscriptLines, parseVideoMetadata, type TranscriptSupplier } from "@/lib/pipeline/transcript/supplier";
import {
  toVideoFacets,
  type Logger,
  type ReviewState,
  type Segment,
  type VideoMetadata,
  type VideoRecord,
} from "@/lib/pipeline/types";
import { isValidVideoId } from "@/lib/pipeline/video-id";
import type { SearchIndex } from "@/lib/search/search-index";
import { KeyedLock } from "@/lib/utils/keyed-lock";
import { retryWithBackoff, sleep } from "@/lib/utils/retry";
import { withTimeout } from "@/lib/utils/timeout";

const DEFAULT_FETCH_TIMEOUT_MS = 30_000;
const DEFAULT_FETCH_RETRY_BASE_MS = 1_000;
const MAX_FETCH_RETRY_DELAY_MS = 20_000;
const TRANSIENT_FETCH_KINDS: ReadonlySet<FetchErrorKind> = new Set(["RateLimited", "Unavailable", "Timeout"]);

export type IngestOptions = {
  force?: boolean;
  signal?: AbortSignal;
};

export type IngestResult =
  | { ok: true; videoId: string; state: ReviewState; duplicate: boolean }
  | { ok: false; videoId: string; state: ReviewState | null; error: IngestError };

type IngestionPipelineDeps = {
  store: ArchiveStore;
  ledger: DedupLedger;
  index: SearchIndex;
  supplier: TranscriptSupplier;
  lock?: KeyedLock;
  autoApprove?: AutoApprovalPolicy;
  fetchTimeoutMs?: number;
  /** Extra attempts for rate-limited, unavailable or timed-out fetches. */
  fetchRetries?: number;
  fetchRetryBaseMs?: number;
  logger?: Logger;
  persistIndex?: () => Promise<void>;
  now?: () => Date;
};

export type IngestionPipeline = {
  ingest(videoId: string, options?: IngestOptions): Promise<IngestResult>;
};

export function createIngestionPipeline(deps: IngestionPipelineDeps): IngestionPipeline {
  const lock = deps.lock ?? new KeyedLock();
  const autoApprove = deps.autoApprove ?? requireManualApproval;
  const fetchTimeoutMs = deps.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
  const fetchRetries = deps.fetchRetries ?? 0;
  const fetchRetryBaseMs = deps.fetchRetryBaseMs ?? DEFAULT_FETCH_RETRY_BASE_MS;
  const logger = deps.logger ?? (() => undefined);
  const persistIndex = deps.persistIndex ?? (async () => undefined);
  const now = deps.now ?? (() => new Date());

  function fetchPayload(videoId: string, signal: AbortSignal | undefined): Promise<unknown> {
    return retryWithBackoff(
      () =>
        withTimeout(
          (fetchSignal) => deps.supplier.fetch(videoId, fetchSignal),
          fetchTimeoutMs,
          () => new FetchError("Timeout", `Fetching ${videoId} timed out after ${fetchTimeoutMs}ms`),
          signal,
        ),
      {
        maxRetries: fetchRetries,
        baseDelayMs: fetchRetryBaseMs,
        maxDelayMs: MAX_FETCH_RETRY_DELAY_MS,
        shouldRetry: isTransientFetchError,
        onRetry: (attempt, error, delayMs) =>
          logger(`[retry] ${videoId} attempt=${attempt} delay=${delayMs}ms ${describeError(error)}`),
        signal,
      },
    );
  }

  /** Failures after the commit are logged; the committed outcome stands. */
  async function settleAfterCommit(videoId: string, indexChanged: boolean): Promise<void> {
    if (indexChanged) {
      try {
        await persistIndex();
      } catch (error) {
        logger(`[index-persist-failed] ${videoId} ${describeError(error)}`);
      }
    }

    try {
      await deps.ledger.add(videoId);
    } catch (error) {
      logger(`[ledger-failed] ${videoId} ${describeError(error)}`);
    }
  }

  async function recordFailure(
    videoId: string,
    existing: VideoRecord | null,
    metadata: VideoMetadata | null,
    error: IngestError,
  ): Promise<IngestResult> {
    const timestamp = now().toISOString();
    const record: VideoRecord = {
      videoId,
      title: metadata ? metadata.title : existing?.title ?? null,
      channel: metadata ? metadata.channel : existing?.channel ?? null,
      publishDate: metadata ? metadata.publishDate : existing?.publishDate ?? null,
      durationSec: metadata ? metadata.durationSec : existing?.durationSec ?? null,
      state: "failed",
      failureReason: `${error.code}: ${error.message}`,
      ingestedAt: existing?.ingestedAt ?? timestamp,
      updatedAt: timestamp,
    };

    await deps.store.commitIngestion(record, []);
    await settleAfterCommit(videoId, deps.index.remove(videoId));
    logger(`[failed] ${videoId} ${record.failureReason}`);

    return { ok: false, videoId, state: "failed", error };
  }

  async function ingestLocked(videoId: string, options: IngestOptions): Promise<IngestResult> {
    const existing = await deps.store.getVideo(videoId);

    if (!options.force && existing && deps.ledger.has(videoId)) {
      logger(`[skip] ${videoId} already ingested state=${existing.state}`);
      return { ok: true, videoId, state: existing.state, duplicate: true };
    }

    const cancelled = (): IngestResult => {
      logger(`[cancelled] ${videoId}`);
      return { ok: false, videoId, state: existing?.state ?? null, error: new IngestCancelledError(videoId) };
    };

    if (options.signal?.aborted) {
      return cancelled();
    }

    logger(`[start] ${videoId}${options.force ? " force" : ""}`);

    let validatedMetadata: VideoMetadata | null = null;
    let fetched: { metadata: VideoMetadata; segments: Segment[] };

    try {
      const raw = await fetchPayload(videoId, options.signal);
      validatedMetadata = parseVideoMetadata(raw);
      fetched = {
        metadata: validatedMetadata,
        segments: segmentTranscript(videoId, parseTranscriptLines(raw)),
      };
    } catch (error) {
      if (options.signal?.aborted) {
        return cancelled();
      }

      return recordFailure(videoId, existing, validatedMetadata, toIngestError(error));
    }

    // Last point where abandoning leaves nothing behind.
    if (options.signal?.aborted) {
      return cancelled();
    }

    const { metadata, segments } = fetched;
    const state: ReviewState = autoApprove({ videoId, metadata, segments }) ? "approved" : "pending";
    const timestamp = now().toISOString();
    const record: VideoRecord = {
      videoId,
      ...metadata,
      state,
      failureReason: null,
      ingestedAt: existing?.ingestedAt ?? timestamp,
      updatedAt: timestamp,
    };

    const previousIndexEntry = deps.index.getVideo(videoId);
    if (state === "approved") {
      deps.index.update(videoId, segments, toVideoFacets(record));
    }

    try {
      await deps.store.commitIngestion(record, segments);
    } catch (error) {
      deps.index.restore(videoId, previousIndexEntry);
      return recordFailure(videoId, existing, metadata, new PersistenceError(videoId, describeError(error)));
    }

    const removed = state !== "approved" && deps.index.remove(videoId);
    await settleAfterCommit(videoId, state === "approved" || removed);
    logger(`[done] ${videoId} state=${state} segments=${segments.length}`);

    return { ok: true, videoId, state, duplicate: false };
  }

  return {
    async ingest(videoId, options = {}) {
      if (!isValidVideoId(videoId)) {
        return { ok: false, videoId, state: null, error: new InvalidVideoIdError(videoId) };
      }

      return lock.runExclusive(videoId, () => ingestLocked(videoId, options));
    },
  };
}

export function toIngestError(error: unknown): IngestError {
  if (
    error instanceof FetchError ||
    error instanceof MalformedTranscriptError ||
    error instanceof MalformedMetadataError
  ) {
    return error;
  }

  return new FetchError("Unavailable", describeError(error));
}

export function isTransientFetchError(error: unknown): boolean {
  return error instanceof FetchError && TRANSIENT_FETCH_KINDS.has(error.kind);
}

export type IngestRunOptions = {
  force?: boolean;
  signal?: AbortSignal;
  /** Pause after each video that reached the supplier, before the next one. */
  delayMs?: number;
  logger?: Logger;
};

export type IngestRunResult = {
  processedVideoIds: string[];
  skippedVideoIds: string[];
  failed: Array<{ videoId: string; reason: string }>;
};

/** Drains `videoIds` one at a time, paced by `delayMs`; stops early once `signal` aborts. */
export async function runIngestionBatch(
  pipeline: IngestionPipeline,
  videoIds: string[],
  options: IngestRunOptions = {},
): Promise<IngestRunResult> {
  const logger = options.logger ?? (() => undefined);
  const processedVideoIds: string[] = [];
  const skippedVideoIds: string[] = [];
  const failed: Array<{ videoId: string; reason: string }> = [];
  const delayMs = options.delayMs ?? 0;
  let paceBeforeNext = false;

  for (const videoId of videoIds) {
    if (paceBeforeNext && delayMs > 0) {
      await sleep(delayMs, options.signal);
    }

    if (options.signal?.aborted) {
      logger(`[stop] batch cancelled before ${videoId}`);
      break;
    }

    const result = await pipeline.ingest(videoId, { force: options.force, signal: options.signal });
    paceBeforeNext = reachedSupplier(result);

    if (!result.ok) {
      failed.push({ videoId, reason: result.error.message });
    } else if (result.duplicate) {
      skippedVideoIds.push(videoId);
    } else {
      processedVideoIds.push(videoId);
    }
  }

  logger(
    `[batch] processed=${processedVideoIds.length} skipped=${skippedVideoIds.length} failed=${failed.length}`,
  );

  return {
    processedVideoIds,
    skippedVideoIds,
    failed,
  };
}

function reachedSupplier(result: IngestResult): boolean {
  if (result.ok) {
    return !result.duplicate;
  }

  return !(result.error instanceof InvalidVideoIdError || result.error instanceof IngestCancelledError);
}
