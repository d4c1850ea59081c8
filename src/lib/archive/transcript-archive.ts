import type { ArchiveStore, VideoListFilter } from "@/lib/db/archive-store";
import { VideoNotFoundError } from "@/lib/pipeline/errors";
import type { AutoApprovalPolicy } from "@/lib/pipeline/ingest/auto-approval";
import type { DedupLedger } from "@/lib/pipeline/ingest/dedup-ledger";
import {
  createIngestionPipeline,
  runIngestionBatch,
  type IngestOptions,
  type IngestResult,
  type IngestRunResult,
} from "@/lib/pipeline/ingest/run-ingestion";
import type { TranscriptSupplier } from "@/lib/pipeline/transcript/supplier";
import type { Logger, Segment, VideoRecord } from "@/lib/pipeline/types";
import { createReviewWorkflow } from "@/lib/review/workflow";
import { rebuildSearchIndex, repairSearchIndex, verifySearchIndex } from "@/lib/search/index-maintenance";
import { SearchIndex } from "@/lib/search/search-index";
import { createSearchService, type SearchOptions } from "@/lib/search/search-service";
import { KeyedLock } from "@/lib/utils/keyed-lock";
import type { IndexVerificationReport, SearchFilters, SearchMatch } from "@/types/search";

export type TranscriptArchiveDeps = {
  store: ArchiveStore;
  ledger: DedupLedger;
  supplier: TranscriptSupplier;
  index?: SearchIndex;
  autoApprove?: AutoApprovalPolicy;
  fetchTimeoutMs?: number;
  fetchRetries?: number;
  fetchRetryBaseMs?: number;
  /** Default pause between videos in `ingestMany`. */
  batchDelayMs?: number;
  logger?: Logger;
  persistIndex?: () => Promise<void>;
  verifyIntervalMs?: number;
  now?: () => Date;
};

export type IngestManyOptions = IngestOptions & {
  delayMs?: number;
};

export type VerifyIndexOptions = {
  deep?: boolean;
  repair?: boolean;
};

/** The complete operation surface a presentation layer or the CLI calls into. */
export type TranscriptArchive = {
  readonly index: SearchIndex;
  ingest(videoId: string, options?: IngestOptions): Promise<IngestResult>;
  ingestMany(videoIds: string[], options?: IngestManyOptions): Promise<IngestRunResult>;
  approve(videoId: string): Promise<VideoRecord>;
  reject(videoId: string): Promise<VideoRecord>;
  search(query: string, filters?: SearchFilters, options?: SearchOptions): Promise<SearchMatch[]>;
  getVideo(videoId: string): Promise<{ video: VideoRecord; segments: Segment[] } | null>;
  listVideos(filter?: VideoListFilter): Promise<VideoRecord[]>;
  removeVideo(videoId: string): Promise<void>;
  rebuildIndex(): Promise<number>;
  verifyIndex(options?: VerifyIndexOptions): Promise<IndexVerificationReport>;
};

export function createTranscriptArchive(deps: TranscriptArchiveDeps): TranscriptArchive {
  const index = deps.index ?? new SearchIndex();
  const lock = new KeyedLock();
  const logger = deps.logger ?? (() => undefined);
  const persistIndex = deps.persistIndex ?? (async () => undefined);

  const pipeline = createIngestionPipeline({
    store: deps.store,
    ledger: deps.ledger,
    index,
    supplier: deps.supplier,
    lock,
    autoApprove: deps.autoApprove,
    fetchTimeoutMs: deps.fetchTimeoutMs,
    fetchRetries: deps.fetchRetries,
    fetchRetryBaseMs: deps.fetchRetryBaseMs,
    logger,
    persistIndex,
    now: deps.now,
  });
  const workflow = createReviewWorkflow({ store: deps.store, index, lock, logger, persistIndex });
  const searchService = createSearchService({
    index,
    store: deps.store,
    lock,
    logger,
    persistIndex,
    verifyIntervalMs: deps.verifyIntervalMs,
    now: deps.now,
  });

  return {
    index,
    ingest: (videoId, options) => pipeline.ingest(videoId, options),
    ingestMany: (videoIds, options = {}) =>
      runIngestionBatch(pipeline, videoIds, {
        force: options.force,
        signal: options.signal,
        delayMs: options.delayMs ?? deps.batchDelayMs,
        logger,
      }),
    approve: (videoId) => workflow.approve(videoId),
    reject: (videoId) => workflow.reject(videoId),
    search: (query, filters, options) => searchService.search(query, filters, options),

    async getVideo(videoId) {
      const video = await deps.store.getVideo(videoId);
      if (!video) {
        return null;
      }

      return { video, segments: await deps.store.getSegments(videoId) };
    },

    listVideos: (filter) => deps.store.listVideos(filter),

    removeVideo(videoId) {
      return lock.runExclusive(videoId, async () => {
        const video = await deps.store.getVideo(videoId);
        if (!video) {
          throw new VideoNotFoundError(videoId);
        }

        await deps.store.deleteVideo(videoId);
        if (index.remove(videoId)) {
          await persistIndex();
        }

        logger(`[remove] ${videoId} state=${video.state}`);
      });
    },

    async rebuildIndex() {
      const count = await rebuildSearchIndex(index, deps.store, logger);
      await persistIndex();
      return count;
    },

    async verifyIndex(options = {}) {
      const report = await verifySearchIndex(index, deps.store, { deep: options.deep });

      if (options.repair) {
        const touched = await repairSearchIndex(index, deps.store, report, logger, lock);
        if (touched.length > 0) {
          await persistIndex();
        }
      }

      return report;
    },
  };
}
