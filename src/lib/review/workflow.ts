import type { ArchiveStore } from "@/lib/db/archive-store";
import {
  ConcurrentReviewChangeError,
  InvalidTransitionError,
  VideoNotFoundError,
} from "@/lib/pipeline/errors";
import { toVideoFacets, type Logger, type ReviewState, type VideoRecord } from "@/lib/pipeline/types";
import type { SearchIndex } from "@/lib/search/search-index";
import { KeyedLock } from "@/lib/utils/keyed-lock";

export type ReviewEvent = "approve" | "reject";

/**
 * Operator transitions. `failed` has no review exit: it only leaves through a forced
 * re-ingest.
 */
export const REVIEW_TRANSITIONS: Record<ReviewEvent, Partial<Record<ReviewState, ReviewState>>> = {
  approve: {
    pending: "approved",
    rejected: "approved",
  },
  reject: {
    pending: "rejected",
    approved: "rejected",
  },
};

export function nextReviewState(current: ReviewState, event: ReviewEvent): ReviewState | null {
  return REVIEW_TRANSITIONS[event][current] ?? null;
}

type ReviewWorkflowDeps = {
  store: ArchiveStore;
  index: SearchIndex;
  lock?: KeyedLock;
  logger?: Logger;
  persistIndex?: () => Promise<void>;
};

export type ReviewWorkflow = {
  approve(videoId: string): Promise<VideoRecord>;
  reject(videoId: string): Promise<VideoRecord>;
};

export function createReviewWorkflow(deps: ReviewWorkflowDeps): ReviewWorkflow {
  const lock = deps.lock ?? new KeyedLock();
  const logger = deps.logger ?? (() => undefined);
  const persistIndex = deps.persistIndex ?? (async () => undefined);

  async function loadTransition(videoId: string, event: ReviewEvent) {
    const video = await deps.store.getVideo(videoId);
    if (!video) {
      throw new VideoNotFoundError(videoId);
    }

    const to = nextReviewState(video.state, event);
    if (!to) {
      throw new InvalidTransitionError(videoId, video.state, event);
    }

    return { video, to };
  }

  return {
    approve(videoId) {
      return lock.runExclusive(videoId, async () => {
        const { video, to } = await loadTransition(videoId, "approve");
        const segments = await deps.store.getSegments(videoId);
        const previous = deps.index.getVideo(videoId);

        // Index first: once the state reads approved, the segments must already be searchable.
        deps.index.update(videoId, segments, toVideoFacets(video));

        let updated: VideoRecord | null;
        try {
          updated = await deps.store.transitionReviewState(videoId, video.state, to);
        } catch (error) {
          deps.index.restore(videoId, previous);
          throw error;
        }

        if (!updated) {
          deps.index.restore(videoId, previous);
          throw new ConcurrentReviewChangeError(videoId, video.state);
        }

        logger(`[approve] ${videoId} from=${video.state} segments=${segments.length}`);
        await persistIndex();
        return updated;
      });
    },

    reject(videoId) {
      return lock.runExclusive(videoId, async () => {
        const { video, to } = await loadTransition(videoId, "reject");
        const updated = await deps.store.transitionReviewState(videoId, video.state, to);

        if (!updated) {
          throw new ConcurrentReviewChangeError(videoId, video.state);
        }

        const removed = deps.index.remove(videoId);
        logger(`[reject] ${videoId} from=${video.state}${removed ? " removed-from-index" : ""}`);

        if (removed) {
          await persistIndex();
        }

        return updated;
      });
    },
  };
}
