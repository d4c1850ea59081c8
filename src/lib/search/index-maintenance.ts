import type { ArchiveStore } from "@/lib/db/archive-store";
import { toVideoFacets, type Logger } from "@/lib/pipeline/types";
import type { SearchIndex } from "@/lib/search/search-index";
import { KeyedLock } from "@/lib/utils/keyed-lock";
import type { IndexVerificationReport } from "@/types/search";

export type ReindexOutcome = "indexed" | "removed" | "absent";

/**
 * Recomputes the entries of one video from the stores: indexed when approved, removed
 * otherwise.
 */
export async function reindexVideo(index: SearchIndex, store: ArchiveStore, videoId: string): Promise<ReindexOutcome> {
  const video = await store.getVideo(videoId);

  if (!video || video.state !== "approved") {
    return index.remove(videoId) ? "removed" : "absent";
  }

  const segments = await store.getSegments(videoId);
  index.update(videoId, segments, toVideoFacets(video));
  return "indexed";
}

/** Drops everything and indexes the approved corpus from scratch. */
export async function rebuildSearchIndex(
  index: SearchIndex,
  store: ArchiveStore,
  logger: Logger = () => undefined,
): Promise<number> {
  const approved = await store.listVideos({ state: "approved" });
  const staged: Array<{ videoId: string; segments: Awaited<ReturnType<ArchiveStore["getSegments"]>> }> = [];

  // Load everything before touching the live index so a store failure leaves it intact.
  for (const video of approved) {
    staged.push({ videoId: video.videoId, segments: await store.getSegments(video.videoId) });
  }

  index.clear();
  for (const [position, video] of approved.entries()) {
    index.update(video.videoId, staged[position].segments, toVideoFacets(video));
  }

  const stats = index.stats();
  logger(`[reindex] rebuilt videos=${stats.videoCount} segments=${stats.segmentCount} terms=${stats.termCount}`);
  return stats.videoCount;
}

/**
 * Compares the index with the approved set. With `deep`, also compares per-video
 * segment counts, which costs one segment read per approved video.
 */
export async function verifySearchIndex(
  index: SearchIndex,
  store: ArchiveStore,
  options: { deep?: boolean } = {},
): Promise<IndexVerificationReport> {
  const approved = await store.listVideos({ state: "approved" });
  const approvedIds = new Set(approved.map((video) => video.videoId));
  const indexedIds = index.videoIds();

  const missingFromIndex = Array.from(approvedIds)
    .filter((videoId) => !index.has(videoId))
    .sort();
  const notApproved = indexedIds.filter((videoId) => !approvedIds.has(videoId));
  const segmentCountMismatches: IndexVerificationReport["segmentCountMismatches"] = [];

  if (options.deep) {
    for (const videoId of Array.from(approvedIds).sort()) {
      const indexed = index.getVideo(videoId);
      if (!indexed) {
        continue;
      }

      const stored = await store.getSegments(videoId);
      if (stored.length !== indexed.segments.length) {
        segmentCountMismatches.push({ videoId, stored: stored.length, indexed: indexed.segments.length });
      }
    }
  }

  return {
    approvedCount: approvedIds.size,
    indexedCount: indexedIds.length,
    missingFromIndex,
    notApproved,
    segmentCountMismatches,
  };
}

/**
 * Repairs every inconsistency in `report` with a targeted reindex and logs each one.
 * Each reindex re-reads the store under the video's lock, so a transition that was in
 * flight when the report was taken is not undone. Returns the ids that were touched.
 */
export async function repairSearchIndex(
  index: SearchIndex,
  store: ArchiveStore,
  report: IndexVerificationReport,
  logger: Logger = () => undefined,
  lock: KeyedLock = new KeyedLock(),
): Promise<string[]> {
  const touched = new Set<string>();

  for (const videoId of report.missingFromIndex) {
    logger(`[index-inconsistency] ${videoId} is approved but missing from the index`);
    touched.add(videoId);
  }

  for (const videoId of report.notApproved) {
    logger(`[index-inconsistency] ${videoId} is indexed but not approved`);
    touched.add(videoId);
  }

  for (const mismatch of report.segmentCountMismatches) {
    logger(
      `[index-inconsistency] ${mismatch.videoId} has ${mismatch.stored} stored segments but ${mismatch.indexed} indexed`,
    );
    touched.add(mismatch.videoId);
  }

  for (const videoId of touched) {
    const outcome = await lock.runExclusive(videoId, () => reindexVideo(index, store, videoId));
    logger(`[reindex] ${videoId} ${outcome}`);
  }

  return Array.from(touched);
}
