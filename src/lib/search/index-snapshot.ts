import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { IndexSnapshotError } from "@/lib/pipeline/errors";
import { isMissingFileError } from "@/lib/pipeline/ingest/dedup-ledger";
import type { SearchIndex } from "@/lib/search/search-index";

export const INDEX_SNAPSHOT_VERSION = 1;

const IndexSnapshotSchema = z.object({
  version: z.literal(INDEX_SNAPSHOT_VERSION),
  savedAt: z.string(),
  videos: z.array(
    z.object({
      videoId: z.string().min(1),
      facets: z.object({
        channel: z.string().nullable(),
        publishDate: z.string().nullable(),
        durationSec: z.number().nullable(),
      }),
      segments: z.array(
        z.object({
          seq: z.number().int().nonnegative(),
          startSec: z.number(),
          endSec: z.number(),
          text: z.string(),
        }),
      ),
    }),
  ),
});

export type IndexSnapshot = z.infer<typeof IndexSnapshotSchema>;

/**
 * Snapshots hold raw segment text, not postings: tokens are recomputed on load so a
 * snapshot stays valid across tokenizer settings.
 */
export function toIndexSnapshot(index: SearchIndex): IndexSnapshot {
  const videos: IndexSnapshot["videos"] = [];

  for (const videoId of index.videoIds()) {
    const video = index.getVideo(videoId);
    if (video) {
      videos.push(video);
    }
  }

  return {
    version: INDEX_SNAPSHOT_VERSION,
    savedAt: new Date().toISOString(),
    videos,
  };
}

export async function writeIndexSnapshot(index: SearchIndex, path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });

  const tempPath = `${path}.tmp`;
  await writeFile(tempPath, JSON.stringify(toIndexSnapshot(index)), "utf8");
  await rename(tempPath, path);
}

/**
 * Loads a snapshot into `index`, replacing its contents. Returns false when no snapshot
 * exists; throws `IndexSnapshotError` when the file cannot be trusted.
 */
export async function readIndexSnapshot(index: SearchIndex, path: string): Promise<boolean> {
  let raw: string;

  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return false;
    }

    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new IndexSnapshotError(`Index snapshot ${path} is not valid JSON: ${String(error)}`);
  }

  const parsed = IndexSnapshotSchema.safeParse(json);
  if (!parsed.success) {
    throw new IndexSnapshotError(`Index snapshot ${path} has an unexpected shape`);
  }

  index.clear();
  for (const video of parsed.data.videos) {
    index.update(video.videoId, video.segments, video.facets);
  }

  return true;
}

/** Returns a flush function whose writes never overlap; the last call always wins. */
export function createSnapshotWriter(index: SearchIndex, path: string): () => Promise<void> {
  let writing: Promise<void> = Promise.resolve();
  const write = () => writeIndexSnapshot(index, path);

  return () => {
    writing = writing.then(write, write);
    return writing;
  };
}
