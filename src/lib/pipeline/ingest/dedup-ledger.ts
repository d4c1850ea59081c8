import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";

export const DEDUP_LEDGER_VERSION = 1;

const LedgerFileSchema = z.object({
  version: z.literal(DEDUP_LEDGER_VERSION),
  videoIds: z.array(z.string()),
  updatedAt: z.string(),
});

export type DedupLedgerFile = z.infer<typeof LedgerFileSchema>;

/**
 * Set of video ids that reached a terminal ingestion outcome at least once.
 * Loaded once at startup; every `add` is flushed to disk before it resolves.
 */
export type DedupLedger = {
  has(videoId: string): boolean;
  add(videoId: string): Promise<void>;
  entries(): string[];
  readonly size: number;
};

export async function loadDedupLedger(path: string): Promise<DedupLedger> {
  const file = await readLedgerFile(path);
  const seen = new Set(file.videoIds);
  let flushing: Promise<void> = Promise.resolve();

  const flush = () => writeLedgerFile(path, Array.from(seen));

  return {
    has: (videoId) => seen.has(videoId),
    async add(videoId) {
      if (seen.has(videoId)) {
        return;
      }

      seen.add(videoId);
      // Writes are chained so a slow earlier flush never overwrites a newer one.
      flushing = flushing.then(flush, flush);
      await flushing;
    },
    entries: () => Array.from(seen),
    get size() {
      return seen.size;
    },
  };
}

export async function readLedgerFile(path: string): Promise<DedupLedgerFile> {
  let raw: string;

  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return createEmptyLedgerFile();
    }

    throw error;
  }

  const parsed = LedgerFileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Dedup ledger at ${path} is not a valid ledger file`);
  }

  return {
    ...parsed.data,
    videoIds: Array.from(new Set(parsed.data.videoIds.map((value) => value.trim()).filter(Boolean))),
  };
}

export async function writeLedgerFile(path: string, videoIds: string[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true });

  const payload: DedupLedgerFile = {
    version: DEDUP_LEDGER_VERSION,
    videoIds: [...videoIds].sort(),
    updatedAt: new Date().toISOString(),
  };

  const tempPath = `${path}.tmp`;
  await writeFile(tempPath, JSON.stringify(payload, null, 2), "utf8");
  await rename(tempPath, path);
}

export function createEmptyLedgerFile(): DedupLedgerFile {
  return {
    version: DEDUP_LEDGER_VERSION,
    videoIds: [],
    updatedAt: new Date(0).toISOString(),
  };
}

export function isMissingFileError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
