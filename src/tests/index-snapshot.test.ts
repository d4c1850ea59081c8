import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { IndexSnapshotError } from "@/lib/pipeline/errors";
import { createSnapshotWriter, readIndexSnapshot, writeIndexSnapshot } from "@/lib/search/index-snapshot";
import { SearchIndex } from "@/lib/search/search-index";

async function tempSnapshotPath(): Promise<string> {
  const base = await mkdtemp(join(tmpdir(), "transcript-index-"));
  return join(base, "index", "snapshot.json");
}

describe("index snapshot", () => {
  it("survives a write and read into a fresh index", async () => {
    const snapshotPath = await tempSnapshotPath();
    const index = new SearchIndex();
    index.update(
      "video-a",
      [
        { seq: 0, startSec: 0, endSec: 2, text: "hello world" },
        { seq: 1, startSec: 2, endSec: 4, text: "goodbye world" },
      ],
      { channel: "Kitchen", publishDate: "2024-01-01", durationSec: 4 },
    );

    await writeIndexSnapshot(index, snapshotPath);

    const restored = new SearchIndex();
    expect(await readIndexSnapshot(restored, snapshotPath)).toBe(true);
    expect(restored.getVideo("video-a")).toEqual(index.getVideo("video-a"));
    expect(restored.query("world")).toHaveLength(2);
  });

  it("reports a missing snapshot without throwing", async () => {
    expect(await readIndexSnapshot(new SearchIndex(), await tempSnapshotPath())).toBe(false);
  });

  it("rejects corrupt snapshots and leaves the index untouched", async () => {
    const base = await mkdtemp(join(tmpdir(), "transcript-index-"));
    const snapshotPath = join(base, "snapshot.json");
    const index = new SearchIndex();
    index.update("video-a", [{ seq: 0, startSec: 0, endSec: 1, text: "kept" }]);

    await writeFile(snapshotPath, "{ not json", "utf8");
    await expect(readIndexSnapshot(index, snapshotPath)).rejects.toBeInstanceOf(IndexSnapshotError);

    await writeFile(snapshotPath, JSON.stringify({ version: 2, savedAt: "x", videos: [] }), "utf8");
    await expect(readIndexSnapshot(index, snapshotPath)).rejects.toThrow("has an unexpected shape");

    expect(index.has("video-a")).toBe(true);
  });

  it("serializes overlapping flushes", async () => {
    const snapshotPath = await tempSnapshotPath();
    const index = new SearchIndex();
    const flush = createSnapshotWriter(index, snapshotPath);

    index.update("video-a", [{ seq: 0, startSec: 0, endSec: 1, text: "first" }]);
    const first = flush();
    index.update("video-b", [{ seq: 0, startSec: 0, endSec: 1, text: "second" }]);
    await Promise.all([first, flush()]);

    const restored = new SearchIndex();
    await readIndexSnapshot(restored, snapshotPath);
    expect(restored.videoIds()).toEqual(["video-a", "video-b"]);
  });
});
