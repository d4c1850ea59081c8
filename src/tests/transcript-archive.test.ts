import { describe, expect, it } from "vitest";
import { VideoNotFoundError } from "@/lib/pipeline/errors";
import { createArchiveHarness } from "./support/archive-harness";
import { transcriptPayload } from "./support/fake-supplier";

const LINES = [
  { start: 0, end: 3, text: "bread needs time" },
  { start: 3, end: 6, text: "and a hot oven" },
];

async function approvedArchive() {
  const harness = await createArchiveHarness();
  harness.supplier.respond("bake01", transcriptPayload(LINES, { title: "Bread basics" }));
  await harness.archive.ingest("bake01");
  await harness.archive.approve("bake01");
  return harness;
}

describe("transcript archive", () => {
  it("returns a stored video with its segments", async () => {
    const { archive } = await approvedArchive();

    const stored = await archive.getVideo("bake01");

    expect(stored?.video).toMatchObject({ videoId: "bake01", title: "Bread basics", state: "approved" });
    expect(stored?.segments.map((segment) => segment.text)).toEqual(["bread needs time", "and a hot oven"]);
    expect(await archive.getVideo("nope99")).toBeNull();
  });

  it("lists videos by review state", async () => {
    const { archive, supplier } = await approvedArchive();
    supplier.respond("bake02", transcriptPayload(LINES));
    await archive.ingest("bake02");

    expect((await archive.listVideos({ state: "pending" })).map((video) => video.videoId)).toEqual(["bake02"]);
    expect((await archive.listVideos()).map((video) => video.videoId)).toEqual(["bake01", "bake02"]);
  });

  it("removes a video from the stores and the index but keeps its ledger entry", async () => {
    const { archive, store, index, ledger, logs } = await approvedArchive();

    await archive.removeVideo("bake01");

    expect(store.videos.has("bake01")).toBe(false);
    expect(store.segments.has("bake01")).toBe(false);
    expect(index.has("bake01")).toBe(false);
    expect(ledger.has("bake01")).toBe(true);
    expect(logs).toContain("[remove] bake01 state=approved");
    await expect(archive.removeVideo("bake01")).rejects.toBeInstanceOf(VideoNotFoundError);
  });

  it("rebuilds the index from the approved corpus alone", async () => {
    const { archive, index, supplier } = await approvedArchive();
    supplier.respond("bake02", transcriptPayload(LINES));
    await archive.ingest("bake02");
    index.update("ghost1", [{ seq: 0, startSec: 0, endSec: 1, text: "bread ghost" }]);

    const count = await archive.rebuildIndex();

    expect(count).toBe(1);
    expect(index.videoIds()).toEqual(["bake01"]);
  });

  it("verifies and optionally repairs the index", async () => {
    const { archive, index, store } = await approvedArchive();
    index.remove("bake01");
    index.update("ghost1", [{ seq: 0, startSec: 0, endSec: 1, text: "bread ghost" }]);

    const report = await archive.verifyIndex();
    expect(report).toEqual({
      approvedCount: 1,
      indexedCount: 1,
      missingFromIndex: ["bake01"],
      notApproved: ["ghost1"],
      segmentCountMismatches: [],
    });

    await archive.verifyIndex({ repair: true });
    expect(index.videoIds()).toEqual(["bake01"]);

    store.segments.set("bake01", []);
    const deep = await archive.verifyIndex({ deep: true });
    expect(deep.segmentCountMismatches).toEqual([{ videoId: "bake01", stored: 0, indexed: 2 }]);
  });
});
