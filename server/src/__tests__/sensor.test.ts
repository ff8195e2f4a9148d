import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RunStore } from "../services/db.service";
import { SensorService } from "../services/sensor.service";
import { MemoryManifestSource, RecordingPublisher, manifestText } from "./helpers";

const row = (fileId: string, dir = "lab/raw"): string[] => [
  fileId,
  "9a1b59b75ab5d7fffbd006b5e5087b2e",
  "1024",
  `https://data.example.org/${dir}/${fileId}`,
  "S1",
];

describe("SensorService", () => {
  let source: MemoryManifestSource;
  let store: RunStore;
  let publisher: RecordingPublisher;
  let sensor: SensorService;

  beforeEach(async () => {
    source = new MemoryManifestSource();
    store = new RunStore(":memory:");
    await store.init();
    publisher = new RecordingPublisher();
    sensor = new SensorService(source, store, publisher, {
      manifestPrefix: "manifests/",
      intervalMs: 60_000,
    });
  });

  afterEach(async () => {
    await sensor.stop();
    await store.close();
  });

  it("queues every row of a new manifest", async () => {
    source.manifests.set("manifests/batch-01.tsv", manifestText(row("a.bam"), row("b.tar", "x/y")));

    const result = await sensor.tick();

    expect(result).toEqual({ manifests: 1, queued: 2, skipped: 0, failedManifests: [] });
    expect(publisher.requests.map((request) => request.runKey)).toEqual([
      "nemo_manifest_a.bam",
      "nemo_manifest_b.tar",
    ]);
    expect(publisher.requests[1]?.entry.destinationPrefix).toBe("x/y");
    expect(publisher.requests[1]?.tags.manifest).toBe("manifests/batch-01.tsv");
    expect((await store.getRunByFileId("a.bam"))?.status).toBe("queued");
  });

  it("does not queue a file twice", async () => {
    source.manifests.set("manifests/batch-01.tsv", manifestText(row("a.bam")));
    await sensor.tick();
    source.manifests.set("manifests/batch-02.tsv", manifestText(row("a.bam"), row("c.bam")));

    const result = await sensor.tick();

    expect(result?.queued).toBe(1);
    expect(publisher.requests.map((request) => request.entry.fileId)).toEqual(["a.bam", "c.bam"]);
  });

  it("only reads tsv files under the prefix", async () => {
    source.manifests.set("manifests/notes.txt", manifestText(row("a.bam")));
    source.manifests.set("elsewhere/batch.tsv", manifestText(row("b.bam")));

    const result = await sensor.tick();

    expect(result?.manifests).toBe(0);
    expect(publisher.requests).toHaveLength(0);
  });

  it("carries on past a manifest that cannot be read", async () => {
    source.manifests.set("manifests/a.tsv", "");
    source.unreadable.add("manifests/a.tsv");
    source.manifests.set("manifests/b.tsv", manifestText(row("b.bam")));

    const result = await sensor.tick();

    expect(result?.failedManifests).toEqual(["manifests/a.tsv"]);
    expect(result?.queued).toBe(1);
  });

  it("counts a manifest without valid rows", async () => {
    source.manifests.set("manifests/empty.tsv", manifestText(["x.bam", "aa", "1", "nope", "S"]));

    const result = await sensor.tick();

    expect(result).toEqual({ manifests: 1, queued: 0, skipped: 1, failedManifests: [] });
  });

  it("retries a run on the next tick when it could not be queued", async () => {
    source.manifests.set("manifests/batch-01.tsv", manifestText(row("a.bam")));
    publisher.failures = 1;

    const first = await sensor.tick();

    expect(first?.failedManifests).toEqual(["manifests/batch-01.tsv"]);
    expect(await store.getRunByFileId("a.bam")).toBeNull();

    const second = await sensor.tick();

    expect(second?.queued).toBe(1);
    expect(publisher.requests.map((request) => request.entry.fileId)).toEqual(["a.bam"]);
  });

  it("skips a tick while the previous one is still running", async () => {
    source.manifests.set("manifests/batch-01.tsv", manifestText(row("a.bam")));
    const release = source.block();

    const first = sensor.tick();
    const second = await sensor.tick();
    release();

    expect(second).toBeNull();
    expect((await first)?.queued).toBe(1);
  });

  it("polls once started", async () => {
    source.manifests.set("manifests/batch-01.tsv", manifestText(row("a.bam")));

    sensor.start();

    await vi.waitFor(() => expect(publisher.requests).toHaveLength(1));
  });
});
