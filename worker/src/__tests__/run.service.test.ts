import { describe, expect, it } from "vitest";
import { RunService, EntryExecutor } from "../services/run.service";
import { EventPublisher, RunQueue } from "../services/broker.service";
import { ChecksumMismatchError } from "../models/errors";
import { ManifestEntry, RunEvent, RunRequest } from "../models/manifest.model";
import { makeEntry } from "./helpers";

class FakeQueue implements RunQueue {
  failures = 0;
  polls = 0;

  constructor(
    private readonly pending: RunRequest[],
    private readonly onEmpty: () => void,
  ) {}

  async nextRunRequest(): Promise<RunRequest | null> {
    this.polls++;
    if (this.failures > 0) {
      this.failures--;
      throw new Error("Socket closed unexpectedly");
    }
    const next = this.pending.shift();
    if (next === undefined) {
      this.onEmpty();
      return null;
    }
    return next;
  }
}

class FakePublisher implements EventPublisher {
  readonly published: RunEvent[] = [];
  failing = false;

  async publishEvent(event: RunEvent): Promise<void> {
    if (this.failing) {
      throw new Error("connection lost");
    }
    this.published.push(event);
  }
}

const executor = (
  outcome: (entry: ManifestEntry) => string[],
): EntryExecutor & { seen: string[] } => {
  const seen: string[] = [];
  return {
    seen,
    execute: async (entry) => {
      seen.push(entry.fileId);
      return { entry, publishedKeys: outcome(entry) };
    },
  };
};

const runRequest = (fileId: string): RunRequest => ({
  runKey: `nemo_manifest_${fileId}`,
  entry: makeEntry({ fileId }),
  tags: {},
  requestedAt: "2026-10-19T08:00:00.000Z",
});

describe("RunService", () => {
  it("publishes run_succeeded with the published keys", async () => {
    const publisher = new FakePublisher();
    const service = new RunService(
      new FakeQueue([], () => undefined),
      publisher,
      executor((entry) => [`lab/raw/${entry.fileId}`]),
    );

    const event = await service.handle(runRequest("reads.fastq"));

    expect(event).toMatchObject({
      event: "run_succeeded",
      runKey: "nemo_manifest_reads.fastq",
      fileId: "reads.fastq",
      publishedKeys: ["lab/raw/reads.fastq"],
    });
    expect(publisher.published).toEqual([event]);
  });

  it("publishes run_failed with the error class and message", async () => {
    const publisher = new FakePublisher();
    const service = new RunService(new FakeQueue([], () => undefined), publisher, {
      execute: async () => {
        throw new ChecksumMismatchError("reads.fastq", "aaa", "bbb");
      },
    });

    const event = await service.handle(runRequest("reads.fastq"));

    expect(event).toMatchObject({
      event: "run_failed",
      errorName: "ChecksumMismatchError",
      reason: "MD5 checksum mismatch for reads.fastq. Expected: aaa, Got: bbb",
    });
    expect(publisher.published).toHaveLength(1);
  });

  it("still resolves when the outcome cannot be published", async () => {
    const publisher = new FakePublisher();
    publisher.failing = true;
    const service = new RunService(
      new FakeQueue([], () => undefined),
      publisher,
      executor(() => []),
    );

    await expect(service.handle(runRequest("reads.fastq"))).resolves.toMatchObject({
      event: "run_succeeded",
    });
  });

  it("runs queued requests in order until stopped", async () => {
    const publisher = new FakePublisher();
    const pipeline = executor(() => []);
    let stopped: Promise<void> | undefined;
    const queue = new FakeQueue([runRequest("one.bam"), runRequest("two.bam")], () => {
      stopped = service.stop();
    });
    const service = new RunService(queue, publisher, pipeline, 1);

    await service.runLoop();
    await stopped;

    expect(pipeline.seen).toEqual(["one.bam", "two.bam"]);
    expect(publisher.published.map((event) => event.runKey)).toEqual([
      "nemo_manifest_one.bam",
      "nemo_manifest_two.bam",
    ]);
  });

  it("keeps polling after the queue connection fails", async () => {
    const publisher = new FakePublisher();
    const pipeline = executor(() => ["x/one.bam"]);
    let stopped: Promise<void> | undefined;
    const queue = new FakeQueue([runRequest("one.bam")], () => {
      stopped = service.stop();
    });
    queue.failures = 2;
    const service = new RunService(queue, publisher, pipeline, 1, 0);

    await service.runLoop();
    await stopped;

    expect(queue.polls).toBe(4);
    expect(pipeline.seen).toEqual(["one.bam"]);
    expect(publisher.published.map((event) => event.event)).toEqual(["run_succeeded"]);
  });
});
