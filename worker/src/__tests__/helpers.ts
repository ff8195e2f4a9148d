import fs from "fs";
import os from "os";
import path from "path";
import http from "http";
import { Express } from "express";
import { EventSink, PipelineEvent } from "../models/events";
import { ManifestEntry } from "../models/manifest.model";
import { ObjectTransfer } from "../services/uploader.service";

export class RecordingSink implements EventSink {
  readonly events: PipelineEvent[] = [];

  report(event: PipelineEvent): void {
    this.events.push(event);
  }

  ofType<T extends PipelineEvent["type"]>(type: T): Extract<PipelineEvent, { type: T }>[] {
    return this.events.filter(
      (event): event is Extract<PipelineEvent, { type: T }> => event.type === type,
    );
  }
}

type FailureHook = (localPath: string) => unknown;

/**
 * In-memory object store. A queued failure for a key is thrown instead of
 * storing the object, once per queued entry.
 */
export class MemoryObjectStore implements ObjectTransfer {
  readonly objects = new Map<string, Buffer>();
  readonly calls: Array<{ bucket: string; key: string; size: number }> = [];
  private readonly failures = new Map<string, FailureHook[]>();

  failNext(key: string, ...hooks: FailureHook[]): void {
    this.failures.set(key, [...(this.failures.get(key) ?? []), ...hooks]);
  }

  async send(localPath: string, bucket: string, key: string, size: number): Promise<void> {
    this.calls.push({ bucket, key, size });
    const hook = this.failures.get(key)?.shift();
    if (hook) {
      throw hook(localPath);
    }
    this.objects.set(key, await fs.promises.readFile(localPath));
  }
}

export function backendError(code: string, message = `${code} from backend`): Error {
  const error = new Error(message);
  error.name = code;
  return error;
}

export interface TestServer {
  baseUrl: string;
  close: () => Promise<void>;
}

export async function serve(app: Express): Promise<TestServer> {
  const server = await new Promise<http.Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error(`Unexpected server address ${String(address)}`);
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}

export function makeEntry(overrides: Partial<ManifestEntry> = {}): ManifestEntry {
  return {
    fileId: "reads.fastq",
    sourceUrl: "http://127.0.0.1:1/reads.fastq",
    expectedChecksum: "00000000000000000000000000000000",
    expectedSize: -1,
    sampleId: "SAMPLE-1",
    destinationPrefix: "lab/raw",
    ...overrides,
  };
}
