import http from "http";
import { Express } from "express";
import { RunRequest } from "../models/run.model";
import { RunPublisher } from "../services/broker.service";
import { ArtifactSigner, ManifestSource } from "../services/storage.service";

export class MemoryManifestSource implements ManifestSource {
  readonly manifests = new Map<string, string>();
  readonly unreadable = new Set<string>();
  private gate: Promise<void> | null = null;

  /** Hold `listManifests` until the returned function is called. */
  block(): () => void {
    let release = (): void => undefined;
    this.gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    return release;
  }

  async listManifests(prefix: string): Promise<string[]> {
    if (this.gate) {
      await this.gate;
    }
    return [...this.manifests.keys()]
      .filter((key) => key.startsWith(prefix) && key.endsWith(".tsv"))
      .sort();
  }

  async readManifest(key: string): Promise<string> {
    const text = this.manifests.get(key);
    if (text === undefined || this.unreadable.has(key)) {
      throw new Error(`NoSuchKey: ${key}`);
    }
    return text;
  }
}

export class RecordingPublisher implements RunPublisher {
  readonly requests: RunRequest[] = [];
  failures = 0;

  async enqueueRun(request: RunRequest): Promise<void> {
    if (this.failures > 0) {
      this.failures--;
      throw new Error("Redis connection lost");
    }
    this.requests.push(request);
  }
}

export const fakeSigner: ArtifactSigner = {
  presignGetUrl: async (key, expiresIn) =>
    `https://signed.example.org/${key}?expires=${expiresIn}`,
};

export const manifestText = (...rows: string[][]): string =>
  [["file_id", "md5", "size", "urls", "sample_id"], ...rows]
    .map((cells) => cells.join("\t"))
    .join("\n");

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
