/**
 * One row of an ingest manifest: the unit of work handed to the pipeline.
 * Produced by the server's sensor and passed through unchanged.
 */
export interface ManifestEntry {
  readonly fileId: string;
  readonly sourceUrl: string;
  /** Lowercase MD5 hex digest the downloaded bytes must match. */
  readonly expectedChecksum: string;
  /** Advisory byte count, -1 when unknown. Only used for progress. */
  readonly expectedSize: number;
  readonly sampleId: string;
  readonly destinationPrefix: string;
}

export interface RunRequest {
  runKey: string;
  entry: ManifestEntry;
  tags: Record<string, string>;
  requestedAt: string;
}

export interface RunSucceededEvent {
  event: "run_succeeded";
  runKey: string;
  fileId: string;
  publishedKeys: string[];
  timestamp: string;
}

export interface RunFailedEvent {
  event: "run_failed";
  runKey: string;
  fileId: string;
  errorName: string;
  reason: string;
  timestamp: string;
}

export type RunEvent = RunSucceededEvent | RunFailedEvent;
