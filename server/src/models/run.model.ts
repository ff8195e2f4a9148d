/**
 * Wire format shared with the worker: run requests go out on the run queue,
 * run events come back on the events channel.
 */
export interface ManifestEntry {
  fileId: string;
  sourceUrl: string;
  expectedChecksum: string;
  /** -1 when the manifest gives no usable size. */
  expectedSize: number;
  sampleId: string;
  destinationPrefix: string;
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

export const RUN_STATUSES = ["queued", "succeeded", "failed"] as const;

export type RunStatus = (typeof RUN_STATUSES)[number];

export interface RunRecord {
  runKey: string;
  fileId: string;
  manifestKey: string;
  status: RunStatus;
  tags: Record<string, string>;
  publishedKeys: string[];
  error?: string;
  createdAt: string;
  updatedAt: string;
}

export interface Artifact {
  key: string;
  url: string;
  expiresIn: number;
}
