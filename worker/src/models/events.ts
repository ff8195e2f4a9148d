export type PipelineState =
  | "start"
  | "downloading"
  | "verifying"
  | "expanding"
  | "uploading"
  | "cleanup"
  | "done"
  | "failed";

export type PipelineEvent =
  | { type: "transition"; fileId: string; state: PipelineState; detail?: string }
  | { type: "download_started"; fileId: string; url: string; expectedSize: number }
  | { type: "download_progress"; fileId: string; percentage: number; bytes: number }
  | {
      type: "download_retry";
      fileId: string;
      attempt: number;
      maxAttempts: number;
      reason: string;
    }
  | { type: "download_complete"; fileId: string; bytes: number; attempts: number }
  | { type: "checksum_verified"; fileId: string; checksum: string }
  | { type: "archive_extracted"; archive: string; members: string[] }
  | { type: "member_decompressed"; archive: string; from: string; to: string }
  | { type: "upload_started"; key: string; bytes: number; multipart: boolean }
  | {
      type: "upload_retry";
      key: string;
      attempt: number;
      maxAttempts: number;
      reason: string;
    }
  | { type: "unit_published"; fileId: string; key: string }
  | { type: "unit_deleted"; fileId: string; path: string }
  | { type: "workspace_removed"; fileId: string; path: string }
  | { type: "run_succeeded"; fileId: string; publishedKeys: string[] }
  | {
      type: "run_failed";
      fileId: string;
      error: string;
      publishedKeys: string[];
    };

/**
 * Structured event channel injected into every pipeline component.
 */
export interface EventSink {
  report(event: PipelineEvent): void;
}
