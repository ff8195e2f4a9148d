import { Logger } from "winston";
import { EventSink, PipelineEvent } from "../models/events";
import { formatBytes } from "../utils/format";

export function describeEvent(event: PipelineEvent): { level: string; message: string } {
  switch (event.type) {
    case "transition":
      return {
        level: event.state === "failed" ? "error" : "info",
        message: `[${event.fileId}] ${event.state}${event.detail ? `: ${event.detail}` : ""}`,
      };
    case "download_started":
      return {
        level: "info",
        message: `[${event.fileId}] Downloading ${event.url} (size: ${formatBytes(event.expectedSize)})`,
      };
    case "download_progress":
      return {
        level: "info",
        message: `[${event.fileId}] Download progress: ${event.percentage}%`,
      };
    case "download_retry":
      return {
        level: "warn",
        message: `[${event.fileId}] Download attempt failed: ${event.reason}; retrying (attempt ${event.attempt} of ${event.maxAttempts})`,
      };
    case "download_complete":
      return {
        level: "info",
        message: `[${event.fileId}] Downloaded ${formatBytes(event.bytes)} in ${event.attempts} attempt(s)`,
      };
    case "checksum_verified":
      return {
        level: "info",
        message: `[${event.fileId}] MD5 checksum verified: ${event.checksum}`,
      };
    case "archive_extracted":
      return {
        level: "info",
        message: `Extracted ${event.members.length} files from ${event.archive}`,
      };
    case "member_decompressed":
      return {
        level: "info",
        message: `Decompressed ${event.from} to ${event.to}`,
      };
    case "upload_started":
      return {
        level: "info",
        message: `Uploading ${event.key} (${formatBytes(event.bytes)}${event.multipart ? ", multipart" : ""})`,
      };
    case "upload_retry":
      return {
        level: "warn",
        message: `Upload of ${event.key} failed: ${event.reason}; retrying (attempt ${event.attempt} of ${event.maxAttempts})`,
      };
    case "unit_published":
      return { level: "info", message: `[${event.fileId}] Published ${event.key}` };
    case "unit_deleted":
      return { level: "debug", message: `[${event.fileId}] Deleted ${event.path}` };
    case "workspace_removed":
      return {
        level: "info",
        message: `[${event.fileId}] Cleaned up temporary directory: ${event.path}`,
      };
    case "run_succeeded":
      return {
        level: "info",
        message: `[${event.fileId}] Transfer complete, ${event.publishedKeys.length} object(s) published`,
      };
    case "run_failed":
      return {
        level: "error",
        message: `[${event.fileId}] Transfer failed: ${event.error}`,
      };
  }
}

export function createLoggerSink(logger: Logger): EventSink {
  return {
    report(event) {
      const { level, message } = describeEvent(event);
      logger.log(level, message, { event: event.type });
    },
  };
}
