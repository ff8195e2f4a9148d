import fs from "fs";
import { FileHandle } from "fs/promises";
import axios, { AxiosInstance, AxiosResponse } from "axios";
import { Readable } from "stream";
import { ManifestEntry } from "../models/manifest.model";
import { EventSink } from "../models/events";
import {
  DownloadError,
  DownloadExhaustedError,
  TransferError,
  describeError,
} from "../models/errors";
import { ChecksumVerifier, assertChecksum } from "./checksum.service";
import { AttemptResult, runWithRetry } from "./retry";

export const DEFAULT_CHUNK_SIZE = 1024 * 1024;

export interface DownloaderOptions {
  maxAttempts: number;
  /** Budget for the response headers to arrive. */
  connectTimeoutMs: number;
  /** Longest silence tolerated between two body chunks. */
  readTimeoutMs: number;
  retryDelayMs?: number;
  chunkSize?: number;
}

export interface DownloadResult {
  path: string;
  bytes: number;
  checksum: string;
  attempts: number;
}

export class ConnectTimeoutError extends TransferError {
  readonly code = "ETIMEDOUT";

  constructor(timeoutMs: number) {
    super(`No response within ${timeoutMs}ms`);
  }
}

export class ReadTimeoutError extends TransferError {
  readonly code = "ETIMEDOUT";

  constructor(timeoutMs: number) {
    super(`No data received for ${timeoutMs}ms`);
  }
}

const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "ERR_STREAM_PREMATURE_CLOSE",
  "UND_ERR_SOCKET",
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
}

/**
 * Connection resets, timeouts and truncated bodies are worth another try.
 * Anything the server answered with an error status is not.
 */
export function isTransientDownloadError(error: unknown): boolean {
  if (axios.isAxiosError(error) && error.response) {
    return false;
  }
  const code = errorCode(error);
  if (code !== undefined) {
    return TRANSIENT_CODES.has(code);
  }
  return error instanceof Error && error.message === "aborted";
}

/**
 * Returns the 10% boundary reached by `downloaded`, or null when no new
 * boundary was crossed since `lastReported` or the total is unknown.
 */
export function progressMilestone(
  downloaded: number,
  total: number,
  lastReported: number,
): number | null {
  if (!(total > 0)) return null;

  const percentage = Math.min(100, Math.floor((downloaded / total) * 100));
  const milestone = Math.floor(percentage / 10) * 10;
  return milestone > lastReported ? milestone : null;
}

function contentLength(response: AxiosResponse<Readable>): number {
  const raw = response.headers["content-length"];
  const value =
    typeof raw === "string" || typeof raw === "number" ? Number(raw) : NaN;
  return Number.isFinite(value) && value > 0 ? value : 0;
}

interface StreamedPayload {
  bytes: number;
  checksum: string;
}

export class StreamingDownloader {
  private readonly chunkSize: number;

  constructor(
    private readonly options: DownloaderOptions,
    private readonly sink: EventSink,
    private readonly http: AxiosInstance = axios.create(),
  ) {
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  }

  /**
   * Stream the payload to disk, computing its digest on the way, then check
   * it against the manifest. Transient failures discard the partial file and
   * start over. A wrong digest throws ChecksumMismatchError and is not
   * retried; the file is left in place.
   */
  async download(
    entry: ManifestEntry,
    destinationPath: string,
  ): Promise<DownloadResult> {
    const { maxAttempts } = this.options;
    let attempts = 0;

    this.sink.report({
      type: "download_started",
      fileId: entry.fileId,
      url: entry.sourceUrl,
      expectedSize: entry.expectedSize,
    });

    const payload = await runWithRetry<StreamedPayload>(
      async (attempt) => {
        attempts = attempt;
        return this.attempt(entry, destinationPath);
      },
      {
        maxAttempts,
        delayMs: this.options.retryDelayMs,
        onRetry: (nextAttempt, cause) =>
          this.sink.report({
            type: "download_retry",
            fileId: entry.fileId,
            attempt: nextAttempt,
            maxAttempts,
            reason: describeError(cause),
          }),
        onExhausted: (count, cause) =>
          new DownloadExhaustedError(entry.fileId, count, cause),
      },
    );

    this.sink.report({
      type: "download_complete",
      fileId: entry.fileId,
      bytes: payload.bytes,
      attempts,
    });

    assertChecksum(entry.fileId, entry.expectedChecksum, payload.checksum);
    this.sink.report({
      type: "checksum_verified",
      fileId: entry.fileId,
      checksum: payload.checksum,
    });

    return { path: destinationPath, attempts, ...payload };
  }

  private async attempt(
    entry: ManifestEntry,
    destinationPath: string,
  ): Promise<AttemptResult<StreamedPayload>> {
    try {
      return { kind: "ok", value: await this.stream(entry, destinationPath) };
    } catch (error) {
      if (isTransientDownloadError(error)) {
        await fs.promises.rm(destinationPath, { force: true });
        return { kind: "transient", cause: error };
      }
      return { kind: "terminal", cause: this.toTerminal(entry, error) };
    }
  }

  private toTerminal(entry: ManifestEntry, error: unknown): Error {
    if (error instanceof TransferError) {
      return error;
    }
    if (axios.isAxiosError(error) && error.response) {
      if (error.response.data instanceof Readable) {
        error.response.data.destroy();
      }
      return new DownloadError(
        entry.fileId,
        `HTTP ${error.response.status} from ${entry.sourceUrl}`,
        { status: error.response.status, cause: error },
      );
    }
    return new DownloadError(entry.fileId, describeError(error), {
      cause: error,
    });
  }

  private async openStream(url: string): Promise<AxiosResponse<Readable>> {
    const { connectTimeoutMs } = this.options;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), connectTimeoutMs);

    try {
      return await this.http.get<Readable>(url, {
        responseType: "stream",
        decompress: false,
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new ConnectTimeoutError(connectTimeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  private async stream(
    entry: ManifestEntry,
    destinationPath: string,
  ): Promise<StreamedPayload> {
    const response = await this.openStream(entry.sourceUrl);
    const body = response.data;
    const total = entry.expectedSize > 0 ? entry.expectedSize : contentLength(response);

    let handle: FileHandle;
    try {
      handle = await fs.promises.open(destinationPath, "w");
    } catch (error) {
      body.destroy();
      throw error;
    }

    const idle = setTimeout(
      () => body.destroy(new ReadTimeoutError(this.options.readTimeoutMs)),
      this.options.readTimeoutMs,
    );
    const verifier = new ChecksumVerifier();

    let pending: Buffer[] = [];
    let pendingBytes = 0;
    let lastReported = 0;

    // Writes exactly `size` buffered bytes as one block and keeps the rest.
    const writeBlock = async (size: number): Promise<void> => {
      const joined = Buffer.concat(pending, pendingBytes);
      const block = joined.subarray(0, size);
      const rest = joined.subarray(size);
      pending = rest.length > 0 ? [rest] : [];
      pendingBytes = rest.length;

      await handle.write(block);
      verifier.update(block);

      const milestone = progressMilestone(verifier.bytesProcessed, total, lastReported);
      if (milestone !== null) {
        lastReported = milestone;
        this.sink.report({
          type: "download_progress",
          fileId: entry.fileId,
          percentage: milestone,
          bytes: verifier.bytesProcessed,
        });
      }
    };

    try {
      for await (const chunk of body) {
        idle.refresh();
        const data: Buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
        pending.push(data);
        pendingBytes += data.length;
        while (pendingBytes >= this.chunkSize) {
          await writeBlock(this.chunkSize);
        }
      }
      if (pendingBytes > 0) {
        await writeBlock(pendingBytes);
      }
    } finally {
      clearTimeout(idle);
      body.destroy();
      await handle.close();
    }

    return { bytes: verifier.bytesProcessed, checksum: verifier.digest() };
  }
}
