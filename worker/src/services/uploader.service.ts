import fs from "fs";
import {
  PutObjectCommand,
  S3Client,
  S3ClientConfig,
} from "@aws-sdk/client-s3";
import { Upload } from "@aws-sdk/lib-storage";
import { EventSink } from "../models/events";
import { UploadError, describeError } from "../models/errors";
import { AttemptResult, runWithRetry } from "./retry";

export interface StoreConnectionConfig {
  endpoint?: string;
  region: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  forcePathStyle: boolean;
  /** Attempts for the SDK's own adaptive retry of throttling and drops. */
  maxAttempts: number;
  connectTimeoutMs: number;
  readTimeoutMs: number;
}

export interface MultipartOptions {
  thresholdBytes: number;
  partSizeBytes: number;
  /** Parts transferred concurrently. */
  queueSize: number;
}

/**
 * Moves one local file to one object key. The S3 implementation is the
 * production one; tests substitute an in-memory store.
 */
export interface ObjectTransfer {
  send(localPath: string, bucket: string, key: string, size: number): Promise<void>;
}

export function s3ClientConfig(config: StoreConnectionConfig): S3ClientConfig {
  return {
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
    credentials:
      config.accessKeyId && config.secretAccessKey
        ? {
            accessKeyId: config.accessKeyId,
            secretAccessKey: config.secretAccessKey,
          }
        : undefined,
    maxAttempts: config.maxAttempts,
    retryMode: "adaptive",
    requestHandler: {
      connectionTimeout: config.connectTimeoutMs,
      requestTimeout: config.readTimeoutMs,
    },
  };
}

export function createResilientS3Client(config: StoreConnectionConfig): S3Client {
  return new S3Client(s3ClientConfig(config));
}

export class S3ObjectTransfer implements ObjectTransfer {
  constructor(
    private readonly client: S3Client,
    private readonly multipart: MultipartOptions,
  ) {}

  usesMultipart(size: number): boolean {
    return size >= this.multipart.thresholdBytes;
  }

  async send(localPath: string, bucket: string, key: string, size: number): Promise<void> {
    if (!this.usesMultipart(size)) {
      await this.client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: fs.createReadStream(localPath),
          ContentLength: size,
        }),
      );
      return;
    }

    const upload = new Upload({
      client: this.client,
      params: { Bucket: bucket, Key: key, Body: fs.createReadStream(localPath) },
      partSize: this.multipart.partSizeBytes,
      queueSize: this.multipart.queueSize,
      leavePartsOnError: false,
    });
    await upload.done();
  }
}

export type TransientUploadPredicate = (error: unknown) => boolean;

/** The backend's error code, from the SDK's `name` or a raw `Code`/`code`. */
export function backendErrorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null) return undefined;

  for (const field of ["Code", "code", "name"] as const) {
    if (field in error) {
      const value: unknown = Reflect.get(error, field);
      if (typeof value === "string" && value.length > 0 && value !== "Error") {
        return value;
      }
    }
  }
  return undefined;
}

/**
 * Predicate matching backend errors whose code is one of `codes`.
 * `InvalidPart` is what S3 reports when a multipart part arrived corrupted.
 */
export function transientErrorCodes(codes: string[]): TransientUploadPredicate {
  const known = new Set(codes);
  return (error) => {
    const code = backendErrorCode(error);
    return code !== undefined && known.has(code);
  };
}

export interface UploaderOptions {
  maxAttempts: number;
  isTransient: TransientUploadPredicate;
  retryDelayMs?: number;
}

export interface UploadResult {
  key: string;
  bytes: number;
  attempts: number;
}

/**
 * Retries the whole upload, never single parts, and only for errors the
 * predicate calls transient. The local file is never touched.
 */
export class ResilientUploader {
  constructor(
    private readonly transfer: ObjectTransfer,
    private readonly options: UploaderOptions,
    private readonly sink: EventSink,
  ) {}

  async upload(localPath: string, bucket: string, key: string): Promise<UploadResult> {
    let size: number;
    try {
      size = (await fs.promises.stat(localPath)).size;
    } catch (error) {
      throw new UploadError(key, 0, `cannot read ${localPath}: ${describeError(error)}`, error);
    }

    const { maxAttempts } = this.options;
    let attempts = 0;

    this.sink.report({
      type: "upload_started",
      key,
      bytes: size,
      multipart: this.transfer instanceof S3ObjectTransfer && this.transfer.usesMultipart(size),
    });

    await runWithRetry<void>(
      async (attempt): Promise<AttemptResult<void>> => {
        attempts = attempt;
        try {
          await this.transfer.send(localPath, bucket, key, size);
          return { kind: "ok", value: undefined };
        } catch (error) {
          if (this.options.isTransient(error)) {
            return { kind: "transient", cause: error };
          }
          return {
            kind: "terminal",
            cause: new UploadError(key, attempt, describeError(error), error),
          };
        }
      },
      {
        maxAttempts,
        delayMs: this.options.retryDelayMs,
        onRetry: (nextAttempt, cause) =>
          this.sink.report({
            type: "upload_retry",
            key,
            attempt: nextAttempt,
            maxAttempts,
            reason: describeError(cause),
          }),
        onExhausted: (count, cause) =>
          new UploadError(key, count, describeError(cause), cause),
      },
    );

    return { key, bytes: size, attempts };
  }
}
