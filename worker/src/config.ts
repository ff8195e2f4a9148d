import Joi from "joi";
import { ConfigurationError } from "./models/errors";
import { DownloaderOptions } from "./services/downloader.service";
import { MultipartOptions, StoreConnectionConfig } from "./services/uploader.service";

const MB = 1024 * 1024;

export interface WorkerConfig {
  scratchPath: string;
  bucket: string;
  redisUrl: string;
  runQueue: string;
  store: StoreConnectionConfig;
  download: DownloaderOptions;
  upload: {
    maxAttempts: number;
    transientErrorCodes: string[];
    retryDelayMs: number;
    multipart: MultipartOptions;
  };
  decompressMembers: boolean;
}

interface WorkerEnv {
  SCRATCH_PATH: string;
  DEST_BUCKET: string;
  REDIS_URL: string;
  RUN_QUEUE: string;
  AWS_S3_ENDPOINT_URL?: string;
  AWS_ACCESS_KEY_ID?: string;
  AWS_SECRET_ACCESS_KEY?: string;
  AWS_REGION: string;
  S3_FORCE_PATH_STYLE: boolean;
  S3_MAX_ATTEMPTS: number;
  S3_CONNECT_TIMEOUT_SEC: number;
  S3_READ_TIMEOUT_SEC: number;
  DOWNLOAD_MAX_ATTEMPTS: number;
  DOWNLOAD_CONNECT_TIMEOUT_SEC: number;
  DOWNLOAD_READ_TIMEOUT_SEC: number;
  RETRY_DELAY_MS: number;
  UPLOAD_MAX_ATTEMPTS: number;
  UPLOAD_TRANSIENT_ERROR_CODES: string;
  MULTIPART_THRESHOLD_MB: number;
  MULTIPART_PART_SIZE_MB: number;
  UPLOAD_QUEUE_SIZE: number;
  DECOMPRESS_MEMBERS: boolean;
}

const attempts = Joi.number().integer().min(1).max(20);
const seconds = Joi.number().integer().min(1);

const envSchema = Joi.object<WorkerEnv>({
  SCRATCH_PATH: Joi.string().required(),
  DEST_BUCKET: Joi.string().required(),
  REDIS_URL: Joi.string().uri({ scheme: ["redis", "rediss"] }).default("redis://localhost:6379"),
  RUN_QUEUE: Joi.string().default("runs:pending"),
  AWS_S3_ENDPOINT_URL: Joi.string().uri().empty(""),
  AWS_ACCESS_KEY_ID: Joi.string().empty(""),
  AWS_SECRET_ACCESS_KEY: Joi.string().empty(""),
  AWS_REGION: Joi.string().default("us-east-1"),
  S3_FORCE_PATH_STYLE: Joi.boolean().default(true),
  S3_MAX_ATTEMPTS: attempts.default(10),
  S3_CONNECT_TIMEOUT_SEC: seconds.default(120),
  S3_READ_TIMEOUT_SEC: seconds.default(600),
  DOWNLOAD_MAX_ATTEMPTS: attempts.default(3),
  DOWNLOAD_CONNECT_TIMEOUT_SEC: seconds.default(120),
  DOWNLOAD_READ_TIMEOUT_SEC: seconds.default(7200),
  RETRY_DELAY_MS: Joi.number().integer().min(0).default(2000),
  UPLOAD_MAX_ATTEMPTS: attempts.default(3),
  UPLOAD_TRANSIENT_ERROR_CODES: Joi.string().default("InvalidPart"),
  MULTIPART_THRESHOLD_MB: Joi.number().integer().min(5).default(25),
  MULTIPART_PART_SIZE_MB: Joi.number().integer().min(5).default(100),
  UPLOAD_QUEUE_SIZE: Joi.number().integer().min(1).max(64).default(10),
  DECOMPRESS_MEMBERS: Joi.boolean().default(true),
}).unknown(true);

/**
 * Validate the environment once at startup. Every problem is reported
 * together, before any I/O happens.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  const result = envSchema.validate(env, { abortEarly: false });
  if (result.error !== undefined) {
    throw new ConfigurationError(result.error.details.map((detail) => detail.message));
  }
  const value = result.value;

  return {
    scratchPath: value.SCRATCH_PATH,
    bucket: value.DEST_BUCKET,
    redisUrl: value.REDIS_URL,
    runQueue: value.RUN_QUEUE,
    store: {
      endpoint: value.AWS_S3_ENDPOINT_URL,
      region: value.AWS_REGION,
      accessKeyId: value.AWS_ACCESS_KEY_ID,
      secretAccessKey: value.AWS_SECRET_ACCESS_KEY,
      forcePathStyle: value.S3_FORCE_PATH_STYLE,
      maxAttempts: value.S3_MAX_ATTEMPTS,
      connectTimeoutMs: value.S3_CONNECT_TIMEOUT_SEC * 1000,
      readTimeoutMs: value.S3_READ_TIMEOUT_SEC * 1000,
    },
    download: {
      maxAttempts: value.DOWNLOAD_MAX_ATTEMPTS,
      connectTimeoutMs: value.DOWNLOAD_CONNECT_TIMEOUT_SEC * 1000,
      readTimeoutMs: value.DOWNLOAD_READ_TIMEOUT_SEC * 1000,
      retryDelayMs: value.RETRY_DELAY_MS,
    },
    upload: {
      maxAttempts: value.UPLOAD_MAX_ATTEMPTS,
      transientErrorCodes: value.UPLOAD_TRANSIENT_ERROR_CODES.split(",")
        .map((code) => code.trim())
        .filter((code) => code.length > 0),
      retryDelayMs: value.RETRY_DELAY_MS,
      multipart: {
        thresholdBytes: value.MULTIPART_THRESHOLD_MB * MB,
        partSizeBytes: value.MULTIPART_PART_SIZE_MB * MB,
        queueSize: value.UPLOAD_QUEUE_SIZE,
      },
    },
    decompressMembers: value.DECOMPRESS_MEMBERS,
  };
}
