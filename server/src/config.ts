import Joi from "joi";
import { ConfigurationError } from "./models/errors";

export interface MinioConnection {
  endPoint: string;
  port: number;
  useSSL: boolean;
  accessKey: string;
  secretKey: string;
}

export interface StorageConfig {
  minio: MinioConnection;
  /** host:port used in presigned URLs handed out to API callers. */
  externalEndpoint: string;
  region: string;
  bucket: string;
}

export interface ServerConfig {
  port: number;
  apiKey: string;
  dbPath: string;
  redisUrl: string;
  runQueue: string;
  manifestPrefix: string;
  sensorIntervalMs: number;
  presignedExpiresSec: number;
  storage: StorageConfig;
}

interface ServerEnv {
  SERVER_PORT: number;
  SERVER_API_KEY: string;
  DB_PATH: string;
  REDIS_URL: string;
  RUN_QUEUE: string;
  DEST_BUCKET: string;
  MANIFEST_PREFIX: string;
  SENSOR_INTERVAL_SEC: number;
  PRESIGNED_EXPIRES_SEC: number;
  MINIO_ENDPOINT: string;
  MINIO_EXTERNAL_ENDPOINT?: string;
  MINIO_USE_SSL: boolean;
  MINIO_ACCESS_KEY: string;
  MINIO_SECRET_KEY: string;
  AWS_REGION: string;
}

const hostPort = Joi.string().pattern(/^[^:/\s]+(:\d+)?$/, "host:port");

const envSchema = Joi.object<ServerEnv>({
  SERVER_PORT: Joi.number().port().default(8080),
  SERVER_API_KEY: Joi.string().min(8).required(),
  DB_PATH: Joi.string().default("runs.db"),
  REDIS_URL: Joi.string().uri({ scheme: ["redis", "rediss"] }).default("redis://localhost:6379"),
  RUN_QUEUE: Joi.string().default("runs:pending"),
  DEST_BUCKET: Joi.string().required(),
  MANIFEST_PREFIX: Joi.string().required(),
  SENSOR_INTERVAL_SEC: Joi.number().integer().min(1).default(10),
  // Presigned URLs are valid for at most seven days.
  PRESIGNED_EXPIRES_SEC: Joi.number().integer().min(1).max(604800).default(3600),
  MINIO_ENDPOINT: hostPort.default("localhost:9000"),
  MINIO_EXTERNAL_ENDPOINT: hostPort.empty(""),
  MINIO_USE_SSL: Joi.boolean().default(false),
  MINIO_ACCESS_KEY: Joi.string().default("minioadmin"),
  MINIO_SECRET_KEY: Joi.string().default("minioadmin"),
  AWS_REGION: Joi.string().default("us-east-1"),
}).unknown(true);

function splitHostPort(endpoint: string, useSSL: boolean): { host: string; port: number } {
  const [host, port] = endpoint.split(":");
  return { host, port: port ? parseInt(port, 10) : useSSL ? 443 : 9000 };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = envSchema.validate(env, { abortEarly: false });
  if (result.error !== undefined) {
    throw new ConfigurationError(result.error.details.map((detail) => detail.message));
  }
  const value = result.value;
  const { host, port } = splitHostPort(value.MINIO_ENDPOINT, value.MINIO_USE_SSL);

  return {
    port: value.SERVER_PORT,
    apiKey: value.SERVER_API_KEY,
    dbPath: value.DB_PATH,
    redisUrl: value.REDIS_URL,
    runQueue: value.RUN_QUEUE,
    manifestPrefix: value.MANIFEST_PREFIX,
    sensorIntervalMs: value.SENSOR_INTERVAL_SEC * 1000,
    presignedExpiresSec: value.PRESIGNED_EXPIRES_SEC,
    storage: {
      minio: {
        endPoint: host,
        port,
        useSSL: value.MINIO_USE_SSL,
        accessKey: value.MINIO_ACCESS_KEY,
        secretKey: value.MINIO_SECRET_KEY,
      },
      externalEndpoint: value.MINIO_EXTERNAL_ENDPOINT ?? value.MINIO_ENDPOINT,
      region: value.AWS_REGION,
      bucket: value.DEST_BUCKET,
    },
  };
}
