import path from "path";
import { text } from "stream/consumers";
import { Client } from "minio";
import { S3Client, GetObjectCommand } from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import logger from "../utils/logger";
import { StorageConfig } from "../config";
import { MANIFEST_SUFFIX } from "./manifest.service";

/** Where the sensor finds manifests. */
export interface ManifestSource {
  listManifests(prefix: string): Promise<string[]>;
  readManifest(key: string): Promise<string>;
}

export interface ArtifactSigner {
  presignGetUrl(key: string, expiresIn: number): Promise<string>;
}

export class StorageService implements ManifestSource, ArtifactSigner {
  private client: Client;
  private externalS3Client: S3Client;
  private bucket: string;

  constructor(config: StorageConfig) {
    const { minio } = config;

    // Internal client for listing and reading manifests
    this.client = new Client({
      endPoint: minio.endPoint,
      port: minio.port,
      useSSL: minio.useSSL,
      accessKey: minio.accessKey,
      secretKey: minio.secretKey,
    });

    // Presigned URLs are signed offline against the address callers can reach
    const scheme = minio.useSSL ? "https" : "http";
    this.externalS3Client = new S3Client({
      endpoint: `${scheme}://${config.externalEndpoint}`,
      region: config.region,
      credentials: {
        accessKeyId: minio.accessKey,
        secretAccessKey: minio.secretKey,
      },
      forcePathStyle: true,
    });

    this.bucket = config.bucket;
    logger.info(
      `StorageService initialized with endpoint: ${minio.endPoint}:${minio.port}, external: ${config.externalEndpoint}, bucket: ${this.bucket}`,
    );
  }

  async ensureBucket(): Promise<void> {
    try {
      const exists = await this.client.bucketExists(this.bucket);
      if (!exists) {
        await this.client.makeBucket(this.bucket);
        logger.info(`Bucket created: ${this.bucket}`);
      } else {
        logger.info(`Bucket already exists: ${this.bucket}`);
      }
    } catch (error) {
      logger.error(`Error ensuring bucket ${this.bucket}:`, error);
      throw error;
    }
  }

  listManifests(prefix: string): Promise<string[]> {
    return new Promise((resolve, reject) => {
      const keys: string[] = [];
      const stream = this.client.listObjectsV2(this.bucket, prefix, true);

      stream.on("data", (item: { name?: string }) => {
        if (item.name?.endsWith(MANIFEST_SUFFIX)) {
          keys.push(item.name);
        }
      });
      stream.on("error", (error: Error) => {
        logger.error(`Error listing ${this.bucket}/${prefix}:`, error);
        reject(error);
      });
      stream.on("end", () => resolve(keys.sort()));
    });
  }

  async readManifest(key: string): Promise<string> {
    try {
      return await text(await this.client.getObject(this.bucket, key));
    } catch (error) {
      logger.error(`Error reading manifest ${key}:`, error);
      throw error;
    }
  }

  async presignGetUrl(key: string, expiresIn: number): Promise<string> {
    try {
      const command = new GetObjectCommand({
        Bucket: this.bucket,
        Key: key,
        ResponseContentDisposition: `attachment; filename="${path.posix.basename(key)}"`,
      });

      const url = await getSignedUrl(this.externalS3Client, command, { expiresIn });

      logger.debug(`Generated presigned GET URL for ${key}, expires in ${expiresIn}s`);
      return url;
    } catch (error) {
      logger.error(`Error generating presigned GET URL for ${key}:`, error);
      throw error;
    }
  }
}
