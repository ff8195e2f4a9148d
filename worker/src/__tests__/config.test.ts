import { describe, expect, it } from "vitest";
import { loadConfig } from "../config";
import { ConfigurationError } from "../models/errors";

const required = { SCRATCH_PATH: "/scratch", DEST_BUCKET: "omics-dest" };

describe("loadConfig", () => {
  it("reports every missing variable at once", () => {
    let caught: unknown;
    try {
      loadConfig({});
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.problems).toEqual([
        '"SCRATCH_PATH" is required',
        '"DEST_BUCKET" is required',
      ]);
    }
  });

  it("applies defaults", () => {
    const config = loadConfig(required);

    expect(config.scratchPath).toBe("/scratch");
    expect(config.bucket).toBe("omics-dest");
    expect(config.redisUrl).toBe("redis://localhost:6379");
    expect(config.runQueue).toBe("runs:pending");
    expect(config.download).toEqual({
      maxAttempts: 3,
      connectTimeoutMs: 120_000,
      readTimeoutMs: 7_200_000,
      retryDelayMs: 2000,
    });
    expect(config.upload).toEqual({
      maxAttempts: 3,
      transientErrorCodes: ["InvalidPart"],
      retryDelayMs: 2000,
      multipart: {
        thresholdBytes: 25 * 1024 * 1024,
        partSizeBytes: 100 * 1024 * 1024,
        queueSize: 10,
      },
    });
    expect(config.store).toEqual({
      endpoint: undefined,
      region: "us-east-1",
      accessKeyId: undefined,
      secretAccessKey: undefined,
      forcePathStyle: true,
      maxAttempts: 10,
      connectTimeoutMs: 120_000,
      readTimeoutMs: 600_000,
    });
    expect(config.decompressMembers).toBe(true);
  });

  it("converts string values from the environment", () => {
    const config = loadConfig({
      ...required,
      AWS_S3_ENDPOINT_URL: "",
      AWS_ACCESS_KEY_ID: "test-access-key",
      AWS_SECRET_ACCESS_KEY: "test-secret",
      UPLOAD_TRANSIENT_ERROR_CODES: "InvalidPart, SlowDown,,",
      DOWNLOAD_MAX_ATTEMPTS: "5",
      DECOMPRESS_MEMBERS: "false",
      MULTIPART_THRESHOLD_MB: "8",
    });

    expect(config.store.endpoint).toBeUndefined();
    expect(config.store.accessKeyId).toBe("test-access-key");
    expect(config.upload.transientErrorCodes).toEqual(["InvalidPart", "SlowDown"]);
    expect(config.download.maxAttempts).toBe(5);
    expect(config.decompressMembers).toBe(false);
    expect(config.upload.multipart.thresholdBytes).toBe(8 * 1024 * 1024);
  });

  it("rejects a multipart threshold below the backend minimum part size", () => {
    expect(() => loadConfig({ ...required, MULTIPART_THRESHOLD_MB: "4" })).toThrow(
      '"MULTIPART_THRESHOLD_MB" must be greater than or equal to 5',
    );
  });
});
