/**
 * Error taxonomy for the transfer pipeline. Every class carries the
 * identifier of what failed and, where there is one, the underlying cause.
 */

export class TransferError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends TransferError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.problems = problems;
  }
}

/** Non-transient download failure, e.g. an HTTP error status. */
export class DownloadError extends TransferError {
  readonly fileId: string;
  readonly status?: number;

  constructor(
    fileId: string,
    message: string,
    options?: { status?: number; cause?: unknown },
  ) {
    super(`Download of ${fileId} failed: ${message}`, options);
    this.fileId = fileId;
    this.status = options?.status;
  }
}

export class DownloadExhaustedError extends TransferError {
  readonly fileId: string;
  readonly attempts: number;

  constructor(fileId: string, attempts: number, cause: unknown) {
    super(
      `Failed to download ${fileId} after ${attempts} attempts: ${describeError(cause)}`,
      { cause },
    );
    this.fileId = fileId;
    this.attempts = attempts;
  }
}

export class ChecksumMismatchError extends TransferError {
  readonly fileId: string;
  readonly expected: string;
  readonly actual: string;

  constructor(fileId: string, expected: string, actual: string) {
    super(
      `MD5 checksum mismatch for ${fileId}. Expected: ${expected}, Got: ${actual}`,
    );
    this.fileId = fileId;
    this.expected = expected;
    this.actual = actual;
  }
}

export class ArchiveError extends TransferError {
  readonly archive: string;

  constructor(archive: string, message: string, cause?: unknown) {
    super(`Archive ${archive}: ${message}`, { cause });
    this.archive = archive;
  }
}

export class UploadError extends TransferError {
  readonly key: string;
  readonly attempts: number;

  constructor(key: string, attempts: number, message: string, cause?: unknown) {
    super(`Upload to ${key} failed after ${attempts} attempt(s): ${message}`, {
      cause,
    });
    this.key = key;
    this.attempts = attempts;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
