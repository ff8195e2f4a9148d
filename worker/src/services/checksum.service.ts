import crypto from "crypto";
import { ChecksumMismatchError } from "../models/errors";

/**
 * Rolling MD5 over a byte stream, fed one chunk at a time.
 */
export class ChecksumVerifier {
  private readonly hash = crypto.createHash("md5");
  private bytes = 0;
  private hex: string | null = null;

  update(chunk: Buffer): void {
    if (this.hex !== null) {
      throw new Error("ChecksumVerifier already finalised");
    }
    this.hash.update(chunk);
    this.bytes += chunk.length;
  }

  get bytesProcessed(): number {
    return this.bytes;
  }

  digest(): string {
    if (this.hex === null) {
      this.hex = this.hash.digest("hex");
    }
    return this.hex;
  }
}

export function checksumsEqual(expected: string, actual: string): boolean {
  return expected.trim().toLowerCase() === actual.trim().toLowerCase();
}

export function assertChecksum(
  fileId: string,
  expected: string,
  actual: string,
): void {
  if (!checksumsEqual(expected, actual)) {
    throw new ChecksumMismatchError(fileId, expected, actual);
  }
}

export function md5Hex(data: Buffer | string): string {
  return crypto.createHash("md5").update(data).digest("hex");
}
