import logger from "../utils/logger";
import { RunRequest } from "../models/run.model";
import { RunClaims } from "./db.service";
import { RunPublisher } from "./broker.service";
import { ManifestSource } from "./storage.service";
import { ManifestRow, parseManifest, runKeyFor } from "./manifest.service";

export interface SensorOptions {
  manifestPrefix: string;
  intervalMs: number;
}

export interface SensorTickResult {
  manifests: number;
  queued: number;
  skipped: number;
  failedManifests: string[];
}

/**
 * Polls the manifest prefix and queues one run per manifest row not seen
 * before. Ticks never overlap: the next one is scheduled when the previous
 * one has finished.
 */
export class SensorService {
  private timer: NodeJS.Timeout | null = null;
  private current: Promise<SensorTickResult> | null = null;
  private running = false;

  constructor(
    private readonly source: ManifestSource,
    private readonly claims: RunClaims,
    private readonly publisher: RunPublisher,
    private readonly options: SensorOptions,
  ) {}

  start(): void {
    if (this.running) return;
    this.running = true;
    logger.info(
      `Sensor watching ${this.options.manifestPrefix} every ${this.options.intervalMs / 1000}s`,
    );
    this.schedule(0);
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.current) {
      await this.current;
    }
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick()
        .catch((error) => logger.error("Sensor tick failed:", error))
        .finally(() => {
          if (this.running) this.schedule(this.options.intervalMs);
        });
    }, delayMs);
  }

  /** Returns null when a tick is already in progress. */
  async tick(): Promise<SensorTickResult | null> {
    if (this.current) {
      logger.debug("Sensor tick still running, skipping");
      return null;
    }

    this.current = this.evaluate();
    try {
      return await this.current;
    } finally {
      this.current = null;
    }
  }

  private async evaluate(): Promise<SensorTickResult> {
    const { manifestPrefix } = this.options;
    const keys = await this.source.listManifests(manifestPrefix);
    logger.info(`Found ${keys.length} manifest files under ${manifestPrefix}`);

    const result: SensorTickResult = {
      manifests: keys.length,
      queued: 0,
      skipped: 0,
      failedManifests: [],
    };

    for (const key of keys) {
      try {
        const { queued, skipped } = await this.processManifest(key);
        result.queued += queued;
        result.skipped += skipped;
      } catch (error) {
        logger.error(`Error processing manifest file ${key}:`, error);
        result.failedManifests.push(key);
      }
    }
    return result;
  }

  private async processManifest(key: string): Promise<{ queued: number; skipped: number }> {
    const { entries, skipped } = parseManifest(await this.source.readManifest(key), key);

    if (entries.length === 0) {
      logger.warn(`No valid entries found in ${key}`);
      return { queued: 0, skipped };
    }

    let queued = 0;
    for (const row of entries) {
      if (await this.queueRow(key, row)) {
        queued++;
      }
    }

    logger.info(`Processed ${entries.length} files from manifest ${key}, ${queued} newly queued`, {
      skipped,
    });
    return { queued, skipped };
  }

  private async queueRow(manifestKey: string, row: ManifestRow): Promise<boolean> {
    const runKey = runKeyFor(row.entry.fileId);
    const claimed = await this.claims.claimRun({
      runKey,
      fileId: row.entry.fileId,
      manifestKey,
      tags: row.tags,
    });
    if (!claimed) {
      return false;
    }

    const request: RunRequest = {
      runKey,
      entry: row.entry,
      tags: row.tags,
      requestedAt: new Date().toISOString(),
    };

    try {
      await this.publisher.enqueueRun(request);
    } catch (error) {
      // Unclaim so the next tick tries again.
      await this.claims.releaseRun(runKey);
      throw error;
    }

    logger.info(`Created run request for file ${row.entry.fileId}`, { runKey });
    return true;
  }
}
