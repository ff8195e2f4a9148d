import logger from "../utils/logger";
import { Artifact, RunEvent, RunRecord, RunStatus } from "../models/run.model";
import { RunStore } from "./db.service";
import { ArtifactSigner } from "./storage.service";

export type RunRepository = Pick<RunStore, "updateRunStatus" | "getRunByFileId" | "listRuns">;

export class RunService {
  constructor(
    private readonly store: RunRepository,
    private readonly signer: ArtifactSigner,
    private readonly presignedExpiresSec: number,
  ) {}

  /** Record a worker's result against its run. */
  async applyEvent(event: RunEvent): Promise<void> {
    const { runKey } = event;

    const updated =
      event.event === "run_succeeded"
        ? await this.store.updateRunStatus(runKey, "succeeded", {
            publishedKeys: event.publishedKeys,
          })
        : await this.store.updateRunStatus(runKey, "failed", {
            error: `${event.errorName}: ${event.reason}`,
          });

    if (!updated) {
      logger.warn(`Received event for unknown run: ${runKey}`);
      return;
    }

    if (event.event === "run_succeeded") {
      logger.info(`Run ${runKey} succeeded`, { publishedKeys: event.publishedKeys.length });
    } else {
      logger.error(`Run ${runKey} failed: ${event.errorName}: ${event.reason}`);
    }
  }

  getRun(fileId: string): Promise<RunRecord | null> {
    return this.store.getRunByFileId(fileId);
  }

  listRuns(status?: RunStatus): Promise<RunRecord[]> {
    return this.store.listRuns(status);
  }

  /**
   * Presigned download URLs for everything a succeeded run published.
   * Null when the run is unknown or did not succeed.
   */
  async getArtifacts(fileId: string): Promise<Artifact[] | null> {
    const run = await this.store.getRunByFileId(fileId);
    if (!run || run.status !== "succeeded") {
      return null;
    }

    const expiresIn = this.presignedExpiresSec;
    return Promise.all(
      run.publishedKeys.map(async (key) => ({
        key,
        url: await this.signer.presignGetUrl(key, expiresIn),
        expiresIn,
      })),
    );
  }
}
