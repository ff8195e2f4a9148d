import logger from "../utils/logger";
import { RunEvent, RunRequest } from "../models/manifest.model";
import { describeError } from "../models/errors";
import { EventPublisher, RunQueue } from "./broker.service";
import { PipelineOutcome } from "./pipeline.service";
import { sleep } from "./retry";

export interface EntryExecutor {
  execute: (entry: RunRequest["entry"]) => Promise<PipelineOutcome>;
}

/**
 * Takes run requests off the queue one at a time, runs the pipeline and
 * reports the outcome back to the server.
 */
export class RunService {
  private stopping = false;
  private current: Promise<RunEvent> | null = null;

  constructor(
    private readonly queue: RunQueue,
    private readonly publisher: EventPublisher,
    private readonly pipeline: EntryExecutor,
    private readonly pollSeconds: number = 5,
    /** Pause after the queue itself fails before polling again. */
    private readonly pollErrorDelayMs: number = 5000,
  ) {}

  async handle(request: RunRequest): Promise<RunEvent> {
    const { runKey, entry } = request;
    let event: RunEvent;

    try {
      const outcome = await this.pipeline.execute(entry);
      event = {
        event: "run_succeeded",
        runKey,
        fileId: entry.fileId,
        publishedKeys: outcome.publishedKeys,
        timestamp: new Date().toISOString(),
      };
    } catch (error) {
      event = {
        event: "run_failed",
        runKey,
        fileId: entry.fileId,
        errorName: error instanceof Error ? error.name : "Error",
        reason: describeError(error),
        timestamp: new Date().toISOString(),
      };
    }

    try {
      await this.publisher.publishEvent(event);
    } catch (error) {
      logger.error(`Could not report ${event.event} for ${runKey}:`, error);
    }
    return event;
  }

  async runLoop(): Promise<void> {
    logger.info("Waiting for run requests");
    while (!this.stopping) {
      let request: RunRequest | null;
      try {
        request = await this.queue.nextRunRequest(this.pollSeconds);
      } catch (error) {
        logger.error("Error polling run queue:", error);
        await sleep(this.pollErrorDelayMs);
        continue;
      }
      if (!request) {
        continue;
      }
      this.current = this.handle(request);
      try {
        await this.current;
      } finally {
        this.current = null;
      }
    }
    logger.info("Run loop stopped");
  }

  /** Stop taking new requests and wait for the one in flight. */
  async stop(): Promise<void> {
    this.stopping = true;
    if (this.current) {
      await this.current;
    }
  }
}
