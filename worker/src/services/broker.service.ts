import Joi from "joi";
import { createClient, RedisClientType } from "redis";
import logger from "../utils/logger";
import { RunEvent, RunRequest } from "../models/manifest.model";

export const EVENTS_CHANNEL = "events:server";

export interface RunQueue {
  /** Blocks up to `timeoutSeconds`; null when nothing arrived. */
  nextRunRequest(timeoutSeconds: number): Promise<RunRequest | null>;
}

export interface EventPublisher {
  publishEvent(event: RunEvent): Promise<void>;
}

const entrySchema = Joi.object({
  fileId: Joi.string()
    .pattern(/^[^/\\]+$/)
    .invalid(".", "..")
    .required(),
  sourceUrl: Joi.string().uri({ scheme: ["http", "https"] }).required(),
  expectedChecksum: Joi.string().required(),
  expectedSize: Joi.number().integer().min(-1).required(),
  sampleId: Joi.string().allow("").required(),
  destinationPrefix: Joi.string().allow("").required(),
});

const runRequestSchema = Joi.object<RunRequest>({
  runKey: Joi.string().required(),
  entry: entrySchema.required(),
  tags: Joi.object().pattern(Joi.string(), Joi.string()).default({}),
  requestedAt: Joi.string().isoDate().required(),
});

/**
 * Parse and validate a queued run request. File ids must be plain names so
 * the payload cannot land outside its workspace.
 */
export function parseRunRequest(message: string): RunRequest {
  const result = runRequestSchema.validate(JSON.parse(message), { abortEarly: false });
  if (result.error !== undefined) {
    throw new Error(`Invalid run request: ${result.error.message}`);
  }
  return result.value;
}

class BrokerService implements RunQueue, EventPublisher {
  private consumer: RedisClientType;
  private publisher: RedisClientType;
  private isConnected: boolean = false;

  constructor(
    redisUrl: string,
    private readonly queueKey: string,
  ) {
    // BRPOP holds its connection, so publishing needs a second one.
    this.consumer = createClient({ url: redisUrl });
    this.publisher = createClient({ url: redisUrl });

    this.consumer.on("error", (err) =>
      logger.error("Redis Consumer Error:", err),
    );
    this.publisher.on("error", (err) =>
      logger.error("Redis Publisher Error:", err),
    );
  }

  async connect(): Promise<void> {
    try {
      await this.consumer.connect();
      await this.publisher.connect();
      this.isConnected = true;
      logger.info("BrokerService connected to Redis");
    } catch (error) {
      logger.error("Error connecting to Redis:", error);
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    try {
      await this.consumer.quit();
      await this.publisher.quit();
      this.isConnected = false;
      logger.info("BrokerService disconnected from Redis");
    } catch (error) {
      logger.error("Error disconnecting from Redis:", error);
    }
  }

  async nextRunRequest(timeoutSeconds: number): Promise<RunRequest | null> {
    if (!this.isConnected) {
      throw new Error("BrokerService not connected");
    }

    const item = await this.consumer.brPop(this.queueKey, timeoutSeconds);
    if (!item) {
      return null;
    }

    try {
      const request = parseRunRequest(item.element);
      logger.debug(`Received run request from ${this.queueKey}`, {
        runKey: request.runKey,
      });
      return request;
    } catch (error) {
      logger.error(`Discarding malformed run request from ${this.queueKey}:`, error);
      return null;
    }
  }

  async publishEvent(event: RunEvent): Promise<void> {
    if (!this.isConnected) {
      throw new Error("BrokerService not connected");
    }

    try {
      await this.publisher.publish(EVENTS_CHANNEL, JSON.stringify(event));
      logger.info(`Published event to ${EVENTS_CHANNEL}`, {
        event: event.event,
        runKey: event.runKey,
      });
    } catch (error) {
      logger.error("Error publishing event:", error);
      throw error;
    }
  }
}

export default BrokerService;
