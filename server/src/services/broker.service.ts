import Joi from "joi";
import { createClient, RedisClientType } from "redis";
import logger from "../utils/logger";
import { RunEvent, RunRequest } from "../models/run.model";

export const EVENTS_CHANNEL = "events:server";

export interface RunPublisher {
  enqueueRun(request: RunRequest): Promise<void>;
}

const runEventSchema = Joi.alternatives<RunEvent>().try(
  Joi.object({
    event: Joi.string().valid("run_succeeded").required(),
    runKey: Joi.string().required(),
    fileId: Joi.string().required(),
    publishedKeys: Joi.array().items(Joi.string()).required(),
    timestamp: Joi.string().isoDate().required(),
  }),
  Joi.object({
    event: Joi.string().valid("run_failed").required(),
    runKey: Joi.string().required(),
    fileId: Joi.string().required(),
    errorName: Joi.string().required(),
    reason: Joi.string().allow("").required(),
    timestamp: Joi.string().isoDate().required(),
  }),
);

export function parseRunEvent(message: string): RunEvent {
  const result = runEventSchema.validate(JSON.parse(message));
  if (result.error !== undefined) {
    throw new Error(`Invalid run event: ${result.error.message}`);
  }
  return result.value;
}

export class BrokerService implements RunPublisher {
  private publisher: RedisClientType;
  private subscriber: RedisClientType;
  private isConnected: boolean = false;

  constructor(
    redisUrl: string,
    private readonly queueKey: string,
  ) {
    this.publisher = createClient({ url: redisUrl });
    this.subscriber = createClient({ url: redisUrl });

    this.publisher.on("error", (err) =>
      logger.error("Redis Publisher Error:", err),
    );
    this.subscriber.on("error", (err) =>
      logger.error("Redis Subscriber Error:", err),
    );
  }

  async connect(): Promise<void> {
    try {
      await this.publisher.connect();
      await this.subscriber.connect();
      this.isConnected = true;
      logger.info("BrokerService connected to Redis");
    } catch (error) {
      logger.error("Error connecting to Redis:", error);
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    try {
      await this.publisher.quit();
      await this.subscriber.quit();
      this.isConnected = false;
      logger.info("BrokerService disconnected from Redis");
    } catch (error) {
      logger.error("Error disconnecting from Redis:", error);
    }
  }

  /** Push onto the run queue; each request is popped by exactly one worker. */
  async enqueueRun(request: RunRequest): Promise<void> {
    if (!this.isConnected) {
      throw new Error("BrokerService not connected");
    }

    try {
      await this.publisher.lPush(this.queueKey, JSON.stringify(request));
      logger.info(`Queued run on ${this.queueKey}`, { runKey: request.runKey });
    } catch (error) {
      logger.error(`Error queueing run ${request.runKey}:`, error);
      throw error;
    }
  }

  async subscribeToEvents(
    callback: (event: RunEvent) => Promise<void>,
  ): Promise<void> {
    if (!this.isConnected) {
      throw new Error("BrokerService not connected");
    }

    try {
      await this.subscriber.subscribe(EVENTS_CHANNEL, (message) => {
        let event: RunEvent;
        try {
          event = parseRunEvent(message);
        } catch (error) {
          logger.error("Error parsing event message:", error);
          return;
        }
        logger.debug(`Received event from ${EVENTS_CHANNEL}`, {
          event: event.event,
        });
        callback(event).catch((error) =>
          logger.error(`Error handling ${event.event} for ${event.runKey}:`, error),
        );
      });

      logger.info(`Subscribed to ${EVENTS_CHANNEL}`);
    } catch (error) {
      logger.error("Error subscribing to events:", error);
      throw error;
    }
  }
}

export default BrokerService;
