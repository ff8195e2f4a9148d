import dotenv from "dotenv";
import { loadConfig } from "./config";
import logger from "./utils/logger";
import BrokerService from "./services/broker.service";
import { RunService } from "./services/run.service";
import { TransferPipeline } from "./services/pipeline.service";
import { StreamingDownloader } from "./services/downloader.service";
import { ArchiveExpander } from "./services/archive.service";
import {
  ResilientUploader,
  S3ObjectTransfer,
  createResilientS3Client,
  transientErrorCodes,
} from "./services/uploader.service";
import { createLoggerSink } from "./services/event-sink";

// Load environment variables
dotenv.config();

async function startWorker() {
  const config = loadConfig();
  const sink = createLoggerSink(logger);

  const s3Client = createResilientS3Client(config.store);
  const pipeline = new TransferPipeline(
    { scratchRoot: config.scratchPath, bucket: config.bucket },
    {
      downloader: new StreamingDownloader(config.download, sink),
      expander: new ArchiveExpander(
        { decompressMembers: config.decompressMembers },
        sink,
      ),
      uploader: new ResilientUploader(
        new S3ObjectTransfer(s3Client, config.upload.multipart),
        {
          maxAttempts: config.upload.maxAttempts,
          isTransient: transientErrorCodes(config.upload.transientErrorCodes),
          retryDelayMs: config.upload.retryDelayMs,
        },
        sink,
      ),
      sink,
    },
  );

  const brokerService = new BrokerService(config.redisUrl, config.runQueue);
  const runService = new RunService(brokerService, brokerService, pipeline);

  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, finishing the current transfer...`);
    await runService.stop();
    await brokerService.disconnect();
    s3Client.destroy();
    process.exit(0);
  };

  // Graceful shutdown
  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        logger.error("Error during shutdown:", error);
        process.exit(1);
      });
    });
  }

  logger.info(`Starting worker on queue ${config.runQueue}`);
  logger.info(`Scratch path: ${config.scratchPath}, bucket: ${config.bucket}`);

  await brokerService.connect();
  await runService.runLoop();
}

startWorker().catch((error) => {
  logger.error("Failed to start worker:", error);
  process.exit(1);
});
