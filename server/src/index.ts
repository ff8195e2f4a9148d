import dotenv from "dotenv";
import { Server } from "http";
import { loadConfig } from "./config";
import { createApp } from "./app";
import { StorageService } from "./services/storage.service";
import { BrokerService } from "./services/broker.service";
import { RunStore } from "./services/db.service";
import { RunService } from "./services/run.service";
import { SensorService } from "./services/sensor.service";
import logger from "./utils/logger";

// Load environment variables
dotenv.config();

async function startServer() {
  const config = loadConfig();

  const storageService = new StorageService(config.storage);
  const brokerService = new BrokerService(config.redisUrl, config.runQueue);
  const runStore = new RunStore(config.dbPath);
  const runService = new RunService(runStore, storageService, config.presignedExpiresSec);
  const sensorService = new SensorService(storageService, runStore, brokerService, {
    manifestPrefix: config.manifestPrefix,
    intervalMs: config.sensorIntervalMs,
  });

  // Initialize services
  logger.info("Initializing services...");

  await runStore.init();
  await storageService.ensureBucket();
  await brokerService.connect();

  // Apply worker results to the run store
  await brokerService.subscribeToEvents((event) => runService.applyEvent(event));

  // Start HTTP server
  const app = createApp(runService, config.apiKey);
  const server: Server = app.listen(config.port, "0.0.0.0", () => {
    logger.info(`Server listening on port ${config.port}`);
    logger.info("Server ready to accept requests");
  });

  sensorService.start();

  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully...`);
    await sensorService.stop();
    server.close();
    await brokerService.disconnect();
    await runStore.close();
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
}

startServer().catch((error) => {
  logger.error("Failed to start server:", error);
  process.exit(1);
});
