import express, { Express } from "express";
import cors from "cors";
import { createAuthMiddleware } from "./middleware/auth.middleware";
import { createRunController, healthCheck } from "./controllers/run.controller";
import { RunService } from "./services/run.service";

export function createApp(runService: RunService, apiKey: string): Express {
  const app = express();
  const authMiddleware = createAuthMiddleware(apiKey);
  const runController = createRunController(runService);

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Public routes
  app.get("/health", healthCheck);

  // Protected routes
  app.get("/runs", authMiddleware, runController.listRuns);
  app.get("/runs/:fileId", authMiddleware, runController.getRun);
  app.get("/runs/:fileId/artifacts", authMiddleware, runController.getArtifacts);

  return app;
}
