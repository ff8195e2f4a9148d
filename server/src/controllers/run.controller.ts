import { Request, Response } from "express";
import Joi from "joi";
import { RUN_STATUSES, RunStatus } from "../models/run.model";
import { RunService } from "../services/run.service";
import logger from "../utils/logger";

// Validation schemas
const fileIdSchema = Joi.string()
  .pattern(/^[^/\\]+$/)
  .max(1024)
  .required();

const listRunsQuerySchema = Joi.object<{ status?: RunStatus }>({
  status: Joi.string().valid(...RUN_STATUSES),
});

export function createRunController(runService: RunService) {
  async function listRuns(req: Request, res: Response): Promise<void> {
    try {
      const result = listRunsQuerySchema.validate(req.query);
      if (result.error !== undefined) {
        res
          .status(400)
          .json({ error: "Invalid query", details: result.error.message });
        return;
      }

      const runs = await runService.listRuns(result.value.status);
      res.status(200).json({ runs });
    } catch (error) {
      logger.error("Error in listRuns controller:", error);
      res.status(500).json({ error: "Internal server error" });
    }
  }

  async function getRun(req: Request, res: Response): Promise<void> {
    try {
      const { fileId } = req.params;

      const { error } = fileIdSchema.validate(fileId);
      if (error) {
        res
          .status(400)
          .json({ error: "Invalid fileId format", details: error.message });
        return;
      }

      const run = await runService.getRun(fileId);
      if (!run) {
        res.status(404).json({ error: "Run not found" });
        return;
      }

      res.status(200).json(run);
    } catch (error) {
      logger.error("Error in getRun controller:", error);
      res.status(500).json({ error: "Internal server error" });
    }
  }

  async function getArtifacts(req: Request, res: Response): Promise<void> {
    try {
      const { fileId } = req.params;

      const { error } = fileIdSchema.validate(fileId);
      if (error) {
        res
          .status(400)
          .json({ error: "Invalid fileId format", details: error.message });
        return;
      }

      const artifacts = await runService.getArtifacts(fileId);
      if (!artifacts) {
        res
          .status(404)
          .json({ error: "Artifacts not available or run not succeeded" });
        return;
      }

      res.status(200).json({ fileId, artifacts });
    } catch (error) {
      logger.error("Error in getArtifacts controller:", error);
      res.status(500).json({ error: "Internal server error" });
    }
  }

  return { listRuns, getRun, getArtifacts };
}

export async function healthCheck(req: Request, res: Response): Promise<void> {
  res
    .status(200)
    .json({ status: "healthy", timestamp: new Date().toISOString() });
}
