import { Request, Response, NextFunction, RequestHandler } from "express";
import logger from "../utils/logger";

export function createAuthMiddleware(expectedToken: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      logger.warn(
        "Authentication failed: missing or invalid authorization header",
      );
      res
        .status(401)
        .json({ error: "Unauthorized: missing or invalid authorization header" });
      return;
    }

    const token = authHeader.substring(7); // Remove 'Bearer ' prefix

    if (token !== expectedToken) {
      logger.warn("Authentication failed: invalid API key");
      res.status(401).json({ error: "Unauthorized: invalid API key" });
      return;
    }

    next();
  };
}
