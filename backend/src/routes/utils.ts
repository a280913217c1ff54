import type { Response } from "express";
import { statusOf } from "../models/errors";
import { createLogger, errorMessage } from "../utils/logger";

const logger = createLogger({ file: "routes" });

export function sendError(res: Response, e: unknown): Response {
  const status = statusOf(e);
  if (status >= 500) {
    logger.error(`[routes] ${errorMessage(e)}`);
  }
  return res.status(status).json({ error: errorMessage(e) || "internal server error" });
}

export function queryString(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
