import { Router, Request, Response } from "express";
import type { Pool } from "pg";
import type Redis from "ioredis";
import { pgQuery } from "../utils/servers";
import { createLogger, errorMessage } from "../utils/logger";

const logger = createLogger({ file: "root" });

export default function createRootRouter(pgPool: Pool, redis: Redis) {
  const router = Router();

  router.get("/health", async (_req: Request, res: Response) => {
    const checks: Record<string, string> = {};
    try {
      await pgQuery(pgPool, "SELECT 1", [], 1);
      checks.database = "ok";
    } catch (e) {
      logger.warn(`[health] database: ${errorMessage(e)}`);
      checks.database = "error";
    }
    try {
      await redis.ping();
      checks.redis = "ok";
    } catch (e) {
      logger.warn(`[health] redis: ${errorMessage(e)}`);
      checks.redis = "error";
    }
    const ok = Object.values(checks).every((v) => v === "ok");
    res.status(ok ? 200 : 503).json({ result: ok ? "ok" : "degraded", ...checks });
  });

  return router;
}
