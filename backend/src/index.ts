import { Config, makeAdminBackendConfig } from "./config";
import { createLogger, errorMessage } from "./utils/logger";
import express, { ErrorRequestHandler } from "express";
import cookieParser from "cookie-parser";
import cors from "cors";
import { AuthService } from "./services/auth";
import { AuditLogService } from "./services/auditLog";
import { IdIssueService } from "./services/idIssue";
import { ObjectStoreCache, makeBucketAdmin } from "./services/storageFactory";
import { StorageConfigsService } from "./services/storageConfigs";
import { TransferService } from "./services/transfer";
import { UsersService } from "./services/users";
import { ProvisioningService } from "./services/provisioning";
import createRootRouter from "./routes/root";
import createAuthRouter from "./routes/auth";
import createConfigsRouter from "./routes/configs";
import createFilesRouter from "./routes/files";
import createAdminRouter from "./routes/admin";
import { maskSecret } from "./utils/format";
import { statusOf } from "./models/errors";
import { getSampleAddr, connectPgWithRetry, connectRedisWithRetry } from "./utils/servers";

const logger = createLogger({ file: "index" });

const AUDIT_PURGE_INTERVAL_MS = 24 * 60 * 60 * 1000;

function isSecretSetting(key: string): boolean {
  return key.endsWith("_PASSWORD") || key.endsWith("_SECRET_ACCESS_KEY");
}

async function main() {
  Object.entries(Config).forEach(([key, value]) => {
    const shown = isSecretSetting(key) && typeof value === "string" ? maskSecret(value, 0) : value;
    logger.info(`[config] ${key}: ${JSON.stringify(shown)}`);
  });

  const pgPool = await connectPgWithRetry();
  const redis = await connectRedisWithRetry();

  const idIssueService = new IdIssueService(Config.ID_ISSUE_WORKER_ID);
  const auditLogService = new AuditLogService(pgPool, idIssueService);
  const storeCache = new ObjectStoreCache(Config.STORE_CACHE_SIZE);
  const storageConfigsService = new StorageConfigsService(
    pgPool,
    idIssueService,
    auditLogService,
    storeCache,
  );
  const transferService = new TransferService(storageConfigsService, auditLogService, storeCache);
  const authService = new AuthService(pgPool, redis);
  const usersService = new UsersService(pgPool, idIssueService, auditLogService, storeCache);

  const adminBackend = makeAdminBackendConfig();
  const provisioningService = adminBackend
    ? new ProvisioningService(
        adminBackend,
        makeBucketAdmin(adminBackend),
        storageConfigsService,
        auditLogService,
      )
    : null;
  if (!provisioningService) {
    logger.info("[provisioning] disabled: admin and distinct tenant credentials are both required");
  }

  const app = express();
  app.use(express.json({ limit: Config.IMPORT_BYTE_LIMIT }));
  app.use(cookieParser());
  app.use(
    cors({
      origin: Config.FRONTEND_ORIGIN,
      credentials: true,
    }),
  );
  if (Config.TRUST_PROXY_HOPS > 0) {
    app.set("trust proxy", Config.TRUST_PROXY_HOPS);
  }
  app.use("/", createRootRouter(pgPool, redis));
  app.use("/auth", createAuthRouter(authService, usersService));
  app.use(
    "/configs",
    createConfigsRouter(authService, storageConfigsService, transferService, provisioningService),
  );
  app.use("/files", createFilesRouter(authService, transferService));
  app.use(
    "/admin",
    express.text({ type: ["text/csv", "text/plain"], limit: Config.IMPORT_BYTE_LIMIT }),
    createAdminRouter(authService, storageConfigsService, auditLogService, usersService),
  );

  const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, next) => {
    logger.error(`[API ERROR] ${errorMessage(err)}`);
    if (res.headersSent) return next(err);
    const status =
      typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
        ? err.status
        : statusOf(err);
    res.status(status).json({ error: errorMessage(err) || "internal server error" });
  };
  app.use(errorHandler);

  const purgeTimer = setInterval(() => {
    auditLogService.purgeOldAuditLogs().catch((e) => {
      logger.error(`[auditLog] purge failed: ${errorMessage(e)}`);
    });
  }, AUDIT_PURGE_INTERVAL_MS);
  purgeTimer.unref();

  const server = app.listen(Config.BACKEND_PORT, "0.0.0.0", () => {
    const addr = getSampleAddr();
    logger.info(`Server running on http://${addr}:${Config.BACKEND_PORT}`);
  });

  let shuttingDown = false;
  function shutdown(signal: NodeJS.Signals | "SIGUSR2") {
    if (shuttingDown) return;
    shuttingDown = true;
    clearInterval(purgeTimer);
    logger.info(`[shutdown] Received ${signal}. Closing server...`);
    server.close((err?: Error) => {
      if (err) {
        logger.error(`[shutdown] HTTP server close error: ${err}`);
        process.exit(1);
      }
      Promise.resolve()
        .then(async () => {
          try {
            logger.info("[shutdown] Closing PostgreSQL pool...");
            await pgPool.end();
          } catch (e) {
            logger.error(`[shutdown] pgPool.end error: ${errorMessage(e)}`);
          }
        })
        .then(async () => {
          try {
            logger.info("[shutdown] Closing Redis...");
            await redis.quit();
          } catch (e) {
            logger.error(`[shutdown] redis.quit error: ${errorMessage(e)}`);
          }
        })
        .finally(() => {
          logger.info("[shutdown] Done. Bye.");
          process.exit(0);
        });
    });
    setTimeout(() => {
      logger.warn("[shutdown] Force exiting after 10s");
      process.exit(1);
    }, 10000).unref();
  }

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));

  process.once("SIGUSR2", () => {
    shutdown("SIGUSR2");
    setTimeout(() => process.kill(process.pid, "SIGUSR2"), 500);
  });
}

main().catch((e) => {
  logger.error(`Fatal error: ${errorMessage(e)}`);
  process.exit(1);
});
