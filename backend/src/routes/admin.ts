import { Router, Request, Response } from "express";
import { Config } from "../config";
import { AuthService } from "../services/auth";
import { AuditLogService } from "../services/auditLog";
import { StorageConfigsService, redactConfig } from "../services/storageConfigs";
import { UsersService } from "../services/users";
import {
  configsFromCsv,
  configsFromJson,
  configsToCsv,
  configsToJson,
  isTransferFormat,
  type TransferFormat,
} from "../services/configTransfer";
import { usersFromCsv, usersFromJson, usersToCsv, usersToJson } from "../services/userTransfer";
import type { UpdateUserInput, UserWithDefaultConfig } from "../models/user";
import { NoConfigurationError, ValidationError } from "../models/errors";
import { AuthHelpers } from "./authHelpers";
import { isPlainObject, queryString, sendError } from "./utils";

type ImportParsers = {
  fromCsv: (text: string) => unknown[];
  fromJson: (text: string) => unknown[];
  noun: string;
};

const CONFIG_IMPORT: ImportParsers = { fromCsv: configsFromCsv, fromJson: configsFromJson, noun: "configurations" };
const USER_IMPORT: ImportParsers = { fromCsv: usersFromCsv, fromJson: usersFromJson, noun: "users" };

function formatOf(req: Request): TransferFormat {
  const format = queryString(req.query.format) ?? "json";
  if (!isTransferFormat(format)) throw new ValidationError(`unknown format: ${format}`);
  return format;
}

function dateParam(value: unknown, name: string): Date | undefined {
  const s = queryString(value);
  if (s === undefined) return undefined;
  const d = new Date(s);
  if (isNaN(d.getTime())) throw new ValidationError(`invalid ${name}: ${s}`);
  return d;
}

function exportStamp(): string {
  return new Date().toISOString().replace(/[-:]/g, "").replace(/\..*$/, "");
}

export function importRecords(
  format: TransferFormat,
  body: unknown,
  parsers: ImportParsers = CONFIG_IMPORT,
): unknown[] {
  if (format === "csv") {
    if (typeof body !== "string") throw new ValidationError("CSV import needs a text/csv body");
    return parsers.fromCsv(body);
  }
  if (typeof body === "string") return parsers.fromJson(body);
  if (Array.isArray(body)) return body;
  throw new ValidationError(`JSON import must be an array of ${parsers.noun}`);
}

export function importUserRecords(format: TransferFormat, body: unknown): unknown[] {
  return importRecords(format, body, USER_IMPORT);
}

export function parseUserPatch(body: unknown): UpdateUserInput {
  if (!isPlainObject(body)) throw new ValidationError("request body must be an object");
  const patch: UpdateUserInput = {};
  for (const name of ["email", "nickname"] as const) {
    const value = body[name];
    if (value === undefined) continue;
    if (typeof value !== "string") throw new ValidationError(`${name} must be a string`);
    patch[name] = value;
  }
  if (body.isAdmin !== undefined) {
    if (typeof body.isAdmin !== "boolean") throw new ValidationError("isAdmin must be a boolean");
    patch.isAdmin = body.isAdmin;
  }
  return patch;
}

export async function userWithDefaultConfig(
  users: Pick<UsersService, "getUser">,
  registry: Pick<StorageConfigsService, "getDefaultConfig">,
  userId: string,
): Promise<UserWithDefaultConfig> {
  const user = await users.getUser(userId);
  try {
    return { user, config: redactConfig(await registry.getDefaultConfig(userId)) };
  } catch (e) {
    if (e instanceof NoConfigurationError) return { user, config: null };
    throw e;
  }
}

export default function createAdminRouter(
  authService: AuthService,
  registry: StorageConfigsService,
  auditLogs: AuditLogService,
  usersService: UsersService,
) {
  const router = Router();
  const authHelpers = new AuthHelpers(authService);

  router.get("/users", async (req: Request, res: Response) => {
    const loginUser = await authHelpers.requireAdmin(req, res);
    if (!loginUser) return;
    try {
      const { offset, limit } = AuthHelpers.getPageParams(req, 1000);
      const order = queryString(req.query.order) === "asc" ? "asc" : "desc";
      res.json(await usersService.listUsers({ offset, limit, order }));
    } catch (e) {
      sendError(res, e);
    }
  });

  router.get("/users/export", async (req: Request, res: Response) => {
    const loginUser = await authHelpers.requireAdmin(req, res);
    if (!loginUser) return;
    try {
      const format = formatOf(req);
      const users = await usersService.exportUsers();
      res.setHeader("Content-Disposition", `attachment; filename="users-${exportStamp()}.${format}"`);
      if (format === "csv") {
        res.type("text/csv").send(usersToCsv(users));
      } else {
        res.type("application/json").send(usersToJson(users));
      }
    } catch (e) {
      sendError(res, e);
    }
  });

  router.post("/users/import", async (req: Request, res: Response) => {
    const loginUser = await authHelpers.requireAdmin(req, res);
    if (!loginUser) return;
    try {
      const records = importUserRecords(formatOf(req), req.body);
      res.json(await usersService.importUsers(records, AuthHelpers.actorOf(req, loginUser)));
    } catch (e) {
      sendError(res, e);
    }
  });

  router.get("/users/:id", async (req: Request, res: Response) => {
    const loginUser = await authHelpers.requireAdmin(req, res);
    if (!loginUser) return;
    try {
      res.json(await usersService.getUser(req.params.id));
    } catch (e) {
      sendError(res, e);
    }
  });

  router.get("/users/:id/config", async (req: Request, res: Response) => {
    const loginUser = await authHelpers.requireAdmin(req, res);
    if (!loginUser) return;
    try {
      res.json(await userWithDefaultConfig(usersService, registry, req.params.id));
    } catch (e) {
      sendError(res, e);
    }
  });

  router.put("/users/:id", async (req: Request, res: Response) => {
    const loginUser = await authHelpers.requireAdmin(req, res);
    if (!loginUser) return;
    try {
      const patch = parseUserPatch(req.body);
      const user = await usersService.updateUser(req.params.id, patch, AuthHelpers.actorOf(req, loginUser));
      if (patch.isAdmin !== undefined) await authService.revokeUserSessions(user.id);
      res.json(user);
    } catch (e) {
      sendError(res, e);
    }
  });

  router.delete("/users/:id", async (req: Request, res: Response) => {
    const loginUser = await authHelpers.requireAdmin(req, res);
    if (!loginUser) return;
    try {
      const result = await usersService.deleteUser(req.params.id, AuthHelpers.actorOf(req, loginUser));
      await authService.revokeUserSessions(req.params.id);
      res.json(result);
    } catch (e) {
      sendError(res, e);
    }
  });

  router.get("/configs/export", async (req: Request, res: Response) => {
    const loginUser = await authHelpers.requireAdmin(req, res);
    if (!loginUser) return;
    try {
      const format = formatOf(req);
      const configs = await registry.exportAllConfigs();
      res.setHeader("Content-Disposition", `attachment; filename="storage-configs-${exportStamp()}.${format}"`);
      if (format === "csv") {
        res.type("text/csv").send(configsToCsv(configs));
      } else {
        res.type("application/json").send(configsToJson(configs));
      }
    } catch (e) {
      sendError(res, e);
    }
  });

  router.post("/configs/import", async (req: Request, res: Response) => {
    const loginUser = await authHelpers.requireAdmin(req, res);
    if (!loginUser) return;
    try {
      const records = importRecords(formatOf(req), req.body);
      const result = await registry.importConfigs(records, AuthHelpers.actorOf(req, loginUser));
      res.json(result);
    } catch (e) {
      sendError(res, e);
    }
  });

  router.get("/audit-logs", async (req: Request, res: Response) => {
    const loginUser = await authHelpers.requireAdmin(req, res);
    if (!loginUser) return;
    try {
      const { offset, limit } = AuthHelpers.getPageParams(req, Config.AUDIT_LOG_PAGE_LIMIT);
      const logs = await auditLogs.listAuditLogs({
        userId: queryString(req.query.userId),
        action: queryString(req.query.action),
        resource: queryString(req.query.resource),
        since: dateParam(req.query.since, "since"),
        until: dateParam(req.query.until, "until"),
        offset,
        limit,
      });
      res.json(logs);
    } catch (e) {
      sendError(res, e);
    }
  });

  router.get("/audit-logs/sessions/:sessionId", async (req: Request, res: Response) => {
    const loginUser = await authHelpers.requireAdmin(req, res);
    if (!loginUser) return;
    try {
      res.json(await auditLogs.listAuditLogsBySession(req.params.sessionId));
    } catch (e) {
      sendError(res, e);
    }
  });

  router.post("/audit-logs/purge", async (req: Request, res: Response) => {
    const loginUser = await authHelpers.requireAdmin(req, res);
    if (!loginUser) return;
    try {
      const purged = await auditLogs.purgeOldAuditLogs();
      res.json({ purged });
    } catch (e) {
      sendError(res, e);
    }
  });

  return router;
}
