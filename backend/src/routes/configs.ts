import { Router, Request, Response } from "express";
import { AuthService } from "../services/auth";
import {
  StorageConfigsService,
  mergeStorageConfig,
  normalizeConfigFields,
  redactConfig,
} from "../services/storageConfigs";
import { TransferService } from "../services/transfer";
import { ProvisioningService } from "../services/provisioning";
import {
  isBackendKind,
  type BackendKind,
  type StorageConfigDraft,
  type StorageConfigPatch,
} from "../models/storageConfig";
import { ValidationError } from "../models/errors";
import { parseBoolean } from "../utils/format";
import { AuthHelpers } from "./authHelpers";
import { isPlainObject, sendError } from "./utils";

function stringField(body: Record<string, unknown>, name: string): string | undefined {
  const v = body[name];
  if (v === undefined) return undefined;
  if (typeof v !== "string") throw new ValidationError(`${name} must be a string`);
  return v;
}

function backendKindField(body: Record<string, unknown>): BackendKind | undefined {
  const v = body.backendKind;
  if (v === undefined) return undefined;
  if (!isBackendKind(v)) throw new ValidationError(`unknown backendKind: ${String(v)}`);
  return v;
}

function endpointField(body: Record<string, unknown>): string | null | undefined {
  const v = body.endpointUrl;
  if (v === undefined || v === null) return v;
  if (typeof v !== "string") throw new ValidationError("endpointUrl must be a string");
  return v;
}

function tlsField(body: Record<string, unknown>): boolean | undefined {
  const v = body.useTls;
  if (v === undefined || typeof v === "boolean") return v;
  if (typeof v === "string") return parseBoolean(v, true);
  throw new ValidationError("useTls must be a boolean");
}

export function parseDraft(body: unknown): StorageConfigDraft {
  if (!isPlainObject(body)) throw new ValidationError("request body must be an object");
  const backendKind = backendKindField(body);
  if (!backendKind) throw new ValidationError("backendKind is required");
  return {
    displayName: stringField(body, "displayName") ?? "",
    backendKind,
    accessKeyId: stringField(body, "accessKeyId") ?? "",
    secretAccessKey: stringField(body, "secretAccessKey") ?? "",
    region: stringField(body, "region") ?? "",
    bucketName: stringField(body, "bucketName") ?? "",
    endpointUrl: endpointField(body),
    useTls: tlsField(body),
  };
}

export function parsePatch(body: unknown): StorageConfigPatch {
  if (!isPlainObject(body)) throw new ValidationError("request body must be an object");
  const patch: StorageConfigPatch = {};
  const displayName = stringField(body, "displayName");
  if (displayName !== undefined) patch.displayName = displayName;
  const backendKind = backendKindField(body);
  if (backendKind !== undefined) patch.backendKind = backendKind;
  const accessKeyId = stringField(body, "accessKeyId");
  if (accessKeyId !== undefined) patch.accessKeyId = accessKeyId;
  const secretAccessKey = stringField(body, "secretAccessKey");
  if (secretAccessKey !== undefined) patch.secretAccessKey = secretAccessKey;
  const region = stringField(body, "region");
  if (region !== undefined) patch.region = region;
  const bucketName = stringField(body, "bucketName");
  if (bucketName !== undefined) patch.bucketName = bucketName;
  const endpointUrl = endpointField(body);
  if (endpointUrl !== undefined) patch.endpointUrl = endpointUrl;
  const useTls = tlsField(body);
  if (useTls !== undefined) patch.useTls = useTls;
  return patch;
}

export default function createConfigsRouter(
  authService: AuthService,
  registry: StorageConfigsService,
  transfer: TransferService,
  provisioning: ProvisioningService | null,
) {
  const router = Router();
  const authHelpers = new AuthHelpers(authService);

  router.get("/", async (req: Request, res: Response) => {
    const loginUser = await authHelpers.requireLogin(req, res);
    if (!loginUser) return;
    try {
      res.json(await registry.listConfigs(loginUser.userId));
    } catch (e) {
      sendError(res, e);
    }
  });

  router.post("/provision", async (req: Request, res: Response) => {
    const loginUser = await authHelpers.requireLogin(req, res);
    if (!loginUser) return;
    if (!provisioning) {
      return res.status(503).json({ error: "provisioning is not configured" });
    }
    try {
      const result = await provisioning.provision(
        loginUser.userId,
        loginUser.nickname,
        AuthHelpers.actorOf(req, loginUser),
      );
      res.status(201).json(result);
    } catch (e) {
      sendError(res, e);
    }
  });

  router.get("/:id", async (req: Request, res: Response) => {
    const loginUser = await authHelpers.requireLogin(req, res);
    if (!loginUser) return;
    try {
      res.json(await registry.getConfig(loginUser, req.params.id));
    } catch (e) {
      sendError(res, e);
    }
  });

  router.post("/", async (req: Request, res: Response) => {
    const loginUser = await authHelpers.requireLogin(req, res);
    if (!loginUser) return;
    try {
      const draft = parseDraft(req.body);
      await transfer.verifyConnectivity(normalizeConfigFields(draft));
      const makeDefault = req.body?.makeDefault === true;
      const id = await registry.createConfig(
        loginUser.userId,
        draft,
        { makeDefault },
        AuthHelpers.actorOf(req, loginUser),
      );
      res.status(201).json({ id });
    } catch (e) {
      sendError(res, e);
    }
  });

  router.put("/:id", async (req: Request, res: Response) => {
    const loginUser = await authHelpers.requireLogin(req, res);
    if (!loginUser) return;
    try {
      const patch = parsePatch(req.body);
      const existing = await registry.getOwnedConfig(loginUser.userId, req.params.id);
      await transfer.verifyConnectivity(mergeStorageConfig(existing, patch));
      const updated = await registry.updateConfig(
        loginUser.userId,
        req.params.id,
        patch,
        AuthHelpers.actorOf(req, loginUser),
      );
      res.json(redactConfig(updated));
    } catch (e) {
      sendError(res, e);
    }
  });

  router.delete("/:id", async (req: Request, res: Response) => {
    const loginUser = await authHelpers.requireLogin(req, res);
    if (!loginUser) return;
    try {
      await registry.deleteConfig(loginUser.userId, req.params.id, AuthHelpers.actorOf(req, loginUser));
      res.json({ result: "ok" });
    } catch (e) {
      sendError(res, e);
    }
  });

  router.post("/:id/default", async (req: Request, res: Response) => {
    const loginUser = await authHelpers.requireLogin(req, res);
    if (!loginUser) return;
    try {
      await registry.setDefaultConfig(loginUser.userId, req.params.id, AuthHelpers.actorOf(req, loginUser));
      res.json({ result: "ok" });
    } catch (e) {
      sendError(res, e);
    }
  });

  return router;
}
