import { Router, Request, Response } from "express";
import multer from "multer";
import mime from "mime-types";
import os from "os";
import path from "path";
import fs from "fs";
import { pipeline } from "stream/promises";
import { Config } from "../config";
import { AuthService } from "../services/auth";
import { TransferService } from "../services/transfer";
import type { DownloadFileResult } from "../models/transfer";
import { parseIntOrUndefined } from "../utils/format";
import { createLogger, errorMessage } from "../utils/logger";
import { AuthHelpers } from "./authHelpers";
import { queryString, sendError } from "./utils";

const logger = createLogger({ file: "files" });

function contentTypeOf(filename: string, reported: string): string {
  if (reported && reported !== "application/octet-stream") return reported;
  return mime.lookup(filename) || "application/octet-stream";
}

function contentDisposition(filename: string): string {
  const base = path.posix.basename(filename);
  const ascii = base.replace(/[^\x20-\x7e]|["\\]/g, "_");
  return `attachment; filename="${ascii}"; filename*=UTF-8''${encodeURIComponent(base)}`;
}

export default function createFilesRouter(authService: AuthService, transfer: TransferService) {
  const router = Router();
  const authHelpers = new AuthHelpers(authService);
  const upload = multer({
    storage: multer.diskStorage({ destination: Config.UPLOAD_TMP_DIR || os.tmpdir() }),
    limits: { fileSize: Config.UPLOAD_BYTE_LIMIT, files: 1 },
  });
  const single = upload.single("file");

  function receiveFile(req: Request, res: Response): Promise<void> {
    return new Promise((resolve, reject) => {
      single(req, res, (err?: unknown) => (err ? reject(err) : resolve()));
    });
  }

  router.get("/", async (req: Request, res: Response) => {
    const loginUser = await authHelpers.requireLogin(req, res);
    if (!loginUser) return;
    try {
      const result = await transfer.listFiles({
        ownerId: loginUser.userId,
        configId: queryString(req.query.configId),
        page: parseIntOrUndefined(req.query.page),
        pageSize: parseIntOrUndefined(req.query.pageSize),
      });
      res.json(result);
    } catch (e) {
      sendError(res, e);
    }
  });

  router.post("/", async (req: Request, res: Response) => {
    const loginUser = await authHelpers.requireLogin(req, res);
    if (!loginUser) return;
    try {
      await receiveFile(req, res);
    } catch (e) {
      if (e instanceof multer.MulterError) {
        return res.status(e.code === "LIMIT_FILE_SIZE" ? 413 : 400).json({ error: e.message });
      }
      return sendError(res, e);
    }
    const file = req.file;
    if (!file) return res.status(400).json({ error: "file is required" });

    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableFinished) controller.abort(new Error("client disconnected"));
    };
    res.on("close", onClose);
    try {
      const given: unknown = req.body?.filename;
      const filename = typeof given === "string" && given !== "" ? given : file.originalname;
      const result = await transfer.uploadFile({
        ownerId: loginUser.userId,
        configId: queryString(req.body?.configId) ?? queryString(req.query.configId),
        filename,
        body: fs.createReadStream(file.path),
        size: file.size,
        contentType: contentTypeOf(filename, file.mimetype),
        signal: controller.signal,
        actor: AuthHelpers.actorOf(req, loginUser),
      });
      res.status(201).json(result);
    } catch (e) {
      if (!res.headersSent && !controller.signal.aborted) sendError(res, e);
    } finally {
      res.off("close", onClose);
      try {
        await fs.promises.unlink(file.path);
      } catch (e) {
        logger.warn(`[files] failed to remove ${file.path}: ${errorMessage(e)}`);
      }
    }
  });

  router.get("/*", async (req: Request, res: Response) => {
    const loginUser = await authHelpers.requireLogin(req, res);
    if (!loginUser) return;
    let download: DownloadFileResult;
    try {
      download = await transfer.downloadFile({
        ownerId: loginUser.userId,
        configId: queryString(req.query.configId),
        key: req.params[0] ?? "",
        actor: AuthHelpers.actorOf(req, loginUser),
      });
    } catch (e) {
      return sendError(res, e);
    }
    res.setHeader("Content-Type", download.contentType || contentTypeOf(download.filename, ""));
    if (download.contentLength !== undefined) {
      res.setHeader("Content-Length", String(download.contentLength));
    }
    res.setHeader("Content-Disposition", contentDisposition(download.filename));
    try {
      await pipeline(download.body, res);
    } catch (e) {
      logger.warn(`[files] download of ${download.filename} interrupted: ${errorMessage(e)}`);
    }
  });

  router.delete("/*", async (req: Request, res: Response) => {
    const loginUser = await authHelpers.requireLogin(req, res);
    if (!loginUser) return;
    try {
      await transfer.deleteFile({
        ownerId: loginUser.userId,
        configId: queryString(req.query.configId),
        key: req.params[0] ?? "",
        actor: AuthHelpers.actorOf(req, loginUser),
      });
      res.json({ result: "ok" });
    } catch (e) {
      sendError(res, e);
    }
  });

  return router;
}
