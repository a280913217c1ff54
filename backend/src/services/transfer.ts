import { Readable } from "stream";
import type { StorageConfig } from "../models/storageConfig";
import type { AuditActor } from "../models/auditLog";
import {
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  MULTIPART_THRESHOLD_BYTES,
  type DownloadFileResult,
  type FileEntry,
  type FileRef,
  type ListFilesInput,
  type ListFilesResult,
  type ObjectDownload,
  type UploadFileInput,
  type UploadFileResult,
} from "../models/transfer";
import { BackendOperationFailure, ObjectNotFoundError, ValidationError } from "../models/errors";
import type { AuditSink } from "./auditLog";
import type { ObjectStore } from "./storage";
import type { ObjectStoreCache, StoreConnection } from "./storageFactory";
import { runMultipartUpload } from "./multipartUpload";
import { createLogger, errorMessage } from "../utils/logger";

const logger = createLogger({ file: "transfer" });

/** The slice of the registry the engine needs. */
export interface ConfigResolver {
  getOwnedConfig(ownerId: string, id: string): Promise<StorageConfig>;
  getDefaultConfig(ownerId: string): Promise<StorageConfig>;
}

export function ownerPrefix(ownerId: string): string {
  return `users/${ownerId}/`;
}

export function objectKeyFor(ownerId: string, filename: string): string {
  return ownerPrefix(ownerId) + filename;
}

export function normalizePage(page?: number): number {
  if (page === undefined || !Number.isFinite(page) || page < 1) return 1;
  return Math.floor(page);
}

export function normalizePageSize(pageSize?: number): number {
  if (pageSize === undefined || !Number.isFinite(pageSize)) return DEFAULT_PAGE_SIZE;
  return Math.min(MAX_PAGE_SIZE, Math.max(1, Math.floor(pageSize)));
}

function requireFilename(filename: string): string {
  if (typeof filename !== "string" || filename.length === 0) {
    throw new ValidationError("filename is required");
  }
  return filename;
}

type FileAudit = {
  action: "upload_file" | "download_file" | "delete_file";
  ownerId: string;
  filename: string;
  actor?: AuditActor;
};

export class TransferService {
  private configs: ConfigResolver;
  private audit: AuditSink;
  private stores: ObjectStoreCache;

  constructor(configs: ConfigResolver, audit: AuditSink, stores: ObjectStoreCache) {
    this.configs = configs;
    this.audit = audit;
    this.stores = stores;
  }

  private async resolve(ownerId: string, configId?: string): Promise<{ config: StorageConfig; store: ObjectStore }> {
    const config = configId
      ? await this.configs.getOwnedConfig(ownerId, configId)
      : await this.configs.getDefaultConfig(ownerId);
    return { config, store: this.stores.storeFor(config) };
  }

  private async report(
    target: FileAudit,
    success: boolean,
    details: Record<string, unknown>,
    error?: unknown,
  ): Promise<void> {
    await this.audit.record({
      action: target.action,
      resource: "file",
      resourceId: target.filename,
      success,
      error,
      details: { filename: target.filename, ...details },
      actor: { ...target.actor, userId: target.actor?.userId ?? target.ownerId },
    });
  }

  private failureDetails(e: unknown): Record<string, unknown> {
    if (!(e instanceof BackendOperationFailure)) return {};
    return e.partNumber === undefined ? { stage: e.stage } : { stage: e.stage, partNumber: e.partNumber };
  }

  async verifyConnectivity(conn: StoreConnection): Promise<void> {
    const store = this.stores.fresh(conn);
    try {
      await store.probe();
    } catch (e) {
      logger.warn(`[transfer] probe of ${conn.bucketName} failed: ${errorMessage(e)}`);
      throw new BackendOperationFailure("probe", e, { statusCode: 400 });
    } finally {
      store.close();
    }
  }

  async listFiles(input: ListFilesInput): Promise<ListFilesResult> {
    const { config, store } = await this.resolve(input.ownerId, input.configId);
    const prefix = ownerPrefix(input.ownerId);
    let files: FileEntry[];
    try {
      const objects = await store.listObjects(prefix);
      files = objects
        .filter((o) => o.key.startsWith(prefix))
        .map((o) => ({ ...o, key: o.key.slice(prefix.length) }))
        .filter((o) => o.key.length > 0);
    } catch (e) {
      throw new BackendOperationFailure("list", e);
    }
    const page = normalizePage(input.page);
    const pageSize = normalizePageSize(input.pageSize);
    const total = files.length;
    const start = Math.min((page - 1) * pageSize, total);
    const end = Math.min(start + pageSize, total);
    return {
      files: files.slice(start, end),
      total,
      page,
      pageSize,
      configId: config.id,
      configName: config.displayName,
    };
  }

  async uploadFile(input: UploadFileInput): Promise<UploadFileResult> {
    const target: FileAudit = {
      action: "upload_file",
      ownerId: input.ownerId,
      filename: input.filename,
      actor: input.actor,
    };
    const multipart = input.size >= MULTIPART_THRESHOLD_BYTES;
    try {
      const filename = requireFilename(input.filename);
      const { config, store } = await this.resolve(input.ownerId, input.configId);
      const key = objectKeyFor(input.ownerId, filename);
      let result: UploadFileResult;
      if (multipart) {
        const outcome = await runMultipartUpload(store, key, input.body, {
          contentType: input.contentType,
          signal: input.signal,
        });
        result = { key: filename, size: outcome.size, multipart, parts: outcome.parts.length, configId: config.id };
      } else {
        try {
          const body = input.body instanceof Readable ? input.body : Readable.from(input.body);
          await store.putObject(key, body, input.size, input.contentType);
        } catch (e) {
          throw new BackendOperationFailure("put", e);
        }
        result = { key: filename, size: input.size, multipart, parts: 0, configId: config.id };
      }
      await this.report(target, true, {
        size: result.size,
        stage: multipart ? "complete" : "put",
        parts: result.parts,
        configId: config.id,
      });
      logger.debug(`[transfer] uploaded ${key} (${result.size} bytes, ${result.parts} parts)`);
      return result;
    } catch (e) {
      logger.warn(`[transfer] upload of ${input.filename} failed: ${errorMessage(e)}`);
      await this.report(
        target,
        false,
        { size: input.size, ...this.failureDetails(e) },
        e,
      );
      throw e;
    }
  }

  async downloadFile(ref: FileRef): Promise<DownloadFileResult> {
    const target: FileAudit = { action: "download_file", ownerId: ref.ownerId, filename: ref.key, actor: ref.actor };
    try {
      const filename = requireFilename(ref.key);
      const { config, store } = await this.resolve(ref.ownerId, ref.configId);
      let download: ObjectDownload;
      try {
        download = await store.getObject(objectKeyFor(ref.ownerId, filename));
      } catch (e) {
        if (e instanceof ObjectNotFoundError) throw new ObjectNotFoundError(filename, e.cause);
        throw new BackendOperationFailure("get", e);
      }
      await this.report(target, true, { size: download.contentLength, stage: "get", configId: config.id });
      return { ...download, filename, configId: config.id };
    } catch (e) {
      await this.report(target, false, this.failureDetails(e), e);
      throw e;
    }
  }

  async deleteFile(ref: FileRef): Promise<void> {
    const target: FileAudit = { action: "delete_file", ownerId: ref.ownerId, filename: ref.key, actor: ref.actor };
    try {
      const filename = requireFilename(ref.key);
      const { config, store } = await this.resolve(ref.ownerId, ref.configId);
      try {
        await store.deleteObject(objectKeyFor(ref.ownerId, filename));
      } catch (e) {
        throw new BackendOperationFailure("delete", e);
      }
      await this.report(target, true, { stage: "delete", configId: config.id });
    } catch (e) {
      await this.report(target, false, this.failureDetails(e), e);
      throw e;
    }
  }
}
