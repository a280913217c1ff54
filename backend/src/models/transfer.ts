import type { Readable } from "stream";
import type { AuditActor } from "./auditLog";

export const MULTIPART_THRESHOLD_BYTES = 5 * 1024 * 1024;
export const MULTIPART_PART_BYTES = 5 * 1024 * 1024;
export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

export type StoredObject = {
  key: string;
  size: number;
  etag?: string;
  lastModified?: string;
};

export type ObjectDownload = {
  body: Readable;
  contentType?: string;
  contentLength?: number;
  etag?: string;
  lastModified?: string;
};

export type CompletedPart = {
  partNumber: number;
  eTag: string;
};

export type FileEntry = {
  key: string;
  size: number;
  etag?: string;
  lastModified?: string;
};

export type ListFilesInput = {
  ownerId: string;
  configId?: string;
  page?: number;
  pageSize?: number;
};

export type ListFilesResult = {
  files: FileEntry[];
  total: number;
  page: number;
  pageSize: number;
  configId: string;
  configName: string;
};

export type UploadFileInput = {
  ownerId: string;
  configId?: string;
  filename: string;
  body: AsyncIterable<Uint8Array | string>;
  size: number;
  contentType?: string;
  signal?: AbortSignal;
  actor?: AuditActor;
};

export type UploadFileResult = {
  key: string;
  size: number;
  multipart: boolean;
  parts: number;
  configId: string;
};

export type FileRef = {
  ownerId: string;
  configId?: string;
  key: string;
  actor?: AuditActor;
};

export type DownloadFileResult = ObjectDownload & {
  filename: string;
  configId: string;
};
